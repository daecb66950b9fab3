import { Express, Request, Response } from 'express';
import pkg from '../../package.json' with { type: 'json' };

const { name, version } = pkg;

interface RegisterHealthRoutesOptions {
  app: Express;
  indicatorCount: number;
}

export const registerHealthRoutes = ({ app, indicatorCount }: RegisterHealthRoutesOptions) => {
  const respond = (_req: Request, res: Response) => {
    const mem = process.memoryUsage();
    res.json({
      ok: true,
      service: name,
      version,
      env: process.env.NODE_ENV || 'development',
      indicators: indicatorCount,
      uptime: Math.floor(process.uptime()),
      nodeVersion: process.version,
      memory: {
        heapUsedMb: Math.round(mem.heapUsed / 1024 / 1024),
        rssMb: Math.round(mem.rss / 1024 / 1024),
      },
      timestamp: new Date().toISOString(),
    });
  };

  app.get('/healthz', respond);
  app.get('/health', respond);
  app.get('/api/healthz', respond);
  app.get('/api/health', respond);
};
