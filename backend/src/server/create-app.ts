import express, { Express } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { handleNotFound, handleRouteError } from './error-handler.js';
import { requestLog } from './request-log.js';

const JSON_BODY_LIMIT = '1mb';

// Without an allow-list, browsers are let in everywhere except production.
const createCorsOptions = (corsAllowlist: string[], isProduction: boolean): cors.CorsOptions => ({
  origin(origin, callback) {
    if (!origin) {
      callback(null, true);
      return;
    }
    callback(null, corsAllowlist.length === 0 ? !isProduction : corsAllowlist.includes(origin));
  },
});

interface CreateAppOptions {
  isProduction: boolean;
  corsAllowlist: string[];
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
  registerRoutes: (app: Express) => void;
}

export const createApp = ({
  isProduction,
  corsAllowlist,
  rateLimitWindowMs,
  rateLimitMaxRequests,
  registerRoutes,
}: CreateAppOptions): Express => {
  const app = express();

  app.disable('x-powered-by');
  // First, so requests rejected by the body parser are still tagged and logged.
  app.use(requestLog({ isProduction }));
  app.use(cors(createCorsOptions(corsAllowlist, isProduction)));
  app.use(compression());
  app.use(helmet());
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.use(
    '/api',
    rateLimit({
      windowMs: rateLimitWindowMs,
      max: rateLimitMaxRequests,
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => req.method === 'OPTIONS',
      message: { error: 'Too many requests. Please retry later.', code: 'rate_limited' },
    }),
  );

  registerRoutes(app);

  app.use(handleNotFound);
  app.use(handleRouteError);

  return app;
};
