import { NextFunction, Request, Response } from 'express';
import crypto from 'node:crypto';

interface RequestLogOptions {
  isProduction: boolean;
}

/**
 * Tags each request with an id (echoed as X-Request-Id) and logs one line when
 * the response finishes. Production logs only 5xx lines. The error code set by
 * handleRouteError is appended so rejected forecasts can be told apart.
 */
export const requestLog =
  ({ isProduction }: RequestLogOptions) =>
  (req: Request, res: Response, next: NextFunction) => {
    const requestId = crypto.randomUUID();
    const startedAt = Date.now();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    res.on('finish', () => {
      if (isProduction && res.statusCode < 500) {
        return;
      }
      const elapsed = Date.now() - startedAt;
      const errorCode: unknown = res.locals.errorCode;
      const suffix = typeof errorCode === 'string' ? ` ${errorCode}` : '';
      console.log(`[${requestId}] ${req.method} ${req.originalUrl} -> ${res.statusCode}${suffix} (${elapsed}ms)`);
    });
    next();
  };
