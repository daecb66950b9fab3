import { NextFunction, Request, Response } from 'express';
import { RiskEngineError } from '../utils/risk-errors.js';

const isBodyParseError = (error: unknown): boolean =>
  error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';

export const handleNotFound = (req: Request, res: Response) => {
  res.locals.errorCode = 'not_found';
  res.status(404).json({ error: `No route for ${req.method} ${req.path}`, code: 'not_found' });
};

// Express only treats four-argument middleware as an error handler.
export const handleRouteError = (error: unknown, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof RiskEngineError) {
    res.locals.errorCode = error.code;
    if (error.statusCode >= 500) {
      console.error(`[${res.locals.requestId}] ${error.name}: ${error.message}`);
    }
    res.status(error.statusCode).json({ error: error.message, code: error.code });
    return;
  }

  if (isBodyParseError(error)) {
    res.locals.errorCode = 'invalid_request';
    res.status(400).json({ error: 'Request body is not valid JSON.', code: 'invalid_request' });
    return;
  }

  console.error(`[${res.locals.requestId}] Unhandled error on ${req.method} ${req.originalUrl}:`, error);
  res.status(500).json({ error: 'Internal server error' });
};
