import { Request, Response, NextFunction } from 'express';
import * as functions from 'firebase-functions';

export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction) {
  functions.logger.error(`[errorHandler] Unhandled error on ${req.method} ${req.originalUrl}:`, err);

  if (res.headersSent) {
    return next(err);
  }

  if (process.env.NODE_ENV === 'production') {
    // No stack traces outside development
    res.status(500).json({
      code: 'server_error',
      message: 'An unexpected error occurred',
    });
  } else {
    res.status(500).json({
      code: 'server_error',
      message: err.message,
      stack: err.stack,
    });
  }
}
