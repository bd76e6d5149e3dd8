import rateLimit from 'express-rate-limit';
import type { Request, Response } from 'express';
import * as functions from 'firebase-functions';

const FIFTEEN_MINUTES = 15 * 60 * 1000;

export function rateLimitExceeded(scope: string, message: string) {
  return (req: Request, res: Response) => {
    functions.logger.warn(`[rate-limit] IP ${req.ip} exceeded ${scope} rate limit`);
    res.status(429).json({
      code: 'rate_limit_exceeded',
      message,
    });
  };
}

/**
 * General API rate limiter
 * 100 requests per 15 minutes per IP
 */
export const apiLimiter = rateLimit({
  windowMs: FIFTEEN_MINUTES,
  limit: 100,
  standardHeaders: true,
  legacyHeaders: false,
  handler: rateLimitExceeded('general', 'Too many requests, please try again later.'),
});

/**
 * Limiter for step creation, check-ins and cancellation
 * 30 writes per 15 minutes per IP
 */
export const writeLimiter = rateLimit({
  windowMs: FIFTEEN_MINUTES,
  limit: 30,
  standardHeaders: true,
  legacyHeaders: false,
  handler: rateLimitExceeded('write', 'Too many write requests, please try again later.'),
});
