// src/api/middleware/rate-limit.middleware.ts
import { createHash } from 'crypto';
import { NextFunction, Request, Response } from 'express';
import { RateLimiter } from '../../lib/billing/rate-limit/types';
import { ErrorCode, errorHandler } from '../../lib/billing/utils/error';
import { BillingLogger } from '../../lib/billing/utils/logger';
import { mark } from '../../lib/billing/utils/request-context';
import { getRequestContext } from './request-context.middleware';

const logger = new BillingLogger(undefined, 'RateLimitMiddleware');

/** Hash of client address and user agent, so raw values never become keys. */
export function clientIdentity(req: Request): string {
  const ip = req.ip || 'unknown';
  const userAgent = req.get('user-agent') || 'unknown';
  return createHash('sha256').update(`${ip}|${userAgent}`).digest('hex');
}

export const rateLimitMiddleware = (limiter: RateLimiter) => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const identity = clientIdentity(req);
      const allowed = await limiter.isAllowed(identity);
      const usage = await limiter.currentUsage(identity);

      const context = getRequestContext(res);
      if (context) {
        mark(context, 'rateLimit');
      }

      res.setHeader('X-RateLimit-Limit', String(usage.limit));
      res.setHeader('X-RateLimit-Remaining', String(usage.remaining));
      res.setHeader('X-RateLimit-Reset', String(Math.ceil(usage.resetAt.getTime() / 1000)));

      if (!allowed) {
        logger.warn('Rate limit exceeded', { path: req.path, method: req.method, resetAt: usage.resetAt });
        next(
          errorHandler.createError('Rate limit exceeded', ErrorCode.RATE_LIMIT_EXCEEDED, {
            limit: usage.limit,
            resetAt: usage.resetAt.toISOString()
          })
        );
        return;
      }

      next();
    } catch (error) {
      next(error);
    }
  };
};
