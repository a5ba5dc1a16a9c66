import { type FastifyRequest } from 'fastify';
import { AppError, ErrorCode, InMemoryRateLimiter, type SafeLogger } from '@bookwell/shared';

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  clock?: () => number;
}

/**
 * Per-route, per-IP limiter. Each route gets its own budget so a burst of
 * refreshes does not lock a client out of logging in.
 */
export function createRateLimiter(opts: RateLimitOptions, logger: SafeLogger) {
  const limiter = new InMemoryRateLimiter(opts.maxRequests, opts.windowMs, opts.clock);

  setInterval(() => limiter.sweep(), opts.windowMs).unref();

  return async function rateLimit(request: FastifyRequest) {
    const key = `${request.routeOptions.url ?? request.url}:${request.ip}`;
    const decision = limiter.consume(key);
    if (!decision.allowed) {
      logger.warn({ requestId: request.id, route: request.routeOptions.url }, 'Rate limit exceeded');
      throw new AppError(ErrorCode.RATE_LIMITED, 'Too many requests, please try again later', {
        retryAfterSeconds: decision.retryAfterSeconds,
      });
    }
  };
}
