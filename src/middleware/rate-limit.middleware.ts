import rateLimit from 'express-rate-limit';

interface RateLimitOptions {
  windowMs: number;
  max: number;
}

/**
 * Per-client limiter for the warehouse-backed routes, which each cost a
 * Snowflake round trip (and a Cortex call for /optimize).
 */
export const createRateLimiter = ({ windowMs, max }: RateLimitOptions) =>
  rateLimit({
    windowMs,
    max,
    standardHeaders: true,
    legacyHeaders: false,
    message: { success: false, error: 'Too many requests', details: 'Rate limit exceeded, try again later' }
  });
