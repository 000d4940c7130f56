import rateLimit from 'express-rate-limit';
import type { RateLimitOptions } from '../config';
import type { ApiEnvelope, ErrorDetail } from '../types';

const TOO_MANY_REQUESTS = 'Too many requests, please try again later';

/**
 * 写操作速率限制
 */
export function createWriteLimiter(options: RateLimitOptions) {
  const message: ApiEnvelope<ErrorDetail> = {
    error: true,
    data: { detail: TOO_MANY_REQUESTS },
    message: TOO_MANY_REQUESTS,
  };

  return rateLimit({
    windowMs: options.windowMs,
    limit: options.max,
    message,
    standardHeaders: true,
    legacyHeaders: false,
  });
}
