import rateLimit from 'express-rate-limit';

/**
 * Rate limiting middleware.
 *
 * Limitations to be aware of:
 * - Uses in-memory store (resets on restart, not shared across instances)
 * - Requires 'trust proxy' to be set for correct client IP behind reverse proxy
 * - Counts all requests (successful and failed), not just failures
 */

// General API rate limit: 100 requests per minute per IP
export const apiLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 100,
  message: { error: 'Too many requests, please try again later' },
  standardHeaders: true,
  legacyHeaders: false,
});

// Route planning rate limit: 20 requests per minute per IP
// Tighter because a cache miss calls the routing service and renders a map
export const routeLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 20,
  message: { error: 'Too many route requests, please try again later' },
  standardHeaders: true,
  legacyHeaders: false,
});
