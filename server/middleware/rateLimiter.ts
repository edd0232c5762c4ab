import rateLimit from "express-rate-limit";
import type { Request, Response } from "express";
import type { IdentityRequest } from "../auth/types";

/**
 * Rate limiting middleware.
 *
 * Generation holds the model for seconds per request, so the chat route is
 * limited far below the general API.
 */

// Key by portal account when logged in, by IP otherwise
const keyGenerator = (req: IdentityRequest): string => {
  if (req.user) {
    return `user:${req.user.id}`;
  }
  return req.ip || req.socket.remoteAddress || 'unknown';
};

// Standard error response
const rateLimitHandler = (_req: Request, res: Response) => {
  res.status(429).json({
    message: "Too many requests. Please wait a moment before trying again.",
    retryAfter: res.getHeader('Retry-After'),
  });
};

/**
 * Chat question limiter - strictest limits (model inference)
 * 20 questions per minute per user/IP
 */
export const chatMessageLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  limit: 20,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator,
  handler: rateLimitHandler,
});

/**
 * General API limiter for other endpoints
 * 100 requests per minute per user/IP
 */
export const generalApiLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  limit: 100,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator,
  handler: rateLimitHandler,
});
