import rateLimit from "express-rate-limit";
import { Request, Response } from "express";
import { getEnv } from "../config/environment";

/**
 * Rate limiting for the public verification API.
 *
 * Set DISABLE_RATE_LIMIT=true to disable rate limiting (load testing only).
 */

const WINDOW_MS = 15 * 60 * 1000;

function isRateLimitDisabled(): boolean {
  return getEnv().flags.disableRateLimit;
}

function limitExceeded(error: string, message: string) {
  return (_req: Request, res: Response): void => {
    res.status(429).json({
      success: false,
      error,
      message,
      retryAfter: "in 15 minutes",
    });
  };
}

/**
 * General API rate limiter
 * 100 requests per 15 minutes per IP
 */
export const apiLimiter = rateLimit({
  skip: () => isRateLimitDisabled(),
  windowMs: WINDOW_MS,
  max: 100,
  standardHeaders: true,
  legacyHeaders: false,
  handler: limitExceeded(
    "Rate limit exceeded",
    "Too many requests from this IP address. Please try again later.",
  ),
});

/**
 * Verification uploads run two model calls each, so they get a tighter budget.
 * 10 uploads per 15 minutes per IP
 */
export const uploadLimiter = rateLimit({
  skip: () => isRateLimitDisabled(),
  windowMs: WINDOW_MS,
  max: 10,
  standardHeaders: true,
  legacyHeaders: false,
  handler: limitExceeded(
    "Upload rate limit exceeded",
    "Too many file uploads from this IP address. Please try again later.",
  ),
});
