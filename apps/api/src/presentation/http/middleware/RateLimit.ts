/**
 * Rate Limiting Middleware
 * Applied to all /api routes when enabled in configuration
 */

import rateLimit, { RateLimitRequestHandler } from "express-rate-limit";
import { IConfig } from "../../../shared/config/IConfig";
import { TooManyRequestsError } from "../../../shared/errors/HttpError";

// Relative to the /api mount point
const UNLIMITED_PATHS: ReadonlySet<string> = new Set(["/verses/_health"]);

export function createApiLimiter(
  config: Pick<IConfig, "rateLimitWindowMs" | "rateLimitMax">,
): RateLimitRequestHandler {
  return rateLimit({
    windowMs: config.rateLimitWindowMs,
    limit: config.rateLimitMax,
    standardHeaders: true, // `RateLimit-*` headers
    legacyHeaders: false,
    skip: (req) => UNLIMITED_PATHS.has(req.path),
    // Rendered by the central error handler
    handler: (_req, _res, next) => next(new TooManyRequestsError()),
  });
}
