import rateLimit from "express-rate-limit";
import type { RequestHandler } from "express";
import { appConfig, type AppConfig } from "../config.js";

export function createApiRateLimiter(env: AppConfig = appConfig): RequestHandler {
  return rateLimit({
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    max: env.RATE_LIMIT_MAX,
    standardHeaders: true,
    legacyHeaders: false
  });
}
