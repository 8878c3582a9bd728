import type { RequestHandler } from "express";
import { logger } from "../utils/logger.js";

export const requestLogger: RequestHandler = (req, res, next) => {
  const startedAt = process.hrtime.bigint();
  // Query strings carry patient text, so only the path is logged.
  const path = req.path;

  res.on("finish", () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1_000_000;
    const fields = {
      method: req.method,
      path,
      status: res.statusCode,
      durationMs: Math.round(durationMs)
    };

    if (res.statusCode >= 500) {
      logger.warn(fields, "Request failed");
      return;
    }
    logger.info(fields, "Request handled");
  });

  next();
};
