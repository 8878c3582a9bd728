import type { RequestHandler } from "express";
import { logger } from "../utils/logger.js";

/** Responds 503 until the dependency behind `ensureReady` can be reached. */
export const requireReady = (name: string, ensureReady: () => Promise<void>): RequestHandler => {
  return async (_req, res, next) => {
    try {
      await ensureReady();
      next();
    } catch (error) {
      logger.error({ err: error }, `${name} connection failed`);
      res.status(503).json({ error: `${name} unavailable` });
    }
  };
};
