import type { RequestHandler } from "express";
import { ImageValidationError, validateImagePayload } from "../utils/imagePayload.js";

/**
 * Checks `req.body.image`, when present, is base64 image data within the size limit.
 */
export const validateImageField = (maxSizeBytes: number): RequestHandler => {
  return async (req, res, next) => {
    const image: unknown = req.body?.image;
    if (typeof image !== "string") {
      next();
      return;
    }

    try {
      await validateImagePayload(image, { maxSizeBytes });
      next();
    } catch (error) {
      if (error instanceof ImageValidationError) {
        res.status(400).json({ error: error.message });
        return;
      }
      next(error);
    }
  };
};
