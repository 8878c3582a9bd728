import { Router } from "express";
import { z } from "zod";
import type { GetImageResponse, ListImagesResponse } from "@medtriage/shared";
import { validate } from "../middleware/validator.js";
import type { ImageAnalyzer } from "../services/ImageAnalyzer.js";

const imageParamsSchema = z.object({
  id: z.string().regex(/^[0-9a-f]{16}$/, "Image id must be 16 hex characters")
});

const listImagesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50)
});

interface CreateImagesRouterOptions {
  imageAnalyzer: Pick<ImageAnalyzer, "getById" | "list" | "delete">;
}

export function createImagesRouter(options: CreateImagesRouterOptions): Router {
  const { imageAnalyzer } = options;
  const imagesRouter = Router();

  imagesRouter.get("/", validate({ query: listImagesQuerySchema }), (req, res) => {
    const { limit } = req.query as unknown as z.infer<typeof listImagesQuerySchema>;
    const response: ListImagesResponse = {
      images: imageAnalyzer.list(limit)
    };
    res.json(response);
  });

  imagesRouter.get("/:id", validate({ params: imageParamsSchema }), (req, res) => {
    const image = imageAnalyzer.getById(req.params.id ?? "");
    if (!image) {
      res.status(404).json({ error: "Image not found" });
      return;
    }

    const response: GetImageResponse = { image };
    res.json(response);
  });

  imagesRouter.delete("/:id", validate({ params: imageParamsSchema }), (req, res) => {
    const imageId = req.params.id ?? "";
    if (!imageAnalyzer.getById(imageId)) {
      res.status(404).json({ error: "Image not found" });
      return;
    }

    if (!imageAnalyzer.delete(imageId)) {
      res.status(500).json({ error: "Failed to delete image" });
      return;
    }
    res.status(204).send();
  });

  return imagesRouter;
}
