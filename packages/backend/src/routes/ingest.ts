import { Router } from "express";
import { z } from "zod";
import type { IngestResponse } from "@medtriage/shared";
import { validateImageField } from "../middleware/imagePayload.js";
import { requireReady } from "../middleware/readiness.js";
import { validate } from "../middleware/validator.js";
import type { IngestionPipeline } from "../pipeline/IngestionPipeline.js";

const ingestBodySchema = z.object({
  text: z.string().min(1).optional(),
  image: z.string().min(1).optional(),
  source: z.string().min(1).default("user"),
  saveImage: z.boolean().default(true)
});

type IngestBody = z.infer<typeof ingestBodySchema>;

interface CreateIngestRouterOptions {
  ingestion: IngestionPipeline;
  ensureVectorIndexConnected: () => Promise<void>;
  maxImageBytes: number;
}

export function createIngestRouter(options: CreateIngestRouterOptions): Router {
  const { ingestion } = options;
  const ingestRouter = Router();

  ingestRouter.post(
    "/",
    validate({ body: ingestBodySchema }),
    (req, res, next) => {
      const body: IngestBody = req.body;
      if (body.text === undefined && body.image === undefined) {
        res.status(400).json({ error: "Either text or image must be provided" });
        return;
      }
      next();
    },
    validateImageField(options.maxImageBytes),
    requireReady("Vector index", options.ensureVectorIndexConnected),
    async (req, res, next) => {
      try {
        const body: IngestBody = req.body;
        const result = await ingestion.ingestMultimodal({
          ...(body.text !== undefined ? { text: body.text } : {}),
          ...(body.image !== undefined ? { image: body.image } : {}),
          source: body.source,
          saveImage: body.saveImage
        });

        if (!result.success) {
          res.status(500).json({ error: `Ingestion failed: ${result.error ?? "unknown error"}` });
          return;
        }

        const response: IngestResponse = {
          success: true,
          textChunks: result.textChunks,
          message: `Successfully ingested ${result.textChunks} chunks`
        };
        if (result.imageId !== undefined) {
          response.imageId = result.imageId;
        }
        if (result.imageAnalysis !== undefined) {
          response.imageAnalysis = result.imageAnalysis;
        }
        res.json(response);
      } catch (error) {
        next(error);
      }
    }
  );

  return ingestRouter;
}
