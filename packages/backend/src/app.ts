import cors from "cors";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { ServiceInfoResponse } from "@medtriage/shared";
import { requestLogger } from "./middleware/logger.js";
import { createApiRateLimiter } from "./middleware/rateLimiter.js";
import { createChatRouter } from "./routes/chat.js";
import { createHealthRouter } from "./routes/health.js";
import { createImagesRouter } from "./routes/images.js";
import { createIngestRouter } from "./routes/ingest.js";
import { createKnowledgeRouter } from "./routes/knowledge.js";
import { createUsageRouter } from "./routes/usage.js";
import { checkLlmConnection, checkVectorIndexConnection } from "./runtime/connectivity.js";
import type { TriageRuntime } from "./runtime/container.js";
import { logger } from "./utils/logger.js";

const SERVICE_NAME = "Medical Triage Assistant";
const SERVICE_VERSION = "1.0.0";

export function createApp(runtime: TriageRuntime): Express {
  const { config } = runtime;
  const maxImageBytes = Math.floor(config.MAX_IMAGE_SIZE_MB * 1024 * 1024);
  // Base64 inflates payloads by a third.
  const bodyLimitBytes = Math.ceil(maxImageBytes * 1.4) + 1024 * 1024;
  const ensureVectorIndexConnected = runtime.ensureVectorIndexConnected;

  const app = express();

  app.use(requestLogger);
  app.use(cors({ origin: config.CORS_ORIGIN }));
  app.use(express.json({ limit: bodyLimitBytes }));
  app.use(createApiRateLimiter(config));

  app.get("/", (_req, res) => {
    const response: ServiceInfoResponse = {
      status: "ok",
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      stages: ["router", "reject", "rag", "triage", "self_care", "doctor_referral", "clarification"]
    };
    res.json(response);
  });

  app.use(
    "/api/chat",
    createChatRouter({ workflow: runtime.workflow, ensureVectorIndexConnected, maxImageBytes })
  );
  app.use(
    "/api/ingest",
    createIngestRouter({ ingestion: runtime.ingestion, ensureVectorIndexConnected, maxImageBytes })
  );
  app.use(
    "/api/knowledge-graph",
    createKnowledgeRouter({ retriever: runtime.retriever, ensureVectorIndexConnected })
  );
  app.use("/api/images", createImagesRouter({ imageAnalyzer: runtime.imageAnalyzer }));
  app.use("/api/usage", createUsageRouter({ llmService: runtime.llmService }));
  app.use(
    "/api/health",
    createHealthRouter({
      startTime: runtime.startTime,
      checkVectorIndex: () =>
        checkVectorIndexConnection({
          vectorIndex: runtime.vectorIndex,
          ensureConnected: ensureVectorIndexConnected,
          configured: runtime.vectorIndexConfigured
        }),
      checkLlm: () =>
        checkLlmConnection({
          llmService: runtime.llmService,
          configured: runtime.llmConfigured
        })
    })
  );

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isPayloadTooLarge(err)) {
      res.status(413).json({ error: "Request payload too large" });
      return;
    }
    logger.error({ err }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}

function isPayloadTooLarge(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    err.type === "entity.too.large"
  );
}
