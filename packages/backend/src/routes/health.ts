import { Router } from "express";
import type { HealthResponse, ServiceConnectionStatus } from "@medtriage/shared";

interface CreateHealthRouterOptions {
  checkVectorIndex: () => Promise<ServiceConnectionStatus>;
  checkLlm: () => Promise<ServiceConnectionStatus>;
  startTime?: number;
}

export function createHealthRouter(options: CreateHealthRouterOptions): Router {
  const startTime = options.startTime ?? Date.now();
  const healthRouter = Router();

  healthRouter.get("/", async (_req, res) => {
    const [vectorIndex, llm] = await Promise.all([options.checkVectorIndex(), options.checkLlm()]);
    const status: HealthResponse["status"] =
      vectorIndex === "failed" || llm === "failed" ? "degraded" : "ok";

    const mem = process.memoryUsage();
    const response: HealthResponse = {
      status,
      timestamp: new Date().toISOString(),
      uptimeSec: Math.max(0, Math.floor((Date.now() - startTime) / 1000)),
      checks: {
        vectorIndex,
        llm
      },
      memoryUsage: {
        rss: mem.rss,
        heapUsed: mem.heapUsed,
        heapTotal: mem.heapTotal
      }
    };
    res.json(response);
  });

  return healthRouter;
}
