import { Router } from "express";
import { z } from "zod";
import type { TokenUsageResponse } from "@medtriage/shared";
import { validate } from "../middleware/validator.js";
import type { LLMServiceLike } from "../services/llmTypes.js";

const usageQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(200)
});

interface CreateUsageRouterOptions {
  llmService: Pick<LLMServiceLike, "getUsageRecords">;
}

export function createUsageRouter(options: CreateUsageRouterOptions): Router {
  const usageRouter = Router();

  usageRouter.get("/", validate({ query: usageQuerySchema }), (req, res) => {
    const { limit } = req.query as unknown as z.infer<typeof usageQuerySchema>;
    const records = options.llmService.getUsageRecords?.(limit) ?? [];
    const response: TokenUsageResponse = {
      records: records.map((record) => ({
        phase: record.phase,
        model: record.model,
        promptTokens: record.promptTokens,
        completionTokens: record.completionTokens,
        timestamp: record.timestamp.toISOString()
      }))
    };
    res.json(response);
  });

  return usageRouter;
}
