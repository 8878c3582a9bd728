import { Router } from "express";
import { z } from "zod";
import type { ChatResponse, TriageResponse } from "@medtriage/shared";
import { validateImageField } from "../middleware/imagePayload.js";
import { requireReady } from "../middleware/readiness.js";
import { validate } from "../middleware/validator.js";
import { logger, previewText } from "../utils/logger.js";
import { toChatTurns, type TriageWorkflow } from "../workflow/TriageWorkflow.js";

const chatBodySchema = z.object({
  message: z.string().min(1),
  history: z
    .array(
      z.object({
        role: z.string(),
        content: z.string()
      })
    )
    .default([]),
  image: z.string().min(1).nullish()
});

type ChatBody = z.infer<typeof chatBodySchema>;

interface CreateChatRouterOptions {
  workflow: TriageWorkflow;
  ensureVectorIndexConnected: () => Promise<void>;
  maxImageBytes: number;
}

export function createChatRouter(options: CreateChatRouterOptions): Router {
  const { workflow } = options;
  const chatRouter = Router();
  const guards = [
    validate({ body: chatBodySchema }),
    validateImageField(options.maxImageBytes),
    requireReady("Vector index", options.ensureVectorIndexConnected)
  ];

  chatRouter.post("/", ...guards, async (req, res, next) => {
    try {
      const body: ChatBody = req.body;
      logger.info(
        { message: previewText(body.message), hasImage: Boolean(body.image) },
        "Chat message received"
      );

      const response: ChatResponse = {
        response: await workflow.process(body.message, body.history, body.image ?? null)
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  chatRouter.post("/triage", ...guards, async (req, res, next) => {
    try {
      const body: ChatBody = req.body;
      const response: TriageResponse = {
        result: await workflow.run({
          query: body.message,
          image: body.image ?? null,
          history: toChatTurns(body.history)
        })
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  return chatRouter;
}
