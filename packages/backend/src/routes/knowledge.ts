import { Router } from "express";
import { z } from "zod";
import type {
  GraphQueryResponse,
  HybridSearchResponse,
  RelatedEntitiesResponse
} from "@medtriage/shared";
import { requireReady } from "../middleware/readiness.js";
import { validate } from "../middleware/validator.js";
import type { HybridRetriever } from "../services/HybridRetriever.js";

const graphQuerySchema = z.object({
  query: z.string().min(1)
});

const searchQuerySchema = z.object({
  query: z.string().min(1),
  k: z.coerce.number().int().min(1).max(50).default(4)
});

const relatedQuerySchema = z.object({
  entity: z.string().min(1),
  maxHops: z.coerce.number().int().min(1).max(5).default(2)
});

interface CreateKnowledgeRouterOptions {
  retriever: HybridRetriever;
  ensureVectorIndexConnected: () => Promise<void>;
}

export function createKnowledgeRouter(options: CreateKnowledgeRouterOptions): Router {
  const { retriever } = options;
  const knowledgeRouter = Router();

  knowledgeRouter.get("/query", validate({ query: graphQuerySchema }), (req, res) => {
    const { query } = req.query as unknown as z.infer<typeof graphQuerySchema>;
    const response: GraphQueryResponse = {
      query,
      result: retriever.graphQuery(query)
    };
    res.json(response);
  });

  knowledgeRouter.get(
    "/search",
    validate({ query: searchQuerySchema }),
    requireReady("Vector index", options.ensureVectorIndexConnected),
    async (req, res, next) => {
      try {
        const { query, k } = req.query as unknown as z.infer<typeof searchQuerySchema>;
        const response: HybridSearchResponse = {
          query,
          results: await retriever.hybridSearch(query, k)
        };
        res.json(response);
      } catch (error) {
        next(error);
      }
    }
  );

  knowledgeRouter.get("/related", validate({ query: relatedQuerySchema }), (req, res) => {
    const { entity, maxHops } = req.query as unknown as z.infer<typeof relatedQuerySchema>;
    const response: RelatedEntitiesResponse = {
      entity,
      related: retriever.relatedEntities(entity, maxHops)
    };
    res.json(response);
  });

  return knowledgeRouter;
}
