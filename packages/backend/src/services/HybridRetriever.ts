import type {
  HybridSearchResult,
  RelatedEntity,
  VectorIndex,
  VectorSearchResult
} from "@medtriage/shared";
import type { EntityGraph } from "../graph/EntityGraph.js";
import { logger, previewText } from "../utils/logger.js";
import type { LLMServiceLike } from "./llmTypes.js";

export const DEFAULT_TOP_K = 4;

/**
 * Combines embedding similarity over indexed chunks with a lookup in the entity graph.
 */
export class HybridRetriever {
  constructor(
    private readonly vectorIndex: VectorIndex,
    private readonly entityGraph: EntityGraph,
    private readonly llmService: Pick<LLMServiceLike, "generateEmbedding">
  ) {}

  async similaritySearch(query: string, k = DEFAULT_TOP_K): Promise<VectorSearchResult[]> {
    const safeK = Math.max(1, Math.floor(k));
    const vector = await this.llmService.generateEmbedding(query);
    const results = await this.vectorIndex.search(vector, safeK);
    logger.debug({ query: previewText(query), hits: results.length }, "Vector search completed");
    return results;
  }

  graphQuery(query: string): string {
    return this.entityGraph.queryGraph(query);
  }

  relatedEntities(entity: string, maxHops = 2): RelatedEntity[] {
    return this.entityGraph.getRelatedEntities(entity, maxHops);
  }

  async hybridSearch(query: string, k = DEFAULT_TOP_K): Promise<HybridSearchResult> {
    const vectorResults = await this.similaritySearch(query, k);
    return {
      vectorResults,
      graphResults: this.graphQuery(query)
    };
  }
}
