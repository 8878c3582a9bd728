import type { ImageStoreLike, VectorIndex } from "@medtriage/shared";
import { appConfig, type AppConfig } from "../config.js";
import type { EntityGraph } from "../graph/EntityGraph.js";
import { loadEntityGraph } from "../graph/loadEntityGraph.js";
import { IngestionPipeline } from "../pipeline/IngestionPipeline.js";
import { loadPromptConfig, type PromptConfig } from "../prompts/index.js";
import { HybridRetriever } from "../services/HybridRetriever.js";
import { ImageAnalyzer } from "../services/ImageAnalyzer.js";
import { isLlmConfigured, LLMService } from "../services/LLMService.js";
import type { LLMServiceLike } from "../services/llmTypes.js";
import { ImageStore } from "../store/ImageStore.js";
import { InMemoryImageStore } from "../store/InMemoryImageStore.js";
import { InMemoryVectorIndex } from "../store/InMemoryVectorIndex.js";
import { Neo4jVectorIndex } from "../store/Neo4jVectorIndex.js";
import { logger } from "../utils/logger.js";
import { TriageWorkflow } from "../workflow/TriageWorkflow.js";
import { isVectorIndexConfigured } from "./connectivity.js";

export interface RuntimeOverrides {
  llmService?: LLMServiceLike;
  vectorIndex?: VectorIndex;
  imageStore?: ImageStoreLike;
  entityGraph?: EntityGraph;
  prompts?: PromptConfig;
}

/** Every service the HTTP layer needs, built once at startup. */
export interface TriageRuntime {
  config: AppConfig;
  prompts: PromptConfig;
  llmService: LLMServiceLike;
  llmConfigured: boolean;
  vectorIndex: VectorIndex;
  vectorIndexConfigured: boolean;
  entityGraph: EntityGraph;
  imageStore: ImageStoreLike;
  imageAnalyzer: ImageAnalyzer;
  retriever: HybridRetriever;
  ingestion: IngestionPipeline;
  workflow: TriageWorkflow;
  startTime: number;
  ensureVectorIndexConnected(): Promise<void>;
  close(): Promise<void>;
}

export function createRuntime(overrides: RuntimeOverrides = {}, env: AppConfig = appConfig): TriageRuntime {
  const prompts = overrides.prompts ?? loadPromptConfig(env.PROMPTS_PATH);
  const entityGraph = overrides.entityGraph ?? loadEntityGraph(env.KNOWLEDGE_GRAPH_PATH);
  const llmService = overrides.llmService ?? LLMService.fromEnv(env);
  const vectorIndex = overrides.vectorIndex ?? createVectorIndex(env);
  const imageStore = overrides.imageStore ?? createImageStore(env);

  const imageAnalyzer = new ImageAnalyzer(llmService, imageStore, prompts.vision);
  const retriever = new HybridRetriever(vectorIndex, entityGraph, llmService);
  const ingestion = new IngestionPipeline(vectorIndex, llmService, imageAnalyzer, {
    chunkSize: env.CHUNK_SIZE,
    chunkOverlap: env.CHUNK_OVERLAP
  });
  const workflow = new TriageWorkflow(
    { llmService, retriever, imageAnalyzer, prompts },
    {
      retrievalTopK: env.RETRIEVAL_TOP_K,
      clarifyOnUnparseable: env.TRIAGE_CLARIFY_ON_UNPARSEABLE
    }
  );

  ingestion.onStatus((event) => {
    logger.debug(event, "Ingestion status");
  });

  let connectPromise: Promise<void> | null = null;
  const ensureVectorIndexConnected = (): Promise<void> => {
    if (connectPromise) {
      return connectPromise;
    }

    connectPromise = vectorIndex.connect().catch((error: unknown) => {
      connectPromise = null;
      throw error;
    });
    return connectPromise;
  };

  return {
    config: env,
    prompts,
    llmService,
    llmConfigured: overrides.llmService ? true : isLlmConfigured(env),
    vectorIndex,
    vectorIndexConfigured: overrides.vectorIndex ? true : isVectorIndexConfigured(env),
    entityGraph,
    imageStore,
    imageAnalyzer,
    retriever,
    ingestion,
    workflow,
    startTime: Date.now(),
    ensureVectorIndexConnected,
    close: async () => {
      imageStore.close();
      await vectorIndex.disconnect();
    }
  };
}

function createVectorIndex(env: AppConfig): VectorIndex {
  switch (env.VECTOR_INDEX_PROVIDER) {
    case "neo4j":
      return Neo4jVectorIndex.fromEnv(env);
    case "memory":
      return new InMemoryVectorIndex();
  }
}

function createImageStore(env: AppConfig): ImageStoreLike {
  try {
    return new ImageStore({ dbPath: env.IMAGE_DB_PATH, storageDir: env.IMAGE_STORAGE_DIR });
  } catch (error) {
    logger.warn(
      {
        error: error instanceof Error ? error.message : String(error)
      },
      "SQLite ImageStore unavailable, falling back to in-memory store"
    );
    return new InMemoryImageStore();
  }
}
