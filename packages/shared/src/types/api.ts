import type { HistoryEntry, TriageResult, TriageStage } from "./chat.js";
import type { RelatedEntity } from "./graph.js";
import type { StoredImage } from "./image.js";
import type { HybridSearchResult } from "./knowledge.js";

export interface ApiErrorResponse {
  error: string;
  details?: unknown;
}

export interface ServiceInfoResponse {
  status: "ok";
  service: string;
  version: string;
  stages: TriageStage[];
}

export interface ChatRequest {
  message: string;
  history?: HistoryEntry[];
  image?: string;
}

export interface ChatResponse {
  response: string;
}

export interface TriageResponse {
  result: TriageResult;
}

export interface IngestRequest {
  text?: string;
  image?: string;
  source?: string;
  saveImage?: boolean;
}

export interface IngestResponse {
  success: boolean;
  textChunks: number;
  imageId?: string;
  imageAnalysis?: string;
  message: string;
}

export interface GraphQueryResponse {
  query: string;
  result: string;
}

export interface HybridSearchResponse {
  query: string;
  results: HybridSearchResult;
}

export interface RelatedEntitiesResponse {
  entity: string;
  related: RelatedEntity[];
}

export interface ListImagesResponse {
  images: StoredImage[];
}

export interface GetImageResponse {
  image: StoredImage;
}

export type ServiceConnectionStatus = "ok" | "failed" | "not_configured";

export interface HealthResponse {
  status: "ok" | "degraded";
  timestamp: string;
  uptimeSec: number;
  checks: {
    vectorIndex: ServiceConnectionStatus;
    llm: ServiceConnectionStatus;
  };
  memoryUsage: {
    rss: number;
    heapUsed: number;
    heapTotal: number;
  };
}

export interface TokenUsageResponse {
  records: {
    phase: string;
    model: string;
    promptTokens: number;
    completionTokens: number;
    timestamp: string;
  }[];
}
