import type { ChatTurn } from "@medtriage/shared";

export type LLMCallPhase =
  | "router"
  | "triage"
  | "self_care"
  | "doctor_referral"
  | "clarification"
  | "vision"
  | "embedding";

export interface CompletionRequest {
  systemPrompt: string;
  /** Prior turns followed by the current user message. */
  messages: ChatTurn[];
  phase: LLMCallPhase;
}

export interface VisionRequest {
  prompt: string;
  /** A data URL or remote URL the vision model can fetch. */
  imageUrl: string;
}

export interface LLMConfig {
  apiKey: string;
  baseURL?: string;
  chatModel: string;
  visionModel?: string;
  embeddingModel: string;
  embeddingApiKey?: string;
  embeddingBaseURL?: string;
  embeddingDimensions?: number;
  temperature?: number;
  maxTokens?: number;
  visionMaxTokens?: number;
  maxConcurrent?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  requestsPerMinute?: number;
  timeoutMs?: number;
}

export interface LLMRateLimitConfig {
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
}

export interface TokenUsageRecord {
  phase: LLMCallPhase;
  model: string;
  promptTokens: number;
  completionTokens: number;
  timestamp: Date;
}

export type ChatContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export type ChatCompletionMessageLike =
  | { role: "system"; content: string }
  | { role: "assistant"; content: string }
  | { role: "user"; content: string | ChatContentPart[] };

export interface TokenUsageLike {
  prompt_tokens?: number;
  completion_tokens?: number;
}

export interface ChatCompletionRequestLike {
  model: string;
  temperature?: number;
  max_tokens?: number;
  messages: ChatCompletionMessageLike[];
}

export interface ChatCompletionResponseLike {
  choices: { message?: { content?: string | null } }[];
  usage?: TokenUsageLike;
}

export interface EmbeddingRequestLike {
  model: string;
  input: string;
  dimensions?: number;
}

export interface EmbeddingResponseLike {
  data: { embedding: number[] }[];
  usage?: TokenUsageLike;
}

export interface OpenAICompatibleClient {
  chat: {
    completions: {
      create(body: ChatCompletionRequestLike): Promise<ChatCompletionResponseLike>;
    };
  };
  embeddings: {
    create(body: EmbeddingRequestLike): Promise<EmbeddingResponseLike>;
  };
}

export interface LLMServiceLike {
  complete(request: CompletionRequest): Promise<string>;
  describeImage(request: VisionRequest): Promise<string>;
  generateEmbedding(text: string): Promise<number[]>;
  getUsageRecords?(limit?: number): TokenUsageRecord[];
}
