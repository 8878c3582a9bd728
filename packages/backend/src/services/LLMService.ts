import OpenAI from "openai";
import { appConfig, type AppConfig } from "../config.js";
import { LLMRateLimiter } from "./LLMRateLimiter.js";
import type {
  ChatCompletionMessageLike,
  CompletionRequest,
  LLMCallPhase,
  LLMConfig,
  LLMServiceLike,
  OpenAICompatibleClient,
  TokenUsageLike,
  TokenUsageRecord,
  VisionRequest
} from "./llmTypes.js";

type NormalizedLLMConfig = LLMConfig & {
  baseURL: string;
  visionModel: string;
  temperature: number;
  maxTokens: number;
  visionMaxTokens: number;
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
};

const MAX_USAGE_RECORDS = 1000;

export function createOpenAIClient(options: { apiKey: string; baseURL: string }): OpenAICompatibleClient {
  const openai = new OpenAI(options);
  return {
    chat: {
      completions: {
        create: (body) => openai.chat.completions.create({ ...body, stream: false })
      }
    },
    embeddings: {
      create: (body) => openai.embeddings.create(body)
    }
  };
}

export class LLMService implements LLMServiceLike {
  private readonly client: OpenAICompatibleClient;
  private readonly embeddingClient: OpenAICompatibleClient;
  private readonly rateLimiter: LLMRateLimiter;
  private readonly usageRecords: TokenUsageRecord[] = [];
  private readonly config: NormalizedLLMConfig;

  constructor(
    config: LLMConfig,
    deps?: {
      client?: OpenAICompatibleClient;
      embeddingClient?: OpenAICompatibleClient;
      rateLimiter?: LLMRateLimiter;
    }
  ) {
    this.config = {
      ...config,
      baseURL: config.baseURL ?? "https://api.openai.com/v1",
      visionModel: config.visionModel ?? config.chatModel,
      temperature: config.temperature ?? 0.7,
      maxTokens: config.maxTokens ?? 1000,
      visionMaxTokens: config.visionMaxTokens ?? 1000,
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 2,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 60,
      timeoutMs: config.timeoutMs ?? 60_000
    };

    this.client =
      deps?.client ??
      createOpenAIClient({
        apiKey: this.config.apiKey,
        baseURL: this.config.baseURL
      });

    // Use a separate client for embeddings if configured
    if (deps?.embeddingClient) {
      this.embeddingClient = deps.embeddingClient;
    } else if (config.embeddingApiKey && config.embeddingBaseURL) {
      this.embeddingClient = createOpenAIClient({
        apiKey: config.embeddingApiKey,
        baseURL: config.embeddingBaseURL
      });
    } else {
      this.embeddingClient = this.client;
    }

    this.rateLimiter =
      deps?.rateLimiter ??
      new LLMRateLimiter({
        maxConcurrent: this.config.maxConcurrent,
        maxRetries: this.config.maxRetries,
        retryDelayMs: this.config.retryDelayMs,
        requestsPerMinute: this.config.requestsPerMinute,
        timeoutMs: this.config.timeoutMs
      });
  }

  static fromEnv(env: AppConfig = appConfig): LLMService {
    const provider = resolveProviderSettings(env);

    const config: LLMConfig = {
      ...provider,
      maxConcurrent: env.LLM_MAX_CONCURRENT,
      maxRetries: env.LLM_MAX_RETRIES,
      retryDelayMs: env.LLM_RETRY_DELAY_MS,
      requestsPerMinute: env.LLM_REQUESTS_PER_MINUTE,
      timeoutMs: env.LLM_TIMEOUT_MS,
      temperature: env.LLM_TEMPERATURE,
      maxTokens: env.LLM_MAX_TOKENS,
      visionMaxTokens: env.VISION_MAX_TOKENS
    };

    if (env.LLM_PROVIDER === "openai") {
      config.embeddingDimensions = env.EMBEDDING_DIMENSIONS;
    }
    if (env.EMBEDDING_API_KEY) {
      config.embeddingApiKey = env.EMBEDDING_API_KEY;
    }
    if (env.EMBEDDING_BASE_URL) {
      config.embeddingBaseURL = env.EMBEDDING_BASE_URL;
    }

    return new LLMService(config);
  }

  async complete(request: CompletionRequest): Promise<string> {
    const messages: ChatCompletionMessageLike[] = [
      { role: "system", content: request.systemPrompt },
      ...request.messages.map((turn): ChatCompletionMessageLike =>
        turn.role === "user"
          ? { role: "user", content: turn.content }
          : { role: "assistant", content: turn.content }
      )
    ];

    const response = await this.rateLimiter.run(request.phase, () =>
      this.client.chat.completions.create({
        model: this.config.chatModel,
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
        messages
      })
    );

    this.recordUsage(request.phase, this.config.chatModel, response.usage);
    return response.choices[0]?.message?.content ?? "";
  }

  async describeImage(request: VisionRequest): Promise<string> {
    const response = await this.rateLimiter.run("vision", () =>
      this.client.chat.completions.create({
        model: this.config.visionModel,
        max_tokens: this.config.visionMaxTokens,
        messages: [
          {
            role: "user",
            content: [
              { type: "text", text: request.prompt },
              { type: "image_url", image_url: { url: request.imageUrl } }
            ]
          }
        ]
      })
    );

    this.recordUsage("vision", this.config.visionModel, response.usage);
    return response.choices[0]?.message?.content ?? "";
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const dimensions = this.config.embeddingDimensions;

    const response = await this.rateLimiter.run("embedding", () =>
      this.embeddingClient.embeddings.create({
        model: this.config.embeddingModel,
        input: text,
        ...(dimensions ? { dimensions } : {})
      })
    );

    this.recordUsage("embedding", this.config.embeddingModel, response.usage);
    return response.data[0]?.embedding ?? [];
  }

  getUsageRecords(limit = 200): TokenUsageRecord[] {
    const safeLimit = Math.max(1, limit);
    return this.usageRecords.slice(-safeLimit);
  }

  clearUsageRecords(): void {
    this.usageRecords.length = 0;
  }

  private recordUsage(phase: LLMCallPhase, model: string, usage: TokenUsageLike | undefined): void {
    this.usageRecords.push({
      phase,
      model,
      promptTokens: usage?.prompt_tokens ?? 0,
      completionTokens: usage?.completion_tokens ?? 0,
      timestamp: new Date()
    });

    if (this.usageRecords.length > MAX_USAGE_RECORDS) {
      this.usageRecords.splice(0, this.usageRecords.length - MAX_USAGE_RECORDS);
    }
  }
}

function resolveProviderSettings(
  env: AppConfig
): Pick<LLMConfig, "apiKey" | "baseURL" | "chatModel" | "visionModel" | "embeddingModel"> {
  switch (env.LLM_PROVIDER) {
    case "gemini":
      return {
        apiKey: env.GEMINI_API_KEY,
        baseURL: env.GEMINI_BASE_URL,
        chatModel: env.GEMINI_CHAT_MODEL,
        visionModel: env.GEMINI_VISION_MODEL,
        embeddingModel: env.GEMINI_EMBEDDING_MODEL
      };
    case "qwen":
      return {
        apiKey: env.QWEN_API_KEY,
        baseURL: env.QWEN_BASE_URL,
        chatModel: env.QWEN_CHAT_MODEL,
        visionModel: env.QWEN_VISION_MODEL,
        embeddingModel: env.QWEN_EMBEDDING_MODEL
      };
    case "openai":
      return {
        apiKey: env.OPENAI_API_KEY,
        baseURL: env.OPENAI_BASE_URL,
        chatModel: env.OPENAI_CHAT_MODEL,
        visionModel: env.OPENAI_VISION_MODEL,
        embeddingModel: env.OPENAI_EMBEDDING_MODEL
      };
  }
}

export function isLlmConfigured(env: AppConfig = appConfig): boolean {
  return resolveProviderSettings(env).apiKey.trim().length > 0;
}
