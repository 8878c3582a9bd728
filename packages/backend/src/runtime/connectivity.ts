import type { ServiceConnectionStatus, VectorIndex } from "@medtriage/shared";
import type { AppConfig } from "../config.js";
import type { LLMServiceLike } from "../services/llmTypes.js";

export function isVectorIndexConfigured(env: AppConfig): boolean {
  if (env.VECTOR_INDEX_PROVIDER === "memory") {
    return true;
  }
  return (
    env.NEO4J_URI.trim().length > 0 &&
    env.NEO4J_USER.trim().length > 0 &&
    env.NEO4J_PASSWORD.trim().length > 0
  );
}

interface VectorIndexConnectionOptions {
  vectorIndex: VectorIndex;
  ensureConnected?: () => Promise<void>;
  configured?: boolean;
}

interface LlmConnectionOptions {
  llmService: Pick<LLMServiceLike, "generateEmbedding">;
  configured: boolean;
  probeText?: string;
}

export async function checkVectorIndexConnection(
  options: VectorIndexConnectionOptions
): Promise<ServiceConnectionStatus> {
  if (options.configured === false) {
    return "not_configured";
  }

  const { vectorIndex } = options;
  const ensureConnected = options.ensureConnected ?? (() => vectorIndex.connect());

  try {
    await ensureConnected();
    const healthy = await vectorIndex.healthCheck();
    return healthy ? "ok" : "failed";
  } catch {
    return "failed";
  }
}

export async function checkLlmConnection(
  options: LlmConnectionOptions
): Promise<ServiceConnectionStatus> {
  if (!options.configured) {
    return "not_configured";
  }

  try {
    await options.llmService.generateEmbedding(options.probeText ?? "ping");
    return "ok";
  } catch {
    return "failed";
  }
}
