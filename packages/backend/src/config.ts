import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnv({ path: resolve(__dirname, "../../../.env") });

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(8000),
  CORS_ORIGIN: z.string().default("*"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LLM_PROVIDER: z.enum(["openai", "gemini", "qwen"]).default("openai"),
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_VISION_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  GEMINI_API_KEY: z.string().default(""),
  GEMINI_BASE_URL: z.string().default("https://generativelanguage.googleapis.com/v1beta/openai/"),
  GEMINI_CHAT_MODEL: z.string().default("gemini-2.0-flash"),
  GEMINI_VISION_MODEL: z.string().default("gemini-2.0-flash"),
  GEMINI_EMBEDDING_MODEL: z.string().default("text-embedding-004"),
  QWEN_API_KEY: z.string().default(""),
  QWEN_BASE_URL: z.string().default("https://dashscope.aliyuncs.com/compatible-mode/v1"),
  QWEN_CHAT_MODEL: z.string().default("qwen-plus"),
  QWEN_VISION_MODEL: z.string().default("qwen-vl-plus"),
  QWEN_EMBEDDING_MODEL: z.string().default("text-embedding-v3"),
  EMBEDDING_API_KEY: z.string().default(""),
  EMBEDDING_BASE_URL: z.string().default(""),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
  LLM_MAX_CONCURRENT: z.coerce.number().int().positive().default(5),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().positive().default(1000),
  LLM_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(60),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1000),
  VISION_MAX_TOKENS: z.coerce.number().int().positive().default(1000),
  CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),
  RETRIEVAL_TOP_K: z.coerce.number().int().positive().default(4),
  VECTOR_INDEX_PROVIDER: z.enum(["memory", "neo4j"]).default("memory"),
  NEO4J_URI: z.string().default("bolt://localhost:7687"),
  NEO4J_USER: z.string().default("neo4j"),
  NEO4J_PASSWORD: z.string().default(""),
  NEO4J_DATABASE: z.string().default("neo4j"),
  IMAGE_STORAGE_DIR: z.string().default("data/medical_images"),
  IMAGE_DB_PATH: z.string().default("data/images.db"),
  MAX_IMAGE_SIZE_MB: z.coerce.number().positive().default(10),
  PROMPTS_PATH: z.string().default(resolve(__dirname, "../config/prompts.json")),
  KNOWLEDGE_GRAPH_PATH: z.string().default(resolve(__dirname, "../knowledge/medical-graph.json")),
  TRIAGE_CLARIFY_ON_UNPARSEABLE: booleanFlag
});

export type AppConfig = z.infer<typeof envSchema>;
export const appConfig: AppConfig = Object.freeze(envSchema.parse(process.env));
