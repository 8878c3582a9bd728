import type { Express } from "express";
import { createApp } from "../../src/app.js";
import { createRuntime, type RuntimeOverrides, type TriageRuntime } from "../../src/runtime/container.js";
import { InMemoryImageStore } from "../../src/store/InMemoryImageStore.js";
import { InMemoryVectorIndex } from "../../src/store/InMemoryVectorIndex.js";
import { FakeLLMService } from "./FakeLLMService.js";

export interface TestApp {
  app: Express;
  runtime: TriageRuntime;
  llm: FakeLLMService;
}

export function buildTestApp(llm = new FakeLLMService(), overrides: RuntimeOverrides = {}): TestApp {
  const runtime = createRuntime({
    llmService: llm,
    vectorIndex: new InMemoryVectorIndex(),
    imageStore: new InMemoryImageStore(),
    ...overrides
  });
  return { app: createApp(runtime), runtime, llm };
}

export const PNG_IMAGE = `data:image/png;base64,${Buffer.from("fake png bytes").toString("base64")}`;
