import { describe, expect, it, vi } from "vitest";
import { LLMRateLimiter } from "../../../src/services/LLMRateLimiter.js";
import { LLMService } from "../../../src/services/LLMService.js";

function completion(content: string | null, usage = { prompt_tokens: 10, completion_tokens: 20 }) {
  return { choices: [{ message: { content } }], usage };
}

function fastLimiter(maxRetries = 0): LLMRateLimiter {
  return new LLMRateLimiter({
    maxConcurrent: 5,
    maxRetries,
    retryDelayMs: 1,
    requestsPerMinute: 200,
    timeoutMs: 5000
  });
}

const baseConfig = {
  apiKey: "test-secret",
  chatModel: "chat-model",
  visionModel: "vision-model",
  embeddingModel: "embedding-model",
  temperature: 0.7,
  maxTokens: 1000,
  visionMaxTokens: 800
};

describe("LLMService", () => {
  it("sends the system prompt before the conversation turns", async () => {
    const create = vi.fn().mockResolvedValue(completion("RISK_SCORE: 4"));
    const service = new LLMService(baseConfig, {
      client: { chat: { completions: { create } }, embeddings: { create: vi.fn() } },
      rateLimiter: fastLimiter()
    });

    const answer = await service.complete({
      systemPrompt: "You are a triage assistant.",
      messages: [
        { role: "user", content: "I have a headache" },
        { role: "assistant", content: "Since when?" },
        { role: "user", content: "Two days" }
      ],
      phase: "triage"
    });

    expect(answer).toBe("RISK_SCORE: 4");
    expect(create).toHaveBeenCalledWith({
      model: "chat-model",
      temperature: 0.7,
      max_tokens: 1000,
      messages: [
        { role: "system", content: "You are a triage assistant." },
        { role: "user", content: "I have a headache" },
        { role: "assistant", content: "Since when?" },
        { role: "user", content: "Two days" }
      ]
    });

    const [record] = service.getUsageRecords();
    expect(record?.phase).toBe("triage");
    expect(record?.model).toBe("chat-model");
    expect(record?.promptTokens).toBe(10);
    expect(record?.completionTokens).toBe(20);
  });

  it("sends images as text and image parts to the vision model", async () => {
    const create = vi.fn().mockResolvedValue(completion("Clear lungs."));
    const service = new LLMService(baseConfig, {
      client: { chat: { completions: { create } }, embeddings: { create: vi.fn() } },
      rateLimiter: fastLimiter()
    });

    const analysis = await service.describeImage({
      prompt: "Describe this image.",
      imageUrl: "data:image/png;base64,AAAA"
    });

    expect(analysis).toBe("Clear lungs.");
    expect(create).toHaveBeenCalledWith({
      model: "vision-model",
      max_tokens: 800,
      messages: [
        {
          role: "user",
          content: [
            { type: "text", text: "Describe this image." },
            { type: "image_url", image_url: { url: "data:image/png;base64,AAAA" } }
          ]
        }
      ]
    });
    expect(service.getUsageRecords()[0]?.phase).toBe("vision");
  });

  it("uses the dedicated embedding client with configured dimensions", async () => {
    const chatCreate = vi.fn();
    const embeddingCreate = vi.fn().mockResolvedValue({
      data: [{ embedding: [0.1, 0.2, 0.3] }],
      usage: { prompt_tokens: 5 }
    });
    const service = new LLMService(
      { ...baseConfig, embeddingDimensions: 3 },
      {
        client: { chat: { completions: { create: chatCreate } }, embeddings: { create: chatCreate } },
        embeddingClient: { chat: { completions: { create: vi.fn() } }, embeddings: { create: embeddingCreate } },
        rateLimiter: fastLimiter()
      }
    );

    await expect(service.generateEmbedding("fever")).resolves.toEqual([0.1, 0.2, 0.3]);
    expect(embeddingCreate).toHaveBeenCalledWith({
      model: "embedding-model",
      input: "fever",
      dimensions: 3
    });
    expect(chatCreate).not.toHaveBeenCalled();
    expect(service.getUsageRecords()[0]).toMatchObject({
      phase: "embedding",
      promptTokens: 5,
      completionTokens: 0
    });
  });

  it("retries rate limited calls", async () => {
    const create = vi
      .fn()
      .mockRejectedValueOnce(Object.assign(new Error("rate limited"), { status: 429 }))
      .mockResolvedValueOnce(completion("RELEVANT"));
    const service = new LLMService(baseConfig, {
      client: { chat: { completions: { create } }, embeddings: { create: vi.fn() } },
      rateLimiter: fastLimiter(1)
    });

    await expect(
      service.complete({ systemPrompt: "router", messages: [{ role: "user", content: "q" }], phase: "router" })
    ).resolves.toBe("RELEVANT");
    expect(create).toHaveBeenCalledTimes(2);
  });

  it("returns an empty answer when the model sends no content", async () => {
    const create = vi.fn().mockResolvedValue(completion(null));
    const service = new LLMService(baseConfig, {
      client: { chat: { completions: { create } }, embeddings: { create: vi.fn() } },
      rateLimiter: fastLimiter()
    });

    await expect(
      service.complete({ systemPrompt: "s", messages: [], phase: "clarification" })
    ).resolves.toBe("");
    service.clearUsageRecords();
    expect(service.getUsageRecords()).toEqual([]);
  });

  it("budgets vision calls apart from chat calls", async () => {
    const create = vi.fn().mockResolvedValue(completion("Clear lung fields."));
    const rateLimiter = fastLimiter();
    const service = new LLMService(baseConfig, {
      client: { chat: { completions: { create } }, embeddings: { create: vi.fn() } },
      rateLimiter
    });

    await service.describeImage({ prompt: "describe", imageUrl: "data:image/png;base64,AAAA" });

    expect(rateLimiter.stats("vision").startedInWindow).toBe(1);
    expect(rateLimiter.stats("chat").startedInWindow).toBe(0);
  });
});
