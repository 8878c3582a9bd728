import type {
  CompletionRequest,
  LLMCallPhase,
  LLMServiceLike,
  TokenUsageRecord,
  VisionRequest
} from "../../src/services/llmTypes.js";

type CompletionPhase = Exclude<LLMCallPhase, "vision" | "embedding">;
type ScriptedReply = string | Error;

interface FakeLLMServiceOptions {
  responses?: Partial<Record<CompletionPhase, ScriptedReply>>;
  vision?: ScriptedReply | ((request: VisionRequest) => string);
  embed?: (text: string) => number[];
}

const defaultResponses: Record<CompletionPhase, string> = {
  router: "RELEVANT",
  triage: "RISK_SCORE: 2\nREASONING: Mild symptoms without warning signs.",
  self_care: "Rest, drink fluids and monitor your symptoms.",
  doctor_referral: "Please book an appointment with your doctor.",
  clarification: "How long have you had these symptoms?"
};

export const EMBEDDING_VOCABULARY = [
  "fever",
  "cough",
  "headache",
  "chest",
  "rash",
  "fracture",
  "x-ray",
  "throat"
];

/** Counts vocabulary words, plus a constant dimension so no vector is all zeros. */
export function keywordEmbedding(text: string): number[] {
  const lowered = text.toLowerCase();
  return [
    ...EMBEDDING_VOCABULARY.map((word) => lowered.split(word).length - 1),
    0.01
  ];
}

export class FakeLLMService implements LLMServiceLike {
  readonly completions: CompletionRequest[] = [];
  readonly visionRequests: VisionRequest[] = [];
  readonly embeddedTexts: string[] = [];

  private readonly responses: Record<CompletionPhase, ScriptedReply>;
  private readonly vision: ScriptedReply | ((request: VisionRequest) => string);
  private readonly embed: (text: string) => number[];

  constructor(options: FakeLLMServiceOptions = {}) {
    this.responses = { ...defaultResponses, ...options.responses };
    this.vision = options.vision ?? "Chest X-ray with clear lung fields and no fracture.";
    this.embed = options.embed ?? keywordEmbedding;
  }

  async complete(request: CompletionRequest): Promise<string> {
    this.completions.push(request);
    if (request.phase === "vision" || request.phase === "embedding") {
      throw new Error(`Unexpected completion phase: ${request.phase}`);
    }

    const reply = this.responses[request.phase];
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }

  async describeImage(request: VisionRequest): Promise<string> {
    this.visionRequests.push(request);
    if (this.vision instanceof Error) {
      throw this.vision;
    }
    return typeof this.vision === "function" ? this.vision(request) : this.vision;
  }

  async generateEmbedding(text: string): Promise<number[]> {
    this.embeddedTexts.push(text);
    return this.embed(text);
  }

  getUsageRecords(_limit?: number): TokenUsageRecord[] {
    return this.completions.map((request) => ({
      phase: request.phase,
      model: "fake-model",
      promptTokens: 1,
      completionTokens: 1,
      timestamp: new Date(0)
    }));
  }

  phasesCalled(): LLMCallPhase[] {
    return this.completions.map((request) => request.phase);
  }
}
