import type { ChatTurn, HistoryEntry, TriageResult, TriageStage } from "@medtriage/shared";
import type { PromptConfig } from "../prompts/index.js";
import { logger } from "../utils/logger.js";
import { createStageHandlers, type StageDependencies } from "./stages.js";
import { asTerminalStage, nextStage } from "./transitions.js";
import {
  createInitialState,
  type ActiveStage,
  type StageHandler,
  type TransitionPolicy,
  type TriageQuery,
  type WorkflowState
} from "./types.js";

export interface TriageWorkflowOptions {
  retrievalTopK: number;
  clarifyOnUnparseable: boolean;
  persistImages: boolean;
}

const defaultOptions: TriageWorkflowOptions = {
  retrievalTopK: 4,
  clarifyOnUnparseable: false,
  persistImages: true
};

export type TriageWorkflowDependencies = Omit<StageDependencies, "retrievalTopK" | "persistImages">;

export class TriageWorkflow {
  private readonly handlers: Record<ActiveStage, StageHandler>;
  private readonly policy: TransitionPolicy;
  private readonly prompts: PromptConfig;

  constructor(deps: TriageWorkflowDependencies, options: Partial<TriageWorkflowOptions> = {}) {
    const resolved = { ...defaultOptions, ...options };
    this.handlers = createStageHandlers({
      ...deps,
      retrievalTopK: resolved.retrievalTopK,
      persistImages: resolved.persistImages
    });
    this.policy = { clarifyOnUnparseable: resolved.clarifyOnUnparseable };
    this.prompts = deps.prompts;
  }

  /**
   * Answers a chat message. Only the recommendation text is returned.
   */
  async process(message: string, history: HistoryEntry[] = [], image?: string | null): Promise<string> {
    const result = await this.run({
      query: message,
      image: image ?? null,
      history: toChatTurns(history)
    });
    return result.recommendation;
  }

  async run(input: TriageQuery): Promise<TriageResult> {
    let state = createInitialState(input);
    let stage: TriageStage = "router";
    const trail: TriageStage[] = [];

    while (stage !== "end") {
      trail.push(stage);
      state = await this.executeStage(stage, state);
      const next: TriageStage = nextStage(stage, state, this.policy);
      logger.debug({ stage, next }, "Triage stage completed");
      stage = next;
    }

    const result = this.toResult(state, trail);
    logger.info(
      {
        terminalStage: result.terminalStage,
        riskTier: result.riskTier,
        riskScore: result.riskScore,
        stages: trail.length
      },
      "Triage completed"
    );
    return result;
  }

  private async executeStage(stage: ActiveStage, state: WorkflowState): Promise<WorkflowState> {
    try {
      return await this.handlers[stage](state);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ err: error, stage }, "Triage stage failed");
      return {
        ...state,
        currentStage: stage,
        failure: { stage, message },
        recommendation: this.prompts.failure.message,
        needsFollowup: false
      };
    }
  }

  private toResult(state: WorkflowState, trail: TriageStage[]): TriageResult {
    const result: TriageResult = {
      terminalStage: state.failure ? "failed" : asTerminalStage(state.currentStage) ?? "failed",
      trail,
      isRelevant: state.isRelevant,
      riskScore: state.riskScore,
      riskTier: state.riskTier,
      scoreOutcome: state.scoreOutcome?.kind ?? null,
      imageAnalysis: state.imageAnalysis,
      recommendation: state.recommendation,
      needsFollowup: state.needsFollowup
    };
    if (state.failure) {
      result.failure = state.failure;
    }
    return result;
  }
}

/** Keeps user and assistant turns; "bot" is read as assistant and other roles are dropped. */
export function toChatTurns(history: HistoryEntry[]): ChatTurn[] {
  const turns: ChatTurn[] = [];
  for (const entry of history) {
    if (entry.role === "user") {
      turns.push({ role: "user", content: entry.content });
    } else if (entry.role === "assistant" || entry.role === "bot") {
      turns.push({ role: "assistant", content: entry.content });
    }
  }
  return turns;
}
