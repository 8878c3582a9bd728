import type { ChatTurn } from "@medtriage/shared";
import {
  buildClarificationMessage,
  buildDoctorReferralMessage,
  buildKnowledgeContext,
  buildRouterMessage,
  buildSelfCareMessage,
  buildTriageMessage,
  type PromptConfig
} from "../prompts/index.js";
import type { HybridRetriever } from "../services/HybridRetriever.js";
import type { ImageAnalyzerLike } from "../services/ImageAnalyzer.js";
import type { LLMServiceLike } from "../services/llmTypes.js";
import { logger, previewText } from "../utils/logger.js";
import { parseRiskScore, resolveRiskScore } from "./riskScore.js";
import type { ActiveStage, StageHandler, WorkflowState } from "./types.js";

const IMAGE_FINDINGS_PREVIEW_LENGTH = 200;

export interface StageDependencies {
  llmService: Pick<LLMServiceLike, "complete">;
  retriever: Pick<HybridRetriever, "hybridSearch">;
  imageAnalyzer: Pick<ImageAnalyzerLike, "analyze">;
  prompts: PromptConfig;
  retrievalTopK: number;
  persistImages: boolean;
}

/**
 * The router answer counts as relevant when it carries the positive token and not the
 * negative one, compared case-insensitively.
 */
export function isRelevantAnswer(answer: string, positiveToken: string, negativeToken: string): boolean {
  const normalized = answer.toUpperCase();
  if (normalized.includes(negativeToken.toUpperCase())) {
    return false;
  }
  return normalized.includes(positiveToken.toUpperCase());
}

export function createStageHandlers(deps: StageDependencies): Record<ActiveStage, StageHandler> {
  const { llmService, prompts } = deps;

  const respond = (state: WorkflowState, content: string): ChatTurn[] => [
    ...state.history,
    { role: "user", content }
  ];

  return {
    router: async (state) => {
      const answer = await llmService.complete({
        systemPrompt: prompts.router.system,
        messages: [{ role: "user", content: buildRouterMessage(state.query, state.image !== null) }],
        phase: "router"
      });
      const isRelevant = isRelevantAnswer(
        answer,
        prompts.router.positiveToken,
        prompts.router.negativeToken
      );
      logger.info({ query: previewText(state.query), isRelevant }, "Routed query");
      return { ...state, currentStage: "router", isRelevant };
    },

    reject: async (state) => ({
      ...state,
      currentStage: "reject",
      recommendation: prompts.reject.message,
      needsFollowup: false
    }),

    rag: async (state) => {
      let imageAnalysis: string | null = null;
      if (state.image !== null) {
        const analysis = await deps.imageAnalyzer.analyze(state.image, {
          query: state.query,
          saveImage: deps.persistImages
        });
        if (analysis.success) {
          imageAnalysis = analysis.analysis;
        } else {
          logger.warn({ imageId: analysis.imageId, error: analysis.error }, "Continuing without image findings");
        }
      }

      const searchQuery = imageAnalysis
        ? `${state.query}\n\nImage findings: ${imageAnalysis.slice(0, IMAGE_FINDINGS_PREVIEW_LENGTH)}`
        : state.query;
      const { vectorResults, graphResults } = await deps.retriever.hybridSearch(
        searchQuery,
        deps.retrievalTopK
      );

      return {
        ...state,
        currentStage: "rag",
        imageAnalysis,
        knowledgeContext: buildKnowledgeContext(vectorResults, graphResults, imageAnalysis)
      };
    },

    triage: async (state) => {
      const output = await llmService.complete({
        systemPrompt: prompts.triage.system,
        messages: [
          {
            role: "user",
            content: buildTriageMessage(state.query, state.knowledgeContext, state.imageAnalysis)
          }
        ],
        phase: "triage"
      });
      const scoreOutcome = parseRiskScore(output, prompts.triage.scoreMarker);
      if (scoreOutcome.kind === "unparseable") {
        logger.warn({ reason: scoreOutcome.reason }, "Risk score not found in triage output");
      }
      const { score, tier } = resolveRiskScore(scoreOutcome);

      return {
        ...state,
        currentStage: "triage",
        scoreOutcome,
        riskScore: score,
        riskTier: tier
      };
    },

    self_care: async (state) => {
      const recommendation = await llmService.complete({
        systemPrompt: prompts.selfCare.system,
        messages: respond(
          state,
          buildSelfCareMessage(state.query, state.riskScore, state.knowledgeContext)
        ),
        phase: "self_care"
      });
      return { ...state, currentStage: "self_care", recommendation, needsFollowup: false };
    },

    doctor_referral: async (state) => {
      const recommendation = await llmService.complete({
        systemPrompt: prompts.doctorReferral.system,
        messages: respond(
          state,
          buildDoctorReferralMessage(
            state.query,
            state.riskScore,
            state.riskTier,
            state.knowledgeContext
          )
        ),
        phase: "doctor_referral"
      });
      return { ...state, currentStage: "doctor_referral", recommendation, needsFollowup: false };
    },

    clarification: async (state) => {
      const questions = await llmService.complete({
        systemPrompt: prompts.clarification.system,
        messages: respond(state, buildClarificationMessage(state.query)),
        phase: "clarification"
      });
      const preface = prompts.clarification.preface;
      return {
        ...state,
        currentStage: "clarification",
        recommendation: preface ? `${preface}\n\n${questions}` : questions,
        needsFollowup: true
      };
    }
  };
}
