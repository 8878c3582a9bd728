import type { TerminalStage, TriageStage } from "@medtriage/shared";
import { assertNever } from "../utils/assertNever.js";
import type { TransitionPolicy, WorkflowState } from "./types.js";

export function nextStage(
  stage: TriageStage,
  state: WorkflowState,
  policy: TransitionPolicy
): TriageStage {
  if (state.failure) {
    return "end";
  }

  switch (stage) {
    case "router":
      return state.isRelevant ? "rag" : "reject";
    case "rag":
      return "triage";
    case "triage":
      return routeAfterTriage(state, policy);
    case "reject":
    case "self_care":
    case "doctor_referral":
    case "clarification":
    case "end":
      return "end";
    default:
      return assertNever(stage);
  }
}

function routeAfterTriage(state: WorkflowState, policy: TransitionPolicy): TriageStage {
  if (policy.clarifyOnUnparseable && state.scoreOutcome?.kind === "unparseable") {
    return "clarification";
  }

  switch (state.riskTier) {
    case "low":
      return "self_care";
    case "medium":
    case "high":
      return "doctor_referral";
    default:
      return assertNever(state.riskTier);
  }
}

export function asTerminalStage(stage: TriageStage): TerminalStage | null {
  switch (stage) {
    case "reject":
    case "self_care":
    case "doctor_referral":
    case "clarification":
      return stage;
    case "router":
    case "rag":
    case "triage":
    case "end":
      return null;
    default:
      return assertNever(stage);
  }
}
