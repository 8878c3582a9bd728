import type {
  ChatTurn,
  RiskScoreOutcome,
  RiskTier,
  StageFailure,
  TriageStage
} from "@medtriage/shared";

export interface TriageQuery {
  query: string;
  image?: string | null;
  history?: ChatTurn[];
}

/** Snapshot of a triage run. Stage handlers return a new snapshot rather than mutating one. */
export interface WorkflowState {
  readonly query: string;
  readonly image: string | null;
  readonly history: readonly ChatTurn[];
  readonly imageAnalysis: string | null;
  readonly isRelevant: boolean;
  readonly knowledgeContext: string;
  readonly riskScore: number;
  readonly riskTier: RiskTier;
  readonly scoreOutcome: RiskScoreOutcome | null;
  readonly recommendation: string;
  readonly needsFollowup: boolean;
  readonly currentStage: TriageStage;
  readonly failure: StageFailure | null;
}

export type ActiveStage = Exclude<TriageStage, "end">;

export type StageHandler = (state: WorkflowState) => Promise<WorkflowState>;

export interface TransitionPolicy {
  clarifyOnUnparseable: boolean;
}

export function createInitialState(input: TriageQuery): WorkflowState {
  return {
    query: input.query,
    image: input.image ?? null,
    history: [...(input.history ?? [])],
    imageAnalysis: null,
    isRelevant: false,
    knowledgeContext: "",
    riskScore: 0,
    riskTier: "low",
    scoreOutcome: null,
    recommendation: "",
    needsFollowup: false,
    currentStage: "router",
    failure: null
  };
}
