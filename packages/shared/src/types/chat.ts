export type ChatRole = "user" | "assistant";

/** A prior turn as the caller sends it; roles outside the known set are dropped. */
export interface HistoryEntry {
  role: string;
  content: string;
}

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export type RiskTier = "low" | "medium" | "high";

export type TriageStage =
  | "router"
  | "reject"
  | "rag"
  | "triage"
  | "self_care"
  | "doctor_referral"
  | "clarification"
  | "end";

export type TerminalStage = "reject" | "self_care" | "doctor_referral" | "clarification";

export type RiskScoreOutcome =
  | { kind: "parsed"; score: number }
  | { kind: "unparseable"; reason: string };

export interface StageFailure {
  stage: TriageStage;
  message: string;
}

export interface TriageResult {
  terminalStage: TerminalStage | "failed";
  trail: TriageStage[];
  isRelevant: boolean;
  riskScore: number;
  riskTier: RiskTier;
  scoreOutcome: RiskScoreOutcome["kind"] | null;
  imageAnalysis: string | null;
  recommendation: string;
  needsFollowup: boolean;
  failure?: StageFailure;
}
