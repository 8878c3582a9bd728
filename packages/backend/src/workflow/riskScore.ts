import type { RiskScoreOutcome, RiskTier } from "@medtriage/shared";

export const DEFAULT_RISK_SCORE = 5;
export const MIN_RISK_SCORE = 0;
export const MAX_RISK_SCORE = 10;

/**
 * Reads the integer after the first colon of the first line containing `marker`. A later colon
 * on the same line ends the value. Markdown emphasis is ignored and the result is clamped.
 */
export function parseRiskScore(output: string, marker: string): RiskScoreOutcome {
  const line = output.split("\n").find((candidate) => candidate.includes(marker));
  if (line === undefined) {
    return { kind: "unparseable", reason: `No line contains ${marker}` };
  }

  const raw = (line.split(":")[1] ?? "").replace(/\*/g, "").trim();
  if (!/^[+-]?\d+$/.test(raw)) {
    return { kind: "unparseable", reason: `Score "${raw}" is not an integer` };
  }

  const score = Math.min(MAX_RISK_SCORE, Math.max(MIN_RISK_SCORE, Number.parseInt(raw, 10)));
  return { kind: "parsed", score };
}

export function riskTierForScore(score: number): RiskTier {
  if (score <= 3) {
    return "low";
  }
  if (score <= 6) {
    return "medium";
  }
  return "high";
}

export function resolveRiskScore(outcome: RiskScoreOutcome): { score: number; tier: RiskTier } {
  const score = outcome.kind === "parsed" ? outcome.score : DEFAULT_RISK_SCORE;
  return { score, tier: riskTierForScore(score) };
}
