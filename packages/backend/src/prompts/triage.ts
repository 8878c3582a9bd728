import type { RiskTier, VectorSearchResult } from "@medtriage/shared";

export function buildRouterMessage(query: string, hasImage: boolean): string {
  const context = hasImage ? `Query: ${query}\n[Medical image attached]` : `Query: ${query}`;
  return `Is this query medical-related? ${context}`;
}

export function buildKnowledgeContext(
  vectorResults: VectorSearchResult[],
  graphResults: string,
  imageAnalysis: string | null
): string {
  const vectorContext = vectorResults
    .map((result) => `[Source: ${result.metadata.source || "unknown"}]\n${result.content}`)
    .join("\n\n");

  const sections = [
    "=== Vector Search Results ===",
    vectorContext,
    "",
    "=== Knowledge Graph Results ===",
    graphResults
  ];

  if (imageAnalysis) {
    sections.push("", "=== Medical Image Analysis ===", imageAnalysis);
  }

  return sections.join("\n");
}

export function buildTriageMessage(
  query: string,
  knowledgeContext: string,
  imageAnalysis: string | null
): string {
  const sections = [
    `Patient Query: ${query}`,
    "",
    "Available Medical Knowledge:",
    knowledgeContext
  ];

  if (imageAnalysis) {
    sections.push(
      "",
      "IMPORTANT - Medical Image Analysis:",
      imageAnalysis,
      "",
      "Note: The image analysis should be weighted heavily in your risk assessment."
    );
  }

  sections.push("", "Provide your risk assessment.");
  return sections.join("\n");
}

export function buildSelfCareMessage(
  query: string,
  riskScore: number,
  knowledgeContext: string
): string {
  return [
    `Patient Query: ${query}`,
    `Risk Score: ${riskScore}/10`,
    "",
    "Medical Knowledge:",
    knowledgeContext,
    "",
    "Provide helpful self-care advice."
  ].join("\n");
}

export function buildDoctorReferralMessage(
  query: string,
  riskScore: number,
  riskTier: RiskTier,
  knowledgeContext: string
): string {
  return [
    `Patient Query: ${query}`,
    `Risk Score: ${riskScore}/10 (${riskTier} risk)`,
    "",
    "Medical Knowledge:",
    knowledgeContext,
    "",
    "Provide appropriate medical referral guidance."
  ].join("\n");
}

export function buildClarificationMessage(query: string): string {
  return [
    `Patient Query: ${query}`,
    "",
    "What additional information would help assess this situation?"
  ].join("\n");
}
