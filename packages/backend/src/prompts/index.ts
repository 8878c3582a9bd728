import { readFileSync } from "node:fs";
import { z, ZodError } from "zod";

const promptConfigSchema = z.object({
  router: z.object({
    system: z.string().min(1),
    positiveToken: z.string().min(1),
    negativeToken: z.string().min(1)
  }),
  triage: z.object({
    system: z.string().min(1),
    scoreMarker: z.string().min(1)
  }),
  selfCare: z.object({
    system: z.string().min(1)
  }),
  doctorReferral: z.object({
    system: z.string().min(1)
  }),
  clarification: z.object({
    system: z.string().min(1),
    preface: z.string().default("")
  }),
  reject: z.object({
    message: z.string().min(1)
  }),
  failure: z.object({
    message: z.string().min(1)
  }),
  vision: z.object({
    queryAnalysis: z.string().min(1),
    genericAnalysis: z.string().min(1),
    summary: z.string().min(1),
    summaryFallback: z.string().min(1)
  })
});

export type PromptConfig = z.infer<typeof promptConfigSchema>;

export class PromptConfigError extends Error {
  constructor(path: string, reason: string) {
    super(`Invalid prompt configuration at ${path}: ${reason}`);
    this.name = "PromptConfigError";
  }
}

export function parsePromptConfig(raw: unknown, origin = "<inline>"): PromptConfig {
  try {
    return promptConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new PromptConfigError(origin, issues.join("; "));
    }
    throw error;
  }
}

export function loadPromptConfig(path: string): PromptConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new PromptConfigError(path, error instanceof Error ? error.message : String(error));
  }
  return parsePromptConfig(raw, path);
}

/**
 * Substitutes `{name}` placeholders. Unknown placeholders are left as written.
 */
export function renderTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export {
  buildClarificationMessage,
  buildDoctorReferralMessage,
  buildKnowledgeContext,
  buildRouterMessage,
  buildSelfCareMessage,
  buildTriageMessage
} from "./triage.js";
