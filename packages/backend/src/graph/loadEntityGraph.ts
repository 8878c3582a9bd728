import { readFileSync } from "node:fs";
import { z } from "zod";
import { EntityGraph } from "./EntityGraph.js";

const snapshotSchema = z.object({
  entities: z.array(
    z.object({
      name: z.string().min(1),
      type: z.enum(["symptom", "condition", "treatment"]),
      metadata: z.record(z.unknown()).default({})
    })
  ),
  relations: z.array(
    z.object({
      source: z.string().min(1),
      target: z.string().min(1),
      relation: z.string().min(1),
      metadata: z.record(z.unknown()).default({})
    })
  )
});

export class KnowledgeGraphLoadError extends Error {
  constructor(path: string, reason: string) {
    super(`Failed to load knowledge graph from ${path}: ${reason}`);
    this.name = "KnowledgeGraphLoadError";
  }
}

export function parseEntityGraph(raw: unknown, origin = "<inline>"): EntityGraph {
  const parsed = snapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new KnowledgeGraphLoadError(origin, issues.join("; "));
  }

  try {
    return EntityGraph.fromSnapshot(parsed.data);
  } catch (error) {
    throw new KnowledgeGraphLoadError(origin, error instanceof Error ? error.message : String(error));
  }
}

export function loadEntityGraph(path: string): EntityGraph {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new KnowledgeGraphLoadError(path, error instanceof Error ? error.message : String(error));
  }
  return parseEntityGraph(raw, path);
}
