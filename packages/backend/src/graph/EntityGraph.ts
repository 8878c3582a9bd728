import type {
  EntityGraphSnapshot,
  EntityRelation,
  EntityType,
  MedicalEntity,
  RelatedEntity
} from "@medtriage/shared";

export const NO_GRAPH_MATCH = "No relevant information found in knowledge graph.";
export const NO_GRAPH_RELATIONSHIPS = "No relationships found.";

const MAX_MATCHED_ENTITIES = 5;
const MAX_LISTED_NEIGHBORS = 3;

export class UnknownEntityError extends Error {
  constructor(name: string) {
    super(`Entity does not exist in graph: ${name}`);
    this.name = "UnknownEntityError";
  }
}

/**
 * Directed graph of medical entities. Built once at startup and read concurrently afterwards;
 * relations are append-only and several labels may connect the same pair.
 */
export class EntityGraph {
  private readonly entities = new Map<string, MedicalEntity>();
  private readonly outgoing = new Map<string, EntityRelation[]>();

  static fromSnapshot(snapshot: EntityGraphSnapshot): EntityGraph {
    const graph = new EntityGraph();
    for (const entity of snapshot.entities) {
      graph.addEntity(entity.name, entity.type, entity.metadata);
    }
    for (const relation of snapshot.relations) {
      graph.addRelation(relation.source, relation.target, relation.relation, relation.metadata);
    }
    return graph;
  }

  addEntity(name: string, type: EntityType, metadata: Record<string, unknown> = {}): void {
    this.entities.set(name, { name, type, metadata: { ...metadata } });
    if (!this.outgoing.has(name)) {
      this.outgoing.set(name, []);
    }
  }

  addRelation(
    source: string,
    target: string,
    relation: string,
    metadata: Record<string, unknown> = {}
  ): void {
    if (!this.entities.has(source)) {
      throw new UnknownEntityError(source);
    }
    if (!this.entities.has(target)) {
      throw new UnknownEntityError(target);
    }

    const edges = this.outgoing.get(source) ?? [];
    edges.push({ source, target, relation, metadata: { ...metadata } });
    this.outgoing.set(source, edges);
  }

  hasEntity(name: string): boolean {
    return this.entities.has(name);
  }

  getEntity(name: string): MedicalEntity | null {
    return this.entities.get(name) ?? null;
  }

  get size(): { entities: number; relations: number } {
    let relations = 0;
    for (const edges of this.outgoing.values()) {
      relations += edges.length;
    }
    return { entities: this.entities.size, relations };
  }

  getRelations(name: string): EntityRelation[] {
    return [...(this.outgoing.get(name) ?? [])];
  }

  /** Distinct direct successors, in the order their first relation was added. */
  getNeighbors(name: string): string[] {
    const seen = new Set<string>();
    for (const edge of this.outgoing.get(name) ?? []) {
      seen.add(edge.target);
    }
    return [...seen];
  }

  /**
   * Entities reachable from `name` within `maxHops`, with their shortest-path distance.
   * Unknown entities yield an empty list.
   */
  getRelatedEntities(name: string, maxHops = 2): RelatedEntity[] {
    if (!this.hasEntity(name)) {
      return [];
    }

    const distances = new Map<string, number>([[name, 0]]);
    const frontier: string[] = [name];
    const related: RelatedEntity[] = [];

    while (frontier.length > 0) {
      const current = frontier.shift();
      if (current === undefined) {
        break;
      }
      const distance = distances.get(current) ?? 0;
      if (distance >= maxHops) {
        continue;
      }

      for (const neighbor of this.getNeighbors(current)) {
        if (distances.has(neighbor)) {
          continue;
        }
        distances.set(neighbor, distance + 1);
        frontier.push(neighbor);

        const entity = this.entities.get(neighbor);
        if (entity) {
          related.push({ entity: neighbor, distance: distance + 1, type: entity.type });
        }
      }
    }

    return related;
  }

  /**
   * Lexical lookup: an entity matches when any lowercase query word is a substring of its name.
   */
  queryGraph(query: string): string {
    const keywords = query.toLowerCase().split(/\s+/).filter((word) => word.length > 0);
    const matches = [...this.entities.keys()].filter((name) => {
      const lowered = name.toLowerCase();
      return keywords.some((keyword) => lowered.includes(keyword));
    });

    if (matches.length === 0) {
      return NO_GRAPH_MATCH;
    }

    const lines: string[] = [];
    for (const name of matches.slice(0, MAX_MATCHED_ENTITIES)) {
      const neighbors = this.getNeighbors(name);
      if (neighbors.length > 0) {
        lines.push(`${name}: related to ${neighbors.slice(0, MAX_LISTED_NEIGHBORS).join(", ")}`);
      }
    }

    return lines.length > 0 ? lines.join("\n") : NO_GRAPH_RELATIONSHIPS;
  }

  snapshot(): EntityGraphSnapshot {
    const relations: EntityRelation[] = [];
    for (const edges of this.outgoing.values()) {
      relations.push(...edges.map((edge) => ({ ...edge, metadata: { ...edge.metadata } })));
    }
    return {
      entities: [...this.entities.values()].map((entity) => ({
        ...entity,
        metadata: { ...entity.metadata }
      })),
      relations
    };
  }
}
