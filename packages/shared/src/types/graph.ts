export type EntityType = "symptom" | "condition" | "treatment";

export interface MedicalEntity {
  name: string;
  type: EntityType;
  metadata: Record<string, unknown>;
}

export interface EntityRelation {
  source: string;
  target: string;
  relation: string;
  metadata: Record<string, unknown>;
}

export interface RelatedEntity {
  entity: string;
  distance: number;
  type: EntityType;
}

export interface EntityGraphSnapshot {
  entities: MedicalEntity[];
  relations: EntityRelation[];
}
