export type IngestionPhase =
  | "chunking"
  | "analyzing_image"
  | "embedding"
  | "saving"
  | "completed"
  | "error";

export interface IngestionStatusEvent {
  source: string;
  phase: IngestionPhase;
  message?: string;
}

export interface IngestionOptions {
  chunkSize: number;
  chunkOverlap: number;
  embeddingConcurrency: number;
}

export interface MultimodalIngestInput {
  text?: string;
  image?: string;
  source?: string;
  saveImage?: boolean;
}
