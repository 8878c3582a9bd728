import type { StoredImage } from "./types/image.js";
import type { KnowledgeChunk, VectorSearchResult } from "./types/knowledge.js";

export interface VectorIndex {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;
  upsert(chunks: KnowledgeChunk[]): Promise<void>;
  search(vector: number[], k: number): Promise<VectorSearchResult[]>;
  getChunksBySource(source: string): Promise<KnowledgeChunk[]>;
  count(): Promise<number>;
}

export interface SaveImageInput {
  imageId: string;
  format: string;
  bytes: Buffer;
  metadata: Record<string, unknown>;
}

export interface ImageStoreLike {
  close(): void;
  save(input: SaveImageInput): StoredImage;
  getById(imageId: string): StoredImage | null;
  list(limit?: number): StoredImage[];
  delete(imageId: string): boolean;
}
