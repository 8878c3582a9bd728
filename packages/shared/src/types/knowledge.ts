export interface ChunkMetadata {
  source: string;
  chunkIndex: number;
  hasImage?: boolean;
  imageId?: string;
  type?: "text" | "multimodal";
}

export interface KnowledgeChunk {
  /** Opaque vector id, derived from source, index and content. */
  id: string;
  content: string;
  metadata: ChunkMetadata;
  embedding?: number[];
}

export interface VectorSearchResult {
  content: string;
  metadata: ChunkMetadata;
  /** Cosine similarity; higher is more relevant. */
  score: number;
}

export interface HybridSearchResult {
  vectorResults: VectorSearchResult[];
  graphResults: string;
}

export interface IngestionResult {
  success: boolean;
  textChunks: number;
  imageId?: string;
  imageAnalysis?: string;
  error?: string;
}
