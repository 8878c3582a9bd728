import type { KnowledgeChunk, VectorIndex, VectorSearchResult } from "@medtriage/shared";

interface IndexedChunk {
  id: string;
  content: string;
  metadata: KnowledgeChunk["metadata"];
  embedding: number[];
}

export class InMemoryVectorIndex implements VectorIndex {
  private readonly chunks = new Map<string, IndexedChunk>();

  async connect(): Promise<void> {}

  async disconnect(): Promise<void> {}

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async upsert(chunks: KnowledgeChunk[]): Promise<void> {
    for (const chunk of chunks) {
      if (!chunk.embedding || chunk.embedding.length === 0) {
        throw new Error(`Chunk ${chunk.id} has no embedding`);
      }

      this.chunks.set(chunk.id, {
        id: chunk.id,
        content: chunk.content,
        metadata: { ...chunk.metadata },
        embedding: [...chunk.embedding]
      });
    }
  }

  async search(vector: number[], k: number): Promise<VectorSearchResult[]> {
    if (vector.length === 0 || this.chunks.size === 0) {
      return [];
    }

    const safeK = Math.max(1, Math.floor(k));
    return [...this.chunks.values()]
      .map((chunk) => ({
        content: chunk.content,
        metadata: { ...chunk.metadata },
        score: cosineSimilarity(vector, chunk.embedding)
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, safeK);
  }

  async getChunksBySource(source: string): Promise<KnowledgeChunk[]> {
    return [...this.chunks.values()]
      .filter((chunk) => chunk.metadata.source === source)
      .sort((a, b) => a.metadata.chunkIndex - b.metadata.chunkIndex)
      .map((chunk) => ({
        id: chunk.id,
        content: chunk.content,
        metadata: { ...chunk.metadata },
        embedding: [...chunk.embedding]
      }));
  }

  async count(): Promise<number> {
    return this.chunks.size;
  }
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let index = 0; index < a.length; index += 1) {
    const left = a[index] ?? 0;
    const right = b[index] ?? 0;
    dot += left * right;
    normA += left * left;
    normB += right * right;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
