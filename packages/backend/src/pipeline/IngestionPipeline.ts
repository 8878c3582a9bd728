import { createHash } from "node:crypto";
import { EventEmitter } from "node:events";
import type { ChunkMetadata, IngestionResult, KnowledgeChunk, VectorIndex } from "@medtriage/shared";
import { appConfig } from "../config.js";
import type { ImageAnalyzerLike } from "../services/ImageAnalyzer.js";
import type { LLMServiceLike } from "../services/llmTypes.js";
import { mapWithConcurrency } from "../utils/concurrency.js";
import { logger } from "../utils/logger.js";
import { RecursiveTextSplitter } from "./TextSplitter.js";
import type {
  IngestionOptions,
  IngestionPhase,
  IngestionStatusEvent,
  MultimodalIngestInput
} from "./types.js";

const defaultOptions: IngestionOptions = {
  chunkSize: appConfig.CHUNK_SIZE,
  chunkOverlap: appConfig.CHUNK_OVERLAP,
  embeddingConcurrency: 5
};

const DEFAULT_SOURCE = "user";

export class IngestionPipeline {
  private readonly eventEmitter = new EventEmitter();
  private readonly options: IngestionOptions;
  private readonly splitter: RecursiveTextSplitter;

  constructor(
    private readonly vectorIndex: VectorIndex,
    private readonly llmService: Pick<LLMServiceLike, "generateEmbedding">,
    private readonly imageAnalyzer: ImageAnalyzerLike,
    options: Partial<IngestionOptions> = {}
  ) {
    this.options = {
      ...defaultOptions,
      ...options
    };
    this.splitter = new RecursiveTextSplitter({
      chunkSize: this.options.chunkSize,
      chunkOverlap: this.options.chunkOverlap
    });
  }

  onStatus(listener: (event: IngestionStatusEvent) => void): void {
    this.eventEmitter.on("status", listener);
  }

  /**
   * Splits, embeds and indexes text. Returns the number of chunks written.
   */
  async ingestText(text: string, source = DEFAULT_SOURCE): Promise<number> {
    return this.indexText(text, { source });
  }

  async ingestMultimodal(input: MultimodalIngestInput): Promise<IngestionResult> {
    const source = input.source ?? DEFAULT_SOURCE;
    const result: IngestionResult = {
      success: true,
      textChunks: 0
    };

    if (input.image === undefined) {
      if (input.text) {
        result.textChunks = await this.ingestText(input.text, source);
      }
      this.emitStatus(source, "completed");
      return result;
    }

    const image = input.image;
    try {
      this.emitStatus(source, "analyzing_image");
      const summary = await this.imageAnalyzer.summarize(image);
      const analysis = await this.imageAnalyzer.analyze(image, {
        query: input.text ?? null,
        saveImage: input.saveImage ?? true
      });
      result.imageId = analysis.imageId;

      if (!analysis.success || analysis.analysis === null) {
        throw new Error(analysis.error ?? "Image analysis returned no findings");
      }
      result.imageAnalysis = analysis.analysis;

      const document = [
        input.text ? `Patient Query: ${input.text}\n\n` : "",
        `Medical Image Analysis:\n${summary}\n\n`,
        `Detailed Findings:\n${analysis.analysis}`
      ].join("");

      result.textChunks = await this.indexText(document, {
        source,
        hasImage: true,
        imageId: analysis.imageId,
        type: "multimodal"
      });
      this.emitStatus(source, "completed");
    } catch (error) {
      result.success = false;
      result.textChunks = 0;
      result.error = error instanceof Error ? error.message : String(error);
      this.emitStatus(source, "error", result.error);
      logger.error({ err: error, source }, "Multimodal ingestion failed");
    }

    return result;
  }

  private async indexText(text: string, base: Omit<ChunkMetadata, "chunkIndex">): Promise<number> {
    this.emitStatus(base.source, "chunking");
    const spans = this.splitter.split(text);
    if (spans.length === 0) {
      return 0;
    }

    this.emitStatus(base.source, "embedding");
    const embeddings = await mapWithConcurrency(spans, this.options.embeddingConcurrency, (span) =>
      this.llmService.generateEmbedding(span.content)
    );

    const chunks: KnowledgeChunk[] = spans.map((span, chunkIndex) => ({
      id: chunkId(base.source, chunkIndex, span.content),
      content: span.content,
      metadata: { ...base, chunkIndex },
      embedding: embeddings[chunkIndex] ?? []
    }));

    this.emitStatus(base.source, "saving");
    await this.vectorIndex.upsert(chunks);
    logger.info({ source: base.source, chunks: chunks.length }, "Indexed knowledge chunks");
    return chunks.length;
  }

  private emitStatus(source: string, phase: IngestionPhase, message?: string): void {
    const event: IngestionStatusEvent = { source, phase };
    if (message !== undefined) {
      event.message = message;
    }
    this.eventEmitter.emit("status", event);
  }
}

/** Content-derived id, so re-ingesting identical text overwrites instead of duplicating. */
export function chunkId(source: string, chunkIndex: number, content: string): string {
  return createHash("sha256")
    .update(`${source}\u0000${chunkIndex}\u0000${content}`, "utf8")
    .digest("hex")
    .slice(0, 32);
}
