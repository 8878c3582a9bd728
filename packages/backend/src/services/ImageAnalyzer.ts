import { createHash } from "node:crypto";
import type { ImageAnalysisResult, ImageStoreLike, StoredImage } from "@medtriage/shared";
import { renderTemplate, type PromptConfig } from "../prompts/index.js";
import { decodeImage, toImageDataUrl } from "../utils/imagePayload.js";
import { logger } from "../utils/logger.js";
import type { LLMServiceLike } from "./llmTypes.js";

export interface AnalyzeImageOptions {
  query?: string | null;
  saveImage?: boolean;
}

export type ImageAnalyzerLike = Pick<ImageAnalyzer, "analyze" | "summarize">;

export class ImageAnalyzer {
  constructor(
    private readonly llmService: Pick<LLMServiceLike, "describeImage">,
    private readonly imageStore: ImageStoreLike,
    private readonly prompts: PromptConfig["vision"]
  ) {}

  /** First 16 hex characters of the SHA-256 of the encoded image, prefix included. */
  static computeImageId(encoded: string): string {
    return createHash("sha256").update(encoded, "utf8").digest("hex").slice(0, 16);
  }

  /**
   * Describes an image with the vision model, optionally persisting it first.
   * Failures are reported on the result instead of being thrown.
   */
  async analyze(image: string, options: AnalyzeImageOptions = {}): Promise<ImageAnalysisResult> {
    const query = options.query ?? null;
    const result: ImageAnalysisResult = {
      imageId: ImageAnalyzer.computeImageId(image),
      imagePath: null,
      analysis: null,
      query,
      success: false,
      timestamp: new Date()
    };

    try {
      if (options.saveImage ?? true) {
        const decoded = decodeImage(image);
        const stored = this.imageStore.save({
          imageId: result.imageId,
          format: decoded.format,
          bytes: decoded.bytes,
          metadata: {
            query,
            analyzedAt: result.timestamp.toISOString()
          }
        });
        result.imagePath = stored.path;
      }

      const prompt = query
        ? renderTemplate(this.prompts.queryAnalysis, { query })
        : this.prompts.genericAnalysis;
      result.analysis = await this.llmService.describeImage({
        prompt,
        imageUrl: toImageDataUrl(image)
      });
      result.success = true;
    } catch (error) {
      result.error = error instanceof Error ? error.message : String(error);
      logger.warn({ err: error, imageId: result.imageId }, "Image analysis failed");
    }

    return result;
  }

  async summarize(image: string): Promise<string> {
    try {
      return await this.llmService.describeImage({
        prompt: this.prompts.summary,
        imageUrl: toImageDataUrl(image)
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ err: error }, "Image summary failed");
      return renderTemplate(this.prompts.summaryFallback, { error: message });
    }
  }

  getById(imageId: string): StoredImage | null {
    return this.imageStore.getById(imageId);
  }

  list(limit = 50): StoredImage[] {
    return this.imageStore.list(limit);
  }

  delete(imageId: string): boolean {
    return this.imageStore.delete(imageId);
  }
}
