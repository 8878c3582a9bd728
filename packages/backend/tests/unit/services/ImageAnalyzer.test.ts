import { describe, expect, it } from "vitest";
import { appConfig } from "../../../src/config.js";
import { loadPromptConfig } from "../../../src/prompts/index.js";
import { ImageAnalyzer } from "../../../src/services/ImageAnalyzer.js";
import { InMemoryImageStore } from "../../../src/store/InMemoryImageStore.js";
import { FakeLLMService } from "../../helpers/FakeLLMService.js";

const prompts = loadPromptConfig(appConfig.PROMPTS_PATH);
const PNG_IMAGE = "data:image/png;base64,iVBORw0KGgoAAAANSUhEUgAAAAEAAAAB";
const JPEG_IMAGE = "data:image/jpeg;base64,/9j/4AAQSkZJRgABAQAAAQABAAD";
const RAW_IMAGE = "R0lGODlhAQABAIAAAAAAAP";

function buildAnalyzer(llm = new FakeLLMService()) {
  const store = new InMemoryImageStore();
  return { analyzer: new ImageAnalyzer(llm, store, prompts.vision), store, llm };
}

describe("ImageAnalyzer", () => {
  it("derives a stable 16 character id from the encoded image", () => {
    const id = ImageAnalyzer.computeImageId(PNG_IMAGE);
    expect(id).toMatch(/^[0-9a-f]{16}$/);
    expect(ImageAnalyzer.computeImageId(PNG_IMAGE)).toBe(id);
    expect(ImageAnalyzer.computeImageId(JPEG_IMAGE)).not.toBe(id);
  });

  it("analyzes an image against the patient's question and stores it", async () => {
    const { analyzer, store, llm } = buildAnalyzer();

    const result = await analyzer.analyze(PNG_IMAGE, { query: "Is the wrist fractured?" });
    const imageId = ImageAnalyzer.computeImageId(PNG_IMAGE);

    expect(result.success).toBe(true);
    expect(result.imageId).toBe(imageId);
    expect(result.query).toBe("Is the wrist fractured?");
    expect(result.analysis).toBe("Chest X-ray with clear lung fields and no fracture.");
    expect(result.imagePath).toBe(`memory://${imageId}.png`);
    expect(llm.visionRequests[0]?.prompt).toContain("answer: Is the wrist fractured?");
    expect(llm.visionRequests[0]?.imageUrl).toBe(PNG_IMAGE);
    expect(store.getById(imageId)?.metadata.query).toBe("Is the wrist fractured?");
  });

  it("uses the generic prompt when there is no question", async () => {
    const { analyzer, llm } = buildAnalyzer();

    await analyzer.analyze(PNG_IMAGE);

    expect(llm.visionRequests[0]?.prompt).toBe(prompts.vision.genericAnalysis);
  });

  it("stores the same image once and distinct images separately", async () => {
    const { analyzer } = buildAnalyzer();

    const first = await analyzer.analyze(PNG_IMAGE);
    const second = await analyzer.analyze(PNG_IMAGE);
    await analyzer.analyze(JPEG_IMAGE);

    expect(first.imageId).toBe(second.imageId);
    const images = analyzer.list();
    expect(images).toHaveLength(2);
    expect(new Set(images.map((image) => image.imageId)).size).toBe(2);
    expect(analyzer.getById(ImageAnalyzer.computeImageId(JPEG_IMAGE))?.format).toBe("jpeg");
  });

  it("treats bare base64 as png on disk and jpeg for the model", async () => {
    const { analyzer, llm } = buildAnalyzer();

    const result = await analyzer.analyze(RAW_IMAGE);

    expect(analyzer.getById(result.imageId)?.format).toBe("png");
    expect(llm.visionRequests[0]?.imageUrl).toBe(`data:image/jpeg;base64,${RAW_IMAGE}`);
  });

  it("skips storage when asked", async () => {
    const { analyzer, store } = buildAnalyzer();

    const result = await analyzer.analyze(PNG_IMAGE, { saveImage: false });

    expect(result.success).toBe(true);
    expect(result.imagePath).toBeNull();
    expect(store.list()).toEqual([]);
  });

  it("reports model failures on the result", async () => {
    const { analyzer } = buildAnalyzer(new FakeLLMService({ vision: new Error("vision model offline") }));

    const result = await analyzer.analyze(PNG_IMAGE, { query: "what is this?" });

    expect(result.success).toBe(false);
    expect(result.analysis).toBeNull();
    expect(result.error).toBe("vision model offline");
    expect(result.imagePath).toBe(`memory://${result.imageId}.png`);
  });

  it("summarizes with a fallback text when the model fails", async () => {
    const ok = buildAnalyzer(new FakeLLMService({ vision: "Frontal chest radiograph." }));
    await expect(ok.analyzer.summarize(PNG_IMAGE)).resolves.toBe("Frontal chest radiograph.");
    expect(ok.llm.visionRequests[0]?.prompt).toBe(prompts.vision.summary);

    const failing = buildAnalyzer(new FakeLLMService({ vision: new Error("vision model offline") }));
    await expect(failing.analyzer.summarize(PNG_IMAGE)).resolves.toBe(
      "Medical image (analysis error: vision model offline)"
    );
  });

  it("deletes stored images", async () => {
    const { analyzer } = buildAnalyzer();
    const { imageId } = await analyzer.analyze(PNG_IMAGE);

    expect(analyzer.delete(imageId)).toBe(true);
    expect(analyzer.getById(imageId)).toBeNull();
    expect(analyzer.delete(imageId)).toBe(false);
  });
});
