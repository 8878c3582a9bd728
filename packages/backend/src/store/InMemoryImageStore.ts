import type { ImageStoreLike, SaveImageInput, StoredImage } from "@medtriage/shared";

export class InMemoryImageStore implements ImageStoreLike {
  private readonly images = new Map<string, StoredImage>();

  close(): void {
    this.images.clear();
  }

  save(input: SaveImageInput): StoredImage {
    const image: StoredImage = {
      imageId: input.imageId,
      format: input.format,
      path: `memory://${input.imageId}.${input.format}`,
      createdAt: new Date(),
      metadata: { ...input.metadata }
    };

    this.images.set(input.imageId, image);
    return { ...image, metadata: { ...image.metadata } };
  }

  getById(imageId: string): StoredImage | null {
    const image = this.images.get(imageId);
    return image ? { ...image, metadata: { ...image.metadata } } : null;
  }

  list(limit = 50): StoredImage[] {
    const safeLimit = Math.max(1, limit);
    return [...this.images.values()]
      .sort(
        (a, b) =>
          b.createdAt.getTime() - a.createdAt.getTime() || b.imageId.localeCompare(a.imageId)
      )
      .slice(0, safeLimit)
      .map((image) => ({ ...image, metadata: { ...image.metadata } }));
  }

  delete(imageId: string): boolean {
    return this.images.delete(imageId);
  }
}
