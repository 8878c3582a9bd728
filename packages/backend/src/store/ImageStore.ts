import { mkdirSync, unlinkSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import type { ImageStoreLike, SaveImageInput, StoredImage } from "@medtriage/shared";
import { logger } from "../utils/logger.js";

export interface ImageStoreOptions {
  dbPath?: string;
  storageDir?: string;
}

interface ImageRow {
  id: string;
  format: string;
  path: string;
  created_at: string;
  metadata_json: string;
}

/**
 * Image metadata in SQLite, image bytes as `<id>.<format>` files under the storage directory.
 */
export class ImageStore implements ImageStoreLike {
  private readonly db: Database.Database;
  private readonly storageDir: string;

  constructor(options: ImageStoreOptions = {}) {
    const dbPath = resolve(options.dbPath ?? "data/images.db");
    mkdirSync(dirname(dbPath), { recursive: true });
    this.storageDir = resolve(options.storageDir ?? "data/medical_images");
    mkdirSync(this.storageDir, { recursive: true });

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");

    this.initializeSchema();
  }

  close(): void {
    this.db.close();
  }

  save(input: SaveImageInput): StoredImage {
    const path = resolve(this.storageDir, `${input.imageId}.${input.format}`);
    writeFileSync(path, input.bytes);

    this.db
      .prepare(
        `
        INSERT INTO images (id, format, path, created_at, metadata_json)
        VALUES (@id, @format, @path, @created_at, @metadata_json)
        ON CONFLICT(id) DO UPDATE SET
          format = excluded.format,
          path = excluded.path,
          created_at = excluded.created_at,
          metadata_json = excluded.metadata_json
        `
      )
      .run({
        id: input.imageId,
        format: input.format,
        path,
        created_at: new Date().toISOString(),
        metadata_json: JSON.stringify(input.metadata)
      });

    const saved = this.getById(input.imageId);
    if (!saved) {
      throw new Error(`Image ${input.imageId} was not persisted`);
    }
    return saved;
  }

  getById(imageId: string): StoredImage | null {
    const row = this.db
      .prepare(
        `
        SELECT id, format, path, created_at, metadata_json
        FROM images
        WHERE id = ?
        LIMIT 1
        `
      )
      .get(imageId) as ImageRow | undefined;

    return row ? this.mapRow(row) : null;
  }

  list(limit = 50): StoredImage[] {
    const safeLimit = Math.max(1, limit);
    const rows = this.db
      .prepare(
        `
        SELECT id, format, path, created_at, metadata_json
        FROM images
        ORDER BY created_at DESC, id DESC
        LIMIT ?
        `
      )
      .all(safeLimit) as ImageRow[];

    return rows.map((row) => this.mapRow(row));
  }

  /**
   * Removes the row and its file together. If the file cannot be removed the row is kept.
   */
  delete(imageId: string): boolean {
    const image = this.getById(imageId);
    if (!image) {
      return false;
    }

    const removeImage = this.db.transaction((id: string, path: string) => {
      this.db.prepare("DELETE FROM images WHERE id = ?").run(id);
      removeFileIfPresent(path);
    });

    try {
      removeImage(image.imageId, image.path);
      return true;
    } catch (error) {
      logger.warn({ err: error, imageId }, "Failed to delete image, keeping its record");
      return false;
    }
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS images (
        id TEXT PRIMARY KEY,
        format TEXT NOT NULL,
        path TEXT NOT NULL,
        created_at TEXT NOT NULL,
        metadata_json TEXT NOT NULL DEFAULT '{}'
      );

      CREATE INDEX IF NOT EXISTS idx_images_created_at
        ON images(created_at DESC);
    `);
  }

  private mapRow(row: ImageRow): StoredImage {
    return {
      imageId: row.id,
      format: row.format,
      path: row.path,
      createdAt: new Date(row.created_at),
      metadata: parseMetadata(row.metadata_json)
    };
  }
}

function removeFileIfPresent(path: string): void {
  try {
    unlinkSync(path);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return;
    }
    throw error;
  }
}

function parseMetadata(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      return { ...parsed };
    }
  } catch (error) {
    logger.warn({ err: error }, "Ignoring malformed image metadata");
  }
  return {};
}
