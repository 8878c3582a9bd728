import { randomUUID } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, rmSync } from "node:fs";
import { join, resolve } from "node:path";
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import type { ImageStore as ImageStoreType } from "../../../src/store/ImageStore.js";

const tmpRoot = resolve("tmp", `image-store-${randomUUID()}`);

afterAll(() => {
  rmSync(tmpRoot, { recursive: true, force: true });
});

describe("ImageStore", () => {
  let ImageStore: typeof import("../../../src/store/ImageStore.js").ImageStore;
  let sqliteAvailable = true;
  let sqliteUnavailableReason = "";
  const openStores: ImageStoreType[] = [];

  beforeAll(async () => {
    try {
      ({ ImageStore } = await import("../../../src/store/ImageStore.js"));
      const probe = new ImageStore({
        dbPath: join(tmpRoot, "probe.db"),
        storageDir: join(tmpRoot, "probe")
      });
      probe.close();
    } catch (error) {
      sqliteAvailable = false;
      sqliteUnavailableReason = error instanceof Error ? error.message : String(error);
    }
  });

  afterEach(() => {
    vi.useRealTimers();
    for (const store of openStores.splice(0)) {
      store.close();
    }
  });

  function openStore(): ImageStoreType {
    const dir = join(tmpRoot, randomUUID());
    const store = new ImageStore({ dbPath: join(dir, "images.db"), storageDir: join(dir, "files") });
    openStores.push(store);
    return store;
  }

  it("writes the image file and its metadata", () => {
    if (!sqliteAvailable) {
      // Native bindings may be missing in some sandboxes.
      expect(sqliteUnavailableReason.length).toBeGreaterThan(0);
      return;
    }

    const store = openStore();
    const saved = store.save({
      imageId: "0123456789abcdef",
      format: "png",
      bytes: Buffer.from("png-bytes"),
      metadata: { query: "Is this broken?" }
    });

    expect(saved.path.endsWith("0123456789abcdef.png")).toBe(true);
    expect(readFileSync(saved.path, "utf8")).toBe("png-bytes");
    expect(store.getById("0123456789abcdef")?.metadata).toEqual({ query: "Is this broken?" });
    expect(store.getById("ffffffffffffffff")).toBeNull();
  });

  it("keeps one record per id with the latest metadata", () => {
    if (!sqliteAvailable) {
      expect(sqliteUnavailableReason.length).toBeGreaterThan(0);
      return;
    }

    const store = openStore();
    const input = { imageId: "aaaaaaaaaaaaaaaa", format: "jpeg", bytes: Buffer.from("jpeg") };
    store.save({ ...input, metadata: { query: "first" } });
    store.save({ ...input, metadata: { query: "second" } });

    const images = store.list();
    expect(images).toHaveLength(1);
    expect(images[0]?.metadata).toEqual({ query: "second" });
  });

  it("lists the newest images first", () => {
    if (!sqliteAvailable) {
      expect(sqliteUnavailableReason.length).toBeGreaterThan(0);
      return;
    }

    const store = openStore();
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2024-03-01T10:00:00.000Z"));
    store.save({ imageId: "1111111111111111", format: "png", bytes: Buffer.from("a"), metadata: {} });
    vi.setSystemTime(new Date("2024-03-01T11:00:00.000Z"));
    store.save({ imageId: "2222222222222222", format: "png", bytes: Buffer.from("b"), metadata: {} });

    expect(store.list().map((image) => image.imageId)).toEqual(["2222222222222222", "1111111111111111"]);
    expect(store.list(1).map((image) => image.imageId)).toEqual(["2222222222222222"]);
    expect(store.list()[1]?.createdAt.toISOString()).toBe("2024-03-01T10:00:00.000Z");
  });

  it("deletes the record and the file together", () => {
    if (!sqliteAvailable) {
      expect(sqliteUnavailableReason.length).toBeGreaterThan(0);
      return;
    }

    const store = openStore();
    const saved = store.save({ imageId: "bbbbbbbbbbbbbbbb", format: "png", bytes: Buffer.from("b"), metadata: {} });

    expect(store.delete("bbbbbbbbbbbbbbbb")).toBe(true);
    expect(existsSync(saved.path)).toBe(false);
    expect(store.getById("bbbbbbbbbbbbbbbb")).toBeNull();
    expect(store.delete("bbbbbbbbbbbbbbbb")).toBe(false);
  });

  it("treats an already missing file as deleted", () => {
    if (!sqliteAvailable) {
      expect(sqliteUnavailableReason.length).toBeGreaterThan(0);
      return;
    }

    const store = openStore();
    const saved = store.save({ imageId: "cccccccccccccccc", format: "png", bytes: Buffer.from("c"), metadata: {} });
    rmSync(saved.path);

    expect(store.delete("cccccccccccccccc")).toBe(true);
    expect(store.getById("cccccccccccccccc")).toBeNull();
  });

  it("keeps the record when the file cannot be removed", () => {
    if (!sqliteAvailable) {
      expect(sqliteUnavailableReason.length).toBeGreaterThan(0);
      return;
    }

    const store = openStore();
    const saved = store.save({ imageId: "dddddddddddddddd", format: "png", bytes: Buffer.from("d"), metadata: {} });
    rmSync(saved.path);
    mkdirSync(saved.path);

    expect(store.delete("dddddddddddddddd")).toBe(false);
    expect(store.getById("dddddddddddddddd")?.path).toBe(saved.path);
  });
});
