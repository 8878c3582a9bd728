import request from "supertest";
import { describe, expect, it } from "vitest";
import { buildTestApp } from "../helpers/testApp.js";

const IMAGE_ID = "0123456789abcdef";

function seed(app: ReturnType<typeof buildTestApp>): void {
  app.runtime.imageStore.save({
    imageId: IMAGE_ID,
    format: "png",
    bytes: Buffer.from("png"),
    metadata: { query: "wrist pain" }
  });
}

describe("images api", () => {
  it("lists stored images", async () => {
    const testApp = buildTestApp();
    seed(testApp);

    const response = await request(testApp.app).get("/api/images");

    expect(response.status).toBe(200);
    expect(response.body.images).toHaveLength(1);
    expect(response.body.images[0]).toMatchObject({
      imageId: IMAGE_ID,
      format: "png",
      path: `memory://${IMAGE_ID}.png`,
      metadata: { query: "wrist pain" }
    });
  });

  it("returns a single image", async () => {
    const testApp = buildTestApp();
    seed(testApp);

    const response = await request(testApp.app).get(`/api/images/${IMAGE_ID}`);

    expect(response.status).toBe(200);
    expect(response.body.image.imageId).toBe(IMAGE_ID);
  });

  it("deletes an image once", async () => {
    const testApp = buildTestApp();
    seed(testApp);

    const first = await request(testApp.app).delete(`/api/images/${IMAGE_ID}`);
    const second = await request(testApp.app).delete(`/api/images/${IMAGE_ID}`);

    expect(first.status).toBe(204);
    expect(second.status).toBe(404);
    expect(second.body).toEqual({ error: "Image not found" });
  });

  it("returns 404 for unknown images", async () => {
    const { app } = buildTestApp();

    const response = await request(app).get("/api/images/ffffffffffffffff");

    expect(response.status).toBe(404);
  });

  it("rejects malformed ids", async () => {
    const { app } = buildTestApp();

    const response = await request(app).get("/api/images/not-an-id");

    expect(response.status).toBe(400);
    expect(response.body.details).toEqual([{ location: "params", path: "id", message: "Image id must be 16 hex characters" }]);
  });
});
