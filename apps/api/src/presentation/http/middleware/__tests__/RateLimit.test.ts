import { describe, it, expect } from "@jest/globals";
import request from "supertest";
import { createTestApp } from "../../../../__tests__/helpers/testApp";

describe("API rate limiting", () => {
  it("should reject requests over the limit", async () => {
    const app = createTestApp({ enableRateLimiting: true, rateLimitMax: 2 });

    await request(app).get("/api/morphology/CONJ").expect(200);
    await request(app).get("/api/morphology/CONJ").expect(200);
    const response = await request(app).get("/api/morphology/CONJ").expect(429);

    expect(response.body).toEqual({
      error: "Too many requests",
      code: "TOO_MANY_REQUESTS",
    });
  });

  it("should not count the dataset health check", async () => {
    const app = createTestApp({ enableRateLimiting: true, rateLimitMax: 1 });

    await request(app).get("/api/verses/_health").expect(200);
    await request(app).get("/api/verses/_health").expect(200);
    await request(app).get("/api/morphology/CONJ").expect(200);
  });

  it("should send standard rate limit headers", async () => {
    const app = createTestApp({ enableRateLimiting: true, rateLimitMax: 5 });

    const response = await request(app).get("/api/morphology/CONJ").expect(200);

    expect(response.headers["ratelimit-limit"]).toBe("5");
  });

  it("should not limit when disabled", async () => {
    const app = createTestApp({ enableRateLimiting: false, rateLimitMax: 1 });

    await request(app).get("/api/morphology/CONJ").expect(200);
    const response = await request(app).get("/api/morphology/CONJ").expect(200);

    expect(response.headers["ratelimit-limit"]).toBeUndefined();
  });
});
