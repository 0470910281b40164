/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - GET /ready reports the event log position
 * - X-Request-Id is set on responses
 * - Unknown routes get the error envelope
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);

    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(Number.isNaN(Date.parse(body.timestamp))).toBe(false);
  });

  it("generates an X-Request-Id when none is sent", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });

  it("preserves incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, {
        "X-Request-Id": "test-req-123",
      }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });

  it("replaces a malformed incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, {
        "X-Request-Id": "has spaces in it",
      }),
    );

    const id = res.headers.get("X-Request-Id");
    expect(id).not.toBe("has spaces in it");
    expect(id).toHaveLength(36);
  });
});

describe("GET /ready", () => {
  it("returns 200 ready with the payee events already logged", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);

    const body = (await res.json()) as { status: string; events: number };
    expect(body.status).toBe("ready");
    expect(body.events).toBe(3);
  });

  it("counts events appended after startup", async () => {
    const { app, service } = createTestApp();
    service.deposit("0x0000000000000000000000000000000000000099", 10n);

    const res = await app.request("/ready");
    const body = (await res.json()) as { events: number };
    expect(body.events).toBe(4);
  });
});

describe("error handling", () => {
  it("returns error envelope for unknown routes", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/nonexistent");

    expect(res.status).toBe(404);

    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({
      code: "NOT_FOUND",
      message: "No route for GET /api/v1/nonexistent",
    });
  });
});
