/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 if server is running)
 * GET /ready  — Readiness check (event log hash chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { MintsplitService } from "../services/mintsplit-service.js";

export function createHealthRoutes(service: MintsplitService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.verifyIntegrity();
    const body = {
      status: integrity.valid ? "ready" : "not_ready",
      events: service.eventStore.globalPosition(),
      timestamp: new Date().toISOString(),
    };
    return integrity.valid ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
