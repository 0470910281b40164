/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { MintsplitService } from "./services/mintsplit-service.js";
import type { MintsplitServiceConfig } from "./services/mintsplit-service.js";
import { createErrorEnvelope } from "./types/error.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createMintingRoutes } from "./routes/minting.js";
import { createEquityRoutes } from "./routes/equity.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: MintsplitServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: MintsplitService;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new MintsplitService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/minting", createMintingRoutes());
  app.route("/api/v1/equity", createEquityRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
