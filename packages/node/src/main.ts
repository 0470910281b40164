/**
 * @mintsplit/node — Entry point.
 *
 * Loads config, bootstraps the Hono app, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, loadEquityFile } from "./config.js";
import { createApp } from "./app.js";
import { serviceConfigFrom } from "./bootstrap.js";

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const equityFile = loadEquityFile(config.EQUITY_CONFIG_PATH);
  const { app, service } = createApp({
    serviceConfig: serviceConfigFrom(config, equityFile),
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
    },
  });

  const events = logger.child({ component: "events" });
  service.eventStore.subscribeAll((stored) => {
    events.info(
      {
        type: stored.event.type,
        streamId: stored.streamId,
        position: stored.globalPosition,
        payload: stored.event.payload,
      },
      stored.event.type,
    );
  });

  logger.info(
    {
      payees: service.equity.payeeCount,
      authority: service.mint.designatedAuthority(),
      chainId: config.CHAIN_ID,
    },
    "Service configured",
  );

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "mintsplit node started");

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
