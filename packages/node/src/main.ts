/**
 * @breakwater/node: Entry point.
 *
 * Loads config, builds the deployment, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, serviceConfigFrom } from "./config.js";
import { createApp } from "./app.js";
import { BreakerService } from "./services/breaker-service.js";
import { subscribeEventLogger } from "./services/event-logger.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const service = new BreakerService(serviceConfigFrom(config));
  const events = subscribeEventLogger(service.eventStore, logger.child({ component: "events" }));

  const { app } = createApp({
    service,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      token: service.token.address,
      protocol: service.protocol.address,
      cooldownTicks: config.COOLDOWN_TICKS.toString(),
      windowTicks: config.WINDOW_TICKS.toString(),
    },
    "Breakwater node started",
  );

  let autoTick: NodeJS.Timeout | undefined;
  if (config.AUTO_TICK_MS !== undefined) {
    autoTick = setInterval(() => {
      service.advance(1n, "auto-tick");
    }, config.AUTO_TICK_MS);
    logger.info({ intervalMs: config.AUTO_TICK_MS }, "Auto-tick enabled");
  }

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    if (autoTick !== undefined) {
      clearInterval(autoTick);
    }
    events.unsubscribe();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    logger.info({ tick: service.clock.now().toString() }, "Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
