/**
 * ─────────────────────────────────────────────────────────
 *  VISIT COUNTER — process bootstrap
 *  Stack: Express + SQLite (better-sqlite3) or PostgreSQL (pg)
 * ─────────────────────────────────────────────────────────
 *
 *  Startup order:
 *  1. config from the environment (exit 1 if invalid)
 *  2. logger, metrics registry
 *  3. visit store: ping + table provisioning (exit 1 on failure)
 *  4. listen, then drain on SIGINT / SIGTERM
 */

import type { Server } from "http";
import { createApp } from "./app";
import { loadConfig, type AppConfig } from "./config";
import { ConfigurationError } from "./errors";
import { createLogger, type Logger } from "./logger";
import { createMetrics } from "./metrics";
import { createVisitStore, type VisitStore } from "./store";

const bootLogger = createLogger();

// ─── Graceful Shutdown ────────────────────────────────────
const installShutdown = (server: Server, store: VisitStore, config: AppConfig, logger: Logger) => {
  let shuttingDown = false;

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down worker ${process.pid}`);

    server.close(() => {
      store
        .close()
        .then(() => {
          logger.info("Server exiting");
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, "Failed to close visit store");
          process.exit(1);
        });
    });
    server.closeIdleConnections();

    setTimeout(() => {
      logger.error(`In-flight requests still open after ${config.shutdownGraceMs}ms, forcing close`);
      server.closeAllConnections();
      process.exit(1);
    }, config.shutdownGraceMs).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
};

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const metrics = createMetrics({ collectDefaults: config.collectDefaultMetrics });
  const store = await createVisitStore(config.storage, logger);

  const app = createApp({ config, logger, metrics, store });
  const server = app.listen(config.port, () => {
    logger.info(
      { port: config.port, appEnv: config.appEnv, originCheck: config.enforceOrigins },
      `Worker ${process.pid} listening`,
    );
  });

  installShutdown(server, store, config, logger);
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    bootLogger.fatal({ err }, `Invalid configuration: ${err.message}`);
  } else {
    bootLogger.fatal({ err }, "Startup failed");
  }
  process.exit(1);
});
