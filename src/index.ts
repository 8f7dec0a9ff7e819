import { serve } from "@hono/node-server";
import { createApp } from "./api/app.js";
import { loadHostsConfig } from "./config/hosts.js";
import { loadConfig } from "./config/index.js";
import { logger } from "./config/logger.js";
import { type HistoryDb, openHistoryDb } from "./db/index.js";
import { DrizzleRunHistoryRepository, type IRunHistoryRepository } from "./history/run-history-repository.js";
import { Orchestrator } from "./orchestrator/orchestrator.js";

// Handle unhandled promise rejections (async errors that weren't caught)
export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
};

// Handle uncaught exceptions (synchronous errors that weren't caught)
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  // The process is in an undefined state. Winston's Console transport is synchronous.
  process.exit(1);
};

process.on("unhandledRejection", unhandledRejectionHandler);
process.on("uncaughtException", uncaughtExceptionHandler);

/**
 * Load settings and the hosts file, connect to every host, then serve the API
 * until SIGINT or SIGTERM. Throws when any of the startup steps fails.
 */
export async function main(): Promise<void> {
  const config = loadConfig();
  logger.level = config.logLevel;

  const hostsConfig = loadHostsConfig(config.hostsFile);

  let historyDb: HistoryDb | null = null;
  let history: IRunHistoryRepository | null = null;
  if (config.dbPath) {
    historyDb = openHistoryDb(config.dbPath);
    history = new DrizzleRunHistoryRepository(historyDb.db);
    logger.info("Run history enabled", { dbPath: config.dbPath });
  }

  let orchestrator: Orchestrator;
  try {
    orchestrator = await Orchestrator.bootstrap(hostsConfig, {
      history,
      reconcileIntervalMs: config.reconcileIntervalMs,
    });
  } catch (err) {
    historyDb?.sqlite.close();
    throw err;
  }
  orchestrator.start();

  const app = createApp(orchestrator);
  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    logger.info(`maestro listening on http://${config.host}:${info.port}`);
  });

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) {
      logger.warn(`Received ${signal} during shutdown, exiting`);
      process.exit(1);
    }
    stopping = true;
    logger.info(`Received ${signal}, shutting down`);
    server.close();
    await orchestrator.shutdown();
    historyDb?.sqlite.close();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        logger.error("Shutdown failed", { err });
        process.exit(1);
      });
    });
  }
}

// Only start the server if not imported by tests
if (process.env.NODE_ENV !== "test") {
  main().catch((err) => {
    logger.error("maestro failed to start", {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.exit(1);
  });
}
