import "dotenv/config";
import { createApp } from "./app";
import { config, validateConfig } from "./config";
import { logger } from "./utils/logger";
import { bootstrapServices } from "./lib/services";
import { closeDatabase } from "./lib/db";
import {
  closeRedisConnections,
  schedulePeriodicRankSync,
  startRankSyncWorker,
  stopRankSyncWorker,
} from "./queues";

async function main(): Promise<void> {
  validateConfig();

  const services = await bootstrapServices();
  const app = createApp(services);

  const server = app.listen(config.port, () => {
    logger.info(`Rank ledger API running on port ${config.port}`);
    logger.info(`Environment: ${config.nodeEnv}`);
  });

  if (config.rankSync.enabled) {
    startRankSyncWorker(services.rankSync);
    await schedulePeriodicRankSync();
  }

  // Graceful shutdown
  const gracefulShutdown = (signal: string): void => {
    logger.info(`${signal} received. Shutting down gracefully...`);

    server.close(() => {
      logger.info("HTTP server closed.");
      stopRankSyncWorker()
        .then(closeRedisConnections)
        .then(closeDatabase)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error("Error during shutdown:", error);
          process.exit(1);
        });
    });

    // Force close after 10 seconds
    setTimeout(() => {
      logger.error("Could not close connections in time, forcefully shutting down");
      process.exit(1);
    }, 10000).unref();
  };

  process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => gracefulShutdown("SIGINT"));
}

main().catch((error: unknown) => {
  logger.error("Failed to start:", error);
  process.exit(1);
});
