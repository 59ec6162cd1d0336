import type { Server } from "http";
import { createApp } from "./app";
import { config } from "./config/config";
import { closePool } from "./config/database";
import { createContainer, initializeContainer, ServiceContainer } from "./container";
import { SyncScheduler } from "./schedulers/sync-scheduler.service";
import logger, { getErrorMessage } from "./utils/logger";

let server: Server | null = null;
let container: ServiceContainer | null = null;
let scheduler: SyncScheduler | null = null;
let shuttingDown = false;

const startServer = async () => {
  try {
    container = createContainer();
    await initializeContainer(container);

    scheduler = new SyncScheduler(container.repository, container.syncService, container.outbox);
    const { schedule, outboxSchedule } = container.settings.sync;
    if (schedule) scheduler.scheduleLocationSync(schedule);
    if (outboxSchedule) scheduler.scheduleOutboxFlush(outboxSchedule);
    scheduler.start();

    const app = createApp(container);

    server = app.listen(config.PORT, () => {
      logger.info(`Server started successfully`, {
        port: config.PORT,
        environment: config.NODE_ENV,
        storeDriver: config.STORE_DRIVER,
        nodeVersion: process.version,
      });
    });

    server.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE") {
        logger.error(`Port ${config.PORT} is already in use`);
      } else {
        logger.error("Server error", { error: error.message });
      }
      process.exit(1);
    });
  } catch (error) {
    logger.error("Failed to start server", { error: getErrorMessage(error) });
    process.exit(1);
  }
};

const releaseResources = async () => {
  scheduler?.stop();
  if (container) {
    // Let in-flight pushes finish so acknowledgements are not lost
    await container.outbox.whenIdle();
    await container.store.close();
  }
  await closePool();
};

const gracefulShutdown = async (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received, starting graceful shutdown`);

  // Force shutdown after 30 seconds
  setTimeout(() => {
    logger.error("Forced shutdown after timeout");
    process.exit(1);
  }, 30000).unref();

  try {
    if (server) {
      const current = server;
      await new Promise<void>((resolve) => current.close(() => resolve()));
      logger.info("HTTP server closed");
    }
    await releaseResources();
    logger.info("Graceful shutdown completed");
    process.exit(0);
  } catch (error) {
    logger.error("Error during shutdown", { error: getErrorMessage(error) });
    process.exit(1);
  }
};

// Handle shutdown signals
process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

// Handle uncaught errors
process.on("uncaughtException", (error) => {
  logger.error("Uncaught Exception", { error: error.message, stack: error.stack });
  void gracefulShutdown("UNCAUGHT_EXCEPTION");
});

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled Rejection", { reason: getErrorMessage(reason) });
  void gracefulShutdown("UNHANDLED_REJECTION");
});

void startServer();
