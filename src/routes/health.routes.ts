import { Router } from "express";
import { getPoolStats } from "../config/database";
import type { FacilityStore } from "../services/store/facility.store";
import type { OutboxDispatcher } from "../services/sync/outbox.dispatcher";
import logger, { getErrorMessage } from "../utils/logger";

export interface HealthDependencies {
  store: FacilityStore;
  outbox: OutboxDispatcher;
  storeDriver: string;
}

export const createHealthRoutes = ({ store, outbox, storeDriver }: HealthDependencies): Router => {
  const router = Router();

  router.get("/health", async (_req, res) => {
    const health = {
      status: "ok",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: process.env.NODE_ENV,
    };

    res.status(200).json(health);
  });

  router.get("/health/ready", async (_req, res) => {
    try {
      const storeHealth = await store.healthCheck();
      const checks = {
        store: storeHealth.status,
        driver: storeDriver,
        latency: storeHealth.latency,
        timestamp: new Date().toISOString(),
      };

      if (storeHealth.status === "healthy") {
        res.status(200).json({ status: "ready", checks });
      } else {
        res.status(503).json({ status: "not ready", checks });
      }
    } catch (err) {
      logger.error("Readiness check failed", { error: getErrorMessage(err) });
      res.status(503).json({
        status: "not ready",
        checks: { store: "error", driver: storeDriver, timestamp: new Date().toISOString() },
      });
    }
  });

  router.get("/health/live", (_req, res) => {
    res.status(200).json({
      status: "alive",
      timestamp: new Date().toISOString(),
    });
  });

  router.get("/metrics", (_req, res) => {
    const metrics = {
      process: {
        uptime: process.uptime(),
        memory: process.memoryUsage(),
        cpu: process.cpuUsage(),
      },
      outbox: {
        pendingPush: outbox.getPendingCount(),
        circuit: outbox.getCircuitState(),
      },
      database: storeDriver === "postgres" ? getPoolStats() : null,
    };

    res.status(200).json(metrics);
  });

  return router;
};
