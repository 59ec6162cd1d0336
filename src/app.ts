import express, { Application } from "express";
import helmet from "helmet";
import compression from "compression";
import cors from "cors";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";
import { config } from "./config/config";

import { createHealthRoutes, HealthDependencies } from "./routes/health.routes";

import { errorHandler, notFoundHandler } from "./middleware/error.middleware";
import logger from "./utils/logger";

import { ApiServices, createRoutes } from "./routes";

export type AppServices = ApiServices & HealthDependencies;

export const createApp = (services: AppServices): Application => {
  const app = express();

  app.use(helmet());
  app.use(
    cors({
      origin: process.env.CORS_ORIGIN || "*",
      credentials: true,
    }),
  );

  // Compression
  app.use(compression());

  // Body parsing
  app.use(express.json({ limit: "1mb" }));

  // Request logging
  if (config.NODE_ENV !== "test") {
    const morganFormat = config.NODE_ENV === "production" ? "combined" : "dev";
    app.use(
      morgan(morganFormat, {
        stream: {
          write: (message) => logger.info(message.trim()),
        },
      }),
    );
  }

  app.use((req, res, next) => {
    const header = req.headers["x-request-id"];
    req.id = typeof header === "string" && header !== "" ? header : uuidv4();
    res.setHeader("X-Request-ID", req.id);
    next();
  });

  // Routes
  app.use("/", createHealthRoutes(services));
  app.use("/api/v1", createRoutes(services));

  // 404 handler
  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
};
