/**
 * Express API Server
 *
 * Admin API for the registration service: health and metrics for
 * monitoring, plus run control and manual captcha answers for operators
 * without the Telegram bot.
 */
import express from "express";
import cors from "cors";
import { Server } from "node:http";
import { createRoutes } from "./routes";
import { errorMiddleware } from "./middlewares/error.middleware";
import { logger } from "../monitoring/logger";
import { HealthReport } from "../monitoring/health.checker";
import { DayRegistry } from "../registration/day.registry";
import { DayScheduler } from "../registration/day.scheduler";
import { ManualCaptchaResolver } from "../registration/manual-captcha.resolver";
import { PendingCaptchaStore } from "../registration/pending-captcha.store";
import { RegistrationService } from "../registration/registration.service";
import config from "../config";

/** What the controllers read and drive */
export interface ApiServices {
  registry: DayRegistry;
  scheduler: DayScheduler;
  pendingStore: PendingCaptchaStore;
  service: RegistrationService;
  resolver: ManualCaptchaResolver;
  health: () => Promise<HealthReport>;
  serviceSecret?: string;
}

/**
 * Create and configure the Express application.
 */
export function createServer(services: ApiServices): express.Application {
  const app = express();

  // CORS
  app.use(cors());

  // Body parsing
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true }));

  // Request logging
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, path: req.path }, "Incoming request");
    next();
  });

  // API routes
  app.use("/api/registration/v1", createRoutes(services));

  // Error handler
  app.use(errorMiddleware);

  return app;
}

/**
 * Start the Express server.
 */
export function startServer(services: ApiServices): Promise<Server> {
  return new Promise((resolve) => {
    const app = createServer(services);
    const server = app.listen(config.port, () => {
      logger.info({ port: config.port, env: config.env }, "API server started");
      resolve(server);
    });
  });
}
