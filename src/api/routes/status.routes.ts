/**
 * Status Routes
 *
 * API routes for monitoring: registry status, health, metrics.
 * Health and metrics endpoints are public (for load balancers).
 * Status endpoint is protected.
 */
import { RequestHandler, Router } from "express";
import { ApiServices } from "../server";
import { createStatusController } from "../controllers/status.controller";

export function createStatusRoutes(services: ApiServices, auth: RequestHandler): Router {
  const router = Router();
  const controller = createStatusController(services);

  // Public endpoints (health checks, metrics scraping)
  router.get("/health", controller.getHealth);
  router.get("/metrics", controller.getMetrics);

  // Protected endpoint
  router.get("/status", auth, controller.getStatus);

  return router;
}
