/**
 * Status Controller
 *
 * Provides registry status, health check, and metrics endpoints.
 */
import { Request, Response } from "express";
import { ApiServices } from "../server";
import { metrics } from "../../monitoring/metrics.collector";
import { errorMessage } from "../../shared/utils/errors";

export function createStatusController(services: ApiServices) {
  return {
    /**
     * GET /api/registration/v1/status
     *
     * Sale day states, running day tasks and pending manual captchas.
     */
    getStatus(_req: Request, res: Response): void {
      const days = services.registry.snapshot();
      res.json({
        days,
        activeTasks: services.scheduler.activeDays(),
        pendingCaptchas: services.pendingStore.size(),
        rosterChannels: services.service.rosterChannels(),
        timestamp: new Date().toISOString(),
      });
    },

    /**
     * GET /api/registration/v1/health
     *
     * Health check endpoint for load balancers and monitoring.
     */
    async getHealth(_req: Request, res: Response): Promise<void> {
      try {
        const health = await services.health();
        res.status(health.status === "healthy" ? 200 : 503).json(health);
      } catch (error) {
        res.status(503).json({ status: "unhealthy", error: errorMessage(error) });
      }
    },

    /**
     * GET /api/registration/v1/metrics
     *
     * Prometheus-compatible metrics endpoint.
     */
    getMetrics(_req: Request, res: Response): void {
      res.set("Content-Type", "text/plain");
      res.send(metrics.format());
    },
  };
}
