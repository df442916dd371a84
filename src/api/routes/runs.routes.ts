/**
 * Run Routes
 *
 * Start a registration run from JSON rows and look runs up.
 * Mounted behind the auth middleware.
 */
import { Router } from "express";
import { ApiServices } from "../server";
import { createRunsController } from "../controllers/runs.controller";

export function createRunsRoutes(services: ApiServices): Router {
  const router = Router();
  const controller = createRunsController(services);

  router.get("/", controller.listRuns);
  router.post("/", controller.startRun);
  router.get("/:id", controller.getRun);

  return router;
}
