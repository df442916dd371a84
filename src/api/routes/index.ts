/**
 * Route Aggregator
 *
 * Mounts all API routes under the /api/registration/v1 prefix.
 */
import { Router } from "express";
import { ApiServices } from "../server";
import { createAuthMiddleware } from "../middlewares/auth.middleware";
import { createStatusRoutes } from "./status.routes";
import { createRunsRoutes } from "./runs.routes";
import { createCaptchasRoutes } from "./captchas.routes";

export function createRoutes(services: ApiServices): Router {
  const router = Router();
  const auth = createAuthMiddleware(services.serviceSecret);

  router.use("/runs", auth, createRunsRoutes(services));
  router.use("/captchas", auth, createCaptchasRoutes(services));
  router.use("/", createStatusRoutes(services, auth));

  return router;
}
