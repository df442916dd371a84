/**
 * Captcha Routes
 *
 * Pending manual captchas: list, fetch the image, answer.
 */
import { Router } from "express";
import { ApiServices } from "../server";
import { createCaptchasController } from "../controllers/captchas.controller";

export function createCaptchasRoutes(services: ApiServices): Router {
  const router = Router();
  const controller = createCaptchasController(services);

  router.get("/", controller.listPending);
  router.get("/image", controller.getImage);
  router.post("/answer", controller.answer);

  return router;
}
