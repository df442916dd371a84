/**
 * Auth Middleware
 *
 * Validates admin API callers using a shared secret.
 * Operators and scripts send it as a bearer token.
 */
import { Request, Response, NextFunction, RequestHandler } from "express";
import config from "../../config";
import { logger } from "../../monitoring/logger";

/**
 * Validate the service secret from the Authorization header.
 * Expected format: Bearer <service-secret>
 */
export function createAuthMiddleware(secret: string = config.serviceSecret): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      logger.warn({ ip: req.ip, path: req.path }, "Missing or invalid Authorization header");
      res.status(401).json({ error: "Unauthorized" });
      return;
    }

    if (authHeader.substring(7) !== secret) {
      logger.warn({ ip: req.ip, path: req.path }, "Invalid service secret");
      res.status(403).json({ error: "Forbidden" });
      return;
    }

    next();
  };
}
