/**
 * Error Middleware
 *
 * Global error handler for the admin API.
 * Roster problems are the caller's fault (400); anything else is a 500.
 */
import { Request, Response, NextFunction } from "express";
import config from "../../config";
import { logger } from "../../monitoring/logger";
import { RosterFormatError } from "../../shared/errors/registration.errors";

export function errorMiddleware(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof RosterFormatError) {
    res.status(400).json({ error: "Invalid roster", problems: err.problems });
    return;
  }

  logger.error(
    {
      error: err.message,
      stack: err.stack,
      method: req.method,
      path: req.path,
    },
    "Unhandled API error"
  );

  res.status(500).json({
    error: "Internal Server Error",
    message: config.env === "development" ? err.message : undefined,
  });
}
