/**
 * Runs Controller
 *
 * POST /runs takes the same rows a spreadsheet would carry and starts a
 * run for the given channel; the response is sent once the workers are
 * dispatched, not when they finish.
 */
import { NextFunction, Request, Response } from "express";
import Joi from "joi";
import { ApiServices } from "../server";
import { validateRosterRecords, RosterRecord } from "../../roster/roster.parser";
import { logger } from "../../monitoring/logger";

interface StartRunBody {
  channelId: string;
  rows: RosterRecord[];
}

const startRunSchema = Joi.object<StartRunBody>({
  channelId: Joi.string().trim().min(1).required(),
  rows: Joi.array().items(Joi.object().unknown(true)).min(1).required(),
});

export function createRunsController(services: ApiServices) {
  return {
    /** POST /api/registration/v1/runs */
    async startRun(req: Request, res: Response, next: NextFunction): Promise<void> {
      const { error, value } = startRunSchema.validate(req.body, { abortEarly: false });
      if (error || !value) {
        res.status(400).json({
          error: "Invalid request",
          details: error?.details.map((d) => d.message) ?? [],
        });
        return;
      }

      try {
        const rows = validateRosterRecords(value.rows);
        const { run } = await services.service.startRun(value.channelId, rows);
        logger.info({ runId: run.id, channelId: run.channelId }, "Run started via API");
        res.status(202).json(run);
      } catch (err) {
        next(err);
      }
    },

    /** GET /api/registration/v1/runs */
    listRuns(_req: Request, res: Response): void {
      res.json({ runs: services.service.listRuns() });
    },

    /** GET /api/registration/v1/runs/:id */
    getRun(req: Request, res: Response): void {
      const run = services.service.getRun(req.params.id);
      if (!run) {
        res.status(404).json({ error: "Run not found" });
        return;
      }
      res.json(run);
    },
  };
}
