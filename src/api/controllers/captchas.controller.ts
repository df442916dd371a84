/**
 * Captchas Controller
 *
 * Lets an operator see and answer pending manual captchas over HTTP.
 * Answers with a day label and row index go to that exact task; without
 * them the channel's oldest task is answered, as with a plain chat reply.
 */
import { NextFunction, Request, Response } from "express";
import Joi from "joi";
import { ApiServices } from "../server";
import { PendingTaskKey } from "../../shared/types/registration.types";

interface AnswerBody {
  channelId: string;
  answer: string;
  dayLabel?: string;
  rowIndex?: number;
}

const keySchema = Joi.object<PendingTaskKey>({
  channelId: Joi.string().trim().min(1).required(),
  dayLabel: Joi.string().trim().min(1).required(),
  rowIndex: Joi.number().integer().min(0).required(),
});

const answerSchema = Joi.object<AnswerBody>({
  channelId: Joi.string().trim().min(1).required(),
  answer: Joi.string().trim().min(1).required(),
  dayLabel: Joi.string().trim().min(1),
  rowIndex: Joi.number().integer().min(0),
}).and("dayLabel", "rowIndex");

export function createCaptchasController(services: ApiServices) {
  return {
    /** GET /api/registration/v1/captchas */
    listPending(_req: Request, res: Response): void {
      res.json({ pending: services.pendingStore.list() });
    },

    /** GET /api/registration/v1/captchas/image?channelId&dayLabel&rowIndex */
    getImage(req: Request, res: Response): void {
      const { error, value } = keySchema.validate(req.query, { abortEarly: false });
      if (error || !value) {
        res.status(400).json({
          error: "Invalid request",
          details: error?.details.map((d) => d.message) ?? [],
        });
        return;
      }

      const task = services.pendingStore.get(value);
      if (!task) {
        res.status(404).json({ error: "No pending captcha for this row" });
        return;
      }
      res.type("png").send(task.image);
    },

    /** POST /api/registration/v1/captchas/answer */
    async answer(req: Request, res: Response, next: NextFunction): Promise<void> {
      const { error, value } = answerSchema.validate(req.body, { abortEarly: false });
      if (error || !value) {
        res.status(400).json({
          error: "Invalid request",
          details: error?.details.map((d) => d.message) ?? [],
        });
        return;
      }

      try {
        const result =
          value.dayLabel !== undefined && value.rowIndex !== undefined
            ? await services.resolver.resolveByKey(
                { channelId: value.channelId, dayLabel: value.dayLabel, rowIndex: value.rowIndex },
                value.answer
              )
            : await services.resolver.onTextReply(value.channelId, value.answer, null);

        switch (result.kind) {
          case "NO_PENDING_TASK":
            res.status(404).json({ error: "No pending captcha" });
            return;
          case "EMPTY_ANSWER":
            res.status(400).json({ error: "Empty answer" });
            return;
          case "SUBMIT_FAILED":
            res.status(502).json({ key: result.key, error: result.error });
            return;
          case "SUBMITTED":
            res.json({ key: result.key, outcome: result.outcome, response: result.response });
            return;
        }
      } catch (err) {
        next(err);
      }
    },
  };
}
