import { Logger, StoreUnavailableError } from "@autoscout/shared-utils";
import { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { CriteriaValidationError } from "../core/criteria";
import { InvalidStatusTransitionError, NotificationNotFoundError } from "../core/status";

export const schemas = {
  alertTest: z.object({
    criteria: z.unknown(),
  }),
  alertCreate: z.object({
    userId: z.string().trim().min(1),
    name: z.string().trim().min(1).max(200),
    criteria: z.unknown(),
    frequency: z.enum(["immediate", "daily", "weekly"]).default("immediate"),
    maxNotificationsPerDay: z.number().int().positive().default(5),
    isActive: z.boolean().default(true),
  }),
  alertUpdate: z.object({
    name: z.string().trim().min(1).max(200).optional(),
    criteria: z.unknown().optional(),
    frequency: z.enum(["immediate", "daily", "weekly"]).optional(),
    maxNotificationsPerDay: z.number().int().positive().optional(),
    isActive: z.boolean().optional(),
  }),
  alertListQuery: z.object({
    userId: z.string().trim().min(1).optional(),
    activeOnly: z
      .enum(["true", "false"])
      .default("false")
      .transform((v) => v === "true"),
  }),
  statusUpdate: z.object({
    status: z.enum(["sent", "delivered", "failed"]),
    errorMessage: z.string().optional(),
    retryCount: z.number().int().nonnegative().optional(),
    occurredAt: z.string().datetime().optional(),
  }),
  markRead: z.object({
    isRead: z.boolean().default(true),
  }),
  listQuery: z.object({
    limit: z.coerce.number().int().positive().max(500).default(50),
  }),
  priceHistoryQuery: z.object({
    days: z.coerce.number().int().min(1).max(365).optional(),
  }),
};

export type AlertTestBody = z.infer<typeof schemas.alertTest>;
export type AlertCreateBody = z.infer<typeof schemas.alertCreate>;
export type AlertUpdateBody = z.infer<typeof schemas.alertUpdate>;
export type StatusUpdateBody = z.infer<typeof schemas.statusUpdate>;
export type MarkReadBody = z.infer<typeof schemas.markRead>;

function issuesOf(error: z.ZodError) {
  return error.errors.map((e) => ({ path: e.path.join("."), message: e.message }));
}

export function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      res.status(400).json({ error: "Validation error", errors: issuesOf(result.error) });
      return;
    }
    req.body = result.data;
    next();
  };
}

/**
 * Maps domain errors onto status codes; anything unknown is a 500
 */
export function sendError(res: Response, error: unknown, logger: Logger): void {
  if (error instanceof CriteriaValidationError) {
    res.status(400).json({
      error: "Invalid criteria",
      errors: error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
  } else if (error instanceof z.ZodError) {
    res.status(400).json({ error: "Validation error", errors: issuesOf(error) });
  } else if (error instanceof NotificationNotFoundError) {
    res.status(404).json({ error: error.message });
  } else if (error instanceof InvalidStatusTransitionError) {
    res.status(409).json({ error: error.message });
  } else if (error instanceof StoreUnavailableError) {
    logger.error("Store unavailable:", error.message);
    res.status(503).json({ error: "Service unavailable" });
  } else {
    logger.error("Unhandled error:", error);
    res.status(500).json({ error: "Internal server error" });
  }
}

export function notFoundHandler() {
  return (req: Request, res: Response) => {
    res.status(404).json({ error: `Route ${req.method} ${req.url} not found` });
  };
}
