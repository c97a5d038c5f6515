// server/routes.ts
import type { Express, Request, Response, NextFunction } from "express";
import { z } from "zod";
import type { CheckInService } from "./checkins.js";
import { AppError, ValidationError } from "./errors.js";
import { toWire } from "./types.js";

/** Async route wrapper */
function wrap(fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Only the shape is checked here. Missing goal_name/status fall through as ""
 * so the service reports them with its own error kinds.
 */
const SubmitCheckInSchema = z.object({
  user_id: z.number(),
  goal_name: z.string().default(""),
  status: z.string().default(""),
  timestamp: z.string().nullish(),
});

// decimal digits only; Number() alone would take "0x10", "1e1" or " 16 "
const UserParamsSchema = z.object({
  userId: z
    .string()
    .regex(/^-?\d+$/, "userId must be a decimal integer")
    .transform(Number)
    .refine(Number.isSafeInteger, "userId is out of range"),
});

const GoalParamsSchema = z.object({
  goalName: z.string(),
});

/** Client errors raised by express itself (e.g. malformed JSON body). */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null || !("status" in err)) return null;
  const status = err.status;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

export function registerRoutes(app: Express, service: CheckInService) {
  app.get("/", (_req, res) => res.json({ message: "Check-in service running" }));
  app.get("/health", (_req, res) => res.json({ status: "ok" }));

  // -----------------------------
  // Check-ins
  // -----------------------------
  app.post(
    "/api/checkins",
    wrap(async (req, res) => {
      const parsed = SubmitCheckInSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ error: "invalid_request", details: parsed.error.flatten() });

      const checkin = await service.submit({
        userId: parsed.data.user_id,
        goalName: parsed.data.goal_name,
        status: parsed.data.status,
        timestamp: parsed.data.timestamp ?? undefined,
      });

      return res.status(201).json({ checkin: toWire(checkin) });
    }),
  );

  app.get(
    "/api/users/:userId/checkins",
    wrap(async (req, res) => {
      const parsed = UserParamsSchema.safeParse(req.params);
      if (!parsed.success) return res.status(400).json({ error: "invalid_request", details: parsed.error.flatten() });

      const checkins = await service.history(parsed.data.userId);
      return res.json({ checkins: checkins.map(toWire) });
    }),
  );

  // -----------------------------
  // Goals
  // -----------------------------
  app.get(
    "/api/goals/:goalName/checkins",
    wrap(async (req, res) => {
      const parsed = GoalParamsSchema.safeParse(req.params);
      if (!parsed.success) return res.status(400).json({ error: "invalid_request", details: parsed.error.flatten() });

      const checkins = await service.listByGoal(parsed.data.goalName);
      return res.json({ checkins: checkins.map(toWire) });
    }),
  );

  app.get(
    "/api/goals/:goalName/completion",
    wrap(async (req, res) => {
      const parsed = GoalParamsSchema.safeParse(req.params);
      if (!parsed.success) return res.status(400).json({ error: "invalid_request", details: parsed.error.flatten() });

      const s = await service.goalSummary(parsed.data.goalName);
      return res.json({
        goal_name: s.goalName,
        total: s.total,
        completed: s.completed,
        missed: s.missed,
        completion_ratio: s.completionRatio,
      });
    }),
  );

  // -----------------------------
  // Error handler
  // -----------------------------
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ValidationError) {
      return res.status(err.httpStatus).json({ error: err.kind, message: err.message });
    }
    if (err instanceof AppError) {
      console.error("API error:", err);
      return res.status(err.httpStatus).json({ error: err.code });
    }
    const status = clientErrorStatus(err);
    if (status !== null) {
      return res.status(status).json({ error: "invalid_request" });
    }
    console.error("API error:", err);
    return res.status(500).json({ error: "internal_error" });
  });
}
