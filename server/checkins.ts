// server/checkins.ts
import { z } from "zod";
import { ValidationError } from "./errors.js";
import type { CheckInStore } from "./storage.js";
import { isCheckInStatus, type CheckIn, type GoalSummary } from "./types.js";

export type SubmitCheckInInput = {
  userId: number;
  goalName: string;
  status: string;
  timestamp?: Date | string;
};

export type CheckInServiceOptions = {
  /** Clock used when a submission carries no timestamp. */
  now?: () => Date;
};

/** ISO-8601 date-time with a real calendar date and an explicit `Z` or offset. */
export const IsoTimestampSchema = z.string().datetime({ offset: true });

// Four-digit years only: outside that range toISOString() changes shape and
// text ordering stops matching time ordering.
const MIN_TIME = Date.parse("0000-01-01T00:00:00.000Z");
const MAX_TIME = Date.parse("9999-12-31T23:59:59.999Z");

function invalidTimestamp() {
  return new ValidationError(
    "invalid_timestamp",
    "timestamp must be an ISO-8601 date-time with Z or an offset, between years 0000 and 9999",
  );
}

function normalizeTimestamp(value: Date | string): string {
  if (typeof value === "string" && !IsoTimestampSchema.safeParse(value).success) {
    throw invalidTimestamp();
  }
  const d = value instanceof Date ? value : new Date(value);
  const t = d.getTime();
  if (!Number.isFinite(t) || t < MIN_TIME || t > MAX_TIME) {
    throw invalidTimestamp();
  }
  return d.toISOString();
}

/**
 * Validates check-in submissions and answers the read views over a store.
 * Holds no state beyond the injected store and clock.
 */
export class CheckInService {
  private readonly now: () => Date;

  constructor(
    private readonly store: CheckInStore,
    options: CheckInServiceOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Validate and persist one check-in.
   *
   * Every rule is checked before the store is touched; store failures
   * propagate unchanged.
   */
  async submit(input: SubmitCheckInInput): Promise<CheckIn> {
    if (!Number.isSafeInteger(input.userId)) {
      throw new ValidationError("invalid_user_id", "user_id must be an integer");
    }
    if (typeof input.goalName !== "string" || input.goalName.trim() === "") {
      throw new ValidationError("empty_goal_name", "goal_name must not be empty");
    }
    const status = input.status;
    if (!isCheckInStatus(status)) {
      throw new ValidationError("invalid_status", 'status must be "completed" or "missed"');
    }
    const timestamp = normalizeTimestamp(input.timestamp ?? this.now());

    return this.store.create({
      userId: input.userId,
      goalName: input.goalName,
      status,
      timestamp,
    });
  }

  history(userId: number): Promise<CheckIn[]> {
    return this.store.listByUser(userId);
  }

  listByGoal(goalName: string): Promise<CheckIn[]> {
    return this.store.listByGoal(goalName);
  }

  /** completed / total for the goal; 0 when the goal has no check-ins. */
  async completionRatio(goalName: string): Promise<number> {
    const summary = await this.goalSummary(goalName);
    return summary.completionRatio;
  }

  async goalSummary(goalName: string): Promise<GoalSummary> {
    const rows = await this.store.listByGoal(goalName);
    const completed = rows.filter((r) => r.status === "completed").length;
    const total = rows.length;
    return {
      goalName,
      total,
      completed,
      missed: total - completed,
      completionRatio: total === 0 ? 0 : completed / total,
    };
  }
}
