export const CHECKIN_STATUSES = ["completed", "missed"] as const;
export type CheckInStatus = (typeof CHECKIN_STATUSES)[number];

export type CheckIn = {
  id: number;
  userId: number;
  goalName: string;
  status: CheckInStatus;
  timestamp: string; // ISO timestamp (UTC)
};

export type NewCheckIn = Omit<CheckIn, "id">;

export type GoalSummary = {
  goalName: string;
  total: number;
  completed: number;
  missed: number;
  completionRatio: number;
};

/** JSON shape sent to clients */
export type CheckInWire = {
  id: number;
  user_id: number;
  goal_name: string;
  status: CheckInStatus;
  timestamp: string;
};

export function toWire(c: CheckIn): CheckInWire {
  return {
    id: c.id,
    user_id: c.userId,
    goal_name: c.goalName,
    status: c.status,
    timestamp: c.timestamp,
  };
}

export function isCheckInStatus(v: unknown): v is CheckInStatus {
  return v === "completed" || v === "missed";
}
