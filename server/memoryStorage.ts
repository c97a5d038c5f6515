// server/memoryStorage.ts
import type { CheckInStore } from "./storage.js";
import type { CheckIn, NewCheckIn } from "./types.js";

function byTimestampThenId(a: CheckIn, b: CheckIn) {
  if (a.timestamp < b.timestamp) return -1;
  if (a.timestamp > b.timestamp) return 1;
  return a.id - b.id;
}

/**
 * In-process store for local runs and tests.
 *
 * `create` assigns the id and appends in one synchronous step, so concurrent
 * callers can't collide. Records are frozen and lists are fresh arrays.
 */
export class MemoryCheckInStore implements CheckInStore {
  private readonly records: CheckIn[] = [];
  private nextId = 1;

  async ensureSchema() {}

  async create(record: NewCheckIn) {
    const checkin: CheckIn = Object.freeze({
      id: this.nextId++,
      userId: record.userId,
      goalName: record.goalName,
      status: record.status,
      timestamp: record.timestamp,
    });
    this.records.push(checkin);
    return checkin;
  }

  async listByUser(userId: number) {
    return this.records.filter((r) => r.userId === userId).sort(byTimestampThenId);
  }

  async listByGoal(goalName: string) {
    return this.records.filter((r) => r.goalName === goalName).sort(byTimestampThenId);
  }

  async close() {}
}
