// server/storage.ts
// Check-in persistence: the store contract plus the Postgres implementation.

import { Pool } from "pg";
import { z } from "zod";
import type { Config } from "./config.js";
import { StorageError } from "./errors.js";
import { MemoryCheckInStore } from "./memoryStorage.js";
import { CHECKIN_STATUSES, type CheckIn, type NewCheckIn } from "./types.js";

/**
 * Append-only store of check-ins.
 *
 * Lists are ordered by timestamp ascending, ties broken by id ascending.
 * Any backend failure is surfaced as a StorageError.
 */
export interface CheckInStore {
  ensureSchema(): Promise<void>;
  create(record: NewCheckIn): Promise<CheckIn>;
  listByUser(userId: number): Promise<CheckIn[]>;
  listByGoal(goalName: string): Promise<CheckIn[]>;
  close(): Promise<void>;
}

/** Runs one SQL statement and returns its rows. */
export type QueryFn = (text: string, params?: unknown[]) => Promise<unknown[]>;

const CheckInRowSchema = z.object({
  id: z.coerce.number().int(),
  user_id: z.coerce.number().int(),
  goal_name: z.string(),
  status: z.enum(CHECKIN_STATUSES),
  ts: z.string(),
});

function rowToCheckIn(row: unknown): CheckIn {
  const parsed = CheckInRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new StorageError("Malformed check-in row returned by database", { cause: parsed.error });
  }
  const r = parsed.data;
  return { id: r.id, userId: r.user_id, goalName: r.goal_name, status: r.status, timestamp: r.ts };
}

/**
 * Postgres storage
 *
 * Timestamps are kept as normalized ISO text, so text order is time order.
 * SERIAL ids are assigned atomically by the database.
 */
export class PostgresCheckInStore implements CheckInStore {
  constructor(
    private readonly q: QueryFn,
    private readonly onClose: () => Promise<void> = async () => {},
  ) {}

  static fromUrl(databaseUrl: string, opts: { ssl: boolean }) {
    const pool = new Pool({
      connectionString: databaseUrl,
      ssl: opts.ssl ? { rejectUnauthorized: false } : undefined,
    });
    // idle clients can fail outside of a query; without a listener that kills the process
    pool.on("error", (err) => console.error("Postgres pool error:", err));

    return new PostgresCheckInStore(poolQuery(pool), () => pool.end());
  }

  /**
   * pg does NOT allow multiple SQL commands in one prepared statement,
   * so the schema is applied one statement at a time.
   */
  async ensureSchema() {
    const statements = [
      `
      CREATE TABLE IF NOT EXISTS checkins (
        id SERIAL PRIMARY KEY,
        user_id BIGINT NOT NULL,
        goal_name TEXT NOT NULL,
        status TEXT NOT NULL CHECK (status IN ('completed', 'missed')),
        ts TEXT COLLATE "C" NOT NULL
      )`,
      `CREATE INDEX IF NOT EXISTS idx_checkins_user_ts ON checkins(user_id, ts, id)`,
      `CREATE INDEX IF NOT EXISTS idx_checkins_goal_ts ON checkins(goal_name, ts, id)`,
    ];
    for (const sql of statements) {
      await this.q(sql.trim());
    }
  }

  async create(record: NewCheckIn) {
    const rows = await this.q(
      `INSERT INTO checkins (user_id, goal_name, status, ts)
       VALUES ($1, $2, $3, $4)
       RETURNING id, user_id, goal_name, status, ts`,
      [record.userId, record.goalName, record.status, record.timestamp],
    );
    if (rows.length !== 1) {
      throw new StorageError(`Insert returned ${rows.length} rows`);
    }
    return rowToCheckIn(rows[0]);
  }

  async listByUser(userId: number) {
    const rows = await this.q(
      "SELECT id, user_id, goal_name, status, ts FROM checkins WHERE user_id = $1 ORDER BY ts ASC, id ASC",
      [userId],
    );
    return rows.map(rowToCheckIn);
  }

  async listByGoal(goalName: string) {
    const rows = await this.q(
      "SELECT id, user_id, goal_name, status, ts FROM checkins WHERE goal_name = $1 ORDER BY ts ASC, id ASC",
      [goalName],
    );
    return rows.map(rowToCheckIn);
  }

  async close() {
    await this.onClose();
  }
}

/** Adapts a pool to QueryFn, turning driver failures into StorageError. */
export function poolQuery(pool: Pool): QueryFn {
  return async (text, params = []) => {
    try {
      const res = await pool.query(text, params);
      return res.rows;
    } catch (err) {
      throw new StorageError("Database query failed", { cause: err });
    }
  };
}

export function createStore(storage: Config["storage"]): CheckInStore {
  if (storage.driver === "memory") return new MemoryCheckInStore();
  return PostgresCheckInStore.fromUrl(storage.databaseUrl, { ssl: storage.ssl });
}
