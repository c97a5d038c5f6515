// server/config.ts
import { z } from "zod";

const DEFAULT_ORIGINS = "http://localhost:5173,http://127.0.0.1:5173";

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    STORAGE_DRIVER: z.enum(["postgres", "memory"]).default("postgres"),
    DATABASE_URL: z.string().trim().min(1).optional(),
    PGSSLMODE: z.string().optional(),
    ALLOWED_ORIGINS: z.string().default(DEFAULT_ORIGINS),
    RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(300),
    LOG_FORMAT: z.string().trim().min(1).default("dev"),
  })
  .refine((env) => env.STORAGE_DRIVER !== "postgres" || !!env.DATABASE_URL, {
    message: "DATABASE_URL is not set. Set it, or use STORAGE_DRIVER=memory.",
    path: ["DATABASE_URL"],
  });

export type Config = {
  port: number;
  storage: { driver: "memory" } | { driver: "postgres"; databaseUrl: string; ssl: boolean };
  allowedOrigins: string[];
  rateLimitMax: number;
  /** morgan format, or null to disable request logging */
  logFormat: string | null;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Reads configuration from env.
 *
 * SSL is on when PGSSLMODE=require or the URL itself carries sslmode=require.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`);
  }
  const e = parsed.data;

  let storage: Config["storage"] = { driver: "memory" };
  if (e.STORAGE_DRIVER === "postgres" && e.DATABASE_URL) {
    const ssl =
      (e.PGSSLMODE || "").toLowerCase() === "require" || e.DATABASE_URL.toLowerCase().includes("sslmode=require");
    storage = { driver: "postgres", databaseUrl: e.DATABASE_URL, ssl };
  }

  return {
    port: e.PORT,
    storage,
    allowedOrigins: e.ALLOWED_ORIGINS.split(",")
      .map((s) => s.trim())
      .filter(Boolean),
    rateLimitMax: e.RATE_LIMIT_MAX,
    logFormat: e.LOG_FORMAT === "off" ? null : e.LOG_FORMAT,
  };
}
