// server/app.ts
import express from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import rateLimit from "express-rate-limit";
import type { CheckInService } from "./checkins.js";
import type { Config } from "./config.js";
import { registerRoutes } from "./routes.js";

export type AppConfig = Pick<Config, "allowedOrigins" | "rateLimitMax" | "logFormat">;

class CorsRejectedError extends Error {
  readonly status = 403;

  constructor(origin: string) {
    super(`CORS blocked: origin not allowed (${origin})`);
    this.name = "CorsRejectedError";
  }
}

function originCheck(allowed: Set<string>) {
  return (origin: string | undefined, cb: (err: Error | null, ok?: boolean) => void) => {
    // server-to-server / curl / same-origin (no Origin header)
    if (!origin) return cb(null, true);
    if (allowed.has(origin)) return cb(null, true);
    return cb(new CorsRejectedError(origin));
  };
}

export function createApp(service: CheckInService, config: AppConfig) {
  const app = express();

  // usually deployed behind a reverse proxy
  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  app.use(
    cors({
      origin: originCheck(new Set(config.allowedOrigins)),
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type"],
    }),
  );
  app.use(helmet({ crossOriginResourcePolicy: { policy: "same-site" } }));
  app.use(express.json({ limit: "1mb" }));
  if (config.logFormat) app.use(morgan(config.logFormat));

  app.use(
    rateLimit({
      windowMs: 15 * 60 * 1000,
      limit: config.rateLimitMax,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: "rate_limited" },
    }),
  );

  registerRoutes(app, service);
  return app;
}
