import { z } from "zod";

// ─── Environment ──────────────────────────────────────────
// Every setting has a default so `npm start` works against a local Postgres.
// Empty strings count as unset, same as `process.env.X || default`.

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const port = z.coerce.number().int().min(1).max(65_535);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: port.default(3000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  DB_HOST: z.string().default("localhost"),
  DB_PORT: port.default(5432),
  DB_USER: z.string().default("postgres"),
  DB_PASSWORD: z.string().default("postgres"),
  DB_NAME: z.string().default("routes_db"),
  DB_POOL_MAX: z.coerce.number().int().positive().default(20),

  ENABLE_RESET: flag.optional(),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().min(0).default(5_000),
  WEB_CONCURRENCY: z.coerce.number().int().positive().default(1),
});

export type NodeEnv = z.infer<typeof envSchema>["NODE_ENV"];

export interface DbConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  max: number;
}

export interface RateLimitConfig {
  windowMs: number;
  /** 0 turns the limiter off. */
  max: number;
}

export interface AppConfig {
  env: NodeEnv;
  port: number;
  logLevel: string;
  db: DbConfig;
  enableReset: boolean;
  rateLimit: RateLimitConfig;
  workers: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    db: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      database: e.DB_NAME,
      max: e.DB_POOL_MAX,
    },
    // reset wipes the table, so production must opt in
    enableReset: e.ENABLE_RESET ?? e.NODE_ENV !== "production",
    rateLimit: { windowMs: e.RATE_LIMIT_WINDOW_MS, max: e.RATE_LIMIT_MAX },
    workers: e.WEB_CONCURRENCY,
  };
}
