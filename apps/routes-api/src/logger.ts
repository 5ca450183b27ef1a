import pino, { Logger } from "pino";

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

/** Pretty output while developing; NODE_ENV unset counts as development, as in loadConfig. */
export const isPrettyEnv = (nodeEnv: string | undefined): boolean =>
  (nodeEnv || "development") === "development";

// ─── Logger ───────────────────────────────────────────────
// JSON lines in production, pino-pretty while developing.
export const createLogger = ({ level = "info", pretty = false }: LoggerOptions = {}): Logger =>
  pino({
    level,
    transport: pretty ? { target: require.resolve("pino-pretty") } : undefined,
  });

export const logger = createLogger({
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === "test" ? "silent" : "info"),
  pretty: isPrettyEnv(process.env.NODE_ENV),
});
