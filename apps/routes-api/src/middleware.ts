import { randomUUID } from "crypto";
import { NextFunction, Request, Response } from "express";
import { Logger } from "pino";
import { ZodError } from "zod";
import { AppError, ValidationError } from "./errors";

// ─── Request logging ──────────────────────────────────────
// Reuses the caller's x-request-id when present so a request can be traced across services.
export const requestLogger =
  (logger: Logger) => (req: Request, res: Response, next: NextFunction) => {
    const header = req.headers["x-request-id"];
    const requestId = typeof header === "string" && header ? header : randomUUID();
    const start = process.hrtime.bigint();

    res.setHeader("x-request-id", requestId);
    res.on("finish", () => {
      logger.info({
        requestId,
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        durationMs: Number(process.hrtime.bigint() - start) / 1_000_000,
      });
    });

    next();
  };

export const notFound = (_req: Request, res: Response) => {
  res.status(404).json({ error: "Not found" });
};

// express.json() failures carry an http status and a `type`
const isBodyParserError = (err: unknown): err is Error & { status: number; type: string } =>
  err instanceof Error &&
  "status" in err &&
  typeof err.status === "number" &&
  "type" in err &&
  typeof err.type === "string";

// ─── Error handler ────────────────────────────────────────
export const errorHandler =
  (logger: Logger) => (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      res.status(422).json(ValidationError.fromZod(err).toJSON());
      return;
    }
    if (err instanceof AppError) {
      res.status(err.statusCode).json(err.toJSON());
      return;
    }
    if (isBodyParserError(err)) {
      const message = err.type === "entity.parse.failed" ? "Malformed JSON body" : err.message;
      res.status(err.status).json({ error: message });
      return;
    }

    logger.error({ err, method: req.method, url: req.originalUrl }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" });
  };
