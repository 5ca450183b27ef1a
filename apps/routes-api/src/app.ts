import express, { Express } from "express";
import compression from "compression";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import { Logger } from "pino";
import { RateLimitConfig } from "./config";
import { logger as defaultLogger } from "./logger";
import { errorHandler, notFound, requestLogger } from "./middleware";
import { RouteService } from "./route.service";
import { createRouter } from "./routes";

export interface AppOptions {
  service: RouteService;
  logger?: Logger;
  /** Omitted, or max 0, means no rate limiting. */
  rateLimit?: RateLimitConfig;
}

export const buildApp = ({ service, logger = defaultLogger, rateLimit: limits }: AppOptions): Express => {
  const app = express();

  app.use(helmet());
  app.use(compression());
  app.use(express.json({ limit: "100kb" }));

  // Rate limit per IP
  if (limits && limits.max > 0) {
    app.use(
      rateLimit({
        windowMs: limits.windowMs,
        limit: limits.max,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
  }

  app.use(requestLogger(logger));
  app.use(createRouter(service));

  app.use(notFound);
  app.use(errorHandler(logger));

  return app;
};
