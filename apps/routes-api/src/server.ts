import { Server } from "http";
import { Express } from "express";
import { Logger } from "pino";
import { buildApp } from "./app";
import { AppConfig } from "./config";
import { createPool, ensureSchema } from "./db";
import { PgRouteRepository } from "./route.repository";
import { RouteService } from "./route.service";

/** Resolves once the port is bound; rejects on a bind failure such as EADDRINUSE. */
export const listen = (app: Express, port: number): Promise<Server> =>
  new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      resolve(server);
    });
  });

/** Boots one HTTP worker: pool, schema, express app, graceful shutdown. */
export const startServer = async (config: AppConfig, logger: Logger): Promise<Server> => {
  const pool = createPool(config.db, logger);
  await ensureSchema(pool);

  const service = new RouteService(new PgRouteRepository(pool), {
    allowReset: config.enableReset,
  });
  const app = buildApp({ service, logger, rateLimit: config.rateLimit });

  let server: Server;
  try {
    server = await listen(app, config.port);
  } catch (err) {
    await pool.end();
    throw err;
  }
  logger.info(`Worker ${process.pid} listening on :${config.port}`);

  // ─── Graceful Shutdown ──────────────────────────────────
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down worker ${process.pid}`);
    server.close(() => {
      pool.end().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, "Failed to close the database pool");
          process.exit(1);
        },
      );
    });
    setTimeout(() => process.exit(1), 10_000).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  return server;
};
