import cluster from "cluster";
import { loadConfig } from "./config";
import { createLogger, isPrettyEnv, logger as bootLogger } from "./logger";
import { startServer } from "./server";

// ─── Entry point ──────────────────────────────────────────
// WEB_CONCURRENCY > 1 forks one worker per slot; the service keeps no
// in-process state, so workers only share the database.
const main = async (): Promise<void> => {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, pretty: isPrettyEnv(config.env) });

  if (config.workers > 1 && cluster.isPrimary) {
    logger.info(`[Primary] PID ${process.pid}, forking ${config.workers} workers`);
    for (let i = 0; i < config.workers; i++) {
      cluster.fork();
    }

    // replace workers that crash
    cluster.on("exit", (worker, code, signal) => {
      logger.warn(`[Primary] Worker ${worker.process.pid} died (${signal || code}), restarting`);
      cluster.fork();
    });
    return;
  }

  await startServer(config, logger);
};

main().catch((err: unknown) => {
  bootLogger.fatal({ err }, "Failed to start");
  process.exit(1);
});
