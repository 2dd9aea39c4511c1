import { resolveServiceConfig } from "./config";
import { describeError } from "./errors";
import { ExpiryMonitor } from "./lease/monitor";
import { LeasePool } from "./lease/pool";
import { createConsoleLogger } from "./logger";
import { createApp } from "./server";
import { RedisLeaseStore } from "./store/redisStore";

async function main(): Promise<void> {
  const config = resolveServiceConfig();
  const logger = createConsoleLogger();

  const store = new RedisLeaseStore({
    host: config.redis.host,
    port: config.redis.port,
    db: config.redis.db,
    logger,
  });
  if (config.redis.configureKeyspaceEvents) {
    await store.enableKeyspaceEvents();
  }

  const pool = new LeasePool({ store, config: config.lease, logger });
  const monitor = new ExpiryMonitor({
    store,
    pool,
    logger: createConsoleLogger("[node-lease:monitor]"),
    backoffMs: config.monitorBackoffMs,
  });

  const app = createApp({ pool, logger });
  const server = app.listen(config.port, () => {
    logger.info(`listening on http://localhost:${config.port}`);
  });
  monitor.start();

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down`);

    await monitor.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await store.close();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error(`Shutdown failed: ${describeError(err)}`);
        process.exitCode = 1;
      });
    });
  }
}

main().catch((err: unknown) => {
  console.error("[node-lease] failed to start:", err);
  process.exit(1);
});
