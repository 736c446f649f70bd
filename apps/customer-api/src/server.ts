/**
 * Customer Service REST API
 *
 * Create, read, update, delete and suspend customers stored in
 * PostgreSQL. Configuration comes from the environment (see config.ts).
 */

import { loadConfig } from "./config";
import { createApp } from "./app";
import { CustomerRepository } from "./customers";
import { createPool, initSchema } from "./db";
import { logger } from "./logger";

const config = loadConfig();
const pool = createPool(config.db);

const main = async () => {
  await initSchema(pool);

  const app = createApp({
    customers: new CustomerRepository(pool),
    rateLimitPerMinute: config.rateLimitPerMinute,
  });

  const server = app.listen(config.port, () => {
    logger.info(`Customer service listening on :${config.port}`);
  });

  // ─── Graceful Shutdown ────────────────────────────────────
  const shutdown = (signal: string) => {
    logger.info(`${signal} — shutting down`);
    server.close(() => {
      pool
        .end()
        .then(() => process.exit(0))
        .catch((err) => {
          logger.error({ err }, "Pool shutdown failed");
          process.exit(1);
        });
    });
    setTimeout(() => process.exit(1), 10_000).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
};

main().catch((err) => {
  logger.fatal({ err }, "Startup failed");
  pool
    .end()
    .catch((endErr) => logger.error({ err: endErr }, "Pool shutdown failed"))
    .finally(() => process.exit(1));
});
