import { Pool, types } from "pg";
import { DbConfig } from "./config";
import { logger } from "./logger";

// DATE columns stay "YYYY-MM-DD" strings. The default parser builds a
// Date at local midnight, which shifts the day under non-UTC zones.
types.setTypeParser(types.builtins.DATE, (value: string) => value);

// ─── Database Pool ────────────────────────────────────────
// Every handler runs a single query, so a small pool recycles fast.
export const createPool = (config: DbConfig): Pool => {
  const pool = new Pool({
    ...config,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 3_000,
  });

  pool.on("error", (err) => logger.error({ err }, "Idle pool client error"));
  return pool;
};

export const CUSTOMERS_TABLE = `
  CREATE TABLE IF NOT EXISTS customers (
    id           SERIAL PRIMARY KEY,
    name         VARCHAR(63)  NOT NULL,
    address      VARCHAR(255) NOT NULL,
    email        VARCHAR(255) NOT NULL,
    phone_number VARCHAR(32)  NOT NULL,
    member_since DATE         NOT NULL,
    status       VARCHAR(32)  NOT NULL
  )`;

export const initSchema = async (pool: Pool): Promise<void> => {
  await pool.query(CUSTOMERS_TABLE);
  logger.info("customers table ready");
};
