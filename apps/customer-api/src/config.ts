import dotenv from "dotenv";

// ─── Config ───────────────────────────────────────────────
// .env is for local development; in production the environment
// is set by the deployment.
if (process.env.NODE_ENV !== "production") {
  dotenv.config();
}

export interface DbConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
}

export interface AppConfig {
  port: number;
  rateLimitPerMinute: number;
  db: DbConfig;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => ({
  port: Number(env.PORT) || 3000,
  rateLimitPerMinute: Number(env.RATE_LIMIT_PER_MINUTE) || 5_000,
  db: {
    host:     env.DB_HOST     || "localhost",
    port:     Number(env.DB_PORT) || 5432,
    database: env.DB_NAME     || "postgres",
    user:     env.DB_USER     || "postgres",
    password: env.DB_PASSWORD || "postgres",
    max:      Number(env.DB_POOL_MAX) || 10,
  },
});
