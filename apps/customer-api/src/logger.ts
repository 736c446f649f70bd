import pino from "pino";

// ─── Logger ───────────────────────────────────────────────
// Raw JSON in production for log aggregators, pretty output
// while developing, nothing at all under Jest unless asked for.
const env = process.env.NODE_ENV;

export const logger = pino({
  level     : process.env.LOG_LEVEL || (env === "test" ? "silent" : "info"),
  transport : env !== "production" && env !== "test"
                ? { target: require.resolve("pino-pretty") }
                : undefined,
});
