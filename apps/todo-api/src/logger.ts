import pino from "pino";

const env = process.env.NODE_ENV || "development";

// ─── Logger ───────────────────────────────────────────────
// JSON to stdout; pretty-printed only on a developer machine
export const logger = pino({
  level     : process.env.LOG_LEVEL || (env === "test" ? "silent" : "info"),
  transport : env === "development"
                ? { target: require.resolve("pino-pretty") }
                : undefined,
});
