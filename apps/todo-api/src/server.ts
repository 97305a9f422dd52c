import "dotenv/config";
import type { Server } from "http";
import { listen, prepareService } from "./bootstrap";
import { loadConfig } from "./config";
import { PgDatabase, createPool } from "./db";
import { logger } from "./logger";

let db: PgDatabase | undefined;
let server: Server | undefined;

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  db = new PgDatabase(createPool(config.db));

  const app = await prepareService(db, config.migrationsDir);
  server = await listen(app, config.port);
}

// ─── Graceful Shutdown ────────────────────────────────────
const shutdown = (signal: string) => {
  logger.info(`${signal} — shutting down`);
  setTimeout(() => process.exit(1), 10_000).unref();
  const closeDb = () =>
    (db ? db.close() : Promise.resolve()).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "Closing the pool failed");
        process.exit(1);
      },
    );
  if (server) server.close(closeDb);
  else void closeDb();
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

// The only place that turns a startup failure into an exit
main().catch(async (err: unknown) => {
  logger.fatal({ err }, "Startup failed");
  if (db) {
    await db.close().catch((closeErr: unknown) => logger.error({ err: closeErr }, "Closing the pool failed"));
  }
  process.exit(1);
});
