import type { Server } from "http";
import type { Express } from "express";
import { createApp } from "./app";
import type { Database } from "./db";
import { StartupError, errorMessage } from "./errors";
import { logger } from "./logger";
import { migrate } from "./migrate";
import { TodoRepository } from "./todoRepository";

/**
 * Everything between "pool created" and "ready to listen": checks the
 * connection, brings the schema up to date and builds the app.
 * Rejects with a StartupError; never exits the process itself.
 */
export async function prepareService(db: Database, migrationsDir: string): Promise<Express> {
  try {
    await db.query("SELECT 1");
  } catch (err) {
    throw new StartupError("database", `Cannot connect to database: ${errorMessage(err)}`, { cause: err });
  }

  await migrate(db, migrationsDir);

  return createApp({ todos: new TodoRepository(db) });
}

/** Binds once; a taken port is fatal, there is no fallback. */
export function listen(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once("listening", () => {
      logger.info(`Server listening on port ${port}`);
      resolve(server);
    });
    server.once("error", (err) => {
      reject(new StartupError("listen", `Cannot listen on port ${port}: ${err.message}`, { cause: err }));
    });
  });
}
