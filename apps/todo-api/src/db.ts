import { Pool, type PoolClient, type QueryResultRow } from "pg";
import type { DbConfig } from "./config";
import { logger } from "./logger";

export interface Rows<R> {
  rows: R[];
}

/** Anything that can run a statement: the pool itself or a client inside a transaction. */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<Rows<R>>;
  /** Runs a script that may hold several statements. */
  exec(sql: string): Promise<void>;
}

export interface Database extends Queryable {
  transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T>;
  /**
   * Holds a session-level `pg_advisory_lock(key)` while `fn` runs. Other
   * processes asking for the same key wait until it is released.
   */
  withAdvisoryLock<T>(key: number, fn: () => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

// ─── Database Pool ────────────────────────────────────────
// One pool per process, shared by every request handler.
export function createPool(config: DbConfig): Pool {
  const pool = new Pool({
    host:     config.host,
    port:     config.port,
    database: config.database,
    user:     config.user,
    password: config.password,

    max: config.max,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 3_000,
  });

  pool.on("error", (err) => logger.error({ err }, "Idle pool client error"));
  return pool;
}

function clientQueryable(client: PoolClient): Queryable {
  return {
    async query<R extends QueryResultRow>(text: string, values?: unknown[]) {
      const { rows } = await client.query<R>(text, values);
      return { rows };
    },
    async exec(sql: string) {
      await client.query(sql);
    },
  };
}

export class PgDatabase implements Database {
  constructor(private readonly pool: Pool) {}

  async query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<Rows<R>> {
    const { rows } = await this.pool.query<R>(text, values);
    return { rows };
  }

  async exec(sql: string): Promise<void> {
    await this.pool.query(sql);
  }

  async transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(clientQueryable(client));
      await client.query("COMMIT");
      return result;
    } catch (err) {
      await client
        .query("ROLLBACK")
        .catch((rollbackErr: unknown) => logger.error({ err: rollbackErr }, "Rollback failed"));
      throw err;
    } finally {
      client.release();
    }
  }

  // The lock lives on one dedicated client; fn runs on the rest of the pool
  async withAdvisoryLock<T>(key: number, fn: () => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("SELECT pg_advisory_lock($1)", [key]);
      try {
        return await fn();
      } finally {
        await client.query("SELECT pg_advisory_unlock($1)", [key]);
      }
    } finally {
      client.release();
    }
  }

  close(): Promise<void> {
    return this.pool.end();
  }
}
