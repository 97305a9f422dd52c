/**
 * In-process Postgres for tests, exposed through the same Database
 * interface the service uses over pg.Pool.
 */

import { PGlite } from "@electric-sql/pglite";
import type { QueryResultRow } from "pg";
import type { Database, Queryable, Rows } from "../db";

interface PgliteRunner {
  query<T>(query: string, params?: unknown[]): Promise<{ rows: T[] }>;
  exec(query: string): Promise<unknown>;
}

function wrap(runner: PgliteRunner): Queryable {
  return {
    async query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<Rows<R>> {
      const { rows } = await runner.query<R>(text, values);
      return { rows };
    },
    async exec(sql: string) {
      await runner.exec(sql);
    },
  };
}

export class PgliteDatabase implements Database {
  private readonly runner: Queryable;

  constructor(private readonly pg: PGlite = new PGlite()) {
    this.runner = wrap(pg);
  }

  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<Rows<R>> {
    return this.runner.query<R>(text, values);
  }

  exec(sql: string): Promise<void> {
    return this.runner.exec(sql);
  }

  async transaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
    const box: { result?: { value: T } } = {};
    await this.pg.transaction(async (tx) => {
      box.result = { value: await fn(wrap(tx)) };
    });
    if (!box.result) throw new Error("Transaction finished without a result");
    return box.result.value;
  }

  async withAdvisoryLock<T>(key: number, fn: () => Promise<T>): Promise<T> {
    await this.query("SELECT pg_advisory_lock($1)", [key]);
    try {
      return await fn();
    } finally {
      await this.query("SELECT pg_advisory_unlock($1)", [key]);
    }
  }

  close(): Promise<void> {
    return this.pg.close();
  }
}
