import { readdir, readFile } from "fs/promises";
import path from "path";
import type { Database } from "./db";
import { MigrationError, errorMessage } from "./errors";
import { logger } from "./logger";

export interface MigrationFile {
  version: number;
  name: string;
  path: string;
}

export interface MigrationResult {
  applied: MigrationFile[];
  /** Highest recorded version after the run, `null` on an empty database. */
  current: number | null;
}

// Shared by every instance pointed at the same database
export const MIGRATION_LOCK_KEY = 7_265_010_115;

// 000001_create_todo_table.up.sql
const MIGRATION_FILE = /^(\d+)_([\w-]+)\.up\.sql$/;

const CREATE_MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    version    BIGINT      PRIMARY KEY,
    name       TEXT        NOT NULL,
    applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
  )`;

export async function readMigrations(dir: string): Promise<MigrationFile[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    throw new MigrationError(`Cannot read migrations from ${dir}: ${errorMessage(err)}`, null, { cause: err });
  }

  const files: MigrationFile[] = [];
  for (const entry of entries) {
    const match = MIGRATION_FILE.exec(entry);
    if (!match) continue;
    files.push({ version: Number(match[1]), name: match[2], path: path.join(dir, entry) });
  }
  files.sort((a, b) => a.version - b.version);

  for (let i = 1; i < files.length; i++) {
    if (files[i].version === files[i - 1].version) {
      throw new MigrationError(`Duplicate migration version ${files[i].version} in ${dir}`, files[i].version);
    }
  }
  return files;
}

async function appliedVersions(db: Database): Promise<Set<number>> {
  // bigint arrives as a string from pg; cast so every driver agrees
  const { rows } = await db.query<{ version: string }>(
    "SELECT version::text AS version FROM schema_migrations ORDER BY version",
  );
  return new Set(rows.map((row) => Number(row.version)));
}

/**
 * Applies every migration in `dir` that is not yet recorded, lowest version first.
 * Each file runs in its own transaction together with its bookkeeping row, so a
 * failing file leaves no trace and earlier files stay applied. Concurrent runs
 * against one database are serialized by an advisory lock.
 */
export async function migrate(db: Database, dir: string): Promise<MigrationResult> {
  const files = await readMigrations(dir);

  try {
    return await db.withAdvisoryLock(MIGRATION_LOCK_KEY, () => applyPending(db, files));
  } catch (err) {
    if (err instanceof MigrationError) throw err;
    throw new MigrationError(`Cannot take the migration lock: ${errorMessage(err)}`, null, { cause: err });
  }
}

async function applyPending(db: Database, files: MigrationFile[]): Promise<MigrationResult> {
  let done: Set<number>;
  try {
    await db.exec(CREATE_MIGRATIONS_TABLE);
    done = await appliedVersions(db);
  } catch (err) {
    throw new MigrationError(`Cannot read migration state: ${errorMessage(err)}`, null, { cause: err });
  }

  const pending = files.filter((file) => !done.has(file.version));
  if (pending.length === 0) {
    logger.info("No pending migrations");
    return { applied: [], current: highest(done) };
  }

  for (const file of pending) {
    try {
      const sql = await readFile(file.path, "utf8");
      await db.transaction(async (tx) => {
        await tx.exec(sql);
        await tx.query("INSERT INTO schema_migrations (version, name) VALUES ($1, $2)", [
          file.version,
          file.name,
        ]);
      });
    } catch (err) {
      throw new MigrationError(
        `Migration ${file.version}_${file.name} failed: ${errorMessage(err)}`,
        file.version,
        { cause: err },
      );
    }
    done.add(file.version);
    logger.info({ version: file.version, name: file.name }, "Applied migration");
  }

  logger.info({ count: pending.length }, "Migrations applied successfully");
  return { applied: pending, current: highest(done) };
}

function highest(versions: Set<number>): number | null {
  return versions.size === 0 ? null : Math.max(...versions);
}
