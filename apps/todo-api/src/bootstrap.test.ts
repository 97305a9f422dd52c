import { mkdtemp, rm, writeFile } from "fs/promises";
import { createServer, type Server } from "http";
import express from "express";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { listen, prepareService } from "./bootstrap";
import type { Database } from "./db";
import { MigrationError, StartupError } from "./errors";
import { PgliteDatabase } from "./testing/pgliteDatabase";

describe("prepareService", () => {
  let db: PgliteDatabase;

  beforeEach(() => {
    db = new PgliteDatabase();
  });

  afterEach(async () => {
    await db.close();
  });

  it("migrates the schema and returns an app", async () => {
    const app = await prepareService(db, path.resolve(__dirname, "..", "migrations"));

    expect(typeof app.listen).toBe("function");
    const { rows } = await db.query<{ n: string }>("SELECT count(*)::text AS n FROM todo");
    expect(rows).toEqual([{ n: "0" }]);
  });

  it("stops at the migration stage when a migration fails", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "todo-bootstrap-"));
    try {
      await writeFile(path.join(dir, "1_broken.up.sql"), "CREATE TABLE;");
      const error = await prepareService(db, dir).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(MigrationError);
      expect(error).toMatchObject({ stage: "migration", version: 1 });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe("prepareService without a database", () => {
  it("stops at the database stage before touching migrations", async () => {
    const unreachable: Database = {
      query: vi.fn().mockRejectedValue(new Error("connect ECONNREFUSED 127.0.0.1:5432")),
      exec: vi.fn(),
      transaction: vi.fn(),
      withAdvisoryLock: vi.fn(),
      close: vi.fn(),
    };

    const error = await prepareService(unreachable, "/does/not/matter").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StartupError);
    expect(error).toMatchObject({
      stage: "database",
      message: "Cannot connect to database: connect ECONNREFUSED 127.0.0.1:5432",
    });
    expect(unreachable.exec).not.toHaveBeenCalled();
  });
});

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

describe("listen", () => {
  it("resolves once the server is bound", async () => {
    const server = await listen(express(), 0);
    try {
      expect(server.listening).toBe(true);
    } finally {
      await close(server);
    }
  });

  it("fails at the listen stage when the port is already taken", async () => {
    const blocker = createServer();
    await new Promise<void>((resolve) => blocker.listen(0, resolve));
    const address = blocker.address();
    if (address === null || typeof address === "string") throw new Error("expected a TCP address");

    try {
      const error = await listen(express(), address.port).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(StartupError);
      expect(error).toMatchObject({
        stage: "listen",
        message: expect.stringContaining(`Cannot listen on port ${address.port}: listen EADDRINUSE`),
      });
    } finally {
      await close(blocker);
    }
  });
});
