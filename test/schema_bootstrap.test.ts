import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import Database from "better-sqlite3";

import { applySchema } from "../src/bootstrap/schema_bootstrap";
import { GateError } from "../src/gates/gate_error";
import { makeLogger } from "./helpers/logger";

const SCHEMA_PATH = resolve(__dirname, "fixtures/schema.sql");
const BROKEN_SCHEMA_PATH = resolve(__dirname, "fixtures/broken_schema.sql");

describe("applySchema", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "gate-schema-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("creates the database, its directory and the tables", () => {
    const { log, entries } = makeLogger();
    const databasePath = join(dir, "data", "links.db");

    const result = applySchema({ databasePath, schemaPath: SCHEMA_PATH }, log);

    expect(result).toEqual({ databasePath, created: true, tables: ["links", "users"] });
    expect(existsSync(databasePath)).toBe(true);
    expect(entries.at(-1)?.message).toBe("gate.schema.applied");
  });

  it("is idempotent and keeps existing rows", () => {
    const { log } = makeLogger();
    const databasePath = join(dir, "links.db");
    applySchema({ databasePath, schemaPath: SCHEMA_PATH }, log);

    const db = new Database(databasePath);
    db.prepare("INSERT INTO users (email, password_hash) VALUES (?, ?)").run("user@example.test", "hash");
    db.close();

    const again = applySchema({ databasePath, schemaPath: SCHEMA_PATH }, log);

    const check = new Database(databasePath);
    const row = check.prepare("SELECT COUNT(*) AS count FROM users").get() as { count: number };
    check.close();

    expect(again.created).toBe(false);
    expect(row.count).toBe(1);
  });

  it("fails with schema_failure when the schema file is missing", () => {
    const { log } = makeLogger();

    let caught: unknown;
    try {
      applySchema({ databasePath: join(dir, "links.db"), schemaPath: join(dir, "missing.sql") }, log);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(GateError);
    expect(caught).toMatchObject({ code: "schema_failure", exitCode: 70 });
  });

  it("fails with schema_failure on invalid SQL", () => {
    const { log, entries } = makeLogger();

    expect(() =>
      applySchema({ databasePath: join(dir, "links.db"), schemaPath: BROKEN_SCHEMA_PATH }, log)
    ).toThrow("Schema could not be applied");
    expect(entries.at(-1)?.message).toBe("gate.schema.apply_failed");
  });

  it("fails with schema_failure when the database cannot be opened", () => {
    const { log, entries } = makeLogger();
    // A regular file where the database directory should be
    const blocker = join(dir, "not-a-dir");
    writeFileSync(blocker, "");

    let caught: unknown;
    try {
      applySchema({ databasePath: join(blocker, "links.db"), schemaPath: SCHEMA_PATH }, log);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(GateError);
    expect(caught).toMatchObject({ code: "schema_failure", exitCode: 70 });
    expect(entries.at(-1)?.message).toBe("gate.schema.open_failed");
  });
});
