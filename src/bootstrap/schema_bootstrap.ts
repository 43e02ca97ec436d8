import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

import type { GateLogger, SchemaBootstrap } from "../contracts/gate";
import { EXIT_CODES, GateError } from "../gates/gate_error";

export type SchemaResult = {
  databasePath: string;
  created: boolean;
  tables: string[];
};

/**
 * Applies an idempotent SQL schema (CREATE ... IF NOT EXISTS) to the sqlite
 * database the service will open, creating the file and its directory if needed.
 */
export function applySchema(bootstrap: SchemaBootstrap, log: GateLogger): SchemaResult {
  let sql: string;
  try {
    sql = fs.readFileSync(bootstrap.schemaPath, "utf8");
  } catch (error) {
    log.error({ evt: "gate.schema.read_failed", schemaPath: bootstrap.schemaPath, error: String(error) }, "gate.schema.read_failed");
    throw new GateError({
      code: "schema_failure",
      message: `Schema file unreadable: ${bootstrap.schemaPath}`,
      exitCode: EXIT_CODES.schema_failure,
      cause: String(error),
    });
  }

  const created = !fs.existsSync(bootstrap.databasePath);

  let db: Database.Database;
  try {
    fs.mkdirSync(dirname(bootstrap.databasePath), { recursive: true });
    db = new Database(bootstrap.databasePath);
  } catch (error) {
    log.error(
      { evt: "gate.schema.open_failed", databasePath: bootstrap.databasePath, error: String(error) },
      "gate.schema.open_failed"
    );
    throw new GateError({
      code: "schema_failure",
      message: `Database could not be opened: ${bootstrap.databasePath}`,
      exitCode: EXIT_CODES.schema_failure,
      cause: String(error),
    });
  }

  try {
    db.pragma("foreign_keys = ON");
    db.exec(sql);
    const rows = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .all() as Array<{ name: string }>;
    const tables = rows.map((row) => row.name);

    log.info(
      { evt: "gate.schema.applied", databasePath: bootstrap.databasePath, created, tables },
      "gate.schema.applied"
    );
    return { databasePath: bootstrap.databasePath, created, tables };
  } catch (error) {
    log.error(
      { evt: "gate.schema.apply_failed", databasePath: bootstrap.databasePath, error: String(error) },
      "gate.schema.apply_failed"
    );
    throw new GateError({
      code: "schema_failure",
      message: `Schema could not be applied to ${bootstrap.databasePath}`,
      exitCode: EXIT_CODES.schema_failure,
      cause: String(error),
    });
  } finally {
    db.close();
  }
}
