import Database from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";
import { SchemaVersionError } from "../utils/errors.js";
import { SCHEMA, SCHEMA_VERSION } from "./schema.js";

export type Db = Database.Database;

/**
 * Provisions a fresh database, or verifies that an existing one was provisioned
 * with the schema this build expects. Checked once, at open.
 */
export function ensureSchema(db: Db): number {
  const hasVersionTable = db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'"
    )
    .get();

  if (!hasVersionTable) {
    db.transaction(() => {
      db.exec(SCHEMA);
      db.exec("CREATE TABLE schema_version (version INTEGER NOT NULL, applied_at TEXT NOT NULL)");
      db.prepare("INSERT INTO schema_version (version, applied_at) VALUES (?, ?)").run(
        SCHEMA_VERSION,
        new Date().toISOString()
      );
    })();
    return SCHEMA_VERSION;
  }

  const found = getSchemaVersion(db);
  if (found !== SCHEMA_VERSION) {
    throw new SchemaVersionError(found, SCHEMA_VERSION);
  }
  return found;
}

export function getSchemaVersion(db: Db): number {
  const row = db
    .prepare<[], { version: number | null }>("SELECT MAX(version) AS version FROM schema_version")
    .get();
  return row?.version ?? 0;
}

export function openDatabase(filename: string): Db {
  if (filename !== ":memory:") {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }
  const db = new Database(filename);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  try {
    ensureSchema(db);
  } catch (error) {
    db.close();
    throw error;
  }
  return db;
}
