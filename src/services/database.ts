import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { loadConfig } from "../config.js";
import { createLogger } from "../logger.js";
import { splitSqlStatements } from "./sql-script.js";

const log = createLogger("db");

export interface DatabaseOptions {
  dbPath: string;
  /** Pre-seeded catalogue copied on first launch, if present. */
  seedDbPath?: string;
  /** Schema script applied when the database has no tables yet. */
  schemaPath: string;
}

let db: Database.Database | null = null;

export function getDb(options?: DatabaseOptions): Database.Database {
  if (!db) {
    db = openDatabase(options ?? loadConfig());
  }
  return db;
}

/**
 * Opens the diary database, preparing the file on first launch:
 * an existing file is opened as is, otherwise the seed catalogue is copied,
 * otherwise SQLite creates an empty file and the schema script is applied.
 */
export function openDatabase(options: DatabaseOptions): Database.Database {
  prepareDatabaseFile(options);

  const database = new Database(options.dbPath);
  database.pragma("journal_mode = WAL");
  database.pragma("foreign_keys = ON");

  if (ensureSchema(database, () => fs.readFileSync(options.schemaPath, "utf8"))) {
    log.info(`Schema created from ${options.schemaPath}`);
  }

  return database;
}

function prepareDatabaseFile(options: DatabaseOptions): void {
  if (options.dbPath === ":memory:" || fs.existsSync(options.dbPath)) return;

  fs.mkdirSync(path.dirname(options.dbPath), { recursive: true });

  if (options.seedDbPath && fs.existsSync(options.seedDbPath)) {
    fs.copyFileSync(options.seedDbPath, options.dbPath);
    log.info(`Copied seed catalogue ${options.seedDbPath} to ${options.dbPath}`);
    return;
  }

  log.info(`No seed catalogue at ${options.seedDbPath ?? "(unset)"}, creating an empty database`);
}

export function tableExists(database: Database.Database, table: string): boolean {
  const row = database
    .prepare("SELECT 1 AS found FROM sqlite_master WHERE type = 'table' AND name = ? LIMIT 1")
    .get(table);
  return row !== undefined;
}

/**
 * Runs every statement of the script in one transaction; no-op once `User` exists.
 * A function is only called when the schema is missing.
 */
export function ensureSchema(database: Database.Database, schemaSql: string | (() => string)): boolean {
  if (tableExists(database, "User")) return false;
  applySchema(database, typeof schemaSql === "function" ? schemaSql() : schemaSql);
  return true;
}

function applySchema(database: Database.Database, schemaSql: string): void {
  const statements = splitSqlStatements(schemaSql);
  const run = database.transaction(() => {
    for (const statement of statements) {
      // PRAGMA foreign_keys is ignored inside a transaction; it is set on open
      if (/^PRAGMA\s/i.test(statement)) continue;
      database.exec(statement);
    }
  });
  run();
  log.debug(`Applied ${statements.length} schema statements`);
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
