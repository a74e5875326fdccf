import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { ensureSchema } from "../../src/services/database.js";

export const SCHEMA_PATH = path.join(__dirname, "../../sql/schema.sql");
export const SCHEMA_SQL = fs.readFileSync(SCHEMA_PATH, "utf8");

export function createTestDb(): Database.Database {
  const db = new Database(":memory:");
  db.pragma("foreign_keys = ON");
  ensureSchema(db, SCHEMA_SQL);
  return db;
}

export function insertUser(db: Database.Database, id = "user-1", email = `${id}@example.com`): string {
  db.prepare("INSERT INTO User (id, email, passwordHash) VALUES (?, ?, ?)").run(id, email, "test-hash");
  return id;
}
