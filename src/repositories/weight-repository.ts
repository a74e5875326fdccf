import type Database from "better-sqlite3";
import { v4 as uuidv4 } from "uuid";
import { ValidationError } from "../errors.js";
import type { WeightLogEntry } from "../types.js";
import { justDateIso } from "../utils/dates.js";

interface WeightRow {
  day: string;
  weightKg: number;
  source: string | null;
  note: string | null;
}

function rowToEntry(row: WeightRow): WeightLogEntry {
  return { day: row.day, kg: row.weightKg, source: row.source, note: row.note };
}

/** Full weight history; several logs on the same day are all kept. */
export class WeightRepository {
  constructor(private readonly db: Database.Database) {}

  addLog(userId: string, day: Date, kg: number, note?: string | null, source: string | null = "manual"): string {
    if (!Number.isFinite(kg) || kg <= 0) {
      throw new ValidationError("Weight must be a positive number of kg");
    }
    const id = uuidv4();
    this.db
      .prepare<[string, string, string, number, string | null, string | null]>(
        `INSERT INTO WeightLog (id, userId, day, weightKg, source, note, createdAt)
         VALUES (?, ?, ?, ?, ?, ?, datetime('now'))`
      )
      .run(id, userId, justDateIso(day), kg, source, note?.trim() || null);
    return id;
  }

  /** Every log with from <= day <= to, oldest first. */
  getRange(userId: string, from: Date, to: Date): WeightLogEntry[] {
    return this.db
      .prepare<[string, string, string], WeightRow>(
        `SELECT day, weightKg, source, note
         FROM WeightLog
         WHERE userId = ? AND day BETWEEN ? AND ?
         ORDER BY day ASC, datetime(createdAt) ASC, rowid ASC`
      )
      .all(userId, justDateIso(from), justDateIso(to))
      .map(rowToEntry);
  }

  latest(userId: string): WeightLogEntry | null {
    const row = this.db
      .prepare<[string], WeightRow>(
        `SELECT day, weightKg, source, note
         FROM WeightLog
         WHERE userId = ?
         ORDER BY day DESC, datetime(createdAt) DESC, rowid DESC
         LIMIT 1`
      )
      .get(userId);
    return row ? rowToEntry(row) : null;
  }
}
