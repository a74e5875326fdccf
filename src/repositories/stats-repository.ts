import type Database from "better-sqlite3";
import type { DailyStats } from "../types.js";
import { canonDayUtcIso } from "../utils/dates.js";
import { sumDay, upsertDailyStats } from "./meals-repository.js";

export class StatsRepository {
  constructor(private readonly db: Database.Database) {}

  /** Sums the day's items from scratch and refreshes the cached row. */
  computeDaily(userId: string, day: Date): DailyStats {
    const date = canonDayUtcIso(day);
    const stats: DailyStats = { userId, date, ...sumDay(this.db, userId, date) };
    this.putCached(stats);
    return stats;
  }

  getCached(userId: string, day: Date): DailyStats | null {
    const row = this.db
      .prepare<[string, string], DailyStats>(
        `SELECT userId, date, kcal, protein, carb, fat, sugars, fiber, salt
         FROM DailyStats WHERE userId = ? AND date = ? LIMIT 1`
      )
      .get(userId, canonDayUtcIso(day));
    return row ?? null;
  }

  putCached(stats: DailyStats): void {
    upsertDailyStats(this.db, stats);
  }

  getOrCompute(userId: string, day: Date): DailyStats {
    return this.getCached(userId, day) ?? this.computeDaily(userId, day);
  }
}
