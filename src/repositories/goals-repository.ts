import type Database from "better-sqlite3";
import { v4 as uuidv4 } from "uuid";
import { ACTIVITY_LEVELS, SEXES, type ActivityLevel, type Sex, type UserGoals } from "../types.js";
import { getToday } from "../utils/dates.js";
import { estimateDailyCalories } from "../utils/food-calc.js";

interface GoalsRow {
  userId: string;
  sex: string | null;
  dateOfBirth: string | null;
  heightCm: number | null;
  currentWeightKg: number | null;
  targetWeightKg: number | null;
  targetDate: string | null;
  activityLevel: string | null;
  lowSalt: number;
  lowSugar: number;
  vegetarian: number;
  vegan: number;
  allergens: string | null;
  dailyCalories: number | null;
  carbPercent: number | null;
  proteinPercent: number | null;
  fatPercent: number | null;
}

function asSex(value: string | null): Sex {
  return SEXES.find((s) => s === value) ?? "OTHER";
}

function asActivity(value: string | null): ActivityLevel {
  return ACTIVITY_LEVELS.find((a) => a === value) ?? "sedentary";
}

const flag = (value: boolean): number => (value ? 1 : 0);

/**
 * User goals (body data, dietary preferences and nutrition targets).
 */
export class GoalsRepository {
  constructor(private readonly db: Database.Database) {}

  /**
   * Saves the goals and completes onboarding.
   *
   * A missing `dailyCalories` is estimated from the body data. A positive
   * current weight is also logged for today with source `onboarding`.
   */
  upsert(goals: UserGoals, today: string = getToday()): UserGoals {
    const dailyCalories = goals.dailyCalories ?? estimateDailyCalories(goals, new Date(`${today}T00:00:00Z`));
    const saved: UserGoals = { ...goals, dailyCalories };

    const save = this.db.transaction(() => {
      this.db
        .prepare(
          `INSERT INTO UserGoals (
            userId, sex, dateOfBirth, heightCm, currentWeightKg, targetWeightKg, targetDate, activityLevel,
            lowSalt, lowSugar, vegetarian, vegan, allergens,
            dailyCalories, carbPercent, proteinPercent, fatPercent, updatedAt
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, datetime('now'))
          ON CONFLICT(userId) DO UPDATE SET
            sex = excluded.sex,
            dateOfBirth = excluded.dateOfBirth,
            heightCm = excluded.heightCm,
            currentWeightKg = excluded.currentWeightKg,
            targetWeightKg = excluded.targetWeightKg,
            targetDate = excluded.targetDate,
            activityLevel = excluded.activityLevel,
            lowSalt = excluded.lowSalt,
            lowSugar = excluded.lowSugar,
            vegetarian = excluded.vegetarian,
            vegan = excluded.vegan,
            allergens = excluded.allergens,
            dailyCalories = excluded.dailyCalories,
            carbPercent = excluded.carbPercent,
            proteinPercent = excluded.proteinPercent,
            fatPercent = excluded.fatPercent,
            updatedAt = datetime('now')`
        )
        .run(
          saved.userId,
          saved.sex,
          saved.dateOfBirth,
          saved.heightCm,
          saved.currentWeightKg,
          saved.targetWeightKg,
          saved.targetDate,
          saved.activityLevel,
          flag(saved.lowSalt),
          flag(saved.lowSugar),
          flag(saved.vegetarian),
          flag(saved.vegan),
          saved.allergens,
          saved.dailyCalories,
          saved.carbPercent,
          saved.proteinPercent,
          saved.fatPercent
        );

      this.db.prepare<[string]>("UPDATE User SET onboardingCompleted = 1 WHERE id = ?").run(saved.userId);

      if (saved.currentWeightKg > 0) {
        this.db
          .prepare<[string, string, string, number]>(
            `INSERT INTO WeightLog (id, userId, day, weightKg, source)
             VALUES (?, ?, ?, ?, 'onboarding')`
          )
          .run(uuidv4(), saved.userId, today, saved.currentWeightKg);
      }
    });
    save();

    return saved;
  }

  getByUser(userId: string): UserGoals | null {
    const row = this.db
      .prepare<[string], GoalsRow>(
        `SELECT userId, sex, dateOfBirth, heightCm, currentWeightKg, targetWeightKg, targetDate, activityLevel,
                lowSalt, lowSugar, vegetarian, vegan, allergens,
                dailyCalories, carbPercent, proteinPercent, fatPercent
         FROM UserGoals WHERE userId = ? LIMIT 1`
      )
      .get(userId);

    if (!row) return null;

    return {
      userId: row.userId,
      sex: asSex(row.sex),
      dateOfBirth: row.dateOfBirth || null,
      heightCm: row.heightCm ?? 0,
      currentWeightKg: row.currentWeightKg ?? 0,
      targetWeightKg: row.targetWeightKg ?? 0,
      targetDate: row.targetDate || null,
      activityLevel: asActivity(row.activityLevel),
      lowSalt: row.lowSalt === 1,
      lowSugar: row.lowSugar === 1,
      vegetarian: row.vegetarian === 1,
      vegan: row.vegan === 1,
      allergens: row.allergens,
      dailyCalories: row.dailyCalories,
      carbPercent: row.carbPercent,
      proteinPercent: row.proteinPercent,
      fatPercent: row.fatPercent,
    };
  }
}
