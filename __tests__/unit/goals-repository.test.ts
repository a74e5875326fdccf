/**
 * Unit tests for GoalsRepository
 */

import type Database from "better-sqlite3";
import { GoalsRepository } from "../../src/repositories/goals-repository.js";
import type { UserGoals } from "../../src/types.js";
import { createTestDb, insertUser } from "../helpers/db.js";

const baseGoals = (userId: string): UserGoals => ({
  userId,
  sex: "MALE",
  dateOfBirth: "1990-06-15",
  heightCm: 180,
  currentWeightKg: 80,
  targetWeightKg: 75,
  targetDate: "2025-12-31",
  activityLevel: "moderate",
  lowSalt: true,
  lowSugar: false,
  vegetarian: false,
  vegan: false,
  allergens: "peanuts",
  dailyCalories: null,
  carbPercent: null,
  proteinPercent: null,
  fatPercent: null,
});

describe("GoalsRepository", () => {
  let db: Database.Database;
  let goals: GoalsRepository;
  let userId: string;

  beforeEach(() => {
    db = createTestDb();
    goals = new GoalsRepository(db);
    userId = insertUser(db);
  });

  afterEach(() => {
    db.close();
  });

  it("should estimate missing calories and read the goals back", () => {
    const saved = goals.upsert(baseGoals(userId), "2025-06-15");

    expect(saved.dailyCalories).toBe(2220);
    expect(goals.getByUser(userId)).toEqual({ ...baseGoals(userId), dailyCalories: 2220 });
  });

  it("should keep an explicit calorie goal", () => {
    const saved = goals.upsert({ ...baseGoals(userId), dailyCalories: 1900, carbPercent: 40, proteinPercent: 30, fatPercent: 30 }, "2025-06-15");
    expect(saved.dailyCalories).toBe(1900);
    expect(goals.getByUser(userId)?.proteinPercent).toBe(30);
  });

  it("should complete onboarding and log the onboarding weight", () => {
    goals.upsert(baseGoals(userId), "2025-06-15");

    expect(db.prepare("SELECT onboardingCompleted FROM User WHERE id = ?").get(userId)).toEqual({ onboardingCompleted: 1 });
    expect(db.prepare("SELECT day, weightKg, source FROM WeightLog WHERE userId = ?").all(userId)).toEqual([
      { day: "2025-06-15", weightKg: 80, source: "onboarding" },
    ]);
  });

  it("should update the existing row on a second save", () => {
    goals.upsert(baseGoals(userId), "2025-06-15");
    goals.upsert({ ...baseGoals(userId), vegan: true, currentWeightKg: 79 }, "2025-06-20");

    const stored = goals.getByUser(userId);
    expect(stored?.vegan).toBe(true);
    expect(stored?.currentWeightKg).toBe(79);
    expect(db.prepare("SELECT COUNT(*) AS n FROM UserGoals").get()).toEqual({ n: 1 });
    expect(db.prepare("SELECT COUNT(*) AS n FROM WeightLog").get()).toEqual({ n: 2 });
  });

  it("should return null for a user without goals", () => {
    expect(goals.getByUser(userId)).toBeNull();
  });
});
