import type {
  ActivityLevel,
  MacroPercents,
  MacroTargets,
  Per100g,
  QuantityNutrition,
  Sex,
  Unit,
} from "../types.js";
import { ageOn } from "./dates.js";

export interface QuantityInput {
  unit: Unit;
  quantity: number;
  per100g: Per100g;
  /** Density (g/ml) for ML, weight of one piece for PIECE. */
  gramsPerUnit?: number | null;
}

/**
 * Converts an eaten quantity into absolute nutrients from a per-100g profile.
 *
 * - GRAM: quantity is already grams
 * - ML: quantity × density, 1 g/ml when unknown
 * - PIECE: quantity × piece weight; without a piece weight the quantity is taken as grams
 *
 * kcal is rounded to an integer, the other nutrients keep full precision.
 */
export function calcPerQuantity({ unit, quantity, per100g, gramsPerUnit }: QuantityInput): QuantityNutrition {
  let grams: number;
  switch (unit) {
    case "ML":
      grams = quantity * (gramsPerUnit ?? 1);
      break;
    case "PIECE":
      grams = gramsPerUnit != null ? quantity * gramsPerUnit : quantity;
      break;
    case "GRAM":
    default:
      grams = quantity;
  }

  const factor = grams / 100;
  const scale = (value: number | null): number => (value ?? 0) * factor;

  return {
    gramsTotal: grams,
    kcal: Math.round((per100g.kcal ?? 0) * factor),
    protein: scale(per100g.protein),
    carb: scale(per100g.carb),
    fat: scale(per100g.fat),
    sugars: scale(per100g.sugars),
    fiber: scale(per100g.fiber),
    salt: scale(per100g.salt),
  };
}

// kcal per gram of each macro
const KCAL_PER_G = { carb: 4, protein: 4, fat: 9 };

export const DEFAULT_MACRO_SPLIT = { carbPercent: 50, proteinPercent: 20, fatPercent: 30 };

export function macroTargets(dailyKcal: number, percents: MacroPercents = {}): MacroTargets {
  if (dailyKcal <= 0) {
    return { carbG: 0, proteinG: 0, fatG: 0 };
  }
  const carbPct = percents.carbPercent ?? DEFAULT_MACRO_SPLIT.carbPercent;
  const proteinPct = percents.proteinPercent ?? DEFAULT_MACRO_SPLIT.proteinPercent;
  const fatPct = percents.fatPercent ?? DEFAULT_MACRO_SPLIT.fatPercent;

  return {
    carbG: (dailyKcal * carbPct) / 100 / KCAL_PER_G.carb,
    proteinG: (dailyKcal * proteinPct) / 100 / KCAL_PER_G.protein,
    fatG: (dailyKcal * fatPct) / 100 / KCAL_PER_G.fat,
  };
}

const ACTIVITY_MULTIPLIERS: Record<ActivityLevel, number> = {
  sedentary: 1.2,
  light: 1.375,
  moderate: 1.55,
  active: 1.725,
  very_active: 1.9,
};

// Mifflin-St Jeor sex constant; OTHER sits halfway
const SEX_OFFSET: Record<Sex, number> = { MALE: 5, FEMALE: -161, OTHER: -78 };

const DEFICIT_KCAL = 500;
const SURPLUS_KCAL = 300;
const MIN_DAILY_KCAL = 1200;

export interface CalorieEstimateInput {
  sex: Sex;
  dateOfBirth: string | null;
  heightCm: number;
  currentWeightKg: number;
  targetWeightKg: number;
  activityLevel: ActivityLevel;
}

/**
 * Daily kcal goal from body data: Mifflin-St Jeor BMR × activity factor,
 * shifted toward the target weight. Returns null when the body data is incomplete.
 */
export function estimateDailyCalories(goals: CalorieEstimateInput, today: Date = new Date()): number | null {
  if (!goals.dateOfBirth || goals.heightCm <= 0 || goals.currentWeightKg <= 0) {
    return null;
  }

  const age = ageOn(goals.dateOfBirth, today);
  const bmr = 10 * goals.currentWeightKg + 6.25 * goals.heightCm - 5 * age + SEX_OFFSET[goals.sex];
  let tdee = bmr * ACTIVITY_MULTIPLIERS[goals.activityLevel];

  if (goals.targetWeightKg > 0 && goals.targetWeightKg < goals.currentWeightKg) {
    tdee -= DEFICIT_KCAL;
  } else if (goals.targetWeightKg > goals.currentWeightKg) {
    tdee += SURPLUS_KCAL;
  }

  return Math.max(MIN_DAILY_KCAL, Math.round(tdee));
}
