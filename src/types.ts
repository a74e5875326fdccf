// Enumerations stored as TEXT in SQLite
export const MEAL_TYPES = ["BREAKFAST", "LUNCH", "SNACK", "DINNER"] as const;
export type MealType = (typeof MEAL_TYPES)[number];

export const UNITS = ["GRAM", "ML", "PIECE"] as const;
export type Unit = (typeof UNITS)[number];

export const SEXES = ["MALE", "FEMALE", "OTHER"] as const;
export type Sex = (typeof SEXES)[number];

export const ACTIVITY_LEVELS = ["sedentary", "light", "moderate", "active", "very_active"] as const;
export type ActivityLevel = (typeof ACTIVITY_LEVELS)[number];

export const NUTRI_GRADES = ["A", "B", "C", "D", "E"] as const;
export type NutriGrade = (typeof NUTRI_GRADES)[number];

export const MEAL_TYPE_LABELS: Record<MealType, string> = {
  BREAKFAST: "Breakfast",
  LUNCH: "Lunch",
  SNACK: "Snack",
  DINNER: "Dinner",
};

// Users
export interface User {
  id: string;
  email: string;
  name: string | null;
  onboardingCompleted: boolean;
}

export interface UserGoals {
  userId: string;
  sex: Sex;
  dateOfBirth: string | null; // YYYY-MM-DD
  heightCm: number;
  currentWeightKg: number;
  targetWeightKg: number;
  targetDate: string | null; // YYYY-MM-DD
  activityLevel: ActivityLevel;
  lowSalt: boolean;
  lowSugar: boolean;
  vegetarian: boolean;
  vegan: boolean;
  allergens: string | null;
  dailyCalories: number | null;
  carbPercent: number | null;
  proteinPercent: number | null;
  fatPercent: number | null;
}

// Nutrient profile per 100g; null means unknown and counts as 0
export interface Per100g {
  kcal: number | null;
  protein: number | null;
  carb: number | null;
  fat: number | null;
  sugars: number | null;
  fiber: number | null;
  salt: number | null;
}

export interface Product extends Per100g {
  id: string;
  barcode: string;
  name: string;
  brand: string | null;
  nutriScore: NutriGrade | null;
  imageUrl: string | null;
  countries: string | null;
  lastFetchedAt: string | null;
  etag: string | null;
}

export interface CustomFood extends Per100g {
  id: string;
  userId: string;
  name: string;
  brand: string | null;
  defaultUnit: Unit;
  gramsPerUnit: number | null;
}

// Nutrients for a logged quantity
export interface NutritionTotals {
  kcal: number;
  protein: number;
  carb: number;
  fat: number;
  sugars: number;
  fiber: number;
  salt: number;
}

export interface QuantityNutrition extends NutritionTotals {
  gramsTotal: number;
}

// Diary
export interface MealItem {
  id: string;
  mealId: string;
  productBarcode: string | null;
  customFoodId: string | null;
  name: string | null;
  brand: string | null;
  unit: Unit;
  quantity: number;
  gramsTotal: number | null;
  kcal: number | null;
  protein: number | null;
  carb: number | null;
  fat: number | null;
  sugars: number | null;
  fiber: number | null;
  salt: number | null;
}

export interface MealWithItems {
  id: string;
  type: MealType;
  date: string; // canonical day, YYYY-MM-DDT00:00:00Z
  totalKcal: number;
  protein: number;
  carb: number;
  fat: number;
  items: MealItem[];
}

export interface AddMealItemInput {
  userId: string;
  day: Date;
  mealType: MealType;
  productBarcode?: string | null;
  customFoodId?: string | null;
  unit: Unit;
  quantity: number;
}

export interface DailyStats extends NutritionTotals {
  userId: string;
  date: string; // canonical day
}

// Weight
export interface WeightLogEntry {
  day: string; // YYYY-MM-DD
  kg: number;
  source: string | null;
  note: string | null;
}

export interface WeightProgress {
  from: string;
  to: string;
  count: number;
  latest: number | null;
  start: number | null;
  deltaKg: number | null;
  deltaPct: number | null;
  perWeek: number | null;
}

// Scan history
export interface HistorySnapshot {
  barcode: string;
  name?: string | null;
  brand?: string | null;
  nutriScore?: NutriGrade | null;
  calories?: number | null;
  proteins?: number | null;
  carbs?: number | null;
  fat?: number | null;
}

export interface HistoryEntry {
  id: number;
  barcode: string | null;
  scannedAt: string;
  nutriScore: NutriGrade | null;
  calories: number | null;
  proteins: number | null;
  carbs: number | null;
  fat: number | null;
  name: string | null;
  brand: string | null;
}

export interface PageOptions {
  page?: number;
  pageSize?: number;
}

// Macro targets derived from daily kcal goal
export interface MacroPercents {
  carbPercent?: number | null;
  proteinPercent?: number | null;
  fatPercent?: number | null;
}

export interface MacroTargets {
  carbG: number;
  proteinG: number;
  fatG: number;
}
