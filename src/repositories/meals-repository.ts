import type Database from "better-sqlite3";
import { v4 as uuidv4 } from "uuid";
import { NotFoundError, ValidationError } from "../errors.js";
import {
  MEAL_TYPES,
  UNITS,
  type AddMealItemInput,
  type MealItem,
  type MealType,
  type MealWithItems,
  type NutritionTotals,
  type Per100g,
  type Unit,
} from "../types.js";
import { canonDayUtcIso } from "../utils/dates.js";
import { calcPerQuantity } from "../utils/food-calc.js";

interface MealRow {
  id: string;
  type: string;
  date: string;
  totalKcal: number;
  totalProtein: number;
  totalCarb: number;
  totalFat: number;
}

interface MealItemRow {
  id: string;
  mealId: string;
  productBarcode: string | null;
  customFoodId: string | null;
  unit: string;
  quantity: number;
  gramsTotal: number | null;
  kcal: number | null;
  protein: number | null;
  carb: number | null;
  fat: number | null;
  sugars: number | null;
  fiber: number | null;
  salt: number | null;
  productName: string | null;
  productBrand: string | null;
  customName: string | null;
}

interface NutrientRow {
  energyKcal_100g: number | null;
  proteins_100g: number | null;
  carbs_100g: number | null;
  fat_100g: number | null;
  sugars_100g: number | null;
  fiber_100g: number | null;
  salt_100g: number | null;
  gramsPerUnit: number | null;
}

interface ItemContextRow {
  mealId: string;
  productBarcode: string | null;
  customFoodId: string | null;
  userId: string;
  day: string;
  unit: string;
}

export interface ItemContext extends Omit<ItemContextRow, "unit"> {
  unit: Unit;
}

interface NutrientSource {
  per100g: Per100g;
  gramsPerUnit: number | null;
}

const NUTRIENT_COLUMNS = `energyKcal_100g, proteins_100g, carbs_100g, fat_100g,
  sugars_100g, fiber_100g, salt_100g`;

const MEAL_TYPE_ORDER = `CASE type
  WHEN 'BREAKFAST' THEN 0 WHEN 'LUNCH' THEN 1 WHEN 'SNACK' THEN 2 WHEN 'DINNER' THEN 3 END`;

function asMealType(value: string): MealType {
  const type = MEAL_TYPES.find((t) => t === value);
  if (!type) throw new Error(`Unknown meal type in database: ${value}`);
  return type;
}

function asUnit(value: string): Unit {
  return UNITS.find((u) => u === value) ?? "GRAM";
}

function rowToSource(row: NutrientRow): NutrientSource {
  return {
    per100g: {
      kcal: row.energyKcal_100g,
      protein: row.proteins_100g,
      carb: row.carbs_100g,
      fat: row.fat_100g,
      sugars: row.sugars_100g,
      fiber: row.fiber_100g,
      salt: row.salt_100g,
    },
    gramsPerUnit: row.gramsPerUnit,
  };
}

function rowToItem(row: MealItemRow): MealItem {
  return {
    id: row.id,
    mealId: row.mealId,
    productBarcode: row.productBarcode,
    customFoodId: row.customFoodId,
    name: (row.productName ?? row.customName)?.trim() ?? null,
    brand: row.productBrand?.trim() ?? null,
    unit: asUnit(row.unit),
    quantity: row.quantity,
    gramsTotal: row.gramsTotal,
    kcal: row.kcal,
    protein: row.protein,
    carb: row.carb,
    fat: row.fat,
    sugars: row.sugars,
    fiber: row.fiber,
    salt: row.salt,
  };
}

function assertQuantity(quantity: number): void {
  if (!Number.isFinite(quantity) || quantity <= 0) {
    throw new ValidationError("Quantity must be greater than 0");
  }
}

/**
 * Diary meals and their items. Every write re-sums the meal totals and the
 * day's DailyStats row inside the same transaction.
 */
export class MealsRepository {
  constructor(private readonly db: Database.Database) {}

  getMealsForDay(userId: string, day: Date): MealWithItems[] {
    const date = canonDayUtcIso(day);

    const meals = this.db
      .prepare<[string, string], MealRow>(
        `SELECT id, type, date,
                COALESCE(totalKcal, 0)    AS totalKcal,
                COALESCE(totalProtein, 0) AS totalProtein,
                COALESCE(totalCarb, 0)    AS totalCarb,
                COALESCE(totalFat, 0)     AS totalFat
         FROM Meal
         WHERE userId = ? AND date = ?
         ORDER BY ${MEAL_TYPE_ORDER}`
      )
      .all(userId, date);

    const itemsStmt = this.db.prepare<[string], MealItemRow>(
      `SELECT mi.id, mi.mealId, mi.productBarcode, mi.customFoodId,
              mi.unit, mi.quantity, mi.gramsTotal,
              mi.kcal, mi.protein, mi.carb, mi.fat, mi.sugars, mi.fiber, mi.salt,
              p.name  AS productName,
              p.brand AS productBrand,
              cf.name AS customName
       FROM MealItem mi
       LEFT JOIN Product    p  ON p.barcode = mi.productBarcode
       LEFT JOIN CustomFood cf ON cf.id     = mi.customFoodId
       WHERE mi.mealId = ?
       ORDER BY mi.position IS NULL, mi.position, mi.id`
    );

    return meals.map((meal) => ({
      id: meal.id,
      type: asMealType(meal.type),
      date: meal.date,
      totalKcal: meal.totalKcal,
      protein: meal.totalProtein,
      carb: meal.totalCarb,
      fat: meal.totalFat,
      items: itemsStmt.all(meal.id).map(rowToItem),
    }));
  }

  /** Adds an item to the (user, day, type) meal; returns the new item id. */
  addMealItem(input: AddMealItemInput): string {
    const barcode = input.productBarcode?.trim() || null;
    const customFoodId = input.customFoodId?.trim() || null;
    if ((barcode === null) === (customFoodId === null)) {
      throw new ValidationError("Provide exactly one of productBarcode or customFoodId");
    }
    assertQuantity(input.quantity);

    const date = canonDayUtcIso(input.day);

    return this.db.transaction(() => {
      const mealId = this.ensureMeal(input.userId, date, input.mealType);
      const source = this.loadSource(barcode, customFoodId);
      const calc = calcPerQuantity({
        unit: input.unit,
        quantity: input.quantity,
        per100g: source.per100g,
        gramsPerUnit: source.gramsPerUnit,
      });

      const position =
        this.db
          .prepare<[string], { next: number }>(
            "SELECT COALESCE(MAX(position), -1) + 1 AS next FROM MealItem WHERE mealId = ?"
          )
          .get(mealId)?.next ?? 0;

      const itemId = uuidv4();
      this.db
        .prepare(
          `INSERT INTO MealItem (id, mealId, productBarcode, customFoodId, unit, quantity, gramsTotal,
                                 kcal, protein, carb, fat, sugars, fiber, salt, position, userId)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          itemId,
          mealId,
          barcode,
          customFoodId,
          input.unit,
          input.quantity,
          calc.gramsTotal,
          calc.kcal,
          calc.protein,
          calc.carb,
          calc.fat,
          calc.sugars,
          calc.fiber,
          calc.salt,
          position,
          input.userId
        );

      this.recalcMealTotals(mealId);
      this.recalcDailyStats(input.userId, date);
      return itemId;
    })();
  }

  updateMealItemQuantity(itemId: string, unit: Unit, quantity: number): void {
    assertQuantity(quantity);

    this.db.transaction(() => {
      const context = this.itemContext(itemId);
      if (!context) throw new NotFoundError(`Meal item ${itemId} not found`);

      const source = this.loadSource(context.productBarcode, context.customFoodId);
      const calc = calcPerQuantity({ unit, quantity, per100g: source.per100g, gramsPerUnit: source.gramsPerUnit });

      this.db
        .prepare(
          `UPDATE MealItem
           SET unit = ?, quantity = ?, gramsTotal = ?,
               kcal = ?, protein = ?, carb = ?, fat = ?, sugars = ?, fiber = ?, salt = ?
           WHERE id = ?`
        )
        .run(
          unit,
          quantity,
          calc.gramsTotal,
          calc.kcal,
          calc.protein,
          calc.carb,
          calc.fat,
          calc.sugars,
          calc.fiber,
          calc.salt,
          itemId
        );

      this.recalcMealTotals(context.mealId);
      this.recalcDailyStats(context.userId, context.day);
    })();
  }

  /** Returns false when the item does not exist. */
  removeMealItem(itemId: string): boolean {
    return this.db.transaction(() => {
      const context = this.itemContext(itemId);
      if (!context) return false;

      this.db.prepare<[string]>("DELETE FROM MealItem WHERE id = ?").run(itemId);
      this.recalcMealTotals(context.mealId);
      this.recalcDailyStats(context.userId, context.day);
      return true;
    })();
  }

  /** Where an item lives; tool handlers use it to check ownership. */
  findItem(itemId: string): ItemContext | null {
    const context = this.itemContext(itemId);
    return context ? { ...context, unit: asUnit(context.unit) } : null;
  }

  private itemContext(itemId: string): ItemContextRow | undefined {
    return this.db
      .prepare<[string], ItemContextRow>(
        `SELECT mi.mealId, mi.productBarcode, mi.customFoodId, mi.unit, m.userId, m.date AS day
         FROM MealItem mi
         JOIN Meal m ON m.id = mi.mealId
         WHERE mi.id = ?
         LIMIT 1`
      )
      .get(itemId);
  }

  private ensureMeal(userId: string, date: string, type: MealType): string {
    const existing = this.db
      .prepare<[string, string, string], { id: string }>(
        "SELECT id FROM Meal WHERE userId = ? AND date = ? AND type = ? LIMIT 1"
      )
      .get(userId, date, type);
    if (existing) return existing.id;

    const id = uuidv4();
    this.db
      .prepare<[string, string, string, string]>("INSERT INTO Meal (id, userId, date, type) VALUES (?, ?, ?, ?)")
      .run(id, userId, date, type);
    return id;
  }

  // Missing product or custom food rows are NotFoundError
  private loadSource(barcode: string | null, customFoodId: string | null): NutrientSource {
    if (customFoodId) {
      const row = this.db
        .prepare<[string], NutrientRow>(
          `SELECT ${NUTRIENT_COLUMNS}, gramsPerUnit FROM CustomFood WHERE id = ? LIMIT 1`
        )
        .get(customFoodId);
      if (!row) throw new NotFoundError(`Custom food ${customFoodId} not found`);
      return rowToSource(row);
    }
    const code = barcode ?? "";
    const row = this.db
      .prepare<[string], NutrientRow>(
        `SELECT ${NUTRIENT_COLUMNS}, NULL AS gramsPerUnit FROM Product WHERE barcode = ? LIMIT 1`
      )
      .get(code);
    if (!row) throw new NotFoundError(`Product ${code} not found`);
    return rowToSource(row);
  }

  private recalcMealTotals(mealId: string): void {
    const totals = this.db
      .prepare<[string], { kcal: number; protein: number; carb: number; fat: number }>(
        `SELECT COALESCE(SUM(kcal), 0)    AS kcal,
                COALESCE(SUM(protein), 0) AS protein,
                COALESCE(SUM(carb), 0)    AS carb,
                COALESCE(SUM(fat), 0)     AS fat
         FROM MealItem WHERE mealId = ?`
      )
      .get(mealId) ?? { kcal: 0, protein: 0, carb: 0, fat: 0 };

    this.db
      .prepare<[number, number, number, number, string]>(
        `UPDATE Meal SET totalKcal = ?, totalProtein = ?, totalCarb = ?, totalFat = ?, updatedAt = datetime('now')
         WHERE id = ?`
      )
      .run(Math.round(totals.kcal), totals.protein, totals.carb, totals.fat, mealId);
  }

  private recalcDailyStats(userId: string, date: string): void {
    const totals = sumDay(this.db, userId, date);
    upsertDailyStats(this.db, { userId, date, ...totals });
  }
}

/** Sums every item of the user's meals on a canonical day. */
export function sumDay(db: Database.Database, userId: string, date: string): NutritionTotals {
  const row = db
    .prepare<[string, string], NutritionTotals>(
      `SELECT COALESCE(SUM(mi.kcal), 0)    AS kcal,
              COALESCE(SUM(mi.protein), 0) AS protein,
              COALESCE(SUM(mi.carb), 0)    AS carb,
              COALESCE(SUM(mi.fat), 0)     AS fat,
              COALESCE(SUM(mi.sugars), 0)  AS sugars,
              COALESCE(SUM(mi.fiber), 0)   AS fiber,
              COALESCE(SUM(mi.salt), 0)    AS salt
       FROM Meal m
       JOIN MealItem mi ON mi.mealId = m.id
       WHERE m.userId = ? AND m.date = ?`
    )
    .get(userId, date);
  return row ?? { kcal: 0, protein: 0, carb: 0, fat: 0, sugars: 0, fiber: 0, salt: 0 };
}

export function upsertDailyStats(
  db: Database.Database,
  stats: NutritionTotals & { userId: string; date: string }
): void {
  db.prepare(
    `INSERT INTO DailyStats (userId, date, kcal, protein, carb, fat, sugars, fiber, salt)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(userId, date) DO UPDATE SET
       kcal = excluded.kcal, protein = excluded.protein, carb = excluded.carb, fat = excluded.fat,
       sugars = excluded.sugars, fiber = excluded.fiber, salt = excluded.salt,
       updatedAt = datetime('now')`
  ).run(
    stats.userId,
    stats.date,
    Math.round(stats.kcal),
    stats.protein,
    stats.carb,
    stats.fat,
    stats.sugars,
    stats.fiber,
    stats.salt
  );
}
