import type Database from "better-sqlite3";
import { v4 as uuidv4 } from "uuid";
import { ValidationError } from "../errors.js";
import { UNITS, type CustomFood, type Per100g, type Unit } from "../types.js";

interface CustomFoodRow {
  id: string;
  userId: string;
  name: string;
  brand: string | null;
  defaultUnit: string;
  gramsPerUnit: number | null;
  energyKcal_100g: number | null;
  proteins_100g: number | null;
  carbs_100g: number | null;
  fat_100g: number | null;
  sugars_100g: number | null;
  fiber_100g: number | null;
  salt_100g: number | null;
}

export interface CustomFoodInput extends Partial<Per100g> {
  name: string;
  brand?: string | null;
  defaultUnit?: Unit;
  /** Weight of one piece, or density for ML. */
  gramsPerUnit?: number | null;
}

const COLUMNS = `id, userId, name, brand, defaultUnit, gramsPerUnit,
  energyKcal_100g, proteins_100g, carbs_100g, fat_100g, sugars_100g, fiber_100g, salt_100g`;

function rowToCustomFood(row: CustomFoodRow): CustomFood {
  return {
    id: row.id,
    userId: row.userId,
    name: row.name,
    brand: row.brand,
    defaultUnit: UNITS.find((u) => u === row.defaultUnit) ?? "GRAM",
    gramsPerUnit: row.gramsPerUnit,
    kcal: row.energyKcal_100g,
    protein: row.proteins_100g,
    carb: row.carbs_100g,
    fat: row.fat_100g,
    sugars: row.sugars_100g,
    fiber: row.fiber_100g,
    salt: row.salt_100g,
  };
}

/** Foods the user defines by hand; they can be logged like products. */
export class CustomFoodsRepository {
  constructor(private readonly db: Database.Database) {}

  create(userId: string, food: CustomFoodInput): string {
    const name = food.name.trim();
    if (!name) throw new ValidationError("Custom food name is required");
    if (food.gramsPerUnit != null && food.gramsPerUnit <= 0) {
      throw new ValidationError("gramsPerUnit must be greater than 0");
    }

    const id = uuidv4();
    this.db
      .prepare(
        `INSERT INTO CustomFood (${COLUMNS})
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        id,
        userId,
        name,
        food.brand?.trim() || null,
        food.defaultUnit ?? "GRAM",
        food.gramsPerUnit ?? null,
        food.kcal == null ? null : Math.round(food.kcal),
        food.protein ?? null,
        food.carb ?? null,
        food.fat ?? null,
        food.sugars ?? null,
        food.fiber ?? null,
        food.salt ?? null
      );
    return id;
  }

  getById(id: string): CustomFood | null {
    const row = this.db
      .prepare<[string], CustomFoodRow>(`SELECT ${COLUMNS} FROM CustomFood WHERE id = ? LIMIT 1`)
      .get(id);
    return row ? rowToCustomFood(row) : null;
  }

  list(userId: string): CustomFood[] {
    return this.db
      .prepare<[string], CustomFoodRow>(`SELECT ${COLUMNS} FROM CustomFood WHERE userId = ? ORDER BY name COLLATE NOCASE`)
      .all(userId)
      .map(rowToCustomFood);
  }
}
