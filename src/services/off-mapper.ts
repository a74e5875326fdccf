import type { ProductInput } from "../repositories/products-repository.js";
import { asNutriGrade } from "../repositories/products-repository.js";
import type { OffProductDto } from "./off-api.js";

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function firstNumber(nutriments: Record<string, unknown>, keys: string[]): number | null {
  for (const key of keys) {
    const value = toNumber(nutriments[key]);
    if (value !== null) return value;
  }
  return null;
}

/**
 * Maps an OFF product onto the local catalogue shape.
 * The name falls back to the barcode; kcal and carbs accept the older OFF keys.
 */
export function dtoToProductInput(dto: OffProductDto, etag?: string | null): ProductInput {
  const barcode = dto.code ?? "";
  const nutriments = dto.nutriments ?? {};
  const kcal = firstNumber(nutriments, ["energy-kcal_100g", "energy-kcal_100g_estimated", "energy-kcal"]);

  return {
    barcode,
    name: dto.product_name?.trim() || dto.product_name_en?.trim() || barcode,
    brand: dto.brands?.trim() || null,
    nutriScore: asNutriGrade(dto.nutriscore_grade ?? dto.nutrition_grades),
    imageUrl: dto.image_small_url ?? dto.image_url ?? null,
    countries: dto.countries ?? null,
    kcal: kcal === null ? null : Math.round(kcal),
    protein: firstNumber(nutriments, ["proteins_100g"]),
    carb: firstNumber(nutriments, ["carbohydrates_100g", "carbs_100g"]),
    fat: firstNumber(nutriments, ["fat_100g"]),
    sugars: firstNumber(nutriments, ["sugars_100g"]),
    fiber: firstNumber(nutriments, ["fiber_100g"]),
    salt: firstNumber(nutriments, ["salt_100g"]),
    etag: etag ?? null,
    offRaw: dto.nutriments ? JSON.stringify(dto.nutriments) : null,
  };
}
