import type { Product } from "../types.js";
import { parseDay } from "../utils/dates.js";
import { ValidationError } from "../errors.js";

/** zod preprocessor for case-insensitive enum arguments. */
export const upper = (value: unknown): unknown => (typeof value === "string" ? value.trim().toUpperCase() : value);

export const round1 = (value: number): number => Math.round(value * 10) / 10;

/** Number with one decimal, or "?" when unknown. */
export function g(value: number | null | undefined): string {
  return value == null ? "?" : String(round1(value));
}

/** Resolves an optional `YYYY-MM-DD` argument, defaulting to the UTC day of `now`. */
export function dayArg(value: string | undefined, now: Date): Date {
  if (!value) {
    return parseDay(now.toISOString().split("T")[0]);
  }
  try {
    return parseDay(value);
  } catch (error) {
    throw new ValidationError(error instanceof Error ? error.message : String(error));
  }
}

export function productLine(product: Pick<Product, "barcode" | "name" | "brand" | "kcal" | "protein" | "carb" | "fat">): string {
  return (
    `**${product.name}**${product.brand ? ` (${product.brand})` : ""} [${product.barcode}]\n` +
    `   Per 100g: ${product.kcal ?? "?"} kcal | P: ${g(product.protein)}g | C: ${g(product.carb)}g | F: ${g(product.fat)}g`
  );
}

export function productDetail(product: Product): string {
  let text = `## ${product.name}\n`;
  if (product.brand) text += `Brand: ${product.brand}\n`;
  text += `Barcode: ${product.barcode}\n`;
  if (product.nutriScore) text += `Nutri-Score: ${product.nutriScore}\n`;
  text += `\n### Per 100g\n`;
  text += `- Energy: ${product.kcal ?? "?"} kcal\n`;
  text += `- Protein: ${g(product.protein)}g\n`;
  text += `- Carbs: ${g(product.carb)}g (sugars ${g(product.sugars)}g)\n`;
  text += `- Fat: ${g(product.fat)}g\n`;
  text += `- Fiber: ${g(product.fiber)}g\n`;
  text += `- Salt: ${g(product.salt)}g`;
  return text;
}
