import { z } from "zod";
import { UNITS } from "../types.js";
import { g, upper } from "./format.js";
import type { ToolDefinition } from "./types.js";

const nutrient = z.number().nonnegative().optional();

const CreateCustomFoodSchema = z.object({
  name: z.string().trim().min(1),
  brand: z.string().optional(),
  default_unit: z.preprocess(upper, z.enum(UNITS)).default("GRAM"),
  grams_per_unit: z.number().positive().optional(),
  kcal: nutrient,
  protein: nutrient,
  carb: nutrient,
  fat: nutrient,
  sugars: nutrient,
  fiber: nutrient,
  salt: nutrient,
});

export const customFoodTools: ToolDefinition[] = [
  {
    name: "create_custom_food",
    description:
      "Define your own food (per 100g). For PIECE units give grams_per_unit, e.g. 60 for one egg; " +
      "for ML it is the density in g/ml.",
    inputSchema: {
      type: "object",
      properties: {
        name: { type: "string" },
        brand: { type: "string" },
        default_unit: { type: "string", enum: UNITS },
        grams_per_unit: { type: "number", description: "Grams per piece, or g/ml" },
        kcal: { type: "number", description: "kcal per 100g" },
        protein: { type: "number", description: "g per 100g" },
        carb: { type: "number", description: "g per 100g" },
        fat: { type: "number", description: "g per 100g" },
        sugars: { type: "number", description: "g per 100g" },
        fiber: { type: "number", description: "g per 100g" },
        salt: { type: "number", description: "g per 100g" },
      },
      required: ["name"],
    },
    handler: async (args, ctx) => {
      const input = CreateCustomFoodSchema.parse(args);
      const user = await ctx.users.requireUser();
      const id = ctx.customFoods.create(user.id, {
        name: input.name,
        brand: input.brand ?? null,
        defaultUnit: input.default_unit,
        gramsPerUnit: input.grams_per_unit ?? null,
        kcal: input.kcal ?? null,
        protein: input.protein ?? null,
        carb: input.carb ?? null,
        fat: input.fat ?? null,
        sugars: input.sugars ?? null,
        fiber: input.fiber ?? null,
        salt: input.salt ?? null,
      });
      return `Created custom food **${input.name}** [ID: ${id}]. Log it with add_meal_item using custom_food_id.`;
    },
  },
  {
    name: "list_custom_foods",
    description: "List your custom foods.",
    inputSchema: { type: "object", properties: {} },
    handler: async (_args, ctx) => {
      const user = await ctx.users.requireUser();
      const foods = ctx.customFoods.list(user.id);
      if (foods.length === 0) return "No custom foods yet. Create one with create_custom_food.";

      const lines = foods.map(
        (f) =>
          `- **${f.name}**${f.brand ? ` (${f.brand})` : ""} - ${f.kcal ?? "?"} kcal/100g | ` +
          `P: ${g(f.protein)}g | C: ${g(f.carb)}g | F: ${g(f.fat)}g | unit ${f.defaultUnit}` +
          `${f.gramsPerUnit != null ? ` (${f.gramsPerUnit} g/unit)` : ""} [ID: ${f.id}]`
      );
      return `## Custom Foods\n\n${lines.join("\n")}`;
    },
  },
];
