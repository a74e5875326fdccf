import { z } from "zod";
import { NotFoundError } from "../errors.js";
import { MEAL_TYPE_LABELS, MEAL_TYPES, UNITS, type MealItem } from "../types.js";
import { justDateIso } from "../utils/dates.js";
import { dayArg, g, upper } from "./format.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const mealType = z.preprocess(upper, z.enum(MEAL_TYPES));
const unit = z.preprocess(upper, z.enum(UNITS));

const AddMealItemSchema = z.object({
  meal: mealType.describe("breakfast, lunch, snack or dinner"),
  barcode: z.string().trim().min(1).optional(),
  custom_food_id: z.string().trim().min(1).optional(),
  quantity: z.number().positive(),
  unit: unit.default("GRAM"),
  date: z.string().optional(),
});

const UpdateMealItemSchema = z.object({
  item_id: z.string().min(1),
  quantity: z.number().positive(),
  unit: unit.optional(),
});

const ItemIdSchema = z.object({
  item_id: z.string().min(1),
});

const DateSchema = z.object({
  date: z.string().optional(),
});

function itemLine(item: MealItem): string {
  return (
    `- **${item.name ?? "(unknown)"}**${item.brand ? ` (${item.brand})` : ""} ` +
    `${g(item.quantity)} ${item.unit.toLowerCase()} - ${item.kcal ?? 0} kcal` +
    ` | P: ${g(item.protein)}g | C: ${g(item.carb)}g | F: ${g(item.fat)}g [ID: ${item.id}]`
  );
}

async function ownedItem(ctx: ToolContext, itemId: string) {
  const user = await ctx.users.requireUser();
  const item = ctx.meals.findItem(itemId);
  // items of other users are reported as missing
  if (!item || item.userId !== user.id) {
    throw new NotFoundError(`Meal item ${itemId} not found`);
  }
  return { user, item };
}

function dayTotal(ctx: ToolContext, userId: string, day: Date): number {
  return ctx.stats.getOrCompute(userId, day).kcal;
}

export const diaryTools: ToolDefinition[] = [
  {
    name: "add_meal_item",
    description:
      "Log a product (by barcode) or a custom food to a meal. Nutrients are computed from the " +
      "per-100g profile; PIECE uses the food's grams per unit.",
    inputSchema: {
      type: "object",
      properties: {
        meal: { type: "string", enum: ["breakfast", "lunch", "snack", "dinner"] },
        barcode: { type: "string", description: "Product barcode" },
        custom_food_id: { type: "string", description: "Custom food ID (instead of barcode)" },
        quantity: { type: "number", description: "Amount eaten" },
        unit: { type: "string", enum: ["gram", "ml", "piece"], description: "Default: gram" },
        date: { type: "string", description: "Date YYYY-MM-DD (default: today)" },
      },
      required: ["meal", "quantity"],
    },
    handler: async (args, ctx) => {
      const input = AddMealItemSchema.parse(args);
      const user = await ctx.users.requireUser();
      const day = dayArg(input.date, ctx.now());

      let name: string;
      if (input.barcode && !input.custom_food_id) {
        // may fetch from Open Food Facts so the item has a source row
        const product = await ctx.catalog.getByBarcode(input.barcode);
        if (!product) throw new NotFoundError(`No product found for barcode ${input.barcode}`);
        name = product.name;
      } else if (input.custom_food_id && !input.barcode) {
        const food = ctx.customFoods.getById(input.custom_food_id);
        if (!food || food.userId !== user.id) {
          throw new NotFoundError(`Custom food ${input.custom_food_id} not found`);
        }
        name = food.name;
      } else {
        name = "";
      }

      // MealsRepository rejects anything but exactly one source
      const itemId = ctx.meals.addMealItem({
        userId: user.id,
        day,
        mealType: input.meal,
        productBarcode: input.barcode ?? null,
        customFoodId: input.custom_food_id ?? null,
        unit: input.unit,
        quantity: input.quantity,
      });

      const item = ctx.meals
        .getMealsForDay(user.id, day)
        .flatMap((meal) => meal.items)
        .find((i) => i.id === itemId);

      let response = `Logged: **${name}** (${g(input.quantity)} ${input.unit.toLowerCase()}) to ${MEAL_TYPE_LABELS[input.meal]}\n`;
      response += `${item?.kcal ?? 0} kcal | P: ${g(item?.protein)}g | C: ${g(item?.carb)}g | F: ${g(item?.fat)}g\n`;
      response += `[ID: ${itemId}]\n\n`;
      response += `**Daily Total (${justDateIso(day)}):** ${dayTotal(ctx, user.id, day)} kcal`;
      return response;
    },
  },
  {
    name: "update_meal_item",
    description: "Change the quantity (and optionally the unit) of a logged item.",
    inputSchema: {
      type: "object",
      properties: {
        item_id: { type: "string", description: "ID of the meal item" },
        quantity: { type: "number", description: "New amount" },
        unit: { type: "string", enum: ["gram", "ml", "piece"], description: "Default: keep current unit" },
      },
      required: ["item_id", "quantity"],
    },
    handler: async (args, ctx) => {
      const input = UpdateMealItemSchema.parse(args);
      const { user, item } = await ownedItem(ctx, input.item_id);
      const newUnit = input.unit ?? item.unit;

      ctx.meals.updateMealItemQuantity(input.item_id, newUnit, input.quantity);

      const day = new Date(item.day);
      return (
        `Updated item ${input.item_id} to ${g(input.quantity)} ${newUnit.toLowerCase()}.\n\n` +
        `**Daily Total (${justDateIso(day)}):** ${dayTotal(ctx, user.id, day)} kcal`
      );
    },
  },
  {
    name: "remove_meal_item",
    description: "Delete a logged item by its ID.",
    inputSchema: {
      type: "object",
      properties: {
        item_id: { type: "string", description: "ID of the meal item" },
      },
      required: ["item_id"],
    },
    handler: async (args, ctx) => {
      const { item_id } = ItemIdSchema.parse(args);
      const { user, item } = await ownedItem(ctx, item_id);
      ctx.meals.removeMealItem(item_id);

      const day = new Date(item.day);
      return (
        `Item ${item_id} removed.\n\n` +
        `**Daily Total (${justDateIso(day)}):** ${dayTotal(ctx, user.id, day)} kcal`
      );
    },
  },
  {
    name: "get_diary_day",
    description: "Get all meals and items for a day with meal and daily totals.",
    inputSchema: {
      type: "object",
      properties: {
        date: { type: "string", description: "Date YYYY-MM-DD (default: today)" },
      },
    },
    handler: async (args, ctx) => {
      const { date } = DateSchema.parse(args);
      const user = await ctx.users.requireUser();
      const day = dayArg(date, ctx.now());
      const meals = ctx.meals.getMealsForDay(user.id, day).filter((meal) => meal.items.length > 0);

      if (meals.length === 0) {
        return `No food entries for ${justDateIso(day)}. Start logging with the add_meal_item tool!`;
      }

      let response = `## Food Log for ${justDateIso(day)}\n\n`;
      for (const meal of meals) {
        response += `### ${MEAL_TYPE_LABELS[meal.type]} (${meal.totalKcal} kcal)\n`;
        response += meal.items.map(itemLine).join("\n");
        response += "\n\n";
      }

      const stats = ctx.stats.getOrCompute(user.id, day);
      response += `### Daily Totals\n`;
      response += `- Calories: ${stats.kcal}\n`;
      response += `- Protein: ${g(stats.protein)}g\n`;
      response += `- Carbs: ${g(stats.carb)}g\n`;
      response += `- Fat: ${g(stats.fat)}g`;
      return response;
    },
  },
];
