import { z } from "zod";
import { ValidationError } from "../errors.js";
import { ACTIVITY_LEVELS, SEXES, type UserGoals } from "../types.js";
import { justDateIso, parseDay } from "../utils/dates.js";
import { DEFAULT_MACRO_SPLIT, macroTargets } from "../utils/food-calc.js";
import { round1 } from "./format.js";
import type { ToolDefinition } from "./types.js";

const isoDay = z.string().refine((value) => {
  try {
    parseDay(value);
    return true;
  } catch {
    return false;
  }
}, "Expected a date in YYYY-MM-DD format");

const percent = z.number().int().min(0).max(100);

const SetGoalsSchema = z.object({
  sex: z.enum(SEXES).default("OTHER"),
  date_of_birth: isoDay.optional(),
  height_cm: z.number().positive(),
  current_weight_kg: z.number().positive(),
  target_weight_kg: z.number().positive(),
  target_date: isoDay.optional(),
  activity_level: z.enum(ACTIVITY_LEVELS).default("sedentary"),
  low_salt: z.boolean().default(false),
  low_sugar: z.boolean().default(false),
  vegetarian: z.boolean().default(false),
  vegan: z.boolean().default(false),
  allergens: z.string().optional(),
  daily_calories: z.number().int().positive().optional(),
  carb_percent: percent.optional(),
  protein_percent: percent.optional(),
  fat_percent: percent.optional(),
});

function formatGoals(goals: UserGoals): string {
  const split = {
    carbPercent: goals.carbPercent ?? DEFAULT_MACRO_SPLIT.carbPercent,
    proteinPercent: goals.proteinPercent ?? DEFAULT_MACRO_SPLIT.proteinPercent,
    fatPercent: goals.fatPercent ?? DEFAULT_MACRO_SPLIT.fatPercent,
  };
  const targets = macroTargets(goals.dailyCalories ?? 0, split);
  const prefs = [
    goals.lowSalt && "low salt",
    goals.lowSugar && "low sugar",
    goals.vegetarian && "vegetarian",
    goals.vegan && "vegan",
  ].filter((p): p is string => Boolean(p));

  let text = `- Sex: ${goals.sex}\n`;
  text += `- Date of birth: ${goals.dateOfBirth ?? "not set"}\n`;
  text += `- Height: ${goals.heightCm} cm\n`;
  text += `- Weight: ${goals.currentWeightKg} kg → target ${goals.targetWeightKg} kg`;
  if (goals.targetDate) text += ` by ${goals.targetDate}`;
  text += `\n- Activity: ${goals.activityLevel}\n`;
  text += `- Preferences: ${prefs.length > 0 ? prefs.join(", ") : "none"}\n`;
  if (goals.allergens) text += `- Allergens: ${goals.allergens}\n`;
  text += `- Calories: ${goals.dailyCalories ?? "not set"}\n`;
  text += `- Carbs: ${round1(targets.carbG)}g (${split.carbPercent}%)\n`;
  text += `- Protein: ${round1(targets.proteinG)}g (${split.proteinPercent}%)\n`;
  text += `- Fat: ${round1(targets.fatG)}g (${split.fatPercent}%)`;
  return text;
}

export const goalsTools: ToolDefinition[] = [
  {
    name: "set_goals",
    description:
      "Save body data, dietary preferences and nutrition targets; completes onboarding. " +
      "Without daily_calories the goal is estimated from body data and activity.",
    inputSchema: {
      type: "object",
      properties: {
        sex: { type: "string", enum: SEXES },
        date_of_birth: { type: "string", description: "YYYY-MM-DD" },
        height_cm: { type: "number", description: "Height in cm" },
        current_weight_kg: { type: "number", description: "Current weight in kg (also logged for today)" },
        target_weight_kg: { type: "number", description: "Target weight in kg" },
        target_date: { type: "string", description: "YYYY-MM-DD" },
        activity_level: { type: "string", enum: ACTIVITY_LEVELS },
        low_salt: { type: "boolean" },
        low_sugar: { type: "boolean" },
        vegetarian: { type: "boolean" },
        vegan: { type: "boolean" },
        allergens: { type: "string", description: "Free text, e.g. 'peanuts, gluten'" },
        daily_calories: { type: "number", description: "Daily kcal goal" },
        carb_percent: { type: "number", description: "Share of kcal from carbs (default 50)" },
        protein_percent: { type: "number", description: "Share of kcal from protein (default 20)" },
        fat_percent: { type: "number", description: "Share of kcal from fat (default 30)" },
      },
      required: ["height_cm", "current_weight_kg", "target_weight_kg"],
    },
    handler: async (args, ctx) => {
      const input = SetGoalsSchema.parse(args);
      const user = await ctx.users.requireUser();

      const percents = [input.carb_percent, input.protein_percent, input.fat_percent];
      const given = percents.filter((p): p is number => p !== undefined);
      if (given.length > 0) {
        if (given.length < 3) {
          throw new ValidationError("Give carb_percent, protein_percent and fat_percent together");
        }
        const total = given.reduce((sum, p) => sum + p, 0);
        if (total !== 100) {
          throw new ValidationError(`Macro percentages must add up to 100 (got ${total})`);
        }
      }

      const saved = ctx.goals.upsert(
        {
          userId: user.id,
          sex: input.sex,
          dateOfBirth: input.date_of_birth ?? null,
          heightCm: input.height_cm,
          currentWeightKg: input.current_weight_kg,
          targetWeightKg: input.target_weight_kg,
          targetDate: input.target_date ?? null,
          activityLevel: input.activity_level,
          lowSalt: input.low_salt,
          lowSugar: input.low_sugar,
          vegetarian: input.vegetarian,
          vegan: input.vegan,
          allergens: input.allergens?.trim() || null,
          dailyCalories: input.daily_calories ?? null,
          carbPercent: input.carb_percent ?? null,
          proteinPercent: input.protein_percent ?? null,
          fatPercent: input.fat_percent ?? null,
        },
        justDateIso(ctx.now())
      );

      return `**Goals Updated:**\n${formatGoals(saved)}`;
    },
  },
  {
    name: "get_goals",
    description: "Show the saved goals and the macro targets derived from them.",
    inputSchema: { type: "object", properties: {} },
    handler: async (_args, ctx) => {
      const user = await ctx.users.requireUser();
      const goals = ctx.goals.getByUser(user.id);
      if (!goals) return "No goals set yet. Use set_goals to create them.";
      return `**Current Goals:**\n${formatGoals(goals)}`;
    },
  },
];
