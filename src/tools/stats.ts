import { z } from "zod";
import { MEAL_TYPE_LABELS, MEAL_TYPES, type MealType } from "../types.js";
import { justDateIso } from "../utils/dates.js";
import { macroTargets } from "../utils/food-calc.js";
import { dayArg, g, round1 } from "./format.js";
import type { ToolDefinition } from "./types.js";

const StatsSchema = z.object({
  date: z.string().optional(),
});

function progress(actual: number, target: number): string {
  if (target <= 0) return `${g(actual)}g`;
  return `${g(actual)}g / ${g(target)}g (${Math.round((actual / target) * 100)}%)`;
}

export const statsTools: ToolDefinition[] = [
  {
    name: "get_nutrition_stats",
    description:
      "Nutrition statistics for a day: kcal against the goal, macros against their targets, " +
      "kcal per meal and the remaining kcal.",
    inputSchema: {
      type: "object",
      properties: {
        date: { type: "string", description: "Date YYYY-MM-DD (default: today)" },
      },
    },
    handler: async (args, ctx) => {
      const { date } = StatsSchema.parse(args);
      const user = await ctx.users.requireUser();
      const day = dayArg(date, ctx.now());

      const stats = ctx.stats.getOrCompute(user.id, day);
      const goals = ctx.goals.getByUser(user.id);
      const goalKcal = goals?.dailyCalories ?? 0;
      const targets = macroTargets(goalKcal, goals ?? {});

      const perMeal = new Map<MealType, number>();
      for (const type of MEAL_TYPES) perMeal.set(type, 0);
      for (const meal of ctx.meals.getMealsForDay(user.id, day)) {
        perMeal.set(meal.type, meal.totalKcal);
      }

      let response = `## Nutrition Stats for ${justDateIso(day)}\n\n`;
      response += `### Calories\n`;
      response += `- Eaten: ${stats.kcal}`;
      if (goalKcal > 0) {
        const remaining = goalKcal - stats.kcal;
        response += ` / ${goalKcal} (${Math.round((stats.kcal / goalKcal) * 100)}%)`;
        response += `\n- ${remaining >= 0 ? `Remaining: ${remaining}` : `Over goal: ${Math.abs(remaining)}`}`;
      } else {
        response += `\n- No calorie goal set (use set_goals)`;
      }

      response += `\n\n### Macros\n`;
      response += `- Carbs: ${progress(stats.carb, targets.carbG)}\n`;
      response += `- Protein: ${progress(stats.protein, targets.proteinG)}\n`;
      response += `- Fat: ${progress(stats.fat, targets.fatG)}\n`;
      response += `- Sugars: ${g(stats.sugars)}g | Fiber: ${g(stats.fiber)}g | Salt: ${g(stats.salt)}g`;

      response += `\n\n### Calories per Meal\n`;
      for (const [type, kcal] of perMeal) {
        const share = stats.kcal > 0 ? ` (${round1((kcal / stats.kcal) * 100)}%)` : "";
        response += `- ${MEAL_TYPE_LABELS[type]}: ${kcal} kcal${share}\n`;
      }
      return response.trimEnd();
    },
  },
];
