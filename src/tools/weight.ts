import { z } from "zod";
import { addDays, justDateIso } from "../utils/dates.js";
import { weightProgress } from "../utils/weight-progress.js";
import { dayArg, g } from "./format.js";
import type { ToolDefinition } from "./types.js";

const RANGE_DAYS = { "30d": 30, "90d": 90, "180d": 180, "365d": 365 } as const;
const RANGES = ["30d", "90d", "180d", "365d"] as const;

const LogWeightSchema = z.object({
  weight_kg: z.number().positive(),
  date: z.string().optional(),
  note: z.string().optional(),
});

const ProgressSchema = z.object({
  range: z.enum(RANGES).default("90d"),
});

const signed = (value: number, digits = 1): string => `${value > 0 ? "+" : ""}${value.toFixed(digits)}`;

export const weightTools: ToolDefinition[] = [
  {
    name: "log_weight",
    description: "Log a body weight measurement. Several logs per day are kept.",
    inputSchema: {
      type: "object",
      properties: {
        weight_kg: { type: "number", description: "Weight in kg" },
        date: { type: "string", description: "Date YYYY-MM-DD (default: today)" },
        note: { type: "string", description: "Optional note" },
      },
      required: ["weight_kg"],
    },
    handler: async (args, ctx) => {
      const input = LogWeightSchema.parse(args);
      const user = await ctx.users.requireUser();
      const day = dayArg(input.date, ctx.now());
      ctx.weight.addLog(user.id, day, input.weight_kg, input.note);
      return `Logged ${g(input.weight_kg)} kg on ${justDateIso(day)}.`;
    },
  },
  {
    name: "get_weight_progress",
    description: "Weight trend over the last 30, 90, 180 or 365 days.",
    inputSchema: {
      type: "object",
      properties: {
        range: { type: "string", enum: RANGES, description: "Default: 90d" },
      },
    },
    handler: async (args, ctx) => {
      const { range } = ProgressSchema.parse(args);
      const user = await ctx.users.requireUser();
      const to = dayArg(undefined, ctx.now());
      const from = addDays(to, -RANGE_DAYS[range]);

      const points = ctx.weight.getRange(user.id, from, to);
      const summary = weightProgress(points, from, to);

      let response = `## Weight Progress: ${summary.from} to ${summary.to}\n\n`;
      if (summary.latest === null || summary.start === null) {
        const last = ctx.weight.latest(user.id);
        return (
          response +
          (last
            ? `No weight logs in this range. Last log: ${g(last.kg)} kg on ${last.day}.`
            : "No weight logs in this range. Use log_weight to add one.")
        );
      }

      response += `- Latest: ${g(summary.latest)} kg\n`;
      response += `- Start: ${g(summary.start)} kg\n`;
      response += `- Change: ${signed(summary.deltaKg ?? 0)} kg (${signed(summary.deltaPct ?? 0)}%)\n`;
      response += `- Per week: ${signed(summary.perWeek ?? 0, 2)} kg\n`;
      response += `- Logs: ${summary.count}\n`;

      const goals = ctx.goals.getByUser(user.id);
      if (goals && goals.targetWeightKg > 0) {
        response += `- Target: ${g(goals.targetWeightKg)} kg (${signed(goals.targetWeightKg - summary.latest)} kg to go)\n`;
      }

      response += `\n### Logs\n`;
      response += points.map((p) => `- ${p.day}: ${g(p.kg)} kg${p.note ? ` (${p.note})` : ""}`).join("\n");
      return response;
    },
  },
];
