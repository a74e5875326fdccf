import { z } from "zod";
import { g } from "./format.js";
import type { ToolDefinition } from "./types.js";

const page = z.number().int().positive().optional().default(1);
const pageSize = z.number().int().positive().max(100).optional().default(20);

const ListHistorySchema = z.object({
  page,
  page_size: pageSize,
  from: z.string().optional(),
  to: z.string().optional(),
});

const ToggleFavoriteSchema = z.object({
  barcode: z.string().trim().min(1),
});

const ListFavoritesSchema = z.object({
  page,
  page_size: pageSize,
  query: z.string().optional(),
});

export const historyTools: ToolDefinition[] = [
  {
    name: "list_history",
    description: "List scanned products, newest first.",
    inputSchema: {
      type: "object",
      properties: {
        page: { type: "number", description: "Page (default: 1)" },
        page_size: { type: "number", description: "Page size (default: 20)" },
        from: { type: "string", description: "Only scans at or after this date (YYYY-MM-DD)" },
        to: { type: "string", description: "Only scans at or before this date (YYYY-MM-DD, whole day) or time ('YYYY-MM-DD HH:MM:SS')" },
      },
    },
    handler: async (args, ctx) => {
      const input = ListHistorySchema.parse(args);
      const user = await ctx.users.requireUser();
      const entries = ctx.history.list(user.id, {
        page: input.page,
        pageSize: input.page_size,
        from: input.from,
        to: input.to,
      });
      if (entries.length === 0) return "No scans found.";

      const lines = entries.map(
        (e) =>
          `- ${e.scannedAt}: **${e.name ?? e.barcode ?? "(removed product)"}**${e.brand ? ` (${e.brand})` : ""}` +
          `${e.nutriScore ? ` [Nutri-Score ${e.nutriScore}]` : ""} - ${e.calories ?? "?"} kcal/100g` +
          ` | P: ${g(e.proteins)}g | C: ${g(e.carbs)}g | F: ${g(e.fat)}g`
      );
      return `## Scan History (page ${input.page})\n\n${lines.join("\n")}`;
    },
  },
  {
    name: "toggle_favorite",
    description: "Add a product to your favourites, or remove it if it already is one.",
    inputSchema: {
      type: "object",
      properties: {
        barcode: { type: "string", description: "Product barcode" },
      },
      required: ["barcode"],
    },
    handler: async (args, ctx) => {
      const { barcode } = ToggleFavoriteSchema.parse(args);
      const user = await ctx.users.requireUser();
      const product = ctx.products.getByBarcode(barcode);
      const label = product?.name ?? barcode;

      return ctx.favorites.toggle(user.id, barcode, product?.name, product?.brand)
        ? `Added ${label} to favourites.`
        : `Removed ${label} from favourites.`;
    },
  },
  {
    name: "list_favorites",
    description: "List favourite products, newest first, optionally filtered by name, brand or barcode.",
    inputSchema: {
      type: "object",
      properties: {
        page: { type: "number", description: "Page (default: 1)" },
        page_size: { type: "number", description: "Page size (default: 20)" },
        query: { type: "string", description: "Filter on name, brand or barcode" },
      },
    },
    handler: async (args, ctx) => {
      const input = ListFavoritesSchema.parse(args);
      const user = await ctx.users.requireUser();
      const favorites = ctx.favorites.list(user.id, { page: input.page, pageSize: input.page_size, q: input.query });
      if (favorites.length === 0) return input.query ? `No favourites match "${input.query}".` : "No favourites yet.";

      const lines = favorites.map(
        (f) =>
          `- **${f.name}**${f.brand ? ` (${f.brand})` : ""} [${f.barcode}] - ${f.kcal ?? "?"} kcal/100g` +
          ` | P: ${g(f.protein)}g | C: ${g(f.carb)}g | F: ${g(f.fat)}g`
      );
      return `## Favourites\n\n${lines.join("\n")}`;
    },
  },
];
