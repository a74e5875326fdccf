import { z } from "zod";
import { NUTRI_GRADES, type Product } from "../types.js";
import { productDetail, productLine } from "./format.js";
import type { ToolDefinition } from "./types.js";

const BarcodeSchema = z.object({
  barcode: z.string().trim().min(1).describe("EAN/UPC barcode"),
});

const SearchSchema = z.object({
  query: z.string().describe("Name, brand or barcode fragment"),
  limit: z.number().int().positive().max(100).optional().default(10),
});

const LocalSearchSchema = SearchSchema.extend({
  page: z.number().int().positive().optional(),
  country: z.string().trim().min(1).optional(),
});

const nutrient = z.number().nonnegative().optional();

const SaveProductSchema = z.object({
  barcode: z.string().trim().min(1),
  name: z.string().trim().min(1),
  brand: z.string().optional(),
  nutri_score: z.enum(NUTRI_GRADES).optional(),
  kcal: nutrient,
  protein: nutrient,
  carb: nutrient,
  fat: nutrient,
  sugars: nutrient,
  fiber: nutrient,
  salt: nutrient,
});

function formatList(products: Product[], query: string): string {
  const formatted = products.map((p, i) => `${i + 1}. ${productLine(p)}`).join("\n\n");
  return `Found ${products.length} products matching "${query}":\n\n${formatted}`;
}

export const productTools: ToolDefinition[] = [
  {
    name: "scan_barcode",
    description:
      "Look up a product by barcode (local catalogue first, Open Food Facts when missing or stale) " +
      "and record it in the scan history.",
    inputSchema: {
      type: "object",
      properties: {
        barcode: { type: "string", description: "EAN/UPC barcode" },
      },
      required: ["barcode"],
    },
    handler: async (args, ctx) => {
      const { barcode } = BarcodeSchema.parse(args);
      const user = await ctx.users.requireUser();
      const product = await ctx.catalog.getByBarcode(barcode);
      if (!product) {
        return `No product found for barcode ${barcode}. You can add it with save_product.`;
      }

      ctx.history.addIfNotDuplicate(user.id, {
        barcode: product.barcode,
        name: product.name,
        brand: product.brand,
        nutriScore: product.nutriScore,
        calories: product.kcal,
        proteins: product.protein,
        carbs: product.carb,
        fat: product.fat,
      });

      const favorite = ctx.favorites.isFavorited(user.id, product.barcode);
      return `${productDetail(product)}\n\n${favorite ? "★ In your favourites" : "Not in your favourites"}`;
    },
  },
  {
    name: "get_product",
    description: "Show a product by barcode without recording a scan.",
    inputSchema: {
      type: "object",
      properties: {
        barcode: { type: "string", description: "EAN/UPC barcode" },
      },
      required: ["barcode"],
    },
    handler: async (args, ctx) => {
      const { barcode } = BarcodeSchema.parse(args);
      await ctx.users.requireUser();
      const product = await ctx.catalog.getByBarcode(barcode);
      return product ? productDetail(product) : `No product found for barcode ${barcode}.`;
    },
  },
  {
    name: "search_products",
    description:
      "Search the local product catalogue by name, brand or barcode. " +
      "Use search_products_online when nothing relevant is found.",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "Name, brand or barcode fragment" },
        limit: { type: "number", description: "Number of results (default: 10)" },
        page: { type: "number", description: "Page of alphabetical results; switches off relevance ranking" },
        country: { type: "string", description: "Only products sold in this country, e.g. 'portugal'" },
      },
      required: ["query"],
    },
    handler: async (args, ctx) => {
      const { query, limit, page, country } = LocalSearchSchema.parse(args);
      await ctx.users.requireUser();
      // paging and the country filter use the alphabetical listing
      const results =
        page !== undefined || country !== undefined
          ? ctx.products.searchLocal(query, { page, pageSize: limit, countriesFilter: country ? `%${country}%` : null })
          : ctx.catalog.search(query, limit);
      if (results.length === 0) {
        return `No local products match "${query}". Try search_products_online.`;
      }
      return formatList(results, query);
    },
  },
  {
    name: "search_products_online",
    description: "Search Open Food Facts, cache the results locally and return the ranked local matches.",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "Search terms" },
        limit: { type: "number", description: "Number of results (default: 10)" },
      },
      required: ["query"],
    },
    handler: async (args, ctx) => {
      const { query, limit } = SearchSchema.parse(args);
      await ctx.users.requireUser();
      if (!ctx.catalog.online) {
        return "Online search is disabled (OFF_ENABLED=false).";
      }
      const results = await ctx.catalog.fetchOnlineAndCache(query, limit);
      if (results.length === 0) {
        return `No products found online for "${query}".`;
      }
      return formatList(results, query);
    },
  },
  {
    name: "save_product",
    description: "Add or correct a product in the local catalogue. Nutrients are per 100g.",
    inputSchema: {
      type: "object",
      properties: {
        barcode: { type: "string" },
        name: { type: "string" },
        brand: { type: "string" },
        nutri_score: { type: "string", enum: NUTRI_GRADES },
        kcal: { type: "number", description: "kcal per 100g" },
        protein: { type: "number", description: "g per 100g" },
        carb: { type: "number", description: "g per 100g" },
        fat: { type: "number", description: "g per 100g" },
        sugars: { type: "number", description: "g per 100g" },
        fiber: { type: "number", description: "g per 100g" },
        salt: { type: "number", description: "g per 100g" },
      },
      required: ["barcode", "name"],
    },
    handler: async (args, ctx) => {
      const input = SaveProductSchema.parse(args);
      await ctx.users.requireUser();
      const saved = ctx.products.upsert({
        barcode: input.barcode,
        name: input.name,
        brand: input.brand ?? null,
        nutriScore: input.nutri_score ?? null,
        kcal: input.kcal ?? null,
        protein: input.protein ?? null,
        carb: input.carb ?? null,
        fat: input.fat ?? null,
        sugars: input.sugars ?? null,
        fiber: input.fiber ?? null,
        salt: input.salt ?? null,
      });
      return `Saved:\n\n${productDetail(saved)}`;
    },
  },
];
