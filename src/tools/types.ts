import type Database from "better-sqlite3";
import type { CustomFoodsRepository } from "../repositories/custom-foods-repository.js";
import type { FavoritesRepository } from "../repositories/favorites-repository.js";
import type { GoalsRepository } from "../repositories/goals-repository.js";
import type { HistoryRepository } from "../repositories/history-repository.js";
import type { MealsRepository } from "../repositories/meals-repository.js";
import type { ProductsRepository } from "../repositories/products-repository.js";
import type { StatsRepository } from "../repositories/stats-repository.js";
import type { UserRepository } from "../repositories/user-repository.js";
import type { WeightRepository } from "../repositories/weight-repository.js";
import type { ProductCatalog } from "../services/product-catalog.js";
import type { SecureStore } from "../services/secure-store.js";

export interface ToolContext {
  db: Database.Database;
  secure: SecureStore;
  users: UserRepository;
  goals: GoalsRepository;
  products: ProductsRepository;
  catalog: ProductCatalog;
  customFoods: CustomFoodsRepository;
  meals: MealsRepository;
  stats: StatsRepository;
  weight: WeightRepository;
  history: HistoryRepository;
  favorites: FavoritesRepository;
  /** Overridable clock for "today" defaults. */
  now: () => Date;
}

export type JsonSchemaProperty = {
  type: "string" | "number" | "boolean";
  description?: string;
  enum?: readonly string[];
};

export type ToolInputSchema = {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
};

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  /** Returns the Markdown shown to the client. */
  handler: (args: unknown, ctx: ToolContext) => Promise<string>;
}

export type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};
