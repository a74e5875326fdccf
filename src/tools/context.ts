import type Database from "better-sqlite3";
import type { OffConfig } from "../config.js";
import { CustomFoodsRepository } from "../repositories/custom-foods-repository.js";
import { FavoritesRepository } from "../repositories/favorites-repository.js";
import { GoalsRepository } from "../repositories/goals-repository.js";
import { HistoryRepository } from "../repositories/history-repository.js";
import { MealsRepository } from "../repositories/meals-repository.js";
import { ProductsRepository } from "../repositories/products-repository.js";
import { StatsRepository } from "../repositories/stats-repository.js";
import { UserRepository } from "../repositories/user-repository.js";
import { WeightRepository } from "../repositories/weight-repository.js";
import { NetThrottle } from "../services/net-throttle.js";
import { OffApi } from "../services/off-api.js";
import { ProductCatalog } from "../services/product-catalog.js";
import { ThrottledOffSource, type RemoteProductSource } from "../services/products-remote.js";
import type { SecureStore } from "../services/secure-store.js";
import type { ToolContext } from "./types.js";

export interface ToolContextOptions {
  db: Database.Database;
  secure: SecureStore;
  off: OffConfig;
  /** Replaces the Open Food Facts client, e.g. in tests. */
  remote?: RemoteProductSource | null;
  now?: () => Date;
}

export function createRemoteSource(off: OffConfig): RemoteProductSource {
  const api = new OffApi({ baseUrl: off.baseUrl, userAgent: off.userAgent, searchPageSize: off.searchPageSize });
  const throttle = new NetThrottle({
    searchPerMinute: off.searchPerMinute,
    productPerMinute: off.productPerMinute,
    maxConcurrent: off.maxConcurrent,
  });
  return new ThrottledOffSource(api, throttle);
}

export function createToolContext(options: ToolContextOptions): ToolContext {
  const { db, secure, off } = options;
  const products = new ProductsRepository(db);
  const remote = options.remote !== undefined ? options.remote : off.enabled ? createRemoteSource(off) : null;

  return {
    db,
    secure,
    users: new UserRepository(db, secure),
    goals: new GoalsRepository(db),
    products,
    catalog: new ProductCatalog(products, remote, {
      onlineEnabled: off.enabled,
      cacheTtlDays: off.cacheTtlDays,
      maxConcurrent: off.maxConcurrent,
      now: options.now,
    }),
    customFoods: new CustomFoodsRepository(db),
    meals: new MealsRepository(db),
    stats: new StatsRepository(db),
    weight: new WeightRepository(db),
    history: new HistoryRepository(db, products),
    favorites: new FavoritesRepository(db, products),
    now: options.now ?? (() => new Date()),
  };
}
