import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { normalizeQuery, type ProductsRepository } from "../repositories/products-repository.js";
import type { Product } from "../types.js";
import { dtoToProductInput } from "./off-mapper.js";
import type { RemoteProductSource } from "./products-remote.js";
import { SyncQueue } from "./sync-queue.js";

const log = createLogger("products");

const DAY_MS = 24 * 60 * 60 * 1000;

export interface ProductCatalogOptions {
  /** When false, lookups never leave the local database. */
  onlineEnabled: boolean;
  cacheTtlDays: number;
  maxConcurrent?: number;
  now?: () => Date;
}

// SQLite datetime('now') is "YYYY-MM-DD HH:MM:SS" in UTC
function parseSqliteTimestamp(value: string | null): number | null {
  if (!value) return null;
  const iso = value.includes("T") ? value : `${value.replace(" ", "T")}Z`;
  const time = Date.parse(iso);
  return Number.isNaN(time) ? null : time;
}

/**
 * Offline-first product lookups: local SQLite first, Open Food Facts when
 * the row is missing or older than the cache TTL.
 */
export class ProductCatalog {
  private readonly queue: SyncQueue<Product | null>;
  private readonly now: () => Date;

  constructor(
    private readonly products: ProductsRepository,
    private readonly remote: RemoteProductSource | null,
    private readonly options: ProductCatalogOptions
  ) {
    this.queue = new SyncQueue<Product | null>(options.maxConcurrent ?? 2);
    this.now = options.now ?? (() => new Date());
  }

  get online(): boolean {
    return this.options.onlineEnabled && this.remote !== null;
  }

  isStale(product: Product): boolean {
    const fetched = parseSqliteTimestamp(product.lastFetchedAt);
    if (fetched === null) return true;
    return this.now().getTime() - fetched > this.options.cacheTtlDays * DAY_MS;
  }

  async getByBarcode(barcode: string): Promise<Product | null> {
    const code = barcode.trim();
    if (!code) return null;

    const local = this.products.getByBarcode(code);
    if (local && !this.isStale(local)) {
      log.debug(`${code} served from local cache`);
      return local;
    }
    if (!this.online) return local;

    return this.queue.schedule(code, () => this.refresh(code, local));
  }

  private async refresh(barcode: string, local: Product | null): Promise<Product | null> {
    const remote = this.remote;
    if (!remote) return local;

    try {
      log.info(`${local ? "Revalidating" : "Fetching"} ${barcode} from Open Food Facts`);
      const result = await remote.getByBarcode(barcode, local?.etag);

      if (result.notModified) {
        this.products.touchFetched(barcode, result.etag);
        return this.products.getByBarcode(barcode);
      }
      if (!result.product) {
        return local;
      }

      const input = dtoToProductInput({ ...result.product, code: barcode }, result.etag);
      return this.products.upsert(input);
    } catch (error) {
      log.warn(`Online lookup for ${barcode} failed: ${errorMessage(error)}`);
      return local;
    }
  }

  /** Local ranked search only. */
  search(q: string, limit = 50): Product[] {
    return this.products.searchByName(q, limit);
  }

  /** Runs an OFF search, caches every result, then answers from the local ranking. */
  async fetchOnlineAndCache(q: string, limit = 50): Promise<Product[]> {
    const query = normalizeQuery(q);
    const remote = this.remote;
    if (!query || !this.online || !remote) return [];

    try {
      const found = await remote.search(query, limit);
      if (found.length === 0) return [];

      const saved = this.products.upsertMany(
        found.filter((dto) => Boolean(dto.code)).map((dto) => dtoToProductInput(dto))
      );
      log.info(`Cached ${saved} products for "${query}"`);

      return this.products.searchByName(query, limit);
    } catch (error) {
      log.warn(`Online search for "${query}" failed: ${errorMessage(error)}`);
      return [];
    }
  }
}
