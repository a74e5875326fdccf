import type Database from "better-sqlite3";
import type { PageOptions, Product } from "../types.js";
import type { ProductsRepository } from "./products-repository.js";

interface FavoriteRow {
  barcode: string;
  name: string | null;
  brand: string | null;
  energyKcal_100g: number | null;
  proteins_100g: number | null;
  carbs_100g: number | null;
  fat_100g: number | null;
}

export interface FavoriteListOptions extends PageOptions {
  /** Case-insensitive filter on name, brand or barcode. */
  q?: string | null;
}

export type FavoriteProduct = Pick<Product, "barcode" | "name" | "brand" | "kcal" | "protein" | "carb" | "fat">;

export class FavoritesRepository {
  constructor(
    private readonly db: Database.Database,
    private readonly products: ProductsRepository
  ) {}

  isFavorited(userId: string, barcode: string): boolean {
    const row = this.db
      .prepare<[string, string], { found: number }>(
        "SELECT 1 AS found FROM FavoriteProduct WHERE userId = ? AND barcode = ? LIMIT 1"
      )
      .get(userId, barcode);
    return row !== undefined;
  }

  /** Idempotent. A placeholder Product row is created for unknown barcodes. */
  add(userId: string, barcode: string): void {
    this.products.upsertBasic(barcode);
    this.db
      .prepare<[string, string]>("INSERT OR IGNORE INTO FavoriteProduct (userId, barcode) VALUES (?, ?)")
      .run(userId, barcode);
  }

  addWithProduct(userId: string, barcode: string, name?: string | null, brand?: string | null): void {
    this.db.transaction(() => {
      this.products.upsertBasic(barcode, name, brand);
      this.add(userId, barcode);
    })();
  }

  remove(userId: string, barcode: string): void {
    this.db.prepare<[string, string]>("DELETE FROM FavoriteProduct WHERE userId = ? AND barcode = ?").run(userId, barcode);
  }

  /** Returns the new state: true when the product is now a favourite. */
  toggle(userId: string, barcode: string, name?: string | null, brand?: string | null): boolean {
    return this.db.transaction(() => {
      if (this.isFavorited(userId, barcode)) {
        this.remove(userId, barcode);
        return false;
      }
      this.addWithProduct(userId, barcode, name, brand);
      return true;
    })();
  }

  list(userId: string, options: FavoriteListOptions = {}): FavoriteProduct[] {
    const page = Math.max(1, options.page ?? 1);
    const pageSize = Math.max(1, options.pageSize ?? 20);

    const params: (string | number)[] = [userId];
    let sql = `SELECT f.barcode, p.name, p.brand,
                      p.energyKcal_100g, p.proteins_100g, p.carbs_100g, p.fat_100g
               FROM FavoriteProduct f
               LEFT JOIN Product p ON p.barcode = f.barcode
               WHERE f.userId = ?`;

    const q = options.q?.trim();
    if (q) {
      const like = `%${q}%`;
      sql += " AND (p.name LIKE ? COLLATE NOCASE OR p.brand LIKE ? COLLATE NOCASE OR f.barcode LIKE ?)";
      params.push(like, like, like);
    }

    sql += " ORDER BY f.createdAt DESC, f.rowid DESC LIMIT ? OFFSET ?";
    params.push(pageSize, (page - 1) * pageSize);

    return this.db
      .prepare<(string | number)[], FavoriteRow>(sql)
      .all(...params)
      .map((row) => ({
        barcode: row.barcode,
        name: row.name?.trim() || row.barcode,
        brand: row.brand?.trim() || null,
        kcal: row.energyKcal_100g,
        protein: row.proteins_100g,
        carb: row.carbs_100g,
        fat: row.fat_100g,
      }));
  }
}
