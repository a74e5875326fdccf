import type Database from "better-sqlite3";
import { v4 as uuidv4 } from "uuid";
import { NUTRI_GRADES, type NutriGrade, type Per100g, type Product } from "../types.js";

interface ProductRow {
  id: string;
  barcode: string;
  name: string;
  brand: string | null;
  nutriScore: string | null;
  imageUrl: string | null;
  countries: string | null;
  energyKcal_100g: number | null;
  proteins_100g: number | null;
  carbs_100g: number | null;
  fat_100g: number | null;
  sugars_100g: number | null;
  fiber_100g: number | null;
  salt_100g: number | null;
  etag: string | null;
  lastFetchedAt: string | null;
}

export interface ProductInput extends Per100g {
  id?: string;
  barcode: string;
  name: string;
  brand?: string | null;
  nutriScore?: NutriGrade | null;
  imageUrl?: string | null;
  countries?: string | null;
  etag?: string | null;
  /** Raw OFF nutriments JSON, kept for fields the table has no column for. */
  offRaw?: string | null;
}

export interface SearchLocalOptions {
  page?: number;
  pageSize?: number;
  /** LIKE pattern on `countries`, e.g. `%portugal%`. */
  countriesFilter?: string | null;
}

const PRODUCT_COLUMNS = `id, barcode, name, brand, nutriScore, imageUrl, countries,
  energyKcal_100g, proteins_100g, carbs_100g, fat_100g, sugars_100g, fiber_100g, salt_100g,
  etag, lastFetchedAt`;

// Rows created from a bare barcode count as never fetched, so the catalogue refreshes them
const NEVER_FETCHED = "1970-01-01 00:00:00";

export function asNutriGrade(value: string | null | undefined): NutriGrade | null {
  const upper = value?.trim().toUpperCase();
  return NUTRI_GRADES.find((g) => g === upper) ?? null;
}

export function rowToProduct(row: ProductRow): Product {
  return {
    id: row.id,
    barcode: row.barcode,
    name: row.name.trim(),
    brand: row.brand?.trim() || null,
    nutriScore: asNutriGrade(row.nutriScore),
    imageUrl: row.imageUrl,
    countries: row.countries,
    kcal: row.energyKcal_100g == null ? null : Math.round(row.energyKcal_100g),
    protein: row.proteins_100g,
    carb: row.carbs_100g,
    fat: row.fat_100g,
    sugars: row.sugars_100g,
    fiber: row.fiber_100g,
    salt: row.salt_100g,
    etag: row.etag,
    lastFetchedAt: row.lastFetchedAt,
  };
}

export function normalizeQuery(q: string): string {
  return q.trim().replace(/\s+/g, " ");
}

/**
 * Local product catalogue keyed by barcode.
 */
export class ProductsRepository {
  constructor(private readonly db: Database.Database) {}

  getByBarcode(barcode: string): Product | null {
    const row = this.db
      .prepare<[string], ProductRow>(`SELECT ${PRODUCT_COLUMNS} FROM Product WHERE barcode = ? LIMIT 1`)
      .get(barcode);
    return row ? rowToProduct(row) : null;
  }

  /**
   * Ranked search over branded products by name, brand or barcode.
   *
   * Order: exact name, name prefix, word start, name contains, exact barcode,
   * barcode contains, rest; then shorter names first, then alphabetical.
   */
  searchByName(q: string, limit = 50): Product[] {
    const query = normalizeQuery(q);
    if (query.length === 0) return [];

    const likeAll = `%${query}%`;
    const likePrefix = `${query}%`;
    const likeWord = `% ${query}%`;

    return this.db
      .prepare<[string, string, string, string, string, string, string, string, string, number], ProductRow>(
        `SELECT ${PRODUCT_COLUMNS}
         FROM Product
         WHERE (brand IS NOT NULL AND TRIM(brand) <> '')
           AND (
                name    LIKE ? COLLATE NOCASE
             OR barcode LIKE ?
             OR brand   LIKE ? COLLATE NOCASE
           )
         ORDER BY
           CASE
             WHEN lower(name) = lower(?)    THEN 0
             WHEN lower(name) LIKE lower(?) THEN 1
             WHEN lower(name) LIKE lower(?) THEN 2
             WHEN lower(name) LIKE lower(?) THEN 3
             WHEN barcode = ?               THEN 4
             WHEN barcode LIKE ?            THEN 5
             ELSE 6
           END,
           length(name) ASC,
           name COLLATE NOCASE ASC
         LIMIT ?`
      )
      .all(likeAll, likeAll, likeAll, query, likePrefix, likeWord, likeAll, query, likeAll, limit)
      .map(rowToProduct);
  }

  /** Paginated, alphabetical search with an optional countries filter. */
  searchLocal(q: string, options: SearchLocalOptions = {}): Product[] {
    const page = Math.max(1, options.page ?? 1);
    const pageSize = Math.max(1, options.pageSize ?? 20);
    const like = `%${normalizeQuery(q)}%`;

    const params: (string | number)[] = [like, like];
    let sql = `SELECT ${PRODUCT_COLUMNS}
      FROM Product
      WHERE (name LIKE ? COLLATE NOCASE OR barcode LIKE ?)
        AND (brand IS NOT NULL AND TRIM(brand) <> '')`;

    const countries = options.countriesFilter?.trim();
    if (countries) {
      sql += " AND countries LIKE ? COLLATE NOCASE";
      params.push(countries);
    }

    sql += " ORDER BY name COLLATE NOCASE ASC LIMIT ? OFFSET ?";
    params.push(pageSize, (page - 1) * pageSize);

    return this.db.prepare<(string | number)[], ProductRow>(sql).all(...params).map(rowToProduct);
  }

  /** Inserts or updates by barcode; returns the stored product. */
  upsert(product: ProductInput): Product {
    this.db
      .prepare(
        `INSERT INTO Product (
          id, barcode, name, brand, nutriScore, imageUrl, countries,
          energyKcal_100g, proteins_100g, carbs_100g, fat_100g, sugars_100g, fiber_100g, salt_100g,
          etag, off_raw, lastFetchedAt, updatedAt
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, datetime('now'), datetime('now'))
        ON CONFLICT(barcode) DO UPDATE SET
          name = excluded.name,
          brand = excluded.brand,
          nutriScore = COALESCE(excluded.nutriScore, Product.nutriScore),
          imageUrl = COALESCE(excluded.imageUrl, Product.imageUrl),
          countries = COALESCE(excluded.countries, Product.countries),
          energyKcal_100g = excluded.energyKcal_100g,
          proteins_100g = excluded.proteins_100g,
          carbs_100g = excluded.carbs_100g,
          fat_100g = excluded.fat_100g,
          sugars_100g = excluded.sugars_100g,
          fiber_100g = excluded.fiber_100g,
          salt_100g = excluded.salt_100g,
          etag = COALESCE(excluded.etag, Product.etag),
          off_raw = COALESCE(excluded.off_raw, Product.off_raw),
          lastFetchedAt = datetime('now'),
          updatedAt = datetime('now')`
      )
      .run(
        product.id || uuidv4(),
        product.barcode,
        product.name.trim() || product.barcode,
        product.brand?.trim() || null,
        product.nutriScore ?? null,
        product.imageUrl ?? null,
        product.countries ?? null,
        product.kcal == null ? null : Math.round(product.kcal),
        product.protein,
        product.carb,
        product.fat,
        product.sugars,
        product.fiber,
        product.salt,
        product.etag ?? null,
        product.offRaw ?? null
      );

    const stored = this.getByBarcode(product.barcode);
    if (!stored) {
      throw new Error(`Product ${product.barcode} missing after upsert`);
    }
    return stored;
  }

  /** Upserts a batch in one transaction; entries without a barcode are skipped. */
  upsertMany(products: ProductInput[]): number {
    const run = this.db.transaction((list: ProductInput[]) => {
      let count = 0;
      for (const product of list) {
        if (!product.barcode) continue;
        this.upsert(product);
        count++;
      }
      return count;
    });
    return run(products);
  }

  /**
   * Makes sure a row exists for the barcode, e.g. before a favourite or history entry.
   * Only fills name and brand where they are currently unknown or given.
   */
  upsertBasic(barcode: string, name?: string | null, brand?: string | null): void {
    const cleanName = name?.trim() || null;
    const cleanBrand = brand?.trim() || null;

    this.db
      .prepare<[string, string, string, string | null, string, string | null]>(
        `INSERT INTO Product (id, barcode, name, brand, lastFetchedAt)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(barcode) DO UPDATE SET
           name  = COALESCE(?, Product.name),
           brand = COALESCE(excluded.brand, Product.brand)`
      )
      .run(uuidv4(), barcode, cleanName ?? barcode, cleanBrand, NEVER_FETCHED, cleanName);
  }

  /** Marks a cached product as revalidated (e.g. after a 304). */
  touchFetched(barcode: string, etag?: string | null): void {
    this.db
      .prepare<[string | null, string]>(
        `UPDATE Product SET lastFetchedAt = datetime('now'), etag = COALESCE(?, etag) WHERE barcode = ?`
      )
      .run(etag ?? null, barcode);
  }
}
