import type Database from "better-sqlite3";
import type { HistoryEntry, HistorySnapshot, PageOptions } from "../types.js";
import { asNutriGrade, type ProductsRepository } from "./products-repository.js";

interface HistoryRow {
  id: number;
  barcode: string | null;
  scannedAt: string;
  nutriScore: string | null;
  calories: number | null;
  proteins: number | null;
  carbs: number | null;
  fat: number | null;
  productName: string | null;
  productBrand: string | null;
}

export interface HistoryListOptions extends PageOptions {
  /** Inclusive lower bound on scannedAt ("YYYY-MM-DD HH:MM:SS" or a date prefix). */
  from?: string | null;
  /** Inclusive upper bound on scannedAt; a bare date covers that whole day. */
  to?: string | null;
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/** Scan history, newest first. */
export class HistoryRepository {
  constructor(
    private readonly db: Database.Database,
    private readonly products: ProductsRepository
  ) {}

  /**
   * Records a scan unless the user's previous scan was the same barcode.
   * Returns true when a row was written.
   */
  addIfNotDuplicate(userId: string, snapshot: HistorySnapshot): boolean {
    return this.db.transaction(() => {
      const last = this.db
        .prepare<[string], { barcode: string | null }>(
          `SELECT barcode FROM ProductHistory
           WHERE userId = ?
           ORDER BY scannedAt DESC, id DESC
           LIMIT 1`
        )
        .get(userId);
      if (last && last.barcode === snapshot.barcode) return false;

      // the barcode column references Product, so make sure a row exists
      this.products.upsertBasic(snapshot.barcode, snapshot.name, snapshot.brand);

      this.db
        .prepare(
          `INSERT INTO ProductHistory (userId, barcode, nutriScore, calories, proteins, carbs, fat, scannedAt)
           VALUES (?, ?, ?, ?, ?, ?, ?, datetime('now'))`
        )
        .run(
          userId,
          snapshot.barcode,
          snapshot.nutriScore ?? null,
          snapshot.calories == null ? null : Math.round(snapshot.calories),
          snapshot.proteins ?? null,
          snapshot.carbs ?? null,
          snapshot.fat ?? null
        );
      return true;
    })();
  }

  list(userId: string, options: HistoryListOptions = {}): HistoryEntry[] {
    const page = Math.max(1, options.page ?? 1);
    const pageSize = Math.max(1, options.pageSize ?? 20);

    const params: (string | number)[] = [userId];
    let sql = `SELECT h.id, h.barcode, h.scannedAt, h.nutriScore, h.calories, h.proteins, h.carbs, h.fat,
                      p.name  AS productName,
                      p.brand AS productBrand
               FROM ProductHistory h
               LEFT JOIN Product p ON p.barcode = h.barcode
               WHERE h.userId = ?`;

    if (options.from) {
      sql += " AND h.scannedAt >= ?";
      params.push(options.from);
    }
    if (options.to) {
      sql += DATE_ONLY.test(options.to) ? " AND h.scannedAt < date(?, '+1 day')" : " AND h.scannedAt <= ?";
      params.push(options.to);
    }

    sql += " ORDER BY h.scannedAt DESC, h.id DESC LIMIT ? OFFSET ?";
    params.push(pageSize, (page - 1) * pageSize);

    return this.db
      .prepare<(string | number)[], HistoryRow>(sql)
      .all(...params)
      .map((row) => ({
        id: row.id,
        barcode: row.barcode,
        scannedAt: row.scannedAt,
        nutriScore: asNutriGrade(row.nutriScore),
        calories: row.calories,
        proteins: row.proteins,
        carbs: row.carbs,
        fat: row.fat,
        name: row.productName?.trim() ?? null,
        brand: row.productBrand?.trim() ?? null,
      }));
  }
}
