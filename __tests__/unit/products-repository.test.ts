/**
 * Unit tests for ProductsRepository (local catalogue)
 */

import type Database from "better-sqlite3";
import { ProductsRepository, type ProductInput } from "../../src/repositories/products-repository.js";
import { createTestDb } from "../helpers/db.js";

const product = (barcode: string, name: string, brand: string | null, extra: Partial<ProductInput> = {}): ProductInput => ({
  barcode,
  name,
  brand,
  kcal: 100,
  protein: 1,
  carb: 10,
  fat: 2,
  sugars: null,
  fiber: null,
  salt: null,
  ...extra,
});

describe("ProductsRepository", () => {
  let db: Database.Database;
  let products: ProductsRepository;

  beforeEach(() => {
    db = createTestDb();
    products = new ProductsRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  describe("upsert", () => {
    it("should insert a product and read it back by barcode", () => {
      const saved = products.upsert(product("5601", " Oat Drink ", " Acme ", { kcal: 52.6, nutriScore: "B", etag: '"v1"' }));

      expect(saved.id).toHaveLength(36);
      expect(saved.name).toBe("Oat Drink");
      expect(saved.brand).toBe("Acme");
      expect(saved.kcal).toBe(53);
      expect(saved.nutriScore).toBe("B");
      expect(saved.etag).toBe('"v1"');
      expect(products.getByBarcode("5601")).toEqual(saved);
    });

    it("should update on barcode conflict and keep known optional fields", () => {
      const first = products.upsert(product("5601", "Oat Drink", "Acme", { nutriScore: "B", imageUrl: "https://img.test/1.jpg" }));
      const second = products.upsert(product("5601", "Oat Drink Light", "Acme", { kcal: 40 }));

      expect(second.id).toBe(first.id);
      expect(second.name).toBe("Oat Drink Light");
      expect(second.kcal).toBe(40);
      expect(second.nutriScore).toBe("B");
      expect(second.imageUrl).toBe("https://img.test/1.jpg");
    });

    it("should fall back to the barcode for a blank name", () => {
      expect(products.upsert(product("777", "  ", null)).name).toBe("777");
    });
  });

  describe("upsertMany", () => {
    it("should save every entry with a barcode in one go", () => {
      const count = products.upsertMany([product("1", "One", "A"), product("", "Nameless", "B"), product("2", "Two", "C")]);

      expect(count).toBe(2);
      expect(db.prepare("SELECT COUNT(*) AS n FROM Product").get()).toEqual({ n: 2 });
    });
  });

  describe("searchByName", () => {
    beforeEach(() => {
      products.upsert(product("1", "Pineapple", "Z"));
      products.upsert(product("2", "Green Apple Chips", "Y"));
      products.upsert(product("3", "Apple Juice", "B"));
      products.upsert(product("4", "Apple", "X"));
      products.upsert(product("5", "Crunchy Bar", "Apple Farms"));
      products.upsert(product("6", "Apple", null));
    });

    it("should rank exact, prefix, word start, contains, then the rest", () => {
      expect(products.searchByName("apple").map((p) => p.barcode)).toEqual(["4", "3", "2", "1", "5"]);
    });

    it("should normalise whitespace and respect the limit", () => {
      expect(products.searchByName("  apple   juice ").map((p) => p.name)).toEqual(["Apple Juice"]);
      expect(products.searchByName("apple", 2)).toHaveLength(2);
    });

    it("should rank an exact barcode before a partial one", () => {
      products.upsert(product("56012345", "Milk", "M"));
      products.upsert(product("5601", "Bread", "N"));
      expect(products.searchByName("5601").map((p) => p.barcode)).toEqual(["5601", "56012345"]);
    });

    it("should return nothing for a blank query", () => {
      expect(products.searchByName("   ")).toEqual([]);
    });
  });

  describe("searchLocal", () => {
    beforeEach(() => {
      products.upsert(product("1", "Cherry Yogurt", "A", { countries: "Portugal, Spain" }));
      products.upsert(product("2", "Apricot Yogurt", "B", { countries: "France" }));
      products.upsert(product("3", "Banana Yogurt", "C", { countries: "Portugal" }));
    });

    it("should page through name-ordered results", () => {
      expect(products.searchLocal("yogurt", { page: 1, pageSize: 2 }).map((p) => p.name)).toEqual([
        "Apricot Yogurt",
        "Banana Yogurt",
      ]);
      expect(products.searchLocal("yogurt", { page: 2, pageSize: 2 }).map((p) => p.name)).toEqual(["Cherry Yogurt"]);
    });

    it("should filter by country", () => {
      expect(products.searchLocal("yogurt", { countriesFilter: "%portugal%" }).map((p) => p.barcode)).toEqual(["3", "1"]);
    });
  });

  describe("upsertBasic", () => {
    it("should create a never-fetched placeholder named after the barcode", () => {
      products.upsertBasic("999");
      const stored = products.getByBarcode("999");

      expect(stored?.name).toBe("999");
      expect(stored?.brand).toBeNull();
      expect(stored?.lastFetchedAt).toBe("1970-01-01 00:00:00");
    });

    it("should keep existing values that are not given", () => {
      products.upsert(product("5601", "Oat Drink", "Acme"));
      products.upsertBasic("5601");
      expect(products.getByBarcode("5601")?.name).toBe("Oat Drink");

      products.upsertBasic("5601", "Oat Drink Barista", null);
      const stored = products.getByBarcode("5601");
      expect(stored?.name).toBe("Oat Drink Barista");
      expect(stored?.brand).toBe("Acme");
    });
  });

  describe("touchFetched", () => {
    it("should refresh lastFetchedAt and the etag", () => {
      products.upsertBasic("999");
      products.touchFetched("999", '"v2"');

      const stored = products.getByBarcode("999");
      expect(stored?.etag).toBe('"v2"');
      expect(stored?.lastFetchedAt).not.toBe("1970-01-01 00:00:00");
    });
  });
});
