/**
 * Unit tests for MealsRepository, StatsRepository and CustomFoodsRepository
 * Items are priced from their per-100g source; meal and day totals follow every write.
 */

import type Database from "better-sqlite3";
import { NotFoundError, ValidationError } from "../../src/errors.js";
import { CustomFoodsRepository } from "../../src/repositories/custom-foods-repository.js";
import { MealsRepository } from "../../src/repositories/meals-repository.js";
import { ProductsRepository } from "../../src/repositories/products-repository.js";
import { StatsRepository } from "../../src/repositories/stats-repository.js";
import { parseDay } from "../../src/utils/dates.js";
import { createTestDb, insertUser } from "../helpers/db.js";

const DAY = parseDay("2025-03-04");

describe("MealsRepository", () => {
  let db: Database.Database;
  let meals: MealsRepository;
  let stats: StatsRepository;
  let customFoods: CustomFoodsRepository;
  let userId: string;
  let eggId: string;

  beforeEach(() => {
    db = createTestDb();
    meals = new MealsRepository(db);
    stats = new StatsRepository(db);
    customFoods = new CustomFoodsRepository(db);
    userId = insertUser(db);

    new ProductsRepository(db).upsert({
      barcode: "5601",
      name: "Greek Yogurt",
      brand: "Acme",
      kcal: 200,
      protein: 10,
      carb: 20,
      fat: 5,
      sugars: 8,
      fiber: 2,
      salt: 0.5,
    });
    eggId = customFoods.create(userId, {
      name: "Boiled Egg",
      brand: "Home",
      defaultUnit: "PIECE",
      gramsPerUnit: 60,
      kcal: 143,
      protein: 12.6,
      carb: 0.7,
      fat: 9.5,
    });
  });

  afterEach(() => {
    db.close();
  });

  const addYogurt = (grams = 150, day = DAY) =>
    meals.addMealItem({ userId, day, mealType: "BREAKFAST", productBarcode: "5601", unit: "GRAM", quantity: grams });

  describe("addMealItem", () => {
    it("should compute the item from the product profile", () => {
      addYogurt();

      const [breakfast] = meals.getMealsForDay(userId, DAY);
      expect(breakfast.type).toBe("BREAKFAST");
      expect(breakfast.date).toBe("2025-03-04T00:00:00Z");
      expect(breakfast.items).toHaveLength(1);
      expect(breakfast.items[0]).toMatchObject({
        productBarcode: "5601",
        customFoodId: null,
        name: "Greek Yogurt",
        brand: "Acme",
        unit: "GRAM",
        quantity: 150,
        gramsTotal: 150,
        kcal: 300,
        protein: 15,
        carb: 30,
        fat: 7.5,
        sugars: 12,
        fiber: 3,
        salt: 0.75,
      });
      expect(breakfast.totalKcal).toBe(300);
      expect(breakfast.protein).toBe(15);
    });

    it("should price custom food pieces by their weight", () => {
      meals.addMealItem({ userId, day: DAY, mealType: "LUNCH", customFoodId: eggId, unit: "PIECE", quantity: 2 });

      const [lunch] = meals.getMealsForDay(userId, DAY);
      const item = lunch.items[0];
      expect(item.name).toBe("Boiled Egg");
      expect(item.brand).toBeNull();
      expect(item.gramsTotal).toBe(120);
      expect(item.kcal).toBe(172);
      expect(item.protein).toBeCloseTo(15.12, 6);
      expect(lunch.totalKcal).toBe(172);
    });

    it("should reuse the meal and append items in order", () => {
      const first = addYogurt(100);
      const second = addYogurt(50);

      const mealsOfDay = meals.getMealsForDay(userId, DAY);
      expect(mealsOfDay).toHaveLength(1);
      expect(mealsOfDay[0].items.map((i) => i.id)).toEqual([first, second]);
      expect(mealsOfDay[0].totalKcal).toBe(300);
    });

    it("should list meals in breakfast, lunch, snack, dinner order", () => {
      meals.addMealItem({ userId, day: DAY, mealType: "DINNER", productBarcode: "5601", unit: "GRAM", quantity: 10 });
      meals.addMealItem({ userId, day: DAY, mealType: "SNACK", productBarcode: "5601", unit: "GRAM", quantity: 10 });
      addYogurt(10);

      expect(meals.getMealsForDay(userId, DAY).map((m) => m.type)).toEqual(["BREAKFAST", "SNACK", "DINNER"]);
    });

    it("should require exactly one source and a positive quantity", () => {
      expect(() =>
        meals.addMealItem({ userId, day: DAY, mealType: "LUNCH", unit: "GRAM", quantity: 100 })
      ).toThrow(ValidationError);
      expect(() =>
        meals.addMealItem({
          userId,
          day: DAY,
          mealType: "LUNCH",
          productBarcode: "5601",
          customFoodId: eggId,
          unit: "GRAM",
          quantity: 100,
        })
      ).toThrow("Provide exactly one of productBarcode or customFoodId");
      expect(() => addYogurt(0)).toThrow("Quantity must be greater than 0");
      expect(db.prepare("SELECT COUNT(*) AS n FROM Meal").get()).toEqual({ n: 0 });
    });

    it("should throw NotFoundError for an unknown product or custom food", () => {
      expect(() =>
        meals.addMealItem({ userId, day: DAY, mealType: "LUNCH", productBarcode: "0000", unit: "GRAM", quantity: 100 })
      ).toThrow("Product 0000 not found");
      expect(() =>
        meals.addMealItem({ userId, day: DAY, mealType: "LUNCH", customFoodId: "nope", unit: "GRAM", quantity: 100 })
      ).toThrow(NotFoundError);
      expect(db.prepare("SELECT COUNT(*) AS n FROM Meal").get()).toEqual({ n: 0 });
      expect(db.prepare("SELECT COUNT(*) AS n FROM MealItem").get()).toEqual({ n: 0 });
    });
  });

  describe("daily stats", () => {
    it("should keep DailyStats equal to the sum of the day's items", () => {
      addYogurt(150);
      meals.addMealItem({ userId, day: DAY, mealType: "LUNCH", customFoodId: eggId, unit: "PIECE", quantity: 2 });
      addYogurt(100, parseDay("2025-03-05"));

      const cached = stats.getCached(userId, DAY);
      expect(cached?.date).toBe("2025-03-04T00:00:00Z");
      expect(cached?.kcal).toBe(472);
      expect(cached?.protein).toBeCloseTo(30.12, 6);
      expect(cached?.salt).toBeCloseTo(0.75, 6);

      expect(stats.computeDaily(userId, DAY).kcal).toBe(472);
      expect(stats.getCached(userId, parseDay("2025-03-05"))?.kcal).toBe(200);
    });
  });

  describe("updateMealItemQuantity", () => {
    it("should recompute the item, the meal and the day", () => {
      const itemId = addYogurt(150);
      addYogurt(50);

      meals.updateMealItemQuantity(itemId, "GRAM", 100);

      const [breakfast] = meals.getMealsForDay(userId, DAY);
      expect(breakfast.items[0]).toMatchObject({ id: itemId, quantity: 100, kcal: 200 });
      expect(breakfast.totalKcal).toBe(300);
      expect(stats.getCached(userId, DAY)?.kcal).toBe(300);
    });

    it("should switch units using the source weight", () => {
      const itemId = meals.addMealItem({ userId, day: DAY, mealType: "LUNCH", customFoodId: eggId, unit: "GRAM", quantity: 50 });
      meals.updateMealItemQuantity(itemId, "PIECE", 1);

      expect(meals.findItem(itemId)?.unit).toBe("PIECE");
      expect(meals.getMealsForDay(userId, DAY)[0].items[0].gramsTotal).toBe(60);
    });

    it("should throw NotFoundError for an unknown item", () => {
      expect(() => meals.updateMealItemQuantity("missing", "GRAM", 10)).toThrow(NotFoundError);
    });
  });

  describe("removeMealItem", () => {
    it("should delete the item and re-sum to zero", () => {
      const itemId = addYogurt(150);

      expect(meals.removeMealItem(itemId)).toBe(true);

      const [breakfast] = meals.getMealsForDay(userId, DAY);
      expect(breakfast.items).toEqual([]);
      expect(breakfast.totalKcal).toBe(0);
      expect(stats.getCached(userId, DAY)?.kcal).toBe(0);
    });

    it("should return false for an unknown item", () => {
      expect(meals.removeMealItem("missing")).toBe(false);
    });
  });
});

describe("StatsRepository", () => {
  let db: Database.Database;
  let stats: StatsRepository;
  let userId: string;

  beforeEach(() => {
    db = createTestDb();
    stats = new StatsRepository(db);
    userId = insertUser(db);
  });

  afterEach(() => {
    db.close();
  });

  it("should compute and cache zeros for an empty day", () => {
    expect(stats.getCached(userId, DAY)).toBeNull();
    expect(stats.getOrCompute(userId, DAY)).toEqual({
      userId,
      date: "2025-03-04T00:00:00Z",
      kcal: 0,
      protein: 0,
      carb: 0,
      fat: 0,
      sugars: 0,
      fiber: 0,
      salt: 0,
    });
    expect(stats.getCached(userId, DAY)).not.toBeNull();
  });

  it("should prefer the cached row", () => {
    stats.putCached({ userId, date: "2025-03-04T00:00:00Z", kcal: 1234, protein: 1, carb: 2, fat: 3, sugars: 4, fiber: 5, salt: 6 });
    expect(stats.getOrCompute(userId, DAY).kcal).toBe(1234);
  });
});

describe("CustomFoodsRepository", () => {
  let db: Database.Database;
  let customFoods: CustomFoodsRepository;
  let userId: string;

  beforeEach(() => {
    db = createTestDb();
    customFoods = new CustomFoodsRepository(db);
    userId = insertUser(db);
  });

  afterEach(() => {
    db.close();
  });

  it("should create foods and list them by name", () => {
    const id = customFoods.create(userId, { name: "Porridge", kcal: 68.4, protein: 2.4 });
    customFoods.create(userId, { name: "banana bread" });

    expect(customFoods.getById(id)).toEqual({
      id,
      userId,
      name: "Porridge",
      brand: null,
      defaultUnit: "GRAM",
      gramsPerUnit: null,
      kcal: 68,
      protein: 2.4,
      carb: null,
      fat: null,
      sugars: null,
      fiber: null,
      salt: null,
    });
    expect(customFoods.list(userId).map((f) => f.name)).toEqual(["banana bread", "Porridge"]);
  });

  it("should validate name and piece weight", () => {
    expect(() => customFoods.create(userId, { name: "  " })).toThrow(ValidationError);
    expect(() => customFoods.create(userId, { name: "Egg", gramsPerUnit: 0 })).toThrow("gramsPerUnit must be greater than 0");
  });

  it("should return null for an unknown id", () => {
    expect(customFoods.getById("missing")).toBeNull();
  });
});
