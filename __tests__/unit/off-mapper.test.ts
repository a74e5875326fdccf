/**
 * Unit tests for mapping Open Food Facts products onto the catalogue
 */

import { dtoToProductInput } from "../../src/services/off-mapper.js";

describe("dtoToProductInput", () => {
  it("should map the common fields", () => {
    const input = dtoToProductInput(
      {
        code: "5601",
        product_name: " Greek Yogurt ",
        brands: " Acme ",
        nutriscore_grade: "b",
        image_small_url: "https://img.test/small.jpg",
        image_url: "https://img.test/full.jpg",
        countries: "Portugal",
        nutriments: {
          "energy-kcal_100g": "96.6",
          proteins_100g: 9,
          carbohydrates_100g: 3.9,
          fat_100g: 5,
          sugars_100g: 3.9,
          fiber_100g: 0,
          salt_100g: 0.1,
        },
      },
      '"e1"'
    );

    expect(input).toMatchObject({
      barcode: "5601",
      name: "Greek Yogurt",
      brand: "Acme",
      nutriScore: "B",
      imageUrl: "https://img.test/small.jpg",
      countries: "Portugal",
      kcal: 97,
      protein: 9,
      carb: 3.9,
      fat: 5,
      sugars: 3.9,
      fiber: 0,
      salt: 0.1,
      etag: '"e1"',
    });
    expect(JSON.parse(input.offRaw ?? "null")).toMatchObject({ proteins_100g: 9 });
  });

  it("should fall back to older kcal and carbs keys", () => {
    const input = dtoToProductInput({
      code: "1",
      product_name: "Rice",
      nutriments: { "energy-kcal_100g": "", "energy-kcal_100g_estimated": 350.2, carbs_100g: 78 },
    });

    expect(input.kcal).toBe(350);
    expect(input.carb).toBe(78);
    expect(input.protein).toBeNull();
  });

  it("should use the English name, then the barcode", () => {
    expect(dtoToProductInput({ code: "2", product_name: "", product_name_en: "Tea" }).name).toBe("Tea");
    expect(dtoToProductInput({ code: "3" }).name).toBe("3");
  });

  it("should drop unknown grades and empty brands", () => {
    const input = dtoToProductInput({ code: "4", nutrition_grades: "unknown", brands: "  " });

    expect(input.nutriScore).toBeNull();
    expect(input.brand).toBeNull();
    expect(input.kcal).toBeNull();
    expect(input.offRaw).toBeNull();
    expect(input.etag).toBeNull();
  });
});
