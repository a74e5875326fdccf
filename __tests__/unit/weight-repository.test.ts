/**
 * Unit tests for WeightRepository
 */

import type Database from "better-sqlite3";
import { ValidationError } from "../../src/errors.js";
import { WeightRepository } from "../../src/repositories/weight-repository.js";
import { parseDay } from "../../src/utils/dates.js";
import { createTestDb, insertUser } from "../helpers/db.js";

describe("WeightRepository", () => {
  let db: Database.Database;
  let weight: WeightRepository;
  let userId: string;

  beforeEach(() => {
    db = createTestDb();
    weight = new WeightRepository(db);
    userId = insertUser(db);
  });

  afterEach(() => {
    db.close();
  });

  describe("addLog", () => {
    it("should store the day, source and trimmed note", () => {
      weight.addLog(userId, parseDay("2025-01-10"), 80.4, "  after run ");

      expect(weight.latest(userId)).toEqual({ day: "2025-01-10", kg: 80.4, source: "manual", note: "after run" });
    });

    it("should reject non-positive weights", () => {
      expect(() => weight.addLog(userId, parseDay("2025-01-10"), 0)).toThrow(ValidationError);
      expect(() => weight.addLog(userId, parseDay("2025-01-10"), -3)).toThrow("Weight must be a positive number of kg");
    });
  });

  describe("getRange", () => {
    beforeEach(() => {
      weight.addLog(userId, parseDay("2025-01-12"), 79.5);
      weight.addLog(userId, parseDay("2025-01-01"), 81);
      weight.addLog(userId, parseDay("2025-01-12"), 79.2, null, "scale");
      weight.addLog(userId, parseDay("2025-02-01"), 78);
    });

    it("should return logs inside the inclusive range, oldest first", () => {
      const logs = weight.getRange(userId, parseDay("2025-01-01"), parseDay("2025-01-12"));

      expect(logs.map((l) => l.kg)).toEqual([81, 79.5, 79.2]);
      expect(logs[2].source).toBe("scale");
    });

    it("should not return other users' logs", () => {
      const other = insertUser(db, "user-2");
      expect(weight.getRange(other, parseDay("2025-01-01"), parseDay("2025-12-31"))).toEqual([]);
    });

    it("should pick the last log of the latest day", () => {
      weight.addLog(userId, parseDay("2025-02-01"), 77.6);
      expect(weight.latest(userId)?.kg).toBe(77.6);
    });
  });

  it("should return null when nothing is logged", () => {
    expect(weight.latest(userId)).toBeNull();
  });
});
