/**
 * Unit tests for dates.ts and weight-progress.ts
 */

import { addDays, ageOn, canonDayUtcIso, daysBetween, justDateIso, parseDay } from "../../src/utils/dates.js";
import { weightProgress } from "../../src/utils/weight-progress.js";

describe("dates", () => {
  it("should canonicalise to midnight UTC", () => {
    expect(canonDayUtcIso(new Date("2025-03-04T22:15:00Z"))).toBe("2025-03-04T00:00:00Z");
    expect(justDateIso(new Date("2025-03-04T22:15:00Z"))).toBe("2025-03-04");
  });

  it("should parse YYYY-MM-DD and reject anything else", () => {
    expect(parseDay("2024-02-29").toISOString()).toBe("2024-02-29T00:00:00.000Z");
    expect(() => parseDay("2023-02-29")).toThrow('Invalid date "2023-02-29"');
    expect(() => parseDay("29/02/2024")).toThrow("expected YYYY-MM-DD");
  });

  it("should add and count days", () => {
    const day = parseDay("2025-01-30");
    expect(justDateIso(addDays(day, 3))).toBe("2025-02-02");
    expect(daysBetween(day, parseDay("2025-03-01"))).toBe(30);
  });

  it("should compute age in whole years", () => {
    expect(ageOn("2000-06-15", parseDay("2025-06-14"))).toBe(24);
    expect(ageOn("2000-06-15", parseDay("2025-06-15"))).toBe(25);
  });
});

describe("weightProgress", () => {
  const from = parseDay("2025-01-01");
  const to = parseDay("2025-01-31");

  it("should summarise the first and last point of the range", () => {
    const progress = weightProgress(
      [
        { day: "2025-01-15", kg: 79, source: null, note: null },
        { day: "2025-01-01", kg: 80, source: null, note: null },
        { day: "2025-01-29", kg: 78, source: null, note: null },
      ],
      from,
      to
    );

    expect(progress.from).toBe("2025-01-01");
    expect(progress.to).toBe("2025-01-31");
    expect(progress.count).toBe(3);
    expect(progress.start).toBe(80);
    expect(progress.latest).toBe(78);
    expect(progress.deltaKg).toBe(-2);
    expect(progress.deltaPct).toBeCloseTo(-2.5, 6);
    // 30 days in range
    expect(progress.perWeek).toBeCloseTo((-2 / 30) * 7, 6);
  });

  it("should keep the later of two same-day logs as the latest", () => {
    const progress = weightProgress(
      [
        { day: "2025-01-10", kg: 80, source: null, note: null },
        { day: "2025-01-10", kg: 79.6, source: null, note: null },
      ],
      from,
      to
    );
    expect(progress.latest).toBe(79.6);
    expect(progress.start).toBe(80);
  });

  it("should return nulls without points", () => {
    expect(weightProgress([], from, to)).toEqual({
      from: "2025-01-01",
      to: "2025-01-31",
      count: 0,
      latest: null,
      start: null,
      deltaKg: null,
      deltaPct: null,
      perWeek: null,
    });
  });

  it("should use at least one day for the weekly rate", () => {
    const progress = weightProgress(
      [
        { day: "2025-01-01", kg: 80, source: null, note: null },
        { day: "2025-01-01", kg: 81, source: null, note: null },
      ],
      from,
      from
    );
    expect(progress.perWeek).toBe(7);
  });
});
