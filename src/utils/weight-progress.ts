import type { WeightLogEntry, WeightProgress } from "../types.js";
import { daysBetween, justDateIso } from "./dates.js";

/**
 * Summary of a weight series over [from, to]. Points are sorted by day
 * (stable, so same-day logs keep their order); the last one is the latest.
 */
export function weightProgress(points: WeightLogEntry[], from: Date, to: Date): WeightProgress {
  const sorted = [...points].sort((a, b) => a.day.localeCompare(b.day));
  const base = { from: justDateIso(from), to: justDateIso(to), count: sorted.length };

  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  if (!first || !last) {
    return { ...base, latest: null, start: null, deltaKg: null, deltaPct: null, perWeek: null };
  }

  const deltaKg = last.kg - first.kg;
  const days = Math.max(1, daysBetween(from, to));

  return {
    ...base,
    latest: last.kg,
    start: first.kg,
    deltaKg,
    deltaPct: first.kg === 0 ? 0 : (deltaKg / first.kg) * 100,
    perWeek: (deltaKg / days) * 7,
  };
}
