const DAY_MS = 24 * 60 * 60 * 1000;

/** Canonical diary day: midnight UTC, `YYYY-MM-DDT00:00:00Z`. */
export function canonDayUtcIso(date: Date): string {
  return `${justDateIso(date)}T00:00:00Z`;
}

/** `YYYY-MM-DD` of the UTC calendar day. */
export function justDateIso(date: Date): string {
  return date.toISOString().split("T")[0];
}

export function getToday(): string {
  return justDateIso(new Date());
}

/** Parses `YYYY-MM-DD` as midnight UTC; throws on anything else. */
export function parseDay(day: string): Date {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(day)) {
    throw new Error(`Invalid date "${day}", expected YYYY-MM-DD`);
  }
  const date = new Date(`${day}T00:00:00Z`);
  if (Number.isNaN(date.getTime()) || justDateIso(date) !== day) {
    throw new Error(`Invalid date "${day}"`);
  }
  return date;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

export function daysBetween(from: Date, to: Date): number {
  return Math.round((to.getTime() - from.getTime()) / DAY_MS);
}

/** Whole years between a birth date and `today`. */
export function ageOn(dateOfBirth: string, today: Date): number {
  const dob = parseDay(dateOfBirth);
  let age = today.getUTCFullYear() - dob.getUTCFullYear();
  const monthDiff = today.getUTCMonth() - dob.getUTCMonth();
  if (monthDiff < 0 || (monthDiff === 0 && today.getUTCDate() < dob.getUTCDate())) {
    age--;
  }
  return age;
}
