const MS_PER_DAY = 24 * 60 * 60 * 1000;

function utcMidnight(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/** Whole calendar days from `from` to `to` (UTC), ignoring time of day. */
export function calendarDaysBetween(from: Date, to: Date): number {
  return Math.round((utcMidnight(to) - utcMidnight(from)) / MS_PER_DAY);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

/** Inclusive on both ends; a null bound is open. */
export function isWithinDateWindow(day: Date, from: Date | null, to: Date | null): boolean {
  const value = utcMidnight(day);
  if (from && value < utcMidnight(from)) return false;
  if (to && value > utcMidnight(to)) return false;
  return true;
}

/** Completed years of age on `today`, or null without a birth date. */
export function ageOn(dateOfBirth: Date | null, today: Date): number | null {
  if (!dateOfBirth) return null;
  let age = today.getUTCFullYear() - dateOfBirth.getUTCFullYear();
  const beforeBirthday =
    today.getUTCMonth() < dateOfBirth.getUTCMonth() ||
    (today.getUTCMonth() === dateOfBirth.getUTCMonth() && today.getUTCDate() < dateOfBirth.getUTCDate());
  if (beforeBirthday) age -= 1;
  return age;
}

/** YYYYMMDD in UTC */
export function compactDate(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}
