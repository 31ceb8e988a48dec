/**
 * dates.ts
 *
 * Release dates arrive as "YYYY", "YYYY-MM" or "YYYY-MM-DD".
 * Everything downstream works on normalized "YYYY-MM-DD" strings, which
 * compare correctly as plain strings.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

const PARTIAL_DATE = /^(\d{4})(?:-(\d{2}))?(?:-(\d{2}))?$/;

/**
 * Normalize a full or partial release date. Missing month/day default to 01.
 * Returns null when the value is not a real calendar date.
 */
export function parseReleaseDate(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const match = PARTIAL_DATE.exec(raw.trim());
  if (!match) return null;

  const year = Number(match[1]);
  const month = match[2] ? Number(match[2]) : 1;
  const day = match[3] ? Number(match[3]) : 1;

  if (month < 1 || month > 12 || day < 1) return null;

  // Reject 2024-02-30 and friends
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return null;
  }

  return toIsoDate(probe);
}

export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * First day still inside the lookback window, in UTC.
 */
export function computeCutoffDate(now: Date, lookbackDays: number): string {
  return toIsoDate(new Date(now.getTime() - lookbackDays * DAY_MS));
}

/**
 * Whole-or-fractional days between a normalized date (midnight UTC) and `now`.
 * Negative for dates in the future.
 */
export function ageInDays(isoDate: string, now: Date): number {
  const start = Date.parse(`${isoDate}T00:00:00Z`);
  return (now.getTime() - start) / DAY_MS;
}

export function isIsoDate(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && parseReleaseDate(value) === value;
}
