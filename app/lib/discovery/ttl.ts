/**
 * ttl.ts
 *
 * Cache lifetime of a release as a function of how old the release is.
 * Young releases still get metadata corrections and companion singles,
 * so they are re-verified more often.
 */

import { ageInDays } from "../dates";

const HOUR_MS = 60 * 60 * 1000;

export interface TtlTier {
  maxAgeDays: number; // exclusive upper bound, Infinity for the last tier
  ttlMs: number;
}

export const DEFAULT_TTL_TIERS: readonly TtlTier[] = [
  { maxAgeDays: 30, ttlMs: 6 * HOUR_MS },
  { maxAgeDays: 180, ttlMs: 24 * HOUR_MS },
  { maxAgeDays: Infinity, ttlMs: 168 * HOUR_MS },
];

export function ttlForRelease(
  releaseDate: string,
  now: Date,
  tiers: readonly TtlTier[] = DEFAULT_TTL_TIERS,
): number {
  const age = ageInDays(releaseDate, now);
  for (const tier of tiers) {
    if (age < tier.maxAgeDays) return tier.ttlMs;
  }
  return tiers[tiers.length - 1]?.ttlMs ?? 0;
}

/**
 * Fresh iff now - fetchedAt < ttl(releaseDate, now)
 */
export function isFresh(
  fetchedAtMs: number,
  releaseDate: string,
  now: Date,
  tiers: readonly TtlTier[] = DEFAULT_TTL_TIERS,
): boolean {
  return now.getTime() - fetchedAtMs < ttlForRelease(releaseDate, now, tiers);
}

/**
 * Tiers must have increasing age bounds and non-decreasing TTLs.
 * Returns a description of the first violation, or null.
 */
export function validateTtlTiers(tiers: readonly TtlTier[]): string | null {
  if (tiers.length === 0) return "at least one TTL tier is required";
  for (let i = 0; i < tiers.length; i++) {
    const tier = tiers[i];
    if (!(tier.ttlMs > 0)) return `tier ${i} has a non-positive TTL`;
    const prev = tiers[i - 1];
    if (!prev) continue;
    if (tier.maxAgeDays <= prev.maxAgeDays) {
      return `tier ${i} age bound must be greater than tier ${i - 1}`;
    }
    if (tier.ttlMs < prev.ttlMs) {
      return `tier ${i} TTL must not be shorter than tier ${i - 1}`;
    }
  }
  return null;
}
