import type { Release } from "./types";

/**
 * Highest-popularity releases first, ties broken by newest release then
 * trackId. Without a cap the input comes back untouched.
 */
export function capByPopularity(
  releases: Release[],
  maxPerArtist?: number | null,
): Release[] {
  if (maxPerArtist === undefined || maxPerArtist === null) return releases;

  return [...releases]
    .sort(
      (a, b) =>
        b.popularity - a.popularity ||
        b.releaseDate.localeCompare(a.releaseDate) ||
        a.trackId.localeCompare(b.trackId),
    )
    .slice(0, Math.max(0, maxPerArtist));
}

export function sortByReleaseDate(releases: Release[]): Release[] {
  return [...releases].sort(
    (a, b) =>
      b.releaseDate.localeCompare(a.releaseDate) ||
      a.trackId.localeCompare(b.trackId),
  );
}
