/**
 * noise.ts
 *
 * Boolean predicate only. Flags tracks that are not original studio
 * recordings (live cuts, remasters, demos, ...).
 */

export const NOISE_KEYWORDS: readonly string[] = [
  "live",
  "remaster",
  "demo",
  "commentary",
  "instrumental",
  "karaoke",
  "rehearsal",
  "sped up",
  "slowed",
];

/**
 * Case-insensitive substring match against the exclusion vocabulary
 */
export function isNoise(
  trackName: string,
  keywords: readonly string[] = NOISE_KEYWORDS,
): boolean {
  const title = trackName.toLowerCase();
  return keywords.some((kw) => kw && title.includes(kw.toLowerCase()));
}

export function createNoiseFilter(
  extraKeywords: readonly string[] = [],
): (trackName: string) => boolean {
  const keywords = [...NOISE_KEYWORDS, ...extraKeywords];
  return (trackName) => isNoise(trackName, keywords);
}
