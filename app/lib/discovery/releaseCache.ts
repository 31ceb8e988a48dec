/**
 * releaseCache.ts
 *
 * TTL-governed view over a ReleaseStore. Staleness is decided per artist:
 * one expired release, an uncovered window or a missing scan marker means
 * the whole artist is refetched. Rows fetched before the latest scan started
 * were not returned by it and are ignored.
 */

import { CacheCorruptionError, errorMessage } from "../errors";
import { DEFAULT_TTL_TIERS, isFresh, ttlForRelease, type TtlTier } from "./ttl";
import type {
  ArtistScan,
  Release,
  ReleaseDraft,
  ReleaseStore,
} from "./types";

export type CacheStatus =
  | "fresh"
  | "miss"
  | "expired"
  | "window"
  | "invalidated"
  | "corrupt";

export interface CacheLookup {
  releases: Release[];
  isStale: boolean;
  status: CacheStatus;
}

export interface ReleaseCacheOptions {
  ttlTiers?: readonly TtlTier[];
  emptyScanTtlMs?: number;
  now?: () => Date;
}

export class ReleaseCache {
  private readonly ttlTiers: readonly TtlTier[];
  private readonly emptyScanTtlMs: number;
  private readonly now: () => Date;
  private readonly invalidated = new Set<string>();

  constructor(
    private readonly store: ReleaseStore,
    options: ReleaseCacheOptions = {},
  ) {
    this.ttlTiers = options.ttlTiers ?? DEFAULT_TTL_TIERS;
    this.emptyScanTtlMs = options.emptyScanTtlMs ?? 24 * 60 * 60 * 1000;
    this.now = options.now ?? (() => new Date());
  }

  init(): Promise<void> {
    return this.store.init();
  }

  async get(artistId: string, cutoffDate: string): Promise<CacheLookup> {
    if (this.invalidated.has(artistId)) {
      return { releases: [], isStale: true, status: "invalidated" };
    }

    let releases: Release[];
    let scan: ArtistScan | null;
    try {
      [releases, scan] = await Promise.all([
        this.store.listReleases(artistId, cutoffDate),
        this.store.getScan(artistId),
      ]);
    } catch (error) {
      if (error instanceof CacheCorruptionError) {
        console.warn(
          `[CACHE] Unreadable cache for artist ${artistId}, refetching: ${errorMessage(error)}`,
        );
        return { releases: [], isStale: true, status: "corrupt" };
      }
      throw error;
    }

    if (!scan) {
      return { releases: dedupeByIsrc(releases), isStale: true, status: "miss" };
    }
    if (scan.cutoffDate > cutoffDate) {
      // Last scan stopped short of the requested window
      return { releases: dedupeByIsrc(releases), isStale: true, status: "window" };
    }

    const now = this.now();
    const scannedAt = Date.parse(scan.scannedAt);
    const fetchedAts = releases.map((r) => Date.parse(r.fetchedAt));
    if (Number.isNaN(scannedAt) || fetchedAts.some(Number.isNaN)) {
      console.warn(`[CACHE] Bad timestamps for artist ${artistId}, refetching`);
      return { releases: [], isStale: true, status: "corrupt" };
    }

    const current = releases.filter((_, i) => fetchedAts[i] >= scannedAt);
    const deduped = dedupeByIsrc(current);

    const newest = current.reduce<string | null>(
      (max, r) => (max === null || r.releaseDate > max ? r.releaseDate : max),
      null,
    );
    const scanTtl =
      newest === null
        ? this.emptyScanTtlMs
        : ttlForRelease(newest, now, this.ttlTiers);
    if (now.getTime() - scannedAt >= scanTtl) {
      return { releases: deduped, isStale: true, status: "expired" };
    }

    const anyExpired = current.some(
      (r) => !isFresh(Date.parse(r.fetchedAt), r.releaseDate, now, this.ttlTiers),
    );
    if (anyExpired) {
      return { releases: deduped, isStale: true, status: "expired" };
    }

    return { releases: deduped, isStale: false, status: "fresh" };
  }

  /**
   * Upsert by trackId, stamping fetchedAt = now. Returns what was stored.
   */
  async put(drafts: ReleaseDraft[]): Promise<Release[]> {
    const fetchedAt = this.timestamp();
    const releases = drafts.map((draft) => ({ ...draft, fetchedAt }));
    await this.store.upsertReleases(releases);
    return releases;
  }

  /**
   * Remember that the artist's catalog was fully scanned down to cutoffDate.
   * `scannedAt` is when the scan started; it defaults to now. Clears a
   * pending force-invalidation.
   */
  async recordScan(
    artistId: string,
    cutoffDate: string,
    scannedAt: string = this.timestamp(),
  ): Promise<void> {
    await this.store.recordScan({ artistId, cutoffDate, scannedAt });
    this.invalidated.delete(artistId);
  }

  timestamp(): string {
    return this.now().toISOString();
  }

  forceInvalidate(artistId: string): void {
    this.invalidated.add(artistId);
  }
}

/**
 * At most one cached release per ISRC. Upstream order changes between runs can
 * leave two rows for one recording; the most recently fetched wins.
 */
export function dedupeByIsrc(releases: Release[]): Release[] {
  const byIsrc = new Map<string, Release>();
  for (const release of releases) {
    if (!release.isrc) continue;
    const current = byIsrc.get(release.isrc);
    if (
      !current ||
      release.fetchedAt > current.fetchedAt ||
      (release.fetchedAt === current.fetchedAt &&
        release.trackId < current.trackId)
    ) {
      byIsrc.set(release.isrc, release);
    }
  }
  const winners = new Set(byIsrc.values());
  return releases.filter((r) => !r.isrc || winners.has(r));
}
