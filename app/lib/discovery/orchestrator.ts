/**
 * orchestrator.ts
 *
 * Runs the per-artist pipeline over a bounded worker pool:
 * cache lookup → catalog fetch → ISRC resolution → noise filter → write-through.
 * One artist failing never affects the others.
 */

import pLimit from "p-limit";
import { DeadlineExceededError, errorMessage, isCatalogError } from "../errors";
import type { PaginatedCatalogFetcher } from "./fetcher";
import type { IsrcResolver } from "./isrc";
import { isNoise as defaultIsNoise } from "./noise";
import type { ReleaseCache } from "./releaseCache";
import type {
  ArtistFailure,
  ArtistSource,
  FailureKind,
  FetchedTrack,
  Release,
  ReleaseDraft,
} from "./types";

export interface OrchestratorOptions {
  concurrency?: number;
  isNoise?: (trackName: string) => boolean;
}

export interface OrchestratorRunOptions {
  forceRefresh?: boolean;
  signal?: AbortSignal;
}

export interface OrchestratorRun {
  releasesByArtist: Record<string, Release[]>;
  failures: ArtistFailure[];
  sources: Record<string, ArtistSource>;
}

type ArtistOutcome =
  | { ok: true; artistId: string; releases: Release[]; source: ArtistSource }
  | { ok: false; failure: ArtistFailure };

export class FetchOrchestrator {
  private readonly concurrency: number;
  private readonly isNoise: (trackName: string) => boolean;

  constructor(
    private readonly cache: ReleaseCache,
    private readonly fetcher: PaginatedCatalogFetcher,
    private readonly resolver: IsrcResolver,
    options: OrchestratorOptions = {},
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? 8);
    this.isNoise = options.isNoise ?? defaultIsNoise;
  }

  async run(
    artistIds: string[],
    cutoffDate: string,
    options: OrchestratorRunOptions = {},
  ): Promise<OrchestratorRun> {
    const { forceRefresh = false, signal } = options;
    const limit = pLimit(this.concurrency);
    const uniqueIds = [...new Set(artistIds)];

    const outcomes = await Promise.all(
      uniqueIds.map((artistId) =>
        limit(() => this.processArtist(artistId, cutoffDate, forceRefresh, signal)),
      ),
    );

    const run: OrchestratorRun = {
      releasesByArtist: {},
      failures: [],
      sources: {},
    };
    for (const outcome of outcomes) {
      if (outcome.ok) {
        run.releasesByArtist[outcome.artistId] = outcome.releases;
        run.sources[outcome.artistId] = outcome.source;
      } else {
        run.failures.push(outcome.failure);
      }
    }
    return run;
  }

  private async processArtist(
    artistId: string,
    cutoffDate: string,
    forceRefresh: boolean,
    signal?: AbortSignal,
  ): Promise<ArtistOutcome> {
    try {
      if (signal?.aborted) {
        throw new DeadlineExceededError("Not started before the run deadline");
      }

      if (forceRefresh) this.cache.forceInvalidate(artistId);

      const cached = await this.cache.get(artistId, cutoffDate);
      if (!cached.isStale) {
        console.log(
          `[CACHE] Hit for ${artistId}: ${cached.releases.length} release(s)`,
        );
        return { ok: true, artistId, releases: cached.releases, source: "cache" };
      }
      console.log(`[CACHE] ${cached.status} for ${artistId}, fetching`);

      const scanStartedAt = this.cache.timestamp();
      const { tracks, scans } = await this.fetcher.fetch(artistId, cutoffDate, signal);
      const drafts = await this.toDrafts(artistId, tracks, cutoffDate, signal);
      const releases = await this.cache.put(drafts);
      await this.cache.recordScan(artistId, cutoffDate, scanStartedAt);

      const pages = scans.reduce((sum, scan) => sum + scan.pagesScanned, 0);
      console.log(
        `[FETCH] ${artistId}: ${releases.length} release(s) from ${tracks.length} track(s), ${pages} page(s)`,
      );
      return { ok: true, artistId, releases, source: "fetched" };
    } catch (error) {
      const failure: ArtistFailure = {
        artistId,
        kind: failureKind(error),
        message: errorMessage(error),
      };
      console.error(
        `[DISCOVERY] Artist ${artistId} failed (${failure.kind}): ${failure.message}`,
      );
      return { ok: false, failure };
    }
  }

  /**
   * First kept track per ISRC wins, but every later track of the same
   * recording is still resolved, so an earlier appearance further down the
   * catalog moves the kept release's date back. Noisy tracks never claim a
   * recording, and recordings first released before the cutoff are dropped.
   */
  private async toDrafts(
    artistId: string,
    tracks: FetchedTrack[],
    cutoffDate: string,
    signal?: AbortSignal,
  ): Promise<ReleaseDraft[]> {
    const drafts: ReleaseDraft[] = [];
    // null: the recording predates the cutoff
    const claimed = new Map<string, ReleaseDraft | null>();
    const seenTracks = new Set<string>();

    for (const { entry, track, detail } of tracks) {
      if (seenTracks.has(track.id)) continue;
      if (signal?.aborted) {
        throw new DeadlineExceededError("Run deadline reached during ISRC resolution");
      }

      const resolved = await this.resolver.resolve(
        {
          isrc: detail.isrc,
          releaseDate: entry.releaseDate,
          albumName: entry.name,
        },
        signal,
      );

      const kept = detail.isrc ? claimed.get(detail.isrc) : undefined;
      if (kept !== undefined) {
        if (kept && resolved.releaseDate < kept.releaseDate) {
          kept.releaseDate = resolved.releaseDate;
          kept.albumName = resolved.albumName;
        }
        continue;
      }

      if (this.isNoise(track.name)) continue;
      seenTracks.add(track.id);
      if (resolved.releaseDate < cutoffDate) {
        if (detail.isrc) claimed.set(detail.isrc, null);
        continue;
      }

      const draft: ReleaseDraft = {
        artistId,
        albumId: entry.id,
        trackId: track.id,
        isrc: detail.isrc,
        releaseDate: resolved.releaseDate,
        albumName: resolved.albumName,
        trackName: track.name,
        albumType: entry.type,
        popularity: detail.popularity,
        url: detail.url,
      };
      drafts.push(draft);
      if (detail.isrc) claimed.set(detail.isrc, draft);
    }

    return drafts.filter((draft) => draft.releaseDate >= cutoffDate);
  }
}

function failureKind(error: unknown): FailureKind {
  if (isCatalogError(error)) return error.kind;
  if (error instanceof DeadlineExceededError) return "deadline";
  return "store";
}
