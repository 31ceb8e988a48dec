/**
 * discover.ts
 *
 * Engine entry point. Wires one run's RetryPolicy, fetcher, resolver and
 * cache view around long-lived stores, then ranks the per-artist results.
 */

import { isIsoDate } from "../dates";
import { ValidationError } from "../errors";
import { PaginatedCatalogFetcher } from "./fetcher";
import { IsrcResolver } from "./isrc";
import { createNoiseFilter } from "./noise";
import { FetchOrchestrator } from "./orchestrator";
import { capByPopularity, sortByReleaseDate } from "./rank";
import { ReleaseCache } from "./releaseCache";
import { RetryPolicy, type RetryPolicyOptions } from "./retry";
import type { TtlTier } from "./ttl";
import type {
  AlbumType,
  CatalogClient,
  DiscoverRequest,
  DiscoverResult,
  IsrcStore,
  Release,
  ReleaseStore,
} from "./types";

export interface DiscoveryEngineOptions {
  client: CatalogClient;
  releaseStore: ReleaseStore;
  isrcStore: IsrcStore;
  retry?: RetryPolicyOptions;
  ttlTiers?: readonly TtlTier[];
  emptyScanTtlMs?: number;
  concurrency?: number;
  maxPagesPerType?: number;
  types?: readonly AlbumType[];
  noiseKeywords?: readonly string[];
  now?: () => Date;
}

function logPerf(step: string, startTime: number, details: Record<string, unknown>) {
  const durationMs = performance.now() - startTime;
  console.log("[PERF]", {
    step,
    durationMs: Number(durationMs.toFixed(2)),
    ...details,
  });
  return durationMs;
}

export class DiscoveryEngine {
  constructor(private readonly options: DiscoveryEngineOptions) {}

  async discover(request: DiscoverRequest): Promise<DiscoverResult> {
    const { artistIds, cutoffDate, forceRefresh = false } = request;
    const maxPerArtist = request.maxPerArtist ?? null;

    if (!isIsoDate(cutoffDate)) {
      throw new ValidationError("cutoffDate", `expected YYYY-MM-DD, got '${cutoffDate}'`);
    }
    if (maxPerArtist !== null && (!Number.isInteger(maxPerArtist) || maxPerArtist < 0)) {
      throw new ValidationError("maxPerArtist", "must be a non-negative integer");
    }

    const startTime = performance.now();
    const { releaseStore, isrcStore } = this.options;

    // A store that cannot be opened fails the whole run
    await Promise.all([releaseStore.init(), isrcStore.init()]);

    const retry = new RetryPolicy(this.options.retry);
    const cache = new ReleaseCache(releaseStore, {
      ttlTiers: this.options.ttlTiers,
      emptyScanTtlMs: this.options.emptyScanTtlMs,
      now: this.options.now,
    });
    const fetcher = new PaginatedCatalogFetcher(this.options.client, retry, {
      types: this.options.types,
      maxPagesPerType: this.options.maxPagesPerType,
    });
    const resolver = new IsrcResolver(isrcStore, this.options.client, retry);
    const orchestrator = new FetchOrchestrator(cache, fetcher, resolver, {
      concurrency: this.options.concurrency,
      isNoise: createNoiseFilter(this.options.noiseKeywords),
    });

    console.log(
      `[DISCOVERY] Checking ${artistIds.length} artist(s) since ${cutoffDate}${forceRefresh ? " (forced refresh)" : ""}`,
    );

    const deadline = createDeadline(request.signal, request.deadlineMs);
    const run = await orchestrator
      .run(artistIds, cutoffDate, { forceRefresh, signal: deadline.signal })
      .finally(deadline.dispose);

    const releasesByArtist: Record<string, Release[]> = {};
    const cacheHits: string[] = [];
    const fetchedArtists: string[] = [];
    const order = [...new Set(artistIds)];

    for (const artistId of order) {
      const releases = run.releasesByArtist[artistId];
      if (!releases) continue;
      releasesByArtist[artistId] = capByPopularity(
        sortByReleaseDate(releases),
        maxPerArtist,
      );
      if (run.sources[artistId] === "cache") cacheHits.push(artistId);
      else fetchedArtists.push(artistId);
    }

    const missingArtists = [...run.failures].sort(
      (a, b) => order.indexOf(a.artistId) - order.indexOf(b.artistId),
    );
    const callCounts = retry.calls.snapshot();
    const releaseCount = Object.values(releasesByArtist).reduce(
      (sum, releases) => sum + releases.length,
      0,
    );

    const durationMs = logPerf("discover", startTime, {
      artists: order.length,
      cacheHits: cacheHits.length,
      fetched: fetchedArtists.length,
      missing: missingArtists.length,
      releases: releaseCount,
      apiCalls: retry.calls.total(),
    });
    console.log(
      `[DISCOVERY] ${releaseCount} release(s), ${cacheHits.length} cached, ${fetchedArtists.length} fetched, ${missingArtists.length} missing`,
    );

    return {
      releasesByArtist,
      missingArtists,
      callCounts,
      cacheHits,
      fetchedArtists,
      durationMs,
    };
  }
}

export function createDiscoveryEngine(options: DiscoveryEngineOptions): DiscoveryEngine {
  return new DiscoveryEngine(options);
}

/**
 * One signal for the run: aborts when the caller's signal does or when
 * `deadlineMs` elapses, whichever comes first.
 */
function createDeadline(
  parent: AbortSignal | undefined,
  deadlineMs: number | null | undefined,
): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const abort = () => controller.abort();

  if (parent?.aborted) controller.abort();
  parent?.addEventListener("abort", abort, { once: true });

  const timer =
    deadlineMs !== null && deadlineMs !== undefined
      ? setTimeout(() => {
          console.warn(`[DISCOVERY] Run deadline of ${deadlineMs}ms reached`);
          controller.abort();
        }, deadlineMs)
      : null;

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener("abort", abort);
    },
  };
}
