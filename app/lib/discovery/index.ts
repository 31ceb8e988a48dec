export { createDiscoveryEngine, DiscoveryEngine } from "./discover";
export type { DiscoveryEngineOptions } from "./discover";
export { PaginatedCatalogFetcher, scanPage } from "./fetcher";
export type { ArtistFetch, TypeScan, TypeScanStatus } from "./fetcher";
export { IsrcResolver } from "./isrc";
export { createNoiseFilter, isNoise, NOISE_KEYWORDS } from "./noise";
export { FetchOrchestrator } from "./orchestrator";
export { capByPopularity, sortByReleaseDate } from "./rank";
export { dedupeByIsrc, ReleaseCache } from "./releaseCache";
export type { CacheLookup, CacheStatus } from "./releaseCache";
export { CallCounter, RetryPolicy, sleep } from "./retry";
export { LibsqlIsrcStore, LibsqlReleaseStore } from "./stores/libsql";
export { MemoryIsrcStore, MemoryReleaseStore } from "./stores/memory";
export { DEFAULT_TTL_TIERS, isFresh, ttlForRelease, validateTtlTiers } from "./ttl";
export type { TtlTier } from "./ttl";
export * from "./types";
