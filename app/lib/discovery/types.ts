/**
 * Core data types for the release discovery engine
 */

/**
 * Catalog groups, in the order the upstream catalog returns them
 */
export type AlbumType = "album" | "single" | "compilation";

export const CATALOG_TYPES: readonly AlbumType[] = [
  "album",
  "single",
  "compilation",
];

export interface Artist {
  id: string;
  name: string;
}

/**
 * One album/single/compilation as listed on an artist's catalog page.
 * `releaseDate` is raw: "YYYY", "YYYY-MM" or "YYYY-MM-DD".
 */
export interface CatalogEntry {
  id: string;
  name: string;
  type: AlbumType;
  releaseDate: string;
  artistId: string;
}

export interface CatalogPage {
  entries: CatalogEntry[];
  nextCursor: string | null;
}

export interface EntryTrack {
  id: string;
  name: string;
}

export interface TrackDetail {
  isrc: string | null;
  popularity: number;
  url: string;
}

export interface EarliestAppearance {
  date: string; // raw, may be partial
  albumName: string;
}

/**
 * Upstream catalog, called by method name. Implementations throw CatalogError.
 */
export interface CatalogClient {
  listCatalogEntries(
    artistId: string,
    type: AlbumType,
    cursor: string | null,
  ): Promise<CatalogPage>;
  getEntryTracks(entryId: string): Promise<EntryTrack[]>;
  getTrackDetail(trackId: string): Promise<TrackDetail>;
  findEarliestByIsrc(isrc: string): Promise<EarliestAppearance | null>;
}

export type CatalogOperation = keyof CatalogClient;

/**
 * The unit of output. Unique by trackId.
 */
export interface Release {
  artistId: string;
  albumId: string;
  trackId: string;
  isrc: string | null;
  releaseDate: string; // YYYY-MM-DD
  albumName: string;
  trackName: string;
  albumType: AlbumType;
  popularity: number;
  url: string;
  fetchedAt: string; // ISO timestamp
}

export type ReleaseDraft = Omit<Release, "fetchedAt">;

export interface IsrcEntry {
  isrc: string;
  earliestDate: string; // YYYY-MM-DD
  earliestAlbumName: string;
}

/**
 * Marker for a completed full scan of one artist's catalog.
 */
export interface ArtistScan {
  artistId: string;
  cutoffDate: string;
  scannedAt: string; // ISO timestamp
}

/**
 * A surfaced catalog track with its detail, before ISRC resolution and filtering
 */
export interface FetchedTrack {
  entry: CatalogEntry & { releaseDate: string }; // normalized date
  track: EntryTrack;
  detail: TrackDetail;
}

/**
 * Persistence for releases and scan markers. Row shape problems surface as
 * CacheCorruptionError.
 */
export interface ReleaseStore {
  init(): Promise<void>;
  listReleases(artistId: string, cutoffDate: string): Promise<Release[]>;
  upsertReleases(releases: Release[]): Promise<void>;
  getScan(artistId: string): Promise<ArtistScan | null>;
  recordScan(scan: ArtistScan): Promise<void>;
}

/**
 * Permanent ISRC → earliest release map. `upsertEarliest` is atomic per key
 * and only ever moves the stored date earlier; it returns the entry that won.
 */
export interface IsrcStore {
  init(): Promise<void>;
  get(isrc: string): Promise<IsrcEntry | null>;
  upsertEarliest(entry: IsrcEntry): Promise<IsrcEntry>;
}

export type FailureKind =
  | "rate_limited"
  | "transient"
  | "permanent"
  | "deadline"
  | "store";

export interface ArtistFailure {
  artistId: string;
  kind: FailureKind;
  message: string;
}

export type ArtistSource = "cache" | "fetched";

export interface DiscoverRequest {
  artistIds: string[];
  cutoffDate: string;
  forceRefresh?: boolean;
  maxPerArtist?: number | null;
  signal?: AbortSignal;
  deadlineMs?: number | null;
}

export interface DiscoverResult {
  releasesByArtist: Record<string, Release[]>;
  missingArtists: ArtistFailure[];
  callCounts: Record<string, number>;
  cacheHits: string[];
  fetchedArtists: string[];
  durationMs: number;
}
