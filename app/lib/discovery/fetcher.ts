/**
 * fetcher.ts
 *
 * Walks one artist's catalog. The upstream catalog is grouped by type and
 * only sorted (newest first) inside each group, so every type gets its own
 * cursor and its own early-stop decision.
 */

import { parseReleaseDate } from "../dates";
import { DeadlineExceededError } from "../errors";
import type { RetryPolicy } from "./retry";
import {
  CATALOG_TYPES,
  type AlbumType,
  type CatalogClient,
  type CatalogEntry,
  type FetchedTrack,
} from "./types";

export type TypeScanStatus = "scanning" | "early_stopped" | "exhausted";

/**
 * Pagination state for one catalog type. Lives for a single fetch.
 */
export interface TypeScan {
  type: AlbumType;
  status: TypeScanStatus;
  cursor: string | null;
  pagesScanned: number;
  surfaced: number;
}

export interface FetcherOptions {
  types?: readonly AlbumType[];
  maxPagesPerType?: number;
}

export interface ArtistFetch {
  tracks: FetchedTrack[];
  scans: TypeScan[];
}

type DatedEntry = CatalogEntry & { releaseDate: string };

export class PaginatedCatalogFetcher {
  private readonly types: readonly AlbumType[];
  private readonly maxPagesPerType: number;

  constructor(
    private readonly client: CatalogClient,
    private readonly retry: RetryPolicy,
    options: FetcherOptions = {},
  ) {
    this.types = options.types ?? CATALOG_TYPES;
    this.maxPagesPerType = options.maxPagesPerType ?? 50;
  }

  async fetch(
    artistId: string,
    cutoffDate: string,
    signal?: AbortSignal,
  ): Promise<ArtistFetch> {
    const scans: TypeScan[] = [];
    const entries: DatedEntry[] = [];

    // Each type starts from its own first page regardless of how the
    // previous type ended.
    for (const type of this.types) {
      const scan: TypeScan = {
        type,
        status: "scanning",
        cursor: null,
        pagesScanned: 0,
        surfaced: 0,
      };
      scans.push(scan);

      while (scan.status === "scanning") {
        throwIfAborted(signal);
        const page = await this.retry.execute(
          "listCatalogEntries",
          () => this.client.listCatalogEntries(artistId, type, scan.cursor),
          signal,
        );
        scan.pagesScanned++;

        const { inWindow, allOlder } = scanPage(page.entries, cutoffDate);
        for (const entry of inWindow) {
          entries.push({ ...entry, artistId, type });
        }
        scan.surfaced += inWindow.length;

        if (allOlder) {
          scan.status = "early_stopped";
        } else if (!page.nextCursor) {
          scan.status = "exhausted";
        } else if (scan.pagesScanned >= this.maxPagesPerType) {
          console.warn(
            `[FETCH] ${artistId}/${type}: stopping after ${scan.pagesScanned} pages`,
          );
          scan.status = "exhausted";
        } else {
          scan.cursor = page.nextCursor;
        }
      }
    }

    const tracks: FetchedTrack[] = [];
    const seenEntries = new Set<string>();
    for (const entry of entries) {
      if (seenEntries.has(entry.id)) continue;
      seenEntries.add(entry.id);

      throwIfAborted(signal);
      const entryTracks = await this.retry.execute(
        "getEntryTracks",
        () => this.client.getEntryTracks(entry.id),
        signal,
      );
      for (const track of entryTracks) {
        throwIfAborted(signal);
        const detail = await this.retry.execute(
          "getTrackDetail",
          () => this.client.getTrackDetail(track.id),
          signal,
        );
        tracks.push({ entry, track, detail });
      }
    }

    return { tracks, scans };
  }
}

/**
 * Keep in-window entries; report whether the page proves the rest of this
 * type is older than the cutoff. Every entry is looked at: a page can start
 * with an old entry and still hold newer ones.
 */
export function scanPage(
  pageEntries: CatalogEntry[],
  cutoffDate: string,
): { inWindow: DatedEntry[]; allOlder: boolean } {
  const inWindow: DatedEntry[] = [];
  let older = 0;

  for (const entry of pageEntries) {
    const releaseDate = parseReleaseDate(entry.releaseDate);
    if (!releaseDate) {
      console.warn(
        `[FETCH] Skipping '${entry.name}': unparseable release date '${entry.releaseDate}'`,
      );
      continue;
    }
    if (releaseDate < cutoffDate) {
      older++;
      continue;
    }
    inWindow.push({ ...entry, releaseDate });
  }

  return {
    inWindow,
    allOlder: pageEntries.length > 0 && older === pageEntries.length,
  };
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new DeadlineExceededError("Run deadline reached before the catalog scan finished");
  }
}
