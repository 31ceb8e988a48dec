/**
 * isrc.ts
 *
 * Maps a recording's ISRC to the earliest release it is known to appear on.
 * Entries never expire; they only move to a strictly earlier date.
 */

import { parseReleaseDate } from "../dates";
import { errorMessage } from "../errors";
import type { RetryPolicy } from "./retry";
import type { CatalogClient, IsrcEntry, IsrcStore } from "./types";

export interface ObservedRecording {
  isrc: string | null;
  releaseDate: string; // YYYY-MM-DD
  albumName: string;
}

export interface ResolvedRecording {
  releaseDate: string;
  albumName: string;
}

type Lookup =
  | { kind: "found"; entry: IsrcEntry }
  | { kind: "unknown" }
  | { kind: "failed" };

export class IsrcResolver {
  // Concurrent workers asking for the same ISRC share one upstream lookup
  private inflight = new Map<string, Promise<Lookup>>();

  constructor(
    private readonly store: IsrcStore,
    private readonly client: Pick<CatalogClient, "findEarliestByIsrc">,
    private readonly retry: RetryPolicy,
  ) {}

  async resolve(
    recording: ObservedRecording,
    signal?: AbortSignal,
  ): Promise<ResolvedRecording> {
    const observed = {
      releaseDate: recording.releaseDate,
      albumName: recording.albumName,
    };
    const { isrc } = recording;
    if (!isrc) return observed;

    const cached = await this.store.get(isrc);
    if (cached) {
      if (recording.releaseDate < cached.earliestDate) {
        const winner = await this.store.upsertEarliest({
          isrc,
          earliestDate: recording.releaseDate,
          earliestAlbumName: recording.albumName,
        });
        return toResolved(winner);
      }
      return toResolved(cached);
    }

    const lookup = await this.lookup(isrc, signal);
    if (lookup.kind === "failed") {
      // Use what we saw, but do not make it permanent
      return observed;
    }

    const seen: IsrcEntry = {
      isrc,
      earliestDate: recording.releaseDate,
      earliestAlbumName: recording.albumName,
    };
    const candidate =
      lookup.kind === "found" &&
      lookup.entry.earliestDate <= recording.releaseDate
        ? lookup.entry
        : seen;
    return toResolved(await this.store.upsertEarliest(candidate));
  }

  private lookup(isrc: string, signal?: AbortSignal): Promise<Lookup> {
    const pending = this.inflight.get(isrc);
    if (pending) return pending;

    const request = this.retry
      .execute(
        "findEarliestByIsrc",
        () => this.client.findEarliestByIsrc(isrc),
        signal,
      )
      .then((found): Lookup => {
        const date = found ? parseReleaseDate(found.date) : null;
        if (!found || !date) return { kind: "unknown" };
        return {
          kind: "found",
          entry: { isrc, earliestDate: date, earliestAlbumName: found.albumName },
        };
      })
      .catch((error: unknown): Lookup => {
        console.warn(`[ISRC] Lookup failed for ${isrc}: ${errorMessage(error)}`);
        return { kind: "failed" };
      })
      .finally(() => {
        this.inflight.delete(isrc);
      });

    this.inflight.set(isrc, request);
    return request;
  }
}

function toResolved(entry: IsrcEntry): ResolvedRecording {
  return { releaseDate: entry.earliestDate, albumName: entry.earliestAlbumName };
}
