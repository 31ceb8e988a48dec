/**
 * In-process stores. Used by tests and by one-time preview sessions that
 * must not persist anything.
 */

import type {
  ArtistScan,
  IsrcEntry,
  IsrcStore,
  Release,
  ReleaseStore,
} from "../types";

export class MemoryReleaseStore implements ReleaseStore {
  private releases = new Map<string, Release>();
  private scans = new Map<string, ArtistScan>();

  async init(): Promise<void> {}

  async listReleases(artistId: string, cutoffDate: string): Promise<Release[]> {
    return [...this.releases.values()]
      .filter((r) => r.artistId === artistId && r.releaseDate >= cutoffDate)
      .sort(
        (a, b) =>
          b.releaseDate.localeCompare(a.releaseDate) ||
          a.trackId.localeCompare(b.trackId),
      )
      .map((r) => ({ ...r }));
  }

  async upsertReleases(releases: Release[]): Promise<void> {
    for (const release of releases) {
      this.releases.set(release.trackId, { ...release });
    }
  }

  async getScan(artistId: string): Promise<ArtistScan | null> {
    const scan = this.scans.get(artistId);
    return scan ? { ...scan } : null;
  }

  async recordScan(scan: ArtistScan): Promise<void> {
    this.scans.set(scan.artistId, { ...scan });
  }

  size(): number {
    return this.releases.size;
  }
}

export class MemoryIsrcStore implements IsrcStore {
  private entries = new Map<string, IsrcEntry>();

  async init(): Promise<void> {}

  async get(isrc: string): Promise<IsrcEntry | null> {
    const entry = this.entries.get(isrc);
    return entry ? { ...entry } : null;
  }

  // Synchronous body: no interleaving between read and write
  async upsertEarliest(entry: IsrcEntry): Promise<IsrcEntry> {
    const existing = this.entries.get(entry.isrc);
    if (!existing || entry.earliestDate < existing.earliestDate) {
      this.entries.set(entry.isrc, { ...entry });
      return { ...entry };
    }
    return { ...existing };
  }

  size(): number {
    return this.entries.size;
  }
}
