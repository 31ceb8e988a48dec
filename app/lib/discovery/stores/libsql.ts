/**
 * Durable stores on libsql/SQLite. Tables are created on first use.
 */

import type { Client } from "@libsql/client";
import {
  ensureDiscoveryTables,
  readNullableString,
  readNumber,
  readString,
  type DbRow,
} from "../../db";
import { CacheCorruptionError } from "../../errors";
import {
  CATALOG_TYPES,
  type AlbumType,
  type ArtistScan,
  type IsrcEntry,
  type IsrcStore,
  type Release,
  type ReleaseStore,
} from "../types";

function isAlbumType(value: string): value is AlbumType {
  return CATALOG_TYPES.some((type) => type === value);
}

const mapRelease = (row: DbRow): Release => {
  const albumType = readString(row, "album_type");
  if (!isAlbumType(albumType)) {
    throw new CacheCorruptionError(`unknown album_type '${albumType}'`);
  }
  return {
    artistId: readString(row, "artist_id"),
    albumId: readString(row, "album_id"),
    trackId: readString(row, "track_id"),
    isrc: readNullableString(row, "isrc"),
    releaseDate: readString(row, "release_date"),
    albumName: readString(row, "album_name"),
    trackName: readString(row, "track_name"),
    albumType,
    popularity: readNumber(row, "popularity"),
    url: readString(row, "url"),
    fetchedAt: readString(row, "fetched_at"),
  };
};

const mapIsrcEntry = (row: DbRow): IsrcEntry => ({
  isrc: readString(row, "isrc"),
  earliestDate: readString(row, "earliest_date"),
  earliestAlbumName: readString(row, "earliest_album_name"),
});

export class LibsqlReleaseStore implements ReleaseStore {
  constructor(private readonly db: Client) {}

  init(): Promise<void> {
    return ensureDiscoveryTables(this.db);
  }

  async listReleases(artistId: string, cutoffDate: string): Promise<Release[]> {
    await this.init();
    const result = await this.db.execute({
      sql: `
        select * from releases_cache
        where artist_id = ? and release_date >= ?
        order by release_date desc, track_id asc
      `,
      args: [artistId, cutoffDate],
    });
    return result.rows.map((row) => mapRelease(row));
  }

  async upsertReleases(releases: Release[]): Promise<void> {
    if (releases.length === 0) return;
    await this.init();
    await this.db.batch(
      releases.map((r) => ({
        sql: `
          insert into releases_cache (
            track_id, artist_id, album_id, isrc, release_date, album_name,
            track_name, album_type, popularity, url, fetched_at
          )
          values (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
          on conflict (track_id) do update set
            artist_id = excluded.artist_id,
            album_id = excluded.album_id,
            isrc = excluded.isrc,
            release_date = excluded.release_date,
            album_name = excluded.album_name,
            track_name = excluded.track_name,
            album_type = excluded.album_type,
            popularity = excluded.popularity,
            url = excluded.url,
            fetched_at = excluded.fetched_at
        `,
        args: [
          r.trackId,
          r.artistId,
          r.albumId,
          r.isrc,
          r.releaseDate,
          r.albumName,
          r.trackName,
          r.albumType,
          r.popularity,
          r.url,
          r.fetchedAt,
        ],
      })),
      "write",
    );
  }

  async getScan(artistId: string): Promise<ArtistScan | null> {
    await this.init();
    const result = await this.db.execute({
      sql: "select * from artist_scans where artist_id = ? limit 1",
      args: [artistId],
    });
    const row = result.rows[0];
    if (!row) return null;
    return {
      artistId: readString(row, "artist_id"),
      cutoffDate: readString(row, "cutoff_date"),
      scannedAt: readString(row, "scanned_at"),
    };
  }

  async recordScan(scan: ArtistScan): Promise<void> {
    await this.init();
    await this.db.execute({
      sql: `
        insert into artist_scans (artist_id, cutoff_date, scanned_at)
        values (?, ?, ?)
        on conflict (artist_id) do update set
          cutoff_date = excluded.cutoff_date,
          scanned_at = excluded.scanned_at
      `,
      args: [scan.artistId, scan.cutoffDate, scan.scannedAt],
    });
  }
}

export class LibsqlIsrcStore implements IsrcStore {
  constructor(private readonly db: Client) {}

  init(): Promise<void> {
    return ensureDiscoveryTables(this.db);
  }

  async get(isrc: string): Promise<IsrcEntry | null> {
    await this.init();
    const result = await this.db.execute({
      sql: "select * from isrc_lookup_cache where isrc = ? limit 1",
      args: [isrc],
    });
    const row = result.rows[0];
    return row ? mapIsrcEntry(row) : null;
  }

  /**
   * Insert, or move an existing entry to a strictly earlier date. Both
   * statements run in one write transaction so concurrent resolvers of the
   * same ISRC cannot lose an update.
   */
  async upsertEarliest(entry: IsrcEntry): Promise<IsrcEntry> {
    await this.init();
    const [, selected] = await this.db.batch(
      [
        {
          sql: `
            insert into isrc_lookup_cache (isrc, earliest_date, earliest_album_name, cached_at)
            values (?, ?, ?, ?)
            on conflict (isrc) do update set
              earliest_date = excluded.earliest_date,
              earliest_album_name = excluded.earliest_album_name,
              cached_at = excluded.cached_at
            where excluded.earliest_date < isrc_lookup_cache.earliest_date
          `,
          args: [
            entry.isrc,
            entry.earliestDate,
            entry.earliestAlbumName,
            new Date().toISOString(),
          ],
        },
        {
          sql: "select * from isrc_lookup_cache where isrc = ? limit 1",
          args: [entry.isrc],
        },
      ],
      "write",
    );
    const row = selected?.rows[0];
    if (!row) {
      throw new CacheCorruptionError(`isrc ${entry.isrc} missing after upsert`);
    }
    return mapIsrcEntry(row);
  }
}
