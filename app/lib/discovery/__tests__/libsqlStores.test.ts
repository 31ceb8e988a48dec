import { createClient, type Client } from "@libsql/client";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { CacheCorruptionError } from "../../errors";
import { LibsqlIsrcStore, LibsqlReleaseStore } from "../stores/libsql";
import type { Release } from "../types";

function release(trackId: string, releaseDate: string, overrides: Partial<Release> = {}): Release {
  return {
    artistId: "artist-a",
    albumId: "album-1",
    trackId,
    isrc: `ISRC-${trackId}`,
    releaseDate,
    albumName: "Album One",
    trackName: `Track ${trackId}`,
    albumType: "album",
    popularity: 25,
    url: `https://open.spotify.com/track/${trackId}`,
    fetchedAt: "2024-06-30T00:00:00.000Z",
    ...overrides,
  };
}

describe("LibsqlReleaseStore", () => {
  let db: Client;
  let store: LibsqlReleaseStore;

  beforeEach(() => {
    db = createClient({ url: ":memory:" });
    store = new LibsqlReleaseStore(db);
  });

  afterEach(() => {
    db.close();
  });

  test("lists an artist's releases in the window, newest first", async () => {
    await store.upsertReleases([
      release("t2", "2024-05-01"),
      release("t1", "2024-06-01"),
      release("t0", "2023-12-01"),
      release("t3", "2024-05-01"),
      release("other", "2024-06-01", { artistId: "artist-b" }),
    ]);

    const releases = await store.listReleases("artist-a", "2024-04-01");
    expect(releases.map((r) => r.trackId)).toEqual(["t1", "t2", "t3"]);
    expect(releases[0]).toEqual(release("t1", "2024-06-01"));
  });

  test("upserts by track id", async () => {
    await store.upsertReleases([release("t1", "2024-06-01", { popularity: 10 })]);
    await store.upsertReleases([
      release("t1", "2024-06-01", { popularity: 80, fetchedAt: "2024-07-01T00:00:00.000Z" }),
    ]);

    const releases = await store.listReleases("artist-a", "2024-01-01");
    expect(releases).toHaveLength(1);
    expect(releases[0].popularity).toBe(80);
    expect(releases[0].fetchedAt).toBe("2024-07-01T00:00:00.000Z");
  });

  test("keeps the latest scan marker per artist", async () => {
    await expect(store.getScan("artist-a")).resolves.toBeNull();

    await store.recordScan({ artistId: "artist-a", cutoffDate: "2024-03-01", scannedAt: "2024-06-01T00:00:00.000Z" });
    await store.recordScan({ artistId: "artist-a", cutoffDate: "2024-04-01", scannedAt: "2024-06-30T00:00:00.000Z" });

    await expect(store.getScan("artist-a")).resolves.toEqual({
      artistId: "artist-a",
      cutoffDate: "2024-04-01",
      scannedAt: "2024-06-30T00:00:00.000Z",
    });
  });

  test("reports rows it cannot read as corruption", async () => {
    await store.init();
    await db.execute({
      sql: `insert into releases_cache (
              track_id, artist_id, album_id, isrc, release_date, album_name,
              track_name, album_type, popularity, url, fetched_at
            ) values ('t9', 'artist-a', 'a', null, '2024-06-01', 'A', 'T', 'ep', 0, 'u', 'x')`,
      args: [],
    });

    await expect(store.listReleases("artist-a", "2024-01-01")).rejects.toBeInstanceOf(
      CacheCorruptionError,
    );
  });
});

describe("LibsqlIsrcStore", () => {
  let db: Client;
  let store: LibsqlIsrcStore;

  beforeEach(() => {
    db = createClient({ url: ":memory:" });
    store = new LibsqlIsrcStore(db);
  });

  afterEach(() => {
    db.close();
  });

  test("only ever moves an entry to a strictly earlier date", async () => {
    const first = { isrc: "ISRC1", earliestDate: "2020-05-01", earliestAlbumName: "Debut" };

    await expect(store.upsertEarliest(first)).resolves.toEqual(first);
    await expect(
      store.upsertEarliest({ isrc: "ISRC1", earliestDate: "2021-01-01", earliestAlbumName: "Deluxe" }),
    ).resolves.toEqual(first);
    await expect(
      store.upsertEarliest({ isrc: "ISRC1", earliestDate: "2020-05-01", earliestAlbumName: "Same Day" }),
    ).resolves.toEqual(first);

    const earlier = { isrc: "ISRC1", earliestDate: "2019-11-15", earliestAlbumName: "Lead Single" };
    await expect(store.upsertEarliest(earlier)).resolves.toEqual(earlier);
    await expect(store.get("ISRC1")).resolves.toEqual(earlier);
  });

  test("returns null for unknown codes", async () => {
    await expect(store.get("NOPE")).resolves.toBeNull();
  });
});
