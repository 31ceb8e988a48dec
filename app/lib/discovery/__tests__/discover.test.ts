import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { CatalogError, ValidationError } from "../../errors";
import { createDiscoveryEngine, type DiscoveryEngineOptions } from "../discover";
import { MemoryIsrcStore, MemoryReleaseStore } from "../stores/memory";
import { entry, FakeCatalog } from "./fakeCatalog";

const NOW = new Date("2024-06-30T00:00:00Z");
const CUTOFF = "2024-04-01";

/**
 * artist-a has one recording (ISRC1) on two singles, a live cut and a
 * compilation track that was first released years ago.
 */
function catalogWithReissues() {
  return new FakeCatalog()
    .addArtist("artist-a", [
      entry("single-1", "single", "2024-06-01", [
        { id: "t1", name: "First Light", isrc: "ISRC1", popularity: 40 },
      ]),
      entry("single-2", "single", "2024-05-15", [
        { id: "t2", name: "First Light", isrc: "ISRC1", popularity: 35 },
        { id: "t3", name: "Second Wind (Live)", isrc: "ISRC3", popularity: 20 },
      ]),
      entry("best-of", "compilation", "2024-06-10", [
        { id: "t4", name: "Old Song", isrc: "ISRC4", popularity: 60 },
      ]),
    ])
    .setEarliest("ISRC1", { date: "2024-05-15", albumName: "Second Single" })
    .setEarliest("ISRC4", { date: "2018-03", albumName: "Debut" });
}

function engineFor(catalog: FakeCatalog, overrides: Partial<DiscoveryEngineOptions> = {}) {
  return createDiscoveryEngine({
    client: catalog,
    releaseStore: new MemoryReleaseStore(),
    isrcStore: new MemoryIsrcStore(),
    retry: { sleep: async () => {}, maxRetries: 1 },
    now: () => NOW,
    ...overrides,
  });
}

describe("discover", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("returns one release per recording, dated by its earliest appearance", async () => {
    const engine = engineFor(catalogWithReissues());

    const result = await engine.discover({ artistIds: ["artist-a"], cutoffDate: CUTOFF });

    expect(result.releasesByArtist["artist-a"]).toEqual([
      {
        artistId: "artist-a",
        albumId: "single-1",
        trackId: "t1",
        isrc: "ISRC1",
        releaseDate: "2024-05-15",
        albumName: "Second Single",
        trackName: "First Light",
        albumType: "single",
        popularity: 40,
        url: "https://open.spotify.com/track/t1",
        fetchedAt: "2024-06-30T00:00:00.000Z",
      },
    ]);
    expect(result.missingArtists).toEqual([]);
    expect(result.fetchedArtists).toEqual(["artist-a"]);
    expect(result.callCounts).toEqual({
      findEarliestByIsrc: 3,
      getEntryTracks: 3,
      getTrackDetail: 4,
      listCatalogEntries: 3,
    });
  });

  test("a repeat run inside the TTL is served from cache with no upstream calls", async () => {
    const catalog = catalogWithReissues();
    const engine = engineFor(catalog);

    const first = await engine.discover({ artistIds: ["artist-a"], cutoffDate: CUTOFF });
    const requestsAfterFirst = catalog.requests.length;
    const second = await engine.discover({ artistIds: ["artist-a"], cutoffDate: CUTOFF });

    expect(second.releasesByArtist).toEqual(first.releasesByArtist);
    expect(second.callCounts).toEqual({});
    expect(second.cacheHits).toEqual(["artist-a"]);
    expect(catalog.requests.length).toBe(requestsAfterFirst);
  });

  test("artists without recent releases are cached too", async () => {
    const catalog = new FakeCatalog().addArtist("artist-quiet", [
      entry("old-album", "album", "2015-01-01"),
    ]);
    const engine = engineFor(catalog);

    await engine.discover({ artistIds: ["artist-quiet"], cutoffDate: CUTOFF });
    const second = await engine.discover({ artistIds: ["artist-quiet"], cutoffDate: CUTOFF });

    expect(second.releasesByArtist).toEqual({ "artist-quiet": [] });
    expect(second.callCounts).toEqual({});
  });

  test("forceRefresh refetches cached artists", async () => {
    const catalog = catalogWithReissues();
    const engine = engineFor(catalog);

    await engine.discover({ artistIds: ["artist-a"], cutoffDate: CUTOFF });
    const forced = await engine.discover({
      artistIds: ["artist-a"],
      cutoffDate: CUTOFF,
      forceRefresh: true,
    });

    expect(forced.fetchedArtists).toEqual(["artist-a"]);
    expect(forced.callCounts.listCatalogEntries).toBe(3);
    // ISRC answers are permanent
    expect(forced.callCounts.findEarliestByIsrc).toBeUndefined();
  });

  test("an earlier appearance later in the catalog moves the kept release back", async () => {
    const catalog = new FakeCatalog().addArtist("artist-d", [
      {
        id: "album-x",
        name: "The Album",
        type: "album",
        releaseDate: "2024-06-01",
        tracks: [{ id: "ta", name: "Shared Song", isrc: "ISRCX", popularity: 30 }],
      },
      {
        id: "single-x",
        name: "The Single",
        type: "single",
        releaseDate: "2024-05-01",
        tracks: [{ id: "ts", name: "Shared Song", isrc: "ISRCX", popularity: 25 }],
      },
    ]);
    const isrcStore = new MemoryIsrcStore();
    const engine = engineFor(catalog, { isrcStore });

    const first = await engine.discover({ artistIds: ["artist-d"], cutoffDate: CUTOFF });

    expect(
      first.releasesByArtist["artist-d"].map((r) => [r.trackId, r.releaseDate, r.albumName]),
    ).toEqual([["ta", "2024-05-01", "The Single"]]);
    await expect(isrcStore.get("ISRCX")).resolves.toEqual({
      isrc: "ISRCX",
      earliestDate: "2024-05-01",
      earliestAlbumName: "The Single",
    });

    const second = await engine.discover({ artistIds: ["artist-d"], cutoffDate: CUTOFF });
    expect(second.cacheHits).toEqual(["artist-d"]);
    expect(second.releasesByArtist).toEqual(first.releasesByArtist);
  });

  test("tracks missing from a refetch no longer keep the artist stale", async () => {
    let clock = NOW.getTime();
    const catalog = new FakeCatalog().addArtist("artist-e", [
      entry("first-single", "single", "2024-06-20", [{ id: "t1", name: "Old Id" }]),
    ]);
    const engine = engineFor(catalog, { now: () => new Date(clock) });

    await engine.discover({ artistIds: ["artist-e"], cutoffDate: CUTOFF });

    catalog.addArtist("artist-e", [
      entry("first-single", "single", "2024-06-20", [{ id: "t2", name: "New Id" }]),
    ]);
    clock += 7 * 60 * 60 * 1000;
    const refetched = await engine.discover({ artistIds: ["artist-e"], cutoffDate: CUTOFF });
    expect(refetched.fetchedArtists).toEqual(["artist-e"]);
    expect(refetched.releasesByArtist["artist-e"].map((r) => r.trackId)).toEqual(["t2"]);

    const cached = await engine.discover({ artistIds: ["artist-e"], cutoffDate: CUTOFF });
    expect(cached.callCounts).toEqual({});
    expect(cached.cacheHits).toEqual(["artist-e"]);
    expect(cached.releasesByArtist).toEqual(refetched.releasesByArtist);
  });

  test("one failing artist does not affect the others", async () => {
    const catalog = catalogWithReissues()
      .addArtist("artist-b", [])
      .failAlways(
        "listCatalogEntries",
        "artist-b",
        new CatalogError("permanent", "artist not found", { status: 404 }),
      );
    const engine = engineFor(catalog);

    const result = await engine.discover({
      artistIds: ["artist-b", "artist-a"],
      cutoffDate: CUTOFF,
    });

    expect(result.releasesByArtist["artist-a"].map((r) => r.trackId)).toEqual(["t1"]);
    expect(result.releasesByArtist["artist-b"]).toBeUndefined();
    expect(result.missingArtists).toEqual([
      { artistId: "artist-b", kind: "permanent", message: "artist not found" },
    ]);
  });

  test("an artist that exhausts its retries is retried on the next run", async () => {
    const catalog = new FakeCatalog()
      .addArtist("artist-b", [])
      .failNext(
        "listCatalogEntries",
        "artist-b",
        new CatalogError("transient", "upstream 503"),
        new CatalogError("transient", "upstream 503"),
      );
    const engine = engineFor(catalog);

    const first = await engine.discover({ artistIds: ["artist-b"], cutoffDate: CUTOFF });
    expect(first.missingArtists).toEqual([
      {
        artistId: "artist-b",
        kind: "transient",
        message: "listCatalogEntries failed after 1 retries: upstream 503",
      },
    ]);

    const second = await engine.discover({ artistIds: ["artist-b"], cutoffDate: CUTOFF });
    expect(second.missingArtists).toEqual([]);
    expect(second.fetchedArtists).toEqual(["artist-b"]);
  });

  test("caps each artist by popularity", async () => {
    const catalog = new FakeCatalog().addArtist("artist-c", [
      entry("ep", "single", "2024-06-01", [
        { id: "t1", name: "Low", popularity: 10 },
        { id: "t2", name: "High", popularity: 90 },
        { id: "t3", name: "Mid", popularity: 50 },
      ]),
    ]);
    const engine = engineFor(catalog);

    const result = await engine.discover({
      artistIds: ["artist-c"],
      cutoffDate: CUTOFF,
      maxPerArtist: 2,
    });

    expect(result.releasesByArtist["artist-c"].map((r) => r.popularity)).toEqual([90, 50]);
  });

  test("artists not started before the deadline are reported missing", async () => {
    const engine = engineFor(catalogWithReissues());
    const controller = new AbortController();
    controller.abort();

    const result = await engine.discover({
      artistIds: ["artist-a"],
      cutoffDate: CUTOFF,
      signal: controller.signal,
    });

    expect(result.releasesByArtist).toEqual({});
    expect(result.missingArtists).toEqual([
      { artistId: "artist-a", kind: "deadline", message: "Not started before the run deadline" },
    ]);
  });

  test("rejects a malformed cutoff date", async () => {
    const engine = engineFor(new FakeCatalog());

    await expect(
      engine.discover({ artistIds: ["artist-a"], cutoffDate: "2024-4-1" }),
    ).rejects.toBeInstanceOf(ValidationError);
  });

  test("fails the run when a store cannot be opened", async () => {
    class UnreachableStore extends MemoryReleaseStore {
      override async init(): Promise<void> {
        throw new Error("database is locked");
      }
    }
    const engine = engineFor(catalogWithReissues(), { releaseStore: new UnreachableStore() });

    await expect(
      engine.discover({ artistIds: ["artist-a"], cutoffDate: CUTOFF }),
    ).rejects.toThrow("database is locked");
  });
});
