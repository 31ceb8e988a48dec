import { describe, expect, test } from "vitest";

import type { Release } from "../discovery/types";
import { formatReleases, toReleaseRows, type ReleaseRow } from "../format";

function release(artistId: string, trackId: string, releaseDate: string, overrides: Partial<Release> = {}): Release {
  return {
    artistId,
    albumId: `album-${trackId}`,
    trackId,
    isrc: null,
    releaseDate,
    albumName: "Hits, Vol. 1",
    trackName: `Song ${trackId}`,
    albumType: "album",
    popularity: 7,
    url: `https://open.spotify.com/track/${trackId}`,
    fetchedAt: "2024-06-30T00:00:00.000Z",
    ...overrides,
  };
}

const ROW: ReleaseRow = {
  artist: "Alpha",
  track: "Song t3",
  album: "Hits, Vol. 1",
  albumType: "album",
  releaseDate: "2024-06-01",
  isrc: "N/A",
  popularity: 7,
  url: "https://open.spotify.com/track/t3",
};

describe("toReleaseRows", () => {
  test("orders by date, then artist name, then track", () => {
    const rows = toReleaseRows(
      {
        b: [release("b", "t2", "2024-05-01"), release("b", "t1", "2024-06-01")],
        a: [release("a", "t3", "2024-06-01")],
      },
      new Map([
        ["a", "Alpha"],
        ["b", "Beta Band"],
      ]),
    );

    expect(rows.map((r) => `${r.artist}/${r.track}`)).toEqual([
      "Alpha/Song t3",
      "Beta Band/Song t1",
      "Beta Band/Song t2",
    ]);
    expect(rows[0]).toEqual(ROW);
  });

  test("prints unknown artists by id", () => {
    const rows = toReleaseRows({ x: [release("x", "t1", "2024-06-01", { isrc: "USX1" })] });
    expect(rows[0].artist).toBe("x");
    expect(rows[0].isrc).toBe("USX1");
  });
});

describe("formatReleases", () => {
  test("csv quotes cells that need it", () => {
    expect(formatReleases([ROW], "csv")).toBe(
      "Artist,Track,Album,Type,Released,ISRC,Popularity,URL\n" +
        'Alpha,Song t3,"Hits, Vol. 1",album,2024-06-01,N/A,7,https://open.spotify.com/track/t3\n',
    );
  });

  test("tsv flattens tabs and newlines", () => {
    expect(formatReleases([{ ...ROW, track: "Two\tParts\nHere" }], "tsv")).toBe(
      "Artist\tTrack\tAlbum\tType\tReleased\tISRC\tPopularity\tURL\n" +
        "Alpha\tTwo Parts Here\tHits, Vol. 1\talbum\t2024-06-01\tN/A\t7\thttps://open.spotify.com/track/t3\n",
    );
  });

  test("json", () => {
    expect(JSON.parse(formatReleases([ROW], "json"))).toEqual([ROW]);
  });

  test("table", () => {
    expect(formatReleases([ROW], "table")).toBe(
      [
        "Alpha - Song t3",
        "   Album: Hits, Vol. 1 (album)",
        "   Released: 2024-06-01",
        "   ISRC: N/A",
        "   URL: https://open.spotify.com/track/t3",
        "",
      ].join("\n"),
    );
    expect(formatReleases([], "table")).toBe("No recent releases found.\n");
  });
});
