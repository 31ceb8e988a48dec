import { stringify } from "csv-stringify/sync";
import type { Release } from "./discovery/types";

export const OUTPUT_FORMATS = ["table", "tsv", "csv", "json"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface ReleaseRow {
  artist: string;
  track: string;
  album: string;
  albumType: string;
  releaseDate: string;
  isrc: string;
  popularity: number;
  url: string;
}

const COLUMNS = [
  "Artist",
  "Track",
  "Album",
  "Type",
  "Released",
  "ISRC",
  "Popularity",
  "URL",
];

/**
 * One row per release across all artists, newest first.
 * `artistNames` maps ids to display names; unknown ids print as the id.
 */
export function toReleaseRows(
  releasesByArtist: Record<string, Release[]>,
  artistNames: ReadonlyMap<string, string> = new Map(),
): ReleaseRow[] {
  const rows: Array<ReleaseRow & { trackId: string }> = [];
  for (const [artistId, releases] of Object.entries(releasesByArtist)) {
    const artist = artistNames.get(artistId) ?? artistId;
    for (const release of releases) {
      rows.push({
        artist,
        track: release.trackName,
        album: release.albumName,
        albumType: release.albumType,
        releaseDate: release.releaseDate,
        isrc: release.isrc ?? "N/A",
        popularity: release.popularity,
        url: release.url,
        trackId: release.trackId,
      });
    }
  }

  rows.sort(
    (a, b) =>
      b.releaseDate.localeCompare(a.releaseDate) ||
      a.artist.localeCompare(b.artist) ||
      a.trackId.localeCompare(b.trackId),
  );
  return rows.map(({ trackId: _trackId, ...row }) => row);
}

function toCells(row: ReleaseRow): string[] {
  return [
    row.artist,
    row.track,
    row.album,
    row.albumType,
    row.releaseDate,
    row.isrc,
    String(row.popularity),
    row.url,
  ];
}

export function formatReleases(rows: ReleaseRow[], format: OutputFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify(rows, null, 2) + "\n";
    case "csv":
      return stringify(rows.map(toCells), { header: true, columns: COLUMNS });
    case "tsv":
      return (
        [COLUMNS, ...rows.map(toCells)]
          .map((cells) => cells.map((cell) => cell.replace(/[\t\r\n]+/g, " ")).join("\t"))
          .join("\n") + "\n"
      );
    case "table":
      return formatTable(rows);
  }
}

function formatTable(rows: ReleaseRow[]): string {
  if (rows.length === 0) return "No recent releases found.\n";
  return rows
    .map((row) =>
      [
        `${row.artist} - ${row.track}`,
        `   Album: ${row.album} (${row.albumType})`,
        `   Released: ${row.releaseDate}`,
        `   ISRC: ${row.isrc}`,
        `   URL: ${row.url}`,
        "",
      ].join("\n"),
    )
    .join("\n");
}
