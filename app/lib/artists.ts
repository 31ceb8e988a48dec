/**
 * artists.ts
 *
 * The tracked-artist registry (`artists` table) plus the parsers that feed it
 * from text files and JSON backups.
 */

import type { Client } from "@libsql/client";
import { ensureArtistsTable, readNumber, readString, type DbRow } from "./db";
import { ValidationError } from "./errors";

export interface TrackedArtist {
  id: string;
  name: string;
  dateAdded: string;
}

export interface ImportCounts {
  added: number;
  skipped: number;
}

export type ArtistLine =
  | { kind: "id"; id: string }
  | { kind: "name"; name: string };

/**
 * Backup file row, as written by `exportJson`.
 */
export interface ArtistBackupRow {
  date_added: string;
  artist_name: string;
  spotify_artist_id: string;
}

const SPOTIFY_ID = /^[A-Za-z0-9]{22}$/;
const MAX_NAME_LENGTH = 500;

export function validateArtistName(name: string): void {
  if (!name) throw new ValidationError("artist_name", "Artist name cannot be empty");
  if (!name.trim()) {
    throw new ValidationError("artist_name", "Artist name cannot be only whitespace");
  }
  if (name.length > MAX_NAME_LENGTH) {
    throw new ValidationError(
      "artist_name",
      `Artist name is too long (max ${MAX_NAME_LENGTH} characters)`,
    );
  }
}

export function validateSpotifyId(id: string): void {
  if (!id.trim()) throw new ValidationError("spotify_artist_id", "Spotify ID cannot be empty");
  if (!SPOTIFY_ID.test(id)) {
    throw new ValidationError(
      "spotify_artist_id",
      "Spotify ID must be exactly 22 alphanumeric characters",
    );
  }
}

/**
 * One line of an artists.txt file. Blank lines and `#` comments yield null.
 */
export function parseArtistLine(line: string): ArtistLine | null {
  const value = line.trim();
  if (!value || value.startsWith("#")) return null;

  if (value.startsWith("spotify:artist:")) {
    return { kind: "id", id: value.slice("spotify:artist:".length) };
  }
  const fromUrl = /open\.spotify\.com\/(?:intl-[a-z-]+\/)?artist\/([A-Za-z0-9]+)/.exec(value);
  if (fromUrl) return { kind: "id", id: fromUrl[1] };
  if (SPOTIFY_ID.test(value)) return { kind: "id", id: value };

  return { kind: "name", name: value };
}

/**
 * Rows from a JSON backup. Entries missing a name or id are skipped with a
 * warning; a non-array document is rejected.
 */
export function parseArtistBackup(raw: string): Array<{ id: string; name: string }> {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError("json_data", `Invalid JSON file: ${String(error)}`);
  }
  if (!Array.isArray(data)) {
    throw new ValidationError("json_data", "JSON must contain an array of artists");
  }

  const items: unknown[] = data;
  const rows: Array<{ id: string; name: string }> = [];
  for (const item of items) {
    if (typeof item !== "object" || item === null) {
      console.warn(`[ARTISTS] Skipping invalid item: ${JSON.stringify(item)}`);
      continue;
    }
    const name = "artist_name" in item ? item.artist_name : undefined;
    const id = "spotify_artist_id" in item ? item.spotify_artist_id : undefined;
    if (typeof name !== "string" || typeof id !== "string" || !name || !id) {
      console.warn(`[ARTISTS] Skipping incomplete item: ${JSON.stringify(item)}`);
      continue;
    }
    rows.push({ id, name });
  }
  return rows;
}

const mapArtist = (row: DbRow): TrackedArtist => ({
  id: readString(row, "spotify_artist_id"),
  name: readString(row, "artist_name"),
  dateAdded: readString(row, "date_added"),
});

export class ArtistRegistry {
  constructor(
    private readonly db: Client,
    private readonly now: () => Date = () => new Date(),
  ) {}

  init(): Promise<void> {
    return ensureArtistsTable(this.db);
  }

  /**
   * Returns false when the artist is already tracked.
   */
  async add(name: string, id: string): Promise<boolean> {
    validateArtistName(name);
    validateSpotifyId(id);
    await this.init();

    const result = await this.db.execute({
      sql: `
        insert into artists (spotify_artist_id, artist_name, date_added)
        values (?, ?, ?)
        on conflict (spotify_artist_id) do nothing
      `,
      args: [id, name, this.now().toISOString()],
    });
    if (result.rowsAffected === 0) return false;
    console.log(`[ARTISTS] Added '${name}' (ID: ${id})`);
    return true;
  }

  async addBatch(artists: Array<{ id: string; name: string }>): Promise<ImportCounts> {
    let added = 0;
    let skipped = 0;
    for (const artist of artists) {
      if (await this.add(artist.name, artist.id)) added++;
      else skipped++;
    }
    return { added, skipped };
  }

  async list(): Promise<TrackedArtist[]> {
    await this.init();
    const result = await this.db.execute(
      "select * from artists order by artist_name collate nocase asc, spotify_artist_id asc",
    );
    return result.rows.map((row) => mapArtist(row));
  }

  async listIds(): Promise<string[]> {
    return (await this.list()).map((artist) => artist.id);
  }

  async get(id: string): Promise<TrackedArtist | null> {
    await this.init();
    const result = await this.db.execute({
      sql: "select * from artists where spotify_artist_id = ? limit 1",
      args: [id],
    });
    const row = result.rows[0];
    return row ? mapArtist(row) : null;
  }

  /**
   * Remove by id, or by case-insensitive name. Returns the removed artists.
   */
  async remove(idOrName: string): Promise<TrackedArtist[]> {
    await this.init();
    const value = idOrName.trim();
    const result = await this.db.execute({
      sql: `
        select * from artists
        where spotify_artist_id = ? or lower(artist_name) = lower(?)
      `,
      args: [value, value],
    });
    const matches = result.rows.map((row) => mapArtist(row));
    if (matches.length === 0) return [];

    await this.db.batch(
      matches.map((artist) => ({
        sql: "delete from artists where spotify_artist_id = ?",
        args: [artist.id],
      })),
      "write",
    );
    for (const artist of matches) {
      console.log(`[ARTISTS] Removed '${artist.name}' (ID: ${artist.id})`);
    }
    return matches;
  }

  async count(): Promise<number> {
    await this.init();
    const result = await this.db.execute("select count(*) as total from artists");
    const row = result.rows[0];
    return row ? readNumber(row, "total") : 0;
  }

  async exportJson(): Promise<ArtistBackupRow[]> {
    return (await this.list()).map((artist) => ({
      date_added: artist.dateAdded,
      artist_name: artist.name,
      spotify_artist_id: artist.id,
    }));
  }

  async importJson(raw: string): Promise<ImportCounts> {
    return this.addBatch(parseArtistBackup(raw));
  }
}
