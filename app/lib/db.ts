import { createClient, type Client } from "@libsql/client";
import { CacheCorruptionError } from "./errors";

export type DbRow = Record<string, unknown>;

let client: Client | null = null;

/**
 * Shared client for the configured database (TRACKER_DATABASE_URL, a local
 * SQLite file by default).
 */
export function getDb(
  options: { url?: string; authToken?: string } = {},
): Client {
  if (!client) {
    client = createClient({
      url: options.url || process.env.TRACKER_DATABASE_URL || "file:artists.db",
      authToken: options.authToken ?? process.env.TRACKER_DATABASE_AUTH_TOKEN,
    });
  }
  return client;
}

export function closeDb(): void {
  client?.close();
  client = null;
}

const discoveryInit = new WeakMap<Client, Promise<void>>();
const artistsInit = new WeakMap<Client, Promise<void>>();
const runHistoryInit = new WeakMap<Client, Promise<void>>();

function once(
  registry: WeakMap<Client, Promise<void>>,
  db: Client,
  create: () => Promise<void>,
): Promise<void> {
  let pending = registry.get(db);
  if (!pending) {
    pending = create().catch((error: unknown) => {
      // Allow a later retry when the store was unreachable
      registry.delete(db);
      throw error;
    });
    registry.set(db, pending);
  }
  return pending;
}

export function ensureDiscoveryTables(db: Client): Promise<void> {
  return once(discoveryInit, db, () =>
    db
      .execute(`
        create table if not exists releases_cache (
          track_id text primary key,
          artist_id text not null,
          album_id text not null,
          isrc text,
          release_date text not null,
          album_name text not null,
          track_name text not null,
          album_type text not null,
          popularity integer not null default 0,
          url text not null,
          fetched_at text not null
        );
      `)
      .then(() =>
        db.execute(`
          create index if not exists idx_releases_artist_date
          on releases_cache (artist_id, release_date);
        `),
      )
      .then(() =>
        db.execute(`
          create table if not exists isrc_lookup_cache (
            isrc text primary key,
            earliest_date text not null,
            earliest_album_name text not null,
            cached_at text not null
          );
        `),
      )
      .then(() =>
        db.execute(`
          create table if not exists artist_scans (
            artist_id text primary key,
            cutoff_date text not null,
            scanned_at text not null
          );
        `),
      )
      .then(() => undefined),
  );
}

export function ensureArtistsTable(db: Client): Promise<void> {
  return once(artistsInit, db, () =>
    db
      .execute(`
        create table if not exists artists (
          spotify_artist_id text primary key,
          artist_name text not null,
          date_added text not null
        );
      `)
      .then(() => undefined),
  );
}

export function ensureRunHistoryTable(db: Client): Promise<void> {
  return once(runHistoryInit, db, () =>
    db
      .execute(`
        create table if not exists run_history (
          id integer primary key autoincrement,
          run_timestamp text not null,
          artists_tracked integer not null,
          releases_found integer not null,
          lookback_days integer not null,
          duration_seconds real not null,
          api_calls_made integer not null,
          missing_artists integer not null default 0,
          status text not null default 'completed'
        );
      `)
      .then(() => undefined),
  );
}

// Row readers. Anything unexpected means the stored data is not ours to trust.

export function readString(row: DbRow, column: string): string {
  const value = row[column];
  if (typeof value !== "string") {
    throw new CacheCorruptionError(
      `expected text in column '${column}', got ${describe(value)}`,
    );
  }
  return value;
}

export function readNullableString(row: DbRow, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  return readString(row, column);
}

export function readNumber(row: DbRow, column: string): number {
  const value = row[column];
  if (typeof value === "bigint") return Number(value);
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new CacheCorruptionError(
      `expected number in column '${column}', got ${describe(value)}`,
    );
  }
  return value;
}

function describe(value: unknown): string {
  if (value === null) return "null";
  return typeof value;
}
