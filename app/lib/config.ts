/**
 * config.ts
 *
 * Typed view of the environment. Everything has a default except the
 * Spotify credentials, which only the commands that hit the catalog need.
 */

import { ConfigError } from "./errors";
import { validateTtlTiers, type TtlTier } from "./discovery/ttl";

const HOUR_MS = 60 * 60 * 1000;

type Env = Record<string, string | undefined>;

export interface TrackerConfig {
  databaseUrl: string;
  databaseAuthToken: string | undefined;
  spotify: {
    clientId: string | undefined;
    clientSecret: string | undefined;
    market: string | undefined;
  };
  lookbackDays: number;
  concurrency: number;
  maxPerArtist: number | null;
  retry: {
    maxRetries: number;
    baseDelayMs: number;
    jitterMs: number;
    callDeadlineMs: number;
  };
  ttlTiers: TtlTier[];
  emptyScanTtlMs: number;
  maxPagesPerType: number;
  catalogPageSize: number;
  runDeadlineMs: number | null;
  noiseKeywords: string[];
  logsDir: string;
}

function readInt(
  env: Env,
  name: string,
  fallback: number,
  { min = 0, max = Number.MAX_SAFE_INTEGER }: { min?: number; max?: number } = {},
): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigError(`${name} must be an integer, got '${raw}'`);
  }
  const value = Number(raw);
  if (value < min || value > max) {
    throw new ConfigError(`${name} must be between ${min} and ${max}, got ${value}`);
  }
  return value;
}

function readOptionalInt(env: Env, name: string, min: number): number | null {
  const raw = env[name]?.trim();
  if (!raw) return null;
  return readInt(env, name, 0, { min });
}

function readList(env: Env, name: string): string[] {
  const raw = env[name];
  if (!raw) return [];
  return raw
    .split(",")
    .map((s) => s.trim().toLowerCase())
    .filter(Boolean);
}

export function loadConfig(env: Env = process.env): TrackerConfig {
  const ttlTiers: TtlTier[] = [
    {
      maxAgeDays: readInt(env, "TTL_RECENT_MAX_AGE_DAYS", 30, { min: 1 }),
      ttlMs: readInt(env, "TTL_RECENT_HOURS", 6, { min: 1 }) * HOUR_MS,
    },
    {
      maxAgeDays: readInt(env, "TTL_MODERATE_MAX_AGE_DAYS", 180, { min: 1 }),
      ttlMs: readInt(env, "TTL_MODERATE_HOURS", 24, { min: 1 }) * HOUR_MS,
    },
    {
      maxAgeDays: Infinity,
      ttlMs: readInt(env, "TTL_ARCHIVE_HOURS", 168, { min: 1 }) * HOUR_MS,
    },
  ];
  const tierProblem = validateTtlTiers(ttlTiers);
  if (tierProblem) {
    throw new ConfigError(`Invalid TTL tiers: ${tierProblem}`);
  }

  return {
    databaseUrl: env.TRACKER_DATABASE_URL || "file:artists.db",
    databaseAuthToken: env.TRACKER_DATABASE_AUTH_TOKEN || undefined,
    spotify: {
      clientId: env.SPOTIFY_CLIENT_ID || undefined,
      clientSecret: env.SPOTIFY_CLIENT_SECRET || undefined,
      market: env.SPOTIFY_MARKET || undefined,
    },
    lookbackDays: readInt(env, "LOOKBACK_DAYS", 90, { min: 1, max: 3650 }),
    concurrency: readInt(env, "DISCOVERY_CONCURRENCY", 8, { min: 1, max: 64 }),
    maxPerArtist: readOptionalInt(env, "MAX_PER_ARTIST", 0),
    retry: {
      maxRetries: readInt(env, "RETRY_MAX_RETRIES", 3, { max: 10 }),
      baseDelayMs: readInt(env, "RETRY_BASE_DELAY_MS", 2000),
      jitterMs: readInt(env, "RETRY_JITTER_MS", 250),
      callDeadlineMs: readInt(env, "RETRY_CALL_DEADLINE_MS", 120_000, { min: 1 }),
    },
    ttlTiers,
    emptyScanTtlMs: readInt(env, "TTL_EMPTY_SCAN_HOURS", 24, { min: 1 }) * HOUR_MS,
    maxPagesPerType: readInt(env, "MAX_PAGES_PER_TYPE", 50, { min: 1 }),
    catalogPageSize: readInt(env, "CATALOG_PAGE_SIZE", 50, { min: 1, max: 50 }),
    runDeadlineMs: readOptionalInt(env, "RUN_DEADLINE_MS", 1),
    noiseKeywords: readList(env, "NOISE_KEYWORDS"),
    logsDir: env.TRACKER_LOGS_DIR || "logs",
  };
}

/**
 * Credentials for commands that talk to Spotify.
 */
export function requireSpotifyCredentials(config: TrackerConfig): {
  clientId: string;
  clientSecret: string;
} {
  const { clientId, clientSecret } = config.spotify;
  if (!clientId || !clientSecret) {
    throw new ConfigError(
      "SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET must be set (see .env.example)",
    );
  }
  return { clientId, clientSecret };
}
