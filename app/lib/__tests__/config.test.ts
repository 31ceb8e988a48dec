import { describe, expect, test } from "vitest";

import { loadConfig, requireSpotifyCredentials } from "../config";
import { ConfigError } from "../errors";

const HOUR_MS = 60 * 60 * 1000;

describe("loadConfig", () => {
  test("falls back to defaults", () => {
    const config = loadConfig({});

    expect(config.databaseUrl).toBe("file:artists.db");
    expect(config.lookbackDays).toBe(90);
    expect(config.concurrency).toBe(8);
    expect(config.maxPerArtist).toBeNull();
    expect(config.runDeadlineMs).toBeNull();
    expect(config.retry).toEqual({
      maxRetries: 3,
      baseDelayMs: 2000,
      jitterMs: 250,
      callDeadlineMs: 120_000,
    });
    expect(config.ttlTiers).toEqual([
      { maxAgeDays: 30, ttlMs: 6 * HOUR_MS },
      { maxAgeDays: 180, ttlMs: 24 * HOUR_MS },
      { maxAgeDays: Infinity, ttlMs: 168 * HOUR_MS },
    ]);
    expect(config.emptyScanTtlMs).toBe(24 * HOUR_MS);
    expect(config.noiseKeywords).toEqual([]);
    expect(config.logsDir).toBe("logs");
  });

  test("reads overrides", () => {
    const config = loadConfig({
      LOOKBACK_DAYS: "30",
      MAX_PER_ARTIST: "0",
      RUN_DEADLINE_MS: "60000",
      NOISE_KEYWORDS: " Karaoke, , LOFI ",
      SPOTIFY_MARKET: "SE",
    });

    expect(config.lookbackDays).toBe(30);
    expect(config.maxPerArtist).toBe(0);
    expect(config.runDeadlineMs).toBe(60000);
    expect(config.noiseKeywords).toEqual(["karaoke", "lofi"]);
    expect(config.spotify.market).toBe("SE");
  });

  test("rejects values it cannot use", () => {
    expect(() => loadConfig({ LOOKBACK_DAYS: "ninety" })).toThrow(
      "LOOKBACK_DAYS must be an integer, got 'ninety'",
    );
    expect(() => loadConfig({ DISCOVERY_CONCURRENCY: "100" })).toThrow(
      "DISCOVERY_CONCURRENCY must be between 1 and 64, got 100",
    );
    expect(() => loadConfig({ TTL_RECENT_HOURS: "48" })).toThrow(
      "Invalid TTL tiers: tier 1 TTL must not be shorter than tier 0",
    );
  });
});

describe("requireSpotifyCredentials", () => {
  test("returns the credentials when both are set", () => {
    const config = loadConfig({
      SPOTIFY_CLIENT_ID: "test-client",
      SPOTIFY_CLIENT_SECRET: "test-secret",
    });
    expect(requireSpotifyCredentials(config)).toEqual({
      clientId: "test-client",
      clientSecret: "test-secret",
    });
  });

  test("fails without them", () => {
    expect(() => requireSpotifyCredentials(loadConfig({}))).toThrow(ConfigError);
  });
});
