import "dotenv/config";
import { readFile, writeFile } from "fs/promises";
import { ArtistRegistry, parseArtistLine, type ImportCounts } from "@/lib/artists";
import { parseCliArgs, USAGE, type CliCommand, type TrackOptions } from "@/lib/cliArgs";
import { loadConfig, requireSpotifyCredentials, type TrackerConfig } from "@/lib/config";
import { computeCutoffDate } from "@/lib/dates";
import { closeDb, getDb } from "@/lib/db";
import {
  createDiscoveryEngine,
  LibsqlIsrcStore,
  LibsqlReleaseStore,
  MemoryIsrcStore,
  MemoryReleaseStore,
  RetryPolicy,
  type Artist,
  type DiscoverResult,
  type IsrcStore,
  type ReleaseStore,
} from "@/lib/discovery";
import { ConfigError, errorMessage, ValidationError } from "@/lib/errors";
import { formatReleases, toReleaseRows } from "@/lib/format";
import { logDiscoveryRun } from "@/lib/logging/discovery";
import { RunHistory } from "@/lib/runHistory";
import { parsePlaylistId, SpotifyCatalogClient } from "@/lib/spotify";

const RULE = "=".repeat(80);

function banner(title: string, lines: string[]): void {
  console.log(`\n${RULE}\n${title}\n${RULE}`);
  for (const line of lines) console.log(line);
  console.log(`${RULE}\n`);
}

function makeClient(config: TrackerConfig): SpotifyCatalogClient {
  return new SpotifyCatalogClient({
    ...requireSpotifyCredentials(config),
    market: config.spotify.market,
    pageSize: config.catalogPageSize,
  });
}

function database(config: TrackerConfig) {
  return getDb({ url: config.databaseUrl, authToken: config.databaseAuthToken });
}

async function discover(params: {
  config: TrackerConfig;
  client: SpotifyCatalogClient;
  releaseStore: ReleaseStore;
  isrcStore: IsrcStore;
  artistIds: string[];
  options: TrackOptions;
}): Promise<{ result: DiscoverResult; cutoffDate: string; lookbackDays: number }> {
  const { config, client, releaseStore, isrcStore, artistIds, options } = params;
  const lookbackDays = options.lookbackDays ?? config.lookbackDays;
  const cutoffDate = computeCutoffDate(new Date(), lookbackDays);

  const engine = createDiscoveryEngine({
    client,
    releaseStore,
    isrcStore,
    retry: config.retry,
    ttlTiers: config.ttlTiers,
    emptyScanTtlMs: config.emptyScanTtlMs,
    concurrency: config.concurrency,
    maxPagesPerType: config.maxPagesPerType,
    noiseKeywords: config.noiseKeywords,
  });
  const result = await engine.discover({
    artistIds,
    cutoffDate,
    forceRefresh: options.force,
    maxPerArtist:
      options.maxPerArtist === undefined ? config.maxPerArtist : options.maxPerArtist,
    deadlineMs: config.runDeadlineMs,
  });
  return { result, cutoffDate, lookbackDays };
}

function render(
  result: DiscoverResult,
  artists: Artist[],
  options: TrackOptions,
  header: { title: string; cutoffDate: string; lookbackDays: number },
): void {
  const names = new Map(artists.map((a) => [a.id, a.name]));
  const rows = toReleaseRows(result.releasesByArtist, names);

  if (options.format !== "table") {
    process.stdout.write(formatReleases(rows, options.format));
  } else {
    banner(header.title, [
      `Cutoff Date: ${header.cutoffDate} (${header.lookbackDays} days ago)`,
      `Artists Checked: ${artists.length}`,
      `Total Releases Found: ${rows.length}`,
      `Artists with Releases: ${Object.values(result.releasesByArtist).filter((r) => r.length > 0).length}`,
    ]);
    process.stdout.write(formatReleases(rows, "table"));
  }

  if (result.missingArtists.length > 0) {
    console.error(`\n${RULE}\nARTISTS THAT COULD NOT BE CHECKED\n${RULE}`);
    for (const failure of result.missingArtists) {
      const name = names.get(failure.artistId) ?? failure.artistId;
      console.error(`  - ${name} (ID: ${failure.artistId}): ${failure.kind}, ${failure.message}`);
    }
    console.error();
  }
}

async function runTrack(config: TrackerConfig, options: TrackOptions): Promise<void> {
  const db = database(config);
  const registry = new ArtistRegistry(db);
  const artists = await registry.list();
  if (artists.length === 0) {
    console.warn("No artists in database. Use 'import-txt' or 'import-playlist' to add artists.");
    return;
  }

  const { result, cutoffDate, lookbackDays } = await discover({
    config,
    client: makeClient(config),
    releaseStore: new LibsqlReleaseStore(db),
    isrcStore: new LibsqlIsrcStore(db),
    artistIds: artists.map((a) => a.id),
    options,
  });
  render(result, artists, options, {
    title: "SPOTIFY RECENT RELEASE TRACKER",
    cutoffDate,
    lookbackDays,
  });

  const releasesFound = Object.values(result.releasesByArtist).reduce(
    (sum, releases) => sum + releases.length,
    0,
  );
  await new RunHistory(db).record({
    timestamp: new Date().toISOString(),
    artistsTracked: artists.length,
    releasesFound,
    lookbackDays,
    durationSeconds: Number((result.durationMs / 1000).toFixed(2)),
    apiCallsMade: Object.values(result.callCounts).reduce((sum, n) => sum + n, 0),
    missingArtists: result.missingArtists.length,
    status: result.missingArtists.length > 0 ? "partial" : "completed",
  });
  await logDiscoveryRun({
    context: {
      command: "track",
      cutoffDate,
      forceRefresh: options.force,
      maxPerArtist: options.maxPerArtist ?? config.maxPerArtist,
    },
    result,
    logsDir: config.logsDir,
  });
}

/**
 * One-time session: a playlist's artists, in-memory stores, nothing saved.
 */
async function runPreview(
  config: TrackerConfig,
  playlist: string,
  options: TrackOptions,
): Promise<void> {
  const client = makeClient(config);
  const retry = new RetryPolicy(config.retry);
  const playlistId = parsePlaylistId(playlist);
  const artists = await retry.execute("listPlaylistArtists", () =>
    client.listPlaylistArtists(playlistId),
  );
  console.log(`[DISCOVERY] Found ${artists.length} unique artists in playlist`);

  const { result, cutoffDate, lookbackDays } = await discover({
    config,
    client,
    releaseStore: new MemoryReleaseStore(),
    isrcStore: new MemoryIsrcStore(),
    artistIds: artists.map((a) => a.id),
    options,
  });
  render(result, artists, options, {
    title: "ONE-TIME PLAYLIST SESSION",
    cutoffDate,
    lookbackDays,
  });
}

async function readInput(file: string): Promise<string> {
  if (file !== "-") return readFile(file, "utf8");
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function runImportTxt(config: TrackerConfig, file: string): Promise<void> {
  const lines = (await readInput(file)).split(/\r?\n/);
  const client = makeClient(config);
  const retry = new RetryPolicy(config.retry);

  const found: Artist[] = [];
  const failed: string[] = [];
  for (const line of lines) {
    const parsed = parseArtistLine(line);
    if (!parsed) continue;
    try {
      const artist =
        parsed.kind === "id"
          ? await retry.execute("getArtist", () => client.getArtist(parsed.id))
          : await retry.execute("searchArtist", () => client.searchArtist(parsed.name));
      if (artist) found.push(artist);
      else failed.push(line.trim());
    } catch (error) {
      console.warn(`[ARTISTS] Could not resolve '${line.trim()}': ${errorMessage(error)}`);
      failed.push(line.trim());
    }
  }

  const registry = new ArtistRegistry(database(config));
  const counts = await registry.addBatch(found);
  await printImport("IMPORT FROM TEXT FILE", counts, registry);
  if (failed.length > 0) {
    console.log(`Could not find ${failed.length} artist(s):`);
    for (const entry of failed) console.log(`  - ${entry}`);
  }
}

async function printImport(
  title: string,
  counts: ImportCounts,
  registry: ArtistRegistry,
): Promise<void> {
  banner(title, [
    `Added: ${counts.added} artists`,
    `Skipped (already exists): ${counts.skipped} artists`,
    "",
    `Total artists in database: ${await registry.count()}`,
  ]);
}

async function run(command: CliCommand): Promise<void> {
  if (command.command === "help") {
    process.stdout.write(USAGE);
    return;
  }

  const config = loadConfig();
  if (
    (command.command === "track" || command.command === "preview") &&
    command.options.format !== "table"
  ) {
    // Keep stdout for the rendered releases
    console.log = console.error;
  }

  switch (command.command) {
    case "track":
      return runTrack(config, command.options);
    case "preview":
      return runPreview(config, command.playlist, command.options);
    case "import-txt":
      return runImportTxt(config, command.file);
    case "import-playlist": {
      const client = makeClient(config);
      const playlistId = parsePlaylistId(command.playlist);
      const artists = await new RetryPolicy(config.retry).execute(
        "listPlaylistArtists",
        () => client.listPlaylistArtists(playlistId),
      );
      console.log(`[ARTISTS] Found ${artists.length} unique artists in playlist`);
      const registry = new ArtistRegistry(database(config));
      await printImport("IMPORT FROM SPOTIFY PLAYLIST", await registry.addBatch(artists), registry);
      return;
    }
    case "import-json": {
      const registry = new ArtistRegistry(database(config));
      const counts = await registry.importJson(await readFile(command.file, "utf8"));
      await printImport("IMPORT FROM JSON BACKUP", counts, registry);
      return;
    }
    case "export": {
      const rows = await new ArtistRegistry(database(config)).exportJson();
      await writeFile(command.file, JSON.stringify(rows, null, 2) + "\n", "utf8");
      banner("DATABASE EXPORT", [
        `Successfully exported ${rows.length} artists to '${command.file}'`,
      ]);
      return;
    }
    case "remove": {
      const registry = new ArtistRegistry(database(config));
      const removed = await registry.remove(command.target);
      if (removed.length === 0) {
        console.error(`No tracked artist matches '${command.target}'`);
        process.exitCode = 1;
        return;
      }
      banner("ARTIST REMOVED", [
        ...removed.map((a) => `Removed ${a.name} (ID: ${a.id})`),
        "",
        `Total artists in database: ${await registry.count()}`,
      ]);
      return;
    }
    case "list": {
      const artists = await new ArtistRegistry(database(config)).list();
      banner(
        "TRACKED ARTISTS",
        artists.length === 0
          ? ["No artists in database.", "", "Use 'import-txt' or 'import-playlist' to add artists."]
          : [
              `Total: ${artists.length} artists`,
              "",
              ...artists.flatMap((a) => [
                `  ${a.name}`,
                `    Added: ${a.dateAdded.slice(0, 10)}`,
                `    Spotify ID: ${a.id}`,
                "",
              ]),
            ],
      );
      return;
    }
    case "history": {
      const runs = await new RunHistory(database(config)).list(command.limit);
      banner(
        "RUN HISTORY",
        runs.length === 0
          ? ["No runs recorded yet."]
          : runs.map(
              (r) =>
                `${r.timestamp}  ${r.artistsTracked} artists  ${r.releasesFound} releases  ` +
                `${r.lookbackDays}d  ${r.durationSeconds}s  ${r.apiCallsMade} calls  ${r.status}`,
            ),
      );
      return;
    }
  }
}

async function main() {
  try {
    await run(parseCliArgs(process.argv.slice(2)));
  } catch (error) {
    if (error instanceof ValidationError || error instanceof ConfigError) {
      console.error(`\nError: ${error.message}\n`);
      if (error instanceof ValidationError) console.error(USAGE);
    } else {
      console.error(`\nUnexpected error: ${errorMessage(error)}\n`);
    }
    process.exitCode = 1;
  } finally {
    closeDb();
  }
}

void main();
