import { join } from "path";
import type { DiscoverResult } from "../discovery/types";
import { errorMessage } from "../errors";
import { LOGS_DIR, writeJsonlCapped } from "./jsonl";

const MAX_RUNS = 20;

export interface DiscoveryLogContext {
  command: string;
  cutoffDate: string;
  forceRefresh: boolean;
  maxPerArtist: number | null;
}

function summarizeResult(result: DiscoverResult) {
  const releaseCounts = Object.fromEntries(
    Object.entries(result.releasesByArtist).map(([id, releases]) => [
      id,
      releases.length,
    ]),
  );
  return {
    artists: result.cacheHits.length + result.fetchedArtists.length + result.missingArtists.length,
    releases: Object.values(releaseCounts).reduce((sum, n) => sum + n, 0),
    releaseCounts,
    cacheHits: result.cacheHits.length,
    fetched: result.fetchedArtists.length,
    missing: result.missingArtists,
    callCounts: result.callCounts,
    durationMs: Number(result.durationMs.toFixed(2)),
  };
}

/**
 * Append a run summary to discovery.jsonl (last 20 runs kept).
 * Never throws: a failed log write must not fail the run.
 */
export async function logDiscoveryRun(params: {
  context: DiscoveryLogContext;
  result: DiscoverResult;
  logsDir?: string;
  now?: Date;
}): Promise<void> {
  const { context, result, logsDir = LOGS_DIR, now = new Date() } = params;
  try {
    await writeJsonlCapped({
      filePath: join(logsDir, "discovery.jsonl"),
      entry: {
        timestamp: now.toISOString(),
        ...context,
        ...summarizeResult(result),
      },
      maxEntries: MAX_RUNS,
    });
  } catch (error) {
    console.warn(`[DISCOVERY] Failed to write run log: ${errorMessage(error)}`);
  }
}
