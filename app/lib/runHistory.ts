import type { Client } from "@libsql/client";
import { ensureRunHistoryTable, readNumber, readString, type DbRow } from "./db";

export type RunStatus = "completed" | "partial";

export interface RunRecord {
  timestamp: string;
  artistsTracked: number;
  releasesFound: number;
  lookbackDays: number;
  durationSeconds: number;
  apiCallsMade: number;
  missingArtists: number;
  status: RunStatus;
}

const mapRun = (row: DbRow): RunRecord => ({
  timestamp: readString(row, "run_timestamp"),
  artistsTracked: readNumber(row, "artists_tracked"),
  releasesFound: readNumber(row, "releases_found"),
  lookbackDays: readNumber(row, "lookback_days"),
  durationSeconds: readNumber(row, "duration_seconds"),
  apiCallsMade: readNumber(row, "api_calls_made"),
  missingArtists: readNumber(row, "missing_artists"),
  status: readString(row, "status") === "partial" ? "partial" : "completed",
});

export class RunHistory {
  constructor(private readonly db: Client) {}

  async record(run: RunRecord): Promise<void> {
    await ensureRunHistoryTable(this.db);
    await this.db.execute({
      sql: `
        insert into run_history (
          run_timestamp, artists_tracked, releases_found, lookback_days,
          duration_seconds, api_calls_made, missing_artists, status
        )
        values (?, ?, ?, ?, ?, ?, ?, ?)
      `,
      args: [
        run.timestamp,
        run.artistsTracked,
        run.releasesFound,
        run.lookbackDays,
        run.durationSeconds,
        run.apiCallsMade,
        run.missingArtists,
        run.status,
      ],
    });
    console.log(
      `[HISTORY] Recorded run: ${run.artistsTracked} artists, ${run.releasesFound} releases, ${run.apiCallsMade} API calls`,
    );
  }

  /**
   * Most recent runs first.
   */
  async list(limit = 10): Promise<RunRecord[]> {
    await ensureRunHistoryTable(this.db);
    const result = await this.db.execute({
      sql: "select * from run_history order by run_timestamp desc, id desc limit ?",
      args: [limit],
    });
    return result.rows.map((row) => mapRun(row));
  }

  async lastRunAt(): Promise<string | null> {
    const [latest] = await this.list(1);
    return latest?.timestamp ?? null;
  }
}
