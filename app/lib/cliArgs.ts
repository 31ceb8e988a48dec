import { ValidationError } from "./errors";
import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from "./format";

export interface TrackOptions {
  force: boolean;
  maxPerArtist: number | null | undefined; // undefined: use MAX_PER_ARTIST
  format: OutputFormat;
  lookbackDays: number | null; // null: use LOOKBACK_DAYS
}

export type CliCommand =
  | { command: "track"; options: TrackOptions }
  | { command: "preview"; playlist: string; options: TrackOptions }
  | { command: "list" }
  | { command: "import-txt"; file: string }
  | { command: "import-playlist"; playlist: string }
  | { command: "import-json"; file: string }
  | { command: "export"; file: string }
  | { command: "remove"; target: string }
  | { command: "history"; limit: number }
  | { command: "help" };

export const DEFAULT_EXPORT_FILE = "artists_backup.json";

export const USAGE = `Usage: release-radar <command> [options]

Commands:
  track                     Check tracked artists for new releases (default)
    --force                 Ignore cached results
    --max-per-artist=N      Keep the N most popular releases per artist
    --lookback=N            Lookback window in days
    --format=FORMAT         ${OUTPUT_FORMATS.join(" | ")}
  preview <playlist>        One-time check of a playlist's artists (nothing saved)
  list                      Show tracked artists
  import-txt <file|->       Add artists from a text file or stdin
  import-playlist <id>      Add every artist on a Spotify playlist
  import-json <file>        Restore artists from a JSON backup
  export [file]             Write a JSON backup (default ${DEFAULT_EXPORT_FILE})
  remove <id|name>          Stop tracking an artist
  history [--limit=N]       Show recent runs
`;

function readFlags(args: string[]): { positionals: string[]; flags: Map<string, string | true> } {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();
  for (const arg of args) {
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }
    const eq = arg.indexOf("=");
    if (eq === -1) flags.set(arg.slice(2), true);
    else flags.set(arg.slice(2, eq), arg.slice(eq + 1));
  }
  return { positionals, flags };
}

function intFlag(
  flags: Map<string, string | true>,
  name: string,
  min: number,
): number | null {
  const value = flags.get(name);
  if (value === undefined) return null;
  if (value === true || !/^\d+$/.test(value) || Number(value) < min) {
    throw new ValidationError(`--${name}`, `expected an integer >= ${min}`);
  }
  return Number(value);
}

function assertKnownFlags(flags: Map<string, string | true>, known: string[]): void {
  for (const name of flags.keys()) {
    if (!known.includes(name)) {
      throw new ValidationError(`--${name}`, "unknown option");
    }
  }
}

function trackOptions(flags: Map<string, string | true>): TrackOptions {
  assertKnownFlags(flags, ["force", "max-per-artist", "format", "lookback"]);
  const format = flags.get("format") ?? "table";
  if (format === true || !isOutputFormat(format)) {
    throw new ValidationError("--format", `expected one of ${OUTPUT_FORMATS.join(", ")}`);
  }
  return {
    force: flags.get("force") === true,
    maxPerArtist: intFlag(flags, "max-per-artist", 1) ?? undefined,
    format,
    lookbackDays: intFlag(flags, "lookback", 1),
  };
}

function requirePositional(positionals: string[], command: string, what: string): string {
  const value = positionals.join(" ").trim();
  if (!value) throw new ValidationError(command, `missing ${what}`);
  return value;
}

export function parseCliArgs(argv: string[]): CliCommand {
  if (argv.includes("--help") || argv.includes("-h")) return { command: "help" };
  const [first, ...rest] = argv;
  // Bare flags run the default command
  const command = !first || first.startsWith("--") ? "track" : first;
  const args = command === first ? rest : argv;
  const { positionals, flags } = readFlags(args);

  switch (command) {
    case "track":
      return { command: "track", options: trackOptions(flags) };
    case "preview":
      return {
        command: "preview",
        playlist: requirePositional(positionals, command, "playlist id, URI or URL"),
        options: trackOptions(flags),
      };
    case "list":
      assertKnownFlags(flags, []);
      return { command: "list" };
    case "import-txt":
      assertKnownFlags(flags, []);
      return { command: "import-txt", file: requirePositional(positionals, command, "file (or - for stdin)") };
    case "import-playlist":
      assertKnownFlags(flags, []);
      return {
        command: "import-playlist",
        playlist: requirePositional(positionals, command, "playlist id, URI or URL"),
      };
    case "import-json":
      assertKnownFlags(flags, []);
      return { command: "import-json", file: requirePositional(positionals, command, "file") };
    case "export":
      assertKnownFlags(flags, []);
      return { command: "export", file: positionals[0] ?? DEFAULT_EXPORT_FILE };
    case "remove":
      assertKnownFlags(flags, []);
      return { command: "remove", target: requirePositional(positionals, command, "artist id or name") };
    case "history":
      assertKnownFlags(flags, ["limit"]);
      return { command: "history", limit: intFlag(flags, "limit", 1) ?? 10 };
    case "help":
      return { command: "help" };
    default:
      throw new ValidationError("command", `unknown command '${command}'`);
  }
}
