import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname, resolve } from "path";

export const LOGS_DIR = resolve(process.cwd(), process.env.TRACKER_LOGS_DIR || "logs");

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

/**
 * Non-empty lines of a JSONL file; a file that does not exist yet has none.
 */
export async function readJsonlLines(filePath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (errorCode(error) === "ENOENT") return [];
    throw error;
  }
  return raw
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Append `entry` as one line, then drop the oldest lines so at most
 * `maxEntries` remain. Parent directories are created as needed.
 */
export async function writeJsonlCapped(params: {
  filePath: string;
  entry: unknown;
  maxEntries?: number;
}): Promise<void> {
  const { filePath, entry, maxEntries = 20 } = params;
  await mkdir(dirname(filePath), { recursive: true });

  const lines = [...(await readJsonlLines(filePath)), JSON.stringify(entry)];
  const kept = lines.slice(-Math.max(1, maxEntries));
  await writeFile(filePath, kept.join("\n") + "\n", "utf8");
}
