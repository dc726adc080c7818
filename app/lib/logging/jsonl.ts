import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";

async function readJsonlLines(filePath: string): Promise<string[]> {
  try {
    const raw = await readFile(filePath, "utf8");
    return raw
      .split("\n")
      .map((l) => l.trim())
      .filter(Boolean);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }
}

/**
 * Appends `entry` to a JSONL file, keeping only the last `maxEntries` lines.
 *
 * NOTE: entries are single-line JSON so the cap can count lines.
 */
export async function writeJsonlCapped(params: {
  filePath: string;
  entry: unknown;
  maxEntries?: number;
}): Promise<void> {
  const { filePath, entry, maxEntries = 20 } = params;
  await mkdir(dirname(filePath), { recursive: true });

  const existing = await readJsonlLines(filePath);
  const keep = Math.max(0, maxEntries - 1);
  const next = [
    ...(keep > 0 ? existing.slice(-keep) : []),
    JSON.stringify(entry),
  ];
  await writeFile(filePath, next.join("\n") + "\n", { flag: "w" });
}
