import { join } from "path";
import { LOGS_DIR } from "../config";
import type { AlbumRunResult } from "../album/types";
import { writeJsonlCapped } from "./jsonl";

export function albumLogFile(logsDir: string = LOGS_DIR): string {
  return join(logsDir, "album.jsonl");
}

export function summarizeAlbumRun(reference: string, result: AlbumRunResult) {
  const { report, fingerprint } = result;
  return {
    reference,
    artist: report.artist,
    album_name: report.album_name,
    trackCount: report.tracks.length,
    missingLyrics: report.tracks
      .filter((t) => t.token_count === 0)
      .map((t) => t.name),
    total_tokens: report.total_tokens,
    average_tokens_per_track: report.average_tokens_per_track,
    fingerprint,
  };
}

/**
 * Record a finished run in logs/album.jsonl. Never throws.
 */
export async function logAlbumRun(params: {
  reference: string;
  result: AlbumRunResult;
  logsDir?: string;
}): Promise<void> {
  try {
    await writeJsonlCapped({
      filePath: albumLogFile(params.logsDir),
      entry: {
        timestamp: new Date().toISOString(),
        ...summarizeAlbumRun(params.reference, params.result),
      },
    });
  } catch (error) {
    console.error("Failed to log album run:", error);
  }
}
