/**
 * pipeline.ts
 *
 * Main orchestrator for the album run.
 * Resolves the artist and debut tracklist, computes metrics per track and
 * fingerprints the ordered token counts.
 */

import {
  IdentityNotFoundError,
  TracklistUnavailableError,
  describeError,
} from "./errors";
import type { FingerprintGenerator } from "./fingerprint";
import type { MetricsCalculator } from "./metrics";
import { DEFAULT_PACING, pause, type PacingPolicy } from "./pacing";
import { roundHalfEven } from "./round";
import type {
  AlbumReport,
  AlbumRunResult,
  IdentityResolver,
  LyricsSource,
  PipelineStage,
  TrackMetrics,
  Tracklist,
  TracklistInference,
} from "./types";

export interface AlbumPipelineDeps {
  identity: IdentityResolver;
  tracklist: TracklistInference;
  lyrics: LyricsSource;
  metrics: MetricsCalculator;
  fingerprint: FingerprintGenerator;
  pacing?: PacingPolicy;
  onStage?: (stage: PipelineStage, detail?: string) => void;
}

async function resolveIdentity(
  identity: IdentityResolver,
  reference: string,
): Promise<string> {
  let artist: string;
  try {
    artist = await identity.resolve(reference);
  } catch (error) {
    throw new IdentityNotFoundError(reference, error);
  }

  const trimmed = typeof artist === "string" ? artist.trim() : "";
  if (!trimmed) throw new IdentityNotFoundError(reference);
  return trimmed;
}

async function resolveTracklist(
  inference: TracklistInference,
  artist: string,
): Promise<Tracklist> {
  let result: Tracklist;
  try {
    result = await inference.infer(artist);
  } catch (error) {
    throw new TracklistUnavailableError(artist, describeError(error), error);
  }

  const albumName =
    typeof result?.albumName === "string" ? result.albumName.trim() : "";
  if (!albumName) {
    throw new TracklistUnavailableError(artist, "missing album name");
  }
  if (!Array.isArray(result.tracks) || result.tracks.length === 0) {
    throw new TracklistUnavailableError(artist, "no tracks");
  }
  if (!result.tracks.every((t) => typeof t === "string" && t.trim())) {
    throw new TracklistUnavailableError(artist, "malformed track names");
  }

  return { albumName, tracks: [...result.tracks] };
}

/**
 * Lyrics failures degrade to absent; they never abort the run.
 */
async function fetchLyricsSafely(
  source: LyricsSource,
  track: string,
  artist: string,
): Promise<string | null> {
  try {
    return (await source.fetch(track, artist)) ?? null;
  } catch (error) {
    console.warn(`[ALBUM] Lyrics fetch failed for "${track}":`, describeError(error));
    return null;
  }
}

export function buildAlbumReport(
  artist: string,
  albumName: string,
  tracks: readonly TrackMetrics[],
): AlbumReport {
  const totalTokens = tracks.reduce((sum, t) => sum + t.token_count, 0);
  const average =
    tracks.length > 0 ? roundHalfEven(totalTokens / tracks.length, 2) : 0;

  return Object.freeze({
    artist,
    album_name: albumName,
    tracks: Object.freeze([...tracks]),
    total_tokens: totalTokens,
    average_tokens_per_track: average,
  });
}

/**
 * Run the album pipeline for one video reference.
 *
 * Pipeline flow:
 * 1. Resolve the artist (fatal on failure)
 * 2. Infer the debut album tracklist (fatal on failure)
 * 3. For each track, in order: fetch lyrics, compute metrics
 * 4. Aggregate totals
 * 5. Fingerprint the ordered token counts (fatal on failure)
 */
export async function runAlbumPipeline(
  reference: string,
  deps: AlbumPipelineDeps,
): Promise<AlbumRunResult> {
  const pacing = deps.pacing ?? DEFAULT_PACING;
  const stage = (s: PipelineStage, detail?: string) => deps.onStage?.(s, detail);

  stage("START", reference);

  // Step 1: Identity
  const artist = await resolveIdentity(deps.identity, reference);
  stage("IDENTITY_RESOLVED", artist);
  await pause(pacing, pacing.afterIdentity);

  // Step 2: Tracklist
  const { albumName, tracks } = await resolveTracklist(deps.tracklist, artist);
  stage("TRACKLIST_RESOLVED", `${albumName} (${tracks.length} tracks)`);

  // Step 3: Per-track metrics, strictly sequential
  const trackMetrics: TrackMetrics[] = [];
  for (const [index, track] of tracks.entries()) {
    console.log(`[ALBUM] [${index + 1}/${tracks.length}] Processing: ${track}`);
    if (index > 0) await pause(pacing, pacing.betweenTracks);

    const lyrics = await fetchLyricsSafely(deps.lyrics, track, artist);
    stage("LYRICS_FETCHED", track);

    trackMetrics.push(deps.metrics.computeTrack(track, lyrics));
    stage("METRICS_COMPUTED", track);
  }

  // Step 4: Aggregate
  const report = buildAlbumReport(artist, albumName, trackMetrics);
  stage("AGGREGATED", `total_tokens=${report.total_tokens}`);

  // Step 5: Fingerprint
  const fingerprint = await deps.fingerprint.fingerprint(
    report.tracks.map((t) => t.token_count),
  );
  stage("FINGERPRINTED", fingerprint);

  stage("DONE");
  return { report, fingerprint };
}
