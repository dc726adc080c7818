/**
 * Album fingerprint module
 *
 * Main entry point for the album pipeline
 */

import { PACING_ENABLED } from "../config";
import { geniusLyricsSource } from "../genius";
import {
  createOpenAIEmbeddingProvider,
  createOpenAITracklistInference,
} from "../openai";
import { youtubeIdentityResolver } from "../youtube";
import { createFingerprintGenerator } from "./fingerprint";
import { createMetricsCalculator } from "./metrics";
import { DEFAULT_PACING, NO_PACING } from "./pacing";
import { runAlbumPipeline, type AlbumPipelineDeps } from "./pipeline";
import type { AlbumRunResult } from "./types";

export { runAlbumPipeline, buildAlbumReport } from "./pipeline";
export type { AlbumPipelineDeps } from "./pipeline";
export * from "./errors";
export type * from "./types";

/**
 * Production wiring: YouTube oEmbed, OpenAI-compatible chat + embeddings,
 * Genius pages and the cl100k tokenizer.
 */
export function createDefaultAlbumPipeline(
  overrides: Partial<AlbumPipelineDeps> = {},
): AlbumPipelineDeps {
  return {
    identity: overrides.identity ?? youtubeIdentityResolver,
    tracklist: overrides.tracklist ?? createOpenAITracklistInference(),
    lyrics: overrides.lyrics ?? geniusLyricsSource,
    metrics: overrides.metrics ?? createMetricsCalculator(),
    fingerprint:
      overrides.fingerprint ??
      createFingerprintGenerator(createOpenAIEmbeddingProvider()),
    pacing: overrides.pacing ?? (PACING_ENABLED ? DEFAULT_PACING : NO_PACING),
    onStage: overrides.onStage,
  };
}

export function analyzeAlbum(
  reference: string,
  deps: AlbumPipelineDeps = createDefaultAlbumPipeline(),
): Promise<AlbumRunResult> {
  return runAlbumPipeline(reference, deps);
}
