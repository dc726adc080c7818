/**
 * types.ts
 *
 * Value objects produced by the album pipeline and the contracts of the
 * external collaborators it sequences.
 */

/**
 * Metrics for a single track. Field names are the serialized report format.
 */
export interface TrackMetrics {
  readonly name: string;
  readonly char_count: number;
  readonly word_count: number;
  readonly token_count: number;
  readonly tokens_per_word: number;
  readonly lyrics_hash: string; // MD5 hex of the raw lyrics
}

export type LyricsMetrics = Omit<TrackMetrics, "name">;

export interface AlbumReport {
  readonly artist: string;
  readonly album_name: string;
  readonly tracks: readonly TrackMetrics[]; // album order
  readonly total_tokens: number;
  readonly average_tokens_per_track: number;
}

export interface AlbumRunResult {
  report: AlbumReport;
  fingerprint: string;
}

export interface Tracklist {
  albumName: string;
  tracks: string[];
}

/**
 * Resolves an opaque reference (e.g. a video URL) to an artist display name.
 * Throws when no identity can be determined.
 */
export interface IdentityResolver {
  resolve(reference: string): Promise<string>;
}

/**
 * Infers the debut album of an artist, tracks in canonical album order.
 */
export interface TracklistInference {
  infer(artist: string): Promise<Tracklist>;
}

/**
 * Returns lyrics text, or null when none were found.
 */
export interface LyricsSource {
  fetch(track: string, artist: string): Promise<string | null>;
}

export interface EmbeddingProvider {
  readonly model: string;
  embed(text: string): Promise<number[]>;
}

export interface Tokenizer {
  readonly id: string;
  countTokens(text: string): number;
}

export type PipelineStage =
  | "START"
  | "IDENTITY_RESOLVED"
  | "TRACKLIST_RESOLVED"
  | "LYRICS_FETCHED"
  | "METRICS_COMPUTED"
  | "AGGREGATED"
  | "FINGERPRINTED"
  | "DONE";

export type OutputType = "json" | "hash" | "both";
