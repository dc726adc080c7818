export type FatalStage = "identity" | "tracklist" | "fingerprint";

/**
 * Base class for failures that abort a run. No partial report survives one.
 */
export class AlbumPipelineError extends Error {
  readonly stage: FatalStage;

  constructor(message: string, stage: FatalStage, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AlbumPipelineError";
    this.stage = stage;
  }
}

export class IdentityNotFoundError extends AlbumPipelineError {
  constructor(reference: string, cause?: unknown) {
    super(`No artist found for reference: ${reference}`, "identity", { cause });
    this.name = "IdentityNotFoundError";
  }
}

export class TracklistUnavailableError extends AlbumPipelineError {
  constructor(artist: string, detail: string, cause?: unknown) {
    super(`No tracklist for ${artist}: ${detail}`, "tracklist", { cause });
    this.name = "TracklistUnavailableError";
  }
}

export class EmbeddingUnavailableError extends AlbumPipelineError {
  constructor(detail: string, cause?: unknown) {
    super(`Embedding provider unavailable: ${detail}`, "fingerprint", { cause });
    this.name = "EmbeddingUnavailableError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
