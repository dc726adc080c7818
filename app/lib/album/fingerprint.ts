/**
 * fingerprint.ts
 *
 * Album fingerprint: token-count sequence → embedding → fixed-precision
 * string → MD5. Only the ordered counts feed the fingerprint; artist and
 * album names never do.
 */

import { EmbeddingUnavailableError, describeError } from "./errors";
import { md5Hex } from "./metrics";
import { formatFixed } from "./round";
import type { EmbeddingProvider } from "./types";

const FRACTION_DIGITS = 10;

export function joinTokenCounts(tokenCounts: readonly number[]): string {
  for (const count of tokenCounts) {
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Token counts must be non-negative integers, got ${count}`);
    }
  }
  return tokenCounts.join(",");
}


export function formatEmbedding(vector: readonly number[]): string {
  return vector.map((value) => formatFixed(value, FRACTION_DIGITS)).join(",");
}

export interface FingerprintGenerator {
  readonly model: string;
  fingerprint(tokenCounts: readonly number[]): Promise<string>;
}

export function createFingerprintGenerator(
  embedder: EmbeddingProvider,
): FingerprintGenerator {
  return {
    model: embedder.model,
    async fingerprint(tokenCounts) {
      const input = joinTokenCounts(tokenCounts);
      console.log(`[EMBEDDING] Token counts string: "${input}"`);

      let vector: number[];
      try {
        vector = await embedder.embed(input);
      } catch (error) {
        throw new EmbeddingUnavailableError(describeError(error), error);
      }

      if (vector.length === 0) {
        throw new EmbeddingUnavailableError(`${embedder.model} returned an empty vector`);
      }
      if (!vector.every(Number.isFinite)) {
        throw new EmbeddingUnavailableError(`${embedder.model} returned non-finite values`);
      }

      return md5Hex(formatEmbedding(vector));
    },
  };
}
