/**
 * metrics.ts
 *
 * Per-track lyrics metrics: code-point length, whitespace word count,
 * cl100k token count, tokens-per-word and MD5 of the raw text.
 */

import { createHash } from "crypto";
import { getEncoding, type Tiktoken } from "js-tiktoken";
import { TOKENIZER_ENCODING } from "../config";
import { roundHalfEven } from "./round";
import type { LyricsMetrics, Tokenizer, TrackMetrics } from "./types";

export function md5Hex(text: string): string {
  return createHash("md5").update(text, "utf8").digest("hex");
}

export const EMPTY_LYRICS_HASH = md5Hex("");

let cachedEncoding: Tiktoken | null = null;

/**
 * The pinned BPE tokenizer. Token counts are part of the report contract,
 * so the encoding must not change silently.
 */
export function createCl100kTokenizer(): Tokenizer {
  if (!cachedEncoding) {
    cachedEncoding = getEncoding(TOKENIZER_ENCODING);
  }
  const encoding = cachedEncoding;

  return {
    id: TOKENIZER_ENCODING,
    // Special-token markers in lyrics are plain text here.
    countTokens: (text) => encoding.encode(text, [], []).length,
  };
}

// Unicode whitespace, including the U+001C–U+001F separators and NEL;
// unlike JS `\s` it excludes U+FEFF.
const WHITESPACE_RUN =
  /[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/;

export function countWords(text: string): number {
  return text.split(WHITESPACE_RUN).filter(Boolean).length;
}

export function countCodePoints(text: string): number {
  return Array.from(text).length;
}

export interface MetricsCalculator {
  readonly tokenizerId: string;
  compute(lyrics: string | null | undefined): LyricsMetrics;
  computeTrack(name: string, lyrics: string | null | undefined): TrackMetrics;
}

export function createMetricsCalculator(
  tokenizer: Tokenizer = createCl100kTokenizer(),
): MetricsCalculator {
  const compute = (lyrics: string | null | undefined): LyricsMetrics => {
    if (!lyrics) {
      return {
        char_count: 0,
        word_count: 0,
        token_count: 0,
        tokens_per_word: 0,
        lyrics_hash: EMPTY_LYRICS_HASH,
      };
    }

    const tokenCount = tokenizer.countTokens(lyrics);
    const wordCount = countWords(lyrics);

    return {
      char_count: countCodePoints(lyrics),
      word_count: wordCount,
      token_count: tokenCount,
      tokens_per_word:
        wordCount > 0 ? roundHalfEven(tokenCount / wordCount, 2) : 0,
      lyrics_hash: md5Hex(lyrics),
    };
  };

  return {
    tokenizerId: tokenizer.id,
    compute,
    computeTrack: (name, lyrics) => Object.freeze({ name, ...compute(lyrics) }),
  };
}
