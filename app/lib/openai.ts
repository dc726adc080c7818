/**
 * openai.ts
 *
 * OpenAI-compatible collaborators:
 * - debut-album tracklist inference (chat completions, OpenRouter by default)
 * - the pinned embedding model behind the album fingerprint
 */

import OpenAI from "openai";
import { z } from "zod";
import {
  EMBEDDING_API_KEY,
  EMBEDDING_BASE_URL,
  EMBEDDING_MODEL,
  HTTP_TIMEOUT_MS,
  LLM_API_KEY,
  LLM_BASE_URL,
  OPENAI_MODEL,
} from "./config";
import { FIRST_ALBUM_TEMPLATE } from "./prompts";
import type { EmbeddingProvider, Tracklist, TracklistInference } from "./album/types";

const albumResponseSchema = z.object({
  album_name: z.string().trim().min(1),
  songs: z.array(z.string().trim().min(1)).min(1),
});

/**
 * Remove a surrounding Markdown code fence, if any.
 */
export function stripCodeFence(content: string): string {
  let text = content.trim();
  if (text.startsWith("```json")) text = text.slice(7);
  else if (text.startsWith("```")) text = text.slice(3);
  if (text.endsWith("```")) text = text.slice(0, -3);
  return text.trim();
}

/**
 * Parse the model's answer into a tracklist. Throws on anything malformed.
 */
export function parseTracklistResponse(content: string): Tracklist {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFence(content));
  } catch {
    throw new Error("Tracklist response is not valid JSON");
  }

  const parsed = albumResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `Tracklist response has an unexpected shape: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown"}`,
    );
  }

  return { albumName: parsed.data.album_name, tracks: parsed.data.songs };
}

export function createOpenAITracklistInference(
  client: OpenAI = new OpenAI({
    apiKey: LLM_API_KEY,
    baseURL: LLM_BASE_URL,
    timeout: HTTP_TIMEOUT_MS * 3,
    maxRetries: 0,
  }),
  model: string = OPENAI_MODEL,
): TracklistInference {
  return {
    async infer(artist) {
      console.log(`[TRACKLIST] Asking ${model} about ${artist}'s first album...`);

      const response = await client.chat.completions.create({
        model,
        temperature: 0,
        messages: [{ role: "user", content: FIRST_ALBUM_TEMPLATE(artist) }],
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error("Tracklist response was empty");
      }

      const tracklist = parseTracklistResponse(content);
      console.log(
        `[TRACKLIST] First album: ${tracklist.albumName} (${tracklist.tracks.length} songs)`,
      );
      return tracklist;
    },
  };
}

export function createOpenAIEmbeddingProvider(
  client: OpenAI = new OpenAI({
    apiKey: EMBEDDING_API_KEY,
    baseURL: EMBEDDING_BASE_URL,
    timeout: HTTP_TIMEOUT_MS,
    maxRetries: 0,
  }),
  model: string = EMBEDDING_MODEL,
): EmbeddingProvider {
  return {
    model,
    async embed(text) {
      const response = await client.embeddings.create({
        model,
        input: text,
        encoding_format: "float",
      });

      const embedding = response.data[0]?.embedding;
      if (!embedding) {
        throw new Error(`${model} returned no embedding`);
      }
      return embedding;
    },
  };
}
