// lib/youtube.ts
import { HTTP_TIMEOUT_MS } from "./config";
import { TtlCache, cacheKey } from "./cache";
import type { IdentityResolver } from "./album/types";

const OEMBED_URL = "https://www.youtube.com/oembed";
const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{6,}$/;

function readAuthorName(payload: unknown): string | null {
  if (typeof payload !== "object" || payload === null) return null;
  if (!("author_name" in payload)) return null;
  const { author_name } = payload;
  return typeof author_name === "string" && author_name.trim()
    ? author_name
    : null;
}

const channelCache = new TtlCache<string>();

export function clearYouTubeCache(): void {
  channelCache.clear();
}

/**
 * Extract the video id from watch, short-link, shorts and embed URLs.
 */
export function parseVideoId(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return null;
  }

  const host = parsed.hostname.replace(/^www\.|^m\.|^music\./, "");
  let candidate: string | null = null;

  if (host === "youtu.be") {
    candidate = parsed.pathname.split("/")[1] ?? null;
  } else if (host === "youtube.com" || host === "youtube-nocookie.com") {
    const segments = parsed.pathname.split("/").filter(Boolean);
    if (segments[0] === "watch") {
      candidate = parsed.searchParams.get("v");
    } else if (segments[0] === "shorts" || segments[0] === "embed" || segments[0] === "live") {
      candidate = segments[1] ?? null;
    }
  }

  return candidate && VIDEO_ID_PATTERN.test(candidate) ? candidate : null;
}

/**
 * Music uploads often come from "Artist - Topic" or "ArtistVEVO" channels.
 */
export function normalizeChannelName(raw: string): string {
  return raw
    .trim()
    .replace(/\s+-\s+Topic$/i, "")
    .replace(/\s*VEVO$/, "")
    .trim();
}

export async function fetchChannelName(videoId: string): Promise<string | null> {
  const params = new URLSearchParams({
    url: `https://www.youtube.com/watch?v=${videoId}`,
    format: "json",
  });

  const response = await fetch(`${OEMBED_URL}?${params.toString()}`, {
    signal: AbortSignal.timeout(HTTP_TIMEOUT_MS),
  });

  if (!response.ok) {
    console.error(`[YOUTUBE] oEmbed returned ${response.status} for ${videoId}`);
    return null;
  }

  const data: unknown = await response.json();
  return readAuthorName(data);
}

/**
 * Identity resolver backed by the public YouTube oEmbed endpoint.
 */
export const youtubeIdentityResolver: IdentityResolver = {
  async resolve(reference) {
    const videoId = parseVideoId(reference);
    if (!videoId) {
      throw new Error(`Not a YouTube video URL: ${reference}`);
    }

    const key = cacheKey("channel", videoId);
    const cached = channelCache.get(key);
    if (cached) return cached;

    console.log(`[YOUTUBE] Looking up video ${videoId}`);
    const channel = await fetchChannelName(videoId);
    if (!channel) {
      throw new Error(`No channel name for video ${videoId}`);
    }

    const artist = normalizeChannelName(channel);
    if (!artist) {
      throw new Error(`Empty channel name for video ${videoId}`);
    }

    console.log(`[YOUTUBE] Found artist: ${artist}`);
    channelCache.set(key, artist);
    return artist;
  },
};
