/**
 * genius.ts
 *
 * Lyrics source backed by Genius song pages.
 * A page is requested once; anything short of usable lyrics is "absent".
 */

import { HTTP_TIMEOUT_MS } from "./config";
import { TtlCache, cacheKey } from "./cache";
import type { LyricsSource } from "./album/types";

const GENIUS_BASE = "https://genius.com";
// Anything this short is usually a block page or an instrumental stub.
const MIN_LYRICS_LENGTH = 50;

const lyricsCache = new TtlCache<string | null>();

export function clearLyricsCache(): void {
  lyricsCache.clear();
}

/**
 * Build the Genius slug for "{artist}-{title}".
 *
 * @example
 * geniusSlug("Don't Stop Me Now", "Queen") // "queen-dont-stop-me-now"
 */
export function geniusSlug(title: string, artist: string): string {
  return `${artist}-${title}`
    .toLowerCase()
    .replace(/ /g, "-")
    .replace(/['"]/g, "")
    .replace(/[^\p{L}\p{N}-]/gu, "")
    .replace(/-{2,}/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function geniusLyricsUrl(title: string, artist: string): string {
  return `${GENIUS_BASE}/${geniusSlug(title, artist)}-lyrics`;
}

function decodeHtmlEntities(text: string): string {
  return text
    .replace(/&nbsp;/g, " ")
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&#x27;|&apos;/g, "'")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&#(\d+);/g, (_match, dec: string) =>
      String.fromCodePoint(Number(dec)),
    )
    .replace(/&#x([0-9a-f]+);/gi, (_match, hex: string) =>
      String.fromCodePoint(parseInt(hex, 16)),
    )
    .replace(/&amp;/g, "&");
}

interface DivBlock {
  start: number;
  end: number;
  inner: string;
}

/**
 * Every `<div ... attribute="true">` block with its matching `</div>`,
 * counting nested divs.
 */
function findDivBlocks(html: string, attribute: string): DivBlock[] {
  const opener = new RegExp(`<div\\b[^>]*\\b${attribute}="true"[^>]*>`, "gi");
  const tag = /<(\/?)div\b[^>]*>/gi;
  const blocks: DivBlock[] = [];

  let open: RegExpExecArray | null;
  while ((open = opener.exec(html)) !== null) {
    const contentStart = open.index + open[0].length;
    let contentEnd = html.length;
    let end = html.length;
    let depth = 1;

    tag.lastIndex = contentStart;
    let match: RegExpExecArray | null;
    while ((match = tag.exec(html)) !== null) {
      depth += match[1] ? -1 : 1;
      if (depth === 0) {
        contentEnd = match.index;
        end = tag.lastIndex;
        break;
      }
    }

    blocks.push({ start: open.index, end, inner: html.slice(contentStart, contentEnd) });
    opener.lastIndex = end;
  }

  return blocks;
}

function removeDivBlocks(html: string, attribute: string): string {
  let out = "";
  let cursor = 0;
  for (const block of findDivBlocks(html, attribute)) {
    out += html.slice(cursor, block.start);
    cursor = block.end;
  }
  return out + html.slice(cursor);
}

function containerToText(html: string): string {
  const text = removeDivBlocks(html, "data-exclude-from-selection")
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<[^>]+>/g, "");
  return decodeHtmlEntities(text);
}

/**
 * Text of every `data-lyrics-container` block, separated by blank lines.
 * Header and annotation blocks marked `data-exclude-from-selection` are
 * dropped. Returns null when the page has none.
 */
export function extractLyricsFromHtml(html: string): string | null {
  const blocks = findDivBlocks(html, "data-lyrics-container").map((block) =>
    containerToText(block.inner),
  );

  if (blocks.length === 0) return null;

  const lyrics = blocks.map((b) => `${b}\n\n`).join("").trim();
  return lyrics || null;
}

async function fetchLyricsPage(url: string): Promise<string | null> {
  try {
    const res = await fetch(url, {
      headers: { Accept: "text/html" },
      signal: AbortSignal.timeout(HTTP_TIMEOUT_MS),
    });
    if (!res.ok) {
      console.warn(`[LYRICS] ✗ ${url} returned ${res.status}`);
      return null;
    }
    return await res.text();
  } catch (error) {
    console.warn(
      `[LYRICS] ✗ Error fetching ${url}:`,
      error instanceof Error ? error.message : String(error),
    );
    return null;
  }
}

export const geniusLyricsSource: LyricsSource = {
  async fetch(track, artist) {
    const url = geniusLyricsUrl(track, artist);
    const key = cacheKey("lyrics", url);
    const cached = lyricsCache.get(key);
    if (cached !== undefined) return cached;

    console.log(`[LYRICS] Scraping lyrics from: ${url}`);
    const html = await fetchLyricsPage(url);
    // Transport failures are not cached; the next run may succeed.
    if (html === null) return null;

    const lyrics = extractLyricsFromHtml(html);
    let result: string | null = null;
    if (!lyrics) {
      console.warn("[LYRICS] ✗ No lyrics found");
    } else if (lyrics.length <= MIN_LYRICS_LENGTH) {
      console.warn("[LYRICS] ✗ Lyrics too short, might be blocked");
    } else {
      console.log(`[LYRICS] ✓ Scraped lyrics (${lyrics.length} characters)`);
      result = lyrics;
    }

    lyricsCache.set(key, result);
    return result;
  },
};
