import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  clearLyricsCache,
  extractLyricsFromHtml,
  geniusLyricsSource,
  geniusLyricsUrl,
  geniusSlug,
} from "../genius";

const LONG_VERSE =
  "Walking down the empty road tonight<br/>Counting every streetlight passing by";

function lyricsPage(...containers: string[]): string {
  return `<html><body><div class="header">Menu</div>${containers
    .map((c) => `<div data-lyrics-container="true" class="Lyrics__Container">${c}</div>`)
    .join("")}</body></html>`;
}

describe("geniusSlug", () => {
  it("builds the artist-title slug", () => {
    expect(geniusSlug("Don't Stop Me Now", "Queen")).toBe("queen-dont-stop-me-now");
    expect(geniusSlug("Song  Title!", "AC/DC")).toBe("acdc-song-title");
    expect(geniusSlug(" Intro ", "Band")).toBe("band-intro");
  });

  it("keeps non-Latin letters", () => {
    expect(geniusSlug("Über Alles", "Bänd")).toBe("bänd-über-alles");
  });

  it("builds the lyrics page URL", () => {
    expect(geniusLyricsUrl("Don't Stop Me Now", "Queen")).toBe(
      "https://genius.com/queen-dont-stop-me-now-lyrics",
    );
  });
});

describe("extractLyricsFromHtml", () => {
  it("joins every lyrics container as plain text", () => {
    const html = lyricsPage(
      "[Verse 1]<br/>Hello &amp; goodbye<br><i>again</i>",
      "Second &#x27;part&#x27;",
    );

    expect(extractLyricsFromHtml(html)).toBe(
      "[Verse 1]\nHello & goodbye\nagain\n\nSecond 'part'",
    );
  });

  it("follows nested divs and drops excluded header blocks", () => {
    const html = lyricsPage(
      '<div data-exclude-from-selection="true"><div class="Title">Song Lyrics</div></div>' +
        '[Verse 1]<br/><div class="Line">First line of the song</div><br/>Second line of the song',
      "Outro",
    );

    expect(extractLyricsFromHtml(html)).toBe(
      "[Verse 1]\nFirst line of the song\nSecond line of the song\n\nOutro",
    );
  });

  it("returns null when the page has no lyrics container", () => {
    expect(extractLyricsFromHtml("<html><body>Not found</body></html>")).toBeNull();
  });
});

describe("geniusLyricsSource", () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    clearLyricsCache();
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("returns the scraped lyrics", async () => {
    fetchMock.mockResolvedValue(new Response(lyricsPage(LONG_VERSE), { status: 200 }));

    await expect(geniusLyricsSource.fetch("Night Walk", "Test Band")).resolves.toBe(
      "Walking down the empty road tonight\nCounting every streetlight passing by",
    );
    expect(fetchMock.mock.calls[0][0]).toBe(
      "https://genius.com/test-band-night-walk-lyrics",
    );
  });

  it("keeps lyrics that follow a nested header block", async () => {
    fetchMock.mockResolvedValue(
      new Response(
        lyricsPage(
          '<div data-exclude-from-selection="true"><div>Song Lyrics</div></div>' +
            "[Verse 1]<br/>First line of the song<br/>Second line of the song",
        ),
        { status: 200 },
      ),
    );

    await expect(geniusLyricsSource.fetch("Nested", "Test Band")).resolves.toBe(
      "[Verse 1]\nFirst line of the song\nSecond line of the song",
    );
  });

  it("treats very short lyrics as blocked", async () => {
    fetchMock.mockResolvedValue(new Response(lyricsPage("Oh"), { status: 200 }));

    await expect(geniusLyricsSource.fetch("Short", "Test Band")).resolves.toBeNull();
  });

  it("returns null for missing pages", async () => {
    fetchMock.mockResolvedValue(new Response("Not Found", { status: 404 }));

    await expect(geniusLyricsSource.fetch("Missing", "Test Band")).resolves.toBeNull();
  });

  it("returns null instead of throwing on transport errors", async () => {
    fetchMock.mockRejectedValue(new TypeError("fetch failed"));

    await expect(geniusLyricsSource.fetch("Offline", "Test Band")).resolves.toBeNull();
  });

  it("caches page results but not transport failures", async () => {
    fetchMock
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockImplementation(
        async () => new Response(lyricsPage(LONG_VERSE), { status: 200 }),
      );

    await expect(geniusLyricsSource.fetch("Night Walk", "Test Band")).resolves.toBeNull();
    await geniusLyricsSource.fetch("Night Walk", "Test Band");
    await geniusLyricsSource.fetch("Night Walk", "Test Band");

    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
