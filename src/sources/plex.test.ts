import { describe, expect, it, vi } from "vitest";
import type { FetchLike } from "./http";
import { plexLibrarySource, plexSessionsSource, toStreamSession } from "./plex";

const conn = { url: "http://plex.local:32400/", token: "test-token" };

function json(body: unknown): Response {
  return new Response(JSON.stringify(body), { headers: { "Content-Type": "application/json" } });
}

const movie = {
  type: "movie",
  title: "Inception",
  year: 2010,
  librarySectionTitle: "Movies",
  viewOffset: 1_800_000,
  duration: 7_200_000,
  User: { title: "plexuser123" },
  Player: { product: "Plex for Apple TV", state: "playing" },
  Media: [{ videoResolution: "1080", bitrate: 8500 }],
  TranscodeSession: null,
};

describe("plexSessionsSource", () => {
  it("requests the session list with the token header", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => json({ MediaContainer: { size: 1, Metadata: [movie] } }));
    const payload = await plexSessionsSource(conn, fetchImpl).fetch(new AbortController().signal);

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("http://plex.local:32400/status/sessions");
    expect(init?.headers).toEqual({ Accept: "application/json", "X-Plex-Token": "test-token" });
    expect(payload).toEqual({
      kind: "streams",
      sessions: [
        {
          sourceKind: "plex",
          rawUser: "plexuser123",
          title: "Inception (2010)",
          sectionOrMediaType: "Movies",
          mediaKind: "movie",
          isEpisode: false,
          progressFraction: 0.25,
          elapsedMs: 1_800_000,
          durationMs: 7_200_000,
          paused: false,
          transcoding: false,
          qualityLabel: "1080p",
          bitrateLabel: "8.5 Mbps",
          playerLabel: "Apple TV",
        },
      ],
    });
  });

  it("treats a missing Metadata list as no sessions", async () => {
    const payload = await plexSessionsSource(conn, async () => json({ MediaContainer: { size: 0 } })).fetch(
      new AbortController().signal
    );
    expect(payload).toEqual({ kind: "streams", sessions: [] });
  });

  it("skips a malformed session and keeps the others", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const payload = await plexSessionsSource(conn, async () =>
      json({ MediaContainer: { size: 2, Metadata: [{ title: "Good" }, { title: "Odd", year: "2020" }] } })
    ).fetch(new AbortController().signal);

    expect(payload.kind === "streams" && payload.sessions.map((session) => session.title)).toEqual(["Good"]);
    expect(warn).toHaveBeenCalledWith("⚠️  plex: skipped entry 1 at year: Expected number, received string");
    warn.mockRestore();
  });
});

describe("toStreamSession", () => {
  it("formats episodes with a short series name and episode code", () => {
    const session = toStreamSession({
      type: "episode",
      grandparentTitle: "Star Trek: Discovery",
      parentIndex: 1,
      index: 2,
      librarySectionTitle: "TV Shows",
      User: { title: "bob" },
      Player: { product: "Infuse-Library", state: "paused" },
      Media: [{ videoResolution: "4k", bitrate: 20000 }],
      TranscodeSession: { bitrate: 4000 },
    });

    expect(session).toMatchObject({
      title: "Star Trek - S01E02",
      mediaKind: "episode",
      isEpisode: true,
      paused: true,
      transcoding: true,
      qualityLabel: "4K",
      bitrateLabel: "4.0 Mbps",
      playerLabel: "Infuse",
      progressFraction: 0,
    });
  });

  it("describes tracks by artist and audio format", () => {
    const session = toStreamSession({
      type: "track",
      title: "Song",
      grandparentTitle: "Artist",
      Media: [{ Part: [{ Stream: [{ streamType: 2, bitDepth: 24, samplingRate: 96000 }] }] }],
    });

    expect(session).toMatchObject({
      rawUser: "Unknown",
      title: "Artist - Song",
      sectionOrMediaType: "track",
      mediaKind: "track",
      qualityLabel: "24bit 96kHz",
      bitrateLabel: null,
      playerLabel: null,
    });
  });
});

describe("plexLibrarySource", () => {
  it("counts items per section and episodes where requested", async () => {
    const fetchImpl = vi.fn<FetchLike>(async (url) => {
      if (url.endsWith("/library/sections")) {
        return json({
          MediaContainer: {
            Directory: [
              { key: "1", title: "Movies", type: "movie" },
              { key: "2", title: "TV Shows", type: "show" },
            ],
          },
        });
      }
      if (url.includes("type=4")) return json({ MediaContainer: { totalSize: 789, size: 0 } });
      if (url.includes("/sections/2/")) return json({ MediaContainer: { totalSize: 56, size: 0 } });
      return json({ MediaContainer: { totalSize: 1234, size: 0 } });
    });

    const sections = await plexLibrarySource(conn, (title) => title === "TV Shows", fetchImpl).listSections(
      new AbortController().signal
    );

    expect(sections).toEqual([
      { sectionKey: "Movies", itemCount: 1234, episodeCount: 0 },
      { sectionKey: "TV Shows", itemCount: 56, episodeCount: 789 },
    ]);
    expect(fetchImpl).toHaveBeenCalledTimes(4);
  });
});
