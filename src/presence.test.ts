import { beforeEach, describe, expect, it, vi } from "vitest";
import { derivePresence, NO_PRESENCE_CONTENT, PresencePublisher, type PresenceSink, type PresenceTemplates } from "./presence";
import { viewModel } from "./testing";

const templates: PresenceTemplates = {
  offlineText: "🔴 Server Offline!",
  streamText: "{count} active Stream{s} 🟢",
  sections: [
    { sectionTitle: "Movies", displayName: "Movies", emoji: "🎥" },
    { sectionTitle: "TV Shows", displayName: "Shows", emoji: "📺" },
  ],
};

const library = [
  { sectionKey: "Movies", displayName: "Movies", emoji: "🎥", showEpisodes: false, itemCount: 1234, episodeCount: 0 },
  { sectionKey: "TV Shows", displayName: "Shows", emoji: "📺", showEpisodes: true, itemCount: 56, episodeCount: 789 },
];

beforeEach(() => {
  vi.restoreAllMocks();
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("derivePresence", () => {
  it("reports the server offline when the primary source is down", () => {
    const view = viewModel({
      streamTotal: 3,
      sourceStates: { plex: "down", jellyfin: "disabled", sabnzbd: "disabled", uptime: "disabled" },
    });
    expect(derivePresence(view, templates)).toBe("🔴 Server Offline!");
  });

  it("fills in the stream count", () => {
    expect(derivePresence(viewModel({ streamTotal: 1 }), templates)).toBe("1 active Stream 🟢");
    expect(derivePresence(viewModel({ streamTotal: 3 }), templates)).toBe("3 active Streams 🟢");
  });

  it("falls back to library counts when nothing is playing", () => {
    expect(derivePresence(viewModel({ library }), templates)).toBe("1.234 Movies 🎥 | 56 Shows 📺");
  });

  it("has a fixed text when there is nothing to show", () => {
    expect(derivePresence(viewModel({ library }), { ...templates, sections: [] })).toBe(NO_PRESENCE_CONTENT);
    expect(derivePresence(viewModel(), templates)).toBe(NO_PRESENCE_CONTENT);
  });
});

describe("PresencePublisher", () => {
  const cadence = { refreshIntervalMs: 300_000, minIntervalMs: 20_000, timeoutMs: 1000 };

  it("rate-limits pushes and re-sends unchanged text after the refresh interval", async () => {
    const sink = { setPresence: vi.fn<PresenceSink["setPresence"]>(async () => {}) };
    const publisher = new PresencePublisher(sink, cadence);

    expect(await publisher.push("a", 0)).toBe("sent");
    expect(await publisher.push("a", 10_000)).toBe("skipped");
    expect(await publisher.push("b", 15_000)).toBe("skipped");
    expect(await publisher.push("b", 20_000)).toBe("sent");
    expect(await publisher.push("b", 100_000)).toBe("skipped");
    expect(await publisher.push("b", 320_000)).toBe("sent");

    expect(sink.setPresence.mock.calls).toEqual([["a"], ["b"], ["b"]]);
  });

  it("counts a failed push against the minimum interval", async () => {
    const sink = { setPresence: vi.fn<PresenceSink["setPresence"]>(async () => {}) };
    sink.setPresence.mockRejectedValueOnce(new Error("Discord RPC is not connected"));
    const publisher = new PresencePublisher(sink, cadence);

    expect(await publisher.push("a", 0)).toBe("failed");
    expect(await publisher.push("a", 5_000)).toBe("skipped");
    expect(await publisher.push("a", 20_000)).toBe("sent");
    expect(sink.setPresence).toHaveBeenCalledTimes(2);
  });
});
