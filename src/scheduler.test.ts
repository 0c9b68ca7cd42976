import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createNameResolver, type NameResolver } from "./names";
import { PresencePublisher, type PresenceSink } from "./presence";
import { EMPTY_ARTIFACT_STATE, type ArtifactSink } from "./publish";
import { runTick, Scheduler, type TickDependencies, type TickState } from "./scheduler";
import { MemoryArtifactStore } from "./state";
import { queueItem, streamSession } from "./testing";
import { createTitleNormalizer } from "./titles";
import type { SourceAdapter } from "./types";

const INITIAL: TickState = { health: {}, artifact: EMPTY_ARTIFACT_STATE };

function fakeSink() {
  let nextId = 1;
  return {
    create: vi.fn<ArtifactSink["create"]>(async () => `msg-${nextId++}`),
    update: vi.fn<ArtifactSink["update"]>(async () => "ok"),
  };
}

function plexSource(fetch: SourceAdapter["fetch"]): SourceAdapter {
  return { id: "plex", fetch: vi.fn(fetch) };
}

function deps(overrides: Partial<TickDependencies> = {}): TickDependencies {
  return {
    sources: [plexSource(async () => ({ kind: "streams", sessions: [streamSession("plex", "plexuser123")] }))],
    library: null,
    resolver: createNameResolver({ plexuser123: "Alice" }),
    normalizeTitle: createTitleNormalizer([]),
    sections: { showAll: false, sections: new Map() },
    appearance: { name: "Plex Dashboard", iconUrl: "", footerIconUrl: "" },
    presenceTemplates: { offlineText: "🔴 Server Offline!", streamText: "{count} active Stream{s} 🟢", sections: [] },
    sink: fakeSink(),
    store: new MemoryArtifactStore(),
    presence: null,
    sourceTimeoutMs: 10_000,
    failureThreshold: 0,
    clock: () => Date.now(),
    ...overrides,
  };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});

describe("runTick", () => {
  it("publishes once and then skips identical content", async () => {
    const sink = fakeSink();
    const presenceSink = { setPresence: vi.fn<PresenceSink["setPresence"]>(async () => {}) };
    const tick = deps({
      sink,
      presence: new PresencePublisher(presenceSink, { refreshIntervalMs: 300_000, minIntervalMs: 0, timeoutMs: 1000 }),
    });

    const first = await runTick(tick, INITIAL);
    expect(first.outcome).toBe("created");
    expect(first.state.artifact.artifactId).toBe("msg-1");
    expect(first.state.health.plex?.consecutiveFailures).toBe(0);
    expect(presenceSink.setPresence).toHaveBeenCalledWith("1 active Stream 🟢");

    const second = await runTick(tick, first.state);
    expect(second.outcome).toBe("unchanged");
    expect(sink.create).toHaveBeenCalledTimes(1);
    expect(sink.update).not.toHaveBeenCalled();
  });

  it("is bounded by the per-source timeout when a source hangs", async () => {
    vi.useFakeTimers();
    const hanging = plexSource(() => new Promise(() => {}));
    const queue: SourceAdapter = {
      id: "sabnzbd",
      fetch: async () => ({
        kind: "queue",
        queue: { items: [queueItem("First"), queueItem("Second")], diskFreeBytes: null, diskTotalBytes: null },
      }),
    };

    const pending = runTick(deps({ sources: [hanging, queue] }), INITIAL);
    await vi.advanceTimersByTimeAsync(10_000);
    const report = await pending;

    expect(report.outcome).toBe("created");
    expect(report.state.health.plex?.consecutiveFailures).toBe(1);
    expect(report.view?.sourceStates.plex).toBe("down");
    expect(report.view?.queue?.items).toHaveLength(2);
  });

  it("stops after fetching when the tick is aborted", async () => {
    const sink = fakeSink();
    const controller = new AbortController();
    controller.abort();

    const report = await runTick(deps({ sink }), INITIAL, controller.signal);

    expect(report).toEqual({ state: INITIAL, view: null, outcome: "aborted" });
    expect(sink.create).not.toHaveBeenCalled();
  });
});

describe("Scheduler", () => {
  it("never overlaps ticks when one runs longer than the interval", async () => {
    vi.useFakeTimers();
    let active = 0;
    let maxActive = 0;
    const slowWrite = async () => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, 90_000));
      active -= 1;
    };
    const sink = {
      create: vi.fn<ArtifactSink["create"]>(async () => {
        await slowWrite();
        return "msg-1";
      }),
      update: vi.fn<ArtifactSink["update"]>(async () => {
        await slowWrite();
        return "ok";
      }),
    };
    let counter = 0;
    const source = plexSource(async () => {
      counter += 1;
      return { kind: "streams", sessions: [streamSession("plex", "plexuser123", { title: `Episode ${counter}` })] };
    });

    const scheduler = new Scheduler(deps({ sources: [source], sink }), 60_000, INITIAL);
    scheduler.start();
    await vi.advanceTimersByTimeAsync(200_000);

    // Ticks start at 0s, 90s and 180s: each waits for the previous write
    expect(source.fetch).toHaveBeenCalledTimes(3);
    expect(maxActive).toBe(1);

    const stopped = scheduler.stop();
    await vi.advanceTimersByTimeAsync(90_000);
    await stopped;

    await vi.advanceTimersByTimeAsync(200_000);
    expect(source.fetch).toHaveBeenCalledTimes(3);
    expect(scheduler.currentState.artifact.artifactId).toBe("msg-1");
  });

  it("runs on the fixed interval when ticks are fast", async () => {
    vi.useFakeTimers();
    const source = plexSource(async () => ({ kind: "streams", sessions: [] }));
    const scheduler = new Scheduler(deps({ sources: [source] }), 60_000, INITIAL);

    scheduler.start();
    await vi.advanceTimersByTimeAsync(1);
    expect(source.fetch).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(source.fetch).toHaveBeenCalledTimes(2);

    await scheduler.stop();
  });

  it("keeps ticking after a tick throws", async () => {
    vi.useFakeTimers();
    const resolver: NameResolver = {
      resolve: () => {
        throw new Error("boom");
      },
    };
    const source = plexSource(async () => ({ kind: "streams", sessions: [streamSession("plex", "plexuser123")] }));
    const scheduler = new Scheduler(deps({ sources: [source], resolver }), 60_000, INITIAL);

    scheduler.start();
    await vi.advanceTimersByTimeAsync(60_001);

    expect(console.error).toHaveBeenCalledWith("❌ Dashboard tick failed:", "boom");
    expect(source.fetch).toHaveBeenCalledTimes(2);

    await scheduler.stop();
  });
});
