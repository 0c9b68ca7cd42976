import { afterEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { SourceUnavailableError } from "../errors";
import type { SourceAdapter } from "../types";
import { captureSnapshot, requestJson, trimTrailingSlash, type FetchLike } from "./http";

const schema = z.object({ a: z.number() });

function respond(body: string, init?: ResponseInit): FetchLike {
  return async () => new Response(body, init);
}

afterEach(() => {
  vi.useRealTimers();
});

describe("trimTrailingSlash", () => {
  it("drops trailing slashes only", () => {
    expect(trimTrailingSlash("http://plex.local:32400//")).toBe("http://plex.local:32400");
    expect(trimTrailingSlash("http://plex.local:32400")).toBe("http://plex.local:32400");
  });
});

describe("requestJson", () => {
  it("returns the validated body", async () => {
    await expect(requestJson("plex", "http://x", {}, schema, respond('{"a":1}'))).resolves.toEqual({ a: 1 });
  });

  it("reports HTTP errors", async () => {
    const request = requestJson("plex", "http://x", {}, schema, respond("oops", { status: 500, statusText: "Internal Server Error" }));
    await expect(request).rejects.toThrow("HTTP 500 Internal Server Error");
  });

  it("reports bodies that are not JSON", async () => {
    await expect(requestJson("sabnzbd", "http://x", {}, schema, respond("<html>"))).rejects.toThrow(
      "response is not valid JSON"
    );
  });

  it("reports the first schema issue", async () => {
    const request = requestJson("jellyfin", "http://x", {}, schema, respond('{"a":"x"}'));
    await expect(request).rejects.toThrow("unexpected response at a: Expected number, received string");
  });

  it("tags network failures with the source", async () => {
    const failing: FetchLike = async () => {
      throw new TypeError("fetch failed");
    };
    const error = await requestJson("uptime", "http://x", {}, schema, failing).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({ source: "uptime", message: "request failed: fetch failed" });
  });
});

describe("captureSnapshot", () => {
  it("wraps the payload with the capture time", async () => {
    const adapter: SourceAdapter = { id: "plex", fetch: async () => ({ kind: "streams", sessions: [] }) };
    const snapshot = await captureSnapshot(adapter, 1000, () => 5000);
    expect(snapshot).toEqual({ source: "plex", capturedAt: 5000, ok: true, payload: { kind: "streams", sessions: [] } });
  });

  it("turns a hanging fetch into a failed snapshot after the timeout", async () => {
    vi.useFakeTimers();
    const adapter: SourceAdapter = { id: "plex", fetch: () => new Promise(() => {}) };
    const pending = captureSnapshot(adapter, 10_000, () => 42);

    await vi.advanceTimersByTimeAsync(10_000);
    const snapshot = await pending;

    expect(snapshot.ok).toBe(false);
    if (!snapshot.ok) {
      expect(snapshot.error).toBeInstanceOf(SourceUnavailableError);
      expect(snapshot.error.source).toBe("plex");
      expect(snapshot.error.message).toBe("timed out after 10000ms");
      expect(snapshot.capturedAt).toBe(42);
    }
  });
});
