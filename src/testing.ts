import { SourceUnavailableError } from "./errors";
import type {
  QueueItem,
  SourceId,
  SourcePayload,
  SourceSnapshot,
  StreamEntry,
  StreamSession,
  StreamSourceId,
  UptimeStats,
  ViewModel,
} from "./types";

// Builders shared by the test suites

export function streamSession(
  sourceKind: StreamSourceId,
  rawUser: string,
  overrides: Partial<StreamSession> = {}
): StreamSession {
  return {
    sourceKind,
    rawUser,
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
    ...overrides,
  };
}

export function streamEntry(overrides: Partial<StreamEntry> = {}): StreamEntry {
  return {
    ...streamSession("plex", "plexuser123"),
    key: "plex:plexuser123:Inception (2010):0",
    displayUser: "Alice",
    displayTitle: "Inception (2010)",
    emoji: "🎥",
    ...overrides,
  };
}

export function queueItem(rawTitle: string, overrides: Partial<QueueItem> = {}): QueueItem {
  return {
    rawTitle,
    sizeBytes: 1024 * 1024 * 1024,
    progressFraction: 0.5,
    speedBytesPerSec: 0,
    timeLeft: null,
    ...overrides,
  };
}

export const UPTIME_STATS: UptimeStats = {
  day: { percentage: 100, durationUpSeconds: 86_400 },
  week: { percentage: 99.5, durationUpSeconds: 601_776 },
  month: { percentage: 98, durationUpSeconds: 2_540_160 },
  lastDownAt: null,
};

export function okSnapshot(source: SourceId, payload: SourcePayload, capturedAt = 1000): SourceSnapshot {
  return { source, capturedAt, ok: true, payload };
}

export function failedSnapshot(source: SourceId, message: string, capturedAt = 1000): SourceSnapshot {
  return { source, capturedAt, ok: false, error: new SourceUnavailableError(source, message) };
}

export function viewModel(overrides: Partial<ViewModel> = {}): ViewModel {
  return {
    streams: [],
    streamTotal: 0,
    queue: null,
    uptime: null,
    library: [],
    primaryStreamSource: "plex",
    sourceHealth: { plex: { consecutiveFailures: 0, lastOkAt: 1000, failingSince: null, lastError: null } },
    sourceStates: { plex: "ok", jellyfin: "disabled", sabnzbd: "disabled", uptime: "disabled" },
    generatedAt: 1_700_000_000_000,
    ...overrides,
  };
}
