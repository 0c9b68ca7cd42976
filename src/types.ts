import type { SourceUnavailableError } from "./errors";

// Every integration the dashboard polls
export type SourceId = "plex" | "jellyfin" | "sabnzbd" | "uptime";

export type StreamSourceId = "plex" | "jellyfin";

// Declared priority: earlier sources win when the stream list overflows
export const STREAM_SOURCE_PRIORITY: readonly StreamSourceId[] = ["plex", "jellyfin"];

export const MAX_VISIBLE_STREAMS = 8;

export type MediaKind = "movie" | "episode" | "track" | "video";

export interface StreamSession {
  sourceKind: StreamSourceId;
  rawUser: string;
  title: string;
  sectionOrMediaType: string;
  mediaKind: MediaKind;
  isEpisode: boolean;
  progressFraction: number;
  elapsedMs: number;
  durationMs: number;
  paused: boolean;
  transcoding: boolean;
  qualityLabel: string | null;
  bitrateLabel: string | null;
  playerLabel: string | null;
}

export interface QueueItem {
  rawTitle: string;
  sizeBytes: number;
  progressFraction: number;
  speedBytesPerSec: number;
  timeLeft: string | null;
}

export interface QueueList {
  items: QueueItem[];
  diskFreeBytes: number | null;
  diskTotalBytes: number | null;
}

export interface UptimeWindow {
  percentage: number;
  durationUpSeconds: number;
}

export interface UptimeStats {
  day: UptimeWindow;
  week: UptimeWindow;
  month: UptimeWindow;
  lastDownAt: number | null;
}

export type SourcePayload =
  | { kind: "streams"; sessions: StreamSession[] }
  | { kind: "queue"; queue: QueueList }
  | { kind: "uptime"; stats: UptimeStats };

export type SourceSnapshot =
  | { source: SourceId; capturedAt: number; ok: true; payload: SourcePayload }
  | { source: SourceId; capturedAt: number; ok: false; error: SourceUnavailableError };

/**
 * A single integration that can produce one snapshot per tick.
 * `fetch` may reject; callers turn rejections into failed snapshots.
 */
export interface SourceAdapter {
  readonly id: SourceId;
  fetch(signal: AbortSignal): Promise<SourcePayload>;
}

export interface LibrarySectionConfig {
  displayName: string;
  emoji: string;
  showEpisodes: boolean;
}

export interface LibrarySectionCount {
  sectionKey: string;
  itemCount: number;
  episodeCount: number;
}

export interface LibraryCacheEntry extends LibrarySectionCount {
  lastRefreshedAt: number;
}

export interface SourceHealth {
  consecutiveFailures: number;
  lastOkAt: number | null;
  failingSince: number | null;
  lastError: string | null;
}

export type HealthMap = Partial<Record<SourceId, SourceHealth>>;

// degraded: failing, but not yet past the failure threshold
export type SourceState = "ok" | "degraded" | "down" | "disabled";

export interface StreamEntry extends StreamSession {
  key: string;
  displayUser: string;
  displayTitle: string;
  emoji: string;
}

export interface QueueEntry extends QueueItem {
  displayTitle: string;
}

export interface QueueView {
  items: readonly QueueEntry[];
  diskFreeBytes: number | null;
  diskTotalBytes: number | null;
}

export interface LibrarySectionView {
  sectionKey: string;
  displayName: string;
  emoji: string;
  showEpisodes: boolean;
  itemCount: number;
  episodeCount: number;
}

export interface ViewModel {
  readonly streams: readonly StreamEntry[];
  readonly streamTotal: number;
  readonly queue: QueueView | null;
  readonly uptime: UptimeStats | null;
  readonly library: readonly LibrarySectionView[];
  readonly primaryStreamSource: StreamSourceId | null;
  readonly sourceHealth: Readonly<HealthMap>;
  readonly sourceStates: Readonly<Record<SourceId, SourceState>>;
  readonly generatedAt: number;
}

export interface PublishedArtifactState {
  artifactId: string | null;
  lastContentHash: string | null;
}
