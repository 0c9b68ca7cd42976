import type { NameResolver } from "./names";
import type { TitleNormalizer } from "./titles";
import {
  MAX_VISIBLE_STREAMS,
  STREAM_SOURCE_PRIORITY,
  type HealthMap,
  type LibraryCacheEntry,
  type LibrarySectionConfig,
  type LibrarySectionView,
  type MediaKind,
  type QueueView,
  type SourceHealth,
  type SourceId,
  type SourceSnapshot,
  type SourceState,
  type StreamEntry,
  type StreamSession,
  type StreamSourceId,
  type UptimeStats,
  type ViewModel,
} from "./types";

const DEFAULT_SECTION_EMOJI = "🎬";

const KIND_EMOJI: Record<MediaKind, string> = {
  track: "🎵",
  movie: "🎥",
  video: "🎥",
  episode: "📺",
};

export interface SectionSettings {
  showAll: boolean;
  // Insertion order is display order
  sections: ReadonlyMap<string, LibrarySectionConfig>;
}

export interface AggregateInput {
  snapshots: readonly SourceSnapshot[];
  enabledSources: readonly SourceId[];
  library: ReadonlyMap<string, LibraryCacheEntry>;
  resolver: NameResolver;
  normalizeTitle: TitleNormalizer;
  sections: SectionSettings;
  previousHealth: Readonly<HealthMap>;
  // A source is "down" once its consecutive failures exceed this
  failureThreshold: number;
  now: number;
}

function nextHealth(previous: SourceHealth | undefined, snapshot: SourceSnapshot | undefined, now: number): SourceHealth {
  if (snapshot?.ok) {
    return { consecutiveFailures: 0, lastOkAt: snapshot.capturedAt, failingSince: null, lastError: null };
  }
  return {
    consecutiveFailures: (previous?.consecutiveFailures ?? 0) + 1,
    lastOkAt: previous?.lastOkAt ?? null,
    failingSince: previous?.failingSince ?? snapshot?.capturedAt ?? now,
    lastError: snapshot ? snapshot.error.message : "no snapshot captured",
  };
}

function stateOf(health: SourceHealth | undefined, failureThreshold: number): SourceState {
  if (!health) return "disabled";
  if (health.consecutiveFailures === 0) return "ok";
  return health.consecutiveFailures > failureThreshold ? "down" : "degraded";
}

function assertNever(value: never): never {
  throw new Error(`Unhandled snapshot payload: ${JSON.stringify(value)}`);
}

function toStreamEntry(
  session: StreamSession,
  index: number,
  input: Pick<AggregateInput, "resolver" | "normalizeTitle" | "sections">
): StreamEntry {
  const sectionEmoji = input.sections.sections.get(session.sectionOrMediaType)?.emoji;
  return {
    ...session,
    key: `${session.sourceKind}:${session.rawUser}:${session.title}:${index}`,
    displayUser: input.resolver.resolve(session.rawUser),
    displayTitle: input.normalizeTitle(session.title),
    emoji: sectionEmoji || KIND_EMOJI[session.mediaKind],
  };
}

function buildLibraryView(
  library: ReadonlyMap<string, LibraryCacheEntry>,
  settings: SectionSettings
): LibrarySectionView[] {
  const views: LibrarySectionView[] = [];
  for (const [title, config] of settings.sections) {
    const entry = library.get(title);
    if (!entry) continue;
    views.push({
      sectionKey: title,
      displayName: config.displayName,
      emoji: config.emoji,
      showEpisodes: config.showEpisodes,
      itemCount: entry.itemCount,
      episodeCount: config.showEpisodes ? entry.episodeCount : 0,
    });
  }
  if (settings.showAll) {
    for (const entry of library.values()) {
      if (settings.sections.has(entry.sectionKey)) continue;
      views.push({
        sectionKey: entry.sectionKey,
        displayName: entry.sectionKey,
        emoji: DEFAULT_SECTION_EMOJI,
        showEpisodes: false,
        itemCount: entry.itemCount,
        episodeCount: 0,
      });
    }
  }
  return views;
}

/**
 * Merges one tick's snapshots into a fresh view model.
 *
 * Streams are ordered by declared source priority, then by the order the
 * source listed them, and capped at {@link MAX_VISIBLE_STREAMS}. Failed
 * sources only affect their own section; a disabled source never shows up
 * in `sourceHealth`.
 */
export function aggregate(input: AggregateInput): ViewModel {
  const enabled = new Set(input.enabledSources);
  const bySource = new Map<SourceId, SourceSnapshot>();
  for (const snapshot of input.snapshots) {
    if (enabled.has(snapshot.source)) bySource.set(snapshot.source, snapshot);
  }

  const sourceHealth: HealthMap = {};
  for (const source of input.enabledSources) {
    sourceHealth[source] = nextHealth(input.previousHealth[source], bySource.get(source), input.now);
  }

  const threshold = input.failureThreshold;
  const sourceStates: Record<SourceId, SourceState> = {
    plex: stateOf(sourceHealth.plex, threshold),
    jellyfin: stateOf(sourceHealth.jellyfin, threshold),
    sabnzbd: stateOf(sourceHealth.sabnzbd, threshold),
    uptime: stateOf(sourceHealth.uptime, threshold),
  };

  const sessionsBySource = new Map<StreamSourceId, StreamSession[]>();
  let queue: QueueView | null = null;
  let uptime: UptimeStats | null = null;

  for (const snapshot of bySource.values()) {
    if (!snapshot.ok) continue;
    const { payload } = snapshot;
    switch (payload.kind) {
      case "streams":
        for (const session of payload.sessions) {
          const list = sessionsBySource.get(session.sourceKind) ?? [];
          list.push(session);
          sessionsBySource.set(session.sourceKind, list);
        }
        break;
      case "queue":
        queue = {
          items: payload.queue.items.map((item) => ({ ...item, displayTitle: input.normalizeTitle(item.rawTitle) })),
          diskFreeBytes: payload.queue.diskFreeBytes,
          diskTotalBytes: payload.queue.diskTotalBytes,
        };
        break;
      case "uptime":
        uptime = payload.stats;
        break;
      default:
        assertNever(payload);
    }
  }

  const merged = STREAM_SOURCE_PRIORITY.flatMap((source) => sessionsBySource.get(source) ?? []);

  return {
    streams: merged.slice(0, MAX_VISIBLE_STREAMS).map((session, index) => toStreamEntry(session, index, input)),
    streamTotal: merged.length,
    queue,
    uptime,
    library: buildLibraryView(input.library, input.sections),
    primaryStreamSource: STREAM_SOURCE_PRIORITY.find((source) => enabled.has(source)) ?? null,
    sourceHealth,
    sourceStates,
    generatedAt: input.now,
  };
}
