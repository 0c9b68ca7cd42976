import { z } from "zod";
import type { MediaKind, SourceAdapter, StreamSession } from "../types";
import { type FetchLike, parseEntries, requestJson, trimTrailingSlash } from "./http";

export interface JellyfinConnection {
  url: string;
  apiKey: string;
}

const NowPlayingSchema = z.object({
  Type: z.string().optional(),
  Name: z.string().optional(),
  SeriesName: z.string().optional(),
  ParentIndexNumber: z.number().optional(),
  IndexNumber: z.number().optional(),
  ProductionYear: z.number().optional(),
  RunTimeTicks: z.number().optional(),
  Bitrate: z.number().optional(),
  MediaStreams: z
    .array(z.object({ Type: z.string().optional(), Height: z.number().optional() }))
    .optional(),
});

const JellyfinSessionSchema = z.object({
  UserName: z.string().optional(),
  Client: z.string().optional(),
  DeviceName: z.string().optional(),
  NowPlayingItem: NowPlayingSchema.optional(),
  PlayState: z
    .object({
      PositionTicks: z.number().optional(),
      IsPaused: z.boolean().optional(),
    })
    .optional(),
  TranscodingInfo: z.object({ Bitrate: z.number().optional() }).nullish(),
});

export type JellyfinSession = z.infer<typeof JellyfinSessionSchema>;
type NowPlaying = z.infer<typeof NowPlayingSchema>;

// Jellyfin ticks are 100ns units
const TICKS_PER_MS = 10_000;

function mediaKindOf(item: NowPlaying): MediaKind {
  switch (item.Type) {
    case "Episode":
      return "episode";
    case "Audio":
      return "track";
    case "Movie":
      return "movie";
    default:
      return "video";
  }
}

function formatTitle(item: NowPlaying, kind: MediaKind): string {
  if (kind === "episode") {
    const series = (item.SeriesName ?? "Unknown Show").split(":")[0].split("-")[0].trim();
    const season = (item.ParentIndexNumber ?? 0).toString().padStart(2, "0");
    const episode = (item.IndexNumber ?? 0).toString().padStart(2, "0");
    return `${series} - S${season}E${episode}`;
  }
  const name = item.Name ?? "Unknown";
  return item.ProductionYear ? `${name} (${item.ProductionYear})` : name;
}

function videoQuality(item: NowPlaying): string | null {
  const height = item.MediaStreams?.find((stream) => stream.Type === "Video")?.Height;
  if (!height) return null;
  return height >= 2160 ? "4K" : `${height}p`;
}

// Jellyfin reports bitrates in bps; zero means unknown
function bitrateLabel(session: JellyfinSession, item: NowPlaying): string | null {
  const transcodeBitrate = session.TranscodingInfo?.Bitrate ?? 0;
  const bitrate = transcodeBitrate > 0 ? transcodeBitrate : item.Bitrate ?? 0;
  return bitrate > 0 ? `${(bitrate / 1_000_000).toFixed(1)} Mbps` : null;
}

function playerLabel(session: JellyfinSession): string | null {
  if (session.Client && session.Client !== "Unknown") return session.Client;
  return session.DeviceName || null;
}

export function toStreamSession(session: JellyfinSession & { NowPlayingItem: NowPlaying }): StreamSession {
  const item = session.NowPlayingItem;
  const kind = mediaKindOf(item);
  const durationMs = Math.floor((item.RunTimeTicks ?? 0) / TICKS_PER_MS);
  const elapsedMs = Math.floor((session.PlayState?.PositionTicks ?? 0) / TICKS_PER_MS);

  return {
    sourceKind: "jellyfin",
    rawUser: session.UserName ?? "Unknown",
    title: formatTitle(item, kind),
    sectionOrMediaType: item.Type ?? "Video",
    mediaKind: kind,
    isEpisode: kind === "episode",
    progressFraction: durationMs > 0 ? Math.min(1, elapsedMs / durationMs) : 0,
    elapsedMs,
    durationMs,
    paused: session.PlayState?.IsPaused ?? false,
    transcoding: session.TranscodingInfo != null,
    qualityLabel: kind === "track" ? null : videoQuality(item),
    bitrateLabel: bitrateLabel(session, item),
    playerLabel: playerLabel(session),
  };
}

function isPlaying(session: JellyfinSession): session is JellyfinSession & { NowPlayingItem: NowPlaying } {
  return session.NowPlayingItem !== undefined;
}

export function jellyfinSessionsSource(conn: JellyfinConnection, fetchImpl: FetchLike = fetch): SourceAdapter {
  return {
    id: "jellyfin",
    async fetch(signal) {
      const entries = await requestJson(
        "jellyfin",
        `${trimTrailingSlash(conn.url)}/Sessions`,
        { headers: { "X-Emby-Token": conn.apiKey, Accept: "application/json" }, signal },
        z.array(z.unknown()),
        fetchImpl
      );
      const sessions = parseEntries("jellyfin", entries, JellyfinSessionSchema);
      // Idle clients are listed too; only sessions with a NowPlayingItem are streams
      return { kind: "streams", sessions: sessions.filter(isPlaying).map(toStreamSession) };
    },
  };
}
