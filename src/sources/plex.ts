import { z } from "zod";
import type { LibrarySectionCount, MediaKind, SourceAdapter, StreamSession } from "../types";
import { type FetchLike, parseEntries, requestJson, trimTrailingSlash } from "./http";

export interface PlexConnection {
  url: string;
  token: string;
}

const PlexStreamSchema = z.object({
  streamType: z.number().optional(),
  bitDepth: z.number().optional(),
  samplingRate: z.number().optional(),
});

const PlexSessionSchema = z.object({
  type: z.string().optional(),
  title: z.string().optional(),
  grandparentTitle: z.string().optional(),
  parentIndex: z.number().optional(),
  index: z.number().optional(),
  year: z.number().optional(),
  librarySectionTitle: z.string().optional(),
  viewOffset: z.number().optional(),
  duration: z.number().optional(),
  User: z.object({ title: z.string().optional() }).optional(),
  Player: z
    .object({
      product: z.string().optional(),
      title: z.string().optional(),
      state: z.string().optional(),
    })
    .optional(),
  Media: z
    .array(
      z.object({
        videoResolution: z.string().optional(),
        bitrate: z.number().optional(),
        Part: z.array(z.object({ Stream: z.array(PlexStreamSchema).optional() })).optional(),
      })
    )
    .optional(),
  TranscodeSession: z.object({ bitrate: z.number().optional() }).nullish(),
});

export type PlexSession = z.infer<typeof PlexSessionSchema>;

const PlexSessionsResponseSchema = z.object({
  MediaContainer: z.object({
    size: z.number().optional(),
    // Sessions are validated one by one in plexSessionsSource
    Metadata: z.array(z.unknown()).default([]),
  }),
});

const PlexSectionsResponseSchema = z.object({
  MediaContainer: z.object({
    Directory: z
      .array(
        z.object({
          key: z.string(),
          title: z.string(),
          type: z.string().optional(),
        })
      )
      .default([]),
  }),
});

const PlexSizeResponseSchema = z.object({
  MediaContainer: z.object({
    totalSize: z.number().optional(),
    size: z.number().optional(),
  }),
});

// Plex library item type for episodes
const EPISODE_TYPE = 4;

const AUDIO_STREAM = 2;

function plexRequest(conn: PlexConnection, path: string, signal: AbortSignal): [string, RequestInit] {
  return [
    `${trimTrailingSlash(conn.url)}${path}`,
    {
      headers: { Accept: "application/json", "X-Plex-Token": conn.token },
      signal,
    },
  ];
}

function mediaKindOf(session: PlexSession): MediaKind {
  switch (session.type) {
    case "track":
      return "track";
    case "episode":
      return "episode";
    case "movie":
    case undefined:
      return "movie";
    default:
      return session.grandparentTitle ? "episode" : "video";
  }
}

function seriesTitle(grandparentTitle: string): string {
  return grandparentTitle.split(":")[0].split("-")[0].trim();
}

function episodeCode(season: number, episode: number): string {
  return `S${season.toString().padStart(2, "0")}E${episode.toString().padStart(2, "0")}`;
}

function formatSessionTitle(session: PlexSession, kind: MediaKind): string {
  if (kind === "track") {
    return `${session.grandparentTitle ?? "Unknown Artist"} - ${session.title ?? "Unknown Track"}`;
  }
  if (kind === "episode" && session.grandparentTitle) {
    const code =
      session.parentIndex !== undefined && session.index !== undefined
        ? episodeCode(session.parentIndex, session.index)
        : "";
    return `${seriesTitle(session.grandparentTitle)} - ${code}`;
  }
  const year = session.year ? ` (${session.year})` : "";
  return `${session.title ?? "Unknown"}${year}`;
}

function videoQuality(resolution: string | undefined): string | null {
  if (!resolution) return null;
  if (resolution.toLowerCase() === "4k") return "4K";
  return /^\d+$/.test(resolution) ? `${resolution}p` : resolution.toUpperCase();
}

function audioQuality(session: PlexSession): string | null {
  const streams = session.Media?.[0]?.Part?.flatMap((part) => part.Stream ?? []) ?? [];
  const audio = streams.find((stream) => stream.streamType === AUDIO_STREAM);
  if (!audio) return null;

  const parts: string[] = [];
  if (audio.bitDepth) parts.push(`${audio.bitDepth}bit`);
  if (audio.samplingRate) parts.push(`${Math.floor(audio.samplingRate / 1000)}kHz`);
  return parts.length > 0 ? parts.join(" ") : null;
}

// Plex reports bitrates in kbps
function bitrateLabel(kbps: number | undefined): string | null {
  return kbps ? `${(kbps / 1000).toFixed(1)} Mbps` : null;
}

function playerLabel(product: string | undefined): string | null {
  if (!product) return null;
  return product.replace("Plex for ", "").replace("Infuse-Library", "Infuse");
}

export function toStreamSession(session: PlexSession): StreamSession {
  const kind = mediaKindOf(session);
  const durationMs = session.duration ?? 0;
  const elapsedMs = session.viewOffset ?? 0;
  const media = session.Media?.[0];
  const transcoding = session.TranscodeSession != null;

  return {
    sourceKind: "plex",
    rawUser: session.User?.title ?? "Unknown",
    title: formatSessionTitle(session, kind),
    sectionOrMediaType: session.librarySectionTitle ?? session.type ?? "Unknown",
    mediaKind: kind,
    isEpisode: kind === "episode",
    progressFraction: durationMs > 0 ? Math.min(1, elapsedMs / durationMs) : 0,
    elapsedMs,
    durationMs,
    paused: session.Player?.state === "paused",
    transcoding,
    qualityLabel: kind === "track" ? audioQuality(session) : videoQuality(media?.videoResolution),
    bitrateLabel: bitrateLabel(session.TranscodeSession?.bitrate ?? media?.bitrate),
    playerLabel: playerLabel(session.Player?.product),
  };
}

export function plexSessionsSource(conn: PlexConnection, fetchImpl: FetchLike = fetch): SourceAdapter {
  return {
    id: "plex",
    async fetch(signal) {
      const [url, init] = plexRequest(conn, "/status/sessions", signal);
      const body = await requestJson("plex", url, init, PlexSessionsResponseSchema, fetchImpl);
      const sessions = parseEntries("plex", body.MediaContainer.Metadata, PlexSessionSchema);
      return { kind: "streams", sessions: sessions.map(toStreamSession) };
    },
  };
}

/** Reads section names and item counts, used by the library cache on its own cadence. */
export interface LibrarySource {
  listSections(signal: AbortSignal): Promise<LibrarySectionCount[]>;
}

async function sectionSize(
  conn: PlexConnection,
  key: string,
  signal: AbortSignal,
  fetchImpl: FetchLike,
  type?: number
): Promise<number> {
  const query = new URLSearchParams({ "X-Plex-Container-Start": "0", "X-Plex-Container-Size": "0" });
  if (type !== undefined) query.set("type", String(type));
  const [url, init] = plexRequest(conn, `/library/sections/${encodeURIComponent(key)}/all?${query}`, signal);
  const body = await requestJson("plex", url, init, PlexSizeResponseSchema, fetchImpl);
  return body.MediaContainer.totalSize ?? body.MediaContainer.size ?? 0;
}

/**
 * @param wantsEpisodes sections for which an extra episode count is requested
 */
export function plexLibrarySource(
  conn: PlexConnection,
  wantsEpisodes: (sectionTitle: string) => boolean,
  fetchImpl: FetchLike = fetch
): LibrarySource {
  return {
    async listSections(signal) {
      const [url, init] = plexRequest(conn, "/library/sections", signal);
      const body = await requestJson("plex", url, init, PlexSectionsResponseSchema, fetchImpl);

      return Promise.all(
        body.MediaContainer.Directory.map(async (section) => {
          const itemCount = await sectionSize(conn, section.key, signal, fetchImpl);
          const episodeCount =
            section.type === "show" && wantsEpisodes(section.title)
              ? await sectionSize(conn, section.key, signal, fetchImpl, EPISODE_TYPE)
              : 0;
          return { sectionKey: section.title, itemCount, episodeCount };
        })
      );
    },
  };
}
