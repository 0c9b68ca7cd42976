import { createHash } from "node:crypto";
import type { APIEmbed, APIEmbedField } from "discord-api-types/v10";
import {
  discordTimestamp,
  formatBytes,
  formatClock,
  formatCount,
  formatDuration,
  plural,
  progressBar,
} from "./format";
import {
  STREAM_SOURCE_PRIORITY,
  type QueueEntry,
  type SourceId,
  type StreamEntry,
  type UptimeWindow,
  type ViewModel,
} from "./types";

export interface DashboardAppearance {
  name: string;
  iconUrl: string;
  footerIconUrl: string;
}

export interface RenderedDashboard {
  embed: APIEmbed;
  contentHash: string;
}

const COLOR_ONLINE = 0x2ecc71;
const COLOR_OFFLINE = 0xe74c3c;

// Discord embed limits
const MAX_FIELDS = 25;
const FIELD_VALUE_LIMIT = 1024;
const BLANK_FIELD_NAME = "\u200b";

const MAX_VISIBLE_DOWNLOADS = 4;

export const SOURCE_LABELS: Record<SourceId, string> = {
  plex: "Plex",
  jellyfin: "Jellyfin",
  sabnzbd: "SABnzbd",
  uptime: "Uptime monitor",
};

function codeBlock(text: string): string {
  return `\`\`\`${text}\`\`\``;
}

function field(name: string, value: string, inline = false): APIEmbedField {
  return { name, value, inline };
}

function offlineLine(source: SourceId): string {
  return `🔴 *${SOURCE_LABELS[source]} is offline*`;
}

function notRespondingLine(source: SourceId): string {
  return `⏳ *${SOURCE_LABELS[source]} not responding*`;
}

// Packs blocks into as few field values as Discord's length limit allows
function chunkBlocks(blocks: readonly string[]): string[] {
  const chunks: string[] = [];
  let current = "";
  for (const block of blocks) {
    const next = current ? `${current}\n${block}` : block;
    if (current && next.length > FIELD_VALUE_LIMIT) {
      chunks.push(current);
      current = block;
    } else {
      current = next;
    }
  }
  if (current) chunks.push(current);
  return chunks.map((chunk) => chunk.slice(0, FIELD_VALUE_LIMIT));
}

export function formatStreamBlock(entry: StreamEntry): string {
  const progress = entry.paused ? "⏸️" : progressBar(entry.progressFraction);
  const clock = `${formatClock(entry.elapsedMs, entry.durationMs)}/${formatClock(entry.durationMs, entry.durationMs)}`;
  const quality = entry.qualityLabel ?? (entry.mediaKind === "track" ? "Audio" : "Video");
  const bitrate = entry.bitrateLabel ? ` ${entry.bitrateLabel}` : "";
  const player = `${entry.playerLabel ?? "Unknown"}${entry.sourceKind === "jellyfin" ? " (JF)" : ""}`;
  const title = entry.displayTitle || "Untitled";

  return (
    `**\`\`\`${entry.emoji} ${title} | ${entry.displayUser}\n` +
    `└─ ${progress} | ${clock}\n` +
    ` └─ ${entry.transcoding ? "🔄" : "⏯️"} ${quality}${bitrate} | ${player}\`\`\`**`
  );
}

export function formatDownloadBlock(item: QueueEntry): string {
  const details = [progressBar(item.progressFraction), formatBytes(item.sizeBytes)];
  if (item.speedBytesPerSec > 0) details.push(`${formatBytes(item.speedBytesPerSec)}/s`);
  if (item.timeLeft) details.push(item.timeLeft);
  return codeBlock(`📥 ${item.displayTitle || "Untitled"}\n└─ ${details.join(" | ")}`);
}

function formatUptimeWindow(window: UptimeWindow): string {
  return codeBlock(`${window.percentage.toFixed(1)}% (${formatDuration(window.durationUpSeconds)})`);
}

function libraryFields(view: ViewModel): APIEmbedField[] {
  return view.library.flatMap((section) => {
    const fields = [field(`${section.displayName} ${section.emoji}`.trim(), codeBlock(formatCount(section.itemCount)), true)];
    if (section.showEpisodes) {
      fields.push(field(`${section.displayName} Episodes 📺`, codeBlock(formatCount(section.episodeCount)), true));
    }
    return fields;
  });
}

function streamFields(view: ViewModel): APIEmbedField[] {
  // Failing sources are listed, never folded into the idle text
  const offline = STREAM_SOURCE_PRIORITY.flatMap((source) => {
    switch (view.sourceStates[source]) {
      case "down":
        return [offlineLine(source)];
      case "degraded":
        return [notRespondingLine(source)];
      default:
        return [];
    }
  });

  if (view.streamTotal === 0) {
    const value = offline.length > 0 ? offline.join("\n") : "💤 *No active streams currently*";
    return [field("Current Streams:", value)];
  }

  const total = view.streamTotal;
  const overflow = total > view.streams.length ? ` (showing ${view.streams.length} of ${total})` : "";
  const header = `${total} current Stream${plural(total)}:${overflow}`;
  return chunkBlocks([...view.streams.map(formatStreamBlock), ...offline]).map((value, index) =>
    field(index === 0 ? header : BLANK_FIELD_NAME, value)
  );
}

function downloadFields(view: ViewModel): APIEmbedField[] {
  switch (view.sourceStates.sabnzbd) {
    case "disabled":
      return [];
    case "down":
      return [field("Current Downloads:", offlineLine("sabnzbd"))];
    default:
      break;
  }
  // Failing but still under the threshold: leave the section out for now
  if (!view.queue) return [];

  const { items } = view.queue;
  if (items.length === 0) {
    return [field("Current Downloads:", "💤 *No active downloads currently*")];
  }

  const shown = items.slice(0, MAX_VISIBLE_DOWNLOADS);
  const totalSize = shown.reduce((sum, item) => sum + item.sizeBytes, 0);
  const { diskFreeBytes, diskTotalBytes } = view.queue;
  return [
    ...chunkBlocks(shown.map(formatDownloadBlock)).map((value, index) =>
      field(index === 0 ? `${items.length} current Download${plural(items.length)}:` : BLANK_FIELD_NAME, value)
    ),
    field("Downloads 📥", codeBlock(formatBytes(totalSize)), true),
    field("Free Space 💾", codeBlock(diskFreeBytes !== null ? formatBytes(diskFreeBytes) : "Unknown"), true),
    field("Total Space 🗄️", codeBlock(diskTotalBytes !== null ? formatBytes(diskTotalBytes) : "Unknown"), true),
  ];
}

function uptimeFields(view: ViewModel): APIEmbedField[] {
  const { uptime } = view;
  if (!uptime) return [];

  const fields = [
    field("Uptime (24h)", formatUptimeWindow(uptime.day), true),
    field("Uptime (7 days)", formatUptimeWindow(uptime.week), true),
    field("Uptime (30 days)", formatUptimeWindow(uptime.month), true),
  ];
  if (uptime.lastDownAt !== null) {
    fields.push(field("Last Downtime", `${discordTimestamp(uptime.lastDownAt, "f")} (${discordTimestamp(uptime.lastDownAt, "R")})`));
  }
  return fields;
}

function offlineSinceField(view: ViewModel, source: SourceId): APIEmbedField {
  const since = view.sourceHealth[source]?.failingSince;
  const value = since != null ? `${discordTimestamp(since, "f")}\n${discordTimestamp(since, "R")}` : "Unknown";
  return field("Offline since:", value);
}

/**
 * Hash of everything Discord would display except `timestamp`, which
 * carries `generatedAt` and changes every tick.
 */
export function hashEmbed(embed: APIEmbed): string {
  return createHash("sha256")
    .update(JSON.stringify({ ...embed, timestamp: undefined }))
    .digest("hex");
}

export function renderDashboard(view: ViewModel, appearance: DashboardAppearance): RenderedDashboard {
  const primary = view.primaryStreamSource;
  const offlineSource = primary !== null && view.sourceStates[primary] === "down" ? primary : null;
  const offline = offlineSource !== null;

  const fields = offlineSource
    ? [offlineSinceField(view, offlineSource), ...streamFields(view), ...downloadFields(view), ...uptimeFields(view)]
    : [...libraryFields(view), ...streamFields(view), ...downloadFields(view), ...uptimeFields(view)];

  const embed: APIEmbed = {
    title: offline ? "Server is currently Offline! :warning:" : "Server is currently Online! :white_check_mark:",
    color: offline ? COLOR_OFFLINE : COLOR_ONLINE,
    author: { name: appearance.name, ...(appearance.iconUrl ? { icon_url: appearance.iconUrl } : {}) },
    ...(appearance.iconUrl ? { thumbnail: { url: appearance.iconUrl } } : {}),
    fields: fields.slice(0, MAX_FIELDS),
    footer: { text: "Last updated", ...(appearance.footerIconUrl ? { icon_url: appearance.footerIconUrl } : {}) },
    timestamp: new Date(view.generatedAt).toISOString(),
  };

  return { embed, contentHash: hashEmbed(embed) };
}
