const BAR_CELLS = 10;

const MB = 1024 * 1024;
const GB = 1024 * MB;

export function plural(count: number, suffix = "s"): string {
  return count === 1 ? "" : suffix;
}

// 1234567 -> "1.234.567"
export function formatCount(value: number): string {
  return Math.round(value)
    .toString()
    .replace(/\B(?=(\d{3})+(?!\d))/g, ".");
}

export function clampFraction(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function progressBar(fraction: number): string {
  const percent = clampFraction(fraction) * 100;
  const filled = Math.min(BAR_CELLS, Math.floor(percent / 10));
  return `[${"▓".repeat(filled)}${"░".repeat(BAR_CELLS - filled)}] ${percent.toFixed(1)}%`;
}

/**
 * Playback clock. Content shorter than an hour shows `mm:ss`,
 * anything longer `h:mm:ss` (for both the position and the total).
 */
export function formatClock(ms: number, totalMs: number): string {
  const seconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;
  const mmss = `${minutes.toString().padStart(2, "0")}:${secs.toString().padStart(2, "0")}`;
  return totalMs / 1000 < 3600 ? mmss : `${hours}:${mmss}`;
}

export function formatBytes(bytes: number): string {
  return bytes >= GB ? `${(bytes / GB).toFixed(2)} GB` : `${(bytes / MB).toFixed(2)} MB`;
}

// 604000 -> "6d 23h 46m"
export function formatDuration(totalSeconds: number): string {
  const minutesTotal = Math.max(0, Math.floor(totalSeconds / 60));
  const days = Math.floor(minutesTotal / 1440);
  const hours = Math.floor((minutesTotal % 1440) / 60);
  const minutes = minutesTotal % 60;
  if (days > 0) return `${days}d ${hours}h ${minutes}m`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  return `${minutes}m`;
}

// Discord renders these client-side, so the text itself never changes
export function discordTimestamp(ms: number, style: "f" | "R"): string {
  return `<t:${Math.floor(ms / 1000)}:${style}>`;
}
