import { describeError } from "./errors";
import { formatCount, plural } from "./format";
import { withTimeout } from "./timeout";
import type { ViewModel } from "./types";

export interface PresenceSection {
  sectionTitle: string;
  displayName: string;
  emoji: string;
}

export interface PresenceTemplates {
  offlineText: string;
  streamText: string;
  sections: readonly PresenceSection[];
}

export interface PresenceSink {
  setPresence(text: string): Promise<void>;
}

export const NO_PRESENCE_CONTENT = "No streams or sections configured";

/**
 * `{count}` and `{s}` in the stream template become the merged stream
 * count and its plural suffix.
 */
export function derivePresence(view: ViewModel, templates: PresenceTemplates): string {
  const primary = view.primaryStreamSource;
  if (primary !== null && view.sourceStates[primary] === "down") {
    return templates.offlineText;
  }

  if (view.streamTotal > 0) {
    return templates.streamText
      .replaceAll("{count}", String(view.streamTotal))
      .replaceAll("{s}", plural(view.streamTotal));
  }

  const counts = new Map(view.library.map((section) => [section.sectionKey, section.itemCount]));
  const parts = templates.sections.flatMap((section) => {
    const count = counts.get(section.sectionTitle);
    return count === undefined ? [] : [`${formatCount(count)} ${section.displayName} ${section.emoji}`.trim()];
  });
  return parts.length > 0 ? parts.join(" | ") : NO_PRESENCE_CONTENT;
}

export interface PresenceCadence {
  // Re-push an unchanged text after this long
  refreshIntervalMs: number;
  // Never push more often than this, failed attempts included
  minIntervalMs: number;
  timeoutMs: number;
}

export type PresencePushResult = "sent" | "skipped" | "failed";

/**
 * Rate-limited presence pushes, kept apart from the dashboard write:
 * a failure here is logged and waits out `minIntervalMs` like any
 * other attempt.
 */
export class PresencePublisher {
  private lastText: string | null = null;
  private lastSentAt: number | null = null;
  private lastAttemptAt: number | null = null;

  constructor(
    private readonly sink: PresenceSink,
    private readonly cadence: PresenceCadence
  ) {}

  private isDue(text: string, now: number): boolean {
    if (this.lastAttemptAt !== null && now - this.lastAttemptAt < this.cadence.minIntervalMs) {
      return false;
    }
    if (text !== this.lastText || this.lastSentAt === null) {
      return true;
    }
    return now - this.lastSentAt >= this.cadence.refreshIntervalMs;
  }

  async push(text: string, now: number): Promise<PresencePushResult> {
    if (!this.isDue(text, now)) {
      return "skipped";
    }

    this.lastAttemptAt = now;
    try {
      await withTimeout(() => this.sink.setPresence(text), this.cadence.timeoutMs);
      this.lastText = text;
      this.lastSentAt = now;
      console.log(`📣 Status updated: ${text}`);
      return "sent";
    } catch (error) {
      console.error("⚠️  Failed to update status:", describeError(error));
      return "failed";
    }
  }
}
