import { describeError } from "./errors";
import type { LibrarySource } from "./sources/plex";
import { withTimeout } from "./timeout";
import type { LibraryCacheEntry } from "./types";

export interface LibraryCacheOptions {
  updateIntervalMs: number;
  timeoutMs: number;
}

/**
 * Library section counts change slowly, so they are refreshed on their own
 * interval instead of every tick. A failed refresh keeps serving whatever
 * was fetched last (possibly nothing).
 */
export class LibraryCache {
  private entries: ReadonlyMap<string, LibraryCacheEntry> = new Map();
  private lastRefreshedAt: number | null = null;

  constructor(
    private readonly source: LibrarySource,
    private readonly options: LibraryCacheOptions
  ) {}

  isStale(now: number): boolean {
    return this.lastRefreshedAt === null || now - this.lastRefreshedAt >= this.options.updateIntervalMs;
  }

  async getSectionCounts(now: number, signal?: AbortSignal): Promise<ReadonlyMap<string, LibraryCacheEntry>> {
    if (!this.isStale(now)) {
      return this.entries;
    }

    try {
      const sections = await withTimeout((inner) => this.source.listSections(inner), this.options.timeoutMs, signal);
      this.entries = new Map(
        sections.map((section) => [section.sectionKey, { ...section, lastRefreshedAt: now }])
      );
      this.lastRefreshedAt = now;
      console.log(
        `📚 Library stats refreshed: ${sections.length} sections (interval: ${this.options.updateIntervalMs / 1000}s)`
      );
    } catch (error) {
      console.error("⚠️  Failed to refresh library stats, serving cached values:", describeError(error));
    }
    return this.entries;
  }
}
