import { aggregate, type SectionSettings } from "./aggregate";
import { describeError } from "./errors";
import type { LibraryCache } from "./library";
import type { NameResolver } from "./names";
import { derivePresence, type PresencePublisher, type PresenceTemplates } from "./presence";
import { publish, type ArtifactSink, type PublishOutcome } from "./publish";
import { renderDashboard, type DashboardAppearance } from "./render";
import { captureSnapshot } from "./sources/http";
import type { ArtifactStore } from "./state";
import type { TitleNormalizer } from "./titles";
import type {
  HealthMap,
  LibraryCacheEntry,
  PublishedArtifactState,
  SourceAdapter,
  ViewModel,
} from "./types";

export interface TickDependencies {
  sources: readonly SourceAdapter[];
  library: LibraryCache | null;
  resolver: NameResolver;
  normalizeTitle: TitleNormalizer;
  sections: SectionSettings;
  appearance: DashboardAppearance;
  presenceTemplates: PresenceTemplates;
  sink: ArtifactSink;
  store: ArtifactStore;
  presence: PresencePublisher | null;
  sourceTimeoutMs: number;
  failureThreshold: number;
  clock: () => number;
  debug?: boolean;
}

/** Everything carried from one tick to the next. */
export interface TickState {
  health: Readonly<HealthMap>;
  artifact: PublishedArtifactState;
}

export interface TickReport {
  state: TickState;
  view: ViewModel | null;
  outcome: PublishOutcome | "aborted";
}

const NO_LIBRARY: ReadonlyMap<string, LibraryCacheEntry> = new Map();

/**
 * One iteration: fetch every source concurrently, then aggregate, render,
 * publish and push presence in sequence. Bounded by the per-source
 * timeout, not by the number of sources.
 */
export async function runTick(deps: TickDependencies, state: TickState, signal?: AbortSignal): Promise<TickReport> {
  const startedAt = deps.clock();

  const [snapshots, library] = await Promise.all([
    Promise.all(deps.sources.map((source) => captureSnapshot(source, deps.sourceTimeoutMs, deps.clock, signal))),
    deps.library ? deps.library.getSectionCounts(startedAt, signal) : Promise.resolve(NO_LIBRARY),
  ]);

  if (signal?.aborted) {
    return { state, view: null, outcome: "aborted" };
  }

  for (const snapshot of snapshots) {
    if (!snapshot.ok) {
      console.warn(`⚠️  ${snapshot.source} unavailable: ${snapshot.error.message}`);
    }
  }

  const view = aggregate({
    snapshots,
    enabledSources: deps.sources.map((source) => source.id),
    library,
    resolver: deps.resolver,
    normalizeTitle: deps.normalizeTitle,
    sections: deps.sections,
    previousHealth: state.health,
    failureThreshold: deps.failureThreshold,
    now: deps.clock(),
  });

  const rendered = renderDashboard(view, deps.appearance);
  const published = await publish(rendered, state.artifact, deps.sink, deps.store);

  if (deps.presence) {
    await deps.presence.push(derivePresence(view, deps.presenceTemplates), deps.clock());
  }

  if (deps.debug) {
    console.log(
      `🔍 Tick finished in ${deps.clock() - startedAt}ms: ${view.streamTotal} streams, ` +
        `${view.queue?.items.length ?? 0} downloads, publish ${published.outcome}`
    );
  }

  return { state: { health: view.sourceHealth, artifact: published.state }, view, outcome: published.outcome };
}

/**
 * Drives {@link runTick} on a fixed interval. Ticks never overlap: the next
 * one is scheduled only after the current one finished, so a slow tick
 * delays its successor instead of racing it.
 */
export class Scheduler {
  private state: TickState;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private readonly shutdown = new AbortController();
  private started = false;
  private stopped = false;

  constructor(
    private readonly deps: TickDependencies,
    private readonly intervalMs: number,
    initialState: TickState
  ) {
    this.state = initialState;
  }

  get currentState(): TickState {
    return this.state;
  }

  start(): void {
    if (this.started || this.stopped) return;
    this.started = true;
    this.schedule(0);
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.runOnce();
    }, delayMs);
  }

  private async runOnce(): Promise<void> {
    const startedAt = this.deps.clock();
    try {
      const report = await runTick(this.deps, this.state, this.shutdown.signal);
      this.state = report.state;
    } catch (error) {
      console.error("❌ Dashboard tick failed:", describeError(error));
    } finally {
      this.inFlight = null;
      if (!this.stopped) {
        const elapsed = this.deps.clock() - startedAt;
        this.schedule(Math.max(0, this.intervalMs - elapsed));
      }
    }
  }

  /** Cancels pending fetches and waits for the in-flight tick to settle. */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.shutdown.abort();
    await this.inFlight;
  }
}
