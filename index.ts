import "dotenv/config";
import { join } from "node:path";
import { loadSettings, loadUserMapping, type Settings } from "./src/config";
import { DiscordMessageSink, RichPresenceSink } from "./src/discord";
import { ConfigInvalidError, describeError } from "./src/errors";
import { LibraryCache } from "./src/library";
import { createNameResolver } from "./src/names";
import { PresencePublisher, type PresenceSink } from "./src/presence";
import { EMPTY_ARTIFACT_STATE, type ArtifactSink } from "./src/publish";
import { ConsoleArtifactSink, ConsolePresenceSink } from "./src/preview";
import { Scheduler, type TickDependencies } from "./src/scheduler";
import { jellyfinSessionsSource } from "./src/sources/jellyfin";
import { plexLibrarySource, plexSessionsSource } from "./src/sources/plex";
import { sabnzbdQueueSource } from "./src/sources/sabnzbd";
import { uptimeRobotSource } from "./src/sources/uptime";
import { JsonFileArtifactStore, MemoryArtifactStore, type ArtifactStore } from "./src/state";
import { createTitleNormalizer } from "./src/titles";
import type { SourceAdapter } from "./src/types";

// CLI arguments
const TEST_MODE = process.argv.includes("--test");

const MESSAGE_ID_FILE = "dashboard_message_id.json";

function buildSources(settings: Settings): SourceAdapter[] {
  const { plex, jellyfin, sabnzbd, uptime } = settings.integrations;
  const sources = [plexSessionsSource(plex)];
  if (jellyfin) sources.push(jellyfinSessionsSource(jellyfin));
  if (sabnzbd) sources.push(sabnzbdQueueSource(sabnzbd));
  if (uptime) sources.push(uptimeRobotSource(uptime));
  return sources;
}

interface Outputs {
  sink: ArtifactSink;
  store: ArtifactStore;
  presenceSink: PresenceSink | null;
  rpc: RichPresenceSink | null;
}

async function buildOutputs(settings: Settings): Promise<Outputs> {
  if (TEST_MODE) {
    return {
      sink: new ConsoleArtifactSink(),
      store: new MemoryArtifactStore(),
      presenceSink: new ConsolePresenceSink(),
      rpc: null,
    };
  }

  const discord = settings.integrations.discord;
  if (!discord) {
    console.error("\n⚠️  Please set DISCORD_TOKEN and CHANNEL_ID!");
    console.error("   1. Create a bot at https://discord.com/developers/applications");
    console.error("   2. Invite it to your server with the Send Messages permission");
    console.error("   3. Copy the ID of the channel the dashboard should live in");
    console.error("\nTip: Use --test flag to preview the dashboard without Discord:");
    console.error("     npm run preview");
    process.exit(1);
  }

  let rpc: RichPresenceSink | null = null;
  if (settings.integrations.rpcClientId) {
    rpc = new RichPresenceSink(settings.integrations.rpcClientId);
    await rpc.connect();
  }

  return {
    sink: new DiscordMessageSink(discord.token, discord.channelId, settings.sourceTimeoutMs),
    store: new JsonFileArtifactStore(join(settings.dataDir, MESSAGE_ID_FILE)),
    presenceSink: rpc,
    rpc,
  };
}

async function main() {
  const settings = await loadSettings();

  const modeLabel = TEST_MODE ? " - TEST MODE" : "";
  console.log(`📺 Plex Dashboard${modeLabel}`);
  console.log("=".repeat(17 + modeLabel.length));

  const sources = buildSources(settings);
  console.log(`🔌 Sources: ${sources.map((source) => source.id).join(", ")}`);

  const episodeSections = new Set(
    [...settings.sections.sections].filter(([, section]) => section.showEpisodes).map(([title]) => title)
  );
  const library = new LibraryCache(
    plexLibrarySource(settings.integrations.plex, (title) => episodeSections.has(title)),
    { updateIntervalMs: settings.libraryUpdateIntervalMs, timeoutMs: settings.sourceTimeoutMs }
  );

  const outputs = await buildOutputs(settings);
  const presence = outputs.presenceSink
    ? new PresencePublisher(outputs.presenceSink, {
        refreshIntervalMs: settings.presenceRefreshMs,
        minIntervalMs: settings.presenceMinIntervalMs,
        timeoutMs: settings.sourceTimeoutMs,
      })
    : null;

  const deps: TickDependencies = {
    sources,
    library,
    resolver: createNameResolver(await loadUserMapping(settings.dataDir)),
    normalizeTitle: createTitleNormalizer(settings.titleKeywords, settings.titleMaxLength),
    sections: settings.sections,
    appearance: settings.appearance,
    presenceTemplates: settings.presence,
    sink: outputs.sink,
    store: outputs.store,
    presence,
    sourceTimeoutMs: settings.sourceTimeoutMs,
    failureThreshold: settings.failureThreshold,
    clock: Date.now,
    debug: settings.debug,
  };

  const artifactId = await outputs.store.load();
  const initialState = { health: {}, artifact: { ...EMPTY_ARTIFACT_STATE, artifactId } };

  if (artifactId) {
    console.log(`📌 Editing existing dashboard message ${artifactId}`);
  }

  const scheduler = new Scheduler(deps, settings.dashboardIntervalMs, initialState);
  scheduler.start();

  // Handle graceful shutdown
  const shutdown = async () => {
    console.log("\n\n👋 Shutting down...");
    await scheduler.stop();
    try {
      await outputs.rpc?.destroy();
    } catch (error) {
      console.error("⚠️  Failed to close Discord RPC:", describeError(error));
    }
    process.exit(0);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  console.log(`🔁 Updating every ${settings.dashboardIntervalMs / 1000}s. Press Ctrl+C to stop.\n`);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigInvalidError) {
    console.error(`❌ ${error.message}`);
  } else {
    console.error("❌ Fatal error:", describeError(error));
  }
  process.exit(1);
});
