import { Client } from "@xhayper/discord-rpc";
import {
  ActivityType,
  RouteBases,
  Routes,
  type APIEmbed,
  type RESTPatchAPIChannelMessageJSONBody,
  type RESTPostAPIChannelMessageJSONBody,
} from "discord-api-types/v10";
import { z } from "zod";
import { ArtifactWriteError, describeError } from "./errors";
import type { PresenceSink } from "./presence";
import type { ArtifactSink } from "./publish";
import type { FetchLike } from "./sources/http";

const MessageSchema = z.object({ id: z.string() });

const RECONNECT_DELAY = 30000;

/** Posts and edits the dashboard message through Discord's REST API. */
export class DiscordMessageSink implements ArtifactSink {
  constructor(
    private readonly token: string,
    private readonly channelId: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  private request(method: "POST" | "PATCH", route: string, body: object): Promise<Response> {
    return this.fetchImpl(`${RouteBases.api}${route}`, {
      method,
      headers: {
        Authorization: `Bot ${this.token}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }

  async create(embed: APIEmbed): Promise<string> {
    const body: RESTPostAPIChannelMessageJSONBody = { embeds: [embed] };
    const response = await this.request("POST", Routes.channelMessages(this.channelId), body);
    if (!response.ok) {
      throw new ArtifactWriteError(response.status, `creating dashboard message failed: HTTP ${response.status}`);
    }
    const message = MessageSchema.parse(await response.json());
    return message.id;
  }

  async update(artifactId: string, embed: APIEmbed): Promise<"ok" | "notFound"> {
    const body: RESTPatchAPIChannelMessageJSONBody = { embeds: [embed] };
    const response = await this.request("PATCH", Routes.channelMessage(this.channelId, artifactId), body);
    if (response.status === 404) {
      return "notFound";
    }
    if (!response.ok) {
      throw new ArtifactWriteError(response.status, `editing dashboard message failed: HTTP ${response.status}`);
    }
    return "ok";
  }
}

// Discord needs 2-128 characters for activity text
function activityText(text: string): string {
  const padded = text.length < 2 ? `${text} ` : text;
  return padded.substring(0, 128);
}

/** Publishes the status line as Rich Presence over the local Discord client. */
export class RichPresenceSink implements PresenceSink {
  private readonly rpc: Client;
  private connected = false;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private closed = false;

  constructor(clientId: string) {
    this.rpc = new Client({ clientId });

    this.rpc.on("ready", () => {
      console.log(`✅ Connected to Discord as ${this.rpc.user?.username}`);
      this.connected = true;
    });

    this.rpc.on("disconnected", () => {
      console.log("❌ Disconnected from Discord");
      this.connected = false;
      this.scheduleReconnect();
    });
  }

  async connect(): Promise<void> {
    try {
      console.log("🔌 Connecting to Discord...");
      await this.rpc.login();
    } catch (error) {
      console.error("⚠️  Failed to connect to Discord:", describeError(error));
      console.error(`   Will retry in ${RECONNECT_DELAY / 1000} seconds...`);
      this.scheduleReconnect();
    }
  }

  private scheduleReconnect(): void {
    if (this.closed || this.reconnectTimer) return;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      void this.connect();
    }, RECONNECT_DELAY);
  }

  async setPresence(text: string): Promise<void> {
    const user = this.rpc.user;
    if (!this.connected || !user) {
      throw new Error("Discord RPC is not connected");
    }
    await user.setActivity({
      type: ActivityType.Watching,
      details: activityText(text),
      largeImageKey: "plex",
      largeImageText: "Plex Dashboard",
    });
  }

  async destroy(): Promise<void> {
    this.closed = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.connected) {
      await this.rpc.user?.clearActivity();
    }
    await this.rpc.destroy();
  }
}
