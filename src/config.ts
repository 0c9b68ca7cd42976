import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { z } from "zod";
import type { SectionSettings } from "./aggregate";
import { ConfigInvalidError, describeError } from "./errors";
import type { PresenceTemplates } from "./presence";
import type { DashboardAppearance } from "./render";
import type { JellyfinConnection } from "./sources/jellyfin";
import type { PlexConnection } from "./sources/plex";
import type { SabnzbdConnection } from "./sources/sabnzbd";
import { UPTIMEROBOT_URL, type UptimeConnection } from "./sources/uptime";
import { DEFAULT_MAX_TITLE_LENGTH } from "./titles";
import type { LibrarySectionConfig } from "./types";

const SectionConfigSchema = z.object({
  display_name: z.string().min(1),
  emoji: z.string().default(""),
  show_episodes: z.boolean().default(false),
});

const ConfigFileSchema = z.object({
  dashboard: z
    .object({
      name: z.string().default("Plex Dashboard"),
      icon_url: z.string().default(""),
      footer_icon_url: z.string().default(""),
    })
    .default({}),
  plex_sections: z
    .object({
      show_all: z.boolean().default(true),
      sections: z.record(SectionConfigSchema).default({}),
    })
    .default({}),
  presence: z
    .object({
      sections: z
        .array(
          z.object({
            section_title: z.string().min(1),
            display_name: z.string(),
            emoji: z.string().default(""),
          })
        )
        .default([]),
      offline_text: z.string().min(1).default("🔴 Server Offline!"),
      stream_text: z.string().min(1).default("{count} active Stream{s} 🟢"),
      update_interval: z.number().positive().default(300),
      min_interval: z.number().nonnegative().default(20),
    })
    .default({}),
  cache: z
    .object({
      library_update_interval: z.number().positive().default(900),
    })
    .default({}),
  titles: z
    .object({
      keywords: z.array(z.string().trim().min(1, "keywords must not be blank")).default([]),
      max_length: z.number().int().positive().default(DEFAULT_MAX_TITLE_LENGTH),
    })
    .default({}),
  scheduler: z
    .object({
      dashboard_interval: z.number().positive().default(60),
      source_timeout: z.number().positive().default(10),
      failure_threshold: z.number().int().nonnegative().default(0),
    })
    .default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// Blank variables count as unset
const optionalVar = z.preprocess((value) => (value === "" ? undefined : value), z.string().trim().optional());

const EnvSchema = z.object({
  PLEX_URL: z.string().url(),
  PLEX_TOKEN: z.string().min(1),
  DISCORD_TOKEN: optionalVar,
  CHANNEL_ID: optionalVar.pipe(z.string().regex(/^\d+$/, "CHANNEL_ID must be a numeric channel ID").optional()),
  DISCORD_CLIENT_ID: optionalVar,
  JELLYFIN_URL: optionalVar,
  JELLYFIN_API_KEY: optionalVar,
  SABNZBD_URL: optionalVar,
  SABNZBD_API_KEY: optionalVar,
  UPTIMEROBOT_URL: optionalVar,
  UPTIMEROBOT_API_KEY: optionalVar,
  UPTIMEROBOT_MONITOR_ID: optionalVar,
  DATA_DIR: optionalVar,
  DEBUG: optionalVar,
});

export interface DiscordSettings {
  token: string;
  channelId: string;
}

/** Each optional integration is enabled once, at startup, by the presence of its credentials. */
export interface Integrations {
  plex: PlexConnection;
  jellyfin: JellyfinConnection | null;
  sabnzbd: SabnzbdConnection | null;
  uptime: UptimeConnection | null;
  discord: DiscordSettings | null;
  rpcClientId: string | null;
}

export interface Settings {
  integrations: Integrations;
  dataDir: string;
  debug: boolean;
  appearance: DashboardAppearance;
  sections: SectionSettings;
  presence: PresenceTemplates;
  presenceRefreshMs: number;
  presenceMinIntervalMs: number;
  libraryUpdateIntervalMs: number;
  titleKeywords: string[];
  titleMaxLength: number;
  dashboardIntervalMs: number;
  sourceTimeoutMs: number;
  failureThreshold: number;
}

type EnvSettings = Pick<Settings, "integrations" | "dataDir" | "debug">;
type FileSettings = Omit<Settings, keyof EnvSettings>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message));
}

function both<A, B, T>(a: A | undefined, b: B | undefined, build: (a: A, b: B) => T): T | null {
  return a !== undefined && b !== undefined ? build(a, b) : null;
}

export function resolveIntegrations(env: NodeJS.ProcessEnv): EnvSettings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigInvalidError("environment", formatIssues(parsed.error));
  }
  const vars = parsed.data;

  const uptime =
    vars.UPTIMEROBOT_API_KEY && vars.UPTIMEROBOT_MONITOR_ID
      ? { url: vars.UPTIMEROBOT_URL ?? UPTIMEROBOT_URL, apiKey: vars.UPTIMEROBOT_API_KEY, monitorId: vars.UPTIMEROBOT_MONITOR_ID }
      : null;

  return {
    integrations: {
      plex: { url: vars.PLEX_URL, token: vars.PLEX_TOKEN },
      jellyfin: both(vars.JELLYFIN_URL, vars.JELLYFIN_API_KEY, (url, apiKey) => ({ url, apiKey })),
      sabnzbd: both(vars.SABNZBD_URL, vars.SABNZBD_API_KEY, (url, apiKey) => ({ url, apiKey })),
      uptime,
      discord: both(vars.DISCORD_TOKEN, vars.CHANNEL_ID, (token, channelId) => ({ token, channelId })),
      rpcClientId: vars.DISCORD_CLIENT_ID ?? null,
    },
    dataDir: resolve(vars.DATA_DIR ?? "data"),
    debug: vars.DEBUG !== undefined && vars.DEBUG !== "0" && vars.DEBUG.toLowerCase() !== "false",
  };
}

export function fromConfigFile(config: ConfigFile): FileSettings {
  const sections = new Map<string, LibrarySectionConfig>();
  for (const [title, section] of Object.entries(config.plex_sections.sections)) {
    sections.set(title, {
      displayName: section.display_name,
      emoji: section.emoji,
      showEpisodes: section.show_episodes,
    });
  }

  return {
    appearance: {
      name: config.dashboard.name,
      iconUrl: config.dashboard.icon_url,
      footerIconUrl: config.dashboard.footer_icon_url,
    },
    sections: { showAll: config.plex_sections.show_all, sections },
    presence: {
      offlineText: config.presence.offline_text,
      streamText: config.presence.stream_text,
      sections: config.presence.sections.map((section) => ({
        sectionTitle: section.section_title,
        displayName: section.display_name,
        emoji: section.emoji,
      })),
    },
    presenceRefreshMs: config.presence.update_interval * 1000,
    presenceMinIntervalMs: config.presence.min_interval * 1000,
    libraryUpdateIntervalMs: config.cache.library_update_interval * 1000,
    titleKeywords: config.titles.keywords,
    titleMaxLength: config.titles.max_length,
    dashboardIntervalMs: config.scheduler.dashboard_interval * 1000,
    sourceTimeoutMs: config.scheduler.source_timeout * 1000,
    failureThreshold: config.scheduler.failure_threshold,
  };
}

/**
 * Parses config.json. A missing file yields the defaults; a file that
 * exists but does not validate is fatal.
 */
export function parseConfigFile(raw: string | null, file = "config.json"): ConfigFile {
  let data: unknown = {};
  if (raw !== null) {
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new ConfigInvalidError(file, [`not valid JSON: ${describeError(error)}`]);
    }
  }
  const parsed = ConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigInvalidError(file, formatIssues(parsed.error));
  }
  return parsed.data;
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return null;
    throw error;
  }
}

export async function loadSettings(env: NodeJS.ProcessEnv = process.env): Promise<Settings> {
  const base = resolveIntegrations(env);
  const configPath = join(base.dataDir, "config.json");
  const raw = await readOptional(configPath);
  if (raw === null) {
    console.warn(`⚠️  ${configPath} not found, using default configuration`);
  }
  return { ...base, ...fromConfigFile(parseConfigFile(raw, configPath)) };
}

const UserMappingSchema = z.record(z.string());

export async function loadUserMapping(dataDir: string): Promise<Record<string, string>> {
  const path = join(dataDir, "user_mapping.json");
  try {
    const raw = await readOptional(path);
    return raw === null ? {} : UserMappingSchema.parse(JSON.parse(raw));
  } catch (error) {
    console.error(`⚠️  Failed to load user mapping from ${path}:`, describeError(error));
    return {};
  }
}
