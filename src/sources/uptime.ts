import { z } from "zod";
import { SourceUnavailableError } from "../errors";
import type { SourceAdapter, UptimeStats, UptimeWindow } from "../types";
import { type FetchLike, requestJson, trimTrailingSlash } from "./http";

export interface UptimeConnection {
  url: string;
  apiKey: string;
  monitorId: string;
}

export const UPTIMEROBOT_URL = "https://api.uptimerobot.com";

const WINDOW_DAYS = [1, 7, 30] as const;
const DAY_SECONDS = 86_400;
// Monitor log type for a down event
const LOG_DOWN = 1;

const MonitorSchema = z.object({
  id: z.coerce.string(),
  custom_uptime_ratio: z.string(),
  logs: z
    .array(z.object({ type: z.number(), datetime: z.number() }))
    .default([]),
});

const GetMonitorsResponseSchema = z.object({
  stat: z.string(),
  error: z.object({ message: z.string().optional() }).optional(),
  monitors: z.array(MonitorSchema).default([]),
});

function toWindow(ratio: string | undefined, days: number): UptimeWindow {
  const percentage = Number(ratio);
  if (ratio === undefined || !Number.isFinite(percentage)) {
    throw new SourceUnavailableError("uptime", `missing ${days}d uptime ratio`);
  }
  return {
    percentage,
    durationUpSeconds: Math.round((percentage / 100) * days * DAY_SECONDS),
  };
}

/**
 * Parses UptimeRobot's "99.981-99.990-99.500" triple (24h, 7d, 30d) and
 * the most recent down event from the monitor log.
 */
export function toUptimeStats(monitor: z.infer<typeof MonitorSchema>): UptimeStats {
  const ratios = monitor.custom_uptime_ratio.split("-");
  const lastDown = monitor.logs
    .filter((log) => log.type === LOG_DOWN)
    .reduce<number | null>((latest, log) => (latest === null || log.datetime > latest ? log.datetime : latest), null);

  return {
    day: toWindow(ratios[0], WINDOW_DAYS[0]),
    week: toWindow(ratios[1], WINDOW_DAYS[1]),
    month: toWindow(ratios[2], WINDOW_DAYS[2]),
    lastDownAt: lastDown !== null ? lastDown * 1000 : null,
  };
}

export function uptimeRobotSource(conn: UptimeConnection, fetchImpl: FetchLike = fetch): SourceAdapter {
  return {
    id: "uptime",
    async fetch(signal) {
      const form = new URLSearchParams({
        api_key: conn.apiKey,
        format: "json",
        monitors: conn.monitorId,
        custom_uptime_ratios: WINDOW_DAYS.join("-"),
        logs: "1",
        logs_limit: "10",
      });
      const body = await requestJson(
        "uptime",
        `${trimTrailingSlash(conn.url)}/v2/getMonitors`,
        {
          method: "POST",
          headers: { "Content-Type": "application/x-www-form-urlencoded", "Cache-Control": "no-cache" },
          body: form.toString(),
          signal,
        },
        GetMonitorsResponseSchema,
        fetchImpl
      );

      if (body.stat !== "ok") {
        throw new SourceUnavailableError("uptime", body.error?.message ?? `API answered stat=${body.stat}`);
      }
      const monitor = body.monitors.find((entry) => entry.id === conn.monitorId);
      if (!monitor) {
        throw new SourceUnavailableError("uptime", `monitor ${conn.monitorId} not found`);
      }
      return { kind: "uptime", stats: toUptimeStats(monitor) };
    },
  };
}
