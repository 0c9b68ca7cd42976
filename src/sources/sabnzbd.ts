import { z } from "zod";
import type { QueueItem, SourceAdapter } from "../types";
import { type FetchLike, requestJson, trimTrailingSlash } from "./http";

export interface SabnzbdConnection {
  url: string;
  apiKey: string;
}

const MB = 1024 * 1024;
const GB = 1024 * MB;

// SABnzbd serialises most numbers as strings
const numeric = z.coerce.number().catch(0);

const SlotSchema = z.object({
  filename: z.string(),
  mb: numeric,
  mbleft: numeric,
  percentage: numeric,
  timeleft: z.string().optional(),
  status: z.string().optional(),
});

const QueueResponseSchema = z.object({
  queue: z.object({
    slots: z.array(SlotSchema).default([]),
    kbpersec: numeric.optional(),
    diskspace1: z.coerce.number().optional().catch(undefined),
    diskspacetotal1: z.coerce.number().optional().catch(undefined),
  }),
});

type Slot = z.infer<typeof SlotSchema>;

function toQueueItem(slot: Slot, speedBytesPerSec: number): QueueItem {
  const progressFraction = slot.mb > 0 ? (slot.mb - slot.mbleft) / slot.mb : slot.percentage / 100;
  return {
    rawTitle: slot.filename,
    sizeBytes: Math.round(slot.mb * MB),
    progressFraction: Math.min(1, Math.max(0, progressFraction)),
    // The queue reports a single overall speed; it belongs to whatever is downloading
    speedBytesPerSec: slot.status === "Downloading" ? speedBytesPerSec : 0,
    timeLeft: slot.timeleft && slot.timeleft !== "0:00:00" ? slot.timeleft : null,
  };
}

export function sabnzbdQueueSource(conn: SabnzbdConnection, fetchImpl: FetchLike = fetch): SourceAdapter {
  return {
    id: "sabnzbd",
    async fetch(signal) {
      const query = new URLSearchParams({ mode: "queue", output: "json", apikey: conn.apiKey });
      const body = await requestJson(
        "sabnzbd",
        `${trimTrailingSlash(conn.url)}/api?${query}`,
        { headers: { Accept: "application/json" }, signal },
        QueueResponseSchema,
        fetchImpl
      );
      const { queue } = body;
      const speed = (queue.kbpersec ?? 0) * 1024;

      return {
        kind: "queue",
        queue: {
          items: queue.slots.map((slot) => toQueueItem(slot, speed)),
          diskFreeBytes: queue.diskspace1 !== undefined ? queue.diskspace1 * GB : null,
          diskTotalBytes: queue.diskspacetotal1 !== undefined ? queue.diskspacetotal1 * GB : null,
        },
      };
    },
  };
}
