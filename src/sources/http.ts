import type { z } from "zod";
import { SourceUnavailableError, describeError, toSourceError } from "../errors";
import { withTimeout } from "../timeout";
import type { SourceAdapter, SourceId, SourceSnapshot } from "../types";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
  return `${where}: ${issue?.message ?? "invalid"}`;
}

/**
 * Fetches a JSON document and validates it. Every failure (network,
 * HTTP status, body that is not JSON, unexpected shape) surfaces as a
 * {@link SourceUnavailableError} tagged with `source`.
 */
export async function requestJson<S extends z.ZodTypeAny>(
  source: SourceId,
  url: string,
  init: RequestInit,
  schema: S,
  fetchImpl: FetchLike
): Promise<z.infer<S>> {
  let response: Response;
  try {
    response = await fetchImpl(url, init);
  } catch (error) {
    throw new SourceUnavailableError(source, `request failed: ${describeError(error)}`, { cause: error });
  }

  if (!response.ok) {
    throw new SourceUnavailableError(source, `HTTP ${response.status} ${response.statusText}`.trim());
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new SourceUnavailableError(source, "response is not valid JSON", { cause: error });
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new SourceUnavailableError(source, `unexpected response${describeIssue(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Validates list entries one at a time. An entry of unexpected shape is
 * skipped with a warning and the rest of the list is kept.
 */
export function parseEntries<S extends z.ZodTypeAny>(
  source: SourceId,
  entries: readonly unknown[],
  schema: S
): z.infer<S>[] {
  const valid: z.infer<S>[] = [];
  entries.forEach((entry, index) => {
    const parsed = schema.safeParse(entry);
    if (parsed.success) {
      valid.push(parsed.data);
    } else {
      console.warn(`⚠️  ${source}: skipped entry ${index}${describeIssue(parsed.error)}`);
    }
  });
  return valid;
}

/**
 * Fetches one snapshot from `adapter`. Never rejects: timeouts, aborts
 * and adapter errors all come back as `ok: false` snapshots.
 */
export async function captureSnapshot(
  adapter: SourceAdapter,
  timeoutMs: number,
  clock: () => number,
  parent?: AbortSignal
): Promise<SourceSnapshot> {
  try {
    const payload = await withTimeout((signal) => adapter.fetch(signal), timeoutMs, parent);
    return { source: adapter.id, capturedAt: clock(), ok: true, payload };
  } catch (error) {
    return { source: adapter.id, capturedAt: clock(), ok: false, error: toSourceError(adapter.id, error) };
  }
}
