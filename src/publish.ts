import type { APIEmbed } from "discord-api-types/v10";
import { describeError } from "./errors";
import type { RenderedDashboard } from "./render";
import type { ArtifactStore } from "./state";
import type { PublishedArtifactState } from "./types";

/** Where the dashboard lives: one message, created once and edited in place. */
export interface ArtifactSink {
  create(embed: APIEmbed): Promise<string>;
  update(artifactId: string, embed: APIEmbed): Promise<"ok" | "notFound">;
}

export type PublishOutcome = "unchanged" | "created" | "updated" | "missing" | "failed";

export interface PublishResult {
  state: PublishedArtifactState;
  outcome: PublishOutcome;
}

export const EMPTY_ARTIFACT_STATE: PublishedArtifactState = { artifactId: null, lastContentHash: null };

/**
 * Writes the rendered dashboard only when its hash differs from the last
 * published one. The returned state changes only after Discord confirmed
 * the write; any failure hands back `state` untouched so the next tick
 * retries against the same message.
 */
export async function publish(
  rendered: RenderedDashboard,
  state: PublishedArtifactState,
  sink: ArtifactSink,
  store: ArtifactStore
): Promise<PublishResult> {
  if (rendered.contentHash === state.lastContentHash) {
    return { state, outcome: "unchanged" };
  }

  try {
    if (state.artifactId === null) {
      const artifactId = await sink.create(rendered.embed);
      console.log(`🆕 New dashboard message created with ID: ${artifactId}`);
      await persist(store, artifactId);
      return { state: { artifactId, lastContentHash: rendered.contentHash }, outcome: "created" };
    }

    const result = await sink.update(state.artifactId, rendered.embed);
    if (result === "notFound") {
      console.warn(`⚠️  Dashboard message ${state.artifactId} no longer exists, a new one will be created`);
      await persist(store, null);
      return { state: EMPTY_ARTIFACT_STATE, outcome: "missing" };
    }
    return { state: { artifactId: state.artifactId, lastContentHash: rendered.contentHash }, outcome: "updated" };
  } catch (error) {
    console.error("❌ Failed to publish dashboard, retrying next tick:", describeError(error));
    return { state, outcome: "failed" };
  }
}

// The remote write already happened; a failed save must not undo it
async function persist(store: ArtifactStore, artifactId: string | null): Promise<void> {
  try {
    await store.save(artifactId);
  } catch (error) {
    console.error("⚠️  Failed to save dashboard message ID:", describeError(error));
  }
}
