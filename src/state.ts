import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { describeError } from "./errors";

/** Durable home of the dashboard message ID, so a restart edits instead of reposting. */
export interface ArtifactStore {
  load(): Promise<string | null>;
  save(artifactId: string | null): Promise<void>;
}

// Snowflakes exceed Number.MAX_SAFE_INTEGER, so they are stored as strings
const StoredMessageSchema = z.object({ message_id: z.string().regex(/^\d+$/) });

// Older files hold a bare JSON number; it is quoted before parsing so no digits are lost
const NUMERIC_MESSAGE_ID = /("message_id"\s*:\s*)(\d+)/;

export class JsonFileArtifactStore implements ArtifactStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<string | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    try {
      const numeric = NUMERIC_MESSAGE_ID.test(raw);
      const { message_id } = StoredMessageSchema.parse(JSON.parse(raw.replace(NUMERIC_MESSAGE_ID, '$1"$2"')));
      if (numeric) {
        console.log(`📌 Read numeric message ID ${message_id} from ${this.filePath}; it is saved as a string from now on`);
      }
      return message_id;
    } catch (error) {
      console.error(`⚠️  Ignoring unreadable message ID file ${this.filePath}:`, describeError(error));
      return null;
    }
  }

  async save(artifactId: string | null): Promise<void> {
    if (artifactId === null) {
      await rm(this.filePath, { force: true });
      return;
    }
    await mkdir(dirname(this.filePath), { recursive: true });
    // Write then rename, so a crash never leaves half a file behind
    const tmpPath = `${this.filePath}.tmp`;
    await writeFile(tmpPath, JSON.stringify({ message_id: artifactId }), "utf-8");
    await rename(tmpPath, this.filePath);
  }
}

export class MemoryArtifactStore implements ArtifactStore {
  constructor(private artifactId: string | null = null) {}

  async load(): Promise<string | null> {
    return this.artifactId;
  }

  async save(artifactId: string | null): Promise<void> {
    this.artifactId = artifactId;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
