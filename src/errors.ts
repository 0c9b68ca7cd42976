import type { SourceId } from "./types";

export class SourceUnavailableError extends Error {
  readonly source: SourceId;

  constructor(source: SourceId, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SourceUnavailableError";
    this.source = source;
  }
}

export class OperationTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = "OperationTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

// Discord refused a message write for a reason other than a missing message
export class ArtifactWriteError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "ArtifactWriteError";
    this.status = status;
  }
}

export class ConfigInvalidError extends Error {
  readonly issues: string[];

  constructor(file: string, issues: string[]) {
    super(`Invalid configuration in ${file}:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigInvalidError";
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toSourceError(source: SourceId, error: unknown): SourceUnavailableError {
  if (error instanceof SourceUnavailableError) return error;
  return new SourceUnavailableError(source, describeError(error), { cause: error });
}
