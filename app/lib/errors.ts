/**
 * errors.ts
 *
 * Error taxonomy for the resolution pipeline.
 * Each error carries a machine-readable `code` so decisions and logs
 * can report it without string matching.
 */

export type PipelineErrorCode =
  | "TRANSIENT_SOURCE"
  | "SOURCE"
  | "LIBRARY_UNAVAILABLE"
  | "INCONSISTENT_TAXONOMY"
  | "NO_EVIDENCE"
  | "CONFIG";

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PipelineError";
  }
}

export type TransientKind = "network" | "timeout" | "rate-limit" | "server";

/**
 * Network, timeout or rate-limit failure from a research or acoustic
 * collaborator. Retried, then tolerated as missing evidence.
 */
export class TransientSourceError extends PipelineError {
  constructor(
    public readonly source: string,
    public readonly kind: TransientKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${source}] ${message}`, "TRANSIENT_SOURCE", options);
    this.name = "TransientSourceError";
  }
}

/**
 * Non-transient failure from a source (bad request, malformed payload).
 * Never retried.
 */
export class SourceError extends PipelineError {
  constructor(
    public readonly source: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`[${source}] ${message}`, "SOURCE", options);
    this.name = "SourceError";
  }
}

/**
 * The library API could not be reached or refused a request. Aborts the run.
 */
export class LibraryUnavailable extends PipelineError {
  constructor(
    message: string,
    public readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, "LIBRARY_UNAVAILABLE", options);
    this.name = "LibraryUnavailable";
  }
}

/**
 * Playlist data is malformed in a way that makes a match meaningless.
 * Fatal for the track being matched only.
 */
export class InconsistentTaxonomy extends PipelineError {
  constructor(
    message: string,
    public readonly playlistId: string,
  ) {
    super(message, "INCONSISTENT_TAXONOMY");
    this.name = "InconsistentTaxonomy";
  }
}

/**
 * Nothing points at a taxonomy genre for a track. Ends that track with
 * REJECT(NO_EVIDENCE); never fails the run.
 */
export class NoEvidence extends PipelineError {
  constructor(
    public readonly trackId: string,
    public readonly detail?: string,
  ) {
    super(`No genre evidence for track ${trackId}${detail ? `: ${detail}` : ""}`, "NO_EVIDENCE");
    this.name = "NoEvidence";
  }
}

export class ConfigError extends PipelineError {
  constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`, "CONFIG");
    this.name = "ConfigError";
  }
}

export function isTransient(error: unknown): error is TransientSourceError {
  return error instanceof TransientSourceError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
