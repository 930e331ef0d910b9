import type { JobState } from "./job.js";

export type ValidationErrorKind = "MissingField" | "DuplicateId" | "MalformedManifest" | "InvalidParameter";

export class ValidationError extends Error {
  readonly kind: ValidationErrorKind;
  readonly issues: string[];

  constructor(kind: ValidationErrorKind, message: string, issues: string[] = [message]) {
    super(message);
    this.name = "ValidationError";
    this.kind = kind;
    this.issues = issues;
  }
}

/** Transient transport failure talking to the platform. Retried. */
export class NetworkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NetworkError";
  }
}

/** Local disk failure while materializing results. Retried like NetworkError. */
export class IoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IoError";
  }
}

/** Platform-side quota or capacity refusal. Not retried. */
export class ResourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResourceError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class CancelledError extends Error {
  constructor(message = "cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    readonly jobId: string,
    readonly from: JobState | null,
    readonly to: JobState,
    reason: string
  ) {
    super(`invalid transition for ${jobId}: ${from ?? "(unknown)"} -> ${to} (${reason})`);
    this.name = "InvalidTransitionError";
  }
}

export function isRetryable(err: unknown): boolean {
  return err instanceof NetworkError || err instanceof IoError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "unknown error";
}
