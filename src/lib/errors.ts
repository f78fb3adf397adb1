/**
 * Error taxonomy for the sync pipeline.
 *
 * Everything except ConfigError is contained at the subject boundary by the
 * orchestrator; ConfigError aborts the process before any subject is touched.
 */

export type SyncErrorKind =
  | "config"
  | "auth"
  | "transient-network"
  | "malformed-response"
  | "request-rejected"
  | "persistence";

export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends SyncError {
  readonly kind = "config";

  constructor(message: string, readonly variables: string[] = []) {
    super(message);
  }
}

/** Refresh token rejected (or access token refused) for one subject. */
export class AuthError extends SyncError {
  readonly kind = "auth";

  constructor(readonly status: number, readonly body: string) {
    super(`Strava auth failed (${status}): ${body}`);
  }
}

/** Connection failure, timeout, 5xx, or 429 that outlived every retry. */
export class TransientNetworkError extends SyncError {
  readonly kind = "transient-network";

  constructor(message: string, readonly status: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class MalformedResponseError extends SyncError {
  readonly kind = "malformed-response";

  constructor(readonly endpoint: string, detail: string) {
    super(`Unexpected response from ${endpoint}: ${detail}`);
  }
}

/** Non-retryable 4xx other than auth and rate limiting. */
export class RequestRejectedError extends SyncError {
  readonly kind = "request-rejected";

  constructor(readonly status: number, readonly body: string) {
    super(`Strava request rejected (${status}): ${body}`);
  }
}

export class PersistenceError extends SyncError {
  readonly kind = "persistence";

  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`Failed to persist ${path}: ${describeError(options?.cause)}`, options);
  }
}

export function isSyncError(err: unknown): err is SyncError {
  return err instanceof SyncError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}
