/**
 * Error taxonomy shared by every component that performs I/O.
 *
 * Transient failures are retried and reported to pacing. Fatal failures end
 * the resolution of one item. StoreError and ConfigError end the whole run.
 */

export type FailureClass = "throttled" | "transient" | "fatal";

export class HttpStatusError extends Error {
  readonly status: number;
  readonly url: string;
  readonly retryAfterMs?: number;

  constructor(status: number, url: string, retryAfterMs?: number) {
    super(`HTTP ${status} for ${url}`);
    this.name = "HttpStatusError";
    this.status = status;
    this.url = url;
    this.retryAfterMs = retryAfterMs;
  }
}

export class RequestTimeoutError extends Error {
  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

export class ConnectionError extends Error {
  constructor(url: string, cause: unknown) {
    super(`Connection to ${url} failed: ${errorMessage(cause)}`, { cause });
    this.name = "ConnectionError";
  }
}

export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedResponseError";
  }
}

export class CancelledError extends Error {
  constructor(message = "Operation cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export class StoreError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "StoreError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const TRANSIENT_MESSAGE_MARKERS = [
  "econnreset",
  "econnrefused",
  "etimedout",
  "epipe",
  "socket hang up",
  "fetch failed",
];

export function classifyFailure(err: unknown): FailureClass {
  if (err instanceof HttpStatusError) {
    if (err.status === 429) return "throttled";
    if (err.status >= 500 && err.status < 600) return "transient";
    return "fatal";
  }
  if (err instanceof RequestTimeoutError || err instanceof ConnectionError) {
    return "transient";
  }
  if (
    err instanceof MalformedResponseError ||
    err instanceof CancelledError ||
    err instanceof StoreError ||
    err instanceof ConfigError
  ) {
    return "fatal";
  }
  if (err instanceof Error) {
    const msg = err.message.toLowerCase();
    if (TRANSIENT_MESSAGE_MARKERS.some((marker) => msg.includes(marker))) {
      return "transient";
    }
  }
  return "fatal";
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
