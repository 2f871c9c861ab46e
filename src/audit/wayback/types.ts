/** Wayback Machine type definitions. */

import type { FetchLike } from "../core/http.js";
import type { Logger } from "../core/types.js";

// ─── CDX Index ───

/**
 * One row of a CDX query, fields
 * `original,timestamp,digest,mimetype,statuscode`.
 */
export interface CdxEntry {
  originalUrl: string;
  /** `YYYYMMDDhhmmss`, UTC. */
  timestamp: string;
  digest: string;
  mimetype: string;
  /** HTTP status of the capture; null when the index reports `-`. */
  status: number | null;
}

// ─── Client ───

export interface WaybackClientOptions {
  timeoutMs: number;
  logger: Logger;
  fetchImpl?: FetchLike;
  baseUrl?: string;
}
