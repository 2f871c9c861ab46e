/**
 * Wayback Machine client.
 *
 * Two endpoints, each its own pacing surface: the CDX index (`search`) and
 * the raw capture content (`download`). The client performs exactly one
 * request per call; retries and pacing wrap it from outside.
 */

import { MalformedResponseError } from "../core/errors.js";
import { type FetchLike, fetchBytes, fetchJson } from "../core/http.js";
import type {
  CaptureReference,
  ContentFetcher,
  Logger,
} from "../core/types.js";
import type { CdxEntry, WaybackClientOptions } from "./types.js";

export const WAYBACK_BASE_URL = "https://web.archive.org";

const CDX_FIELDS = "original,timestamp,digest,mimetype,statuscode";

/** URL serving the captured bytes without the archive's rewriting. */
export function rawCaptureUrl(
  timestamp: string,
  originalUrl: string,
  baseUrl: string = WAYBACK_BASE_URL,
): string {
  return `${baseUrl}/web/${timestamp}id_/${originalUrl}`;
}

/** URL of the capture as a browser would view it. */
export function viewCaptureUrl(
  timestamp: string,
  originalUrl: string,
  baseUrl: string = WAYBACK_BASE_URL,
): string {
  return `${baseUrl}/web/${timestamp}/${originalUrl}`;
}

export function parseTimestamp(timestamp: string): Date {
  const m = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/.exec(timestamp);
  if (!m) {
    throw new MalformedResponseError(`Invalid archive timestamp: ${timestamp}`);
  }
  const [, y, mo, d, h, mi, s] = m;
  return new Date(
    Date.UTC(
      Number(y),
      Number(mo) - 1,
      Number(d),
      Number(h),
      Number(mi),
      Number(s),
    ),
  );
}

function isStringRow(row: unknown): row is string[] {
  return Array.isArray(row) && row.every((cell) => typeof cell === "string");
}

/**
 * Parses a CDX JSON response. The first row is the field header; an empty
 * body means no captures.
 */
export function parseCdxRows(json: unknown): CdxEntry[] {
  if (json === undefined) return [];
  if (!Array.isArray(json)) {
    throw new MalformedResponseError("CDX response is not an array");
  }

  const entries: CdxEntry[] = [];
  for (const row of json.slice(1)) {
    if (!isStringRow(row) || row.length < 5) {
      throw new MalformedResponseError(
        `Unexpected CDX row: ${JSON.stringify(row)}`,
      );
    }
    const [originalUrl, timestamp, digest, mimetype, statuscode] = row;
    parseTimestamp(timestamp);
    const status = statuscode === "-" ? null : Number.parseInt(statuscode, 10);
    entries.push({
      originalUrl,
      timestamp,
      digest,
      mimetype,
      status: status === null || Number.isNaN(status) ? null : status,
    });
  }
  return entries;
}

export class WaybackClient implements ContentFetcher {
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchImpl?: FetchLike;
  readonly baseUrl: string;

  constructor(opts: WaybackClientOptions) {
    this.timeoutMs = opts.timeoutMs;
    this.logger = opts.logger;
    this.fetchImpl = opts.fetchImpl;
    this.baseUrl = opts.baseUrl ?? WAYBACK_BASE_URL;
  }

  searchUrl(query: string): string {
    return `${this.baseUrl}/cdx/search/cdx?url=${encodeURIComponent(query)}&output=json&fl=${CDX_FIELDS}`;
  }

  /** Queries the CDX index; a trailing `*` in `query` makes a prefix match. */
  async search(query: string): Promise<CdxEntry[]> {
    const url = this.searchUrl(query);
    this.logger.debug("CDX query", { query });
    const json = await fetchJson(url, {
      timeoutMs: this.timeoutMs,
      fetchImpl: this.fetchImpl,
    });
    return parseCdxRows(json);
  }

  async download(capture: CaptureReference): Promise<Buffer> {
    this.logger.debug("Downloading capture", { url: capture.captureUrl });
    return fetchBytes(capture.captureUrl, {
      timeoutMs: this.timeoutMs,
      fetchImpl: this.fetchImpl,
    });
  }
}
