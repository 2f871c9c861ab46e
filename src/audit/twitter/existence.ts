/**
 * Live-existence check against the platform's post lookup endpoint.
 *
 * One request covers up to 100 identifiers. Posts that are deleted,
 * suspended or protected come back under `errors` instead of `data`; only
 * presence in `data` counts as existing.
 */

import { MalformedResponseError } from "../core/errors.js";
import { type FetchLike, fetchJson } from "../core/http.js";
import type { ExistenceChecker, Logger } from "../core/types.js";

export const TWEETS_LOOKUP_URL = "https://api.twitter.com/2/tweets";
export const LOOKUP_BATCH_SIZE = 100;

export interface TwitterExistenceCheckerOptions {
  bearerToken: string;
  timeoutMs: number;
  logger: Logger;
  fetchImpl?: FetchLike;
  endpoint?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Returns the identifiers listed under `data` in a lookup response. */
export function parseLookupResponse(json: unknown): Set<string> {
  if (!isRecord(json)) {
    throw new MalformedResponseError("Lookup response is not an object");
  }
  const found = new Set<string>();
  const data = json.data;
  if (data === undefined) return found;
  if (!Array.isArray(data)) {
    throw new MalformedResponseError("Lookup response `data` is not an array");
  }
  for (const item of data) {
    if (!isRecord(item) || typeof item.id !== "string") {
      throw new MalformedResponseError(
        `Unexpected lookup item: ${JSON.stringify(item)}`,
      );
    }
    found.add(item.id);
  }
  return found;
}

export class TwitterExistenceChecker implements ExistenceChecker {
  readonly batchSize = LOOKUP_BATCH_SIZE;

  private readonly bearerToken: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly fetchImpl?: FetchLike;
  private readonly endpoint: string;

  constructor(opts: TwitterExistenceCheckerOptions) {
    this.bearerToken = opts.bearerToken;
    this.timeoutMs = opts.timeoutMs;
    this.logger = opts.logger;
    this.fetchImpl = opts.fetchImpl;
    this.endpoint = opts.endpoint ?? TWEETS_LOOKUP_URL;
  }

  async check(postIds: string[]): Promise<Map<string, boolean>> {
    if (postIds.length > this.batchSize) {
      throw new RangeError(
        `At most ${this.batchSize} identifiers per lookup, got ${postIds.length}`,
      );
    }
    const result = new Map<string, boolean>();
    if (postIds.length === 0) return result;

    const url = `${this.endpoint}?ids=${postIds.join(",")}`;
    const json = await fetchJson(url, {
      timeoutMs: this.timeoutMs,
      fetchImpl: this.fetchImpl,
      headers: { Authorization: `Bearer ${this.bearerToken}` },
    });
    const found = parseLookupResponse(json);
    for (const id of postIds) {
      result.set(id, found.has(id));
    }
    this.logger.debug("Existence lookup", {
      requested: postIds.length,
      live: found.size,
    });
    return result;
  }
}
