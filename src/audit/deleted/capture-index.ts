import { isDigest } from "../core/digest.js";
import type { Pacer } from "../core/pacing.js";
import { type PacedRetryOptions, pacedRetry } from "../core/retry.js";
import type { CaptureIndex, CaptureReference } from "../core/types.js";
import {
  accountStatusQuery,
  parseStatusUrl,
  postStatusQuery,
} from "../twitter/status.js";
import { rawCaptureUrl } from "../wayback/client.js";
import type { CdxEntry } from "../wayback/types.js";

/** The subset of the archive client the capture index queries. */
export interface CdxSearcher {
  search(query: string): Promise<CdxEntry[]>;
}

export type IndexRetryOptions = Pick<
  PacedRetryOptions,
  "maxRetries" | "baseDelayMs" | "maxDelayMs"
>;

/** Status 200 or an unknown status counts as evidence; redirects do not. */
export function isEvidence(entry: CdxEntry): boolean {
  return entry.status === null || entry.status === 200;
}

export function toCaptureReference(
  entry: CdxEntry,
  postId: string,
  screenName?: string,
): CaptureReference {
  return {
    postId,
    timestamp: entry.timestamp,
    originalUrl: entry.originalUrl,
    captureUrl: rawCaptureUrl(entry.timestamp, entry.originalUrl),
    digest: isDigest(entry.digest) ? entry.digest : undefined,
    mimetype: entry.mimetype,
    screenName,
  };
}

function byTimestamp(a: CaptureReference, b: CaptureReference): number {
  return a.timestamp.localeCompare(b.timestamp);
}

/** Groups evidence captures by post, each group ordered oldest first. */
export function groupByPost(
  entries: CdxEntry[],
): Map<string, CaptureReference[]> {
  const groups = new Map<string, CaptureReference[]>();
  for (const entry of entries) {
    if (!isEvidence(entry)) continue;
    const ref = parseStatusUrl(entry.originalUrl);
    if (!ref) continue;
    const group = groups.get(ref.postId) ?? [];
    group.push(toCaptureReference(entry, ref.postId, ref.screenName));
    groups.set(ref.postId, group);
  }
  for (const group of groups.values()) group.sort(byTimestamp);
  return groups;
}

/** One index query per post, paced on the index surface. */
export class CdxCaptureIndex implements CaptureIndex {
  private readonly client: CdxSearcher;
  private readonly pacer: Pacer;
  private readonly screenName: string;
  private readonly retry?: IndexRetryOptions;

  constructor(opts: {
    client: CdxSearcher;
    pacer: Pacer;
    screenName: string;
    retry?: IndexRetryOptions;
  }) {
    this.client = opts.client;
    this.pacer = opts.pacer;
    this.screenName = opts.screenName;
    this.retry = opts.retry;
  }

  async lookup(
    postId: string,
    signal?: AbortSignal,
  ): Promise<CaptureReference[]> {
    const entries = await pacedRetry(
      this.pacer,
      "index",
      () => this.client.search(postStatusQuery(this.screenName, postId)),
      { ...this.retry, signal },
    );
    return groupByPost(entries).get(postId) ?? [];
  }
}

/** Serves captures already fetched by an account-wide query. */
export class PrefetchedCaptureIndex implements CaptureIndex {
  private readonly groups: Map<string, CaptureReference[]>;

  constructor(groups: Map<string, CaptureReference[]>) {
    this.groups = groups;
  }

  async lookup(postId: string): Promise<CaptureReference[]> {
    return [...(this.groups.get(postId) ?? [])];
  }
}

export interface Discovery {
  /** Post identifiers, most recently captured first. */
  postIds: string[];
  index: PrefetchedCaptureIndex;
}

/**
 * Finds every archived post of an account with a single wildcard query.
 * `limit` keeps the most recently captured posts.
 */
export async function discoverPosts(opts: {
  client: CdxSearcher;
  pacer: Pacer;
  screenName: string;
  limit?: number;
  signal?: AbortSignal;
  retry?: IndexRetryOptions;
}): Promise<Discovery> {
  const entries = await pacedRetry(
    opts.pacer,
    "index",
    () => opts.client.search(accountStatusQuery(opts.screenName)),
    { ...opts.retry, signal: opts.signal },
  );
  const groups = groupByPost(entries);

  const latest = (captures: CaptureReference[]) =>
    captures[captures.length - 1]?.timestamp ?? "";
  let postIds = [...groups.keys()].sort((a, b) => {
    const order = latest(groups.get(b) ?? []).localeCompare(
      latest(groups.get(a) ?? []),
    );
    return order !== 0 ? order : a.localeCompare(b);
  });
  if (opts.limit !== undefined) postIds = postIds.slice(0, opts.limit);

  return { postIds, index: new PrefetchedCaptureIndex(groups) };
}
