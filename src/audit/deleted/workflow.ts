import { mapConcurrent } from "../core/concurrency.js";
import {
  CancelledError,
  ConfigError,
  errorMessage,
  StoreError,
} from "../core/errors.js";
import type { DownloadPipeline } from "../core/pipeline.js";
import { type RetryOptions, withRetry } from "../core/retry.js";
import type {
  CaptureIndex,
  CaptureReference,
  ExistenceChecker,
  Logger,
} from "../core/types.js";
import type {
  DeletionRunOptions,
  PostDeletionResult,
  Resolution,
} from "./types.js";

export interface DeletionWorkflowOptions {
  index: CaptureIndex;
  logger: Logger;
  existence?: ExistenceChecker;
  pipeline?: DownloadPipeline;
  /** Retry policy for existence lookups. */
  retry?: Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">;
}

const CANCELLED = "cancelled";

function isFatalGlobal(err: unknown): boolean {
  return err instanceof StoreError || err instanceof ConfigError;
}

/** Drops repeated identifiers, keeping first occurrences in order. */
export function uniqueIds(postIds: readonly string[]): string[] {
  return [...new Set(postIds)];
}

export function countResolutions(
  results: readonly PostDeletionResult[],
): Record<Resolution, number> {
  const out: Record<Resolution, number> = {
    deleted: 0,
    extant: 0,
    archived: 0,
    "no-evidence": 0,
    unresolved: 0,
  };
  for (const result of results) out[result.resolution]++;
  return out;
}

/** 1 when any identifier is unresolved, otherwise 0. */
export function exitCodeFor(results: readonly PostDeletionResult[]): number {
  return results.some((r) => r.resolution === "unresolved") ? 1 : 0;
}

/**
 * Resolves each post identifier against the archive index, optionally
 * checks live existence, and downloads evidence for posts that are gone.
 * Results come back in input order regardless of completion order.
 */
export class DeletionWorkflow {
  private readonly index: CaptureIndex;
  private readonly logger: Logger;
  private readonly existence?: ExistenceChecker;
  private readonly pipeline?: DownloadPipeline;
  private readonly retry: DeletionWorkflowOptions["retry"];

  constructor(opts: DeletionWorkflowOptions) {
    this.index = opts.index;
    this.logger = opts.logger;
    this.existence = opts.existence;
    this.pipeline = opts.pipeline;
    this.retry = opts.retry;
  }

  async run(
    postIds: readonly string[],
    opts: DeletionRunOptions,
  ): Promise<PostDeletionResult[]> {
    const ids = uniqueIds(postIds);
    this.logger.info("Querying archive index", {
      posts: ids.length,
      concurrency: opts.indexConcurrency,
    });

    let queried = 0;
    const results = await mapConcurrent(
      ids,
      opts.indexConcurrency,
      async (id) => {
        const result = await this.query(id, opts.signal);
        this.logger.progress(++queried, ids.length, "Index");
        return result;
      },
    );

    if (opts.checkExistence) {
      await this.checkExistence(results, opts.signal);
    }

    if (opts.download) {
      await this.download(results, opts);
    }

    this.logger.info("Resolution complete", { ...countResolutions(results) });
    return results;
  }

  private async query(
    postId: string,
    signal?: AbortSignal,
  ): Promise<PostDeletionResult> {
    if (signal?.aborted) return unresolved(postId, [], CANCELLED);
    try {
      const captures = await this.index.lookup(postId, signal);
      return {
        postId,
        resolution: captures.length > 0 ? "archived" : "no-evidence",
        captures,
        downloads: [],
      };
    } catch (err) {
      if (isFatalGlobal(err)) throw err;
      if (err instanceof CancelledError) {
        return unresolved(postId, [], CANCELLED);
      }
      this.logger.warn(`Index lookup failed for ${postId}`, {
        error: errorMessage(err),
      });
      return unresolved(postId, [], errorMessage(err));
    }
  }

  private async checkExistence(
    results: PostDeletionResult[],
    signal?: AbortSignal,
  ): Promise<void> {
    const existence = this.existence;
    if (!existence) {
      throw new ConfigError("Existence check requested without a checker");
    }

    const candidates = results.filter((r) => r.resolution === "archived");
    for (let i = 0; i < candidates.length; i += existence.batchSize) {
      const chunk = candidates.slice(i, i + existence.batchSize);
      if (signal?.aborted) {
        for (const r of chunk) markUnresolved(r, CANCELLED);
        continue;
      }

      let statuses: Map<string, boolean>;
      try {
        statuses = await withRetry(
          () => existence.check(chunk.map((r) => r.postId)),
          { ...this.retry, signal },
        );
      } catch (err) {
        if (isFatalGlobal(err)) throw err;
        const reason =
          err instanceof CancelledError
            ? CANCELLED
            : `existence check failed: ${errorMessage(err)}`;
        if (reason !== CANCELLED) {
          this.logger.warn("Existence check failed", {
            posts: chunk.length,
            error: errorMessage(err),
          });
        }
        for (const r of chunk) markUnresolved(r, reason);
        continue;
      }

      for (const r of chunk) {
        const exists = statuses.get(r.postId);
        if (exists === undefined) {
          markUnresolved(r, "no live status returned");
        } else {
          r.exists = exists;
          r.resolution = exists ? "extant" : "deleted";
        }
      }
    }
  }

  private async download(
    results: PostDeletionResult[],
    opts: DeletionRunOptions,
  ): Promise<void> {
    const pipeline = this.pipeline;
    if (!pipeline) {
      throw new ConfigError(
        "Evidence download requested without a content store",
      );
    }

    const wanted: CaptureReference[] = [];
    for (const r of results) {
      if (r.resolution !== "deleted" && r.resolution !== "archived") continue;
      wanted.push(...(opts.allCaptures ? r.captures : r.captures.slice(-1)));
    }
    if (wanted.length === 0) return;

    this.logger.info("Downloading evidence", {
      captures: wanted.length,
      concurrency: opts.contentConcurrency,
    });
    const downloads = await pipeline.run(wanted, {
      concurrency: opts.contentConcurrency,
      signal: opts.signal,
      onResult: (_result, done, total) =>
        this.logger.progress(done, total, "Content"),
    });

    const byPost = new Map(results.map((r) => [r.postId, r]));
    for (const download of downloads) {
      byPost.get(download.capture.postId)?.downloads.push(download);
    }
  }
}

function unresolved(
  postId: string,
  captures: CaptureReference[],
  error: string,
): PostDeletionResult {
  return { postId, resolution: "unresolved", captures, error, downloads: [] };
}

function markUnresolved(result: PostDeletionResult, error: string): void {
  result.resolution = "unresolved";
  result.error = error;
}
