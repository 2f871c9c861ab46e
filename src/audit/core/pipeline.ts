import { mapConcurrent } from "./concurrency.js";
import { contentDigest } from "./digest.js";
import { CancelledError, errorMessage, StoreError } from "./errors.js";
import type { Pacer } from "./pacing.js";
import { type PacedRetryOptions, pacedRetry } from "./retry.js";
import type {
  CaptureReference,
  ContentFetcher,
  ContentStore,
  DownloadResult,
  Logger,
} from "./types.js";

export interface DownloadPipelineOptions {
  store: ContentStore;
  fetcher: ContentFetcher;
  pacer: Pacer;
  logger: Logger;
  retry?: Pick<PacedRetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">;
}

export interface DownloadRunOptions {
  concurrency: number;
  signal?: AbortSignal;
  onResult?: (result: DownloadResult, done: number, total: number) => void;
}

/**
 * Fetches captures into the content store with bounded concurrency. The
 * content surface's permits are the only throttle; the pipeline adds none.
 *
 * Each capture fails on its own: a failed download becomes a `failed` result.
 * A StoreError ends the whole run.
 */
export class DownloadPipeline {
  private readonly store: ContentStore;
  private readonly fetcher: ContentFetcher;
  private readonly pacer: Pacer;
  private readonly logger: Logger;
  private readonly retry: DownloadPipelineOptions["retry"];

  constructor(opts: DownloadPipelineOptions) {
    this.store = opts.store;
    this.fetcher = opts.fetcher;
    this.pacer = opts.pacer;
    this.logger = opts.logger;
    this.retry = opts.retry;
  }

  async run(
    captures: readonly CaptureReference[],
    opts: DownloadRunOptions,
  ): Promise<DownloadResult[]> {
    let done = 0;
    return mapConcurrent(captures, opts.concurrency, async (capture) => {
      const result = await this.process(capture, opts.signal);
      done++;
      opts.onResult?.(result, done, captures.length);
      return result;
    });
  }

  private async process(
    capture: CaptureReference,
    signal?: AbortSignal,
  ): Promise<DownloadResult> {
    if (signal?.aborted) return failed(capture, "cancelled");

    try {
      const known = await this.store.lookup(capture.postId, capture.timestamp);
      if (known) {
        return {
          capture,
          status: "cached",
          digest: known,
          path: this.store.pathFor(known),
        };
      }

      if (capture.digest && (await this.store.has(capture.digest))) {
        await this.store.record(capture.postId, capture, capture.digest);
        return {
          capture,
          status: "cached",
          digest: capture.digest,
          path: this.store.pathFor(capture.digest),
        };
      }

      const bytes = await pacedRetry(
        this.pacer,
        "content",
        () => this.fetcher.download(capture),
        { ...this.retry, signal },
      );
      const digest = contentDigest(bytes);
      if (capture.digest && capture.digest !== digest) {
        this.logger.warn("Digest differs from archive index", {
          postId: capture.postId,
          timestamp: capture.timestamp,
          expected: capture.digest,
          actual: digest,
        });
      }

      const path = await this.store.put(digest, bytes, capture.postId);
      await this.store.record(capture.postId, capture, digest);
      this.logger.debug("Downloaded capture", {
        postId: capture.postId,
        timestamp: capture.timestamp,
        digest,
      });
      return { capture, status: "stored", digest, path };
    } catch (err) {
      if (err instanceof StoreError) throw err;
      if (err instanceof CancelledError) return failed(capture, "cancelled");
      this.logger.warn(`Download failed for ${capture.captureUrl}`, {
        error: errorMessage(err),
      });
      return failed(capture, errorMessage(err));
    }
  }
}

function failed(capture: CaptureReference, error: string): DownloadResult {
  return { capture, status: "failed", error };
}
