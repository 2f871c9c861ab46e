import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  ConfigError,
  HttpStatusError,
  MalformedResponseError,
  StoreError,
} from "../../../src/audit/core/errors.js";
import { createPacer } from "../../../src/audit/core/pacing.js";
import { DownloadPipeline } from "../../../src/audit/core/pipeline.js";
import { SqliteContentStore } from "../../../src/audit/core/store.js";
import type {
  CaptureIndex,
  CaptureReference,
  ContentFetcher,
  ExistenceChecker,
  Logger,
} from "../../../src/audit/core/types.js";
import {
  countResolutions,
  DeletionWorkflow,
  exitCodeFor,
  uniqueIds,
} from "../../../src/audit/deleted/workflow.js";
import type { DeletionRunOptions } from "../../../src/audit/deleted/types.js";

function mockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    progress: vi.fn(),
  };
}

function ref(postId: string, timestamp: string): CaptureReference {
  const originalUrl = `https://twitter.com/example/status/${postId}`;
  return {
    postId,
    timestamp,
    originalUrl,
    captureUrl: `https://web.archive.org/web/${timestamp}id_/${originalUrl}`,
    screenName: "example",
  };
}

class FakeIndex implements CaptureIndex {
  readonly lookups: string[] = [];

  constructor(
    private readonly captures: Record<string, CaptureReference[] | Error>,
    private readonly latencyMs: Record<string, number> = {},
  ) {}

  async lookup(postId: string): Promise<CaptureReference[]> {
    this.lookups.push(postId);
    const latency = this.latencyMs[postId] ?? 0;
    if (latency > 0) await new Promise((resolve) => setTimeout(resolve, latency));
    const found = this.captures[postId] ?? [];
    if (found instanceof Error) throw found;
    return found;
  }
}

class FakeExistence implements ExistenceChecker {
  readonly batches: string[][] = [];
  private readonly failures = new Map<number, unknown>();

  constructor(
    private readonly live: Record<string, boolean>,
    readonly batchSize = 100,
  ) {}

  failBatch(batch: number, err: unknown): void {
    this.failures.set(batch, err);
  }

  async check(postIds: string[]): Promise<Map<string, boolean>> {
    const batch = this.batches.length;
    this.batches.push(postIds);
    const failure = this.failures.get(batch);
    if (failure !== undefined) throw failure;
    const out = new Map<string, boolean>();
    for (const id of postIds) {
      const live = this.live[id];
      if (live !== undefined) out.set(id, live);
    }
    return out;
  }
}

class FakeFetcher implements ContentFetcher {
  readonly calls: string[] = [];

  async download(capture: CaptureReference): Promise<Buffer> {
    this.calls.push(capture.captureUrl);
    return Buffer.from(`<html>${capture.postId} at ${capture.timestamp}</html>`);
  }
}

const RUN: DeletionRunOptions = {
  indexConcurrency: 3,
  contentConcurrency: 2,
  checkExistence: true,
  download: false,
};

describe("helpers", () => {
  it("drops repeated identifiers in first-seen order", () => {
    expect(uniqueIds(["3", "1", "3", "2", "1"])).toEqual(["3", "1", "2"]);
  });

  it("counts resolutions and derives the exit code", () => {
    const results = [
      { postId: "1", resolution: "deleted" as const, captures: [], downloads: [] },
      { postId: "2", resolution: "unresolved" as const, captures: [], downloads: [] },
    ];
    expect(countResolutions(results)).toEqual({
      deleted: 1,
      extant: 0,
      archived: 0,
      "no-evidence": 0,
      unresolved: 1,
    });
    expect(exitCodeFor(results)).toBe(1);
    expect(exitCodeFor(results.slice(0, 1))).toBe(0);
  });
});

describe("DeletionWorkflow", () => {
  it("resolves deleted, missing and live posts in input order", async () => {
    const index = new FakeIndex(
      {
        "101": [ref("101", "20200101000000")],
        "103": [ref("103", "20200101000000"), ref("103", "20210101000000")],
      },
      { "101": 20, "103": 5 },
    );
    const existence = new FakeExistence({ "101": false, "102": true, "103": true });
    const workflow = new DeletionWorkflow({ index, logger: mockLogger(), existence });

    const results = await workflow.run(["101", "102", "103"], RUN);

    expect(results.map((r) => [r.postId, r.resolution, r.exists])).toEqual([
      ["101", "deleted", false],
      ["102", "no-evidence", undefined],
      ["103", "extant", true],
    ]);
    expect(results[2].captures.map((c) => c.timestamp)).toEqual([
      "20200101000000",
      "20210101000000",
    ]);
    expect(existence.batches).toEqual([["101", "103"]]);
  });

  it("resolves each repeated identifier once", async () => {
    const index = new FakeIndex({ "1": [ref("1", "20200101000000")] });
    const workflow = new DeletionWorkflow({ index, logger: mockLogger() });

    const results = await workflow.run(["1", "2", "1"], { ...RUN, checkExistence: false });

    expect(results.map((r) => r.postId)).toEqual(["1", "2"]);
    expect(index.lookups).toEqual(["1", "2"]);
  });

  it("leaves posts archived when the live check is off", async () => {
    const index = new FakeIndex({ "1": [ref("1", "20200101000000")] });
    const workflow = new DeletionWorkflow({ index, logger: mockLogger() });

    const [result] = await workflow.run(["1"], { ...RUN, checkExistence: false });

    expect(result.resolution).toBe("archived");
    expect(result.exists).toBeUndefined();
  });

  it("marks a failed index lookup unresolved without affecting others", async () => {
    const index = new FakeIndex({
      "1": new HttpStatusError(404, "https://web.archive.org/cdx/search/cdx"),
      "2": [ref("2", "20200101000000")],
    });
    const workflow = new DeletionWorkflow({ index, logger: mockLogger() });

    const results = await workflow.run(["1", "2"], { ...RUN, checkExistence: false });

    expect(results.map((r) => [r.resolution, r.error])).toEqual([
      ["unresolved", "HTTP 404 for https://web.archive.org/cdx/search/cdx"],
      ["archived", undefined],
    ]);
  });

  it("ends the run on a store failure", async () => {
    const index = new FakeIndex({ "1": new StoreError("disk full") });
    const workflow = new DeletionWorkflow({ index, logger: mockLogger() });

    await expect(
      workflow.run(["1"], { ...RUN, checkExistence: false }),
    ).rejects.toBeInstanceOf(StoreError);
  });

  it("checks existence in batches and isolates a failed batch", async () => {
    const ids = ["1", "2", "3", "4", "5"];
    const index = new FakeIndex(
      Object.fromEntries(ids.map((id) => [id, [ref(id, "20200101000000")]])),
    );
    const existence = new FakeExistence({ "1": false, "2": true, "3": true, "4": false }, 2);
    existence.failBatch(1, new MalformedResponseError("Lookup response is not an object"));
    const workflow = new DeletionWorkflow({ index, logger: mockLogger(), existence });

    const results = await workflow.run(ids, RUN);

    expect(existence.batches).toEqual([["1", "2"], ["3", "4"], ["5"]]);
    expect(results.map((r) => [r.resolution, r.error])).toEqual([
      ["deleted", undefined],
      ["extant", undefined],
      ["unresolved", "existence check failed: Lookup response is not an object"],
      ["unresolved", "existence check failed: Lookup response is not an object"],
      ["unresolved", "no live status returned"],
    ]);
    expect(exitCodeFor(results)).toBe(1);
  });

  it("refuses a live check without a checker", async () => {
    const index = new FakeIndex({ "1": [ref("1", "20200101000000")] });
    const workflow = new DeletionWorkflow({ index, logger: mockLogger() });

    await expect(workflow.run(["1"], RUN)).rejects.toBeInstanceOf(ConfigError);
  });

  it("marks every post cancelled when the signal has aborted", async () => {
    const index = new FakeIndex({ "1": [ref("1", "20200101000000")] });
    const existence = new FakeExistence({ "1": false });
    const workflow = new DeletionWorkflow({ index, logger: mockLogger(), existence });
    const controller = new AbortController();
    controller.abort();

    const results = await workflow.run(["1", "2"], { ...RUN, signal: controller.signal });

    expect(results.map((r) => [r.resolution, r.error])).toEqual([
      ["unresolved", "cancelled"],
      ["unresolved", "cancelled"],
    ]);
    expect(index.lookups).toEqual([]);
    expect(existence.batches).toEqual([]);
  });

  describe("evidence downloads", () => {
    let tmpDir: string;
    let store: SqliteContentStore;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "post-audit-workflow-"));
      store = SqliteContentStore.open(tmpDir, mockLogger());
    });

    afterEach(() => {
      store.close();
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    function workflowWith(fetcher: ContentFetcher) {
      const index = new FakeIndex({
        "101": [ref("101", "20200101000000"), ref("101", "20210101000000")],
        "103": [ref("103", "20200101000000")],
      });
      const existence = new FakeExistence({ "101": false, "103": true });
      const pipeline = new DownloadPipeline({
        store,
        fetcher,
        pacer: createPacer("default", {
          bounds: { index: { initialDelayMs: 0 }, content: { initialDelayMs: 0 } },
        }),
        logger: mockLogger(),
      });
      return new DeletionWorkflow({ index, logger: mockLogger(), existence, pipeline });
    }

    it("downloads the latest capture of deleted posts only", async () => {
      const fetcher = new FakeFetcher();

      const results = await workflowWith(fetcher).run(["101", "102", "103"], {
        ...RUN,
        download: true,
      });

      expect(fetcher.calls).toEqual([ref("101", "20210101000000").captureUrl]);
      expect(results[0].downloads.map((d) => [d.capture.timestamp, d.status])).toEqual([
        ["20210101000000", "stored"],
      ]);
      expect(results[2].downloads).toEqual([]);
    });

    it("downloads every capture when asked", async () => {
      const fetcher = new FakeFetcher();

      const [result] = await workflowWith(fetcher).run(["101"], {
        ...RUN,
        download: true,
        allCaptures: true,
      });

      expect(result.downloads.map((d) => d.capture.timestamp)).toEqual([
        "20200101000000",
        "20210101000000",
      ]);
      expect(fetcher.calls).toHaveLength(2);
    });

    it("downloads nothing on a second run over the same store", async () => {
      const fetcher = new FakeFetcher();
      const opts = { ...RUN, download: true, allCaptures: true };

      await workflowWith(fetcher).run(["101", "102", "103"], opts);
      const callsAfterFirst = fetcher.calls.length;
      const second = await workflowWith(fetcher).run(["101", "102", "103"], opts);

      expect(callsAfterFirst).toBe(2);
      expect(fetcher.calls).toHaveLength(2);
      expect(second[0].downloads.map((d) => d.status)).toEqual(["cached", "cached"]);
    });

    it("refuses downloads without a pipeline", async () => {
      const index = new FakeIndex({ "1": [ref("1", "20200101000000")] });
      const workflow = new DeletionWorkflow({ index, logger: mockLogger() });

      await expect(
        workflow.run(["1"], { ...RUN, checkExistence: false, download: true }),
      ).rejects.toBeInstanceOf(ConfigError);
    });
  });
});
