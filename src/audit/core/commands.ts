/**
 * Command implementations behind the CLI. Each returns the process exit
 * status; output goes through the injected IO so the commands run in tests.
 */

import * as path from "node:path";
import { CdxCaptureIndex, discoverPosts } from "../deleted/capture-index.js";
import {
  formatListing,
  renderReport,
  toJsonlRecords,
} from "../deleted/report.js";
import { DeletionWorkflow, exitCodeFor } from "../deleted/workflow.js";
import { TwitterExistenceChecker } from "../twitter/existence.js";
import { extractStatusId, isPostId } from "../twitter/status.js";
import { WaybackClient } from "../wayback/client.js";
import { type AuditConfig, loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import type { FetchLike } from "./http.js";
import { createLogger, levelFromVerbosity } from "./logger.js";
import { createOutputWriter, formatDocument } from "./output.js";
import { createPacer } from "./pacing.js";
import { DownloadPipeline } from "./pipeline.js";
import {
  installDiagnosticsSignal,
  Scoreboard,
  type SignalTarget,
} from "./scoreboard.js";
import { SqliteContentStore } from "./store.js";
import { type CaptureIndex, type Logger, PACING_PROFILES } from "./types.js";

export interface CommandIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readStdin?: () => Promise<string>;
}

export interface CommandDeps {
  env: Record<string, string | undefined>;
  io: CommandIO;
  fetchImpl?: FetchLike;
  signal?: AbortSignal;
  /** Where the diagnostics signal is listened for; defaults to the process. */
  signalTarget?: SignalTarget;
  now?: () => Date;
}

/** Raw option values from commander. */
export interface DeletedCommandOptions {
  stdin?: boolean;
  limit?: string;
  report?: boolean;
  output?: string;
  jsonl?: string;
  store?: string;
  pacing?: string;
  indexConcurrency?: string;
  contentConcurrency?: string;
  check?: boolean;
  allCaptures?: boolean;
  verbose?: number;
}

// ─── Input ───

/** Accepts bare identifiers and post URLs. */
export function parsePostIds(tokens: readonly string[]): string[] {
  const ids: string[] = [];
  for (const token of tokens) {
    const trimmed = token.trim();
    if (trimmed === "") continue;
    const id = isPostId(trimmed) ? trimmed : extractStatusId(trimmed);
    if (!id) {
      throw new ConfigError(`Not a post identifier or URL: ${trimmed}`);
    }
    ids.push(id);
  }
  return ids;
}

function parseLimit(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`--limit must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function exitCodeForError(err: unknown): number {
  return err instanceof ConfigError ? 2 : 1;
}

// ─── deleted ───

export async function runDeleted(
  screenName: string,
  args: readonly string[],
  opts: DeletedCommandOptions,
  deps: CommandDeps,
): Promise<number> {
  const config = loadConfig(deps.env, {
    pacing: opts.pacing,
    indexConcurrency: opts.indexConcurrency,
    contentConcurrency: opts.contentConcurrency,
    check: opts.check,
    store: opts.store,
  });
  const limit = parseLimit(opts.limit);
  const tokens = [...args];
  if (opts.stdin) {
    if (!deps.io.readStdin) {
      throw new ConfigError("Standard input is not available");
    }
    tokens.push(...(await deps.io.readStdin()).split(/\s+/));
  }
  const explicitIds = parsePostIds(tokens);
  const download = Boolean(opts.report || opts.store);

  const logger = createLogger("deleted", levelFromVerbosity(opts.verbose ?? 0));
  const pacer = createPacer(config.pacing, config.pacingOverrides);
  const disposeDiagnostics = installDiagnosticsSignal(new Scoreboard(pacer), {
    target: deps.signalTarget,
    write: deps.io.stderr,
  });

  const client = new WaybackClient({
    timeoutMs: config.requestTimeoutMs,
    logger,
    fetchImpl: deps.fetchImpl,
  });
  let store: SqliteContentStore | undefined;

  try {
    if (download) store = SqliteContentStore.open(config.storeDir, logger);

    let postIds: string[];
    let index: CaptureIndex;
    if (explicitIds.length === 0 && !opts.stdin) {
      const discovery = await discoverPosts({
        client,
        pacer,
        screenName,
        limit,
        signal: deps.signal,
      });
      logger.info("Discovered archived posts", {
        posts: discovery.postIds.length,
      });
      postIds = discovery.postIds;
      index = discovery.index;
    } else {
      postIds = limit === undefined ? explicitIds : explicitIds.slice(0, limit);
      index = new CdxCaptureIndex({ client, pacer, screenName });
    }

    const workflow = new DeletionWorkflow({
      index,
      logger,
      existence: existenceChecker(config, logger, deps.fetchImpl),
      pipeline: store
        ? new DownloadPipeline({ store, fetcher: client, pacer, logger })
        : undefined,
    });
    const results = await workflow.run(postIds, {
      indexConcurrency: config.indexConcurrency,
      contentConcurrency: config.contentConcurrency,
      checkExistence: config.checkExistence,
      download,
      allCaptures: opts.allCaptures,
      signal: deps.signal,
    });

    if (opts.report) {
      const report = renderReport(results, {
        screenName,
        generatedAt: deps.now?.() ?? new Date(),
      });
      if (opts.output) {
        await createOutputWriter(path.dirname(opts.output)).writeDocument(
          path.basename(opts.output),
          report.frontmatter,
          report.body,
        );
      } else {
        deps.io.stdout(formatDocument(report.frontmatter, report.body));
      }
    } else {
      deps.io.stdout(formatListing(results));
    }

    if (opts.jsonl) {
      await createOutputWriter(path.dirname(opts.jsonl)).writeJsonl(
        path.basename(opts.jsonl),
        toJsonlRecords(results),
      );
    }

    if (deps.signal?.aborted) return 1;
    return exitCodeFor(results);
  } finally {
    store?.close();
    disposeDiagnostics();
  }
}

function existenceChecker(
  config: AuditConfig,
  logger: Logger,
  fetchImpl?: FetchLike,
): TwitterExistenceChecker | undefined {
  if (!config.checkExistence || !config.bearerToken) return undefined;
  return new TwitterExistenceChecker({
    bearerToken: config.bearerToken,
    timeoutMs: config.requestTimeoutMs,
    logger,
    fetchImpl,
  });
}

// ─── store ───

function openStore(
  store: string | undefined,
  deps: CommandDeps,
): SqliteContentStore {
  const config = loadConfig(deps.env, { check: false, store });
  return SqliteContentStore.open(
    config.storeDir,
    createLogger("store", "warn"),
  );
}

export async function runStoreStats(
  opts: { store?: string },
  deps: CommandDeps,
): Promise<number> {
  const store = openStore(opts.store, deps);
  try {
    const stats = await store.stats();
    deps.io.stdout(
      `files: ${stats.files}\nposts: ${stats.posts}\nlinks: ${stats.links}\nbytes: ${stats.bytes}\n`,
    );
    return 0;
  } finally {
    store.close();
  }
}

/** Lists the captures of one post, or every stored link with its post. */
export async function runStoreLookup(
  postId: string | undefined,
  opts: { store?: string },
  deps: CommandDeps,
): Promise<number> {
  const store = openStore(opts.store, deps);
  try {
    if (postId === undefined) {
      for (const c of await store.captures()) {
        deps.io.stdout(
          `${c.postId} ${c.timestamp} ${c.digest} ${c.path} ${c.captureUrl}\n`,
        );
      }
      return 0;
    }
    const captures = await store.lookupPost(postId);
    if (captures.length === 0) {
      deps.io.stderr(`No stored captures for ${postId}\n`);
      return 1;
    }
    for (const c of captures) {
      deps.io.stdout(`${c.timestamp} ${c.digest} ${c.path} ${c.captureUrl}\n`);
    }
    return 0;
  } finally {
    store.close();
  }
}

/** Writes the decompressed bytes stored under a digest. */
export async function runStoreCat(
  digest: string,
  opts: { store?: string },
  deps: CommandDeps,
): Promise<number> {
  const store = openStore(opts.store, deps);
  try {
    const bytes = await store.read(digest);
    if (bytes === undefined) {
      deps.io.stderr(`No stored content for ${digest}\n`);
      return 1;
    }
    deps.io.stdout(bytes.toString("utf-8"));
    return 0;
  } finally {
    store.close();
  }
}

export async function runStoreVerify(
  opts: { store?: string },
  deps: CommandDeps,
): Promise<number> {
  const store = openStore(opts.store, deps);
  try {
    const mismatches = await store.verify();
    for (const m of mismatches) {
      deps.io.stdout(`${m.digest} ${m.actual ?? "missing"}\n`);
    }
    return mismatches.length === 0 ? 0 : 1;
  } finally {
    store.close();
  }
}

// ─── pacing ───

/** Prints every profile's parameters as the scoreboard of a fresh pacer. */
export function runPacing(deps: CommandDeps): number {
  const config = loadConfig(deps.env, { check: false });
  const takenAt = deps.now?.() ?? new Date();
  for (const profile of PACING_PROFILES) {
    const pacer = createPacer(profile, config.pacingOverrides);
    const scoreboard = new Scoreboard(pacer);
    const text = scoreboard.format(scoreboard.snapshot(takenAt));
    deps.io.stdout(`[${profile}]\n${text}`);
  }
  return 0;
}
