/** Core type definitions for post-archive-audit. */

// ─── Surfaces ───

/** The two independently throttled request channels of the archive. */
export type Surface = "index" | "content";

export const SURFACES: readonly Surface[] = ["index", "content"];

// ─── Pacing ───

export type PacingProfile = "conservative" | "default" | "adaptive";

export const PACING_PROFILES: readonly PacingProfile[] = [
  "conservative",
  "default",
  "adaptive",
];

export type OutcomeClassification = "success" | "throttled" | "error";

export interface OutcomeEvent {
  surface: Surface;
  /** Epoch milliseconds at which the attempt completed. */
  at: number;
  classification: OutcomeClassification;
  latencyMs: number;
}

/** Delay bounds for one surface. Fixed profiles use `initialDelayMs` only. */
export interface SurfaceBounds {
  initialDelayMs: number;
  floorMs: number;
  ceilingMs: number;
}

export interface AdaptiveTuning {
  /** Delay multiplier on backpressure (fast backoff). */
  backoffFactor: number;
  /** Delay multiplier on sustained success (slow recovery), below 1. */
  recoveryFactor: number;
  /** Quiet period without throttled/error events before recovery resumes. */
  sustainMs: number;
  /** Errors within the sustain period that count as backpressure. */
  errorBurst: number;
  cooldownOnThrottledMs: number;
  cooldownOnErrorMs: number;
  cooldownGrowth: number;
  maxPenaltyLevel: number;
  maxCooldownMs: number;
}

export interface PacingSettings {
  profile: PacingProfile;
  bounds: Record<Surface, SurfaceBounds>;
  tuning: AdaptiveTuning;
  /** Capacity of the trailing outcome window. */
  windowSize: number;
}

export interface WindowCounts {
  success: number;
  throttled: number;
  error: number;
}

/** Point-in-time copy of one controller's state. */
export interface PacingSnapshot {
  surface: Surface;
  profile: PacingProfile;
  delayMs: number;
  floorMs: number;
  ceilingMs: number;
  cooldownRemainingMs: number;
  penaltyLevel: number;
  window: WindowCounts;
  totals: WindowCounts;
}

// ─── Captures ───

export interface CaptureReference {
  postId: string;
  /** Archive timestamp, `YYYYMMDDhhmmss` (UTC). */
  timestamp: string;
  /** URL of the archived page, as the archive indexes it. */
  originalUrl: string;
  /** URL that serves the captured bytes unmodified. */
  captureUrl: string;
  /** Digest reported by the archive index, when known. */
  digest?: string;
  mimetype?: string;
  /** Account that owns the post, when known. */
  screenName?: string;
}

// ─── Content Store ───

export interface StoredCapture {
  postId: string;
  timestamp: string;
  captureUrl: string;
  digest: string;
  path: string;
  screenName: string | null;
}

export interface StoreStats {
  files: number;
  posts: number;
  links: number;
  bytes: number;
}

export interface DigestMismatch {
  digest: string;
  /** Digest of the stored bytes; null when the file is gone or unreadable. */
  actual: string | null;
}

export interface ContentStore {
  lookup(postId: string, timestamp: string): Promise<string | undefined>;
  has(digest: string): Promise<boolean>;
  put(digest: string, bytes: Buffer, discoveredBy?: string): Promise<string>;
  record(
    postId: string,
    capture: Pick<CaptureReference, "timestamp" | "captureUrl" | "screenName">,
    digest: string,
  ): Promise<void>;
  pathFor(digest: string): string;
}

// ─── Collaborators ───

export interface ContentFetcher {
  download(capture: CaptureReference): Promise<Buffer>;
}

export interface CaptureIndex {
  lookup(postId: string, signal?: AbortSignal): Promise<CaptureReference[]>;
}

export interface ExistenceChecker {
  /** Largest number of identifiers accepted by one `check` call. */
  readonly batchSize: number;
  check(postIds: string[]): Promise<Map<string, boolean>>;
}

// ─── Download Pipeline ───

export type DownloadStatus = "stored" | "cached" | "failed";

export interface DownloadResult {
  capture: CaptureReference;
  status: DownloadStatus;
  digest?: string;
  path?: string;
  error?: string;
}

// ─── Logger ───

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  progress(current: number, total: number, label: string): void;
}

// ─── Output Writer ───

export interface OutputWriter {
  writeDocument(
    relativePath: string,
    frontmatter: Record<string, unknown>,
    body: string,
  ): Promise<void>;
  writeJsonl(
    relativePath: string,
    records: Record<string, unknown>[],
  ): Promise<void>;
}
