/** Deletion-detection type definitions. */

import type { DownloadResult, CaptureReference } from "../core/types.js";

// ─── Resolution ───

/**
 * - `deleted`: captures found, post no longer live
 * - `extant`: captures found, post still live
 * - `archived`: captures found, live status not checked
 * - `no-evidence`: the archive holds no usable capture
 * - `unresolved`: lookup failed or was cancelled
 */
export type Resolution =
  | "deleted"
  | "extant"
  | "archived"
  | "no-evidence"
  | "unresolved";

export const RESOLUTIONS: readonly Resolution[] = [
  "deleted",
  "extant",
  "archived",
  "no-evidence",
  "unresolved",
];

export interface PostDeletionResult {
  postId: string;
  resolution: Resolution;
  /** Evidence captures, oldest first. */
  captures: CaptureReference[];
  /** Live status, when it was checked. */
  exists?: boolean;
  /** Why the post is unresolved. */
  error?: string;
  downloads: DownloadResult[];
}

// ─── Workflow Options ───

export interface DeletionRunOptions {
  indexConcurrency: number;
  contentConcurrency: number;
  checkExistence: boolean;
  /** Materialize evidence for deleted and archived posts. */
  download: boolean;
  /** Download every capture instead of the most recent one. */
  allCaptures?: boolean;
  signal?: AbortSignal;
}
