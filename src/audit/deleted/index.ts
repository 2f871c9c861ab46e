export {
  CdxCaptureIndex,
  discoverPosts,
  groupByPost,
  isEvidence,
  PrefetchedCaptureIndex,
  toCaptureReference,
} from "./capture-index.js";
export type {
  CdxSearcher,
  Discovery,
  IndexRetryOptions,
} from "./capture-index.js";
export {
  formatListing,
  formatTimestamp,
  renderReport,
  toJsonlRecords,
} from "./report.js";
export type { RenderedReport } from "./report.js";
export { RESOLUTIONS } from "./types.js";
export type {
  DeletionRunOptions,
  PostDeletionResult,
  Resolution,
} from "./types.js";
export {
  countResolutions,
  DeletionWorkflow,
  exitCodeFor,
  uniqueIds,
} from "./workflow.js";
export type { DeletionWorkflowOptions } from "./workflow.js";
