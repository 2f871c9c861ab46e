// Types
export { PACING_PROFILES, SURFACES } from "./types.js";
export type {
  CaptureIndex,
  CaptureReference,
  ContentFetcher,
  ContentStore,
  DigestMismatch,
  DownloadResult,
  DownloadStatus,
  ExistenceChecker,
  Logger,
  LogLevel,
  OutcomeClassification,
  OutcomeEvent,
  OutputWriter,
  PacingProfile,
  PacingSettings,
  PacingSnapshot,
  StoreStats,
  StoredCapture,
  Surface,
} from "./types.js";

// Errors
export {
  CancelledError,
  classifyFailure,
  ConfigError,
  ConnectionError,
  errorMessage,
  HttpStatusError,
  MalformedResponseError,
  RequestTimeoutError,
  StoreError,
} from "./errors.js";
export type { FailureClass } from "./errors.js";

// Config
export { loadConfig, parsePacingProfile } from "./config.js";
export type { AuditConfig, CliConfigInput } from "./config.js";

// Logger
export { ConsoleLogger, createLogger, levelFromVerbosity } from "./logger.js";

// Pacing
export {
  createPacer,
  OutcomeWindow,
  Pacer,
  PacingController,
} from "./pacing.js";
export { DEFAULT_TUNING, resolvePacingSettings } from "./profiles.js";
export type { PacingOverrides } from "./profiles.js";
export { installDiagnosticsSignal, Scoreboard } from "./scoreboard.js";

// Retry helper
export { pacedRetry, withRetry } from "./retry.js";
export type { PacedRetryOptions, RetryOptions } from "./retry.js";

// Content
export { contentDigest } from "./digest.js";
export { fetchBytes, fetchJson } from "./http.js";
export type { FetchLike } from "./http.js";
export { DownloadPipeline } from "./pipeline.js";
export { SqliteContentStore } from "./store.js";

// Output writer
export {
  createOutputWriter,
  FileOutputWriter,
  formatDocument,
} from "./output.js";

// Archive, platform and workflow
export * from "../wayback/index.js";
export * from "../twitter/index.js";
export * from "../deleted/index.js";
