export {
  parseCdxRows,
  parseTimestamp,
  rawCaptureUrl,
  viewCaptureUrl,
  WAYBACK_BASE_URL,
  WaybackClient,
} from "./client.js";
export type { CdxEntry, WaybackClientOptions } from "./types.js";
