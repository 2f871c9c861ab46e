export {
  LOOKUP_BATCH_SIZE,
  parseLookupResponse,
  TWEETS_LOOKUP_URL,
  TwitterExistenceChecker,
} from "./existence.js";
export type { TwitterExistenceCheckerOptions } from "./existence.js";
export {
  accountStatusQuery,
  extractStatusId,
  isPostId,
  parseStatusUrl,
  postStatusQuery,
} from "./status.js";
export type { StatusRef } from "./status.js";
