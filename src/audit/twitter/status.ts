const STATUS_URL =
  /^https?:\/\/(?:www\.|mobile\.)?(?:twitter|x)\.com(?::\d+)?\/([^/?#]+)\/status\/(\d+)\/?(?:\?.*)?$/i;

export interface StatusRef {
  screenName: string;
  postId: string;
}

/** Parses a post URL; photo, video and other sub-pages do not match. */
export function parseStatusUrl(url: string): StatusRef | undefined {
  const m = STATUS_URL.exec(url);
  if (!m) return undefined;
  return { screenName: m[1], postId: m[2] };
}

export function extractStatusId(url: string): string | undefined {
  return parseStatusUrl(url)?.postId;
}

/** Archive index query matching every post URL of an account. */
export function accountStatusQuery(screenName: string): string {
  return `twitter.com/${screenName}/status/*`;
}

/** Archive index query matching one post and its query-string variants. */
export function postStatusQuery(screenName: string, postId: string): string {
  return `twitter.com/${screenName}/status/${postId}*`;
}

export function isPostId(value: string): boolean {
  return /^\d{1,20}$/.test(value);
}
