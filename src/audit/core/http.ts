import {
  ConnectionError,
  HttpStatusError,
  MalformedResponseError,
  RequestTimeoutError,
} from "./errors.js";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
  fetchImpl?: FetchLike;
}

/** Parses a Retry-After header given in seconds or as an HTTP date. */
export function parseRetryAfter(
  value: string | null,
  now: number = Date.now(),
): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(parseFloat(trimmed) * 1000);
  }
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

/**
 * Issues one GET and reads the whole body before the timeout fires. Failures
 * surface as the typed errors `classifyFailure` understands. Operator
 * cancellation is not forwarded: a request in flight completes or times out.
 */
export async function fetchBytes(
  url: string,
  opts: HttpOptions,
): Promise<Buffer> {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), opts.timeoutMs);

  try {
    const response = await fetchImpl(url, {
      headers: opts.headers,
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new HttpStatusError(
        response.status,
        url,
        parseRetryAfter(response.headers.get("retry-after")),
      );
    }
    return Buffer.from(await response.arrayBuffer());
  } catch (err) {
    if (err instanceof HttpStatusError) throw err;
    if (controller.signal.aborted) {
      throw new RequestTimeoutError(url, opts.timeoutMs);
    }
    if (err instanceof TypeError) {
      throw new ConnectionError(url, err);
    }
    throw err;
  } finally {
    clearTimeout(timer);
  }
}

export async function fetchJson(
  url: string,
  opts: HttpOptions,
): Promise<unknown> {
  const body = await fetchBytes(url, opts);
  const text = body.toString("utf-8");
  if (text.trim() === "") return undefined;
  try {
    return JSON.parse(text);
  } catch {
    throw new MalformedResponseError(`Invalid JSON from ${url}`);
  }
}
