import { describe, expect, it, vi } from "vitest";
import { MalformedResponseError } from "../../../src/audit/core/errors.js";
import type { FetchLike } from "../../../src/audit/core/http.js";
import type { Logger } from "../../../src/audit/core/types.js";
import {
  parseLookupResponse,
  TwitterExistenceChecker,
} from "../../../src/audit/twitter/existence.js";

function mockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    progress: vi.fn(),
  };
}

describe("parseLookupResponse", () => {
  it("collects identifiers under data", () => {
    const found = parseLookupResponse({
      data: [{ id: "1", text: "hello" }, { id: "3" }],
      errors: [{ value: "2", detail: "Could not find tweet" }],
    });
    expect([...found]).toEqual(["1", "3"]);
  });

  it("treats a response with only errors as nothing found", () => {
    expect(parseLookupResponse({ errors: [{ value: "2" }] }).size).toBe(0);
  });

  it("rejects unexpected shapes", () => {
    expect(() => parseLookupResponse(undefined)).toThrow(MalformedResponseError);
    expect(() => parseLookupResponse({ data: {} })).toThrow(MalformedResponseError);
    expect(() => parseLookupResponse({ data: [{ id: 1 }] })).toThrow(MalformedResponseError);
  });
});

describe("TwitterExistenceChecker", () => {
  it("sends one authorized request per batch and maps every id", async () => {
    const requests: { url: string; auth: string | null }[] = [];
    const fetchImpl: FetchLike = async (url, init) => {
      requests.push({ url, auth: new Headers(init?.headers).get("authorization") });
      return new Response(JSON.stringify({ data: [{ id: "1" }] }));
    };
    const checker = new TwitterExistenceChecker({
      bearerToken: "test-secret",
      timeoutMs: 1000,
      logger: mockLogger(),
      fetchImpl,
    });

    const statuses = await checker.check(["1", "2"]);

    expect(requests).toEqual([
      { url: "https://api.twitter.com/2/tweets?ids=1,2", auth: "Bearer test-secret" },
    ]);
    expect([...statuses]).toEqual([
      ["1", true],
      ["2", false],
    ]);
  });

  it("skips the request for an empty batch", async () => {
    const fetchImpl = vi.fn<FetchLike>();
    const checker = new TwitterExistenceChecker({
      bearerToken: "test-secret",
      timeoutMs: 1000,
      logger: mockLogger(),
      fetchImpl,
    });

    expect((await checker.check([])).size).toBe(0);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("refuses more ids than one lookup accepts", async () => {
    const checker = new TwitterExistenceChecker({
      bearerToken: "test-secret",
      timeoutMs: 1000,
      logger: mockLogger(),
    });
    const ids = Array.from({ length: 101 }, (_, i) => String(i + 1));

    await expect(checker.check(ids)).rejects.toBeInstanceOf(RangeError);
  });
});
