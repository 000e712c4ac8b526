import { describe, expect, it, vi } from "vitest";

import { AuthError, NetworkError, ParseError, RateLimitedError } from "../errors.js";
import {
  buildBansUrl,
  createBattleMetricsBanReader,
  parseBanList,
  parseRetryAfterMs,
} from "./battlemetrics.js";

function jsonResponse(body: unknown, init?: ResponseInit) {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
    ...init,
  });
}

function readerWith(fetchImpl: typeof fetch) {
  return createBattleMetricsBanReader({
    baseUrl: "https://bm.test",
    timeoutMs: 1_000,
    fetchImpl,
  });
}

describe("buildBansUrl", () => {
  it("filters active bans of one server", () => {
    const url = new URL(buildBansUrl("https://bm.test", "31762279"));
    expect(url.pathname).toBe("/bans");
    expect(url.searchParams.get("filter[server]")).toBe("31762279");
    expect(url.searchParams.get("filter[expired]")).toBe("false");
    expect(url.searchParams.get("include")).toBe("user,server");
    expect(url.searchParams.get("page[size]")).toBe("100");
  });
});

describe("parseBanList", () => {
  it("maps attributes and orders bans oldest first", () => {
    const records = parseBanList({
      data: [
        {
          id: "b-2",
          attributes: {
            reason: "Teamkilling",
            timestamp: "2026-03-02T10:00:00.000Z",
            expires: null,
            identifiers: [
              { type: "steamID", identifier: "7656" },
              { type: "name", identifier: "Sniper" },
            ],
          },
        },
        {
          id: 1,
          attributes: {
            reason: "   ",
            timestamp: "2026-03-01T10:00:00.000Z",
            expires: "2026-04-01T10:00:00.000Z",
            identifiers: [42],
          },
        },
        { id: "b-0" },
      ],
    });

    expect(records).toEqual([
      {
        id: "1",
        reason: "No reason provided",
        playerName: "Unknown",
        timestamp: "2026-03-01T10:00:00.000Z",
        expiresAt: "2026-04-01T10:00:00.000Z",
      },
      {
        id: "b-2",
        reason: "Teamkilling",
        playerName: "Sniper",
        timestamp: "2026-03-02T10:00:00.000Z",
        expiresAt: null,
      },
      {
        id: "b-0",
        reason: "No reason provided",
        playerName: "Unknown",
        timestamp: null,
        expiresAt: null,
      },
    ]);
  });

  it("breaks timestamp ties on id", () => {
    const ts = "2026-03-01T10:00:00.000Z";
    const records = parseBanList({
      data: [
        { id: "c", attributes: { timestamp: ts } },
        { id: "a", attributes: { timestamp: ts } },
      ],
    });
    expect(records.map((r) => r.id)).toEqual(["a", "c"]);
  });

  it("rejects documents without a data array", () => {
    expect(() => parseBanList({ errors: [] })).toThrow(ParseError);
  });
});

describe("parseRetryAfterMs", () => {
  it("reads seconds and HTTP dates", () => {
    expect(parseRetryAfterMs("30")).toBe(30_000);
    expect(parseRetryAfterMs("Thu, 01 Jan 2026 00:01:00 GMT", Date.UTC(2026, 0, 1))).toBe(60_000);
    expect(parseRetryAfterMs(null)).toBeUndefined();
    expect(parseRetryAfterMs("soon")).toBeUndefined();
  });
});

describe("createBattleMetricsBanReader", () => {
  it("sends the bearer token and returns parsed bans", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse({ data: [{ id: "b-1", attributes: { reason: "Cheating" } }] }),
    );
    const bans = await readerWith(fetchImpl)("test-secret", "99");
    expect(bans.map((b) => b.id)).toEqual(["b-1"]);
    const init = fetchImpl.mock.calls[0]?.[1];
    expect(new Headers(init?.headers).get("authorization")).toBe("Bearer test-secret");
  });

  it.each([401, 403])("maps %i to AuthError", async (status) => {
    const read = readerWith(async () => jsonResponse({ errors: [] }, { status }));
    await expect(read("test-secret", "99")).rejects.toBeInstanceOf(AuthError);
  });

  it("maps 429 to RateLimited with the retry hint", async () => {
    const read = readerWith(async () =>
      jsonResponse({ errors: [] }, { status: 429, headers: { "retry-after": "12" } }),
    );
    const err = await read("test-secret", "99").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RateLimitedError);
    expect(err instanceof RateLimitedError ? err.retryAfterMs : undefined).toBe(12_000);
  });

  it("maps 5xx and transport failures to NetworkError", async () => {
    const serverError = readerWith(async () => jsonResponse({}, { status: 503 }));
    await expect(serverError("test-secret", "99")).rejects.toBeInstanceOf(NetworkError);
    const offline = readerWith(async () => {
      throw new TypeError("fetch failed");
    });
    await expect(offline("test-secret", "99")).rejects.toBeInstanceOf(NetworkError);
  });

  it("maps a non-JSON body to ParseError", async () => {
    const read = readerWith(async () => new Response("<html>", { status: 200 }));
    await expect(read("test-secret", "99")).rejects.toBeInstanceOf(ParseError);
  });
});
