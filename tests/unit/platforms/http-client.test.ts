import { describe, it, expect } from "vitest";
import { PlatformHttpClient } from "../../../src/platforms/http-client";
import { CredentialResolver } from "../../../src/platforms/credentials";
import { DouyinCrawler, DOUYIN_HEADERS } from "../../../src/platforms/douyin";
import { silentLogger } from "../../helpers/context";
import { json, scriptedFetch, type FakeResponse } from "../../helpers/fake-fetch";

function recordingSleep() {
  const sleeps: number[] = [];
  return { sleeps, sleep: async (ms: number) => void sleeps.push(ms) };
}

function client(script: Array<[string, FakeResponse | Error]>, options: { delayMs?: number; cookie?: string } = {}) {
  const { fetchImpl, requests } = scriptedFetch(script);
  const { sleeps, sleep } = recordingSleep();
  const http = new PlatformHttpClient({
    headers: { Accept: "application/json" },
    delayMs: options.delayMs ?? 0,
    timeoutMs: 30000,
    maxAttempts: 3,
    credentials: new CredentialResolver("weibo", { fallback: options.cookie ?? "" }),
    logger: silentLogger,
    fetchImpl,
    sleep,
  });
  return { http, requests, sleeps };
}

describe("PlatformHttpClient", () => {
  it("should return the body and pause for the platform delay", async () => {
    const { http, sleeps } = client([["/profile", { status: 200, body: "hello" }]], { delayMs: 3000 });

    const result = await http.get("https://example.test/profile");

    expect(result).toEqual({ ok: true, status: 200, body: "hello" });
    expect(sleeps).toEqual([3000]);
  });

  it("should back off 1s after a server error and succeed on the next attempt", async () => {
    const { http, sleeps } = client(
      [
        ["/profile", { status: 500 }],
        ["/profile", { status: 200, body: "ok" }],
      ],
      { delayMs: 2000 }
    );

    const result = await http.get("https://example.test/profile");

    expect(result.ok).toBe(true);
    expect(sleeps).toEqual([2000, 1000, 2000]);
  });

  it("should back off 5s per attempt for 429", async () => {
    const { http, sleeps } = client([
      ["/profile", { status: 429 }],
      ["/profile", { status: 429 }],
      ["/profile", { status: 429 }],
    ]);

    const result = await http.get("https://example.test/profile");

    expect(sleeps).toEqual([0, 5000, 0, 10000, 0]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("http_status");
      expect(result.error.status).toBe(429);
    }
  });

  it("should report network failures after the last attempt", async () => {
    const { http, sleeps } = client([
      ["/profile", new Error("connection reset")],
      ["/profile", new Error("connection reset")],
      ["/profile", new Error("connection reset")],
    ]);

    const result = await http.get("https://example.test/profile");

    expect(sleeps).toEqual([0, 2000, 0, 2000, 0]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("network");
      expect(result.error.message).toBe("Network error for https://example.test/profile: connection reset");
    }
  });

  it("should only send a Cookie header when a token resolves", async () => {
    const anonymous = client([["/a", { status: 200 }]]);
    await anonymous.http.get("https://example.test/a");
    expect(anonymous.requests[0]?.headers).toEqual({ Accept: "application/json" });

    const withCookie = client([["/b", { status: 200 }]], { cookie: "test-secret" });
    await withCookie.http.get("https://example.test/b");
    expect(withCookie.requests[0]?.headers).toEqual({ Accept: "application/json", Cookie: "test-secret" });
  });
});

describe("CredentialResolver", () => {
  it("should prefer the direct token, then the store, then the fallback", async () => {
    const store = { get: async (platform: string) => (platform === "douyin" ? "stored-token" : null) };

    expect(await new CredentialResolver("douyin", { direct: "direct-token", store, fallback: "static" }).resolve()).toBe(
      "direct-token"
    );
    expect(await new CredentialResolver("douyin", { store, fallback: "static" }).resolve()).toBe("stored-token");
    expect(await new CredentialResolver("weibo", { store, fallback: "static" }).resolve()).toBe("static");
    expect(await new CredentialResolver("weibo", { fallback: "" }).resolve()).toBe("");
  });
});

describe("Douyin crawler with a stored credential", () => {
  it("should send the stored token and give up after three 403 responses", async () => {
    const { fetchImpl, requests } = scriptedFetch([
      ["sec_user_id=sec-test-1", { status: 403 }],
      ["sec_user_id=sec-test-1", { status: 403 }],
      ["sec_user_id=sec-test-1", { status: 403 }],
    ]);
    const { sleeps, sleep } = recordingSleep();
    const credentials = new CredentialResolver("douyin", {
      store: { get: async () => "stored-token" },
      fallback: "",
    });
    const crawler = new DouyinCrawler(
      new PlatformHttpClient({
        headers: DOUYIN_HEADERS,
        delayMs: 2000,
        timeoutMs: 30000,
        maxAttempts: 3,
        credentials,
        logger: silentLogger,
        fetchImpl,
        sleep,
      }),
      silentLogger
    );

    const result = await crawler.fetchAccount("sec-test-1");

    expect(requests).toHaveLength(3);
    expect(requests.every((r) => r.headers["Cookie"] === "stored-token")).toBe(true);
    expect(sleeps).toEqual([2000, 2000, 2000, 4000, 2000]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("http_status");
      expect(result.error.status).toBe(403);
    }
  });

  it("should go unauthenticated when nothing is stored and the fallback is empty", async () => {
    const { fetchImpl, requests } = scriptedFetch([
      ["sec_user_id=sec-test-3", { status: 403 }],
      ["sec_user_id=sec-test-3", { status: 403 }],
      ["sec_user_id=sec-test-3", { status: 403 }],
    ]);
    const { sleeps, sleep } = recordingSleep();
    const crawler = new DouyinCrawler(
      new PlatformHttpClient({
        headers: DOUYIN_HEADERS,
        delayMs: 2000,
        timeoutMs: 30000,
        maxAttempts: 3,
        credentials: new CredentialResolver("douyin", { store: { get: async () => null }, fallback: "" }),
        logger: silentLogger,
        fetchImpl,
        sleep,
      }),
      silentLogger
    );

    const result = await crawler.fetchAccount("sec-test-3");

    expect(requests).toHaveLength(3);
    expect(requests.map((r) => "Cookie" in r.headers)).toEqual([false, false, false]);
    expect(sleeps).toEqual([2000, 2000, 2000, 4000, 2000]);
    expect(result).toMatchObject({ ok: false, error: { kind: "http_status", status: 403 } });
  });

  it("should parse a successful response", async () => {
    const { fetchImpl } = scriptedFetch([
      ["sec_user_id=sec-test-2", json({ status_code: 0, user: { nickname: "Test Creator", follower_count: 1234567 } })],
    ]);
    const crawler = new DouyinCrawler(
      new PlatformHttpClient({
        headers: DOUYIN_HEADERS,
        delayMs: 0,
        timeoutMs: 30000,
        maxAttempts: 3,
        credentials: new CredentialResolver("douyin", { fallback: "" }),
        logger: silentLogger,
        fetchImpl,
        sleep: async () => undefined,
      }),
      silentLogger
    );

    const result = await crawler.fetchAccount("sec-test-2");

    expect(result).toEqual({
      ok: true,
      account: { nativeId: "sec-test-2", displayName: "Test Creator", followerCount: 1234567, verified: false },
    });
  });
});
