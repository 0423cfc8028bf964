import { describe, it, expect, afterEach } from "vitest";
import { createTestContext, seedUncrawlableTask, type TestContext } from "../helpers/context";
import { json, scriptedFetch } from "../helpers/fake-fetch";
import type { FetchImpl } from "../../src/platforms/http-client";
import type { ExecutionOutcome } from "../../src/orchestration/scheduler/task-executor";

function weiboUser(name: string, followers: number) {
  return json({ ok: 1, data: { user: { screen_name: name, followers_count: followers } } });
}

describe("TaskExecutor", () => {
  let test: TestContext;

  afterEach(() => {
    test.cleanup();
  });

  async function taskId(name: string): Promise<number> {
    const task = await test.ctx.tasks.findByName(name);
    if (!task) throw new Error(`task ${name} not seeded`);
    return task.id;
  }

  it("should record a partial success when one target fails", async () => {
    const { fetchImpl } = scriptedFetch([
      ["uid=1001", weiboUser("First", 1500)],
      ["uid=1002", json({ ok: 0, msg: "user does not exist" })],
      ["uid=1003", weiboUser("Third", 1234567)],
    ]);
    const now = new Date("2024-05-01T15:59:00Z");
    test = createTestContext({ WEIBO_UID_LIST: "1001,1002,1003" }, { fetchImpl, clock: () => now });
    const id = await taskId("weibo_follower_crawler");

    const outcome = await test.ctx.executor.execute(id, "manual");

    expect(outcome).toMatchObject({
      kind: "completed",
      status: "partial_success",
      recordsCount: 3,
      successCount: 2,
      failedCount: 1,
    });

    const [log] = await test.ctx.taskLogs.list(id);
    expect(log).toMatchObject({
      status: "partial_success",
      recordsCount: 3,
      successCount: 2,
      failedCount: 1,
      startedAt: Date.parse("2024-05-01T15:59:00Z") / 1000,
      endedAt: Date.parse("2024-05-01T15:59:00Z") / 1000,
      errorMessage: "1002: Weibo returned an error for 1002: user does not exist",
    });

    const task = await test.ctx.tasks.findById(id);
    expect(task).toMatchObject({ status: "partial_success", retryCount: 0 });

    const weibo = await test.ctx.platforms.findByCode("weibo");
    const accounts = await test.ctx.accounts.list(weibo?.id);
    expect(accounts.map((a) => [a.nativeId, a.displayName])).toEqual([
      ["1001", "First"],
      ["1003", "Third"],
    ]);

    const third = accounts[1];
    expect(third).toBeDefined();
    if (third) {
      expect(await test.ctx.snapshots.latestFollowerCount(third.id)).toBe(1234567);
    }
  });

  it("should count a timed-out target as failed and keep the rest", async () => {
    const fetchImpl: FetchImpl = (url, init) => {
      if (url.includes("uid=1002")) {
        return new Promise<never>((_resolve, reject) => {
          init.signal.addEventListener("abort", () => reject(new Error("aborted")));
        });
      }
      const uid = url.slice(url.indexOf("uid=") + 4);
      return Promise.resolve({
        ok: true,
        status: 200,
        text: async () => JSON.stringify({ ok: 1, data: { user: { screen_name: `User ${uid}`, followers_count: 100 } } }),
      });
    };
    test = createTestContext(
      { WEIBO_UID_LIST: "1001,1002,1003", HTTP_TIMEOUT_SECONDS: "0.1" },
      { fetchImpl }
    );
    const id = await taskId("weibo_follower_crawler");

    const outcome = await test.ctx.executor.execute(id, "manual");

    expect(outcome).toMatchObject({ kind: "completed", status: "partial_success", successCount: 2, failedCount: 1 });
    const [log] = await test.ctx.taskLogs.list(id);
    expect(log?.errorMessage).toBe(
      "1002: Request timed out after 100ms: https://weibo.com/ajax/profile/info?uid=1002"
    );
    const weibo = await test.ctx.platforms.findByCode("weibo");
    const accounts = await test.ctx.accounts.list(weibo?.id);
    expect(accounts.map((a) => a.nativeId)).toEqual(["1001", "1003"]);
  });

  it("should keep an operator-assigned identity tag across crawls", async () => {
    const { fetchImpl } = scriptedFetch([
      ["uid=1001", weiboUser("First", 10)],
      ["uid=1001", weiboUser("First Renamed", 20)],
    ]);
    test = createTestContext({ WEIBO_UID_LIST: "1001" }, { fetchImpl });
    const id = await taskId("weibo_follower_crawler");
    const weibo = await test.ctx.platforms.findByCode("weibo");
    if (!weibo) throw new Error("weibo not seeded");

    await test.ctx.executor.execute(id, "manual");
    await test.ctx.accounts.setIdentityTag(weibo.id, "1001", "person-7");
    await test.ctx.executor.execute(id, "manual");

    const account = await test.ctx.accounts.findByNativeId(weibo.id, "1001");
    expect(account).toMatchObject({ displayName: "First Renamed", identityTag: "person-7" });

    const snapshots = await test.ctx.snapshots.query({ accountId: account?.id });
    expect(snapshots.map((s) => [s.followerCount, s.identityTag])).toEqual([
      [20, "person-7"],
      [10, "0"],
    ]);
  });

  it("should use the stored credential for every request", async () => {
    const { fetchImpl, requests } = scriptedFetch([
      ["sec_user_id=sec-1", json({ status_code: 0, user: { nickname: "One", follower_count: 1 } })],
      ["sec_user_id=sec-2", json({ status_code: 0, user: { nickname: "Two", follower_count: 2 } })],
    ]);
    test = createTestContext({ DOUYIN_SEC_USER_ID_LIST: "sec-1,sec-2", DOUYIN_COOKIE: "static-cookie" }, { fetchImpl });
    await test.ctx.credentials.save("douyin", "stored-token");

    const outcome = await test.ctx.executor.execute(await taskId("douyin_follower_crawler"), "scheduled");

    expect(outcome).toMatchObject({ kind: "completed", status: "success", successCount: 2 });
    expect(requests.map((r) => r.headers["Cookie"])).toEqual(["stored-token", "stored-token"]);
  });

  it("should mark an empty batch as failed without using the retry budget", async () => {
    test = createTestContext();
    const id = await taskId("xiaohongshu_follower_crawler");

    const outcome = await test.ctx.executor.execute(id, "manual");

    expect(outcome).toMatchObject({ kind: "completed", status: "failed", recordsCount: 0 });
    expect(await test.ctx.tasks.findById(id)).toMatchObject({ status: "failed", retryCount: 0 });
  });

  it("should reset the retry counter after a completed run", async () => {
    const { fetchImpl } = scriptedFetch([["uid=1001", weiboUser("First", 10)]]);
    test = createTestContext({ WEIBO_UID_LIST: "1001" }, { fetchImpl });
    const id = await taskId("weibo_follower_crawler");
    await test.ctx.tasks.updateStatus(id, { status: "retrying", retryCount: 2 });

    await test.ctx.executor.execute(id, "retry");

    expect(await test.ctx.tasks.findById(id)).toMatchObject({ status: "success", retryCount: 0 });
  });

  it("should consume the retry budget on batch faults", async () => {
    test = createTestContext();
    seedUncrawlableTask(test.ctx);
    const id = await taskId("other_follower_crawler");

    const outcomes: ExecutionOutcome[] = [];
    for (let i = 0; i < 4; i++) {
      outcomes.push(await test.ctx.executor.execute(id, i === 0 ? "scheduled" : "retry"));
    }

    expect(outcomes.map((o) => (o.kind === "faulted" ? [o.retryCount, o.willRetry] : o.kind))).toEqual([
      [1, true],
      [2, true],
      [3, true],
      [4, false],
    ]);
    expect(outcomes[0]).toMatchObject({ error: "No crawler for platform other" });
    expect(await test.ctx.tasks.findById(id)).toMatchObject({ status: "failed", retryCount: 4 });

    const logs = await test.ctx.taskLogs.list(id);
    expect(logs).toHaveLength(4);
    expect(logs.every((l) => l.status === "failed" && l.errorMessage === "No crawler for platform other")).toBe(true);
  });

  it("should skip a disabled task without writing a log", async () => {
    test = createTestContext({ WEIBO_UID_LIST: "1001" });
    await test.ctx.tasks.updateSchedule("weibo_follower_crawler", "23:59", false);
    const id = await taskId("weibo_follower_crawler");

    const outcome = await test.ctx.executor.execute(id, "manual");

    expect(outcome).toEqual({ kind: "skipped", taskId: id, reason: "disabled" });
    expect(await test.ctx.taskLogs.list(id)).toEqual([]);
    expect(await test.ctx.tasks.findById(id)).toMatchObject({ status: "idle" });
  });

  it("should skip an unknown task id", async () => {
    test = createTestContext();
    expect(await test.ctx.executor.execute(999, "manual")).toEqual({ kind: "skipped", taskId: 999, reason: "not_found" });
  });

  it("should not run the same task twice at once", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const fetchImpl: FetchImpl = async () => {
      await gate;
      return { ok: true, status: 200, text: async () => JSON.stringify({ ok: 1, data: { user: { screen_name: "A", followers_count: 1 } } }) };
    };
    test = createTestContext({ WEIBO_UID_LIST: "1001" }, { fetchImpl });
    const id = await taskId("weibo_follower_crawler");

    const first = test.ctx.executor.execute(id, "scheduled");
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(test.ctx.executor.isRunning(id)).toBe(true);

    const second = await test.ctx.executor.execute(id, "manual");
    expect(second).toEqual({ kind: "skipped", taskId: id, reason: "locked" });

    release();
    expect(await first).toMatchObject({ kind: "completed", status: "success" });
    expect(test.ctx.executor.isRunning(id)).toBe(false);
    expect(await test.ctx.taskLogs.list(id)).toHaveLength(1);
  });
});
