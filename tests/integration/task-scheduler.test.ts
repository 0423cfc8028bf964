import { describe, it, expect, afterEach, vi } from "vitest";
import { createTestContext, seedUncrawlableTask, type TestContext } from "../helpers/context";
import { json, scriptedFetch } from "../helpers/fake-fetch";
import { SchedulingError, ValidationError } from "../../src/core/errors";
import { unixSeconds } from "../../src/core/time";
import type { TaskStatusView } from "../../src/orchestration/scheduler/task-scheduler";

// Long enough that the interval never fires on its own during a test.
const QUIET_ENV = { SCHEDULER_TICK_MS: "3600000" };

function statusOf(tasks: TaskStatusView[], name: string): TaskStatusView {
  const view = tasks.find((t) => t.name === name);
  if (!view) throw new Error(`no status for ${name}`);
  return view;
}

describe("TaskScheduler", () => {
  let test: TestContext;
  let now: Date;

  afterEach(async () => {
    await test.ctx.scheduler.stop(100);
    await test.ctx.scheduler.drain();
    vi.useRealTimers();
    test.cleanup();
  });

  it("should compute the next firing for every enabled task on start", async () => {
    now = new Date(2024, 4, 1, 12, 0, 0);
    test = createTestContext(QUIET_ENV, { clock: () => now });

    await test.ctx.scheduler.start();
    const status = await test.ctx.scheduler.getStatus();

    expect(status.running).toBe(true);
    const expected = unixSeconds(new Date(2024, 4, 1, 23, 59, 0));
    expect(status.tasks.map((t) => [t.name, t.nextRunAt])).toEqual([
      ["weibo_follower_crawler", expected],
      ["xiaohongshu_follower_crawler", expected],
      ["douyin_follower_crawler", expected],
    ]);
    expect((await test.ctx.tasks.findByName("weibo_follower_crawler"))?.nextRunAt).toBe(expected);
  });

  it("should fire due tasks on tick and move them to the next day", async () => {
    const { fetchImpl } = scriptedFetch([
      ["uid=1001", json({ ok: 1, data: { user: { screen_name: "First", followers_count: 42 } } })],
    ]);
    now = new Date(2024, 4, 1, 23, 58, 0);
    test = createTestContext({ ...QUIET_ENV, WEIBO_UID_LIST: "1001" }, { fetchImpl, clock: () => now });
    await test.ctx.scheduler.start();

    await test.ctx.scheduler.tick();
    await test.ctx.scheduler.drain();
    expect(await test.ctx.taskLogs.list()).toEqual([]);

    now = new Date(2024, 4, 1, 23, 59, 30);
    await test.ctx.scheduler.tick();
    await test.ctx.scheduler.drain();

    const weibo = await test.ctx.tasks.findByName("weibo_follower_crawler");
    expect(weibo).toMatchObject({
      status: "success",
      lastRunAt: unixSeconds(now),
      nextRunAt: unixSeconds(new Date(2024, 4, 2, 23, 59, 0)),
    });
    expect(await test.ctx.taskLogs.list()).toHaveLength(3);

    // Same minute again: already advanced, nothing fires twice.
    await test.ctx.scheduler.tick();
    await test.ctx.scheduler.drain();
    expect(await test.ctx.taskLogs.list()).toHaveLength(3);
  });

  it("should not fire disabled tasks", async () => {
    now = new Date(2024, 4, 1, 23, 58, 0);
    test = createTestContext(QUIET_ENV, { clock: () => now });
    await test.ctx.scheduler.updateTaskSchedule("douyin_follower_crawler", "23:59", false);
    await test.ctx.scheduler.start();

    now = new Date(2024, 4, 1, 23, 59, 0);
    await test.ctx.scheduler.tick();
    await test.ctx.scheduler.drain();

    const douyin = await test.ctx.tasks.findByName("douyin_follower_crawler");
    expect(douyin?.lastRunAt).toBeNull();
    expect(await test.ctx.taskLogs.list(douyin?.id)).toEqual([]);
  });

  it("should rebuild the registry when a schedule changes while running", async () => {
    now = new Date(2024, 4, 1, 23, 58, 0);
    test = createTestContext(QUIET_ENV, { clock: () => now });
    await test.ctx.scheduler.start();

    const updated = await test.ctx.scheduler.updateTaskSchedule("weibo_follower_crawler", " 08:30 ");

    expect(updated.scheduleTime).toBe("08:30");
    const status = await test.ctx.scheduler.getStatus();
    expect(statusOf(status.tasks, "weibo_follower_crawler").nextRunAt).toBe(
      unixSeconds(new Date(2024, 4, 2, 8, 30, 0))
    );
  });

  it("should reject an invalid time or an unknown task", async () => {
    test = createTestContext(QUIET_ENV);

    await expect(test.ctx.scheduler.updateTaskSchedule("weibo_follower_crawler", "24:00")).rejects.toBeInstanceOf(
      ValidationError
    );
    await expect(test.ctx.scheduler.updateTaskSchedule("nope", "08:00")).rejects.toMatchObject({
      code: "unknown_task",
    });
    await expect(test.ctx.scheduler.runNow("nope")).rejects.toBeInstanceOf(SchedulingError);
    expect((await test.ctx.tasks.findByName("weibo_follower_crawler"))?.scheduleTime).toBe("23:59");
  });

  it("should queue a retry after a fault and run it once the delay passes", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "setInterval", "clearInterval"] });
    now = new Date(2024, 4, 1, 12, 0, 0);
    test = createTestContext(QUIET_ENV, { clock: () => now });
    const name = seedUncrawlableTask(test.ctx);
    await test.ctx.scheduler.start();

    const outcome = await test.ctx.scheduler.runNow(name);
    expect(outcome).toMatchObject({ kind: "faulted", retryCount: 1, willRetry: true });

    let view = statusOf((await test.ctx.scheduler.getStatus()).tasks, name);
    expect(view).toMatchObject({
      status: "retrying",
      retryCount: 1,
      maxRetry: 3,
      lastRunLogStatus: "failed",
      pendingRetryAt: unixSeconds(now) + 60,
    });

    await vi.advanceTimersByTimeAsync(60_000);
    await test.ctx.scheduler.drain();

    const task = await test.ctx.tasks.findByName(name);
    expect(task).toMatchObject({ status: "retrying", retryCount: 2 });
    expect(await test.ctx.taskLogs.list(task?.id)).toHaveLength(2);

    view = statusOf((await test.ctx.scheduler.getStatus()).tasks, name);
    expect(view.pendingRetryAt).toBe(unixSeconds(now) + 60);
  });

  it("should cancel pending retries on stop", async () => {
    now = new Date(2024, 4, 1, 12, 0, 0);
    test = createTestContext(QUIET_ENV, { clock: () => now });
    const name = seedUncrawlableTask(test.ctx);
    await test.ctx.scheduler.start();
    await test.ctx.scheduler.runNow(name);

    await test.ctx.scheduler.stop();
    const status = await test.ctx.scheduler.getStatus();

    expect(status.running).toBe(false);
    expect(statusOf(status.tasks, name).pendingRetryAt).toBeNull();
  });

  it("should queue a retry for a manual run while the loop is stopped", async () => {
    now = new Date(2024, 4, 1, 12, 0, 0);
    test = createTestContext(QUIET_ENV, { clock: () => now });
    const name = seedUncrawlableTask(test.ctx);

    const outcome = await test.ctx.scheduler.runNow(name);

    expect(outcome).toMatchObject({ kind: "faulted", willRetry: true });
    const status = await test.ctx.scheduler.getStatus();
    expect(status.running).toBe(false);
    expect(statusOf(status.tasks, name)).toMatchObject({
      status: "retrying",
      retryCount: 1,
      pendingRetryAt: unixSeconds(now) + 60,
    });
  });

  it("should resume retries for tasks left retrying when started", async () => {
    now = new Date(2024, 4, 1, 12, 0, 0);
    test = createTestContext(QUIET_ENV, { clock: () => now });
    const weibo = await test.ctx.tasks.findByName("weibo_follower_crawler");
    const douyin = await test.ctx.tasks.findByName("douyin_follower_crawler");
    if (!weibo || !douyin) throw new Error("tasks not seeded");
    await test.ctx.tasks.updateStatus(weibo.id, { status: "retrying", retryCount: 2 });
    await test.ctx.tasks.updateStatus(douyin.id, { status: "retrying", retryCount: 4 });

    await test.ctx.scheduler.start();

    const status = await test.ctx.scheduler.getStatus();
    expect(statusOf(status.tasks, "weibo_follower_crawler").pendingRetryAt).toBe(unixSeconds(now) + 60);
    expect(statusOf(status.tasks, "douyin_follower_crawler").pendingRetryAt).toBeNull();
    expect(statusOf(status.tasks, "xiaohongshu_follower_crawler").pendingRetryAt).toBeNull();
  });

  it("should run every enabled task at once", async () => {
    const { fetchImpl } = scriptedFetch([
      ["uid=1001", json({ ok: 1, data: { user: { screen_name: "First", followers_count: 42 } } })],
    ]);
    test = createTestContext({ ...QUIET_ENV, WEIBO_UID_LIST: "1001" }, { fetchImpl });
    await test.ctx.scheduler.updateTaskSchedule("xiaohongshu_follower_crawler", "23:59", false);

    const outcomes = await test.ctx.scheduler.runAll();

    expect(outcomes.map((o) => (o.kind === "completed" ? o.status : o.kind))).toEqual(["success", "failed"]);
    const xiaohongshu = await test.ctx.tasks.findByName("xiaohongshu_follower_crawler");
    expect(await test.ctx.taskLogs.list(xiaohongshu?.id)).toEqual([]);
    expect(await test.ctx.taskLogs.list()).toHaveLength(2);
  });
});
