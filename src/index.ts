export { createAppContext, type AppContext, type AppContextOverrides } from "./bootstrap";
export { loadConfig, parseConfig, type AppConfig } from "./core/config";
export { createLogger, loggerOptionsFromConfig, type Logger } from "./core/logger";
export * from "./core/errors";
export { parseCount } from "./core/normalize";
export * from "./domain/models";
export { nextDailyRun, parseScheduleTime } from "./domain/schedule-time";
export { deriveBatchStatus, resolveFault } from "./domain/task-state-machine";
export type { FetchResult, PlatformCrawler } from "./platforms/crawler";
export { CredentialResolver } from "./platforms/credentials";
export { PlatformHttpClient } from "./platforms/http-client";
export { CrawlerRegistry } from "./platforms/registry";
export { WeiboCrawler } from "./platforms/weibo";
export { XiaohongshuCrawler } from "./platforms/xiaohongshu";
export { DouyinCrawler } from "./platforms/douyin";
export { TaskScheduler, type SchedulerStatus } from "./orchestration/scheduler/task-scheduler";
export { TaskExecutor, type ExecutionOutcome } from "./orchestration/scheduler/task-executor";
export { createApp, startServer } from "./server";
