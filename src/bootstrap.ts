import type { AppConfig } from "./core/config";
import type { Logger } from "./core/logger";
import type { Sleep } from "./core/retry";
import { systemClock, type Clock } from "./core/time";
import { DatabaseClient } from "./db/client";
import { runCredentialMigrations, runMigrations } from "./db/migrate";
import { AccountsRepository } from "./db/repositories/accounts.repo";
import { CredentialsRepository } from "./db/repositories/credentials.repo";
import { PlatformsRepository } from "./db/repositories/platforms.repo";
import { SnapshotsRepository } from "./db/repositories/snapshots.repo";
import { TaskLogsRepository } from "./db/repositories/task-logs.repo";
import { TasksRepository } from "./db/repositories/tasks.repo";
import { DeleteService } from "./services/delete.service";
import { FollowerBatchRunner } from "./orchestration/follower-batch-runner";
import { TaskExecutor } from "./orchestration/scheduler/task-executor";
import { TaskScheduler } from "./orchestration/scheduler/task-scheduler";
import type { FetchImpl } from "./platforms/http-client";
import { CrawlerRegistry } from "./platforms/registry";
import type { PlatformCode } from "./domain/models";

export interface AppContext {
  config: Readonly<AppConfig>;
  logger: Logger;
  db: DatabaseClient;
  credentialsDb: DatabaseClient;
  platforms: PlatformsRepository;
  accounts: AccountsRepository;
  snapshots: SnapshotsRepository;
  tasks: TasksRepository;
  taskLogs: TaskLogsRepository;
  credentials: CredentialsRepository;
  deleteService: DeleteService;
  crawlers: CrawlerRegistry;
  executor: TaskExecutor;
  scheduler: TaskScheduler;
}

export interface AppContextOverrides {
  clock?: Clock;
  fetchImpl?: FetchImpl;
  sleep?: Sleep;
  directTokens?: Partial<Record<PlatformCode, string>>;
}

/** Wires every component; prepares and migrates both database files first. */
export function createAppContext(
  config: Readonly<AppConfig>,
  logger: Logger,
  overrides: AppContextOverrides = {}
): AppContext {
  const clock = overrides.clock ?? systemClock;

  const db = new DatabaseClient(config.databasePath, logger);
  db.prepare();
  runMigrations(db, logger, { defaultScheduleTime: config.schedule.defaultTime });

  const credentialsDb = new DatabaseClient(config.credentialsDatabasePath, logger);
  credentialsDb.prepare();
  runCredentialMigrations(credentialsDb, logger);

  const platforms = new PlatformsRepository(db);
  const accounts = new AccountsRepository(db, logger, clock);
  const snapshots = new SnapshotsRepository(db, logger);
  const tasks = new TasksRepository(db, logger, clock);
  const taskLogs = new TaskLogsRepository(db, logger);
  const credentials = new CredentialsRepository(credentialsDb, logger, clock);
  const deleteService = new DeleteService(db, logger);

  const crawlers = new CrawlerRegistry({
    config,
    logger,
    credentialStore: credentials,
    directTokens: overrides.directTokens,
    fetchImpl: overrides.fetchImpl,
    sleep: overrides.sleep,
  });
  const runner = new FollowerBatchRunner({ accounts, snapshots, logger, clock });
  const executor = new TaskExecutor({ tasks, taskLogs, platforms, crawlers, runner, logger, clock });
  const scheduler = new TaskScheduler({
    tasks,
    taskLogs,
    executor,
    logger,
    tickIntervalMs: config.schedule.tickIntervalMs,
    retryDelayMs: config.schedule.retryDelayMs,
    clock,
  });

  return {
    config,
    logger,
    db,
    credentialsDb,
    platforms,
    accounts,
    snapshots,
    tasks,
    taskLogs,
    credentials,
    deleteService,
    crawlers,
    executor,
    scheduler,
  };
}
