import pino from "pino";
import { join } from "path";
import type { AppConfig } from "./config";

export type Logger = pino.Logger;

export interface LoggerOptions {
  level: AppConfig["log"]["level"];
  pretty: boolean;
  toFile: boolean;
  logDir: string;
  maxSize: string;
  maxFiles: number;
}

export function createLogger(options: LoggerOptions): Logger {
  if (options.level === "silent") {
    return pino({ level: "silent" });
  }

  const targets: pino.TransportTargetOptions[] = [
    options.pretty
      ? {
          target: "pino-pretty",
          level: options.level,
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : { target: "pino/file", level: options.level, options: { destination: 1 } },
  ];

  if (options.toFile) {
    targets.push({
      target: "pino-roll",
      level: options.level,
      options: {
        file: join(options.logDir, "app"),
        extension: ".log",
        size: options.maxSize,
        limit: { count: options.maxFiles },
        mkdir: true,
      },
    });
  }

  return pino({ level: options.level }, pino.transport({ targets }));
}

export function loggerOptionsFromConfig(config: Pick<AppConfig, "log" | "logDir">): LoggerOptions {
  return { ...config.log, logDir: config.logDir };
}
