import { InvalidArgumentError } from "commander";
import { PlatformCodeSchema, type PlatformCode } from "../domain/models";

export function parseIntArg(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

/** ISO date or date-time to unix seconds. */
export function parseDateArg(value: string): number {
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw new InvalidArgumentError("Expected a date such as 2024-05-01 or 2024-05-01T08:00:00.");
  }
  return Math.floor(time / 1000);
}

export function parsePlatformArg(value: string): PlatformCode {
  const parsed = PlatformCodeSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of: ${PlatformCodeSchema.options.join(", ")}.`);
  }
  return parsed.data;
}

export function formatTime(unixSeconds: number | null): string {
  return unixSeconds === null ? "-" : new Date(unixSeconds * 1000).toISOString();
}
