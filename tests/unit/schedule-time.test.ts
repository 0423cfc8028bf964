import { describe, it, expect } from "vitest";
import {
  nextDailyRun,
  parseScheduleTime,
  toCronExpression,
} from "../../src/domain/schedule-time";
import { ValidationError } from "../../src/core/errors";

describe("schedule time", () => {
  it("should parse HH:MM", () => {
    expect(parseScheduleTime("23:59")).toEqual({ hour: 23, minute: 59 });
    expect(parseScheduleTime("00:00")).toEqual({ hour: 0, minute: 0 });
    expect(parseScheduleTime(" 07:05 ")).toEqual({ hour: 7, minute: 5 });
  });

  it("should reject malformed times", () => {
    for (const value of ["24:00", "7:05", "12:60", "noon", ""]) {
      expect(() => parseScheduleTime(value)).toThrow(ValidationError);
    }
  });

  it("should build a daily cron expression", () => {
    expect(toCronExpression("23:59")).toBe("59 23 * * *");
    expect(toCronExpression("08:30")).toBe("30 8 * * *");
  });

  it("should find the next run later the same day", () => {
    const from = new Date(2024, 4, 1, 10, 0, 0);
    expect(nextDailyRun("23:59", from).getTime()).toBe(new Date(2024, 4, 1, 23, 59, 0).getTime());
  });

  it("should roll over to the next day once the time has passed", () => {
    const from = new Date(2024, 4, 1, 10, 0, 0);
    expect(nextDailyRun("09:00", from).getTime()).toBe(new Date(2024, 4, 2, 9, 0, 0).getTime());
  });

  it("should not return the current minute again", () => {
    const from = new Date(2024, 4, 1, 23, 59, 30);
    expect(nextDailyRun("23:59", from).getTime()).toBe(new Date(2024, 4, 2, 23, 59, 0).getTime());
  });
});
