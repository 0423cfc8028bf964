import type { BatchStatus, TaskStatus } from "./models";

export const ALLOWED_TRANSITIONS: ReadonlyMap<TaskStatus, TaskStatus[]> = new Map([
  ["idle", ["running"]],
  ["running", ["success", "partial_success", "failed", "retrying"]],
  ["success", ["running"]],
  ["partial_success", ["running"]],
  ["retrying", ["running"]],
  // Terminal failure is left by a manual or next scheduled run.
  ["failed", ["running"]],
]);

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  const allowed = ALLOWED_TRANSITIONS.get(from);
  return allowed?.includes(to) ?? false;
}

/** `failed` unless at least one target succeeded; an empty batch is `failed`. */
export function deriveBatchStatus(successCount: number, failedCount: number): BatchStatus {
  if (successCount === 0) return "failed";
  return failedCount === 0 ? "success" : "partial_success";
}

export interface FaultResolution {
  status: Extract<TaskStatus, "retrying" | "failed">;
  retryCount: number;
  willRetry: boolean;
}

/** Applies one whole-batch fault to the retry budget. */
export function resolveFault(currentRetryCount: number, maxRetry: number): FaultResolution {
  const retryCount = currentRetryCount + 1;
  const willRetry = retryCount <= maxRetry;
  return { status: willRetry ? "retrying" : "failed", retryCount, willRetry };
}
