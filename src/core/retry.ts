export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Outcome of a single request attempt, as seen by the back-off policy. */
export type AttemptFailure =
  | { type: "status"; status: number }
  | { type: "exception" };

/**
 * Delay before the next attempt. `attempt` is 1-based: a 403 on the first
 * attempt waits 2s, on the second 4s.
 */
export function backoffDelayMs(failure: AttemptFailure, attempt: number): number {
  if (failure.type === "exception") return 2000;

  switch (failure.status) {
    case 403:
      return 2000 * attempt;
    case 429:
      return 5000 * attempt;
    default:
      return 1000;
  }
}
