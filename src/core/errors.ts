export type FetchErrorKind = "timeout" | "network" | "http_status" | "parse" | "upstream";

/**
 * Terminal failure of one account fetch. Network kinds are produced after the
 * request layer has exhausted its attempts; `parse` and `upstream` are never retried.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public kind: FetchErrorKind,
    public status?: number
  ) {
    super(message);
    this.name = "FetchError";
  }
}

export class ParseError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "ParseError";
  }
}

export class PersistenceError extends Error {
  constructor(message: string, public code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export class SchedulingError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "SchedulingError";
  }
}

export class ValidationError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : "Unknown error";
}
