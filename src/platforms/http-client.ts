import { FetchError, errorMessage } from "../core/errors";
import type { Logger } from "../core/logger";
import { backoffDelayMs, sleep as defaultSleep, type AttemptFailure, type Sleep } from "../core/retry";
import type { CredentialResolver } from "./credentials";

export type FetchImpl = (input: string, init: { headers: Record<string, string>; signal: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  text(): Promise<string>;
}>;

export interface HttpClientOptions {
  headers: Record<string, string>;
  /** Pause after every network call, whatever its outcome. */
  delayMs: number;
  timeoutMs: number;
  maxAttempts: number;
  credentials: CredentialResolver;
  logger: Logger;
  fetchImpl?: FetchImpl;
  sleep?: Sleep;
}

export type HttpResult =
  | { ok: true; status: number; body: string }
  | { ok: false; error: FetchError };

export class PlatformHttpClient {
  private readonly logger: Logger;
  private readonly fetchImpl: FetchImpl;
  private readonly sleep: Sleep;

  constructor(private readonly options: HttpClientOptions) {
    this.logger = options.logger.child({ component: "http", platform: options.credentials.platform });
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async get(url: string): Promise<HttpResult> {
    const { maxAttempts, delayMs } = this.options;
    let lastError = new FetchError(`No attempt made for ${url}`, "network");

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const outcome = await this.attempt(url);
      await this.sleep(delayMs);

      if (outcome.ok) {
        this.logger.debug({ url, status: outcome.status, attempt }, "Request succeeded");
        return outcome;
      }

      lastError = outcome.error;
      this.logger.warn(
        { url, attempt, maxAttempts, kind: outcome.error.kind, status: outcome.error.status },
        "Request failed"
      );

      if (attempt < maxAttempts) {
        await this.sleep(backoffDelayMs(outcome.failure, attempt));
      }
    }

    this.logger.error({ url, kind: lastError.kind, status: lastError.status }, "Request attempts exhausted");
    return { ok: false, error: lastError };
  }

  private async attempt(
    url: string
  ): Promise<{ ok: true; status: number; body: string } | { ok: false; error: FetchError; failure: AttemptFailure }> {
    const headers = { ...this.options.headers };
    const cookie = await this.options.credentials.resolve();
    if (cookie) headers["Cookie"] = cookie;

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    try {
      const response = await this.fetchImpl(url, { headers, signal: controller.signal });
      if (!response.ok) {
        return {
          ok: false,
          error: new FetchError(`HTTP ${response.status} for ${url}`, "http_status", response.status),
          failure: { type: "status", status: response.status },
        };
      }
      const body = await response.text();
      return { ok: true, status: response.status, body };
    } catch (error) {
      const timedOut = controller.signal.aborted;
      return {
        ok: false,
        error: timedOut
          ? new FetchError(`Request timed out after ${this.options.timeoutMs}ms: ${url}`, "timeout")
          : new FetchError(`Network error for ${url}: ${errorMessage(error)}`, "network"),
        failure: { type: "exception" },
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
