import type { FetchError } from "../core/errors";
import type { AccountSnapshot, PlatformCode } from "../domain/models";

export type FetchResult =
  | { ok: true; account: AccountSnapshot }
  | { ok: false; error: FetchError };

/**
 * One implementation per platform. `fetchAccount` never rejects for request
 * or parse failures; those come back as `{ ok: false }`.
 */
export interface PlatformCrawler {
  readonly platform: PlatformCode;

  fetchAccount(target: string): Promise<FetchResult>;
}
