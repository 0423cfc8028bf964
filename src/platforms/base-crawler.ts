import { FetchError, ParseError } from "../core/errors";
import type { Logger } from "../core/logger";
import { AccountSnapshotSchema, type AccountSnapshot, type PlatformCode } from "../domain/models";
import type { FetchResult, PlatformCrawler } from "./crawler";
import type { PlatformHttpClient } from "./http-client";

export abstract class BaseCrawler implements PlatformCrawler {
  abstract readonly platform: PlatformCode;
  protected readonly logger: Logger;

  constructor(protected readonly http: PlatformHttpClient, logger: Logger) {
    this.logger = logger;
  }

  protected abstract buildUrl(target: string): string;

  /** Throws `ParseError`; code `upstream` marks an error the platform reported itself. */
  protected abstract parse(body: string, target: string): AccountSnapshot;

  async fetchAccount(target: string): Promise<FetchResult> {
    const url = this.buildUrl(target);
    const response = await this.http.get(url);
    if (!response.ok) {
      return { ok: false, error: response.error };
    }

    try {
      const parsed = AccountSnapshotSchema.safeParse(this.parse(response.body, target));
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
        this.logger.warn({ target, issues }, "Parsed profile failed validation");
        return { ok: false, error: new FetchError(`Invalid profile data: ${issues}`, "parse") };
      }
      this.logger.info(
        { target, nativeId: parsed.data.nativeId, followerCount: parsed.data.followerCount },
        "Profile fetched"
      );
      return { ok: true, account: parsed.data };
    } catch (error) {
      if (error instanceof ParseError) {
        this.logger.warn({ target, code: error.code, reason: error.message }, "Failed to parse profile");
        return {
          ok: false,
          error: new FetchError(error.message, error.code === "upstream" ? "upstream" : "parse"),
        };
      }
      throw error;
    }
  }
}
