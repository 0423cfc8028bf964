import type { AppConfig } from "../core/config";
import type { Logger } from "../core/logger";
import type { Sleep } from "../core/retry";
import { PlatformCodeSchema, type PlatformCode } from "../domain/models";
import type { PlatformCrawler } from "./crawler";
import { CredentialResolver, type CredentialLookup } from "./credentials";
import { PlatformHttpClient, type FetchImpl } from "./http-client";
import { DouyinCrawler, DOUYIN_HEADERS } from "./douyin";
import { WeiboCrawler, WEIBO_HEADERS } from "./weibo";
import { XiaohongshuCrawler, XIAOHONGSHU_HEADERS } from "./xiaohongshu";

interface CrawlerFactory {
  headers: Record<string, string>;
  create(http: PlatformHttpClient, logger: Logger): PlatformCrawler;
}

const CRAWLER_FACTORIES: Record<PlatformCode, CrawlerFactory> = {
  weibo: { headers: WEIBO_HEADERS, create: (http, logger) => new WeiboCrawler(http, logger) },
  xiaohongshu: { headers: XIAOHONGSHU_HEADERS, create: (http, logger) => new XiaohongshuCrawler(http, logger) },
  douyin: { headers: DOUYIN_HEADERS, create: (http, logger) => new DouyinCrawler(http, logger) },
};

export interface CrawlerRegistryOptions {
  config: Pick<AppConfig, "platforms" | "http">;
  logger: Logger;
  credentialStore?: CredentialLookup;
  /** Tokens that win over the store and the configured cookie. */
  directTokens?: Partial<Record<PlatformCode, string>>;
  fetchImpl?: FetchImpl;
  sleep?: Sleep;
}

export class CrawlerRegistry {
  constructor(private readonly options: CrawlerRegistryOptions) {}

  /** Null for a code with no crawler. */
  create(code: string): PlatformCrawler | null {
    const parsed = PlatformCodeSchema.safeParse(code);
    if (!parsed.success) return null;
    const platform = parsed.data;

    const factory = CRAWLER_FACTORIES[platform];
    const settings = this.options.config.platforms[platform];
    const credentials = new CredentialResolver(platform, {
      direct: this.options.directTokens?.[platform],
      store: this.options.credentialStore,
      fallback: settings.cookie,
    });
    const http = new PlatformHttpClient({
      headers: factory.headers,
      delayMs: settings.delayMs,
      timeoutMs: this.options.config.http.timeoutMs,
      maxAttempts: this.options.config.http.maxAttempts,
      credentials,
      logger: this.options.logger,
      fetchImpl: this.options.fetchImpl,
      sleep: this.options.sleep,
    });
    return factory.create(http, this.options.logger);
  }

  targetsFor(code: string): readonly string[] {
    const parsed = PlatformCodeSchema.safeParse(code);
    return parsed.success ? this.options.config.platforms[parsed.data].targets : [];
  }
}
