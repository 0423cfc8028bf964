import type { Logger } from "../../core/logger";
import type { AccountSnapshot } from "../../domain/models";
import { BaseCrawler } from "../base-crawler";
import type { PlatformHttpClient } from "../http-client";
import { parseXiaohongshuProfile, profileUrlFor } from "./parsers";

export const XIAOHONGSHU_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Referer: "https://www.xiaohongshu.com/",
  Origin: "https://www.xiaohongshu.com",
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "zh-CN,zh;q=0.9,en;q=0.8",
};

/** Targets are profile URLs or bare user ids. */
export class XiaohongshuCrawler extends BaseCrawler {
  readonly platform = "xiaohongshu" as const;

  constructor(http: PlatformHttpClient, logger: Logger) {
    super(http, logger.child({ component: "crawler", platform: "xiaohongshu" }));
  }

  protected buildUrl(target: string): string {
    return profileUrlFor(target);
  }

  protected parse(html: string, target: string): AccountSnapshot {
    return parseXiaohongshuProfile(html, target);
  }
}
