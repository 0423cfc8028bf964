import type { Logger } from "../../core/logger";
import type { AccountSnapshot } from "../../domain/models";
import { BaseCrawler } from "../base-crawler";
import type { PlatformHttpClient } from "../http-client";
import { parseWeiboProfile } from "./parsers";

export const WEIBO_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Referer: "https://weibo.com",
  Accept: "application/json, text/plain, */*",
  "Accept-Language": "zh-CN,zh;q=0.9,en;q=0.8",
};

export class WeiboCrawler extends BaseCrawler {
  readonly platform = "weibo" as const;

  constructor(http: PlatformHttpClient, logger: Logger) {
    super(http, logger.child({ component: "crawler", platform: "weibo" }));
  }

  protected buildUrl(uid: string): string {
    return `https://weibo.com/ajax/profile/info?uid=${encodeURIComponent(uid)}`;
  }

  protected parse(body: string, uid: string): AccountSnapshot {
    return parseWeiboProfile(body, uid);
  }
}
