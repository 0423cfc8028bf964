import type { Logger } from "../../core/logger";
import type { AccountSnapshot } from "../../domain/models";
import { BaseCrawler } from "../base-crawler";
import type { PlatformHttpClient } from "../http-client";
import { parseDouyinProfile } from "./parsers";

export const DOUYIN_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Referer: "https://www.douyin.com/",
  Origin: "https://www.douyin.com",
  Accept: "application/json, text/plain, */*",
  "Accept-Language": "zh-CN,zh;q=0.9,en;q=0.8",
};

export class DouyinCrawler extends BaseCrawler {
  readonly platform = "douyin" as const;

  constructor(http: PlatformHttpClient, logger: Logger) {
    super(http, logger.child({ component: "crawler", platform: "douyin" }));
  }

  protected buildUrl(secUserId: string): string {
    return `https://www.douyin.com/aweme/v1/web/user/profile/other/?sec_user_id=${encodeURIComponent(secUserId)}`;
  }

  protected parse(body: string, secUserId: string): AccountSnapshot {
    return parseDouyinProfile(body, secUserId);
  }
}
