export { XiaohongshuCrawler, XIAOHONGSHU_HEADERS } from "./xiaohongshu.crawler";
export { parseXiaohongshuProfile, profileUrlFor } from "./parsers";
export { FOLLOWER_COUNT_PATTERNS, USER_OBJECT_PATHS } from "./extractors";
