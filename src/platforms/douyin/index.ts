export { DouyinCrawler, DOUYIN_HEADERS } from "./douyin.crawler";
export { parseDouyinProfile } from "./parsers";
