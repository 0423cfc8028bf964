export { WeiboCrawler, WEIBO_HEADERS } from "./weibo.crawler";
export { parseWeiboProfile } from "./parsers";
