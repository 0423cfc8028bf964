import { parseCount } from "../../core/normalize";
import { getPath, isRecord, optionalString } from "../parse-helpers";

export interface ProfileFields {
  nativeId?: string;
  displayName?: string;
  followerCount: number;
  followingCount?: number;
  verified?: boolean;
  avatar?: string;
}

const INITIAL_STATE_PATTERN = /__INITIAL_STATE__\s*=\s*([\s\S]+?)\s*;?\s*<\/script>/;

/**
 * Pulls the `window.__INITIAL_STATE__` object out of the page. The page embeds
 * it as a JS literal, so bare `undefined` values are rewritten to `null`.
 */
export function extractInitialState(html: string): unknown {
  const match = INITIAL_STATE_PATTERN.exec(html);
  if (!match?.[1]) return null;
  const literal = match[1].replace(/([:[,])\s*undefined(?=\s*[,}\]])/g, "$1null");
  try {
    return JSON.parse(literal);
  } catch {
    return null;
  }
}

/** Objects carrying `nickname`, `fans`, `follows` and `officialVerify`, tried in order. */
export const USER_OBJECT_PATHS: readonly (readonly string[])[] = [
  ["user", "userPageData", "user"],
  ["user", "user"],
  ["userPageData", "user"],
  ["note", "noteDetail", "user"],
];

function fromUserObject(candidate: unknown): ProfileFields | null {
  if (!isRecord(candidate)) return null;
  const displayName = optionalString(candidate["nickname"]);
  if (!displayName) return null;
  const followerCount = parseCount(candidate["fans"]);
  if (followerCount === null) return null;

  const verifyType = getPath(candidate, ["officialVerify", "type"]);
  return {
    nativeId: optionalString(candidate["user_id"]) ?? optionalString(candidate["userId"]),
    displayName,
    followerCount,
    followingCount: parseCount(candidate["follows"]) ?? undefined,
    verified: typeof verifyType === "number" ? verifyType > 0 : undefined,
    avatar: optionalString(candidate["avatar"]) ?? optionalString(candidate["images"]),
  };
}

/** Current page layout: `basicInfo` plus an `interactions` list of `{ type, count }`. */
function fromBasicInfo(state: unknown): ProfileFields | null {
  const pageData = getPath(state, ["user", "userPageData"]);
  const basicInfo = getPath(pageData, ["basicInfo"]);
  if (!isRecord(basicInfo)) return null;
  const displayName = optionalString(basicInfo["nickname"]);
  if (!displayName) return null;

  const interactions = getPath(pageData, ["interactions"]);
  const countOf = (type: string): number | null => {
    if (!Array.isArray(interactions)) return null;
    for (const entry of interactions) {
      if (isRecord(entry) && entry["type"] === type) return parseCount(entry["count"]);
    }
    return null;
  };

  const followerCount = countOf("fans");
  if (followerCount === null) return null;
  return {
    displayName,
    followerCount,
    followingCount: countOf("follows") ?? undefined,
    avatar: optionalString(basicInfo["images"]) ?? optionalString(basicInfo["imageb"]),
  };
}

export function profileFromState(state: unknown): ProfileFields | null {
  if (!isRecord(state)) return null;
  for (const path of USER_OBJECT_PATHS) {
    const fields = fromUserObject(getPath(state, path));
    if (fields) return fields;
  }
  return fromBasicInfo(state);
}

/**
 * Last-resort follower count patterns against the raw page. Order matters:
 * the first pattern that matches wins, with no cross-checking.
 */
export const FOLLOWER_COUNT_PATTERNS: readonly RegExp[] = [
  /(\d+(?:\.\d+)?\s*万?)\s*粉丝/,
  /粉丝\s*(\d+(?:\.\d+)?万?)/,
  /fans["\s:]+(\d+(?:\.\d+)?万?)/i,
  /粉丝["\s:]+(\d+(?:\.\d+)?万?)/,
  /粉丝数["\s:]+(\d+(?:\.\d+)?万?)/,
  /(\d+(?:\.\d+)?万?)\s*[位个]粉丝/,
];

export function followerCountFromText(html: string): number | null {
  for (const pattern of FOLLOWER_COUNT_PATTERNS) {
    const match = pattern.exec(html);
    if (match?.[1] !== undefined) {
      const count = parseCount(match[1]);
      if (count !== null) return count;
    }
  }
  return null;
}

const OG_TITLE_PATTERN = /<meta\s+(?:name|property)="og:title"\s+content="([^"]+)"/;
const TITLE_SUFFIX = " - 小红书";

export function nicknameFromOgTitle(html: string): string | undefined {
  const title = OG_TITLE_PATTERN.exec(html)?.[1];
  if (!title) return undefined;
  const suffixAt = title.indexOf(TITLE_SUFFIX);
  return suffixAt >= 0 ? title.slice(0, suffixAt) : title;
}

const PROFILE_ID_PATTERN = /user\/profile\/([a-f0-9]+)/;

export function userIdFromTarget(target: string): string | undefined {
  return PROFILE_ID_PATTERN.exec(target)?.[1];
}
