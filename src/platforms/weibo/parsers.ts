import { z } from "zod";
import { ParseError } from "../../core/errors";
import { parseCount } from "../../core/normalize";
import type { AccountSnapshot } from "../../domain/models";
import { getPath, optionalString, parseJsonBody } from "../parse-helpers";

const countValue = z.union([z.number(), z.string()]);

const WeiboUserSchema = z.object({
  screen_name: z.string(),
  followers_count: countValue,
  friends_count: countValue.optional(),
  statuses_count: countValue.optional(),
  verified: z.boolean().optional(),
  avatar_hd: z.string().optional(),
});

const WeiboProfileResponseSchema = z.object({
  data: z.object({ user: WeiboUserSchema }),
});

/** Parses the `ajax/profile/info` payload. */
export function parseWeiboProfile(body: string, uid: string): AccountSnapshot {
  const json = parseJsonBody(body);

  if (getPath(json, ["ok"]) === 0) {
    const message = optionalString(getPath(json, ["msg"])) ?? "unknown error";
    throw new ParseError(`Weibo returned an error for ${uid}: ${message}`, "upstream");
  }

  const parsed = WeiboProfileResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new ParseError(`Weibo profile for ${uid} has no user data`, "missing_field");
  }

  const user = parsed.data.data.user;
  const followerCount = parseCount(user.followers_count);
  if (followerCount === null) {
    throw new ParseError(`Unreadable follower count for ${uid}: ${String(user.followers_count)}`, "invalid_count");
  }

  return {
    nativeId: uid,
    displayName: user.screen_name,
    followerCount,
    followingCount: parseCount(user.friends_count) ?? undefined,
    postCount: parseCount(user.statuses_count) ?? undefined,
    verified: user.verified ?? false,
    avatar: user.avatar_hd,
  };
}
