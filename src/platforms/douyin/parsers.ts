import { z } from "zod";
import { ParseError } from "../../core/errors";
import { parseCount } from "../../core/normalize";
import type { AccountSnapshot } from "../../domain/models";
import { getPath, optionalString, parseJsonBody } from "../parse-helpers";

const countValue = z.union([z.number(), z.string()]);

const DouyinUserSchema = z.object({
  nickname: z.string(),
  follower_count: countValue,
  following_count: countValue.optional(),
  aweme_count: countValue.optional(),
  custom_verify: z.string().nullish(),
  enterprise_verify_reason: z.string().nullish(),
  avatar_larger: z.object({ url_list: z.array(z.string()) }).partial().nullish(),
});

const DouyinProfileResponseSchema = z.object({
  status_code: z.literal(0),
  user: DouyinUserSchema,
});

/** Parses the `user/profile/other` payload; any `status_code` other than 0 is an upstream error. */
export function parseDouyinProfile(body: string, secUserId: string): AccountSnapshot {
  const json = parseJsonBody(body);

  const statusCode = getPath(json, ["status_code"]);
  if (statusCode !== 0) {
    const message = optionalString(getPath(json, ["status_msg"])) ?? "unknown error";
    throw new ParseError(
      `Douyin returned status ${String(statusCode)} for ${secUserId}: ${message}`,
      "upstream"
    );
  }

  const parsed = DouyinProfileResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new ParseError(`Douyin profile for ${secUserId} has no user data`, "missing_field");
  }

  const user = parsed.data.user;
  const followerCount = parseCount(user.follower_count);
  if (followerCount === null) {
    throw new ParseError(`Unreadable follower count for ${secUserId}`, "invalid_count");
  }

  return {
    nativeId: secUserId,
    displayName: user.nickname,
    followerCount,
    followingCount: parseCount(user.following_count) ?? undefined,
    postCount: parseCount(user.aweme_count) ?? undefined,
    verified: Boolean(user.custom_verify) || Boolean(user.enterprise_verify_reason),
    avatar: user.avatar_larger?.url_list?.[0],
  };
}
