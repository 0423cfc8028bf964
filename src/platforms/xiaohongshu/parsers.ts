import { ParseError } from "../../core/errors";
import type { AccountSnapshot } from "../../domain/models";
import {
  extractInitialState,
  followerCountFromText,
  nicknameFromOgTitle,
  profileFromState,
  userIdFromTarget,
} from "./extractors";

export function profileUrlFor(target: string): string {
  if (/^https?:\/\//i.test(target)) return target;
  return `https://www.xiaohongshu.com/user/profile/${encodeURIComponent(target)}`;
}

/** Bare id targets are their own native id; URLs carry it in the profile path. */
function nativeIdFromTarget(target: string): string {
  return userIdFromTarget(target) ?? target.trim();
}

/**
 * Reads the embedded page state first; when no candidate object yields a
 * count, falls back to the text patterns.
 */
export function parseXiaohongshuProfile(html: string, target: string): AccountSnapshot {
  const fromState = profileFromState(extractInitialState(html));
  if (fromState) {
    return {
      nativeId: fromState.nativeId ?? nativeIdFromTarget(target),
      displayName: fromState.displayName ?? nicknameFromOgTitle(html) ?? "",
      followerCount: fromState.followerCount,
      followingCount: fromState.followingCount,
      verified: fromState.verified,
      avatar: fromState.avatar,
    };
  }

  const followerCount = followerCountFromText(html);
  if (followerCount === null) {
    throw new ParseError(`No follower count found on profile page ${target}`, "no_count");
  }

  return {
    nativeId: nativeIdFromTarget(target),
    displayName: nicknameFromOgTitle(html) ?? "",
    followerCount,
  };
}
