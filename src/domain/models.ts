import { z } from "zod";

export const PlatformCodeSchema = z.enum(["weibo", "xiaohongshu", "douyin"]);
export type PlatformCode = z.infer<typeof PlatformCodeSchema>;

export const TaskStatusSchema = z.enum([
  "idle",
  "running",
  "success",
  "partial_success",
  "failed",
  "retrying",
]);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const BatchStatusSchema = z.enum(["success", "partial_success", "failed"]);
export type BatchStatus = z.infer<typeof BatchStatusSchema>;

export const RunLogStatusSchema = z.enum(["running", "success", "partial_success", "failed"]);
export type RunLogStatus = z.infer<typeof RunLogStatusSchema>;

export type SnapshotStatus = BatchStatus;

export type Trigger = "scheduled" | "manual" | "retry";

/** Unassigned identity tag. */
export const UNASSIGNED_IDENTITY = "0";

export const AccountSnapshotSchema = z.object({
  nativeId: z.string().min(1),
  displayName: z.string(),
  followerCount: z.number().int().nonnegative(),
  followingCount: z.number().int().nonnegative().optional(),
  postCount: z.number().int().nonnegative().optional(),
  verified: z.boolean().optional(),
  avatar: z.string().optional(),
});
export type AccountSnapshot = z.infer<typeof AccountSnapshotSchema>;

export interface PlatformSeed {
  name: string;
  code: PlatformCode;
  description: string;
}

export const PLATFORM_SEEDS: readonly PlatformSeed[] = [
  { name: "Weibo", code: "weibo", description: "Sina Weibo microblog profiles" },
  { name: "Xiaohongshu", code: "xiaohongshu", description: "Xiaohongshu (RED) creator profiles" },
  { name: "Douyin", code: "douyin", description: "Douyin short-video creator profiles" },
];

export function taskNameFor(code: string): string {
  return `${code}_follower_crawler`;
}
