const UNIT_MULTIPLIERS: Record<string, number> = {
  万: 10_000,
  w: 10_000,
  W: 10_000,
  亿: 100_000_000,
};

/**
 * Parses follower counts as platforms render them: plain integers, numbers with
 * thousands separators, and shorthand such as "1.2万" (x 10,000) or "3亿".
 * Returns null for anything that is not a non-negative count.
 */
export function parseCount(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value >= 0 ? Math.round(value) : null;
  }
  if (typeof value !== "string") return null;

  const cleaned = value.trim().replace(/[,\s+]/g, "");
  const match = /^(\d+(?:\.\d+)?)(万|亿|w|W)?$/.exec(cleaned);
  if (!match || match[1] === undefined) return null;

  const base = parseFloat(match[1]);
  const unit = match[2];
  const multiplier = unit ? (UNIT_MULTIPLIERS[unit] ?? 1) : 1;
  return Math.round(base * multiplier);
}
