import type { ResultRow } from "../types/screening.js";

export const LEADERBOARD_SIZE = 25;

/**
 * Top rows by call price, highest first.
 * Equal prices keep universe order, so the result does not depend on
 * the order rows were appended in.
 */
export function leaderboard(
  rows: readonly ResultRow[],
  size: number = LEADERBOARD_SIZE
): ResultRow[] {
  return [...rows]
    .sort((a, b) => b.callPrice - a.callPrice || a.index - b.index)
    .slice(0, Math.max(0, size));
}
