import type { AnalyzedCall } from "../types/calls";

/**
 * Top `targetCount` calls by score, highest first. Calls under `minScore`
 * never win; equal scores keep scan order (Array#sort is stable).
 */
export function rankCalls(
  analyzed: readonly AnalyzedCall[],
  targetCount: number,
  minScore = 0
): AnalyzedCall[] {
  if (targetCount <= 0) return [];

  return analyzed
    .filter((c) => c.analysis.score >= minScore)
    .sort((a, b) => b.analysis.score - a.analysis.score)
    .slice(0, targetCount);
}
