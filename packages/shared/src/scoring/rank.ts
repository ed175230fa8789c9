import type { Entry, Profile, ScoredEntry, ScoringWeights } from "../types.js";
import { scoreEntry } from "./score.js";

/**
 * Score every entry, keep those at or above the threshold, and order them
 * by descending score. Array.prototype.sort is stable, so equal scores keep
 * feed order; there is no secondary key.
 */
export function rankEntries(
  entries: Entry[],
  profile: Profile,
  weights: ScoringWeights,
): ScoredEntry[] {
  const picked: ScoredEntry[] = [];
  for (const entry of entries) {
    const score = scoreEntry(entry, profile, weights);
    if (score >= weights.threshold) picked.push({ ...entry, score });
  }
  return picked.sort((a, b) => b.score - a.score);
}

export interface DetailSplit {
  detailed: ScoredEntry[];
  others: ScoredEntry[];
}

/**
 * First `maxDetails` results get the full treatment; the remainder is listed
 * by title only when `includeOthers` is set.
 */
export function splitDetails(
  results: ScoredEntry[],
  maxDetails: number,
  includeOthers: boolean,
): DetailSplit {
  return {
    detailed: results.slice(0, maxDetails),
    others: includeOthers ? results.slice(maxDetails) : [],
  };
}
