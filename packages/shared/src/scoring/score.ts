import type { Entry, Profile, ScoringWeights } from "../types.js";

/** Subtracted once for every exclude term found in the title or summary */
export const EXCLUDE_PENALTY = 2.0;

/**
 * Relevance of one entry under the interest profile.
 *
 * All matching is lower-cased substring matching. Author names are matched
 * against the space-joined author list, so a short priority name can also
 * hit inside a longer one.
 */
export function scoreEntry(
  entry: Entry,
  profile: Profile,
  weights: ScoringWeights,
): number {
  const title = entry.title.toLowerCase();
  const summary = entry.summary.toLowerCase();
  const authors = entry.authors.join(" ").toLowerCase();
  const categories = entry.categories.join(" ").toLowerCase();

  let score = 0;

  for (const kw of profile.keywords) {
    const term = kw.term.toLowerCase();
    if (title.includes(term)) score += kw.weight * weights.title_weight;
    if (summary.includes(term)) score += kw.weight * weights.abstract_weight;
  }

  for (const author of profile.authors_priority) {
    if (authors.includes(author.name.toLowerCase())) {
      score += author.weight * weights.author_weight;
    }
  }

  for (const msc of profile.msc_terms) {
    if (categories.includes(msc.term.toLowerCase())) {
      score += msc.weight * weights.category_weight;
    }
  }

  for (const bad of profile.exclude) {
    const term = bad.toLowerCase();
    if (title.includes(term) || summary.includes(term)) {
      score -= EXCLUDE_PENALTY;
    }
  }

  return score;
}
