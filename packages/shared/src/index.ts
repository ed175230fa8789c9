// @weekly-digest/shared — types, configuration, and the fetch/score/extract core
export * from "./types.js";
export * from "./schemas.js";
export * from "./config.js";
export { ARXIV_API, FEED_CATEGORY, buildFeedUrl, fetchFeed, userAgent } from "./arxiv/feed.js";
export type { FeedQuery } from "./arxiv/feed.js";
export { parseAtom } from "./arxiv/parse.js";
export { candidateTime, isWithinLookback, filterByLookback } from "./scoring/lookback.js";
export { EXCLUDE_PENALTY, scoreEntry } from "./scoring/score.js";
export { rankEntries, splitDetails, type DetailSplit } from "./scoring/rank.js";
export { surname, surnamesOnly } from "./format/surname.js";
export {
  ELLIPSIS,
  MAX_EXCERPT_CHARS,
  THEOREM_RULES,
  findMainTheorem,
  matchTheoremRule,
  type TheoremRule,
} from "./extraction/theorem.js";
export { extractPdfText, type TextExtractor } from "./extraction/pdf-text.js";
export {
  DEFAULT_DELAY_MS,
  TheoremExtractor,
  type ExtractionLogger,
  type TheoremExtractorOptions,
} from "./extraction/extractor.js";
