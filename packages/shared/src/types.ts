// =============================================================================
// @weekly-digest/shared — Core types for the digest pipeline
// =============================================================================
// Entries flow left to right: fetch → parse → filter → score → rank →
// (extract) → render. Nothing here is persisted between runs.
// =============================================================================

// ---------------------------------------------------------------------------
// Enums & Union Types
// ---------------------------------------------------------------------------

/**
 * Output mode. `surnames` lists title, author surnames and URL for every
 * qualifying paper; `theorems` adds a main-theorem excerpt for the top
 * papers and lists the rest by title only.
 */
export type DigestMode = "surnames" | "theorems";

// ---------------------------------------------------------------------------
// Feed entries
// ---------------------------------------------------------------------------

/** One normalised arXiv feed item */
export interface Entry {
  id: string;
  title: string;
  summary: string;
  /** Display order as delivered by the feed */
  authors: string[];
  published?: string;
  updated?: string;
  categories: string[];
  absUrl: string;
  pdfUrl?: string;
}

/** Entry with its relevance score, assigned once by the ranker */
export interface ScoredEntry extends Entry {
  readonly score: number;
}

/** Ranked entry paired with the excerpt found in its full text */
export interface DetailedResult {
  entry: ScoredEntry;
  /** Empty when nothing matched or the PDF was unavailable */
  theorem: string;
}

// ---------------------------------------------------------------------------
// Interest profile
// ---------------------------------------------------------------------------

export interface WeightedTerm {
  term: string;
  weight: number;
}

export interface PriorityAuthor {
  name: string;
  weight: number;
}

export interface Profile {
  keywords: WeightedTerm[];
  authors_priority: PriorityAuthor[];
  msc_terms: WeightedTerm[];
  exclude: string[];
}

export interface ScoringWeights {
  title_weight: number;
  abstract_weight: number;
  author_weight: number;
  category_weight: number;
  threshold: number;
}

// ---------------------------------------------------------------------------
// Run summary
// ---------------------------------------------------------------------------

/** Printed to stdout once a run has written its document */
export interface RunSummary {
  mode: DigestMode;
  fetched_count: number;
  recent_count: number;
  listed_count: number;
  detailed_count?: number;
  others_count?: number;
  pdf: string;
}
