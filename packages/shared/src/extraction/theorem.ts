// =============================================================================
// @weekly-digest/shared — Main-theorem excerpt search
// =============================================================================
// Heuristic pattern scan over text pulled out of a PDF. Rules are tried in
// priority order and the first rule that matches anywhere wins; later rules
// are never consulted.
// =============================================================================

/** Text beyond this many characters is never searched */
export const MAX_SEARCH_CHARS = 20_000;
/** Window taken from the match start before sentence splitting */
export const WINDOW_CHARS = 2_000;
export const MAX_SENTENCES = 3;
export const MAX_EXCERPT_CHARS = 700;
export const ELLIPSIS = "…";

export interface TheoremRule {
  name: string;
  pattern: RegExp;
}

export const THEOREM_RULES: readonly TheoremRule[] = [
  // At a line start, or where pdfjs has run the heading into the previous line
  {
    name: "main-theorem-heading",
    pattern: /(?:^[ \t]*|(?<=[.!?]\s+))main\s+theorem\b/im,
  },
  { name: "numbered-theorem", pattern: /\btheorem\s+\d+(?:\.\d+)*\s*:/i },
  { name: "bare-theorem", pattern: /\btheorem\s*:/i },
  { name: "main-result", pattern: /\bmain\s+results?\b/i },
  { name: "we-prove-that", pattern: /\bwe\s+(?:prove|show|establish)\s+that\b/i },
  { name: "main-theorem-ja", pattern: /(?:主定理|主結果)[^。]*。/m },
  { name: "numbered-theorem-ja", pattern: /定理\s*\d+(?:\.\d+)*\s*[:：]/m },
];

// Split after terminal punctuation (Latin or CJK) or a newline, when
// whitespace follows.
const SENTENCE_BREAK = /(?<=[.!?。！？\n])\s+/;

export interface TheoremMatch {
  rule: string;
  index: number;
}

/** First rule that matches, with the offset of its match */
export function matchTheoremRule(text: string): TheoremMatch | undefined {
  const haystack = text.slice(0, MAX_SEARCH_CHARS);
  for (const rule of THEOREM_RULES) {
    const m = rule.pattern.exec(haystack);
    if (m) return { rule: rule.name, index: m.index };
  }
  return undefined;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Collapse whitespace and cap at 700 characters plus an ellipsis */
export function toExcerpt(window: string): string {
  const sentences = window
    .split(SENTENCE_BREAK)
    .filter((s) => s.trim() !== "")
    .slice(0, MAX_SENTENCES);
  const joined = sentences.join(" ").replace(/\s+/g, " ").trim();
  if (joined.length <= MAX_EXCERPT_CHARS) return joined;
  // Never split a surrogate pair (astral math letters such as U+1D44B)
  const cut = isHighSurrogate(joined.charCodeAt(MAX_EXCERPT_CHARS - 1))
    ? MAX_EXCERPT_CHARS - 1
    : MAX_EXCERPT_CHARS;
  return joined.slice(0, cut) + ELLIPSIS;
}

/**
 * Locate a theorem-like passage and return up to three sentences from it.
 * Returns "" when no rule matches.
 */
export function findMainTheorem(text: string): string {
  const match = matchTheoremRule(text);
  if (!match) return "";
  const haystack = text.slice(0, MAX_SEARCH_CHARS);
  return toExcerpt(haystack.slice(match.index, match.index + WINDOW_CHARS));
}
