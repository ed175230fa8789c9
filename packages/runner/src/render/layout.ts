// =============================================================================
// @weekly-digest/runner — Digest page layout
// =============================================================================
// A cursor walks down the page; each wrapped line moves it by its leading.
// Page breaks happen between result blocks (and between overflow titles),
// never in the middle of one paper's fields.
// =============================================================================

import { surnamesOnly, type DetailedResult, type ScoredEntry } from "@weekly-digest/shared";
import type { DocumentSurface, Rgb } from "./surface.js";
import { wrapText } from "./wrap.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const MM = 72 / 25.4;
export const MARGIN = 20 * MM;
/** Below this the next block starts on a fresh page */
export const BOTTOM_LIMIT = 40 * MM;

export const TITLE_COLOR: Rgb = [232, 180, 180];

export const ZERO_RESULTS_MESSAGE = "This week's selection has 0 results.";
export const THEOREM_NOT_FOUND = "not found";
export const OTHERS_HEADING = "Other qualifying papers (titles only)";

interface LineStyle {
  size: number;
  leading: number;
  wrap: number;
  color?: Rgb;
}

const DOC_TITLE: LineStyle = { size: 16, leading: 20, wrap: 60 };
const ENTRY_TITLE: LineStyle = { size: 13, leading: 18, wrap: 70 };
const BODY: LineStyle = { size: 12, leading: 16, wrap: 84 };
const EXCERPT: LineStyle = { size: 11, leading: 15, wrap: 92 };

// ---------------------------------------------------------------------------
// Cursor
// ---------------------------------------------------------------------------

class PageCursor {
  private y: number;

  constructor(private readonly surface: DocumentSurface) {
    this.y = this.top;
  }

  private get top(): number {
    return this.surface.height - MARGIN;
  }

  write(text: string, style: LineStyle): void {
    for (const line of wrapText(text, style.wrap)) {
      this.surface.drawText(line, MARGIN, this.y, {
        size: style.size,
        color: style.color,
      });
      this.y -= style.leading;
    }
  }

  gap(points: number): void {
    this.y -= points;
  }

  /** Start a new page once the cursor has passed the bottom limit */
  breakIfLow(): void {
    if (this.y < BOTTOM_LIMIT) {
      this.surface.addPage();
      this.y = this.top;
    }
  }
}

// ---------------------------------------------------------------------------
// Layouts
// ---------------------------------------------------------------------------

/**
 * Every qualifying paper: coloured title, author surnames and abstract URL.
 */
export function layoutSurnamesDigest(
  surface: DocumentSurface,
  title: string,
  results: ScoredEntry[],
): void {
  const cursor = new PageCursor(surface);
  cursor.write(title, DOC_TITLE);
  cursor.gap(8);

  if (results.length === 0) {
    cursor.write(ZERO_RESULTS_MESSAGE, BODY);
    return;
  }

  results.forEach((entry, i) => {
    cursor.write(`[${i + 1}] ${entry.title}`, { ...ENTRY_TITLE, color: TITLE_COLOR });
    cursor.gap(2);
    cursor.write(`Authors: ${surnamesOnly(entry.authors).join(", ")}`, BODY);
    cursor.write(`URL: ${entry.absUrl}`, BODY);
    cursor.gap(8);
    if (i < results.length - 1) cursor.breakIfLow();
  });
}

/**
 * Top papers with raw author names and their theorem excerpt, then the
 * remaining qualifying papers by title only.
 */
export function layoutTheoremsDigest(
  surface: DocumentSurface,
  title: string,
  detailed: DetailedResult[],
  others: ScoredEntry[],
): void {
  const cursor = new PageCursor(surface);
  cursor.write(title, DOC_TITLE);
  cursor.gap(8);

  if (detailed.length === 0 && others.length === 0) {
    cursor.write(ZERO_RESULTS_MESSAGE, BODY);
    return;
  }

  detailed.forEach(({ entry, theorem }, i) => {
    cursor.write(`[${i + 1}] ${entry.title}`, ENTRY_TITLE);
    cursor.gap(2);
    cursor.write(`Authors: ${entry.authors.join(", ")}`, BODY);
    cursor.write(`URL: ${entry.absUrl}`, BODY);
    cursor.write(`Main theorem: ${theorem || THEOREM_NOT_FOUND}`, EXCERPT);
    cursor.gap(8);
    if (i < detailed.length - 1 || others.length > 0) cursor.breakIfLow();
  });

  if (others.length === 0) return;

  cursor.write(OTHERS_HEADING, ENTRY_TITLE);
  cursor.gap(4);
  others.forEach((entry, i) => {
    cursor.write(`[${detailed.length + i + 1}] ${entry.title}`, BODY);
    if (i < others.length - 1) cursor.breakIfLow();
  });
}
