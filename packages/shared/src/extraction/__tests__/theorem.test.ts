import { describe, it, expect } from "vitest";
import {
  ELLIPSIS,
  MAX_EXCERPT_CHARS,
  findMainTheorem,
  matchTheoremRule,
  toExcerpt,
} from "../theorem.js";

describe("findMainTheorem", () => {
  it("starts the excerpt at a numbered theorem and keeps three sentences", () => {
    const text =
      "Abstract. We prove that something holds.\n\n" +
      "Theorem 1: Every curve has genus at least zero. Moreover it is smooth. " +
      "Also true! Extra sentence.";
    expect(findMainTheorem(text)).toBe(
      "Theorem 1: Every curve has genus at least zero. Moreover it is smooth. Also true!",
    );
  });

  it("prefers a Main Theorem heading over earlier lower-priority phrases", () => {
    const text =
      "Introduction\nWe show that X is projective.\n" +
      "Main Theorem. Let X be a variety. Then X is fine.";
    expect(findMainTheorem(text)).toBe(
      "Main Theorem. Let X be a variety. Then X is fine.",
    );
  });

  it("finds a Main Theorem heading merged into the preceding line", () => {
    const text = "We prove that X. Main Theorem. Every curve is nice.";
    expect(matchTheoremRule(text)).toEqual({ rule: "main-theorem-heading", index: 17 });
    expect(findMainTheorem(text)).toBe("Main Theorem. Every curve is nice.");
  });

  it("does not treat a mid-sentence 'main theorem' as a heading", () => {
    const text = "This is the main theorem of the paper. We show that Y.";
    expect(matchTheoremRule(text)?.rule).toBe("we-prove-that");
    expect(findMainTheorem(text)).toBe("We show that Y.");
  });

  it("tries rules in priority order, not by position in the text", () => {
    const text = "Our main result is below.\nTheorem: All cubics are cool.";
    expect(matchTheoremRule(text)?.rule).toBe("bare-theorem");
    expect(findMainTheorem(text)).toBe("Theorem: All cubics are cool.");
  });

  it("falls back to 'we prove that' phrasing", () => {
    const text = "In this note we prove that the moduli stack is smooth. Next.";
    expect(matchTheoremRule(text)?.rule).toBe("we-prove-that");
    expect(findMainTheorem(text)).toBe("we prove that the moduli stack is smooth. Next.");
  });

  it("finds Japanese main-theorem phrasing", () => {
    const text = "序論。本論文の主定理は次の通りである。詳細は後述。";
    expect(matchTheoremRule(text)?.rule).toBe("main-theorem-ja");
    expect(findMainTheorem(text)).toBe("主定理は次の通りである。詳細は後述。");
  });

  it("finds Japanese numbered theorems with a full-width colon", () => {
    const text = "定理 2.1：すべての曲線は滑らかである。";
    expect(matchTheoremRule(text)?.rule).toBe("numbered-theorem-ja");
    expect(findMainTheorem(text)).toBe("定理 2.1：すべての曲線は滑らかである。");
  });

  it("collapses internal whitespace", () => {
    expect(findMainTheorem("Theorem 4:\n   Let   X\tbe fine.")).toBe(
      "Theorem 4: Let X be fine.",
    );
  });

  it("returns an empty string when nothing matches", () => {
    expect(findMainTheorem("Lemma 3. A lemma about sheaves.")).toBe("");
    expect(matchTheoremRule("")).toBeUndefined();
  });

  it("truncates long excerpts to 700 characters plus an ellipsis", () => {
    const excerpt = findMainTheorem("Theorem 2: " + "a".repeat(1000));
    expect(excerpt.startsWith("Theorem 2:")).toBe(true);
    expect(excerpt.endsWith(ELLIPSIS)).toBe(true);
    expect(excerpt).toHaveLength(MAX_EXCERPT_CHARS + ELLIPSIS.length);
  });

  it("does not cut an astral character in half when truncating", () => {
    const excerpt = toExcerpt("a".repeat(MAX_EXCERPT_CHARS - 1) + "\u{1D44B}" + "b".repeat(10));
    expect(excerpt).toBe("a".repeat(MAX_EXCERPT_CHARS - 1) + ELLIPSIS);
  });

  it("ignores text past the search cap", () => {
    const text = "x ".repeat(10_500) + "Theorem 3: late.";
    expect(findMainTheorem(text)).toBe("");
  });
});
