import { describe, it, expect } from "vitest";
import { rankEntries, splitDetails } from "../rank.js";
import type { Entry, Profile, ScoredEntry, ScoringWeights } from "../../types.js";

function entry(id: string, title: string): Entry {
  return {
    id,
    title,
    summary: "",
    authors: [],
    categories: [],
    absUrl: `http://arxiv.org/abs/${id}`,
  };
}

const profile: Profile = {
  keywords: [
    { term: "hodge", weight: 3 },
    { term: "stack", weight: 1 },
    { term: "curve", weight: 2 },
  ],
  authors_priority: [],
  msc_terms: [],
  exclude: [],
};

const weights: ScoringWeights = {
  title_weight: 1,
  abstract_weight: 1,
  author_weight: 1,
  category_weight: 0.5,
  threshold: 2,
};

describe("rankEntries", () => {
  it("drops entries below the threshold and keeps those equal to it", () => {
    const ranked = rankEntries(
      [entry("a", "Stacks only"), entry("b", "Curves"), entry("c", "Nothing")],
      profile,
      weights,
    );
    expect(ranked.map((r) => r.id)).toEqual(["b"]);
    expect(ranked[0].score).toBe(2);
  });

  it("sorts by descending score", () => {
    const ranked = rankEntries(
      [
        entry("a", "Curves"),
        entry("b", "Hodge theory of stacks"),
        entry("c", "Hodge"),
      ],
      profile,
      weights,
    );
    expect(ranked.map((r) => [r.id, r.score])).toEqual([
      ["b", 4],
      ["c", 3],
      ["a", 2],
    ]);
  });

  it("keeps feed order for equal scores", () => {
    const ranked = rankEntries(
      [
        entry("first", "A curve"),
        entry("top", "Hodge curve"),
        entry("second", "Another curve"),
        entry("third", "Curve three"),
      ],
      profile,
      weights,
    );
    expect(ranked.map((r) => r.id)).toEqual(["top", "first", "second", "third"]);
    for (let i = 1; i < ranked.length; i++) {
      expect(ranked[i - 1].score).toBeGreaterThanOrEqual(ranked[i].score);
    }
  });

  it("returns an empty list when nothing qualifies", () => {
    expect(rankEntries([entry("a", "Topology")], profile, weights)).toEqual([]);
  });
});

describe("splitDetails", () => {
  const results: ScoredEntry[] = ["1", "2", "3", "4", "5"].map((id, i) => ({
    ...entry(id, `Paper ${id}`),
    score: 10 - i,
  }));

  it("lists the overflow by title when enabled", () => {
    const { detailed, others } = splitDetails(results, 3, true);
    expect(detailed.map((r) => r.id)).toEqual(["1", "2", "3"]);
    expect(others.map((r) => r.id)).toEqual(["4", "5"]);
  });

  it("drops the overflow when disabled", () => {
    const { detailed, others } = splitDetails(results, 3, false);
    expect(detailed).toHaveLength(3);
    expect(others).toEqual([]);
  });

  it("handles fewer results than the detail cap", () => {
    const { detailed, others } = splitDetails(results.slice(0, 2), 3, true);
    expect(detailed).toHaveLength(2);
    expect(others).toEqual([]);
  });
});
