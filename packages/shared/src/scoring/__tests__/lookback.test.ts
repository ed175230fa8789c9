import { describe, it, expect } from "vitest";
import { candidateTime, filterByLookback, isWithinLookback } from "../lookback.js";
import type { Entry } from "../../types.js";

const NOW = new Date("2024-03-14T09:00:00Z");

function entry(published?: string, updated?: string): Entry {
  return {
    id: "x",
    title: "t",
    summary: "s",
    authors: [],
    categories: [],
    absUrl: "x",
    published,
    updated,
  };
}

describe("isWithinLookback", () => {
  it("includes an entry updated exactly N days ago", () => {
    expect(isWithinLookback(entry(undefined, "2024-03-07T09:00:00Z"), 7, NOW)).toBe(true);
  });

  it("excludes an entry updated N+1 days ago", () => {
    expect(isWithinLookback(entry(undefined, "2024-03-06T09:00:00Z"), 7, NOW)).toBe(false);
  });

  it("truncates partial days instead of rounding", () => {
    // 7 days and 23 hours old is still 7 whole days
    expect(isWithinLookback(entry("2024-03-06T10:00:00Z"), 7, NOW)).toBe(true);
  });

  it("uses the later of updated and published", () => {
    const e = entry("2024-01-01T00:00:00Z", "2024-03-13T00:00:00Z");
    expect(isWithinLookback(e, 7, NOW)).toBe(true);
  });

  it("falls back to published when updated does not parse", () => {
    expect(isWithinLookback(entry("2024-03-12T00:00:00Z", "yesterday"), 1, NOW)).toBe(false);
    expect(isWithinLookback(entry("2024-03-12T00:00:00Z", "yesterday"), 2, NOW)).toBe(true);
  });

  it("includes entries with no parseable date", () => {
    expect(isWithinLookback(entry(), 7, NOW)).toBe(true);
    expect(isWithinLookback(entry("not a date", ""), 7, NOW)).toBe(true);
  });

  it("keeps entries whose timestamps are not ISO-8601 date-times", () => {
    for (const loose of ["12/25/2020", "1", "March 1 2020", "2020-12-25"]) {
      expect(isWithinLookback(entry(undefined, loose), 7, NOW)).toBe(true);
    }
  });

  it("ignores a date-time without a zone instead of reading it as local time", () => {
    expect(candidateTime(entry("2020-01-01T00:00:00"))).toBeUndefined();
    expect(candidateTime(entry("2020-01-01T00:00:00.250Z"))).toBe(
      Date.UTC(2020, 0, 1, 0, 0, 0, 250),
    );
  });

  it("honours explicit UTC offsets", () => {
    // 2024-03-07T18:00:00+09:00 is exactly 7 days before NOW
    expect(isWithinLookback(entry("2024-03-07T18:00:00+09:00"), 7, NOW)).toBe(true);
    expect(isWithinLookback(entry("2024-03-06T17:59:59+09:00"), 7, NOW)).toBe(false);
  });
});

describe("candidateTime", () => {
  it("returns undefined when neither timestamp parses", () => {
    expect(candidateTime(entry("?", "?"))).toBeUndefined();
  });

  it("returns the later timestamp in milliseconds", () => {
    expect(candidateTime(entry("2024-03-01T00:00:00Z", "2024-02-01T00:00:00Z"))).toBe(
      Date.UTC(2024, 2, 1),
    );
  });
});

describe("filterByLookback", () => {
  it("keeps order and drops stale entries", () => {
    const entries = [
      { ...entry("2024-03-13T00:00:00Z"), id: "fresh" },
      { ...entry("2023-12-01T00:00:00Z"), id: "stale" },
      { ...entry(), id: "undated" },
    ];
    expect(filterByLookback(entries, 7, NOW).map((e) => e.id)).toEqual(["fresh", "undated"]);
  });
});
