import type { Entry } from "../types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

// ISO-8601 date-time with an explicit zone; anything else is unparseable.
const ISO_DATE_TIME =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})$/;

function parseIso(value: string | undefined): number | undefined {
  if (!value || !ISO_DATE_TIME.test(value.trim())) return undefined;
  const ms = Date.parse(value.trim());
  return Number.isNaN(ms) ? undefined : ms;
}

/** Later of `updated` / `published`, or undefined when neither parses */
export function candidateTime(entry: Entry): number | undefined {
  const times = [parseIso(entry.updated), parseIso(entry.published)].filter(
    (t): t is number => t !== undefined,
  );
  return times.length > 0 ? Math.max(...times) : undefined;
}

/**
 * True when the entry is at most `days` whole days old.
 *
 * Elapsed time is truncated to whole days, so an entry exactly `days` old is
 * kept. Entries without a usable date are kept too.
 */
export function isWithinLookback(
  entry: Entry,
  days: number,
  now: Date = new Date(),
): boolean {
  const candidate = candidateTime(entry);
  if (candidate === undefined) return true;
  const elapsedDays = Math.floor((now.getTime() - candidate) / DAY_MS);
  return elapsedDays <= days;
}

export function filterByLookback<T extends Entry>(
  entries: T[],
  days: number,
  now: Date = new Date(),
): T[] {
  return entries.filter((e) => isWithinLookback(e, days, now));
}
