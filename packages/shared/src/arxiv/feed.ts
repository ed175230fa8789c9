// =============================================================================
// @weekly-digest/shared — arXiv Atom API query
// =============================================================================
// One GET per run against the export endpoint, newest submissions first.
// No retry: a failed query ends the run.
// =============================================================================

export const ARXIV_API = "https://export.arxiv.org/api/query";
export const FEED_CATEGORY = "math.AG";

const FEED_TIMEOUT_MS = 60_000;

export interface FeedQuery {
  maxResults: number;
  start?: number;
  contact: string;
}

/** User-Agent sent with every arXiv request; the contact keeps the bot polite */
export function userAgent(contact: string): string {
  return `ag-weekly-bot (contact: ${contact})`;
}

export function buildFeedUrl(maxResults: number, start = 0): string {
  const params = new URLSearchParams({
    search_query: `cat:${FEED_CATEGORY}`,
    start: String(start),
    max_results: String(maxResults),
    sortBy: "submittedDate",
    sortOrder: "descending",
  });
  return `${ARXIV_API}?${params.toString()}`;
}

/**
 * Fetch the raw Atom XML for the configured category.
 *
 * Throws on network failure, timeout or a non-2xx status.
 */
export async function fetchFeed(query: FeedQuery): Promise<string> {
  const url = buildFeedUrl(query.maxResults, query.start ?? 0);

  let res: Response;
  try {
    res = await fetch(url, {
      signal: AbortSignal.timeout(FEED_TIMEOUT_MS),
      headers: { "User-Agent": userAgent(query.contact) },
    });
  } catch (err) {
    throw new Error(
      `arXiv fetch failed for ${FEED_CATEGORY}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (!res.ok) {
    throw new Error(
      `arXiv fetch failed for ${FEED_CATEGORY}: ${res.status} ${res.statusText}`,
    );
  }

  return res.text();
}
