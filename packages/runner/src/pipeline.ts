// =============================================================================
// @weekly-digest/runner — One digest run, end to end
// =============================================================================
// config (+ font) → fetch → parse → lookback filter → rank → (extract) → render.
// Each run is self-contained: nothing survives it but the written PDF.
// Configuration and fetch failures propagate; extraction failures degrade
// to a missing excerpt inside TheoremExtractor.
// =============================================================================

import {
  type DigestConfig,
  type EnvConfig,
  type RunSummary,
  type ScoredEntry,
  type TextExtractor,
  TheoremExtractor,
  fetchFeed,
  filterByLookback,
  loadDigestConfig,
  parseAtom,
  rankEntries,
  splitDetails,
} from "@weekly-digest/shared";
import {
  createRunId,
  describeError,
  logExternalCall,
  timeStage,
  type Logger,
} from "./logger.js";
import { renderDigest, type DigestContent } from "./render/document.js";
import { resolveFontPath, type SurfaceFactory } from "./render/surface.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunDependencies {
  env: EnvConfig;
  logger: Logger;
  /** Clock for the lookback window and the output date */
  now?: () => Date;
  surfaceFactory?: SurfaceFactory;
  /** PDF text extraction, pdfjs by default */
  readText?: TextExtractor;
  /** Pause between PDF downloads, 3 s by default */
  extractDelayMs?: number;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function buildTheoremContent(
  cfg: DigestConfig,
  ranked: ScoredEntry[],
  deps: RunDependencies,
  logger: Logger,
): Promise<DigestContent> {
  const { detailed, others } = splitDetails(
    ranked,
    cfg.limits.max_details ?? 0,
    cfg.output.include_others_titles,
  );

  const extractor = new TheoremExtractor({
    contact: deps.env.ARXIV_CONTACT,
    logger,
    delayMs: deps.extractDelayMs,
    readText: deps.readText,
  });

  try {
    const results = await timeStage(logger, "extract", () =>
      extractor.extractAll(detailed),
    );
    return { mode: "theorems", detailed: results, others };
  } finally {
    await extractor.dispose();
  }
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

export async function runDigest(deps: RunDependencies): Promise<RunSummary> {
  const { env } = deps;
  const now = (deps.now ?? (() => new Date()))();
  const logger = deps.logger.child({ runId: createRunId() });

  const { cfg, fontPath } = await timeStage(logger, "config", async () => {
    const loaded = await loadDigestConfig(env.DIGEST_CONFIG);
    return { cfg: loaded, fontPath: await resolveFontPath(loaded.mode, env.FONT_PATH) };
  });
  logger.info("Digest run starting", {
    mode: cfg.mode,
    maxFetch: cfg.limits.max_fetch,
    lookbackDays: cfg.limits.lookback_days,
  });

  const xml = await timeStage(logger, "fetch", async () => {
    const start = performance.now();
    try {
      const body = await fetchFeed({
        maxResults: cfg.limits.max_fetch,
        contact: env.ARXIV_CONTACT,
      });
      logExternalCall(logger, "arxiv", "query", Math.round(performance.now() - start));
      return body;
    } catch (err) {
      logExternalCall(
        logger,
        "arxiv",
        "query",
        Math.round(performance.now() - start),
        describeError(err),
      );
      throw err;
    }
  });

  const entries = await timeStage(logger, "parse", async () => parseAtom(xml));
  const recent = filterByLookback(entries, cfg.limits.lookback_days, now);
  const ranked = await timeStage(logger, "rank", async () =>
    rankEntries(recent, cfg.profile, cfg.scoring),
  );

  const content: DigestContent =
    cfg.mode === "theorems"
      ? await buildTheoremContent(cfg, ranked, deps, logger)
      : { mode: "surnames", results: ranked };

  const pdf = await timeStage(logger, "render", () =>
    renderDigest(content, {
      outputDir: env.OUTPUT_DIR,
      filenamePrefix: cfg.output.filename_prefix,
      now,
      fontPath,
      surfaceFactory: deps.surfaceFactory,
    }),
  );

  const summary: RunSummary = {
    mode: cfg.mode,
    fetched_count: entries.length,
    recent_count: recent.length,
    listed_count: ranked.length,
    pdf,
  };
  if (content.mode === "theorems") {
    summary.detailed_count = content.detailed.length;
    summary.others_count = content.others.length;
  }

  logger.info("Digest run completed", { ...summary });
  return summary;
}
