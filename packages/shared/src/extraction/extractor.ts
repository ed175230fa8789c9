// =============================================================================
// @weekly-digest/shared — PDF download + main-theorem extraction
// =============================================================================
// Each top-ranked paper's PDF is written to one transient file inside a
// per-run temporary directory, read back, searched, and removed again on
// every exit path. Failures degrade to an empty excerpt for that paper only.
// Downloads run one at a time with a fixed pause after each attempt.
// =============================================================================

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { userAgent } from "../arxiv/feed.js";
import type { DetailedResult, ScoredEntry } from "../types.js";
import { extractPdfText, type TextExtractor } from "./pdf-text.js";
import { findMainTheorem, MAX_SEARCH_CHARS } from "./theorem.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const DOWNLOAD_TIMEOUT_MS = 120_000;
export const DEFAULT_DELAY_MS = 3_000;
/** Reused across iterations; the directory around it is unique per run */
export const TRANSIENT_FILE = "current.pdf";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ExtractionLogger {
  debug: (msg: string, data?: Record<string, unknown>) => void;
  warn: (msg: string, data?: Record<string, unknown>) => void;
}

export interface TheoremExtractorOptions {
  contact: string;
  logger: ExtractionLogger;
  /** Pause after each download attempt (default 3 s) */
  delayMs?: number;
  readText?: TextExtractor;
  tmpRoot?: string;
}

// ---------------------------------------------------------------------------
// Extractor
// ---------------------------------------------------------------------------

export class TheoremExtractor {
  private readonly contact: string;
  private readonly logger: ExtractionLogger;
  private readonly delayMs: number;
  private readonly readText: TextExtractor;
  private readonly tmpRoot: string;
  private workDir: string | undefined;

  constructor(options: TheoremExtractorOptions) {
    this.contact = options.contact;
    this.logger = options.logger;
    this.delayMs = options.delayMs ?? DEFAULT_DELAY_MS;
    this.readText = options.readText ?? extractPdfText;
    this.tmpRoot = options.tmpRoot ?? tmpdir();
  }

  /**
   * Excerpt for one PDF, or "" on any download, I/O or parse failure.
   * Never throws.
   */
  async extract(pdfUrl: string): Promise<string> {
    let path: string | undefined;
    try {
      path = join(await this.ensureWorkDir(), TRANSIENT_FILE);
      const data = await this.download(pdfUrl);
      await writeFile(path, data);
      const bytes = await readFile(path);
      const text = await this.readText(new Uint8Array(bytes), MAX_SEARCH_CHARS);
      return findMainTheorem(text);
    } catch (err) {
      this.logger.warn("Theorem extraction failed", {
        pdfUrl,
        error: err instanceof Error ? err.message : String(err),
      });
      return "";
    } finally {
      if (path) await this.discard(path);
    }
  }

  /** Sequential extraction over the detailed results, in ranked order */
  async extractAll(entries: ScoredEntry[]): Promise<DetailedResult[]> {
    const results: DetailedResult[] = [];
    for (const entry of entries) {
      if (!entry.pdfUrl) {
        results.push({ entry, theorem: "" });
        continue;
      }
      const theorem = await this.extract(entry.pdfUrl);
      results.push({ entry, theorem });
      if (this.delayMs > 0) await sleep(this.delayMs);
    }
    return results;
  }

  /** Remove the per-run directory. Safe to call more than once. */
  async dispose(): Promise<void> {
    const dir = this.workDir;
    this.workDir = undefined;
    if (!dir) return;
    try {
      await rm(dir, { recursive: true, force: true });
    } catch (err) {
      this.logger.debug("Temporary directory cleanup failed", {
        dir,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private async ensureWorkDir(): Promise<string> {
    if (!this.workDir) {
      this.workDir = await mkdtemp(join(this.tmpRoot, "weekly-digest-"));
    }
    return this.workDir;
  }

  private async download(pdfUrl: string): Promise<Uint8Array> {
    const start = performance.now();
    const res = await fetch(pdfUrl, {
      signal: AbortSignal.timeout(DOWNLOAD_TIMEOUT_MS),
      headers: { "User-Agent": userAgent(this.contact) },
    });
    if (!res.ok) {
      throw new Error(`PDF download failed: ${res.status} ${res.statusText}`);
    }
    const data = new Uint8Array(await res.arrayBuffer());
    this.logger.debug("PDF downloaded", {
      pdfUrl,
      bytes: data.byteLength,
      durationMs: Math.round(performance.now() - start),
    });
    return data;
  }

  private async discard(path: string): Promise<void> {
    try {
      await rm(path, { force: true });
    } catch (err) {
      this.logger.debug("Transient file cleanup failed", {
        path,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
