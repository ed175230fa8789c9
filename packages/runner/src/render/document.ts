import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import {
  FEED_CATEGORY,
  type DetailedResult,
  type ScoredEntry,
} from "@weekly-digest/shared";
import { layoutSurnamesDigest, layoutTheoremsDigest } from "./layout.js";
import { createPdfSurface, type SurfaceFactory } from "./surface.js";

/** Output file names and titles use Japan time whatever the host zone is */
const JST_OFFSET_MS = 9 * 60 * 60 * 1000;

/** YYYY-MM-DD of `now` in UTC+9 */
export function jstDate(now: Date): string {
  return new Date(now.getTime() + JST_OFFSET_MS).toISOString().slice(0, 10);
}

export function digestFilename(prefix: string, now: Date): string {
  return `${prefix}_${jstDate(now)}.pdf`;
}

export function digestTitle(now: Date): string {
  return `${FEED_CATEGORY} weekly picks (${jstDate(now)})`;
}

export type DigestContent =
  | { mode: "surnames"; results: ScoredEntry[] }
  | { mode: "theorems"; detailed: DetailedResult[]; others: ScoredEntry[] };

export interface RenderOptions {
  outputDir: string;
  filenamePrefix: string;
  now: Date;
  fontPath?: string;
  surfaceFactory?: SurfaceFactory;
}

/**
 * Lay the content out into `<outputDir>/<prefix>_<date>.pdf` and return the
 * written path. The directory is created when missing.
 */
export async function renderDigest(
  content: DigestContent,
  options: RenderOptions,
): Promise<string> {
  await mkdir(options.outputDir, { recursive: true });
  const path = join(options.outputDir, digestFilename(options.filenamePrefix, options.now));
  const title = digestTitle(options.now);

  const surface = (options.surfaceFactory ?? createPdfSurface)({
    path,
    title,
    fontPath: options.fontPath,
  });

  switch (content.mode) {
    case "surnames":
      layoutSurnamesDigest(surface, title, content.results);
      break;
    case "theorems":
      layoutTheoremsDigest(surface, title, content.detailed, content.others);
      break;
  }

  await surface.end();
  return path;
}
