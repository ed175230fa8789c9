// =============================================================================
// @weekly-digest/runner — Drawing surface for the digest document
// =============================================================================
// The layout engine only knows about absolute text placement and page
// breaks. Coordinates use a bottom-left origin with y growing upward, so a
// cursor starts near the page height and moves down. PdfKitSurface flips
// them for pdfkit's top-left origin.
// =============================================================================

import { createWriteStream } from "node:fs";
import { access, constants } from "node:fs/promises";
import { createRequire } from "node:module";
import { finished } from "node:stream/promises";
import PDFDocument from "pdfkit";
import type { DigestMode } from "@weekly-digest/shared";

export type Rgb = [number, number, number];

export interface TextStyle {
  size: number;
  color?: Rgb;
}

export interface DocumentSurface {
  readonly width: number;
  readonly height: number;
  /** Draw a single line with its baseline at (x, y) */
  drawText(text: string, x: number, y: number, style: TextStyle): void;
  addPage(): void;
  /** Flush the document; resolves once it is fully written */
  end(): Promise<void>;
}

export interface SurfaceOptions {
  path: string;
  title: string;
  fontPath?: string;
}

export type SurfaceFactory = (options: SurfaceOptions) => DocumentSurface;

/** A4 in PDF points */
export const A4: { width: number; height: number } = {
  width: 595.28,
  height: 841.89,
};

export const BLACK: Rgb = [0, 0, 0];

const BODY_FONT = "digest-body";

// ---------------------------------------------------------------------------
// Fonts
// ---------------------------------------------------------------------------

/** Liberation Sans as shipped in pdfjs-dist: Latin, Greek, Cyrillic, no CJK */
export function defaultFontPath(): string {
  return createRequire(import.meta.url).resolve(
    "pdfjs-dist/standard_fonts/LiberationSans-Regular.ttf",
  );
}

/**
 * Font file for this run. Theorem excerpts can be Japanese, so theorems mode
 * needs an explicit CJK-capable FONT_PATH; surnames mode falls back to the
 * bundled font. Throws when the chosen file is not readable.
 */
export async function resolveFontPath(
  mode: DigestMode,
  fontPath: string | undefined,
): Promise<string> {
  if (fontPath === undefined) {
    if (mode === "theorems") {
      throw new Error("FONT_PATH must name a TTF/OTF font with CJK glyphs in theorems mode");
    }
    return defaultFontPath();
  }
  try {
    await access(fontPath, constants.R_OK);
  } catch (err) {
    throw new Error(
      `Cannot read font ${fontPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return fontPath;
}

// ---------------------------------------------------------------------------
// pdfkit
// ---------------------------------------------------------------------------

export class PdfKitSurface implements DocumentSurface {
  readonly width = A4.width;
  readonly height = A4.height;
  private readonly doc: PDFKit.PDFDocument;
  private readonly written: Promise<void>;

  constructor(options: SurfaceOptions) {
    this.doc = new PDFDocument({
      size: "A4",
      margin: 0,
      info: { Title: options.title },
    });
    const out = createWriteStream(options.path);
    this.doc.pipe(out);
    this.written = finished(out);

    // Embedded TrueType only: the built-in AFM fonts are WinAnsi.
    this.doc.registerFont(BODY_FONT, options.fontPath ?? defaultFontPath());
    this.doc.font(BODY_FONT);
  }

  drawText(text: string, x: number, y: number, style: TextStyle): void {
    this.doc
      .fontSize(style.size)
      .fillColor(style.color ?? BLACK)
      .text(text, x, this.height - y, { lineBreak: false, baseline: "alphabetic" });
  }

  addPage(): void {
    this.doc.addPage({ size: "A4", margin: 0 });
  }

  async end(): Promise<void> {
    this.doc.end();
    await this.written;
  }
}

export const createPdfSurface: SurfaceFactory = (options) => new PdfKitSurface(options);
