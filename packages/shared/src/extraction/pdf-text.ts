import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import { MAX_SEARCH_CHARS } from "./theorem.js";

/** Turns PDF bytes into plain text, reading at most `maxChars` */
export type TextExtractor = (data: Uint8Array, maxChars: number) => Promise<string>;

/**
 * Best-effort plain text from a PDF via pdfjs. Pages are read in order and
 * reading stops once `maxChars` characters have been collected.
 */
export const extractPdfText: TextExtractor = async (
  data,
  maxChars = MAX_SEARCH_CHARS,
) => {
  const loadingTask = getDocument({
    data,
    isEvalSupported: false,
    useSystemFonts: true,
  });
  const doc = await loadingTask.promise;

  try {
    let out = "";
    for (let pageNo = 1; pageNo <= doc.numPages && out.length < maxChars; pageNo++) {
      const page = await doc.getPage(pageNo);
      const content = await page.getTextContent();
      for (const item of content.items) {
        if (!("str" in item)) continue;
        out += item.str;
        out += item.hasEOL ? "\n" : " ";
      }
      out += "\n";
      page.cleanup();
    }
    return out.slice(0, maxChars);
  } finally {
    await doc.destroy();
  }
};
