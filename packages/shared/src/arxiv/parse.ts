import { XMLParser } from "fast-xml-parser";
import type { Entry } from "../types.js";

const REPEATED_TAGS = new Set(["entry", "author", "link", "category"]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (name) => REPEATED_TAGS.has(name),
});

type XmlNode = Record<string, unknown>;

function asNode(x: unknown): XmlNode | undefined {
  if (typeof x === "object" && x !== null && !Array.isArray(x)) {
    return x as XmlNode;
  }
  return undefined;
}

function asNodes(x: unknown): XmlNode[] {
  if (!Array.isArray(x)) return [];
  return x.flatMap((item) => {
    const node = asNode(item);
    return node ? [node] : [];
  });
}

// Elements carrying attributes come back as { "#text": ..., "@_attr": ... }
function text(x: unknown): string {
  if (typeof x === "string") return x;
  if (typeof x === "number") return String(x);
  const node = asNode(x);
  if (node) return text(node["#text"]);
  return "";
}

function attr(node: XmlNode, name: string): string {
  return text(node[`@_${name}`]);
}

function optional(value: string): string | undefined {
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

// The `title="pdf"` link wins (last one, like a keyed lookup), then the
// first link typed as a PDF.
function findPdfUrl(links: XmlNode[]): string | undefined {
  let titled: string | undefined;
  for (const link of links) {
    if (attr(link, "title") === "pdf") titled = attr(link, "href");
  }
  if (titled) return titled;
  const typed = links.find((link) => attr(link, "type") === "application/pdf");
  return typed ? optional(attr(typed, "href")) : undefined;
}

/**
 * Convert an arXiv Atom document into entries, in feed order.
 *
 * The API reports query errors as a single entry under `/api/errors`; that
 * is surfaced as a thrown error rather than a bogus paper.
 */
export function parseAtom(xml: string): Entry[] {
  const doc = asNode(parser.parse(xml));
  const feed = asNode(doc?.feed);
  const entries = asNodes(feed?.entry);

  return entries.map((e) => {
    const id = text(e.id).trim();
    if (id.includes("/api/errors")) {
      throw new Error(`arXiv API error: ${text(e.summary).trim()}`);
    }

    const authors = asNodes(e.author).map((a) => text(a.name).trim());
    const categories = asNodes(e.category)
      .map((c) => attr(c, "term"))
      .filter(Boolean);

    return {
      id,
      title: text(e.title).trim(),
      summary: text(e.summary).trim(),
      authors,
      published: optional(text(e.published)),
      updated: optional(text(e.updated)),
      categories,
      absUrl: id,
      pdfUrl: findPdfUrl(asNodes(e.link)),
    } satisfies Entry;
  });
}
