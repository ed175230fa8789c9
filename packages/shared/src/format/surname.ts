/**
 * Surname of one author name.
 *
 * "Last, First Middle" → "Last"; "First Middle Last" → "Last". Periods and
 * commas are stripped from the result.
 */
export function surname(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) return "";

  let last: string;
  if (trimmed.includes(",")) {
    last = trimmed.split(",")[0].trim();
  } else {
    const parts = trimmed.split(/\s+/);
    last = parts[parts.length - 1];
  }
  return last.replace(/[.,]/g, "");
}

/** Surnames in author order, duplicates kept, empty results dropped */
export function surnamesOnly(authors: string[]): string[] {
  return authors.map(surname).filter((s) => s !== "");
}
