/**
 * Greedy word wrap by character count. Runs of whitespace collapse, words
 * longer than `width` are split, and blank input produces no lines.
 */
export function wrapText(text: string, width: number): string[] {
  const words = text.split(/\s+/).filter((w) => w !== "");
  const lines: string[] = [];
  let current = "";

  for (const word of words) {
    let rest = word;
    while (rest.length > width) {
      if (current) {
        const room = width - current.length - 1;
        if (room > 0) {
          lines.push(`${current} ${rest.slice(0, room)}`);
          rest = rest.slice(room);
        } else {
          lines.push(current);
        }
        current = "";
        continue;
      }
      lines.push(rest.slice(0, width));
      rest = rest.slice(width);
    }
    if (!rest) continue;
    if (!current) {
      current = rest;
    } else if (current.length + 1 + rest.length <= width) {
      current = `${current} ${rest}`;
    } else {
      lines.push(current);
      current = rest;
    }
  }

  if (current) lines.push(current);
  return lines;
}
