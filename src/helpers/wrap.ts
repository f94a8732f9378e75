/**
 * Greedy word wrap at `maxWidth` columns.
 *
 * - Splits paragraphs on `\n`; an empty paragraph stays an empty line
 * - Whitespace at a break is dropped
 * - Tokens longer than a line are hard-broken
 */
export function wrapTextToLines(text: string, maxWidth: number): readonly string[] {
  if (text.length === 0 || maxWidth <= 0) return Object.freeze([]);

  const lines: string[] = [];
  for (const paragraph of text.split("\n")) {
    const tokens = paragraph.match(/\S+|\s+/g);
    if (!tokens) {
      lines.push("");
      continue;
    }

    let line = "";
    const flush = (): void => {
      lines.push(line.trimEnd());
      line = "";
    };

    for (const token of tokens) {
      const width = [...line].length;
      const tokenWidth = [...token].length;
      if (width + tokenWidth <= maxWidth) {
        line += token;
        continue;
      }
      if (/^\s+$/.test(token)) {
        flush();
        continue;
      }
      if (width > 0) flush();
      const chars = [...token];
      for (let start = 0; start < chars.length; start += maxWidth) {
        line = chars.slice(start, start + maxWidth).join("");
        if (start + maxWidth < chars.length) flush();
      }
    }
    if (line.length > 0) flush();
  }

  return Object.freeze(lines);
}
