/**
 * Greedy word wrap. Whitespace inside a line is kept as written and dropped
 * at line breaks. Words longer than the width are split, filling the
 * remainder of the current line first.
 */
export function wrapText(text: string, maxWidth: number): string[] {
  const width = Math.max(1, maxWidth);
  const lines: string[] = [];
  let current = '';

  const flush = (): void => {
    const line = current.trimEnd();
    if (line.length > 0) {
      lines.push(line);
    }
    current = '';
  };

  for (const chunk of text.match(/\s+|\S+/g) ?? []) {
    if (/^\s/.test(chunk)) {
      if (current.length > 0) {
        current += chunk;
      }
      continue;
    }

    let rest = chunk;
    while (rest.length > 0) {
      if (current.length + rest.length <= width) {
        current += rest;
        rest = '';
      } else if (rest.length > width) {
        const room = width - current.length;
        if (room > 0) {
          current += rest.slice(0, room);
          rest = rest.slice(room);
        }
        flush();
      } else {
        flush();
      }
    }
  }

  flush();
  return lines;
}
