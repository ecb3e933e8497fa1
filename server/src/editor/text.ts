/**
 * Byte-level helpers for the editor: occurrence counting, splicing and line
 * splitting. File content is never decoded, so bytes outside the edited span
 * are written back exactly as read.
 */

const NEWLINE = 0x0a;

/** Non-overlapping occurrences of a non-empty `needle` in `haystack`. */
export function countOccurrences(haystack: Buffer, needle: Buffer): number {
  if (needle.length === 0) {
    throw new RangeError('needle must not be empty');
  }
  let count = 0;
  let from = 0;
  for (;;) {
    const index = haystack.indexOf(needle, from);
    if (index === -1) return count;
    count += 1;
    from = index + needle.length;
  }
}

/** Replace `length` bytes at `at` with `replacement`. */
export function splice(content: Buffer, at: number, length: number, replacement: Buffer): Buffer {
  return Buffer.concat([content.subarray(0, at), replacement, content.subarray(at + length)]);
}

/**
 * Split on `\n`. A final newline terminates the last line rather than
 * starting an empty one, so `"a\nb\n"` has two lines and `""` has none.
 * Carriage returns stay part of their line.
 */
export function splitLines(content: Buffer): Buffer[] {
  if (content.length === 0) return [];
  const lines: Buffer[] = [];
  let start = 0;
  for (;;) {
    const end = content.indexOf(NEWLINE, start);
    if (end === -1) {
      if (start < content.length) lines.push(content.subarray(start));
      return lines;
    }
    lines.push(content.subarray(start, end));
    start = end + 1;
  }
}

export function joinLines(lines: readonly Buffer[]): Buffer {
  const parts: Buffer[] = [];
  lines.forEach((line, i) => {
    if (i > 0) parts.push(Buffer.from([NEWLINE]));
    parts.push(line);
  });
  return Buffer.concat(parts);
}
