/**
 * Insert positions: a zero-based line index or one of the two file ends.
 *
 * The `insert` tool accepts an integer, `-1`, or a keyword; the value is
 * decoded here once so the editor only ever sees the tagged form.
 */

import { InvalidArgumentError } from '../errors';

export type InsertPosition =
  | { kind: 'line'; index: number }
  | { kind: 'start' }
  | { kind: 'end' };

const START_KEYWORDS = new Set(['start', 'begin', 'beginning']);
const END_KEYWORDS = new Set(['end', 'append', 'bottom']);

export function parseInsertPosition(value: unknown): InsertPosition {
  if (typeof value === 'number') {
    if (!Number.isInteger(value)) {
      throw new InvalidArgumentError(`line_number must be an integer, got ${value}`);
    }
    if (value === -1) return { kind: 'end' };
    return { kind: 'line', index: value };
  }

  if (typeof value === 'string') {
    const keyword = value.trim().toLowerCase();
    if (START_KEYWORDS.has(keyword)) return { kind: 'start' };
    if (END_KEYWORDS.has(keyword)) return { kind: 'end' };
    throw new InvalidArgumentError(
      `Invalid line_number keyword: "${value}" (use 'start', 'end', 'append', or an integer)`
    );
  }

  throw new InvalidArgumentError("line_number must be an integer or keyword ('start'/'end'/'append')");
}

/** Line index the position stands for in a file of `lineCount` lines. */
export function resolveInsertIndex(position: InsertPosition, lineCount: number): number {
  switch (position.kind) {
    case 'start':
      return 0;
    case 'end':
      return lineCount;
    case 'line':
      return position.index;
  }
}

export function describeInsertPosition(position: InsertPosition): string {
  return position.kind === 'line' ? `line ${position.index}` : position.kind;
}
