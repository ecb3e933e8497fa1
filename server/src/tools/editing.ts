/**
 * Undoable edit tool handlers — str_replace, insert, undo_edit, list_edit_history.
 *
 * Paths are validated here; the editor only ever sees canonical paths, which
 * is also what its history is keyed on.
 */

import { z } from 'zod';

import type { EditRecord } from '../editor/history';
import { describeInsertPosition, parseInsertPosition } from '../editor/position';
import { defineTool, type ToolDefinition } from './types';

function serializeRecord(record: EditRecord): Record<string, unknown> {
  return {
    id: record.id,
    filePath: record.filePath,
    backupPath: record.backupPath,
    createdAt: record.createdAt.toISOString(),
  };
}

export const strReplaceTool = defineTool({
  name: 'str_replace',
  description:
    'Replace the single exact occurrence of old_str in a file with new_str. ' +
    'Fails if old_str is absent or appears more than once. Undoable with undo_edit.',
  args: z.object({
    path: z.string(),
    old_str: z.string().describe('Exact text to replace; must occur exactly once'),
    new_str: z.string().default('').describe('Replacement text (empty deletes old_str)'),
  }),
  annotations: { destructiveHint: true },
  async handler(ctx, args) {
    const filePath = await ctx.validator.validate(args.path);
    const record = await ctx.editor.replace(filePath, args.old_str, args.new_str);
    return {
      text: `Successfully replaced text in ${args.path}`,
      data: { path: filePath, record: serializeRecord(record) },
    };
  },
});

export const insertTool = defineTool({
  name: 'insert',
  description:
    'Insert text as a new line. line_number is a 0-based line index (0 = before the first line, ' +
    'line count = after the last), -1, or one of start/begin/beginning/end/append/bottom. ' +
    'A missing file is created when inserting at the start or end. Undoable with undo_edit.',
  args: z.object({
    path: z.string(),
    line_number: z.union([z.number(), z.string()]),
    text: z.string(),
  }),
  annotations: { destructiveHint: true },
  async handler(ctx, args) {
    const position = parseInsertPosition(args.line_number);
    const filePath = await ctx.validator.validate(args.path);
    const result = await ctx.editor.insert(filePath, position, args.text);

    const text = result.created
      ? `Created ${args.path} with the inserted text`
      : `Inserted text at line ${result.index} (${describeInsertPosition(position)}) in ${args.path}`;
    return {
      text,
      data: {
        path: filePath,
        created: result.created,
        index: result.index,
        record: result.record ? serializeRecord(result.record) : null,
      },
    };
  },
});

export const undoEditTool = defineTool({
  name: 'undo_edit',
  description: 'Revert the most recent str_replace or insert on a file. Repeat to step further back.',
  args: z.object({ path: z.string() }),
  annotations: { destructiveHint: true },
  async handler(ctx, args) {
    const filePath = await ctx.validator.validate(args.path);
    const record = await ctx.editor.undo(filePath);
    return {
      text: `Successfully undid last edit to ${args.path}`,
      data: { path: filePath, record: serializeRecord(record) },
    };
  },
});

export const listEditHistoryTool = defineTool({
  name: 'list_edit_history',
  description: 'List undoable edits, oldest first. Pass a path to only see edits to that file.',
  args: z.object({ path: z.string().optional() }),
  annotations: { readOnlyHint: true },
  async handler(ctx, args) {
    const filePath = args.path === undefined ? undefined : await ctx.validator.validate(args.path);
    const records = await ctx.editor.history(filePath);

    if (records.length === 0) {
      return {
        text: filePath === undefined ? 'No edit history' : `No edit history for ${args.path}`,
        data: { records: [] },
      };
    }

    const text = records
      .map((record) => `#${record.id} ${record.createdAt.toISOString()} ${record.filePath}`)
      .join('\n');
    return { text, data: { records: records.map(serializeRecord) } };
  },
});

export const editingTools: readonly ToolDefinition[] = [
  strReplaceTool,
  insertTool,
  undoEditTool,
  listEditHistoryTool,
];
