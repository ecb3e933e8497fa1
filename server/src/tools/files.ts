/**
 * Plain filesystem tool handlers — read, write, list, move, search, info.
 */

import { z } from 'zod';

import { formatMetadata } from '../filesystem/metadata';
import { defineTool, type ToolDefinition } from './types';

const PathArgs = z.object({
  path: z.string().describe('File or directory path (absolute, relative to the server cwd, or ~-prefixed)'),
});

export const readFileTool = defineTool({
  name: 'read_file',
  description: 'Read the complete contents of a file as UTF-8 text. Only works within allowed directories.',
  args: PathArgs,
  annotations: { readOnlyHint: true },
  async handler(ctx, args) {
    const content = await ctx.files.readFile(args.path);
    return { text: content, data: { path: args.path, content } };
  },
});

export const readMultipleFilesTool = defineTool({
  name: 'read_multiple_files',
  description:
    'Read several files at once. Each file is reported under its path; a failure on one file does not stop the others.',
  args: z.object({
    paths: z.array(z.string()).min(1).describe('Paths of the files to read'),
  }),
  annotations: { readOnlyHint: true },
  async handler(ctx, args) {
    const results = await ctx.files.readMultipleFiles(args.paths);
    const text = results
      .map((result) => ('content' in result ? `${result.path}:\n${result.content}\n` : `${result.path}: Error - ${result.error}`))
      .join('\n---\n');
    return { text, data: { files: results } };
  },
});

export const writeFileTool = defineTool({
  name: 'write_file',
  description: 'Create a new file or overwrite an existing one. Overwrites are not undoable.',
  args: z.object({
    path: z.string(),
    content: z.string(),
  }),
  annotations: { destructiveHint: true },
  async handler(ctx, args) {
    const written = await ctx.files.writeFile(args.path, args.content);
    return { text: `Successfully wrote to ${args.path}`, data: { path: written } };
  },
});

export const createDirectoryTool = defineTool({
  name: 'create_directory',
  description: 'Create a directory, including missing parents. Succeeds silently if it already exists.',
  args: PathArgs,
  async handler(ctx, args) {
    const created = await ctx.files.createDirectory(args.path);
    return { text: `Successfully created directory ${args.path}`, data: { path: created } };
  },
});

export const listDirectoryTool = defineTool({
  name: 'list_directory',
  description: 'List the entries of a directory, each prefixed with [DIR] or [FILE].',
  args: PathArgs,
  annotations: { readOnlyHint: true },
  async handler(ctx, args) {
    const entries = await ctx.files.listDirectory(args.path);
    const text = entries
      .map((entry) => `${entry.type === 'directory' ? '[DIR]' : '[FILE]'} ${entry.name}`)
      .join('\n');
    return { text, data: { entries } };
  },
});

export const moveFileTool = defineTool({
  name: 'move_file',
  description: 'Move or rename a file or directory. Fails if the destination already exists.',
  args: z.object({
    source: z.string(),
    destination: z.string(),
  }),
  annotations: { destructiveHint: true },
  async handler(ctx, args) {
    const moved = await ctx.files.moveFile(args.source, args.destination);
    return { text: `Successfully moved ${args.source} to ${args.destination}`, data: moved };
  },
});

export const searchFilesTool = defineTool({
  name: 'search_files',
  description:
    'Recursively search below a directory for entries whose name contains the pattern (case-insensitive).',
  args: z.object({
    path: z.string(),
    pattern: z.string().min(1),
  }),
  annotations: { readOnlyHint: true },
  async handler(ctx, args) {
    const matches = await ctx.files.searchFiles(args.path, args.pattern);
    return {
      text: matches.length > 0 ? matches.join('\n') : 'No matches found',
      data: { matches },
    };
  },
});

export const getFileInfoTool = defineTool({
  name: 'get_file_info',
  description:
    'Size, timestamps, type and permissions of a file or directory, plus a line count for text files.',
  args: PathArgs,
  annotations: { readOnlyHint: true },
  async handler(ctx, args) {
    const info = await ctx.files.getFileInfo(args.path);
    return { text: formatMetadata(info), data: { info } };
  },
});

export const listAllowedDirectoriesTool = defineTool({
  name: 'list_allowed_directories',
  description: 'List the directories this server is allowed to access.',
  args: z.object({}),
  annotations: { readOnlyHint: true },
  async handler(ctx) {
    const directories = [...ctx.files.listAllowedDirectories()];
    return { text: `Allowed directories:\n${directories.join('\n')}`, data: { directories } };
  },
});

export const fileTools: readonly ToolDefinition[] = [
  readFileTool,
  readMultipleFilesTool,
  writeFileTool,
  createDirectoryTool,
  listDirectoryTool,
  moveFileTool,
  searchFilesTool,
  getFileInfoTool,
  listAllowedDirectoriesTool,
];
