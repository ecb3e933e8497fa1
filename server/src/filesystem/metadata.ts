/**
 * File metadata for `get_file_info`.
 *
 * @module filesystem/metadata
 */

import fs from 'fs/promises';
import { hasErrorCode } from '../errors';
import { splitLines } from '../editor/text';

/** Files above this size are not read for a line count. */
export const MAX_LINE_COUNT_BYTES = 10 * 1024 * 1024;

/** A NUL byte in this many leading bytes marks the file as binary. */
const BINARY_SNIFF_BYTES = 8000;

export type FileMetadata =
  | { exists: false; path: string }
  | {
      exists: true;
      path: string;
      size: number;
      created: Date;
      modified: Date;
      accessed: Date;
      isDirectory: boolean;
      isFile: boolean;
      /** Always false: metadata describes the symlink-resolved path. */
      isSymbolicLink: false;
      /** Octal permission bits, e.g. "644". */
      permissions: string;
      /** Present for regular text files up to {@link MAX_LINE_COUNT_BYTES}. */
      lineCount?: number;
    };

export function isProbablyText(content: Buffer): boolean {
  return !content.subarray(0, BINARY_SNIFF_BYTES).includes(0);
}

/**
 * Stat a canonical path. A missing file is reported, not thrown; other I/O
 * failures propagate.
 */
export async function readMetadata(filePath: string): Promise<FileMetadata> {
  let stats;
  try {
    stats = await fs.stat(filePath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return { exists: false, path: filePath };
    throw error;
  }

  let lineCount: number | undefined;
  if (stats.isFile() && stats.size <= MAX_LINE_COUNT_BYTES) {
    const content = await fs.readFile(filePath);
    if (isProbablyText(content)) {
      lineCount = splitLines(content).length;
    }
  }

  return {
    exists: true,
    path: filePath,
    size: stats.size,
    created: stats.birthtime,
    modified: stats.mtime,
    accessed: stats.atime,
    isDirectory: stats.isDirectory(),
    isFile: stats.isFile(),
    isSymbolicLink: false,
    permissions: (stats.mode & 0o777).toString(8),
    ...(lineCount === undefined ? {} : { lineCount }),
  };
}

/** `key: value` lines in the order callers read them. */
export function formatMetadata(metadata: FileMetadata): string {
  if (!metadata.exists) {
    return `exists: false\npath: ${metadata.path}`;
  }
  const lines = [
    'exists: true',
    `path: ${metadata.path}`,
    `size: ${metadata.size}`,
    `created: ${metadata.created.toISOString()}`,
    `modified: ${metadata.modified.toISOString()}`,
    `accessed: ${metadata.accessed.toISOString()}`,
    `isDirectory: ${metadata.isDirectory}`,
    `isFile: ${metadata.isFile}`,
    `isSymbolicLink: ${metadata.isSymbolicLink}`,
    `permissions: ${metadata.permissions}`,
  ];
  if (metadata.lineCount !== undefined) {
    lines.push(`lineCount: ${metadata.lineCount}`);
  }
  return lines.join('\n');
}
