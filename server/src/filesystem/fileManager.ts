/**
 * FileManager — the plain (non-undoable) filesystem tools.
 *
 * Each method takes caller-supplied paths and runs them through the
 * {@link PathValidator} before touching the disk.
 *
 * @module filesystem/fileManager
 */

import fs from 'fs/promises';
import path from 'path';

import { errorMessage, hasErrorCode, isFsGateError } from '../errors';
import { createLog } from '../logger';
import type { PathValidator } from '../sandbox/pathValidator';
import { readMetadata, type FileMetadata } from './metadata';

const log = createLog('[Files]');

export interface DirectoryEntry {
  name: string;
  type: 'directory' | 'file';
}

export type MultiReadResult =
  | { path: string; content: string }
  | { path: string; error: string };

export class FileManager {
  constructor(private readonly validator: PathValidator) {}

  async readFile(requestedPath: string): Promise<string> {
    const validPath = await this.validator.validate(requestedPath);
    return fs.readFile(validPath, 'utf8');
  }

  /** Read several files; a failure on one is reported in its slot and does not stop the rest. */
  async readMultipleFiles(requestedPaths: readonly string[]): Promise<MultiReadResult[]> {
    return Promise.all(
      requestedPaths.map(async (requestedPath): Promise<MultiReadResult> => {
        try {
          return { path: requestedPath, content: await this.readFile(requestedPath) };
        } catch (error) {
          return { path: requestedPath, error: errorMessage(error) };
        }
      })
    );
  }

  /** Create or overwrite a file. Returns the canonical path written. */
  async writeFile(requestedPath: string, content: string): Promise<string> {
    const validPath = await this.validator.validate(requestedPath);
    await fs.writeFile(validPath, content, 'utf8');
    log(`wrote ${validPath} (${content.length} chars)`);
    return validPath;
  }

  async createDirectory(requestedPath: string): Promise<string> {
    const validPath = await this.validator.validate(requestedPath);
    await fs.mkdir(validPath, { recursive: true });
    return validPath;
  }

  async listDirectory(requestedPath: string): Promise<DirectoryEntry[]> {
    const validPath = await this.validator.validate(requestedPath);
    const entries = await fs.readdir(validPath, { withFileTypes: true });
    return entries
      .map((entry): DirectoryEntry => ({
        name: entry.name,
        type: entry.isDirectory() ? 'directory' : 'file',
      }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  /** Move or rename. Refuses to replace an existing destination. */
  async moveFile(source: string, destination: string): Promise<{ source: string; destination: string }> {
    const validSource = await this.validator.validate(source);
    const validDestination = await this.validator.validate(destination);

    if (await pathExists(validDestination)) {
      throw new Error(`Destination already exists: ${validDestination}`);
    }

    await fs.rename(validSource, validDestination);
    log(`moved ${validSource} -> ${validDestination}`);
    return { source: validSource, destination: validDestination };
  }

  /**
   * Recursive, case-insensitive substring search on entry names.
   * Entries that fail validation (symlinks leaving the sandbox) are skipped
   * along with everything under them.
   */
  async searchFiles(rootPath: string, pattern: string): Promise<string[]> {
    const validRoot = await this.validator.validate(rootPath);
    const needle = pattern.toLowerCase();
    const results: string[] = [];

    const walk = async (dir: string): Promise<void> => {
      let entries;
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        log(`search: skipping unreadable ${dir}: ${errorMessage(error)}`);
        return;
      }

      for (const entry of entries) {
        const entryPath = path.join(dir, entry.name);
        try {
          await this.validator.validate(entryPath);
        } catch (error) {
          if (!isFsGateError(error)) throw error;
          continue;
        }

        if (entry.name.toLowerCase().includes(needle)) {
          results.push(entryPath);
        }
        if (entry.isDirectory()) {
          await walk(entryPath);
        }
      }
    };

    await walk(validRoot);
    return results;
  }

  async getFileInfo(requestedPath: string): Promise<FileMetadata> {
    const validPath = await this.validator.validate(requestedPath);
    return readMetadata(validPath);
  }

  listAllowedDirectories(): readonly string[] {
    return this.validator.roots;
  }
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return false;
    throw error;
  }
}
