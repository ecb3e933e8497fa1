/**
 * EditManager — surgical, undoable text edits.
 *
 * Edits work on raw bytes; nothing outside the edited span is re-encoded.
 *
 * Every mutation of an existing file follows the same sequence:
 *   1. read the current bytes
 *   2. write them to a fresh backup file and fsync it
 *   3. write the new content
 *   4. append an {@link EditRecord} (evicting the oldest past capacity)
 *
 * A failure in step 2 leaves the target untouched. `undo` walks a file's
 * records newest-first and restores the backup bytes verbatim.
 *
 * Locking: a per-path mutex serializes read-modify-write cycles on the same
 * file; the history mutex guards the shared record sequence. Locks are always
 * taken in that order.
 *
 * Paths passed in are expected to be canonical (see `PathValidator.validate`).
 *
 * @module editor/editManager
 */

import { randomUUID } from 'crypto';
import fs from 'fs/promises';
import path from 'path';

import {
  AmbiguousMatchError,
  InvalidArgumentError,
  NoHistoryError,
  NotFoundError,
  OutOfRangeError,
  errorMessage,
  hasErrorCode,
} from '../errors';
import { createLog, warn } from '../logger';
import { DEFAULT_HISTORY_CAPACITY, EditHistory, type EditRecord } from './history';
import { KeyedMutex, Mutex } from './mutex';
import { describeInsertPosition, resolveInsertIndex, type InsertPosition } from './position';
import { countOccurrences, joinLines, splice, splitLines } from './text';

const log = createLog('[Editor]');

export interface EditManagerOptions {
  backupDir: string;
  /** Maximum live records before the oldest is evicted. */
  capacity?: number;
}

export interface InsertResult {
  /** True when the file did not exist and was created with `text` as its only content. */
  created: boolean;
  /** Line index the text now occupies. */
  index: number;
  /** Undo record; null for newly created files. */
  record: EditRecord | null;
}

/** Create `target` exclusively and fsync it before returning. */
async function writeDurably(target: string, content: Buffer): Promise<void> {
  const handle = await fs.open(target, 'wx');
  try {
    await handle.writeFile(content);
    await handle.sync();
  } finally {
    await handle.close();
  }
}

async function readIfExists(filePath: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return null;
    throw error;
  }
}

export class EditManager {
  readonly backupDir: string;
  private readonly records: EditHistory;
  private readonly historyLock = new Mutex();
  private readonly pathLocks = new KeyedMutex();

  private constructor(backupDir: string, capacity: number) {
    this.backupDir = backupDir;
    this.records = new EditHistory(capacity);
  }

  /** Create the backup directory if needed and return a manager using it. */
  static async create(options: EditManagerOptions): Promise<EditManager> {
    const backupDir = path.resolve(options.backupDir);
    await fs.mkdir(backupDir, { recursive: true });
    log('Backup directory:', backupDir);
    return new EditManager(backupDir, options.capacity ?? DEFAULT_HISTORY_CAPACITY);
  }

  get capacity(): number {
    return this.records.capacity;
  }

  /**
   * Replace the single occurrence of `oldText` with `newText`.
   *
   * @throws NotFoundError when the file or `oldText` is absent
   * @throws AmbiguousMatchError when `oldText` occurs more than once
   */
  async replace(filePath: string, oldText: string, newText: string): Promise<EditRecord> {
    if (oldText.length === 0) {
      throw new InvalidArgumentError('old_str must not be empty');
    }

    return this.pathLocks.runExclusive(filePath, async () => {
      const original = await readIfExists(filePath);
      if (original === null) {
        throw new NotFoundError(`File not found: ${filePath}`);
      }

      const needle = Buffer.from(oldText, 'utf8');
      const occurrences = countOccurrences(original, needle);
      if (occurrences === 0) {
        throw new NotFoundError(`String not found in file: ${JSON.stringify(oldText)}`);
      }
      if (occurrences > 1) {
        throw new AmbiguousMatchError(occurrences);
      }

      const at = original.indexOf(needle);
      const updated = splice(original, at, needle.length, Buffer.from(newText, 'utf8'));
      const record = await this.commit(filePath, original, updated);
      log(`replace ${filePath} (record ${record.id})`);
      return record;
    });
  }

  /**
   * Insert `text` as a new line at `position`.
   *
   * A missing file is created (with parent directories) when the position is
   * the start or end; any other position on a missing file is NotFound.
   *
   * @throws OutOfRangeError when a line index falls outside `0..lineCount`
   */
  async insert(filePath: string, position: InsertPosition, text: string): Promise<InsertResult> {
    return this.pathLocks.runExclusive(filePath, async () => {
      const original = await readIfExists(filePath);

      if (original === null) {
        if (position.kind === 'line' && position.index !== 0) {
          throw new NotFoundError(
            `File doesn't exist: ${filePath}; use line_number=0/'start' or 'end'/'append' to create it`
          );
        }
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.writeFile(filePath, text, { encoding: 'utf8', flag: 'wx' });
        log(`insert created ${filePath}`);
        return { created: true, index: 0, record: null };
      }

      const lines = splitLines(original);
      const index = resolveInsertIndex(position, lines.length);
      if (index < 0 || index > lines.length) {
        throw new OutOfRangeError(index, lines.length);
      }

      lines.splice(index, 0, Buffer.from(text, 'utf8'));
      const record = await this.commit(filePath, original, joinLines(lines));
      log(`insert ${filePath} at ${describeInsertPosition(position)} (record ${record.id})`);
      return { created: false, index, record };
    });
  }

  /**
   * Restore `filePath` to its state before its most recent recorded edit.
   *
   * @throws NoHistoryError when no live record targets the file
   */
  async undo(filePath: string): Promise<EditRecord> {
    return this.pathLocks.runExclusive(filePath, () =>
      this.historyLock.runExclusive(async () => {
        const record = this.records.latestFor(filePath);
        if (!record) {
          throw new NoHistoryError(filePath);
        }

        const backup = await fs.readFile(record.backupPath);
        await fs.writeFile(filePath, backup);
        this.records.remove(record.id);
        await this.discardBackup(record.backupPath);

        log(`undo ${filePath} (record ${record.id})`);
        return record;
      })
    );
  }

  /** Live records, oldest first, optionally for a single file. */
  async history(filePath?: string): Promise<EditRecord[]> {
    return this.historyLock.runExclusive(() => this.records.list(filePath));
  }

  // ─── Internals ─────────────────────────────────────────────

  /** Back up `original`, write `updated`, then record the edit. */
  private async commit(filePath: string, original: Buffer, updated: Buffer): Promise<EditRecord> {
    const backupPath = await this.writeBackup(filePath, original);

    try {
      await fs.writeFile(filePath, updated);
    } catch (error) {
      await this.rollback(filePath, original, backupPath);
      throw error;
    }

    return this.historyLock.runExclusive(async () => {
      const { record, evicted } = this.records.append(filePath, backupPath);
      for (const old of evicted) {
        log(`evict record ${old.id} (${old.filePath})`);
        await this.discardBackup(old.backupPath);
      }
      return record;
    });
  }

  /** Persist a full copy of `content` under a fresh name and flush it to disk. */
  private async writeBackup(filePath: string, content: Buffer): Promise<string> {
    const name = `${path.basename(filePath)}.${Date.now()}.${randomUUID()}.bak`;
    const backupPath = path.join(this.backupDir, name);

    try {
      await writeDurably(backupPath, content);
    } catch (error) {
      await fs.rm(backupPath, { force: true });
      throw new Error(`Failed to write backup for ${filePath}: ${errorMessage(error)}`, { cause: error });
    }

    return backupPath;
  }

  /** Put the original bytes back after a failed write; keep the backup if that fails too. */
  private async rollback(filePath: string, original: Buffer, backupPath: string): Promise<void> {
    try {
      await fs.writeFile(filePath, original);
    } catch (error) {
      warn('[Editor]', `could not restore ${filePath} after a failed write; pre-edit copy kept at ${backupPath}:`, error);
      return;
    }
    await this.discardBackup(backupPath);
  }

  private async discardBackup(backupPath: string): Promise<void> {
    try {
      await fs.unlink(backupPath);
    } catch (error) {
      warn('[Editor]', `failed to remove backup ${backupPath}:`, error);
    }
  }
}
