/**
 * Bounded, globally ordered record of edits that can still be undone.
 *
 * Records are kept oldest-first in a single sequence shared by all files.
 * The history itself performs no locking and no I/O; {@link EditManager}
 * drives it from inside its history mutex and deletes backups of the
 * records this class hands back.
 *
 * @module editor/history
 */

export const DEFAULT_HISTORY_CAPACITY = 100;

export interface EditRecord {
  /** Global creation order; strictly increasing. */
  readonly id: number;
  readonly filePath: string;
  readonly backupPath: string;
  readonly createdAt: Date;
}

export class EditHistory {
  private records: EditRecord[] = [];
  private nextId = 1;

  constructor(readonly capacity: number = DEFAULT_HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Append a record and evict the oldest ones while over capacity.
   * @returns the new record and the evicted records, whose backups the caller owns
   */
  append(filePath: string, backupPath: string): { record: EditRecord; evicted: EditRecord[] } {
    const record: EditRecord = {
      id: this.nextId++,
      filePath,
      backupPath,
      createdAt: new Date(),
    };
    this.records.push(record);

    const evicted: EditRecord[] = [];
    while (this.records.length > this.capacity) {
      const oldest = this.records.shift();
      if (oldest) evicted.push(oldest);
    }
    return { record, evicted };
  }

  /** Most recent record for `filePath`, or undefined. */
  latestFor(filePath: string): EditRecord | undefined {
    for (let i = this.records.length - 1; i >= 0; i--) {
      if (this.records[i].filePath === filePath) return this.records[i];
    }
    return undefined;
  }

  /** Remove one record, keeping the order of the rest. */
  remove(id: number): boolean {
    const index = this.records.findIndex((record) => record.id === id);
    if (index === -1) return false;
    this.records.splice(index, 1);
    return true;
  }

  /** Oldest-first snapshot, optionally limited to one file. */
  list(filePath?: string): EditRecord[] {
    return filePath === undefined
      ? [...this.records]
      : this.records.filter((record) => record.filePath === filePath);
  }
}
