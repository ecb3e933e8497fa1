import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import fsp from 'fs/promises';
import os from 'os';
import path from 'path';

import { EditManager } from '../src/editor/editManager';
import {
  AmbiguousMatchError,
  InvalidArgumentError,
  NoHistoryError,
  NotFoundError,
  OutOfRangeError,
} from '../src/errors';

describe('EditManager', () => {
  let workDir: string;
  let backupDir: string;
  let editor: EditManager;
  let file: string;

  const read = (target: string = file): string => fs.readFileSync(target, 'utf8');
  const backups = (): string[] => fs.readdirSync(backupDir);

  beforeEach(async () => {
    const tmp = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'fsgate-editor-')));
    workDir = path.join(tmp, 'work');
    backupDir = path.join(tmp, 'backups');
    fs.mkdirSync(workDir);
    editor = await EditManager.create({ backupDir });
    file = path.join(workDir, 'notes.txt');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(path.dirname(workDir), { recursive: true, force: true });
  });

  describe('create()', () => {
    it('creates the backup directory', () => {
      expect(fs.statSync(backupDir).isDirectory()).toBe(true);
      expect(editor.backupDir).toBe(backupDir);
      expect(editor.capacity).toBe(100);
    });
  });

  describe('replace()', () => {
    it('replaces the single occurrence and records a backup', async () => {
      fs.writeFileSync(file, 'hello world\n');

      const record = await editor.replace(file, 'world', 'there');

      expect(read()).toBe('hello there\n');
      expect(record.filePath).toBe(file);
      expect(path.dirname(record.backupPath)).toBe(backupDir);
      expect(path.basename(record.backupPath)).toMatch(/^notes\.txt\.\d+\.[0-9a-f-]{36}\.bak$/);
      expect(fs.readFileSync(record.backupPath, 'utf8')).toBe('hello world\n');
    });

    it('splices the replacement literally', async () => {
      fs.writeFileSync(file, 'price: X');
      await editor.replace(file, 'X', '$&$1');
      expect(read()).toBe('price: $&$1');
    });

    it('deletes text when the replacement is empty', async () => {
      fs.writeFileSync(file, 'keep-drop-keep');
      await editor.replace(file, '-drop', '');
      expect(read()).toBe('keep-keep');
    });

    it('refuses an ambiguous match and leaves the file alone', async () => {
      fs.writeFileSync(file, 'foo bar foo');

      const error = await editor.replace(file, 'foo', 'baz').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AmbiguousMatchError);
      expect(error instanceof AmbiguousMatchError && error.occurrences).toBe(2);
      expect(read()).toBe('foo bar foo');
      expect(backups()).toEqual([]);
      expect(await editor.history()).toEqual([]);
    });

    it('reports a missing substring', async () => {
      fs.writeFileSync(file, 'abc');
      await expect(editor.replace(file, 'xyz', 'q')).rejects.toThrow('String not found in file: "xyz"');
    });

    it('reports a missing file', async () => {
      await expect(editor.replace(file, 'a', 'b')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('rejects an empty search string', async () => {
      fs.writeFileSync(file, 'abc');
      await expect(editor.replace(file, '', 'x')).rejects.toBeInstanceOf(InvalidArgumentError);
    });

    it('keeps bytes that are not valid UTF-8', async () => {
      fs.writeFileSync(file, Buffer.from([0x63, 0x61, 0x66, 0xe9, 0x20, 0x58]));
      await editor.replace(file, 'X', 'Y');
      expect(fs.readFileSync(file).toString('hex')).toBe('636166e92059');
    });

    it('restores the file and drops the backup when the write fails', async () => {
      fs.writeFileSync(file, 'original');
      vi.spyOn(fsp, 'writeFile').mockImplementationOnce(async () => {
        fs.writeFileSync(file, 'partial');
        throw new Error('disk full');
      });

      await expect(editor.replace(file, 'original', 'changed')).rejects.toThrow('disk full');

      expect(read()).toBe('original');
      expect(backups()).toEqual([]);
      expect(await editor.history()).toEqual([]);
    });

    it('leaves the target untouched when the backup cannot be written', async () => {
      fs.writeFileSync(file, 'original');
      fs.rmSync(backupDir, { recursive: true });

      await expect(editor.replace(file, 'original', 'changed')).rejects.toThrow(
        `Failed to write backup for ${file}`
      );
      expect(read()).toBe('original');
      expect(await editor.history()).toEqual([]);
    });
  });

  describe('insert()', () => {
    beforeEach(() => {
      fs.writeFileSync(file, 'a\nb\n');
    });

    it('inserts at the start', async () => {
      const result = await editor.insert(file, { kind: 'start' }, 'x');
      expect(read()).toBe('x\na\nb');
      expect(result.created).toBe(false);
      expect(result.index).toBe(0);
    });

    it('inserts at the end', async () => {
      const result = await editor.insert(file, { kind: 'end' }, 'x');
      expect(read()).toBe('a\nb\nx');
      expect(result.index).toBe(2);
    });

    it('inserts before a given line index', async () => {
      await editor.insert(file, { kind: 'line', index: 1 }, 'x');
      expect(read()).toBe('a\nx\nb');
    });

    it('rejects indices past the end', async () => {
      await expect(editor.insert(file, { kind: 'line', index: 5 }, 'x')).rejects.toThrow(
        'Invalid line number 5; file has 2 lines (use 0 to insert at beginning, 2 to append)'
      );
      expect(read()).toBe('a\nb\n');
    });

    it('rejects negative indices', async () => {
      await expect(editor.insert(file, { kind: 'line', index: -2 }, 'x')).rejects.toBeInstanceOf(OutOfRangeError);
    });

    it('appends to an empty file', async () => {
      fs.writeFileSync(file, '');
      const result = await editor.insert(file, { kind: 'end' }, 'x');
      expect(read()).toBe('x');
      expect(result.record).not.toBeNull();
    });

    it('refuses a line index on a missing file', async () => {
      const missing = path.join(workDir, 'missing.txt');
      await expect(editor.insert(missing, { kind: 'line', index: 3 }, 'x')).rejects.toBeInstanceOf(NotFoundError);
      expect(fs.existsSync(missing)).toBe(false);
    });

    it('creates a missing file, and its parents, when appending', async () => {
      const created = path.join(workDir, 'deep', 'dir', 'new.txt');

      const result = await editor.insert(created, { kind: 'end' }, 'x');

      expect(read(created)).toBe('x');
      expect(result).toEqual({ created: true, index: 0, record: null });
      expect(await editor.history()).toEqual([]);
      expect(backups()).toEqual([]);
    });

    it('keeps bytes that are not valid UTF-8 on other lines', async () => {
      fs.writeFileSync(file, Buffer.from([0xe9, 0x0a, 0xff, 0x0a]));
      await editor.insert(file, { kind: 'line', index: 1 }, 'x');
      expect(fs.readFileSync(file).toString('hex')).toBe('e90a780aff');
    });

    it('creates a missing file at line 0', async () => {
      const created = path.join(workDir, 'zero.txt');
      await editor.insert(created, { kind: 'line', index: 0 }, 'first');
      expect(read(created)).toBe('first');
    });
  });

  describe('undo()', () => {
    it('restores byte-identical content after a replace', async () => {
      const original = Buffer.from('café\r\nline two\r\nÿ', 'utf8');
      fs.writeFileSync(file, original);

      await editor.replace(file, 'line two', 'LINE 2');
      await editor.undo(file);

      expect(fs.readFileSync(file).equals(original)).toBe(true);
      expect(backups()).toEqual([]);
    });

    it('walks back several edits, newest first', async () => {
      fs.writeFileSync(file, 'one\n');

      await editor.replace(file, 'one', 'two');
      await editor.insert(file, { kind: 'end' }, 'three');
      await editor.replace(file, 'three', 'four');
      expect(read()).toBe('two\nfour');

      await editor.undo(file);
      expect(read()).toBe('two\nthree');
      await editor.undo(file);
      expect(read()).toBe('two\n');
      await editor.undo(file);
      expect(read()).toBe('one\n');

      await expect(editor.undo(file)).rejects.toThrow(`No edit history found for file: ${file}`);
    });

    it('only touches records of the requested file', async () => {
      const other = path.join(workDir, 'other.txt');
      fs.writeFileSync(file, 'a');
      fs.writeFileSync(other, 'b');

      await editor.replace(file, 'a', 'A');
      await editor.replace(other, 'b', 'B');
      await editor.undo(file);

      expect(read()).toBe('a');
      expect(read(other)).toBe('B');
      expect((await editor.history()).map((record) => record.filePath)).toEqual([other]);
    });

    it('fails with NoHistory for a file that was never edited', async () => {
      fs.writeFileSync(file, 'a');
      await expect(editor.undo(file)).rejects.toBeInstanceOf(NoHistoryError);
    });

    it('keeps the record when its backup cannot be read', async () => {
      fs.writeFileSync(file, 'a');
      const record = await editor.replace(file, 'a', 'b');
      fs.unlinkSync(record.backupPath);

      await expect(editor.undo(file)).rejects.toThrow('ENOENT');
      expect(read()).toBe('b');
      expect(await editor.history(file)).toEqual([record]);
    });
  });

  describe('history capacity', () => {
    it('evicts the oldest record and deletes its backup', async () => {
      const small = await EditManager.create({ backupDir, capacity: 3 });
      fs.writeFileSync(file, 'v0');

      const records = [];
      for (let i = 0; i < 4; i++) {
        records.push(await small.replace(file, `v${i}`, `v${i + 1}`));
      }

      const live = await small.history();
      expect(live.map((record) => record.id)).toEqual(records.slice(1).map((record) => record.id));
      expect(fs.existsSync(records[0].backupPath)).toBe(false);
      expect(backups()).toHaveLength(3);
    });

    it('drops the evicted record even when its backup cannot be deleted', async () => {
      const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
      const small = await EditManager.create({ backupDir, capacity: 1 });
      fs.writeFileSync(file, 'v0');

      const first = await small.replace(file, 'v0', 'v1');
      fs.rmSync(first.backupPath);
      fs.mkdirSync(first.backupPath);
      fs.writeFileSync(path.join(first.backupPath, 'pinned'), '');

      const second = await small.replace(file, 'v1', 'v2');

      expect((await small.history()).map((record) => record.id)).toEqual([second.id]);
      expect(errors).toHaveBeenCalledWith(
        '[Editor]',
        'WARNING:',
        `failed to remove backup ${first.backupPath}:`,
        expect.any(String)
      );
    });

    it('keeps at most 100 records after 101 edits', async () => {
      fs.writeFileSync(file, 'v0');

      const first = await editor.replace(file, 'v0', 'v1');
      for (let i = 1; i <= 100; i++) {
        await editor.replace(file, `v${i}`, `v${i + 1}`);
      }

      const live = await editor.history();
      expect(live).toHaveLength(100);
      expect(live[0].id).toBe(first.id + 1);
      expect(fs.existsSync(first.backupPath)).toBe(false);
      expect(backups()).toHaveLength(100);
    });
  });

  describe('concurrency', () => {
    it('serializes concurrent edits to the same file', async () => {
      fs.writeFileSync(file, 'start');
      const lines = Array.from({ length: 10 }, (_, i) => `line-${i}`);

      await Promise.all(lines.map((line) => editor.insert(file, { kind: 'end' }, line)));

      expect(read()).toBe(['start', ...lines].join('\n'));
      expect(await editor.history(file)).toHaveLength(10);

      for (let i = 0; i < 10; i++) {
        await editor.undo(file);
      }
      expect(read()).toBe('start');
    });
  });
});
