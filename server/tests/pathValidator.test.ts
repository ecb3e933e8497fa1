import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';

import { AccessDeniedError, InvalidPathError } from '../src/errors';
import { PathValidator, expandHome } from '../src/sandbox/pathValidator';

describe('expandHome', () => {
  const home = () => '/home/tester';

  it('expands a bare tilde', () => {
    expect(expandHome('~', home)).toBe('/home/tester');
  });

  it('expands ~/rest', () => {
    expect(expandHome('~/notes/todo.txt', home)).toBe('/home/tester/notes/todo.txt');
  });

  it('leaves ~user and plain paths alone', () => {
    expect(expandHome('~alice/file', home)).toBe('~alice/file');
    expect(expandHome('/etc/hosts', home)).toBe('/etc/hosts');
    expect(expandHome('docs/~/x', home)).toBe('docs/~/x');
  });
});

describe('PathValidator', () => {
  let sandbox: string;
  let root: string;
  let outside: string;

  beforeEach(() => {
    sandbox = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'fsgate-validator-')));
    root = path.join(sandbox, 'allowed');
    outside = path.join(sandbox, 'outside');
    fs.mkdirSync(root);
    fs.mkdirSync(outside);
    fs.writeFileSync(path.join(root, 'file.txt'), 'inside\n');
    fs.writeFileSync(path.join(outside, 'secret.txt'), 'outside\n');
  });

  afterEach(() => {
    fs.rmSync(sandbox, { recursive: true, force: true });
  });

  describe('constructor', () => {
    it('requires at least one root', () => {
      expect(() => new PathValidator([])).toThrow('At least one allowed directory is required');
    });

    it('requires absolute roots', () => {
      expect(() => new PathValidator(['relative/dir'])).toThrow('Allowed directory must be absolute: relative/dir');
    });
  });

  describe('isAllowed()', () => {
    it('compares whole path segments', () => {
      const validator = new PathValidator(['/data/project']);
      expect(validator.isAllowed('/data/project')).toBe(true);
      expect(validator.isAllowed('/data/project/src/a.ts')).toBe(true);
      expect(validator.isAllowed('/data/project-2/a.ts')).toBe(false);
      expect(validator.isAllowed('/data')).toBe(false);
    });

    it('is case-sensitive unless configured otherwise', () => {
      expect(new PathValidator(['/data/Project']).isAllowed('/DATA/project/x')).toBe(false);
      expect(new PathValidator(['/data/Project'], { caseInsensitive: true }).isAllowed('/DATA/project/x')).toBe(true);
    });
  });

  describe('validate()', () => {
    let validator: PathValidator;

    beforeEach(() => {
      validator = new PathValidator([root], { cwd: () => root, homeDir: () => root });
    });

    it('returns an existing file inside the root', async () => {
      await expect(validator.validate(path.join(root, 'file.txt'))).resolves.toBe(path.join(root, 'file.txt'));
    });

    it('authorizes the root itself', async () => {
      await expect(validator.validate(root)).resolves.toBe(root);
    });

    it('resolves a missing file through its nearest existing ancestor', async () => {
      await expect(validator.validate(path.join(root, 'a', 'b', 'new.txt'))).resolves.toBe(
        path.join(root, 'a', 'b', 'new.txt')
      );
    });

    it('resolves relative paths against the working directory', async () => {
      await expect(validator.validate('file.txt')).resolves.toBe(path.join(root, 'file.txt'));
    });

    it('expands ~ against the home directory', async () => {
      await expect(validator.validate('~/file.txt')).resolves.toBe(path.join(root, 'file.txt'));
    });

    it('rejects absolute paths outside every root', async () => {
      await expect(validator.validate(path.join(outside, 'secret.txt'))).rejects.toBeInstanceOf(AccessDeniedError);
    });

    it('rejects dot-dot traversal out of the root', async () => {
      await expect(validator.validate('../outside/secret.txt')).rejects.toThrow(
        `Access denied - path outside allowed directories: ${path.join(outside, 'secret.txt')}`
      );
    });

    it('rejects a sibling that shares the root as a prefix', async () => {
      fs.mkdirSync(`${root}-2`);
      await expect(validator.validate(path.join(`${root}-2`, 'x.txt'))).rejects.toBeInstanceOf(AccessDeniedError);
    });

    it('rejects an ancestor of the root', async () => {
      await expect(validator.validate(sandbox)).rejects.toBeInstanceOf(AccessDeniedError);
    });

    it('follows in-sandbox symlinks to their target', async () => {
      fs.mkdirSync(path.join(root, 'real'));
      fs.writeFileSync(path.join(root, 'real', 'data.txt'), 'x');
      fs.symlinkSync(path.join(root, 'real'), path.join(root, 'alias'));

      await expect(validator.validate(path.join(root, 'alias', 'data.txt'))).resolves.toBe(
        path.join(root, 'real', 'data.txt')
      );
    });

    it('rejects symlinks whose target is outside', async () => {
      const link = path.join(root, 'escape');
      fs.symlinkSync(path.join(outside, 'secret.txt'), link);

      await expect(validator.validate(link)).rejects.toThrow(
        `Access denied - symlink target outside allowed directories: ${link}`
      );
    });

    it('rejects new files under a symlinked directory that points outside', async () => {
      fs.symlinkSync(outside, path.join(root, 'outdir'));
      await expect(validator.validate(path.join(root, 'outdir', 'planted.txt'))).rejects.toBeInstanceOf(
        AccessDeniedError
      );
    });

    it('follows a dangling symlink and rejects it when the target is outside', async () => {
      fs.symlinkSync(path.join(outside, 'missing.txt'), path.join(root, 'dangling'));
      await expect(validator.validate(path.join(root, 'dangling'))).rejects.toBeInstanceOf(AccessDeniedError);
    });

    it('follows a dangling symlink to its in-sandbox target', async () => {
      fs.symlinkSync('target.txt', path.join(root, 'pending'));
      await expect(validator.validate(path.join(root, 'pending'))).resolves.toBe(path.join(root, 'target.txt'));
    });

    it('resolves a relative dangling symlink against the real directory holding it', async () => {
      fs.mkdirSync(path.join(root, 'deep', 'nested'), { recursive: true });
      fs.symlinkSync(path.join(root, 'deep', 'nested'), path.join(root, 'linkdir'));
      fs.symlinkSync('../x.txt', path.join(root, 'deep', 'nested', 'dangling'));

      await expect(validator.validate(path.join(root, 'linkdir', 'dangling'))).resolves.toBe(
        path.join(root, 'deep', 'x.txt')
      );
    });

    it('reports symlink loops as invalid paths', async () => {
      fs.symlinkSync(path.join(root, 'loop-b'), path.join(root, 'loop-a'));
      fs.symlinkSync(path.join(root, 'loop-a'), path.join(root, 'loop-b'));
      await expect(validator.validate(path.join(root, 'loop-a'))).rejects.toBeInstanceOf(InvalidPathError);
    });

    it('reports a file used as a directory as an invalid path', async () => {
      await expect(validator.validate(path.join(root, 'file.txt', 'child'))).rejects.toThrow(
        `Invalid path - a path component is not a directory: ${path.join(root, 'file.txt', 'child')}`
      );
    });

    it('rejects empty paths and NUL bytes', async () => {
      await expect(validator.validate('')).rejects.toBeInstanceOf(InvalidPathError);
      await expect(validator.validate('file\0.txt')).rejects.toBeInstanceOf(InvalidPathError);
    });

    it('maps a failing home directory lookup to an invalid path', async () => {
      const noHome = new PathValidator([root], {
        homeDir: () => {
          throw new Error('no home');
        },
      });
      await expect(noHome.validate('~/file.txt')).rejects.toThrow("Invalid path - couldn't get home directory: ~/file.txt");
    });

    it('maps a failing working directory lookup to an invalid path', async () => {
      const noCwd = new PathValidator([root], {
        cwd: () => {
          throw new Error('cwd removed');
        },
      });
      await expect(noCwd.validate('file.txt')).rejects.toBeInstanceOf(InvalidPathError);
    });
  });

  describe('create()', () => {
    it('resolves symlinked roots and drops duplicates', async () => {
      const link = path.join(sandbox, 'root-link');
      fs.symlinkSync(root, link);

      const validator = await PathValidator.create([root, link]);
      expect(validator.roots).toEqual([root]);
    });

    it('admits paths spelled through a symlinked root', async () => {
      const link = path.join(sandbox, 'root-link');
      fs.symlinkSync(root, link);
      const validator = await PathValidator.create([link]);

      await expect(validator.validate(path.join(link, 'file.txt'))).resolves.toBe(path.join(root, 'file.txt'));
      await expect(validator.validate(path.join(link, 'new.txt'))).resolves.toBe(path.join(root, 'new.txt'));
      await expect(validator.validate(path.join(root, 'file.txt'))).resolves.toBe(path.join(root, 'file.txt'));
    });

    it('still checks the resolved target of paths under a symlinked root', async () => {
      const link = path.join(sandbox, 'root-link');
      fs.symlinkSync(root, link);
      fs.symlinkSync(path.join(outside, 'secret.txt'), path.join(root, 'escape'));
      const validator = await PathValidator.create([link]);

      await expect(validator.validate(path.join(link, 'escape'))).rejects.toThrow(
        `Access denied - symlink target outside allowed directories: ${path.join(link, 'escape')}`
      );
      await expect(validator.validate(path.join(sandbox, 'root-linked', 'x'))).rejects.toBeInstanceOf(AccessDeniedError);
    });

    it('expands ~ and resolves relative directories against cwd', async () => {
      const validator = await PathValidator.create(['~/allowed', 'outside'], {
        homeDir: () => sandbox,
        cwd: () => sandbox,
      });
      expect(validator.roots).toEqual([root, outside]);
    });

    it('rejects missing directories', async () => {
      await expect(PathValidator.create([path.join(sandbox, 'nope')])).rejects.toBeInstanceOf(InvalidPathError);
    });

    it('rejects regular files', async () => {
      await expect(PathValidator.create([path.join(root, 'file.txt')])).rejects.toThrow(
        `Invalid path - allowed directory is not a directory: ${path.join(root, 'file.txt')}`
      );
    });
  });
});
