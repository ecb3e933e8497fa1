/**
 * Path sandboxing for caller-supplied paths.
 *
 * Every path a tool touches goes through {@link PathValidator.validate} first.
 * A path is authorized only when its textual absolute form sits at or below
 * a root as configured or as resolved, and its symlink-resolved form sits at
 * or below a resolved root. Containment
 * compares whole path segments, so `/data` never admits `/data-2`.
 *
 * Paths that do not exist yet resolve through their nearest existing ancestor,
 * and dangling symlinks along the way are followed by hand so a link to a
 * missing file outside the sandbox cannot be used to create one there.
 *
 * @module sandbox/pathValidator
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { AccessDeniedError, InvalidPathError, hasErrorCode } from '../errors';

/** Same limit the Linux kernel applies before failing with ELOOP. */
const MAX_SYMLINK_HOPS = 40;

export interface PathValidatorOptions {
  /** Fold case before comparing. Set for case-insensitive filesystems. */
  caseInsensitive?: boolean;
  homeDir?: () => string;
  cwd?: () => string;
  /**
   * Absolute, unresolved spellings of the roots (e.g. through a symlinked
   * parent). They admit a path to the textual pre-check only.
   */
  rootAliases?: readonly string[];
}

/**
 * Expand a leading `~` to the home directory.
 * `~` alone becomes the home directory; `~/rest` joins the remainder.
 * `~user` forms are returned untouched.
 */
export function expandHome(requestedPath: string, homeDir: () => string = os.homedir): string {
  if (requestedPath === '~') return homeDir();
  if (requestedPath.startsWith('~/') || requestedPath.startsWith(`~${path.sep}`)) {
    return path.join(homeDir(), requestedPath.slice(2));
  }
  return requestedPath;
}

function isWithin(candidate: string, root: string): boolean {
  if (candidate === root) return true;
  const prefix = root.endsWith(path.sep) ? root : root + path.sep;
  return candidate.startsWith(prefix);
}

/** Link target of `candidate` when it is a symlink, otherwise null. */
async function readLinkIfSymlink(candidate: string): Promise<string | null> {
  try {
    const stats = await fs.lstat(candidate);
    return stats.isSymbolicLink() ? await fs.readlink(candidate) : null;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) return null;
    throw error;
  }
}

export class PathValidator {
  private readonly _roots: readonly string[];
  private readonly comparableRoots: readonly string[];
  private readonly comparableAliases: readonly string[];
  private readonly _caseInsensitive: boolean;
  private readonly homeDir: () => string;
  private readonly cwd: () => string;

  /**
   * @param roots - absolute, already symlink-resolved directories (see `loadConfig`)
   */
  constructor(roots: readonly string[], options: PathValidatorOptions = {}) {
    if (roots.length === 0) {
      throw new Error('At least one allowed directory is required');
    }
    for (const root of roots) {
      if (!path.isAbsolute(root)) {
        throw new Error(`Allowed directory must be absolute: ${root}`);
      }
    }

    this._caseInsensitive = options.caseInsensitive ?? false;
    this.homeDir = options.homeDir ?? (() => os.homedir());
    this.cwd = options.cwd ?? (() => process.cwd());
    this._roots = Object.freeze(roots.map((root) => path.resolve(root)));
    this.comparableRoots = Object.freeze(this._roots.map((root) => this.comparable(root)));
    this.comparableAliases = Object.freeze(
      (options.rootAliases ?? []).filter((alias) => path.isAbsolute(alias)).map((alias) => this.comparable(alias))
    );
  }

  /**
   * Build a validator from configured directories: each is `~`-expanded,
   * made absolute and symlink-resolved, and must be an existing directory.
   * Duplicates after resolution are dropped.
   */
  static async create(directories: readonly string[], options: PathValidatorOptions = {}): Promise<PathValidator> {
    const homeDir = options.homeDir ?? (() => os.homedir());
    const cwd = options.cwd ?? (() => process.cwd());
    const roots: string[] = [];
    const aliases: string[] = [];

    for (const dir of directories) {
      const absolute = path.resolve(cwd(), expandHome(dir, homeDir));
      let real: string;
      try {
        real = await fs.realpath(absolute);
      } catch (error) {
        throw new InvalidPathError(dir, 'allowed directory is not accessible', { cause: error });
      }
      const stats = await fs.stat(real);
      if (!stats.isDirectory()) {
        throw new InvalidPathError(dir, 'allowed directory is not a directory');
      }
      if (!roots.includes(real)) roots.push(real);
      if (absolute !== real && !aliases.includes(absolute)) aliases.push(absolute);
    }

    return new PathValidator(roots, { ...options, rootAliases: [...(options.rootAliases ?? []), ...aliases] });
  }

  get roots(): readonly string[] {
    return this._roots;
  }

  get caseInsensitive(): boolean {
    return this._caseInsensitive;
  }

  /** Segment-wise containment test of an absolute path against every root. */
  isAllowed(absolutePath: string): boolean {
    const candidate = this.comparable(absolutePath);
    return this.comparableRoots.some((root) => isWithin(candidate, root));
  }

  /**
   * Resolve `requestedPath` to its canonical form and authorize it.
   *
   * @throws AccessDeniedError when the path, or what it resolves to, lies outside every root
   * @throws InvalidPathError when the path cannot be resolved at all
   */
  async validate(requestedPath: string): Promise<string> {
    const absolute = this.toAbsolute(requestedPath);

    if (!this.isAllowed(absolute) && !this.isUnderAlias(absolute)) {
      throw new AccessDeniedError(absolute, 'path outside allowed directories');
    }

    const resolved = await this.resolveReal(absolute, requestedPath);

    if (!this.isAllowed(resolved)) {
      throw new AccessDeniedError(absolute, 'symlink target outside allowed directories');
    }

    return resolved;
  }

  private isUnderAlias(absolutePath: string): boolean {
    const candidate = this.comparable(absolutePath);
    return this.comparableAliases.some((alias) => isWithin(candidate, alias));
  }

  private comparable(absolutePath: string): string {
    const normalized = path.resolve(absolutePath);
    return this._caseInsensitive ? normalized.toLowerCase() : normalized;
  }

  private toAbsolute(requestedPath: string): string {
    if (requestedPath.length === 0) {
      throw new InvalidPathError(requestedPath, 'path is empty');
    }
    if (requestedPath.includes('\0')) {
      throw new InvalidPathError(requestedPath, 'path contains a NUL byte');
    }

    let expanded: string;
    try {
      expanded = expandHome(requestedPath, this.homeDir);
    } catch (error) {
      throw new InvalidPathError(requestedPath, "couldn't get home directory", { cause: error });
    }

    if (path.isAbsolute(expanded)) {
      return path.resolve(expanded);
    }

    let base: string;
    try {
      base = this.cwd();
    } catch (error) {
      throw new InvalidPathError(requestedPath, 'failed to get current working directory', { cause: error });
    }
    return path.resolve(base, expanded);
  }

  /**
   * Real path of `absolute`, or of its nearest existing ancestor joined with
   * the missing remainder.
   */
  private async resolveReal(absolute: string, requestedPath: string): Promise<string> {
    const missing: string[] = [];
    let current = absolute;
    let hops = 0;

    for (;;) {
      try {
        const real = await fs.realpath(current);
        return missing.length === 0 ? real : path.join(real, ...missing);
      } catch (error) {
        if (hasErrorCode(error, 'ELOOP')) {
          throw new InvalidPathError(requestedPath, 'too many levels of symbolic links', { cause: error });
        }
        if (hasErrorCode(error, 'ENOTDIR')) {
          throw new InvalidPathError(requestedPath, 'a path component is not a directory', { cause: error });
        }
        if (!hasErrorCode(error, 'ENOENT')) {
          throw error;
        }
      }

      const linkTarget = await readLinkIfSymlink(current);
      if (linkTarget !== null) {
        hops += 1;
        if (hops > MAX_SYMLINK_HOPS) {
          throw new InvalidPathError(requestedPath, 'too many levels of symbolic links');
        }
        current = path.resolve(await this.realParent(current, requestedPath), linkTarget);
        continue;
      }

      const parent = path.dirname(current);
      if (parent === current) {
        throw new InvalidPathError(requestedPath, 'no existing ancestor directory');
      }
      missing.unshift(path.basename(current));
      current = parent;
    }
  }

  /** Real path of the directory holding `linkPath`, so relative link targets follow real directories. */
  private async realParent(linkPath: string, requestedPath: string): Promise<string> {
    try {
      return await fs.realpath(path.dirname(linkPath));
    } catch (error) {
      if (hasErrorCode(error, 'ELOOP')) {
        throw new InvalidPathError(requestedPath, 'too many levels of symbolic links', { cause: error });
      }
      throw error;
    }
  }
}
