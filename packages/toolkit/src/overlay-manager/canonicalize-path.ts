import { lstat, readlink } from 'node:fs/promises';
import { isAbsolute, join, posix, relative, resolve, sep } from 'node:path';
import invariant from 'tiny-invariant';
import { isNodeError, OverlayIOError, PathEscapeError } from '../errors.ts';

const MAX_SYMLINK_HOPS = 40;

export class SymlinkLoopError extends OverlayIOError {
  readonly name: string = 'SymlinkLoopError';

  constructor(path: string) {
    super(path, `Too many levels of symbolic links: ${path}`);
  }
}

export interface SourceRoots {
  /** The root as configured. */
  sourceRoot: string;
  /** The root with symlinks resolved. */
  realRoot: string;
}

/**
 * Maps a caller-supplied path to a root-relative, `/`-separated key, or null
 * when it lies outside both forms of the root. The root itself is `''`.
 */
export function toRootRelative(absolutePath: string, roots: SourceRoots): string | null {
  for (const root of [roots.realRoot, roots.sourceRoot]) {
    const rel = relative(root, absolutePath);
    if (rel === '') {
      return '';
    }
    if (!(rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel))) {
      return rel.split(sep).join('/');
    }
  }
  return null;
}

/**
 * Lexical normalization: collapses `.`/`..` segments and duplicate
 * separators. Relative paths are taken from the source root; anything that
 * lands outside it is a PathEscapeError.
 */
export function toLogicalKey(path: string, roots: SourceRoots): string {
  if (isAbsolute(path)) {
    const key = toRootRelative(resolve(path), roots);
    if (key === null) {
      throw new PathEscapeError(path, roots.sourceRoot);
    }
    return key;
  }

  const normalized = posix.normalize(path.split(sep).join('/')).replace(/\/+$/, '');
  if (normalized === '..' || normalized.startsWith('../')) {
    throw new PathEscapeError(path, roots.sourceRoot);
  }
  return normalized === '.' || normalized === '' ? '' : normalized;
}

export interface ResolveSymlinksOptions {
  roots: SourceRoots;
  /** Path as the caller wrote it, for error messages. */
  originalPath: string;
  /** Whether the source tree is what the merged view shows at `key`. */
  isSourceBacked: (key: string) => boolean;
}

/**
 * Follows source-tree symlinks along `key` so that every alias of a file maps
 * to one key. Only components the merged view still takes from the source are
 * followed. A link whose target leaves the root is a PathEscapeError.
 */
export async function resolveSourceSymlinks(
  key: string,
  options: ResolveSymlinksOptions,
): Promise<string> {
  const pending = key === '' ? [] : key.split('/');
  let current: string[] = [];
  let hops = 0;

  while (pending.length > 0) {
    const name = pending.shift();
    invariant(name !== undefined, 'pending is non-empty');
    const candidate = [...current, name].join('/');

    if (!options.isSourceBacked(candidate)) {
      current.push(name);
      continue;
    }

    const sourcePath = join(options.roots.realRoot, candidate);
    const isLink = await isSymbolicLink(sourcePath);
    if (isLink === null) {
      // Nothing further down exists in the source.
      return [...current, name, ...pending].join('/');
    }
    if (!isLink) {
      current.push(name);
      continue;
    }

    hops += 1;
    if (hops > MAX_SYMLINK_HOPS) {
      throw new SymlinkLoopError(options.originalPath);
    }

    const target = await readLinkTarget(sourcePath);
    const absoluteTarget = resolve(options.roots.realRoot, ...current, target);
    const targetKey = toRootRelative(absoluteTarget, options.roots);
    if (targetKey === null) {
      throw new PathEscapeError(options.originalPath, options.roots.sourceRoot);
    }

    pending.unshift(...(targetKey === '' ? [] : targetKey.split('/')));
    current = [];
  }

  return current.join('/');
}

// null when the path does not exist.
async function isSymbolicLink(path: string): Promise<boolean | null> {
  try {
    const stats = await lstat(path);
    return stats.isSymbolicLink();
  } catch (error) {
    if (isNodeError(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw new OverlayIOError(path, `Failed to inspect ${path}`, { cause: error });
  }
}

async function readLinkTarget(path: string): Promise<string> {
  try {
    return await readlink(path);
  } catch (error) {
    throw new OverlayIOError(path, `Failed to read symbolic link ${path}`, { cause: error });
  }
}
