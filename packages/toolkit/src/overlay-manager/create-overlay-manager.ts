import type { Dirent, Stats } from 'node:fs';
import { constants } from 'node:fs';
import {
  copyFile,
  lstat,
  mkdir,
  mkdtemp,
  readdir,
  readFile,
  realpath,
  rm,
  writeFile,
} from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, posix } from 'node:path';
import {
  isNodeError,
  LifecycleError,
  OverlayIOError,
  PathEscapeError,
  PathNotFoundError,
  ShellfenceError,
} from '../errors.ts';
import type { SourceRoots } from './canonicalize-path.ts';
import {
  resolveSourceSymlinks,
  SymlinkLoopError,
  toLogicalKey,
  toRootRelative,
} from './canonicalize-path.ts';
import { compareKeys } from './compare-keys.ts';
import { createKeyedLock } from './create-keyed-lock.ts';
import type {
  DirectoryEntry,
  EntryKind,
  MergedEntry,
  OverlaidEntry,
  OverlayChange,
  OverlayManager,
  OverlayManagerConfig,
  OverlayState,
  PathIndexEntry,
} from './types.ts';

const SHADOW_PREFIX = 'shellfence-';
const UPPER_DIR = 'upper';

interface OpenContext {
  roots: SourceRoots;
  shadowRoot: string;
  upperRoot: string;
}

type Lookup =
  | { layer: 'overlay'; entry: OverlaidEntry }
  | { layer: 'source' }
  | { layer: 'absent' };

type MergedChild =
  | { layer: 'overlay'; name: string; key: string; kind: EntryKind; entry: OverlaidEntry }
  | { layer: 'source'; name: string; key: string; kind: EntryKind | 'symlink' };

interface LinkedEntry {
  target: string;
  kind: EntryKind;
}

/**
 * Copy-on-write view over a source directory. Reads fall through to the
 * source until a path is written or deleted; from then on the path index
 * decides where the path lives. The source root is only ever read.
 */
export function createOverlayManager(config: OverlayManagerConfig): OverlayManager {
  const logger = config.logger.child({ component: 'overlay' });
  const index = new Map<string, PathIndexEntry>();
  const lock = createKeyedLock();
  let state: OverlayState = 'created';
  let context: OpenContext | null = null;
  let openCalled = false;
  let closing: Promise<void> | null = null;
  let lastRevision = 0;

  function nextRevision(): number {
    lastRevision += 1;
    return lastRevision;
  }

  function requireOpen(operation: string): OpenContext {
    if (state !== 'open' || context === null) {
      throw new LifecycleError(operation, state);
    }
    return context;
  }

  // ---------------------------------------------------------------------------
  // Path index
  // ---------------------------------------------------------------------------

  function ancestorsShowSource(key: string): boolean {
    const parts = key === '' ? [] : key.split('/');
    for (let depth = 1; depth < parts.length; depth += 1) {
      const entry = index.get(parts.slice(0, depth).join('/'));
      if (entry !== undefined && !entryShowsSource(entry)) {
        return false;
      }
    }
    return true;
  }

  function entryShowsSource(entry: PathIndexEntry | undefined): boolean {
    if (entry === undefined) {
      return true;
    }
    return entry.state === 'overlaid' && entry.kind === 'directory' && !entry.opaque;
  }

  function sourceVisible(key: string): boolean {
    return ancestorsShowSource(key) && entryShowsSource(index.get(key));
  }

  function lookup(key: string): Lookup {
    const entry = index.get(key);
    if (entry?.state === 'overlaid') {
      return { layer: 'overlay', entry };
    }
    return sourceVisible(key) ? { layer: 'source' } : { layer: 'absent' };
  }

  function removeDescendants(key: string): void {
    const prefix = `${key}/`;
    for (const candidate of [...index.keys()]) {
      if (candidate.startsWith(prefix)) {
        index.delete(candidate);
      }
    }
  }

  function touch(key: string, entry: OverlaidEntry): OverlaidEntry {
    const updated = { ...entry, revision: nextRevision() };
    index.set(key, updated);
    return updated;
  }

  // ---------------------------------------------------------------------------
  // Source access
  // ---------------------------------------------------------------------------

  async function sourceStats(key: string, ctx: OpenContext): Promise<Stats | null> {
    const path = join(ctx.roots.realRoot, key);
    try {
      return await lstat(path);
    } catch (error) {
      if (isNodeError(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        return null;
      }
      throw toOverlayError(error, path, `Failed to inspect ${path}`);
    }
  }

  async function canonicalize(path: string): Promise<string> {
    const ctx = requireOpen('resolve a path');
    const key = toLogicalKey(path, ctx.roots);
    return resolveSourceSymlinks(key, {
      roots: ctx.roots,
      originalPath: path,
      isSourceBacked: (candidate) => lookup(candidate).layer === 'source',
    });
  }

  async function resolveLinkedEntry(key: string, ctx: OpenContext): Promise<LinkedEntry | null> {
    let target: string;
    try {
      target = await resolveSourceSymlinks(key, {
        roots: ctx.roots,
        originalPath: key,
        isSourceBacked: (candidate) => lookup(candidate).layer === 'source',
      });
    } catch (error) {
      if (error instanceof PathEscapeError || error instanceof SymlinkLoopError) {
        return null;
      }
      throw error;
    }

    const found = lookup(target);
    if (found.layer === 'overlay') {
      return { target, kind: found.entry.kind };
    }
    if (found.layer === 'absent') {
      return null;
    }
    const stats = await sourceStats(target, ctx);
    if (stats === null) {
      return null;
    }
    return { target, kind: stats.isDirectory() ? 'directory' : 'file' };
  }

  // ---------------------------------------------------------------------------
  // Copy-on-write
  // ---------------------------------------------------------------------------

  async function ensureDirectory(key: string, ctx: OpenContext): Promise<OverlaidEntry> {
    const found = lookup(key);
    if (found.layer === 'overlay') {
      if (found.entry.kind === 'directory') {
        return found.entry;
      }
      throw new OverlayIOError(key, `Not a directory: ${key}`);
    }

    let sourceExisted = false;
    let opaque = false;
    if (found.layer === 'source') {
      const stats = await sourceStats(key, ctx);
      if (stats !== null && !stats.isDirectory()) {
        throw new OverlayIOError(key, `Not a directory: ${key}`);
      }
      sourceExisted = stats !== null;
    } else if (index.get(key)?.state === 'deleted') {
      opaque = true;
      sourceExisted = true;
    }

    const shadowPath = join(ctx.upperRoot, key);
    await runIO(shadowPath, `Failed to create ${shadowPath}`, () =>
      mkdir(shadowPath, { recursive: true }),
    );

    // Another task may have overlaid the directory while mkdir ran.
    const current = index.get(key);
    if (current?.state === 'overlaid' && current.kind === 'directory') {
      return current;
    }

    const entry: OverlaidEntry = {
      state: 'overlaid',
      kind: 'directory',
      shadowPath,
      opaque,
      sourceExisted,
      revision: nextRevision(),
    };
    index.set(key, entry);
    return entry;
  }

  async function ensureParents(key: string, ctx: OpenContext): Promise<void> {
    const parts = key.split('/');
    for (let depth = 1; depth < parts.length; depth += 1) {
      await ensureDirectory(parts.slice(0, depth).join('/'), ctx);
    }
  }

  // Brings `key` into the overlay. With `copySource`, an existing source file
  // is copied and a new file is created empty; without it the caller is about
  // to replace the content and nothing is written yet.
  async function overlayEntry(
    key: string,
    ctx: OpenContext,
    copySource: boolean,
  ): Promise<OverlaidEntry> {
    const found = lookup(key);
    if (found.layer === 'overlay') {
      return found.entry;
    }

    await ensureParents(key, ctx);
    const shadowPath = join(ctx.upperRoot, key);

    if (found.layer === 'source') {
      const stats = await sourceStats(key, ctx);
      if (stats?.isDirectory()) {
        return ensureDirectory(key, ctx);
      }
      if (stats !== null) {
        if (copySource) {
          const sourcePath = join(ctx.roots.realRoot, key);
          await runIO(shadowPath, `Failed to copy ${key} into the overlay`, () =>
            copyFile(sourcePath, shadowPath, constants.COPYFILE_FICLONE),
          );
        }
        return touch(key, {
          state: 'overlaid',
          kind: 'file',
          shadowPath,
          opaque: false,
          sourceExisted: true,
          revision: 0,
        });
      }
    }

    if (copySource) {
      await runIO(shadowPath, `Failed to create ${key} in the overlay`, () =>
        writeFile(shadowPath, ''),
      );
    }
    return touch(key, {
      state: 'overlaid',
      kind: 'file',
      shadowPath,
      opaque: false,
      sourceExisted: index.get(key)?.state === 'deleted',
      revision: 0,
    });
  }

  // ---------------------------------------------------------------------------
  // Merged view
  // ---------------------------------------------------------------------------

  async function mergedChildren(key: string, ctx: OpenContext): Promise<MergedChild[]> {
    const children = new Map<string, MergedChild>();

    for (const [childKey, entry] of index) {
      if (entry.state === 'overlaid' && childKey !== '' && parentKey(childKey) === key) {
        const name = posix.basename(childKey);
        children.set(name, { layer: 'overlay', name, key: childKey, kind: entry.kind, entry });
      }
    }

    if (sourceVisible(key)) {
      for (const dirent of await readSourceDirectory(key, ctx)) {
        const childKey = joinKey(key, dirent.name);
        if (index.has(childKey)) {
          continue;
        }
        children.set(dirent.name, {
          layer: 'source',
          name: dirent.name,
          key: childKey,
          kind: direntKind(dirent),
        });
      }
    }

    return [...children.values()].sort((a, b) => compareKeys(a.name, b.name));
  }

  async function readSourceDirectory(key: string, ctx: OpenContext): Promise<Dirent[]> {
    const path = join(ctx.roots.realRoot, key);
    try {
      return await readdir(path, { withFileTypes: true });
    } catch (error) {
      if (isNodeError(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        return [];
      }
      throw toOverlayError(error, path, `Failed to list ${path}`);
    }
  }

  async function assertDirectory(key: string, path: string, ctx: OpenContext): Promise<void> {
    const found = lookup(key);
    if (found.layer === 'absent') {
      throw new PathNotFoundError(path);
    }
    if (found.layer === 'overlay') {
      if (found.entry.kind !== 'directory') {
        throw new OverlayIOError(path, `Not a directory: ${path}`);
      }
      return;
    }
    const stats = await sourceStats(key, ctx);
    if (stats === null) {
      throw new PathNotFoundError(path);
    }
    if (!stats.isDirectory()) {
      throw new OverlayIOError(path, `Not a directory: ${path}`);
    }
  }

  // ---------------------------------------------------------------------------
  // Public operations
  // ---------------------------------------------------------------------------

  async function open(): Promise<void> {
    if (openCalled || state === 'closed') {
      throw new LifecycleError('open the overlay', state);
    }
    openCalled = true;

    let roots: SourceRoots;
    let shadowRoot: string;
    try {
      roots = await resolveRoots(config.sourceRoot);
      shadowRoot = await createShadowDirectory(config.tempDir ?? tmpdir(), roots);
    } catch (error) {
      state = 'closed';
      throw error;
    }

    // close() ran while the directories were being created.
    if (closing !== null) {
      await rm(shadowRoot, { recursive: true, force: true });
      throw new LifecycleError('open the overlay', 'closed');
    }

    context = { roots, shadowRoot, upperRoot: join(shadowRoot, UPPER_DIR) };
    state = 'open';
    logger.debug('Overlay opened', { sourceRoot: roots.realRoot, shadowRoot });
  }

  async function resolveForRead(path: string): Promise<string> {
    const ctx = requireOpen('read');
    const key = await canonicalize(path);
    const found = lookup(key);

    if (found.layer === 'overlay') {
      return found.entry.shadowPath;
    }
    if (found.layer === 'absent' || (await sourceStats(key, ctx)) === null) {
      throw new PathNotFoundError(path);
    }
    return join(ctx.roots.realRoot, key);
  }

  async function resolveForWrite(path: string): Promise<string> {
    const ctx = requireOpen('write');
    const key = await canonicalize(path);
    if (key === '') {
      return ctx.upperRoot;
    }

    return lock.run(key, async () => {
      const entry = await overlayEntry(key, ctx, true);
      // The caller writes through the returned path.
      return touch(key, entry).shadowPath;
    });
  }

  async function readOverlayFile(path: string): Promise<Buffer> {
    const resolved = await resolveForRead(path);
    return runIO(path, `Failed to read ${path}`, () => readFile(resolved));
  }

  async function writeOverlayFile(path: string, content: string | Uint8Array): Promise<void> {
    const ctx = requireOpen('write');
    const key = await canonicalize(path);

    await lock.run(key, async () => {
      const entry = await overlayEntry(key, ctx, false);
      if (entry.kind === 'directory') {
        throw new OverlayIOError(path, `Is a directory: ${path}`);
      }
      await runIO(path, `Failed to write ${path}`, () => writeFile(entry.shadowPath, content));
      touch(key, entry);
    });
  }

  async function copyIn(path: string, from: string): Promise<string> {
    const ctx = requireOpen('write');
    const key = await canonicalize(path);

    return lock.run(key, async () => {
      const entry = await overlayEntry(key, ctx, false);
      if (entry.kind === 'directory') {
        throw new OverlayIOError(path, `Is a directory: ${path}`);
      }
      await runIO(path, `Failed to copy into ${path}`, () =>
        copyFile(from, entry.shadowPath, constants.COPYFILE_FICLONE),
      );
      return overlayVersion(touch(key, entry));
    });
  }

  async function makeDirectory(path: string): Promise<void> {
    const ctx = requireOpen('create a directory');
    const key = await canonicalize(path);
    if (key === '') {
      return;
    }

    await lock.run(key, async () => {
      const found = lookup(key);
      if (found.layer === 'overlay' && found.entry.kind === 'directory') {
        return;
      }
      if (found.layer === 'overlay') {
        throw new OverlayIOError(path, `File exists: ${path}`);
      }
      if (found.layer === 'source') {
        const stats = await sourceStats(key, ctx);
        if (stats?.isDirectory()) {
          return;
        }
        if (stats !== null) {
          throw new OverlayIOError(path, `File exists: ${path}`);
        }
      }
      await ensureParents(key, ctx);
      await ensureDirectory(key, ctx);
    });
  }

  async function deletePath(path: string): Promise<void> {
    const ctx = requireOpen('delete');
    const key = await canonicalize(path);
    if (key === '') {
      throw new OverlayIOError(path, 'Cannot delete the source root');
    }

    await lock.run(key, async () => {
      const found = lookup(key);
      if (found.layer === 'absent') {
        throw new PathNotFoundError(path);
      }

      // What the source shows at this path once the overlay entry is gone.
      let hidden: Stats | null;
      if (found.layer === 'source') {
        hidden = await sourceStats(key, ctx);
        if (hidden === null) {
          throw new PathNotFoundError(path);
        }
      } else {
        hidden = ancestorsShowSource(key) ? await sourceStats(key, ctx) : null;
      }

      removeDescendants(key);
      if (hidden === null) {
        index.delete(key);
      } else {
        index.set(key, { state: 'deleted', kind: hidden.isDirectory() ? 'directory' : 'file' });
      }

      if (found.layer === 'overlay') {
        const shadowPath = found.entry.shadowPath;
        await runIO(path, `Failed to remove ${path} from the overlay`, () =>
          rm(shadowPath, { recursive: true, force: true }),
        );
      }
    });
  }

  async function listDirectory(path = ''): Promise<DirectoryEntry[]> {
    const ctx = requireOpen('list a directory');
    const key = await canonicalize(path);
    await assertDirectory(key, path, ctx);

    const entries: DirectoryEntry[] = [];
    for (const child of await mergedChildren(key, ctx)) {
      if (child.kind !== 'symlink') {
        entries.push({ name: child.name, path: child.key, type: child.kind, layer: child.layer });
        continue;
      }
      // Links that leave the root or dangle are not part of the merged view.
      const linked = await resolveLinkedEntry(child.key, ctx);
      if (linked !== null) {
        entries.push({ name: child.name, path: child.key, type: linked.kind, layer: child.layer });
      }
    }
    return entries;
  }

  async function walk(): Promise<MergedEntry[]> {
    const ctx = requireOpen('walk the overlay');
    const entries: MergedEntry[] = [];

    async function visit(key: string): Promise<void> {
      for (const child of await mergedChildren(key, ctx)) {
        if (child.kind === 'directory') {
          entries.push({ path: child.key, kind: 'directory' });
          await visit(child.key);
        } else if (child.layer === 'overlay') {
          entries.push({
            path: child.key,
            kind: 'file',
            realPath: child.entry.shadowPath,
            version: overlayVersion(child.entry),
          });
        } else if (child.kind === 'symlink') {
          const linked = await resolveLinkedEntry(child.key, ctx);
          if (linked !== null) {
            entries.push({ path: child.key, kind: 'symlink', target: linked.target });
          }
        } else {
          const stats = await sourceStats(child.key, ctx);
          if (stats !== null) {
            entries.push({
              path: child.key,
              kind: 'file',
              realPath: join(ctx.roots.realRoot, child.key),
              version: `s${stats.mtimeMs}:${stats.size}:${stats.ino}`,
            });
          }
        }
      }
    }

    await visit('');
    return entries;
  }

  function diff(): OverlayChange[] {
    requireOpen('diff the overlay');
    const changes: OverlayChange[] = [];

    for (const [path, entry] of index) {
      if (entry.state === 'deleted') {
        changes.push({ path, change: 'deleted', kind: entry.kind });
      } else if (!entry.sourceExisted) {
        changes.push({ path, change: 'added', kind: entry.kind });
      } else if (entry.kind === 'file' || entry.opaque) {
        changes.push({ path, change: 'modified', kind: entry.kind });
      }
    }

    return changes.sort((a, b) => compareKeys(a.path, b.path));
  }

  async function discard(): Promise<void> {
    const previous = context;
    state = 'closed';
    context = null;
    index.clear();

    if (previous === null) {
      return;
    }

    try {
      await rm(previous.shadowRoot, { recursive: true, force: true });
    } catch (error) {
      logger.error('Failed to remove shadow directory', {
        shadowRoot: previous.shadowRoot,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new OverlayIOError(
        previous.shadowRoot,
        `Failed to remove shadow directory ${previous.shadowRoot}`,
        { cause: error },
      );
    }
    logger.debug('Overlay discarded', { shadowRoot: previous.shadowRoot });
  }

  return {
    getState: () => state,
    getShadowRoot: () => context?.shadowRoot ?? null,
    open,
    canonicalize,
    resolveForRead,
    resolveForWrite,
    readFile: readOverlayFile,
    writeFile: writeOverlayFile,
    copyIn,
    mkdir: makeDirectory,
    delete: deletePath,
    listDirectory,
    walk,
    diff,
    close(): Promise<void> {
      closing ??= discard();
      return closing;
    },
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function resolveRoots(sourceRoot: string): Promise<SourceRoots> {
  let realRoot: string;
  try {
    realRoot = await realpath(sourceRoot);
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new PathNotFoundError(sourceRoot);
    }
    throw toOverlayError(error, sourceRoot, `Failed to resolve source root ${sourceRoot}`);
  }

  const stats = await runIO(sourceRoot, `Failed to inspect ${sourceRoot}`, () => lstat(realRoot));
  if (!stats.isDirectory()) {
    throw new OverlayIOError(sourceRoot, `Source root is not a directory: ${sourceRoot}`);
  }
  return { sourceRoot, realRoot };
}

async function createShadowDirectory(parent: string, roots: SourceRoots): Promise<string> {
  const created = await runIO(parent, `Failed to create shadow directory in ${parent}`, () =>
    mkdtemp(join(parent, SHADOW_PREFIX)),
  );
  const shadowRoot = await runIO(created, `Failed to resolve ${created}`, () => realpath(created));

  if (toRootRelative(shadowRoot, roots) !== null) {
    await rm(shadowRoot, { recursive: true, force: true });
    throw new OverlayIOError(
      shadowRoot,
      `Shadow directory ${shadowRoot} would be inside the source root ${roots.sourceRoot}`,
    );
  }

  await runIO(shadowRoot, `Failed to create ${shadowRoot}`, () =>
    mkdir(join(shadowRoot, UPPER_DIR)),
  );
  return shadowRoot;
}

async function runIO<T>(path: string, message: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw toOverlayError(error, path, message);
  }
}

function toOverlayError(error: unknown, path: string, message: string): Error {
  if (error instanceof ShellfenceError) {
    return error;
  }
  const detail = isNodeError(error) && error.code !== undefined ? ` (${error.code})` : '';
  return new OverlayIOError(path, `${message}${detail}`, { cause: error });
}

function direntKind(dirent: Dirent): EntryKind | 'symlink' {
  if (dirent.isSymbolicLink()) {
    return 'symlink';
  }
  return dirent.isDirectory() ? 'directory' : 'file';
}

function overlayVersion(entry: OverlaidEntry): string {
  return `o${entry.revision}`;
}

function parentKey(key: string): string {
  const slash = key.lastIndexOf('/');
  return slash === -1 ? '' : key.slice(0, slash);
}

function joinKey(parent: string, name: string): string {
  return parent === '' ? name : `${parent}/${name}`;
}
