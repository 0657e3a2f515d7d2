import type { Dirent, Stats } from 'node:fs';
import { constants } from 'node:fs';
import { copyFile, lstat, mkdir, readdir, rm, symlink } from 'node:fs/promises';
import { dirname, join, relative } from 'node:path';
import invariant from 'tiny-invariant';
import type { Logger } from '../create-logger.ts';
import { OverlayIOError, PathNotFoundError, ShellfenceError } from '../errors.ts';
import { compareKeys } from './compare-keys.ts';
import { createKeyedLock } from './create-keyed-lock.ts';
import type { OverlayManager } from './types.ts';

const STAGE_LOCK_KEY = 'stage';

type StagedKind = 'file' | 'directory' | 'symlink';

interface StagedEntry {
  kind: StagedKind;
  /** Overlay version for files, link target for symlinks. */
  version: string;
  size: number;
  mtimeMs: number;
  ctimeMs: number;
}

interface ScannedEntry {
  kind: StagedKind;
  stats: Stats;
}

export interface CaptureSummary {
  written: number;
  created: number;
  deleted: number;
}

export interface WorkspaceStageConfig {
  overlay: OverlayManager;
  /** Directory the merged view is materialized into; commands run here. */
  stageRoot: string;
  logger: Logger;
}

export interface WorkspaceStage {
  readonly root: string;
  /** Brings the stage up to date with the merged view. */
  prepare: () => Promise<void>;
  /** Records what commands changed in the stage into the overlay. */
  capture: () => Promise<CaptureSummary>;
}

/**
 * A materialized copy of the merged view that spawned processes run in. The
 * overlay's path index stays authoritative: the stage is refreshed from it
 * before a command and changes are fed back through it afterwards. Symbolic
 * links are staged as relative links to their in-root targets; links created
 * by commands are dropped rather than captured.
 */
export function createWorkspaceStage(config: WorkspaceStageConfig): WorkspaceStage {
  const { overlay, stageRoot } = config;
  const logger = config.logger.child({ component: 'stage' });
  const manifest = new Map<string, StagedEntry>();
  const lock = createKeyedLock();

  function forget(key: string): void {
    const prefix = `${key}/`;
    for (const candidate of [...manifest.keys()]) {
      if (candidate === key || candidate.startsWith(prefix)) {
        manifest.delete(candidate);
      }
    }
  }

  async function deleteFromOverlay(key: string): Promise<void> {
    try {
      await overlay.delete(key);
    } catch (error) {
      // Already removed along with an ancestor.
      if (error instanceof PathNotFoundError) {
        return;
      }
      throw error;
    }
  }

  async function prepare(): Promise<void> {
    await lock.run(STAGE_LOCK_KEY, async () => {
      const merged = await overlay.walk();
      const wanted = new Map(merged.map((entry) => [entry.path, entry]));

      await stageIO(stageRoot, () => mkdir(stageRoot, { recursive: true }));

      for (const [key, staged] of [...manifest].sort(([a], [b]) => compareKeys(a, b))) {
        const next = wanted.get(key);
        if (manifest.has(key) && (next === undefined || next.kind !== staged.kind)) {
          const stagePath = join(stageRoot, key);
          await stageIO(stagePath, () => rm(stagePath, { recursive: true, force: true }));
          forget(key);
        }
      }

      for (const entry of merged) {
        const stagePath = join(stageRoot, entry.path);
        const staged = manifest.get(entry.path);

        if (entry.kind === 'directory') {
          if (staged === undefined) {
            await stageIO(stagePath, () => mkdir(stagePath, { recursive: true }));
            manifest.set(entry.path, buildEntry('directory', '', null));
          }
        } else if (entry.kind === 'file') {
          if (staged?.version !== entry.version) {
            await stageIO(stagePath, () =>
              copyFile(entry.realPath, stagePath, constants.COPYFILE_FICLONE),
            );
            const stats = await stageIO(stagePath, () => lstat(stagePath));
            manifest.set(entry.path, buildEntry('file', entry.version, stats));
          }
        } else if (staged?.version !== entry.target) {
          const linkTarget = relative(dirname(stagePath), join(stageRoot, entry.target)) || '.';
          await stageIO(stagePath, async () => {
            await rm(stagePath, { recursive: true, force: true });
            await symlink(linkTarget, stagePath);
          });
          manifest.set(entry.path, buildEntry('symlink', entry.target, null));
        }
      }
    });
  }

  async function capture(): Promise<CaptureSummary> {
    return lock.run(STAGE_LOCK_KEY, async () => {
      const scanned = await scanStage(stageRoot);
      const summary: CaptureSummary = { written: 0, created: 0, deleted: 0 };

      for (const key of [...manifest.keys()].sort(compareKeys)) {
        const staged = manifest.get(key);
        if (staged === undefined || scanned.has(key)) {
          continue;
        }
        forget(key);
        if (staged.kind !== 'symlink') {
          await deleteFromOverlay(key);
          summary.deleted += 1;
        }
      }

      for (const [key, current] of scanned) {
        const staged = manifest.get(key);
        const stagePath = join(stageRoot, key);

        if (current.kind === 'symlink') {
          if (staged?.kind !== 'symlink') {
            await stageIO(stagePath, () => rm(stagePath, { force: true }));
            logger.debug('Dropped symbolic link created by command', { path: key });
          }
          continue;
        }

        if (staged !== undefined && staged.kind !== current.kind) {
          forget(key);
          // Writing through a staged link lands on its target, so only real
          // entries are removed from the overlay.
          if (staged.kind !== 'symlink') {
            await deleteFromOverlay(key);
            summary.deleted += 1;
          }
        }

        const known = manifest.get(key);
        if (current.kind === 'directory') {
          if (known === undefined) {
            await overlay.mkdir(key);
            manifest.set(key, buildEntry('directory', '', null));
            summary.created += 1;
          }
          continue;
        }

        if (known !== undefined && isUnchanged(known, current.stats)) {
          continue;
        }
        const version = await overlay.copyIn(key, stagePath);
        manifest.set(key, buildEntry('file', version, current.stats));
        summary.written += 1;
      }

      logger.debug('Captured workspace changes', { ...summary });
      return summary;
    });
  }

  return { root: stageRoot, prepare, capture };
}

// Pre-order, names sorted; the stage root itself is not included.
async function scanStage(stageRoot: string): Promise<Map<string, ScannedEntry>> {
  const scanned = new Map<string, ScannedEntry>();

  async function visit(key: string): Promise<void> {
    const directory = join(stageRoot, key);
    const dirents = await stageIO(directory, () => readdir(directory, { withFileTypes: true }));

    for (const dirent of dirents.sort((a, b) => compareKeys(a.name, b.name))) {
      const childKey = key === '' ? dirent.name : `${key}/${dirent.name}`;
      const kind = scannedKind(dirent);
      if (kind === null) {
        continue;
      }
      const childPath = join(stageRoot, childKey);
      const stats = await stageIO(childPath, () => lstat(childPath));
      scanned.set(childKey, { kind, stats });
      if (kind === 'directory') {
        await visit(childKey);
      }
    }
  }

  await visit('');
  return scanned;
}

function scannedKind(dirent: Dirent): StagedKind | null {
  if (dirent.isSymbolicLink()) {
    return 'symlink';
  }
  if (dirent.isDirectory()) {
    return 'directory';
  }
  // Sockets, FIFOs and devices are not carried into the overlay.
  return dirent.isFile() ? 'file' : null;
}

function buildEntry(kind: StagedKind, version: string, stats: Stats | null): StagedEntry {
  return {
    kind,
    version,
    size: stats?.size ?? 0,
    mtimeMs: stats?.mtimeMs ?? 0,
    ctimeMs: stats?.ctimeMs ?? 0,
  };
}

function isUnchanged(staged: StagedEntry, stats: Stats): boolean {
  invariant(staged.kind === 'file', 'only files are compared by metadata');
  return (
    staged.size === stats.size &&
    staged.mtimeMs === stats.mtimeMs &&
    staged.ctimeMs === stats.ctimeMs
  );
}

async function stageIO<T>(path: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof ShellfenceError) {
      throw error;
    }
    throw new OverlayIOError(path, `Failed to update workspace stage at ${path}`, {
      cause: error,
    });
  }
}
