import type { Logger } from '../create-logger.ts';

export type OverlayState = 'created' | 'open' | 'closed';

export type EntryKind = 'file' | 'directory';

export interface OverlaidEntry {
  state: 'overlaid';
  kind: EntryKind;
  shadowPath: string;
  /** A directory that hides whatever the source has at the same path. */
  opaque: boolean;
  /** Whether the source showed something at this path when it was first overlaid. */
  sourceExisted: boolean;
  revision: number;
}

export interface DeletedEntry {
  state: 'deleted';
  kind: EntryKind;
}

export type PathIndexEntry = OverlaidEntry | DeletedEntry;

export interface DirectoryEntry {
  name: string;
  /** Logical path relative to the source root, `/`-separated. */
  path: string;
  type: EntryKind;
  layer: 'overlay' | 'source';
}

export type ChangeKind = 'added' | 'modified' | 'deleted';

export interface OverlayChange {
  path: string;
  change: ChangeKind;
  kind: EntryKind;
}

/**
 * One entry of the merged view, in pre-order. `version` changes whenever the
 * content behind the entry may have changed.
 */
export type MergedEntry =
  | { path: string; kind: 'directory' }
  | { path: string; kind: 'file'; realPath: string; version: string }
  | { path: string; kind: 'symlink'; target: string };

export interface OverlayManagerConfig {
  sourceRoot: string;
  logger: Logger;
  /** Parent directory for the shadow directory; the OS temp dir by default. */
  tempDir?: string;
}

export interface OverlayManager {
  getState: () => OverlayState;
  /** Shadow directory; null unless open. */
  getShadowRoot: () => string | null;
  open: () => Promise<void>;
  canonicalize: (path: string) => Promise<string>;
  resolveForRead: (path: string) => Promise<string>;
  resolveForWrite: (path: string) => Promise<string>;
  readFile: (path: string) => Promise<Buffer>;
  writeFile: (path: string, content: string | Uint8Array) => Promise<void>;
  /** Replaces the content at `path` with a copy of the file at `from`. Returns the new version. */
  copyIn: (path: string, from: string) => Promise<string>;
  mkdir: (path: string) => Promise<void>;
  delete: (path: string) => Promise<void>;
  listDirectory: (path?: string) => Promise<DirectoryEntry[]>;
  walk: () => Promise<MergedEntry[]>;
  diff: () => OverlayChange[];
  close: () => Promise<void>;
}
