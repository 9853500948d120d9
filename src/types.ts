/**
 * Core types for the update packager
 */

import type { DistributionNode } from './distribution-tree.js';

/**
 * One entry of an archive, before its leading distribution-name segment is
 * stripped. `read` resolves to the entry payload (empty for directories).
 */
export interface ArchiveEntry {
  path: string;
  isDir: boolean;
  read(): Promise<Uint8Array>;
}

export interface InventoryEntry {
  relativePath: string;
  name: string;
  isDir: boolean;
  hash?: string;
}

export interface UpdateInventory {
  entries: ReadonlyMap<string, InventoryEntry>;
  rootDirectoryNames: ReadonlySet<string>;
  rootFileNames: ReadonlySet<string>;
}

/**
 * A file or directory directly under the update root
 */
export interface TopLevelEntry {
  name: string;
  isDir: boolean;
}

/**
 * Parent locations (relative paths) keyed to their nodes
 */
export type MatchSet = Map<string, DistributionNode>;

export type ChangeKind = 'added' | 'modified';

export interface ChangeRecord {
  kind: ChangeKind;
  path: string;
}

/**
 * Values fixed for the duration of one run
 */
export interface RunContext {
  readonly updateRoot: string;
  readonly distributionPath: string;
  readonly productName: string;
  readonly updateName: string;
  readonly stagingDirectory: string;
  readonly homeDirectory: string;
  readonly tempDirectory: string;
  readonly outputDirectory: string;
  readonly checkHashes: boolean;
  readonly ignoredNames: ReadonlySet<string>;
}
