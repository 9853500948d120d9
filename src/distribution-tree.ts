/**
 * In-memory directory tree of a baseline product distribution
 */

import { hashContent } from './content-hash.js';
import { ReadError } from './errors.js';
import { Logger } from './logger.js';
import type { ArchiveEntry } from './types.js';

const logger = new Logger({ context: 'distribution-tree' });

export class DistributionNode {
  private readonly childNodes = new Map<string, DistributionNode>();
  private directory: boolean;
  private contentHash?: string;
  private cachedPath?: string;

  constructor(
    readonly name: string,
    isDir: boolean,
    // Navigation only: used to rebuild relativePath, never to own or walk the tree.
    readonly parent?: DistributionNode,
    hash?: string
  ) {
    this.directory = isDir;
    this.contentHash = isDir ? undefined : hash;
  }

  get isDir(): boolean {
    return this.directory;
  }

  get hash(): string | undefined {
    return this.contentHash;
  }

  get children(): ReadonlyMap<string, DistributionNode> {
    return this.childNodes;
  }

  get isRoot(): boolean {
    return this.parent === undefined;
  }

  /**
   * Path from the distribution root, '/'-separated. Empty for the root.
   */
  get relativePath(): string {
    if (this.cachedPath === undefined) {
      const segments: string[] = [];
      let current: DistributionNode | undefined = this;
      while (current && !current.isRoot) {
        segments.push(current.name);
        current = current.parent;
      }
      this.cachedPath = segments.reverse().join('/');
    }
    return this.cachedPath;
  }

  getChild(name: string): DistributionNode | undefined {
    return this.childNodes.get(name);
  }

  private addChild(name: string, isDir: boolean, hash?: string): DistributionNode {
    const child = new DistributionNode(name, isDir, this, hash);
    this.childNodes.set(name, child);
    return child;
  }

  private describe(isDir: boolean, hash?: string): void {
    this.directory = isDir;
    this.contentHash = isDir ? undefined : hash;
  }

  /**
   * Adds (or redefines) the node at `relativePath`, creating directory
   * placeholders for missing intermediate segments.
   */
  static insert(root: DistributionNode, relativePath: string, isDir: boolean, hash?: string): DistributionNode {
    const segments = splitPath(relativePath);
    let current = root;

    segments.forEach((segment, index) => {
      const isLeaf = index === segments.length - 1;
      const existing = current.getChild(segment);

      if (!existing) {
        current = isLeaf ? current.addChild(segment, isDir, hash) : current.addChild(segment, true);
        return;
      }

      if (isLeaf) {
        existing.describe(isDir, hash);
      }
      current = existing;
    });

    return current;
  }

  static createRoot(): DistributionNode {
    return new DistributionNode('', true);
  }
}

export function splitPath(path: string): string[] {
  return path.split('/').filter(segment => segment.length > 0);
}

export function joinPath(...parts: string[]): string {
  return parts.flatMap(splitPath).join('/');
}

/**
 * Archive entries are all rooted under the distribution's own directory;
 * drop that first segment.
 */
export function stripDistributionName(entryPath: string): string {
  return splitPath(entryPath).slice(1).join('/');
}

/**
 * Indexes archive entries into a tree. Any unreadable payload aborts the
 * whole build.
 */
export async function buildDistributionTree(entries: Iterable<ArchiveEntry>): Promise<DistributionNode> {
  const root = DistributionNode.createRoot();
  let files = 0;
  let directories = 0;

  for (const entry of entries) {
    const relativePath = stripDistributionName(entry.path);
    if (relativePath.length === 0) continue;

    if (entry.isDir) {
      DistributionNode.insert(root, relativePath, true);
      directories++;
      continue;
    }

    let payload: Uint8Array;
    try {
      payload = await entry.read();
    } catch (error) {
      throw new ReadError(`Unable to read archive entry '${entry.path}'`, entry.path, error);
    }
    DistributionNode.insert(root, relativePath, false, hashContent(payload));
    files++;
  }

  logger.debug('Distribution indexed', { files, directories, topLevel: [...root.children.keys()] });
  return root;
}

export function findNode(root: DistributionNode, relativePath: string): DistributionNode | undefined {
  let current: DistributionNode | undefined = root;
  for (const segment of splitPath(relativePath)) {
    current = current.getChild(segment);
    if (!current) return undefined;
  }
  return current;
}

export function pathExists(root: DistributionNode, relativePath: string, isDir: boolean): boolean {
  const node = findNode(root, relativePath);
  return node !== undefined && node.isDir === isDir;
}

/**
 * True when a file with the given content hash already sits at `relativePath`
 */
export function hasIdenticalFile(root: DistributionNode, relativePath: string, hash: string): boolean {
  const node = findNode(root, relativePath);
  return node !== undefined && !node.isDir && node.hash === hash;
}
