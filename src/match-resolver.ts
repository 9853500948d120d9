/**
 * Finds where a top-level update entry could live in the distribution
 */

import type { DistributionNode } from './distribution-tree.js';
import type { MatchSet } from './types.js';

export function compareLexically(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Every node that has a direct child called `name` of the requested kind,
 * keyed by the node's own relative path. The search keeps descending below a
 * match since the same name can recur deeper in the layout.
 */
export function findMatches(root: DistributionNode, name: string, isDir: boolean): MatchSet {
  const matches: MatchSet = new Map();
  const pending: DistributionNode[] = [root];

  while (pending.length > 0) {
    const node = pending.pop();
    if (!node) break;

    const child = node.getChild(name);
    if (child && child.isDir === isDir) {
      matches.set(node.relativePath, node);
    }

    for (const next of node.children.values()) {
      if (next.isDir) pending.push(next);
    }
  }

  return matches;
}

/**
 * Candidate locations in presentation order
 */
export function sortedLocations(matches: MatchSet): string[] {
  return [...matches.keys()].sort(compareLexically);
}
