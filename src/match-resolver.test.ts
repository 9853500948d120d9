import { describe, it, expect, beforeEach } from 'vitest';
import { DistributionNode } from './distribution-tree.js';
import { compareLexically, findMatches, sortedLocations } from './match-resolver.js';

function treeOf(paths: Array<[string, boolean]>): DistributionNode {
  const root = DistributionNode.createRoot();
  for (const [path, isDir] of paths) {
    DistributionNode.insert(root, path, isDir, isDir ? undefined : `hash-of-${path}`);
  }
  return root;
}

describe('Match resolver', () => {
  let root: DistributionNode;

  beforeEach(() => {
    root = treeOf([
      ['repository/conf/a/logging-config.xml', false],
      ['repository/conf/b/logging-config.xml', false],
      ['repository/conf/carbon.xml', false],
      ['repository/conf/etc/carbon.xml', false],
      ['repository/components/plugins/core.jar', false],
      ['bin/conf', false],
      ['lib', true],
    ]);
  });

  it('returns an empty set when nothing has the name', () => {
    expect(findMatches(root, 'foo.jar', false).size).toBe(0);
  });

  it('records the parent location, not the matching child', () => {
    const matches = findMatches(root, 'conf', true);

    expect([...matches.keys()]).toEqual(['repository']);
    expect(matches.get('repository')?.relativePath).toBe('repository');
  });

  it('matches on kind as well as name', () => {
    expect([...findMatches(root, 'conf', false).keys()]).toEqual(['bin']);
  });

  it('keeps searching below a match', () => {
    const matches = findMatches(root, 'carbon.xml', false);

    expect(sortedLocations(matches)).toEqual(['repository/conf', 'repository/conf/etc']);
  });

  it('finds every sibling location', () => {
    const matches = findMatches(root, 'logging-config.xml', false);

    expect(sortedLocations(matches)).toEqual(['repository/conf/a', 'repository/conf/b']);
  });

  it('matches children of the root under the empty path', () => {
    expect([...findMatches(root, 'lib', true).keys()]).toEqual(['']);
  });

  it('includes a known parent regardless of other matches', () => {
    DistributionNode.insert(root, 'samples/core.jar', false, 'x');

    const matches = findMatches(root, 'core.jar', false);
    expect(matches.has('samples')).toBe(true);
    expect(matches.has('repository/components/plugins')).toBe(true);
  });

  it('sorts locations by code unit order', () => {
    expect(['b', 'B', 'a', 'a/b'].sort(compareLexically)).toEqual(['B', 'a', 'a/b', 'b']);
  });
});
