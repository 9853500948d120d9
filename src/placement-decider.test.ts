import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, rmSync } from 'fs';
import { join } from 'path';
import { ChangeClassifier } from './change-classifier.js';
import { hashContent } from './content-hash.js';
import { scanUpdateDirectory } from './directory-scanner.js';
import { DistributionNode } from './distribution-tree.js';
import { AppError } from './logger.js';
import { findMatches } from './match-resolver.js';
import { PROMPTS, PlacementDecider, trimSeparators } from './placement-decider.js';
import { StagingArea } from './staging-area.js';
import type { RunContext } from './types.js';
import { UpdateManifest } from './update-manifest.js';
import { ScriptedPrompter, makeRunContext, makeTempDir, writeTree } from '../tests/fixtures.js';

describe('PlacementDecider', () => {
  let updateRoot: string;
  let workDir: string;
  let tree: DistributionNode;

  beforeEach(() => {
    updateRoot = makeTempDir('decider-update');
    workDir = makeTempDir('decider-work');
    writeTree(updateRoot, {
      'conf/carbon.xml': '<carbon/>',
      'conf/axis2/axis2.xml': '<axis2 changed="true"/>',
      'logging-config.xml': '<logging/>',
      'foo.jar': 'new library',
      'patches/patch0001/a.jar': 'patch',
    });

    tree = DistributionNode.createRoot();
    DistributionNode.insert(tree, 'repository/conf/carbon.xml', false, hashContent(Buffer.from('<carbon/>')));
    DistributionNode.insert(tree, 'repository/conf/axis2/axis2.xml', false, hashContent(Buffer.from('<axis2/>')));
    DistributionNode.insert(tree, 'repository/conf/a/logging-config.xml', false, hashContent(Buffer.from('<logging/>')));
    DistributionNode.insert(tree, 'repository/conf/b/logging-config.xml', false, hashContent(Buffer.from('<old/>')));
    DistributionNode.insert(tree, 'repository/components/patches', true);
    DistributionNode.insert(tree, 'lib', true);
  });

  afterEach(() => {
    rmSync(updateRoot, { recursive: true, force: true });
    rmSync(workDir, { recursive: true, force: true });
  });

  async function setup(answers: string[], context: RunContext = makeRunContext(updateRoot, workDir)) {
    const inventory = await scanUpdateDirectory(updateRoot);
    const manifest = new UpdateManifest();
    const classifier = new ChangeClassifier(context, tree, inventory, new StagingArea(context), manifest);
    const prompter = new ScriptedPrompter(answers);
    const decider = new PlacementDecider(context, tree, classifier, prompter);
    return { context, manifest, prompter, decider };
  }

  describe('single match', () => {
    it('copies a directory to its only location without prompting', async () => {
      const { manifest, prompter, decider } = await setup([]);

      const outcome = await decider.decide({ name: 'conf', isDir: true });

      expect(prompter.questions).toEqual([]);
      expect(outcome.status).toBe('done');
      expect(outcome.states).toEqual(['searching', 'single-match', 'copying', 'done']);
      expect(outcome.destinations).toEqual(['repository']);
      expect(manifest.modified).toEqual(['repository/conf/axis2/axis2.xml']);
    });

    it('skips files whose content is unchanged', async () => {
      const { context, decider } = await setup([]);

      const outcome = await decider.decide({ name: 'conf', isDir: true });

      expect(outcome.unchanged).toEqual(['repository/conf/carbon.xml']);
      expect(existsSync(join(context.homeDirectory, 'repository', 'conf', 'carbon.xml'))).toBe(false);
    });

    it('copies unchanged files too when hash checking is off', async () => {
      const { manifest, decider } = await setup([], makeRunContext(updateRoot, workDir, false));

      await decider.decide({ name: 'conf', isDir: true });

      expect(manifest.modified).toEqual(['repository/conf/axis2/axis2.xml', 'repository/conf/carbon.xml']);
    });
  });

  describe('multiple matches', () => {
    const entry = { name: 'logging-config.xml', isDir: false };

    it('presents sorted candidates and copies to every selected one', async () => {
      const { manifest, prompter, decider } = await setup(['1,2']);

      const outcome = await decider.decide(entry);

      expect(prompter.candidates).toEqual([
        { entryName: 'logging-config.xml', locations: ['repository/conf/a', 'repository/conf/b'] },
      ]);
      expect(outcome.states).toEqual(['searching', 'multiple-match', 'awaiting-selection', 'copying', 'done']);
      expect(manifest.modified).toEqual([
        'repository/conf/a/logging-config.xml',
        'repository/conf/b/logging-config.xml',
      ]);
    });

    it('copies once per listed index, repeats included', async () => {
      const { manifest, decider } = await setup(['1,1']);

      const outcome = await decider.decide(entry);

      expect(outcome.destinations).toEqual(['repository/conf/a', 'repository/conf/a']);
      expect(outcome.records).toEqual([
        { kind: 'modified', path: 'repository/conf/a/logging-config.xml' },
        { kind: 'modified', path: 'repository/conf/a/logging-config.xml' },
      ]);
      expect(manifest.modified).toEqual([
        'repository/conf/a/logging-config.xml',
        'repository/conf/a/logging-config.xml',
      ]);
    });

    it('does not skip identical content on the selection path', async () => {
      const { manifest, decider } = await setup(['1']);

      const outcome = await decider.decide(entry);

      expect(outcome.unchanged).toEqual([]);
      expect(manifest.modified).toEqual(['repository/conf/a/logging-config.xml']);
    });

    it('copies nothing when 0 is selected', async () => {
      const { manifest, decider } = await setup(['0']);

      const outcome = await decider.decide(entry);

      expect(outcome.status).toBe('skipped');
      expect(outcome.records).toEqual([]);
      expect(manifest.size).toBe(0);
    });

    it('skips when 0 appears anywhere in the list', async () => {
      const { manifest, decider } = await setup(['2, 0']);

      const outcome = await decider.decide(entry);

      expect(outcome.status).toBe('skipped');
      expect(manifest.size).toBe(0);
    });

    it('asks again after an out-of-range index', async () => {
      const { manifest, prompter, decider } = await setup(['3', '2']);

      const outcome = await decider.decide(entry);

      expect(prompter.questions).toEqual([PROMPTS.selection, PROMPTS.selection]);
      expect(prompter.notices).toContain('Invalid preferences. Please select indices where 0 <= index <= 2');
      expect(outcome.status).toBe('done');
      expect(manifest.modified).toEqual(['repository/conf/b/logging-config.xml']);
    });

    it('asks again after malformed input', async () => {
      const { prompter, decider } = await setup(['one', '1,', '1']);

      const outcome = await decider.decide(entry);

      expect(prompter.questions).toHaveLength(3);
      expect(outcome.destinations).toEqual(['repository/conf/a']);
    });
  });

  describe('no match', () => {
    const entry = { name: 'foo.jar', isDir: false };

    it('starts from an empty match set', () => {
      expect(findMatches(tree, 'foo.jar', false).size).toBe(0);
    });

    it('skips by default', async () => {
      const { manifest, prompter, decider } = await setup(['']);

      const outcome = await decider.decide(entry);

      expect(prompter.questions).toEqual([PROMPTS.addAsNew]);
      expect(outcome.status).toBe('skipped');
      expect(outcome.states).toEqual(['searching', 'no-match', 'skipped']);
      expect(manifest.size).toBe(0);
    });

    it('asks again after an unrecognised answer', async () => {
      const { prompter, decider } = await setup(['maybe', 'N']);

      const outcome = await decider.decide(entry);

      expect(prompter.notices).toContain('Invalid preference. Enter Y for Yes or N for No.');
      expect(outcome.status).toBe('skipped');
    });

    it('copies to a confirmed new location', async () => {
      const { context, manifest, decider } = await setup(['y', '/lib/ext/', 'Y']);

      const outcome = await decider.decide(entry);

      expect(outcome.states).toEqual([
        'searching',
        'no-match',
        'awaiting-destination',
        'awaiting-confirmation',
        'copying',
        'done',
      ]);
      expect(manifest.added).toEqual(['lib/ext/foo.jar']);
      expect(existsSync(join(context.homeDirectory, 'lib', 'ext', 'foo.jar'))).toBe(true);
    });

    it('copies to the distribution root for an empty destination', async () => {
      const { manifest, prompter, decider } = await setup(['yes', '']);

      await decider.decide(entry);

      expect(prompter.questions).toEqual([PROMPTS.addAsNew, PROMPTS.destination]);
      expect(manifest.added).toEqual(['foo.jar']);
    });

    it('returns to the destination prompt on re-enter', async () => {
      const { manifest, prompter, decider } = await setup(['y', 'lib/typo', '', 'lib/ext', 'y']);

      const outcome = await decider.decide(entry);

      expect(prompter.questions).toEqual([
        PROMPTS.addAsNew,
        PROMPTS.destination,
        PROMPTS.copyAnyway,
        PROMPTS.destination,
        PROMPTS.copyAnyway,
      ]);
      expect(outcome.destinations).toEqual(['lib/ext']);
      expect(manifest.added).toEqual(['lib/ext/foo.jar']);
    });

    it('skips when the new location is declined', async () => {
      const { manifest, decider } = await setup(['y', 'lib/ext', 'n']);

      const outcome = await decider.decide(entry);

      expect(outcome.status).toBe('skipped');
      expect(manifest.size).toBe(0);
    });

    it('copies straight away when the destination already holds the entry', async () => {
      const { manifest, prompter, decider } = await setup(['y', 'repository/components']);

      const outcome = await decider.decide({ name: 'patches', isDir: true }, new Map());

      expect(prompter.questions).toEqual([PROMPTS.addAsNew, PROMPTS.destination]);
      expect(outcome.destinations).toEqual(['repository/components']);
      expect(manifest.added).toEqual(['repository/components/patches/patch0001/a.jar']);
    });

    it('fails when input runs out', async () => {
      const { decider } = await setup([]);

      await expect(decider.decide(entry)).rejects.toBeInstanceOf(AppError);
    });
  });

  describe('trimSeparators', () => {
    it('strips leading and trailing separators only', () => {
      expect(trimSeparators('/repository/conf/')).toBe('repository/conf');
      expect(trimSeparators('\\lib\\')).toBe('lib');
      expect(trimSeparators('  lib/ext  ')).toBe('lib/ext');
      expect(trimSeparators('/')).toBe('');
    });
  });
});
