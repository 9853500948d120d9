/**
 * Copies an update entry into the staging area and records each copy as
 * added or modified
 */

import { join } from 'path';
import { filesUnder } from './directory-scanner.js';
import { hasIdenticalFile, joinPath, pathExists, type DistributionNode } from './distribution-tree.js';
import { Logger } from './logger.js';
import type { StagingArea } from './staging-area.js';
import type { ChangeRecord, RunContext, TopLevelEntry, UpdateInventory } from './types.js';
import type { UpdateManifest } from './update-manifest.js';

const logger = new Logger({ context: 'change-classifier' });

export interface PlaceOptions {
  /** Skip files whose content already matches the distribution */
  verifyHashes: boolean;
}

export interface PlacementResult {
  records: ChangeRecord[];
  unchanged: string[];
}

export class ChangeClassifier {
  constructor(
    private readonly context: RunContext,
    private readonly tree: DistributionNode,
    private readonly inventory: UpdateInventory,
    private readonly staging: StagingArea,
    private readonly manifest: UpdateManifest
  ) {}

  /**
   * Copies `entry` under the distribution location `destination`. A
   * directory keeps its internal layout: `conf/a/b.xml` placed at
   * `repository` lands on `repository/conf/a/b.xml`.
   */
  async place(entry: TopLevelEntry, destination: string, options: PlaceOptions): Promise<PlacementResult> {
    const result: PlacementResult = { records: [], unchanged: [] };

    for (const file of filesUnder(this.inventory, entry)) {
      const target = joinPath(destination, file.relativePath);

      if (options.verifyHashes && file.hash !== undefined && hasIdenticalFile(this.tree, target, file.hash)) {
        logger.debug('Content unchanged, not copying', { file: file.relativePath, target });
        result.unchanged.push(target);
        continue;
      }

      result.records.push(await this.copy(file.relativePath, target));
    }

    return result;
  }

  private async copy(sourcePath: string, target: string): Promise<ChangeRecord> {
    // Decided against the baseline before the write; the tree never changes.
    const existed = pathExists(this.tree, target, false);
    await this.staging.copyIntoHome(join(this.context.updateRoot, sourcePath), target);
    const record = this.manifest.record(existed ? 'modified' : 'added', target);
    logger.debug(`[${record.kind.toUpperCase()}] ${target}`, { source: sourcePath });
    return record;
  }
}
