/**
 * Reads the baseline distribution zip
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import JSZip from 'jszip';
import { buildDistributionTree, type DistributionNode } from './distribution-tree.js';
import { ReadError } from './errors.js';
import { Logger } from './logger.js';
import type { ArchiveEntry } from './types.js';

const logger = new Logger({ context: 'distribution-archive' });

export interface DistributionArchive {
  productName: string;
  entries: ArchiveEntry[];
}

export function getProductName(distributionPath: string): string {
  return basename(distributionPath, '.zip');
}

export async function readDistributionArchive(distributionPath: string): Promise<DistributionArchive> {
  let buffer: Buffer;
  try {
    buffer = await readFile(distributionPath);
  } catch (error) {
    throw new ReadError(`Unable to read distribution '${distributionPath}'`, distributionPath, error);
  }

  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(buffer);
  } catch (error) {
    throw new ReadError(`'${distributionPath}' is not a readable zip archive`, distributionPath, error);
  }

  const entries: ArchiveEntry[] = Object.values(zip.files).map(file => ({
    path: file.name,
    isDir: file.dir,
    read: () => file.async('uint8array'),
  }));

  logger.debug('Distribution archive opened', { path: distributionPath, entries: entries.length });
  return { productName: getProductName(distributionPath), entries };
}

export async function indexDistribution(distributionPath: string): Promise<DistributionNode> {
  const archive = await readDistributionArchive(distributionPath);
  return buildDistributionTree(archive.entries);
}
