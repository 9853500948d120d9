/**
 * Zips the staging directory into the final update archive
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import glob from 'fast-glob';
import JSZip from 'jszip';
import { CopyError } from './errors.js';
import { Logger } from './logger.js';
import type { RunContext } from './types.js';

const logger = new Logger({ context: 'update-archiver' });

export interface ArchiveResult {
  path: string;
  size: number;
  files: number;
}

/**
 * Everything under the staging directory goes below a top-level folder named
 * after the update; directories are kept even when empty.
 */
export async function archiveStagingDirectory(context: RunContext): Promise<ArchiveResult> {
  const zip = new JSZip();
  const root = zip.folder(context.updateName) ?? zip;

  const entries = await glob('**', {
    cwd: context.stagingDirectory,
    dot: true,
    onlyFiles: false,
    markDirectories: true,
  });
  entries.sort();

  let files = 0;
  for (const entry of entries) {
    if (entry.endsWith('/')) {
      root.folder(entry.slice(0, -1));
      continue;
    }
    root.file(entry, await readFile(join(context.stagingDirectory, entry)));
    files++;
  }

  const zipBuffer = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  const path = join(context.outputDirectory, `${context.updateName}.zip`);

  try {
    await mkdir(context.outputDirectory, { recursive: true });
    await writeFile(path, zipBuffer);
  } catch (error) {
    throw new CopyError(`Unable to write '${path}'`, context.stagingDirectory, path, error);
  }

  logger.info(`Archived ${files} files into ${path}`, { size: zipBuffer.byteLength });
  return { path, size: zipBuffer.byteLength, files };
}
