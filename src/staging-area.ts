/**
 * Staging directory the update is assembled in before zipping
 */

import { copyFile, mkdir, readdir, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { ResourceFilesConfig } from './config.js';
import { splitPath } from './distribution-tree.js';
import { CopyError } from './errors.js';
import { Logger } from './logger.js';
import type { RunContext } from './types.js';

const logger = new Logger({ context: 'staging-area' });

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class StagingArea {
  constructor(private readonly context: RunContext) {}

  /**
   * Create-if-absent; safe to call repeatedly for the same path
   */
  async ensureDirectory(path: string): Promise<void> {
    try {
      await mkdir(path, { recursive: true });
    } catch (error) {
      throw new CopyError(`Unable to create directory '${path}'`, path, path, error);
    }
  }

  /**
   * Absolute staging location of a distribution-relative path
   */
  resolveInHome(relativePath: string): string {
    return join(this.context.homeDirectory, ...splitPath(relativePath));
  }

  async copyIntoHome(source: string, relativePath: string): Promise<string> {
    const destination = this.resolveInHome(relativePath);
    await this.ensureDirectory(dirname(destination));
    try {
      await copyFile(source, destination);
    } catch (error) {
      throw new CopyError(`Unable to copy '${source}' to '${destination}'`, source, destination, error);
    }
    logger.debug('Copied', { source, destination });
    return destination;
  }

  /**
   * Copies the descriptor and the other resource files beside the home
   * directory. A missing mandatory file fails the run.
   */
  async copyResourceFiles(resources: ResourceFilesConfig): Promise<string[]> {
    await this.ensureDirectory(this.context.homeDirectory);

    const copied: string[] = [];
    const candidates = [
      ...resources.mandatory.map(name => ({ name, mandatory: true })),
      ...resources.optional.map(name => ({ name, mandatory: false })),
    ];

    for (const { name, mandatory } of candidates) {
      const source = join(this.context.updateRoot, name);
      const destination = join(this.context.stagingDirectory, name);
      try {
        await copyFile(source, destination);
        copied.push(name);
      } catch (error) {
        if (mandatory || !isMissingFile(error)) {
          throw new CopyError(`Unable to copy resource file '${name}'`, source, destination, error);
        }
        logger.info(`Optional resource file '${name}' not found.`);
      }
    }

    return copied;
  }

  async writeDescriptor(fileName: string, content: string): Promise<string> {
    const destination = join(this.context.stagingDirectory, fileName);
    await this.ensureDirectory(this.context.stagingDirectory);
    try {
      await writeFile(destination, content, { mode: 0o600 });
    } catch (error) {
      throw new CopyError(`Unable to write '${destination}'`, fileName, destination, error);
    }
    return destination;
  }

  /**
   * Removes the staging directory, and the temp directory once nothing else
   * is left in it.
   */
  async discard(): Promise<void> {
    await rm(this.context.stagingDirectory, { recursive: true, force: true });

    let remaining: string[];
    try {
      remaining = await readdir(this.context.tempDirectory);
    } catch (error) {
      if (isMissingFile(error)) return;
      throw error;
    }
    if (remaining.length === 0) {
      await rm(this.context.tempDirectory, { recursive: true, force: true });
    }
  }
}
