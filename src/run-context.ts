import { join, resolve } from 'path';
import type { UpdateConfig } from './config.js';
import { getProductName } from './distribution-archive.js';
import type { RunContext } from './types.js';

export interface RunContextParams {
  updateDirectory: string;
  distributionPath: string;
  updateName: string;
  update: UpdateConfig;
  ignoredNames: Iterable<string>;
  /** Base for the relative temp directory; defaults to the working directory */
  workDirectory?: string;
  outputDirectory?: string;
  checkHashes?: boolean;
}

/**
 * Fixes every run-scoped value up front. The result is frozen and handed to
 * each component explicitly.
 */
export function createRunContext(params: RunContextParams): RunContext {
  const workDirectory = resolve(params.workDirectory ?? process.cwd());
  const tempDirectory = resolve(workDirectory, params.update.tempDirectory);
  const stagingDirectory = join(tempDirectory, params.updateName);

  return Object.freeze({
    updateRoot: resolve(params.updateDirectory),
    distributionPath: resolve(params.distributionPath),
    productName: getProductName(params.distributionPath),
    updateName: params.updateName,
    stagingDirectory,
    homeDirectory: join(stagingDirectory, params.update.homeDirectory),
    tempDirectory,
    outputDirectory: resolve(workDirectory, params.outputDirectory ?? params.update.outputDirectory),
    checkHashes: params.checkHashes ?? params.update.checkHashes,
    ignoredNames: new Set(params.ignoredNames),
  });
}
