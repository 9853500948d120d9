/**
 * Builds an update archive from an update directory and a baseline
 * distribution zip
 */

import { existsSync, mkdirSync, statSync } from 'fs';
import { join } from 'path';
import { ChangeClassifier } from './change-classifier.js';
import { DEFAULT_CONFIG, collectIgnoredNames, type AppConfig } from './config.js';
import { listTopLevelEntries, scanUpdateDirectory } from './directory-scanner.js';
import { indexDistribution } from './distribution-archive.js';
import { AppError, Logger } from './logger.js';
import { findMatches } from './match-resolver.js';
import { PlacementDecider, type PlacementOutcome } from './placement-decider.js';
import type { Prompter } from './prompter.js';
import { createRunContext } from './run-context.js';
import { StagingArea } from './staging-area.js';
import { archiveStagingDirectory } from './update-archiver.js';
import {
  UPDATE_DESCRIPTOR_FILE,
  applyManifest,
  getUpdateName,
  loadUpdateDescriptor,
  serializeUpdateDescriptor,
  validateUpdateDescriptor,
  writeDescriptorTemplate,
} from './update-descriptor.js';
import { UpdateManifest } from './update-manifest.js';

const logger = new Logger({ context: 'create-update' });

export interface CreateUpdateOptions {
  updateDirectory: string;
  distributionPath: string;
  outputDirectory?: string;
  /** Base for the temp directory; defaults to the working directory */
  workDirectory?: string;
  /** Overrides update.checkHashes from the config */
  checkHashes?: boolean;
}

export interface CreateUpdateDependencies {
  prompter: Prompter;
  config?: AppConfig;
}

export interface CreateUpdateResult {
  updateName: string;
  archivePath: string;
  added: string[];
  modified: string[];
  outcomes: PlacementOutcome[];
}

function invalidInput(message: string): AppError {
  return new AppError(message, 'INVALID_INPUT');
}

function checkInputs(options: CreateUpdateOptions): void {
  const { updateDirectory, distributionPath } = options;

  if (!existsSync(updateDirectory) || !statSync(updateDirectory).isDirectory()) {
    throw invalidInput(`Update directory (${updateDirectory}) does not exist.`);
  }
  if (!existsSync(join(updateDirectory, UPDATE_DESCRIPTOR_FILE))) {
    throw invalidInput(`'${UPDATE_DESCRIPTOR_FILE}' not found at '${updateDirectory}'.`);
  }
  if (!distributionPath.endsWith('.zip')) {
    throw invalidInput(`Entered distribution path (${distributionPath}) does not point to a zip file.`);
  }
  if (!existsSync(distributionPath) || !statSync(distributionPath).isFile()) {
    throw invalidInput(`Distribution does not exist at '${distributionPath}'`);
  }
}

export async function createUpdate(
  options: CreateUpdateOptions,
  dependencies: CreateUpdateDependencies
): Promise<CreateUpdateResult> {
  const config = dependencies.config ?? DEFAULT_CONFIG;
  const { prompter } = dependencies;

  checkInputs(options);

  const descriptor = loadUpdateDescriptor(options.updateDirectory);
  const validation = validateUpdateDescriptor(descriptor);
  if (!validation.valid) {
    throw new AppError(
      `'${UPDATE_DESCRIPTOR_FILE}' format is not correct:\n  - ${validation.errors.join('\n  - ')}`,
      'INVALID_DESCRIPTOR',
      1,
      { errors: validation.errors }
    );
  }

  const context = createRunContext({
    updateDirectory: options.updateDirectory,
    distributionPath: options.distributionPath,
    updateName: getUpdateName(descriptor, config.update.namePrefix),
    update: config.update,
    ignoredNames: collectIgnoredNames(config.resourceFiles),
    workDirectory: options.workDirectory,
    outputDirectory: options.outputDirectory,
    checkHashes: options.checkHashes,
  });
  logger.debug('Run context', { ...context, ignoredNames: [...context.ignoredNames] });

  const staging = new StagingArea(context);
  // A stale staging tree from an earlier run would leak into this archive.
  await staging.discard();

  try {
    const inventory = await scanUpdateDirectory(context.updateRoot, context.ignoredNames);

    logger.info(`Reading ${context.productName}. Please wait...`);
    const tree = await indexDistribution(context.distributionPath);

    const manifest = new UpdateManifest();
    const classifier = new ChangeClassifier(context, tree, inventory, staging, manifest);
    const decider = new PlacementDecider(context, tree, classifier, prompter);

    await staging.ensureDirectory(context.homeDirectory);

    const outcomes: PlacementOutcome[] = [];
    for (const entry of listTopLevelEntries(inventory)) {
      const matches = findMatches(tree, entry.name, entry.isDir);
      logger.debug(`Matches for ${entry.name}`, { isDir: entry.isDir, locations: [...matches.keys()] });
      outcomes.push(await decider.decide(entry, matches));
    }

    await staging.copyResourceFiles(config.resourceFiles);
    const finalDescriptor = applyManifest(descriptor, manifest);
    await staging.writeDescriptor(UPDATE_DESCRIPTOR_FILE, serializeUpdateDescriptor(finalDescriptor));

    const result = await archiveStagingDirectory(context);
    await staging.discard();

    return {
      updateName: context.updateName,
      archivePath: result.path,
      added: [...manifest.added],
      modified: [...manifest.modified],
      outcomes,
    };
  } catch (error) {
    await staging.discard();
    throw error;
  }
}

/**
 * Prepares a directory to become an update: creates it if needed and drops
 * in an empty descriptor. Returns whether a descriptor was written.
 */
export function initUpdateDirectory(directory: string): boolean {
  mkdirSync(directory, { recursive: true });
  const written = writeDescriptorTemplate(directory);
  if (written) {
    logger.info(`Created ${join(directory, UPDATE_DESCRIPTOR_FILE)}`);
  } else {
    logger.warn(`'${UPDATE_DESCRIPTOR_FILE}' already exists in ${directory}; left unchanged.`);
  }
  return written;
}
