/**
 * update-descriptor.yaml: the metadata shipped inside every update
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import YAML from 'js-yaml';
import { ReadError } from './errors.js';
import { AppError } from './logger.js';
import type { UpdateManifest } from './update-manifest.js';

export const UPDATE_DESCRIPTOR_FILE = 'update-descriptor.yaml';

const UPDATE_NUMBER_PATTERN = /^\d{4}$/;
const PLATFORM_VERSION_PATTERN = /^\d+\.\d+\.\d+$/;

export interface FileChanges {
  added_files: string[];
  removed_files: string[];
  modified_files: string[];
}

export interface UpdateDescriptor {
  update_number: string;
  platform_version: string;
  platform_name: string;
  applies_to: string;
  bug_fixes: Record<string, string>;
  description: string;
  file_changes: FileChanges;
}

export function createEmptyUpdateDescriptor(): UpdateDescriptor {
  return {
    update_number: '',
    platform_version: '',
    platform_name: '',
    applies_to: '',
    bug_fixes: {},
    description: '',
    file_changes: {
      added_files: [],
      removed_files: [],
      modified_files: [],
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Parsed with the failsafe schema: every scalar stays the text it was
// written as, so 0001 is not read as the number 1.
function asText(value: unknown): string {
  if (value === undefined || value === null) return '';
  return String(value);
}

function asPathList(value: unknown): string[] {
  return Array.isArray(value) ? value.map(item => asText(item)) : [];
}

/**
 * Narrows parsed YAML into a descriptor; missing fields become empty values
 * for validateUpdateDescriptor to report.
 */
export function parseUpdateDescriptor(content: string): UpdateDescriptor {
  const parsed: unknown = YAML.load(content, { schema: YAML.FAILSAFE_SCHEMA });
  const source = isRecord(parsed) ? parsed : {};
  const changes = isRecord(source.file_changes) ? source.file_changes : {};
  const bugFixes = isRecord(source.bug_fixes) ? source.bug_fixes : {};

  return {
    update_number: asText(source.update_number),
    platform_version: asText(source.platform_version),
    platform_name: asText(source.platform_name),
    applies_to: asText(source.applies_to),
    bug_fixes: Object.fromEntries(Object.entries(bugFixes).map(([key, value]) => [key, asText(value)])),
    description: asText(source.description),
    file_changes: {
      added_files: asPathList(changes.added_files),
      removed_files: asPathList(changes.removed_files),
      modified_files: asPathList(changes.modified_files),
    },
  };
}

export function loadUpdateDescriptor(directory: string, fileName: string = UPDATE_DESCRIPTOR_FILE): UpdateDescriptor {
  const path = join(directory, fileName);
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ReadError(`Error occurred when reading '${fileName}'`, path, error);
  }

  try {
    return parseUpdateDescriptor(content);
  } catch (error) {
    throw new AppError(
      `'${fileName}' is not valid YAML: ${error instanceof Error ? error.message : String(error)}`,
      'INVALID_DESCRIPTOR'
    );
  }
}

export function validateUpdateDescriptor(descriptor: UpdateDescriptor): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!UPDATE_NUMBER_PATTERN.test(descriptor.update_number)) {
    errors.push(`update_number '${descriptor.update_number}' must be four digits (e.g. 0001)`);
  }
  if (!PLATFORM_VERSION_PATTERN.test(descriptor.platform_version)) {
    errors.push(`platform_version '${descriptor.platform_version}' must look like 4.4.0`);
  }
  if (descriptor.platform_name.trim().length === 0) {
    errors.push('platform_name is required');
  }
  if (descriptor.applies_to.trim().length === 0) {
    errors.push('applies_to is required');
  }
  if (Object.keys(descriptor.bug_fixes).length === 0) {
    errors.push('bug_fixes must list at least one fix');
  }
  if (descriptor.description.trim().length === 0) {
    errors.push('description is required');
  }

  return { valid: errors.length === 0, errors };
}

export function getUpdateName(descriptor: UpdateDescriptor, prefix: string): string {
  return `${prefix}-${descriptor.platform_version}-${descriptor.update_number}`;
}

/**
 * Copy of the descriptor whose added/modified lists are the manifest's
 */
export function applyManifest(descriptor: UpdateDescriptor, manifest: UpdateManifest): UpdateDescriptor {
  return {
    ...descriptor,
    bug_fixes: { ...descriptor.bug_fixes },
    file_changes: {
      added_files: [...manifest.added],
      removed_files: [...descriptor.file_changes.removed_files],
      modified_files: [...manifest.modified],
    },
  };
}

/**
 * The update number is written bare (`update_number: 0001`); the loader's
 * failsafe schema reads it back as text either way.
 */
export function serializeUpdateDescriptor(descriptor: UpdateDescriptor): string {
  const yaml = YAML.dump(descriptor, { indent: 2, lineWidth: -1, quotingType: '"' });
  return yaml.replace(/^update_number: "(\d+)"$/m, 'update_number: $1');
}

export function saveUpdateDescriptor(path: string, descriptor: UpdateDescriptor): void {
  writeFileSync(path, serializeUpdateDescriptor(descriptor), { mode: 0o600 });
}

/**
 * Writes an empty template unless a descriptor already exists. Returns
 * whether a file was written.
 */
export function writeDescriptorTemplate(directory: string): boolean {
  const path = join(directory, UPDATE_DESCRIPTOR_FILE);
  if (existsSync(path)) return false;
  saveUpdateDescriptor(path, createEmptyUpdateDescriptor());
  return true;
}
