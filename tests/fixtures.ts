/**
 * Shared helpers for the unit and integration tests
 */

import { mkdirSync, mkdtempSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import JSZip from 'jszip';
import { DEFAULT_CONFIG } from '../src/config.js';
import { AppError } from '../src/logger.js';
import type { Prompter } from '../src/prompter.js';
import { createRunContext } from '../src/run-context.js';
import type { ArchiveEntry, RunContext } from '../src/types.js';

/**
 * Answers questions from a fixed script and records everything shown
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  readonly notices: string[] = [];
  readonly candidates: Array<{ entryName: string; locations: string[] }> = [];
  closed = false;

  constructor(private readonly answers: string[] = []) {}

  ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      return Promise.reject(new AppError('No more input available', 'INPUT_UNAVAILABLE'));
    }
    return Promise.resolve(answer);
  }

  showCandidates(entryName: string, locations: readonly string[]): void {
    this.candidates.push({ entryName, locations: [...locations] });
  }

  notify(message: string): void {
    this.notices.push(message);
  }

  close(): void {
    this.closed = true;
  }

  get remaining(): number {
    return this.answers.length;
  }
}

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `update-packager-${prefix}-`));
}

/**
 * Writes files (path → content) below `root`; paths ending in '/' become
 * empty directories.
 */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = join(root, relativePath);
    if (relativePath.endsWith('/')) {
      mkdirSync(target, { recursive: true });
      continue;
    }
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content);
  }
}

/**
 * In-memory archive entries rooted under `distributionName`
 */
export function archiveEntries(distributionName: string, files: Record<string, string>): ArchiveEntry[] {
  return Object.entries(files).map(([relativePath, content]) => ({
    path: `${distributionName}/${relativePath}`,
    isDir: relativePath.endsWith('/'),
    read: () => Promise.resolve(new TextEncoder().encode(content)),
  }));
}

/**
 * Writes a distribution zip whose entries live under `<distributionName>/`
 */
export async function writeDistributionZip(
  zipPath: string,
  distributionName: string,
  files: Record<string, string>
): Promise<void> {
  const zip = new JSZip();
  const root = zip.folder(distributionName) ?? zip;
  for (const [relativePath, content] of Object.entries(files)) {
    if (relativePath.endsWith('/')) {
      root.folder(relativePath.slice(0, -1));
    } else {
      root.file(relativePath, content);
    }
  }
  mkdirSync(dirname(zipPath), { recursive: true });
  writeFileSync(zipPath, await zip.generateAsync({ type: 'nodebuffer' }));
}

export const VALID_DESCRIPTOR = `update_number: "0001"
platform_version: 4.4.0
platform_name: wilkes
applies_to: All the products based on 4.4.0
bug_fixes:
  PRODUCT-1234: Fixes the session timeout
description: |
  Fixes a session timeout issue.
file_changes:
  added_files: []
  removed_files: []
  modified_files: []
`;

export function makeRunContext(updateRoot: string, workDirectory: string, checkHashes = true): RunContext {
  return createRunContext({
    updateDirectory: updateRoot,
    distributionPath: join(workDirectory, 'product-1.0.0.zip'),
    updateName: 'PRODUCT-UPDATE-1.0.0-0001',
    update: DEFAULT_CONFIG.update,
    ignoredNames: [],
    workDirectory,
    checkHashes,
  });
}
