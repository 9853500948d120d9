#!/usr/bin/env node
/**
 * init-update [dir]: prepares a directory for a new update
 */

import { config as loadEnv } from 'dotenv';
import { join } from 'path';
import { createExampleConfig } from './config.js';
import { initUpdateDirectory } from './create-update.js';
import { isEntryPoint } from './entry-point.js';
import { handleError } from './logger.js';

loadEnv({ override: false });

export interface InitOptions {
  directory: string;
  withConfig: boolean;
}

export function parseArgs(argv: string[]): InitOptions | { error: string } {
  const positional = argv.filter(arg => !arg.startsWith('-'));
  if (positional.length > 1) {
    return { error: 'Invalid number of arguments. Run with --help for more details about the arguments' };
  }
  return {
    directory: positional[0] ?? '.',
    withConfig: argv.includes('--with-config'),
  };
}

export function main(argv: string[] = process.argv.slice(2)): number {
  if (argv.includes('--help') || argv.includes('-h')) {
    console.log('Usage: init-update [dir] [--with-config]');
    return 0;
  }

  const options = parseArgs(argv);
  if ('error' in options) {
    console.error(`❌ ${options.error}`);
    return 1;
  }

  try {
    initUpdateDirectory(options.directory);
    if (options.withConfig) {
      createExampleConfig(join(options.directory, 'update-packager.example.yaml'));
    }
    console.log(`✅ Update directory ready: ${options.directory}`);
    return 0;
  } catch (error) {
    const appError = handleError(error);
    console.error(`❌ ${appError.message}`);
    return appError.exitCode;
  }
}

if (isEntryPoint(import.meta.url)) {
  process.exitCode = main();
}
