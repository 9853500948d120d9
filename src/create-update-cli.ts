#!/usr/bin/env node
/**
 * create-update <update_dir> <distribution.zip>
 *
 * Builds an update zip from the files in an update directory, using the
 * product distribution zip to work out where each file belongs.
 */

import { config as loadEnv } from 'dotenv';
import { ConfigManager, resolveConfigPath } from './config.js';
import { isEntryPoint } from './entry-point.js';
import { createUpdate } from './create-update.js';
import { AppError, handleError, isLogLevel, logger, setLogLevel } from './logger.js';
import { ReadlinePrompter, type Prompter } from './prompter.js';

loadEnv({ override: false });

export interface CliOptions {
  positional: string[];
  checkHashes: boolean;
  debug: boolean;
  help: boolean;
  outputDirectory?: string;
  configPath?: string;
}

export const USAGE = `Usage: create-update <update_dir> <distribution.zip> [options]

Options:
  -m, --no-hash-check   Copy files even when their content matches the distribution
  -d, --debug           Enable debug logs
  -o, --output <dir>    Directory to write the update zip to
  -c, --config <file>   Configuration file (YAML or JSON)
  -h, --help            Show this help`;

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { positional: [], checkHashes: true, debug: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '-m':
      case '--no-hash-check':
        options.checkHashes = false;
        break;
      case '-d':
      case '--debug':
        options.debug = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '-o':
      case '--output':
        options.outputDirectory = argv[++i];
        break;
      case '-c':
      case '--config':
        options.configPath = argv[++i];
        break;
      default:
        options.positional.push(arg);
    }
  }

  return options;
}

/**
 * Runs the command and resolves to its exit code. `prompter` defaults to one
 * reading standard input.
 */
export async function main(argv: string[] = process.argv.slice(2), prompter?: Prompter): Promise<number> {
  const options = parseArgs(argv);

  if (options.help) {
    console.log(USAGE);
    return 0;
  }
  if (options.positional.length !== 2) {
    console.error("❌ Invalid number of arguments. Run 'create-update --help' to view help.");
    return 1;
  }

  const manager = new ConfigManager(resolveConfigPath(options.configPath));
  const validation = manager.validate();
  if (!validation.valid) {
    console.error(`❌ Invalid configuration in ${manager.getPath()}:`);
    validation.errors.forEach(error => console.error(`   - ${error}`));
    return 1;
  }

  const config = manager.getAll();
  const envLevel = process.env.LOG_LEVEL;
  setLogLevel(options.debug ? 'debug' : isLogLevel(envLevel) ? envLevel : config.logLevel);

  const [updateDirectory, distributionPath] = options.positional;
  const activePrompter = prompter ?? new ReadlinePrompter({ homeLabel: config.update.homeDirectory });

  try {
    const result = await createUpdate(
      {
        updateDirectory,
        distributionPath,
        outputDirectory: options.outputDirectory,
        checkHashes: options.checkHashes ? undefined : false,
      },
      { prompter: activePrompter, config }
    );

    const skipped = result.outcomes.filter(outcome => outcome.status === 'skipped').length;
    console.log(`\n📈 Summary:`);
    console.log(`  - Added files: ${result.added.length}`);
    console.log(`  - Modified files: ${result.modified.length}`);
    console.log(`  - Skipped entries: ${skipped}`);
    console.log('');
    logger.success(`'${result.archivePath}' successfully created.`);
    return 0;
  } catch (error) {
    const appError = error instanceof AppError ? error : handleError(error);
    console.error(`❌ ${appError.message}`);
    return appError.exitCode;
  } finally {
    activePrompter.close();
  }
}

if (isEntryPoint(import.meta.url)) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error(error);
      process.exitCode = 1;
    });
}
