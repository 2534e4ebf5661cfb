#!/usr/bin/env node
import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import ora, { type Ora } from 'ora';
import { loadConfig } from './config.js';
import { loadPrototypes } from './loader.js';
import { findAndSanitize } from './sanitizer.js';
import { writePrototypes } from './renderer.js';
import { InheritanceCycleError, PrototypeNotFoundError, UsageError } from './errors.js';
import { consoleReporter, Reporter } from './reporter.js';
import { MappingNode } from './types.js';

export const USAGE = `
Usage:
  prototype-sanitizer --dir <path> --id <prototype-id> [--output <path>]

Options:
  --dir <path>       Directory containing entity prototype YAML files (scanned recursively)
  --id <id>          ID of the prototype to sanitize
  --output <path>    Output file path (default: output.yml)
  --help, -h         Show this help
`;

export interface CliOptions {
  dir?: string;
  id?: string;
  output?: string;
  help: boolean;
}

/**
 * Environment the CLI runs in. Tests replace the reporter and turn off the spinner.
 */
export interface CliContext {
  reporter: Reporter;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Show a spinner while loading */
  interactive: boolean;
}

const VALUE_OPTIONS = ['dir', 'id', 'output'] as const;
type ValueOption = typeof VALUE_OPTIONS[number];

function isValueOption(name: string): name is ValueOption {
  return VALUE_OPTIONS.some(option => option === name);
}

/**
 * Parse `--name value` and `--name=value` arguments.
 * Throws UsageError for unknown options, missing values and stray arguments.
 */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = { help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      options.help = true;
      continue;
    }

    if (!arg.startsWith('--')) {
      throw new UsageError(`Unexpected argument '${arg}'`);
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (!isValueOption(name)) {
      throw new UsageError(`Unknown option '--${name}'`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else if (i + 1 < args.length && !args[i + 1].startsWith('--')) {
      value = args[++i];
    }
    if (!value) {
      throw new UsageError(`Option '--${name}' needs a value`);
    }
    options[name] = value;
  }

  return options;
}

/**
 * Run the sanitizer once. Resolves to the process exit code.
 */
export async function runCli(args: string[], context: CliContext = defaultContext()): Promise<number> {
  const { reporter, env, cwd } = context;

  let options: CliOptions;
  try {
    options = parseCliArgs(args);
    if (!options.help && (!options.dir || !options.id)) {
      throw new UsageError('Both --dir and --id are required');
    }
  } catch (err) {
    if (err instanceof UsageError) {
      reporter.error(`Error: ${err.message}`);
      reporter.info(USAGE);
      return 2;
    }
    throw err;
  }

  if (options.help || !options.dir || !options.id) {
    reporter.info(USAGE);
    return 0;
  }

  const config = await loadConfig(env, cwd);
  const rootDir = path.resolve(cwd, options.dir);

  reporter.info('\nPrototype Sanitizer');
  reporter.info('==============================\n');
  reporter.info(`Scanning ${rootDir} for prototype files...`);

  const started = Date.now();
  const spinner = context.interactive ? ora('Loading prototypes').start() : null;
  const loaded = loadPrototypes({
    rootDir,
    extensions: config.extensions,
    reporter: spinner ? aboveSpinner(spinner, reporter) : reporter,
    onProgress: (done, total) => {
      if (spinner) {
        spinner.text = `Loading prototypes ${done}/${total}`;
      }
    }
  });
  spinner?.stop();

  const elapsed = ((Date.now() - started) / 1000).toFixed(2);
  reporter.info(`\nLoading complete in ${elapsed} seconds:`);
  reporter.info(`- Processed ${loaded.files.length} files`);
  reporter.info(`- Loaded ${loaded.prototypes.size} entity prototypes`);
  if (loaded.errors.length > 0) {
    reporter.info(`- Encountered ${loaded.errors.length} errors`);
  }

  let sanitized: MappingNode;
  try {
    sanitized = findAndSanitize(options.id, loaded.prototypes, { reporter }).document;
  } catch (err) {
    if (err instanceof PrototypeNotFoundError || err instanceof InheritanceCycleError) {
      reporter.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  const output = path.resolve(cwd, options.output ?? config.output);
  reporter.info(`\nSaving sanitized prototype to ${output}`);
  await writePrototypes([sanitized], output);

  reporter.info('\nDone!');
  return 0;
}

function defaultContext(): CliContext {
  return {
    reporter: consoleReporter,
    env: process.env,
    cwd: process.cwd(),
    interactive: Boolean(process.stderr.isTTY)
  };
}

/**
 * Print messages above a running spinner instead of through it
 */
function aboveSpinner(spinner: Ora, reporter: Reporter): Reporter {
  const wrap = (write: (message: string) => void) => (message: string) => {
    spinner.clear();
    write(message);
    spinner.render();
  };
  return {
    info: wrap(message => reporter.info(message)),
    warn: wrap(message => reporter.warn(message)),
    error: wrap(message => reporter.error(message))
  };
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  return fs.realpathSync(entry) === fileURLToPath(import.meta.url);
}

if (isMainModule()) {
  runCli(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    err => {
      consoleReporter.error(`\nError: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    }
  );
}
