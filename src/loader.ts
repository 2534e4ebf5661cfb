import * as fs from 'node:fs';
import * as path from 'node:path';
import { PrototypeIndex } from './types.js';
import { parsePrototypes, prototypeId } from './parser.js';
import { Reporter, silentReporter } from './reporter.js';

/**
 * Options for loading prototype files
 */
export interface LoadOptions {
  /** Root directory to scan recursively */
  rootDir: string;
  /** File extensions to load (default: ['.yml']) */
  extensions?: string[];
  /** Where per-file messages go (default: silent) */
  reporter?: Reporter;
  /** Called after each file with the number of files done and the total */
  onProgress?: (done: number, total: number) => void;
}

/**
 * Result of loading all prototype files
 */
export interface LoadResult {
  /** Entity prototypes by id */
  prototypes: PrototypeIndex;
  /** Source file of each prototype id */
  sources: Map<string, string>;
  /** Every file that was scanned */
  files: string[];
  /** Files that could not be read or parsed, parser warnings and replaced ids */
  errors: string[];
}

/**
 * Find all files under `dir` with one of the given extensions.
 * Entries are visited in name order so results are stable across platforms.
 */
export function findPrototypeFiles(dir: string, extensions: string[]): string[] {
  const files: string[] = [];
  const entries = fs.readdirSync(dir, { withFileTypes: true })
    .sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...findPrototypeFiles(fullPath, extensions));
    } else if (entry.isFile() && extensions.includes(path.extname(entry.name))) {
      files.push(fullPath);
    }
  }

  return files;
}

/**
 * Load every entity prototype under a directory tree.
 * A file that fails to read or parse is recorded in `errors` and skipped.
 * When two files declare the same id, the one loaded last wins.
 */
export function loadPrototypes(options: LoadOptions): LoadResult {
  const { rootDir, extensions = ['.yml'], onProgress } = options;
  const reporter = options.reporter ?? silentReporter;

  const prototypes: PrototypeIndex = new Map();
  const sources = new Map<string, string>();
  const errors: string[] = [];

  let files: string[];
  try {
    files = findPrototypeFiles(rootDir, extensions);
  } catch (err) {
    errors.push(`Cannot scan ${rootDir}: ${describeError(err)}`);
    return { prototypes, sources, files: [], errors };
  }

  files.forEach((filePath, i) => {
    const documentId = path.relative(rootDir, filePath);

    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      const result = parsePrototypes(content, documentId);

      for (const warning of result.warnings) {
        errors.push(`${documentId}: ${warning}`);
      }

      for (const prototype of result.prototypes) {
        const id = prototypeId(prototype);
        if (id === undefined) {
          continue;
        }
        const previous = sources.get(id);
        if (previous !== undefined) {
          const message = `Warning: Prototype '${id}' in ${documentId} replaces the one in ${previous}`;
          errors.push(message);
          reporter.warn(message);
        }
        prototypes.set(id, prototype);
        sources.set(id, documentId);
      }

      if (result.prototypes.length > 0) {
        reporter.info(`Loaded ${result.prototypes.length} prototypes from ${path.basename(filePath)}`);
      }
    } catch (err) {
      const message = `Error loading ${documentId}: ${describeError(err)}`;
      errors.push(message);
      reporter.warn(message);
    }

    onProgress?.(i + 1, files.length);
  });

  return { prototypes, sources, files, errors };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
