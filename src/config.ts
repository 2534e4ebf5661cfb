/**
 * Configuration module.
 *
 * Loads optional settings from the JSON file named by
 * PROTOTYPE_SANITIZER_CONFIG, else ./prototype-sanitizer.json.
 */

import fs from 'fs-extra';
import path from 'node:path';
import { ConfigError } from './errors.js';

export const DEFAULT_CONFIG_FILE = 'prototype-sanitizer.json';

export interface SanitizerConfig {
  /** Output path when --output is not given */
  output: string;
  /** Extensions of prototype files */
  extensions: string[];
  /** Port of the inspection API */
  port: number;
}

export const DEFAULT_CONFIG: SanitizerConfig = {
  output: 'output.yml',
  extensions: ['.yml'],
  port: 3000
};

/**
 * Path of the configuration file for the current environment
 */
export function configPath(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): string {
  return path.resolve(cwd, env.PROTOTYPE_SANITIZER_CONFIG ?? DEFAULT_CONFIG_FILE);
}

/**
 * Load configuration, falling back to defaults when the file does not exist.
 * Throws ConfigError for a file that is not valid JSON or has wrongly typed keys.
 */
export async function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Promise<SanitizerConfig> {
  const file = configPath(env, cwd);
  const config: SanitizerConfig = { ...DEFAULT_CONFIG, extensions: [...DEFAULT_CONFIG.extensions] };

  if (await fs.pathExists(file)) {
    let raw: unknown;
    try {
      raw = await fs.readJson(file);
    } catch (err) {
      throw new ConfigError(`Cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }
    applyConfigFile(config, raw, file);
  }

  if (env.PORT !== undefined) {
    config.port = parsePort(env.PORT, 'PORT');
  }

  return config;
}

function applyConfigFile(config: SanitizerConfig, raw: unknown, file: string): void {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`${file}: expected a JSON object`);
  }

  const values = new Map<string, unknown>(Object.entries(raw));

  const output = values.get('output');
  if (output !== undefined) {
    if (typeof output !== 'string' || output === '') {
      throw new ConfigError(`${file}: "output" must be a non-empty string`);
    }
    config.output = output;
  }

  const extensions = values.get('extensions');
  if (extensions !== undefined) {
    if (!Array.isArray(extensions) || !extensions.every((ext: unknown): ext is string => typeof ext === 'string' && ext.startsWith('.'))) {
      throw new ConfigError(`${file}: "extensions" must be a list of strings like ".yml"`);
    }
    config.extensions = extensions;
  }

  const port = values.get('port');
  if (port !== undefined) {
    if (typeof port !== 'number') {
      throw new ConfigError(`${file}: "port" must be a number`);
    }
    config.port = parsePort(String(port), 'port');
  }
}

export function parsePort(value: string, name: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`${name} must be an integer between 0 and 65535, got '${value}'`);
  }
  return port;
}
