/**
 * Configuration File Loader
 *
 * Loads and validates .routethrowsrc.yaml / .routethrowsrc.yml / .routethrowsrc.json
 */

import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'yaml';
import type { RouteThrowsConfig } from '../types.js';
import { OUTPUT_FORMATS } from '../reporters/index.js';

export const CONFIG_FILENAMES = ['.routethrowsrc.yaml', '.routethrowsrc.yml', '.routethrowsrc.json'];

/**
 * Finds the config file in a directory
 *
 * @returns Path of the first config file present, or null
 */
export function findConfigFile(directory: string): string | null {
  for (const filename of CONFIG_FILENAMES) {
    const candidate = path.join(directory, filename);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Load configuration from an explicit file, or from the config file in
 * `directory` when no file is given
 *
 * @returns Configuration object, or empty config if no file exists
 * @throws Error if the file cannot be read or is invalid
 */
export function loadConfig(configPath: string | undefined, directory: string = process.cwd()): RouteThrowsConfig {
  const resolved = configPath ?? findConfigFile(directory);
  if (!resolved) {
    return {};
  }

  try {
    const content = fs.readFileSync(resolved, 'utf-8');
    // YAML is a superset of JSON, so one parser covers every config file
    const parsed: unknown = YAML.parse(content);
    return validateConfig(parsed ?? {});
  } catch (error) {
    throw new Error(
      `Failed to load ${path.basename(resolved)}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Validate configuration structure
 *
 * @throws Error if configuration is invalid
 */
export function validateConfig(value: unknown): RouteThrowsConfig {
  if (!isRecord(value)) {
    throw new Error('Configuration must be an object');
  }

  const config: RouteThrowsConfig = {};

  if (value.depth !== undefined) {
    if (typeof value.depth !== 'number' || !Number.isInteger(value.depth) || value.depth < 0) {
      throw new Error('"depth" must be a non-negative integer');
    }
    config.depth = value.depth;
  }

  if (value.ignore !== undefined) {
    if (!Array.isArray(value.ignore)) {
      throw new Error('"ignore" must be an array');
    }
    config.ignore = value.ignore.map((entry: unknown, index: number) => {
      if (typeof entry !== 'string' || entry.trim() === '') {
        throw new Error(`ignore[${index}]: must be a non-empty string`);
      }
      return entry;
    });
  }

  if (value.format !== undefined) {
    const format = OUTPUT_FORMATS.find(candidate => candidate === value.format);
    if (!format) {
      throw new Error(`"format" must be one of: ${OUTPUT_FORMATS.join(', ')}`);
    }
    config.format = format;
  }

  const unknownKeys = Object.keys(value).filter(key => !['depth', 'ignore', 'format'].includes(key));
  if (unknownKeys.length > 0) {
    throw new Error(`Unknown option${unknownKeys.length === 1 ? '' : 's'}: ${unknownKeys.join(', ')}`);
  }

  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
