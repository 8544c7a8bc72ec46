/**
 * Option handling shared by the CLI commands
 */

import * as fs from 'fs';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { DEFAULT_MAX_DEPTH } from '../analyzer.js';
import { loadConfig } from '../config/config-loader.js';
import type { OutputFormat, RouteThrowsConfig } from '../types.js';

/** Exit code for a run that found undeclared exceptions */
export const EXIT_ISSUES = 1;
/** Exit code for caller misuse: missing path, bad option, bad config file */
export const EXIT_USAGE = 2;

export interface AnalysisCliOptions {
  depth?: number;
  ignore?: string[];
  config?: string;
}

export interface ResolvedAnalysisOptions {
  maxDepth: number;
  ignoreExceptions: string[];
}

/**
 * Commander argument parser for --depth
 */
export function parseDepth(value: string): number {
  const depth = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(depth)) {
    throw new InvalidArgumentError('Depth must be a non-negative integer.');
  }
  return depth;
}

/**
 * Commander collector for a repeatable option
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Command-line values win over the config file; ignore lists are merged
 */
export function resolveAnalysisOptions(
  cli: AnalysisCliOptions,
  config: RouteThrowsConfig
): ResolvedAnalysisOptions {
  return {
    maxDepth: cli.depth ?? config.depth ?? DEFAULT_MAX_DEPTH,
    ignoreExceptions: [...new Set([...(config.ignore ?? []), ...(cli.ignore ?? [])])],
  };
}

export function resolveFormat(cliFormat: OutputFormat | undefined, config: RouteThrowsConfig): OutputFormat {
  return cliFormat ?? config.format ?? 'text';
}

/**
 * Loads the config file and checks the target path, exiting with a usage
 * error when either is unusable
 */
export function prepareRun(targetPath: string, cli: AnalysisCliOptions): RouteThrowsConfig {
  if (!fs.existsSync(targetPath)) {
    fail(`Path '${targetPath}' does not exist`);
  }

  try {
    return loadConfig(cli.config);
  } catch (error) {
    fail(error instanceof Error ? error.message : String(error));
  }
}

export function printFileErrors(errors: string[]): void {
  for (const error of errors) {
    console.warn(`${chalk.yellow('Warning:')} ${error}`);
  }
}

function fail(message: string): never {
  console.error(chalk.red(`Error: ${message}`));
  process.exit(EXIT_USAGE);
}
