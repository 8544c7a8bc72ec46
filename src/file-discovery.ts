/**
 * File Discovery - finds the source files to analyze below a path
 */

import * as fs from 'fs';
import * as path from 'path';
import { globSync } from 'glob';

export const SOURCE_PATTERN = '**/*.{ts,tsx,mts,cts}';

const IGNORED = ['**/node_modules/**', '**/*.d.ts', '**/*.d.mts', '**/*.d.cts'];

/**
 * Returns the files to analyze for a path, sorted. Paths keep the form the
 * target was given in: a relative target yields relative paths.
 *
 * A file path is returned as-is whatever its extension. A directory is
 * searched recursively for TypeScript sources, dot directories included,
 * skipping declaration files and node_modules. A path that does not exist yields nothing.
 */
export function discoverSourceFiles(targetPath: string): string[] {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(targetPath);
  } catch {
    return [];
  }

  if (stats.isFile()) {
    return [targetPath];
  }
  if (!stats.isDirectory()) {
    return [];
  }

  return globSync(SOURCE_PATTERN, { cwd: targetPath, nodir: true, dot: true, ignore: IGNORED })
    .map(match => path.join(targetPath, match))
    .sort();
}
