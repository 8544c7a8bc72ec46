/**
 * Endpoint listing: every endpoint with its declared and detected exceptions
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { AnalysisResult, EndpointRecord } from '../types.js';
import { coloredHeader } from './terminal-reporter.js';

/**
 * Builds the listing printed by the `list` command
 */
export function formatEndpointListing(result: AnalysisResult, c: ChalkInstance = chalk): string[] {
  if (result.endpoints.length === 0) {
    return [c.yellow('No route endpoints found.')];
  }

  const lines: string[] = [];
  for (const endpoint of result.endpoints) {
    lines.push('', coloredHeader(endpoint, c));
    lines.push(...formatDeclared(endpoint, c));
    lines.push(...formatDetected(endpoint, c));
  }

  lines.push('', c.dim(`Total endpoints: ${result.endpoints.length}`));
  return lines;
}

function formatDeclared(endpoint: EndpointRecord, c: ChalkInstance): string[] {
  if (endpoint.declaredExceptions.length === 0) {
    return [c.dim('  Declared: (none)')];
  }
  return [
    c.green('  Declared:'),
    ...endpoint.declaredExceptions.map(name => `    ${c.green('✓')} ${name}`),
  ];
}

function formatDetected(endpoint: EndpointRecord, c: ChalkInstance): string[] {
  if (endpoint.detectedExceptions.length === 0) {
    return [c.dim('  Detected: (none)')];
  }

  const declared = new Set(endpoint.declaredExceptions);
  const lines = [c.blue('  Detected:')];

  for (const occurrence of endpoint.detectedExceptions) {
    const status = declared.has(occurrence.exceptionClass) ? c.green('✓') : c.red('✗');
    const where = occurrence.inFunction
      ? `(in ${occurrence.inFunction} at line ${occurrence.line})`
      : `(line ${occurrence.line})`;
    lines.push(`    ${status} ${occurrence.exceptionClass} ${c.dim(where)}`);
  }

  return lines;
}
