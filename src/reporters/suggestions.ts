/**
 * Declaration suggestions for endpoints with undeclared exceptions
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { AnalysisResult, EndpointRecord } from '../types.js';
import { endpointsWithIssues, suggestedDeclarations, undeclaredExceptions } from '../results.js';

export type SuggestionFormat = 'text' | 'diff';

export interface Suggestion {
  endpoint: EndpointRecord;
  /** Sorted union of declared and detected class names */
  suggested: string[];
  /** Undeclared class names in discovery order, without repeats */
  added: string[];
}

export function buildSuggestions(result: AnalysisResult): Suggestion[] {
  return endpointsWithIssues(result).map(endpoint => ({
    endpoint,
    suggested: suggestedDeclarations(endpoint),
    added: [...new Set(undeclaredExceptions(endpoint).map(occurrence => occurrence.exceptionClass))],
  }));
}

/**
 * Builds the output of the `suggest` command
 */
export function formatSuggestions(
  result: AnalysisResult,
  format: SuggestionFormat = 'text',
  c: ChalkInstance = chalk
): string[] {
  const suggestions = buildSuggestions(result);
  if (suggestions.length === 0) {
    return [c.green('✓ All exceptions are properly declared.')];
  }

  const lines: string[] = [];
  for (const { endpoint, suggested, added } of suggestions) {
    lines.push('', `${c.cyan(`${endpoint.file}:${endpoint.line}`)} - ${c.bold(endpoint.functionName)}`);

    if (format === 'diff') {
      lines.push(c.red(`  - exceptions: [${endpoint.declaredExceptions.join(', ')}]`));
      lines.push(c.green(`  + exceptions: [${suggested.join(', ')}]`));
      continue;
    }

    lines.push(c.yellow('  Suggested:'));
    lines.push(`    exceptions: [${suggested.join(', ')}]`);
    if (added.length > 0) {
      lines.push(c.dim(`  Adding: ${added.join(', ')}`));
    }
  }

  return lines;
}
