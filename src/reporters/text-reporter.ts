/**
 * Plain text report
 */

import type { AnalysisResult, EndpointRecord, ExceptionOccurrence } from '../types.js';
import { endpointsWithIssues, totalUndeclared, undeclaredExceptions } from '../results.js';

/**
 * Formats endpoints with undeclared exceptions as plain text
 */
export function formatTextReport(result: AnalysisResult, verbose: boolean = false): string {
  if (result.endpoints.length === 0) {
    return 'No route endpoints found.';
  }

  const withIssues = endpointsWithIssues(result);
  const lines: string[] = [];

  if (withIssues.length === 0) {
    if (verbose) {
      lines.push(`Analyzed ${result.endpoints.length} endpoints.`);
    }
    lines.push('No undeclared exceptions found.');
    return lines.join('\n');
  }

  for (const endpoint of withIssues) {
    lines.push(...formatEndpoint(endpoint, verbose));
  }

  lines.push('');
  lines.push(formatSummary(totalUndeclared(result), withIssues.length));

  return lines.join('\n');
}

/**
 * `file:line - METHOD /path (name)`, or `file:line - name` when the route has no literal path
 */
export function endpointHeader(endpoint: EndpointRecord): string {
  const location = `${endpoint.file}:${endpoint.line}`;
  if (endpoint.path) {
    return `${location} - ${endpoint.method} ${endpoint.path} (${endpoint.functionName})`;
  }
  return `${location} - ${endpoint.functionName}`;
}

export function describeOccurrence(occurrence: ExceptionOccurrence): string {
  if (occurrence.inFunction) {
    return `${occurrence.exceptionClass} (raised in ${occurrence.inFunction} at ${occurrence.file}:${occurrence.line})`;
  }
  return `${occurrence.exceptionClass} (raised at line ${occurrence.line})`;
}

export function formatSummary(total: number, endpointCount: number): string {
  return (
    `Found ${total} undeclared exception${total === 1 ? '' : 's'} ` +
    `in ${endpointCount} endpoint${endpointCount === 1 ? '' : 's'}.`
  );
}

function formatEndpoint(endpoint: EndpointRecord, verbose: boolean): string[] {
  const lines = [endpointHeader(endpoint), '  Undeclared exceptions:'];

  for (const occurrence of undeclaredExceptions(endpoint)) {
    lines.push(`    - ${describeOccurrence(occurrence)}`);
  }

  if (verbose && endpoint.declaredExceptions.length > 0) {
    lines.push('  Declared exceptions:');
    for (const name of endpoint.declaredExceptions) {
      lines.push(`    - ${name}`);
    }
  }

  lines.push('');
  return lines;
}
