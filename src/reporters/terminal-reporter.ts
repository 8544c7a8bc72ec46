/**
 * Colored terminal report, used for interactive text output
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { AnalysisResult, EndpointRecord, ExceptionOccurrence } from '../types.js';
import { endpointsWithIssues, totalUndeclared, undeclaredExceptions } from '../results.js';

export interface TerminalOptions {
  verbose?: boolean;
  /** Defaults to console.log */
  log?: (line: string) => void;
  /** Defaults to the global chalk instance */
  colors?: ChalkInstance;
}

/**
 * Prints endpoints with undeclared exceptions and a summary line
 */
export function printTerminalReport(result: AnalysisResult, options: TerminalOptions = {}): void {
  const log = options.log ?? console.log;
  const c = options.colors ?? chalk;

  if (result.endpoints.length === 0) {
    log(c.yellow('No route endpoints found.'));
    return;
  }

  const withIssues = endpointsWithIssues(result);
  if (withIssues.length === 0) {
    if (options.verbose) {
      log(c.dim(`Analyzed ${result.endpoints.length} endpoints.`));
    }
    log(c.green('✓ No undeclared exceptions found.'));
    return;
  }

  for (const endpoint of withIssues) {
    log('\n' + coloredHeader(endpoint, c));
    log(c.red('  Undeclared exceptions:'));
    for (const occurrence of undeclaredExceptions(endpoint)) {
      log(`    ${c.red('•')} ${occurrence.exceptionClass} ${c.dim(`(${whereRaised(occurrence)})`)}`);
    }

    if (options.verbose && endpoint.declaredExceptions.length > 0) {
      log(c.green('  Declared exceptions:'));
      for (const name of endpoint.declaredExceptions) {
        log(`    ${c.green('•')} ${name}`);
      }
    }
  }

  log('');
  log(
    `${c.bold.red('Summary:')} ${totalUndeclared(result)} undeclared exception(s) ` +
    `in ${withIssues.length} endpoint(s)`
  );
}

/**
 * Header line shared by the terminal report and the endpoint listing
 */
export function coloredHeader(endpoint: EndpointRecord, c: ChalkInstance = chalk): string {
  const location = `${c.cyan(endpoint.file)}:${c.yellow(String(endpoint.line))}`;
  if (endpoint.path) {
    return `${location} - ${c.bold(endpoint.method)} ${endpoint.path} (${c.dim(endpoint.functionName)})`;
  }
  return `${location} - ${c.bold(endpoint.functionName)}`;
}

function whereRaised(occurrence: ExceptionOccurrence): string {
  if (occurrence.inFunction) {
    return `raised in ${occurrence.inFunction} at ${occurrence.file}:${occurrence.line}`;
  }
  return `raised at line ${occurrence.line}`;
}
