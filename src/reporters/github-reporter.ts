/**
 * GitHub Actions workflow annotations
 */

import type { AnalysisResult } from '../types.js';
import { endpointsWithIssues, undeclaredExceptions } from '../results.js';

/**
 * One `::error` command per undeclared exception, anchored at the endpoint
 */
export function formatGithubReport(result: AnalysisResult): string {
  const lines: string[] = [];

  for (const endpoint of endpointsWithIssues(result)) {
    for (const occurrence of undeclaredExceptions(endpoint)) {
      const message = occurrence.inFunction
        ? `Undeclared exception '${occurrence.exceptionClass}' raised in ${occurrence.inFunction}`
        : `Undeclared exception '${occurrence.exceptionClass}'`;

      lines.push(
        `::error file=${endpoint.file},line=${endpoint.line},title=Undeclared Exception::${message}`
      );
    }
  }

  return lines.join('\n');
}
