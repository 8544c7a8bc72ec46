/**
 * JSON report
 */

import type { AnalysisResult, EndpointRecord } from '../types.js';
import { endpointsWithIssues, totalUndeclared, undeclaredExceptions } from '../results.js';

export interface JsonOccurrence {
  class: string;
  file: string;
  line: number;
  in_function: string | null;
}

export interface JsonEndpoint {
  file: string;
  line: number;
  function: string;
  method: string;
  path: string | null;
  declared_exceptions: string[];
  undeclared_exceptions: JsonOccurrence[];
}

export interface JsonReport {
  summary: {
    total_endpoints: number;
    endpoints_with_issues: number;
    total_undeclared: number;
  };
  endpoints: JsonEndpoint[];
  errors: string[];
}

/**
 * Builds the JSON document. Endpoints without issues are included only when verbose.
 */
export function buildJsonReport(result: AnalysisResult, verbose: boolean = false): JsonReport {
  const endpoints = verbose ? result.endpoints : endpointsWithIssues(result);

  return {
    summary: {
      total_endpoints: result.endpoints.length,
      endpoints_with_issues: endpointsWithIssues(result).length,
      total_undeclared: totalUndeclared(result),
    },
    endpoints: endpoints.map(toJsonEndpoint),
    errors: [...result.errors],
  };
}

export function formatJsonReport(result: AnalysisResult, verbose: boolean = false): string {
  return JSON.stringify(buildJsonReport(result, verbose), null, 2);
}

function toJsonEndpoint(endpoint: EndpointRecord): JsonEndpoint {
  return {
    file: endpoint.file,
    line: endpoint.line,
    function: endpoint.functionName,
    method: endpoint.method,
    path: endpoint.path,
    declared_exceptions: [...endpoint.declaredExceptions],
    undeclared_exceptions: undeclaredExceptions(endpoint).map(occurrence => ({
      class: occurrence.exceptionClass,
      file: occurrence.file,
      line: occurrence.line,
      in_function: occurrence.inFunction,
    })),
  };
}
