/**
 * Derived views over analysis results
 */

import type { AnalysisResult, EndpointRecord, ExceptionOccurrence } from './types.js';

/**
 * Exceptions that are thrown but not declared, one entry per throw site
 */
export function undeclaredExceptions(endpoint: EndpointRecord): ExceptionOccurrence[] {
  const declared = new Set(endpoint.declaredExceptions);
  return endpoint.detectedExceptions.filter(occurrence => !declared.has(occurrence.exceptionClass));
}

/**
 * Declared exceptions that are never thrown
 */
export function unusedDeclarations(endpoint: EndpointRecord): string[] {
  const detected = new Set(endpoint.detectedExceptions.map(occurrence => occurrence.exceptionClass));
  return endpoint.declaredExceptions.filter(name => !detected.has(name));
}

export function hasIssues(result: AnalysisResult): boolean {
  return result.endpoints.some(endpoint => undeclaredExceptions(endpoint).length > 0);
}

export function totalUndeclared(result: AnalysisResult): number {
  return result.endpoints.reduce((sum, endpoint) => sum + undeclaredExceptions(endpoint).length, 0);
}

export function endpointsWithIssues(result: AnalysisResult): EndpointRecord[] {
  return result.endpoints.filter(endpoint => undeclaredExceptions(endpoint).length > 0);
}

/**
 * Sorted union of declared and detected class names: the `exceptions` list
 * an endpoint would need to declare everything it throws
 */
export function suggestedDeclarations(endpoint: EndpointRecord): string[] {
  const names = new Set(endpoint.declaredExceptions);
  for (const occurrence of endpoint.detectedExceptions) {
    names.add(occurrence.exceptionClass);
  }
  return [...names].sort();
}
