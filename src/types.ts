/**
 * Core type definitions for route exception verification
 */

import type * as ts from 'typescript';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH' | 'HEAD' | 'OPTIONS' | 'TRACE';

/**
 * A place where an exception class is thrown
 */
export interface ExceptionOccurrence {
  readonly file: string;
  /** 1-based line of the throw statement */
  readonly line: number;
  /** 1-based column of the throw keyword */
  readonly column: number;
  /** Rendered class name, possibly dotted (e.g. "errors.NotFound") */
  readonly exceptionClass: string;
  /** Called function the throw lives in; null when thrown in the endpoint body itself */
  readonly inFunction: string | null;
}

/**
 * Metadata read from a route decorator
 */
export interface RouteDeclaration {
  method: HttpMethod;
  path: string | null;
  declaredExceptions: string[];
}

/**
 * An HTTP endpoint with its declared and detected exceptions
 */
export interface EndpointRecord {
  file: string;
  line: number;
  functionName: string;
  method: HttpMethod;
  path: string | null;
  /** Declaration order is preserved */
  declaredExceptions: string[];
  /** Discovery order is preserved */
  detectedExceptions: ExceptionOccurrence[];
}

/**
 * Result of analyzing a file or a directory tree
 */
export interface AnalysisResult {
  endpoints: EndpointRecord[];
  /** One entry per file that could not be parsed */
  errors: string[];
}

/**
 * A named function definition found in a source file.
 *
 * `declaration` is the node decorators attach to: the method or property for
 * class members, the variable declaration for `const fn = () => ...`, or the
 * function declaration itself.
 */
export interface FunctionDefinition {
  name: string;
  declaration: ts.Node;
  body: ts.ConciseBody;
  /** 1-based line of the function's name */
  line: number;
}

/**
 * Symbol table entry: where a bare function name resolves to
 */
export interface FunctionTarget {
  file: string;
  sourceFile: ts.SourceFile;
  definition: FunctionDefinition;
}

export interface AnalyzerConfig {
  /** Maximum call depth followed from an endpoint body (0 disables transitive analysis) */
  maxDepth?: number;
  /** Exception class names removed from every endpoint's detected list */
  ignoreExceptions?: Iterable<string>;
}

export type OutputFormat = 'text' | 'json' | 'github';

/**
 * Contents of a .routethrowsrc file
 */
export interface RouteThrowsConfig {
  depth?: number;
  ignore?: string[];
  format?: OutputFormat;
}
