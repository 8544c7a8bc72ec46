/**
 * Endpoint Analyzer - follows calls out of route handlers to find the
 * exceptions each endpoint can throw
 */

import { discoverSourceFiles } from './file-discovery.js';
import { SourceIndex, type ParsedSource } from './source-index.js';
import { ExceptionDetector } from './analyzers/exception-detector.js';
import { extractRouteDeclaration } from './analyzers/declaration-extractor.js';
import type {
  AnalysisResult,
  AnalyzerConfig,
  EndpointRecord,
  ExceptionOccurrence,
  FunctionTarget,
} from './types.js';

export const DEFAULT_MAX_DEPTH = 3;

/**
 * State owned by a single analysis run: the symbol table and the traversal
 * cache. A new context is created for every run, so runs never share results.
 */
export class AnalysisContext {
  readonly index: SourceIndex;
  /** `${functionName}:${depth}` -> occurrences found for that call */
  readonly cache = new Map<string, readonly ExceptionOccurrence[]>();
  private detectors = new Map<string, ExceptionDetector>();

  constructor(index: SourceIndex = new SourceIndex()) {
    this.index = index;
  }

  detectorFor(target: FunctionTarget): ExceptionDetector {
    let detector = this.detectors.get(target.file);
    if (!detector) {
      detector = new ExceptionDetector(target.sourceFile, target.file);
      this.detectors.set(target.file, detector);
    }
    return detector;
  }
}

/**
 * Depth-bounded walk over the call graph reachable from an endpoint.
 *
 * Calls resolve by bare name through the Source Index. `visited` holds the
 * functions on the current path only and is copied for every call, so two
 * sibling calls into the same helper are both explored. Results are cached
 * per (name, depth) and reused for later calls at the same depth, whatever
 * path reached them.
 */
export class TransitiveAnalyzer {
  private context: AnalysisContext;
  private maxDepth: number;

  constructor(context: AnalysisContext, maxDepth: number = DEFAULT_MAX_DEPTH) {
    assertValidDepth(maxDepth);
    this.context = context;
    this.maxDepth = maxDepth;
  }

  /**
   * Exceptions reachable from an endpoint body, direct throws first
   */
  analyzeEndpoint(target: FunctionTarget): ExceptionOccurrence[] {
    return this.analyze(target, 0, new Set());
  }

  private analyze(target: FunctionTarget, depth: number, ancestors: ReadonlySet<string>): ExceptionOccurrence[] {
    const name = target.definition.name;
    if (ancestors.has(name)) {
      return [];
    }
    const visited = new Set(ancestors).add(name);

    const detector = this.context.detectorFor(target);
    const results = detector.findRaises(target.definition.body);

    if (depth >= this.maxDepth) {
      return results;
    }

    for (const callName of detector.findCallNames(target.definition.body)) {
      if (visited.has(callName)) {
        continue;
      }

      const key = `${callName}:${depth + 1}`;
      const cached = this.context.cache.get(key);
      if (cached) {
        results.push(...cached);
        continue;
      }

      const callee = this.context.index.lookup(callName);
      if (!callee) {
        continue;
      }

      const sub = this.analyze(callee, depth + 1, new Set(visited)).map(occurrence =>
        occurrence.inFunction === null ? { ...occurrence, inFunction: callName } : occurrence
      );
      this.context.cache.set(key, sub);
      results.push(...sub);
    }

    return results;
  }
}

/**
 * Analyzes files or directory trees for endpoints whose thrown exceptions
 * are not declared
 */
export class EndpointAnalyzer {
  private maxDepth: number;
  private ignoreExceptions: ReadonlySet<string>;

  constructor(config: AnalyzerConfig = {}) {
    this.maxDepth = config.maxDepth ?? DEFAULT_MAX_DEPTH;
    assertValidDepth(this.maxDepth);
    this.ignoreExceptions = new Set(config.ignoreExceptions ?? []);
  }

  /**
   * Analyzes a single file or every source file below a directory.
   *
   * All files are registered before any endpoint is analyzed, so helpers
   * defined in any file of the tree are resolvable from every endpoint.
   */
  analyzePath(targetPath: string): AnalysisResult {
    const result: AnalysisResult = { endpoints: [], errors: [] };
    const context = new AnalysisContext();
    const analyzer = new TransitiveAnalyzer(context, this.maxDepth);

    const parsed: ParsedSource[] = [];
    for (const file of discoverSourceFiles(targetPath)) {
      const outcome = context.index.parse(file);
      if (!outcome.ok) {
        result.errors.push(outcome.error);
        continue;
      }
      context.index.register(file);
      parsed.push(outcome);
    }

    for (const source of parsed) {
      result.endpoints.push(...this.analyzeSource(source, analyzer));
    }

    return result;
  }

  private analyzeSource(source: ParsedSource, analyzer: TransitiveAnalyzer): EndpointRecord[] {
    const endpoints: EndpointRecord[] = [];

    for (const definition of source.definitions) {
      const route = extractRouteDeclaration(definition);
      if (!route) {
        continue;
      }

      const detected = analyzer.analyzeEndpoint({
        file: source.file,
        sourceFile: source.sourceFile,
        definition,
      });

      endpoints.push({
        file: source.file,
        line: definition.line,
        functionName: definition.name,
        method: route.method,
        path: route.path,
        declaredExceptions: route.declaredExceptions,
        detectedExceptions: detected.filter(
          occurrence => !this.ignoreExceptions.has(occurrence.exceptionClass)
        ),
      });
    }

    return endpoints;
  }
}

/**
 * Analyzes a path for endpoint exception issues
 */
export function analyze(targetPath: string, config: AnalyzerConfig = {}): AnalysisResult {
  return new EndpointAnalyzer(config).analyzePath(targetPath);
}

function assertValidDepth(depth: number): void {
  if (!Number.isInteger(depth) || depth < 0) {
    throw new RangeError(`Maximum depth must be a non-negative integer, got ${depth}`);
  }
}
