/**
 * Source Index - parses source files once and resolves bare function names
 */

import * as fs from 'fs';
import * as path from 'path';
import * as ts from 'typescript';
import { collectFunctionDefinitions } from './analyzers/function-definitions.js';
import type { FunctionDefinition, FunctionTarget } from './types.js';

export interface ParsedSource {
  ok: true;
  file: string;
  sourceFile: ts.SourceFile;
  definitions: FunctionDefinition[];
}

export interface ParseFailure {
  ok: false;
  file: string;
  error: string;
}

export type ParseOutcome = ParsedSource | ParseFailure;

// Only the file itself is parsed: no lib, no imports, no @types
const PARSE_OPTIONS: ts.CompilerOptions = {
  noLib: true,
  noResolve: true,
  types: [],
  target: ts.ScriptTarget.Latest,
};

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Symbol table over every function defined in the registered files.
 *
 * Names are bare: when two files define a function with the same name, the
 * file registered last wins.
 */
export class SourceIndex {
  private parsed = new Map<string, ParseOutcome>();
  private registered = new Set<string>();
  private functions = new Map<string, FunctionTarget>();

  /**
   * Parses a file, or returns the cached outcome of an earlier parse
   */
  parse(filePath: string): ParseOutcome {
    const cached = this.parsed.get(filePath);
    if (cached) {
      return cached;
    }

    const outcome = parseSourceFile(filePath);
    this.parsed.set(filePath, outcome);
    return outcome;
  }

  /**
   * Makes every function in a file resolvable. Files that fail to parse are
   * skipped without error; repeated calls for a path do nothing.
   */
  register(filePath: string): void {
    if (this.registered.has(filePath)) {
      return;
    }
    this.registered.add(filePath);

    const outcome = this.parse(filePath);
    if (!outcome.ok) {
      return;
    }

    for (const definition of outcome.definitions) {
      this.functions.set(definition.name, {
        file: outcome.file,
        sourceFile: outcome.sourceFile,
        definition,
      });
    }
  }

  lookup(name: string): FunctionTarget | undefined {
    return this.functions.get(name);
  }
}

/**
 * Reads and parses a single file, reporting undecodable bytes and syntax
 * errors as a failure
 */
export function parseSourceFile(filePath: string): ParseOutcome {
  let text: string;
  try {
    text = utf8.decode(fs.readFileSync(filePath));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const kind = error instanceof TypeError ? 'Encoding error' : 'Read error';
    return { ok: false, file: filePath, error: `${kind} in ${filePath}: ${message}` };
  }

  const sourceFile = ts.createSourceFile(filePath, text, ts.ScriptTarget.Latest, true, scriptKindFor(filePath));
  const diagnostics = syntacticDiagnostics(sourceFile);

  if (diagnostics.length > 0) {
    return { ok: false, file: filePath, error: formatSyntaxError(filePath, sourceFile, diagnostics[0]) };
  }

  return {
    ok: true,
    file: filePath,
    sourceFile,
    definitions: collectFunctionDefinitions(sourceFile),
  };
}

/**
 * Runs the parser's own diagnostics through a single-file program built
 * around the already parsed source
 */
function syntacticDiagnostics(sourceFile: ts.SourceFile): readonly ts.Diagnostic[] {
  const target = path.resolve(sourceFile.fileName);
  const host = ts.createCompilerHost(PARSE_OPTIONS, true);
  host.getSourceFile = (fileName) => (path.resolve(fileName) === target ? sourceFile : undefined);

  const program = ts.createProgram({
    rootNames: [sourceFile.fileName],
    options: PARSE_OPTIONS,
    host,
  });

  return program.getSyntacticDiagnostics(sourceFile);
}

function formatSyntaxError(filePath: string, sourceFile: ts.SourceFile, diagnostic: ts.Diagnostic): string {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
  if (diagnostic.start === undefined) {
    return `Syntax error in ${filePath}: ${message}`;
  }
  const { line } = sourceFile.getLineAndCharacterOfPosition(diagnostic.start);
  return `Syntax error in ${filePath}: ${message} (line ${line + 1})`;
}

function scriptKindFor(filePath: string): ts.ScriptKind {
  return filePath.endsWith('.tsx') ? ts.ScriptKind.TSX : ts.ScriptKind.TS;
}
