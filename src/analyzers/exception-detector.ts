/**
 * Exception Detector
 * Finds the throw statements in a function body and the class each one raises
 *
 * Rethrowing a caught error (`catch (err) { ...; throw err; }`) propagates an
 * existing exception rather than raising a new one, so it is not recorded.
 */

import * as ts from 'typescript';
import type { ExceptionOccurrence } from '../types.js';
import { calleeName, renderRaisedName, unwrapExpression } from './expression-names.js';

export class ExceptionDetector {
  private sourceFile: ts.SourceFile;
  private file: string;

  constructor(sourceFile: ts.SourceFile, file: string = sourceFile.fileName) {
    this.sourceFile = sourceFile;
    this.file = file;
  }

  /**
   * Finds direct throws in a body, nested blocks and nested functions included.
   * A parameter of a nested function hides a catch binding of the same name.
   * Every occurrence is recorded with `inFunction` unset; the caller attaches
   * the function name when the body was reached through a call.
   */
  findRaises(body: ts.ConciseBody): ExceptionOccurrence[] {
    const occurrences: ExceptionOccurrence[] = [];

    const visit = (node: ts.Node, caughtNames: ReadonlySet<string>): void => {
      if (ts.isThrowStatement(node)) {
        const occurrence = this.toOccurrence(node, caughtNames);
        if (occurrence) {
          occurrences.push(occurrence);
        }
      }

      if (ts.isFunctionLike(node)) {
        const shadowed = new Set<string>();
        for (const parameter of node.parameters) {
          collectBindingNames(parameter.name, shadowed);
        }
        const inner = shadowed.size > 0
          ? new Set([...caughtNames].filter(name => !shadowed.has(name)))
          : caughtNames;
        ts.forEachChild(node, child => visit(child, inner));
        return;
      }

      if (ts.isCatchClause(node)) {
        const binding = node.variableDeclaration?.name;
        const inner = binding && ts.isIdentifier(binding)
          ? new Set([...caughtNames, binding.text])
          : caughtNames;
        visit(node.block, inner);
        return;
      }

      ts.forEachChild(node, child => visit(child, caughtNames));
    };

    visit(body, new Set());
    return occurrences;
  }

  /**
   * Lists the bare names of all calls made in a body, in source order.
   * Calls whose target has no name (`fns[0]()`, `(() => x)()`) are skipped.
   */
  findCallNames(body: ts.ConciseBody): string[] {
    const names: string[] = [];

    const visit = (node: ts.Node): void => {
      if (ts.isCallExpression(node)) {
        const name = calleeName(node);
        if (name) {
          names.push(name);
        }
      }
      ts.forEachChild(node, visit);
    };

    visit(body);
    return names;
  }

  private toOccurrence(node: ts.ThrowStatement, caughtNames: ReadonlySet<string>): ExceptionOccurrence | undefined {
    if (isRethrow(node, caughtNames)) {
      return undefined;
    }

    const exceptionClass = renderRaisedName(node.expression);
    if (!exceptionClass) {
      return undefined;
    }

    const location = this.sourceFile.getLineAndCharacterOfPosition(node.getStart(this.sourceFile));
    return {
      file: this.file,
      line: location.line + 1,
      column: location.character + 1,
      exceptionClass,
      inFunction: null,
    };
  }
}

function isRethrow(node: ts.ThrowStatement, caughtNames: ReadonlySet<string>): boolean {
  const operand = unwrapExpression(node.expression);
  return ts.isIdentifier(operand) && caughtNames.has(operand.text);
}

function collectBindingNames(name: ts.BindingName, into: Set<string>): void {
  if (ts.isIdentifier(name)) {
    into.add(name.text);
    return;
  }
  for (const element of name.elements) {
    if (ts.isBindingElement(element)) {
      collectBindingNames(element.name, into);
    }
  }
}
