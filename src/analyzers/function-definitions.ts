/**
 * Function Definitions
 * Collects every named function in a source file, nested ones included
 */

import * as ts from 'typescript';
import type { FunctionDefinition } from '../types.js';

type FunctionValue = ts.ArrowFunction | ts.FunctionExpression;

/**
 * Finds all named function definitions in a source file, in source order.
 *
 * Recognized shapes:
 * - `function name() {}`
 * - class methods, including static and private (`#name`) ones
 * - `const name = () => {}` / `const name = function () {}`
 * - class properties and object properties initialized with a function value
 */
export function collectFunctionDefinitions(sourceFile: ts.SourceFile): FunctionDefinition[] {
  const definitions: FunctionDefinition[] = [];

  const visit = (node: ts.Node): void => {
    const definition = toDefinition(node, sourceFile);
    if (definition) {
      definitions.push(definition);
    }
    ts.forEachChild(node, visit);
  };

  visit(sourceFile);
  return definitions;
}

function toDefinition(node: ts.Node, sourceFile: ts.SourceFile): FunctionDefinition | undefined {
  if ((ts.isFunctionDeclaration(node) || ts.isMethodDeclaration(node)) && node.name && node.body) {
    const name = memberName(node.name);
    if (!name) return undefined;
    return {
      name,
      declaration: node,
      body: node.body,
      line: lineOf(node.name, sourceFile),
    };
  }

  if (
    (ts.isVariableDeclaration(node) || ts.isPropertyDeclaration(node) || ts.isPropertyAssignment(node)) &&
    node.initializer &&
    isFunctionValue(node.initializer)
  ) {
    const name = memberName(node.name);
    if (!name) return undefined;
    return {
      name,
      declaration: node,
      body: node.initializer.body,
      line: lineOf(node.name, sourceFile),
    };
  }

  return undefined;
}

function isFunctionValue(node: ts.Expression): node is FunctionValue {
  return ts.isArrowFunction(node) || ts.isFunctionExpression(node);
}

function memberName(name: ts.Node): string | undefined {
  if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name) || ts.isStringLiteral(name)) {
    return name.text;
  }
  return undefined;
}

function lineOf(node: ts.Node, sourceFile: ts.SourceFile): number {
  return sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile)).line + 1;
}
