/**
 * Expression Names
 *
 * Renders the class or function name an expression refers to. Decorator
 * exception lists, throw operands and call targets all go through the same
 * rule: an identifier renders as itself and a property access chain renders
 * left to right, joined with dots.
 */

import * as ts from 'typescript';

export type NameShape =
  | { kind: 'identifier'; name: string }
  | { kind: 'qualified'; node: ts.PropertyAccessExpression }
  | { kind: 'call'; node: ts.CallExpression | ts.NewExpression };

/**
 * Strips parentheses and type-only wrappers (`as`, `!`, `satisfies`, `<T>x`)
 */
export function unwrapExpression(expression: ts.Expression): ts.Expression {
  let current = expression;
  while (
    ts.isParenthesizedExpression(current) ||
    ts.isAsExpression(current) ||
    ts.isNonNullExpression(current) ||
    ts.isSatisfiesExpression(current) ||
    ts.isTypeAssertionExpression(current)
  ) {
    current = current.expression;
  }
  return current;
}

/**
 * Classifies an expression into one of the shapes a name can be read from
 */
export function classifyExpression(expression: ts.Expression): NameShape | undefined {
  const node = unwrapExpression(expression);

  if (ts.isIdentifier(node)) {
    return { kind: 'identifier', name: node.text };
  }
  if (isThisExpression(node)) {
    return { kind: 'identifier', name: 'this' };
  }
  if (ts.isPropertyAccessExpression(node)) {
    return { kind: 'qualified', node };
  }
  if (ts.isCallExpression(node) || ts.isNewExpression(node)) {
    return { kind: 'call', node };
  }
  return undefined;
}

/**
 * Renders an identifier or a dotted property chain; any other shape has no class name.
 *
 * A chain whose root is not a name (`make().Error`) keeps only the property
 * segments.
 */
export function renderClassName(expression: ts.Expression): string | undefined {
  const shape = classifyExpression(expression);
  if (!shape) return undefined;

  switch (shape.kind) {
    case 'identifier':
      return shape.name;
    case 'qualified':
      return renderQualified(shape.node);
    case 'call':
      return undefined;
  }
}

/**
 * Renders the class name a throw operand raises: `new E()` and `makeE()`
 * resolve by their callee, a bare name or chain by itself.
 */
export function renderRaisedName(expression: ts.Expression): string | undefined {
  const shape = classifyExpression(expression);
  if (!shape) return undefined;

  switch (shape.kind) {
    case 'identifier':
      return shape.name;
    case 'qualified':
      return renderQualified(shape.node);
    case 'call':
      return renderClassName(shape.node.expression);
  }
}

/**
 * Bare name of a call target; for method calls only the property name counts
 * and the receiver is ignored.
 */
export function calleeName(call: ts.CallExpression): string | undefined {
  const callee = unwrapExpression(call.expression);

  if (ts.isIdentifier(callee)) {
    return callee.text;
  }
  if (ts.isPropertyAccessExpression(callee)) {
    return callee.name.text;
  }
  return undefined;
}

function renderQualified(node: ts.PropertyAccessExpression): string {
  const parts: string[] = [];
  let current: ts.Expression = node;

  while (true) {
    current = unwrapExpression(current);
    if (!ts.isPropertyAccessExpression(current)) break;
    parts.push(current.name.text);
    current = current.expression;
  }

  if (ts.isIdentifier(current)) {
    parts.push(current.text);
  } else if (isThisExpression(current)) {
    parts.push('this');
  }

  return parts.reverse().join('.');
}

function isThisExpression(node: ts.Node): node is ts.ThisExpression {
  return node.kind === ts.SyntaxKind.ThisKeyword;
}
