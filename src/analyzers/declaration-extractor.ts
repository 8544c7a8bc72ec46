/**
 * Declaration Extractor
 * Reads route metadata from HTTP-method decorators such as
 * `@router.post('/users/:id', { exceptions: [Unauthorized, errors.NotFound] })`
 */

import * as ts from 'typescript';
import type { FunctionDefinition, HttpMethod, RouteDeclaration } from '../types.js';
import { renderClassName, unwrapExpression } from './expression-names.js';

export const HTTP_METHODS: ReadonlyMap<string, HttpMethod> = new Map<string, HttpMethod>([
  ['get', 'GET'],
  ['post', 'POST'],
  ['put', 'PUT'],
  ['delete', 'DELETE'],
  ['patch', 'PATCH'],
  ['head', 'HEAD'],
  ['options', 'OPTIONS'],
  ['trace', 'TRACE'],
]);

const EXCEPTIONS_PROPERTY = 'exceptions';

/**
 * Returns the route declared on a function, or null when none of its
 * decorators is an HTTP-method call. Only the first matching decorator is read.
 */
export function extractRouteDeclaration(definition: FunctionDefinition): RouteDeclaration | null {
  const declaration = definition.declaration;
  const decorators = ts.canHaveDecorators(declaration) ? ts.getDecorators(declaration) ?? [] : [];

  for (const decorator of decorators) {
    const call = unwrapExpression(decorator.expression);
    if (!ts.isCallExpression(call)) {
      continue;
    }

    const method = httpMethodOf(call.expression);
    if (!method) {
      continue;
    }

    return {
      method,
      path: extractPath(call),
      declaredExceptions: extractDeclaredExceptions(call),
    };
  }

  return null;
}

/**
 * `get(...)` or `<anything>.get(...)`
 */
function httpMethodOf(callee: ts.Expression): HttpMethod | undefined {
  const node = unwrapExpression(callee);
  if (ts.isIdentifier(node)) {
    return HTTP_METHODS.get(node.text);
  }
  if (ts.isPropertyAccessExpression(node)) {
    return HTTP_METHODS.get(node.name.text);
  }
  return undefined;
}

function extractPath(call: ts.CallExpression): string | null {
  const first = call.arguments[0];
  if (!first) {
    return null;
  }

  if (ts.isStringLiteral(first) || ts.isNoSubstitutionTemplateLiteral(first) || ts.isNumericLiteral(first)) {
    return first.text;
  }
  return null;
}

/**
 * Reads the `exceptions` array of the first object-literal argument that has one
 */
function extractDeclaredExceptions(call: ts.CallExpression): string[] {
  for (const argument of call.arguments) {
    const options = unwrapExpression(argument);
    if (!ts.isObjectLiteralExpression(options)) {
      continue;
    }

    for (const property of options.properties) {
      if (!ts.isPropertyAssignment(property) || propertyName(property.name) !== EXCEPTIONS_PROPERTY) {
        continue;
      }
      return parseExceptionList(property.initializer);
    }
  }

  return [];
}

function parseExceptionList(node: ts.Expression): string[] {
  const list = unwrapExpression(node);
  if (!ts.isArrayLiteralExpression(list)) {
    return [];
  }

  const names: string[] = [];
  for (const element of list.elements) {
    const name = renderClassName(element);
    if (name) {
      names.push(name);
    }
  }
  return names;
}

function propertyName(name: ts.PropertyName): string | undefined {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name)) {
    return name.text;
  }
  return undefined;
}
