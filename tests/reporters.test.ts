/**
 * Test suite for report formatting
 */

import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import {
  buildJsonReport,
  buildSuggestions,
  describeOccurrence,
  endpointHeader,
  formatEndpointListing,
  formatGithubReport,
  formatJsonReport,
  formatSuggestions,
  formatSummary,
  formatTextReport,
  getFormatter,
  printTerminalReport,
} from '../src/reporters/index.js';
import type { AnalysisResult, EndpointRecord } from '../src/types.js';

const plain = new Chalk({ level: 0 });

const createOrder: EndpointRecord = {
  file: 'src/orders.ts',
  line: 12,
  functionName: 'createOrder',
  method: 'POST',
  path: '/orders',
  declaredExceptions: ['Conflict'],
  detectedExceptions: [
    { file: 'src/orders.ts', line: 14, column: 7, exceptionClass: 'Conflict', inFunction: null },
    { file: 'src/orders.ts', line: 15, column: 7, exceptionClass: 'BadRequest', inFunction: null },
    { file: 'src/billing.ts', line: 8, column: 5, exceptionClass: 'PaymentFailed', inFunction: 'charge' },
  ],
};

const getOrder: EndpointRecord = {
  file: 'src/orders.ts',
  line: 30,
  functionName: 'getOrder',
  method: 'GET',
  path: null,
  declaredExceptions: ['NotFound'],
  detectedExceptions: [
    { file: 'src/orders.ts', line: 32, column: 7, exceptionClass: 'NotFound', inFunction: null },
  ],
};

const withIssues: AnalysisResult = { endpoints: [createOrder, getOrder], errors: [] };
const clean: AnalysisResult = { endpoints: [getOrder], errors: [] };
const empty: AnalysisResult = { endpoints: [], errors: [] };

describe('text report', () => {
  it('builds headers with and without a path', () => {
    expect(endpointHeader(createOrder)).toBe('src/orders.ts:12 - POST /orders (createOrder)');
    expect(endpointHeader(getOrder)).toBe('src/orders.ts:30 - getOrder');
  });

  it('describes where an exception was raised', () => {
    expect(describeOccurrence(createOrder.detectedExceptions[1])).toBe('BadRequest (raised at line 15)');
    expect(describeOccurrence(createOrder.detectedExceptions[2])).toBe(
      'PaymentFailed (raised in charge at src/billing.ts:8)'
    );
  });

  it('pluralizes the summary', () => {
    expect(formatSummary(1, 1)).toBe('Found 1 undeclared exception in 1 endpoint.');
    expect(formatSummary(3, 2)).toBe('Found 3 undeclared exceptions in 2 endpoints.');
  });

  it('lists undeclared exceptions per endpoint', () => {
    expect(formatTextReport(withIssues)).toBe(
      [
        'src/orders.ts:12 - POST /orders (createOrder)',
        '  Undeclared exceptions:',
        '    - BadRequest (raised at line 15)',
        '    - PaymentFailed (raised in charge at src/billing.ts:8)',
        '',
        '',
        'Found 2 undeclared exceptions in 1 endpoint.',
      ].join('\n')
    );
  });

  it('adds declared exceptions when verbose', () => {
    const report = formatTextReport(withIssues, true).split('\n');

    expect(report.slice(0, 6)).toEqual([
      'src/orders.ts:12 - POST /orders (createOrder)',
      '  Undeclared exceptions:',
      '    - BadRequest (raised at line 15)',
      '    - PaymentFailed (raised in charge at src/billing.ts:8)',
      '  Declared exceptions:',
      '    - Conflict',
    ]);
  });

  it('reports clean and empty results', () => {
    expect(formatTextReport(clean)).toBe('No undeclared exceptions found.');
    expect(formatTextReport(clean, true)).toBe('Analyzed 1 endpoints.\nNo undeclared exceptions found.');
    expect(formatTextReport(empty)).toBe('No route endpoints found.');
  });
});

describe('JSON report', () => {
  it('includes only endpoints with issues by default', () => {
    const report = buildJsonReport(withIssues);

    expect(report.summary).toEqual({ total_endpoints: 2, endpoints_with_issues: 1, total_undeclared: 2 });
    expect(report.endpoints).toEqual([
      {
        file: 'src/orders.ts',
        line: 12,
        function: 'createOrder',
        method: 'POST',
        path: '/orders',
        declared_exceptions: ['Conflict'],
        undeclared_exceptions: [
          { class: 'BadRequest', file: 'src/orders.ts', line: 15, in_function: null },
          { class: 'PaymentFailed', file: 'src/billing.ts', line: 8, in_function: 'charge' },
        ],
      },
    ]);
    expect(report.errors).toEqual([]);
  });

  it('includes every endpoint when verbose', () => {
    const report = buildJsonReport(withIssues, true);

    expect(report.endpoints.map(e => e.function)).toEqual(['createOrder', 'getOrder']);
    expect(report.endpoints[1].path).toBeNull();
    expect(report.endpoints[1].undeclared_exceptions).toEqual([]);
  });

  it('serializes with two-space indentation', () => {
    const result: AnalysisResult = { endpoints: [], errors: ['Read error in a.ts: gone'] };

    expect(JSON.parse(formatJsonReport(result))).toEqual({
      summary: { total_endpoints: 0, endpoints_with_issues: 0, total_undeclared: 0 },
      endpoints: [],
      errors: ['Read error in a.ts: gone'],
    });
    expect(formatJsonReport(result).split('\n')[1]).toBe('  "summary": {');
  });
});

describe('GitHub annotations', () => {
  it('emits one error command per undeclared exception', () => {
    expect(formatGithubReport(withIssues).split('\n')).toEqual([
      "::error file=src/orders.ts,line=12,title=Undeclared Exception::Undeclared exception 'BadRequest'",
      "::error file=src/orders.ts,line=12,title=Undeclared Exception::Undeclared exception 'PaymentFailed' raised in charge",
    ]);
  });

  it('emits nothing for a clean result', () => {
    expect(formatGithubReport(clean)).toBe('');
  });
});

describe('getFormatter', () => {
  it('maps each output format to its formatter', () => {
    expect(getFormatter('text')(clean)).toBe('No undeclared exceptions found.');
    expect(getFormatter('github')(clean)).toBe('');
    expect(JSON.parse(getFormatter('json')(clean)).summary.total_endpoints).toBe(1);
  });
});

describe('terminal report', () => {
  it('prints each endpoint with a summary', () => {
    const output: string[] = [];
    printTerminalReport(withIssues, { log: line => output.push(line), colors: plain });

    expect(output).toEqual([
      '\nsrc/orders.ts:12 - POST /orders (createOrder)',
      '  Undeclared exceptions:',
      '    • BadRequest (raised at line 15)',
      '    • PaymentFailed (raised in charge at src/billing.ts:8)',
      '',
      'Summary: 2 undeclared exception(s) in 1 endpoint(s)',
    ]);
  });

  it('prints a success line for a clean result', () => {
    const output: string[] = [];
    printTerminalReport(clean, { log: line => output.push(line), colors: plain, verbose: true });

    expect(output).toEqual(['Analyzed 1 endpoints.', '✓ No undeclared exceptions found.']);
  });
});

describe('endpoint listing', () => {
  it('shows declared and detected exceptions for every endpoint', () => {
    expect(formatEndpointListing(withIssues, plain)).toEqual([
      '',
      'src/orders.ts:12 - POST /orders (createOrder)',
      '  Declared:',
      '    ✓ Conflict',
      '  Detected:',
      '    ✓ Conflict (line 14)',
      '    ✗ BadRequest (line 15)',
      '    ✗ PaymentFailed (in charge at line 8)',
      '',
      'src/orders.ts:30 - getOrder',
      '  Declared:',
      '    ✓ NotFound',
      '  Detected:',
      '    ✓ NotFound (line 32)',
      '',
      'Total endpoints: 2',
    ]);
  });

  it('marks endpoints without declarations or throws', () => {
    const bare: EndpointRecord = { ...getOrder, declaredExceptions: [], detectedExceptions: [] };

    expect(formatEndpointListing({ endpoints: [bare], errors: [] }, plain)).toEqual([
      '',
      'src/orders.ts:30 - getOrder',
      '  Declared: (none)',
      '  Detected: (none)',
      '',
      'Total endpoints: 1',
    ]);
  });

  it('reports an empty result', () => {
    expect(formatEndpointListing(empty, plain)).toEqual(['No route endpoints found.']);
  });
});

describe('suggestions', () => {
  it('adds each undeclared class once', () => {
    const repeated: EndpointRecord = {
      ...createOrder,
      detectedExceptions: [
        ...createOrder.detectedExceptions,
        { file: 'src/orders.ts', line: 20, column: 7, exceptionClass: 'BadRequest', inFunction: null },
      ],
    };

    const [suggestion] = buildSuggestions({ endpoints: [repeated], errors: [] });

    expect(suggestion.suggested).toEqual(['BadRequest', 'Conflict', 'PaymentFailed']);
    expect(suggestion.added).toEqual(['BadRequest', 'PaymentFailed']);
  });

  it('formats suggestions as text', () => {
    expect(formatSuggestions(withIssues, 'text', plain)).toEqual([
      '',
      'src/orders.ts:12 - createOrder',
      '  Suggested:',
      '    exceptions: [BadRequest, Conflict, PaymentFailed]',
      '  Adding: BadRequest, PaymentFailed',
    ]);
  });

  it('formats suggestions as a diff', () => {
    expect(formatSuggestions(withIssues, 'diff', plain)).toEqual([
      '',
      'src/orders.ts:12 - createOrder',
      '  - exceptions: [Conflict]',
      '  + exceptions: [BadRequest, Conflict, PaymentFailed]',
    ]);
  });

  it('confirms when nothing is missing', () => {
    expect(formatSuggestions(clean, 'text', plain)).toEqual(['✓ All exceptions are properly declared.']);
  });
});
