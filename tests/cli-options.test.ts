import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { collect, parseDepth, resolveAnalysisOptions, resolveFormat } from '../src/cli/options.js';

describe('parseDepth', () => {
  it('accepts non-negative integers', () => {
    expect(parseDepth('0')).toBe(0);
    expect(parseDepth('5')).toBe(5);
  });

  it('rejects anything else', () => {
    expect(() => parseDepth('-1')).toThrow(InvalidArgumentError);
    expect(() => parseDepth('2.5')).toThrow(InvalidArgumentError);
    expect(() => parseDepth('deep')).toThrow('Depth must be a non-negative integer.');
  });
});

describe('collect', () => {
  it('accumulates repeated values', () => {
    expect(collect('B', collect('A'))).toEqual(['A', 'B']);
  });
});

describe('resolveAnalysisOptions', () => {
  it('falls back to the default depth', () => {
    expect(resolveAnalysisOptions({}, {})).toEqual({ maxDepth: 3, ignoreExceptions: [] });
  });

  it('prefers command-line values over the config file', () => {
    expect(resolveAnalysisOptions({ depth: 0 }, { depth: 2 }).maxDepth).toBe(0);
    expect(resolveAnalysisOptions({}, { depth: 2 }).maxDepth).toBe(2);
  });

  it('merges ignore lists without repeats', () => {
    const resolved = resolveAnalysisOptions({ ignore: ['Timeout', 'Gone'] }, { ignore: ['Gone', 'Conflict'] });

    expect(resolved.ignoreExceptions).toEqual(['Gone', 'Conflict', 'Timeout']);
  });
});

describe('resolveFormat', () => {
  it('prefers the command line, then the config file, then text', () => {
    expect(resolveFormat('json', { format: 'github' })).toBe('json');
    expect(resolveFormat(undefined, { format: 'github' })).toBe('github');
    expect(resolveFormat(undefined, {})).toBe('text');
  });
});
