import { describe, expect, it } from 'vitest';
import { parseArgs, parseNumber, plural, trimmed } from './utils.js';

describe('parseArgs', () => {
  it('separates options from positionals', () => {
    expect(parseArgs(['--difficulty', 'hard', 'todos', 'add', 'Buy', 'milk'])).toEqual({
      _: ['todos', 'add', 'Buy', 'milk'],
      difficulty: 'hard',
    });
  });

  it('treats boolean flags as switches', () => {
    expect(parseArgs(['--verbose', 'status'])).toEqual({ _: ['status'], verbose: true });
  });

  it('accepts key=value and stops at --', () => {
    expect(parseArgs(['--timeout-ms=500', '--', '--debug'])).toEqual({ _: ['--debug'], 'timeout-ms': '500' });
  });

  it('keeps dash-prefixed numbers as positionals', () => {
    expect(parseArgs(['habits', 'up', '-3'])._).toEqual(['habits', 'up', '-3']);
  });
});

describe('parseNumber', () => {
  it('parses finite numbers only', () => {
    expect(parseNumber('250')).toBe(250);
    expect(parseNumber('abc')).toBeNull();
    expect(parseNumber(true)).toBeNull();
    expect(parseNumber(undefined)).toBeNull();
  });
});

describe('plural', () => {
  it('adds an s except for one', () => {
    expect(plural(1, 'potion')).toBe('potion');
    expect(plural(3, 'potion')).toBe('potions');
  });
});

describe('trimmed', () => {
  it('trims strings and blanks everything else', () => {
    expect(trimmed('  https://habitica.test ')).toBe('https://habitica.test');
    expect(trimmed(undefined)).toBe('');
    expect(trimmed(42)).toBe('');
  });
});
