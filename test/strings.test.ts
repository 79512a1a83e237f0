/**
 * Tests for string helpers
 */

import { describe, it, expect } from 'vitest';
import { equalsIgnoreCase, hasLineBreak, truncateToCapacity } from '../src/utils/strings.js';

describe('truncateToCapacity', () => {
  it('should keep one slot for the terminator', () => {
    expect(truncateToCapacity('abcdef', 4)).toBe('abc');
    expect(truncateToCapacity('abc', 4)).toBe('abc');
    expect(truncateToCapacity('abc', 1)).toBe('');
  });

  it('should not split a surrogate pair', () => {
    const text = 'a\u{1F600}b';

    expect(truncateToCapacity(text, 3)).toBe('a');
    expect(truncateToCapacity(text, 4)).toBe('a\u{1F600}');
    expect(truncateToCapacity('\u{1F600}', 2)).toBe('');
  });
});

describe('hasLineBreak', () => {
  it('should detect CR and LF', () => {
    expect(hasLineBreak('a\rb')).toBe(true);
    expect(hasLineBreak('a\nb')).toBe(true);
    expect(hasLineBreak('a b')).toBe(false);
  });
});

describe('equalsIgnoreCase', () => {
  it('should compare without regard to case', () => {
    expect(equalsIgnoreCase('Port', 'PORT')).toBe(true);
    expect(equalsIgnoreCase('port', 'ports')).toBe(false);
  });
});
