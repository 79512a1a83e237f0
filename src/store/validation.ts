/**
 * INI Store - Argument Contracts
 * @module store/validation
 *
 * Arguments that could not round-trip through the file format are caller
 * bugs and raise ContractViolationError.
 */

import type { SectionName } from '../parser/types.js';
import { requireArgument } from '../utils/errors.js';
import { hasLineBreak } from '../utils/strings.js';

const KEY_FORBIDDEN = /[=:\r\n]/;
const KEY_FORBIDDEN_START = /^\s*[[;#]/;

export function assertSection(section: SectionName): void {
  if (section === null) return;
  requireArgument(typeof section === 'string', 'section must be a string or null');
  requireArgument(!section.includes(']'), `section must not contain "]": ${section}`);
  requireArgument(!hasLineBreak(section), 'section must not contain a line break');
}

export function assertNamedSection(section: string): void {
  requireArgument(
    typeof section === 'string' && section.length > 0,
    'section must be a non-empty string'
  );
  assertSection(section);
}

export function assertKey(key: string): void {
  requireArgument(typeof key === 'string', 'key must be a string');
  requireArgument(key.trim().length > 0, 'key must not be empty');
  requireArgument(key === key.trim(), `key must not have surrounding whitespace: "${key}"`);
  requireArgument(!KEY_FORBIDDEN.test(key), `key must not contain "=", ":" or a line break: ${key}`);
  requireArgument(!KEY_FORBIDDEN_START.test(key), `key must not start with "[", ";" or "#": ${key}`);
}

export function assertValue(value: string): void {
  requireArgument(typeof value === 'string', 'value must be a string');
  requireArgument(!hasLineBreak(value), 'value must not contain a line break');
}

export function assertIndex(index: number): void {
  requireArgument(
    Number.isInteger(index) && index >= 0,
    `index must be a non-negative integer: ${index}`
  );
}

export function assertCapacity(maxLength: number): void {
  requireArgument(
    Number.isInteger(maxLength) && maxLength > 0,
    `maxLength must be a positive integer: ${maxLength}`
  );
}
