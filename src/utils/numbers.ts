/**
 * INI Store - Number Parsing and Formatting
 * @module utils/numbers
 *
 * Values are stored as text. Lenient parsing reads the leading numeral and
 * ignores whatever follows it ("42px" reads as 42, "abc" as 0), which keeps
 * hand-edited files with trailing junk readable. Strict parsing rejects
 * anything that is not entirely a number.
 */

export type NumberParsing = 'lenient' | 'strict';

const LEADING_INTEGER = /^[+-]?\d+/;
const LEADING_NAN = /^[+-]?nan/i;
const LEADING_INFINITY = /^([+-]?)inf/i;

const STRICT_INTEGER = /^[+-]?\d+$/;
const STRICT_FLOAT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const STRICT_SPECIAL = /^[+-]?(?:nan|inf(?:inity)?)$/i;

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/**
 * Clamp to the range a number holds exactly, as `strtol` clamps to LONG_MAX
 */
function clampToSafe(value: number): number {
  return Math.min(Math.max(value, Number.MIN_SAFE_INTEGER), Number.MAX_SAFE_INTEGER);
}

/**
 * Parse the leading base-10 integer of a string.
 * Leading whitespace is skipped; no numeral yields 0. Results beyond
 * `Number.MAX_SAFE_INTEGER` in either direction are clamped to it.
 */
export function parseLeadingInteger(text: string): number {
  const match = LEADING_INTEGER.exec(text.trimStart());
  return match ? clampToSafe(Number.parseInt(match[0], 10)) : 0;
}

/**
 * Parse the leading decimal or exponential float of a string.
 * Accepts `nan` and `inf`/`infinity` spellings; no numeral yields 0.
 */
export function parseLeadingFloat(text: string): number {
  const trimmed = text.trimStart();

  if (LEADING_NAN.test(trimmed)) {
    return Number.NaN;
  }

  const infinity = LEADING_INFINITY.exec(trimmed);
  if (infinity) {
    return infinity[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }

  const value = Number.parseFloat(trimmed);
  return Number.isNaN(value) ? 0 : value;
}

/**
 * Parse an integer that must span the whole trimmed string
 */
export function parseStrictInteger(text: string): number | null {
  const trimmed = text.trim();
  return STRICT_INTEGER.test(trimmed) ? clampToSafe(Number.parseInt(trimmed, 10)) : null;
}

/**
 * Parse a float that must span the whole trimmed string
 */
export function parseStrictFloat(text: string): number | null {
  const trimmed = text.trim();
  if (STRICT_FLOAT.test(trimmed) || STRICT_SPECIAL.test(trimmed)) {
    return parseLeadingFloat(trimmed);
  }
  return null;
}

/**
 * Narrow to a signed 32-bit integer by wrap-around
 */
export function toInt32(value: number): number {
  return Number.isFinite(value) ? value | 0 : 0;
}

export function isInt32(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;
}

/**
 * Plain base-10 integer text. Only safe integers print without an exponent
 * or rounding.
 */
export function formatLong(value: number): string {
  return String(value);
}

/**
 * Exponential text with as many digits as needed to read back the same value
 */
export function formatDouble(value: number): string {
  // toExponential drops the sign of -0
  return Object.is(value, -0) ? '-0e+0' : value.toExponential();
}
