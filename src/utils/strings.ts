/**
 * INI Store - String Utilities
 * @module utils/strings
 */

const LINE_BREAK = /[\r\n]/;

/**
 * Truncate to what fits in a buffer of `capacity` characters, one of which
 * is reserved for the terminator. A capacity of 1 always yields ''.
 */
export function truncateToCapacity(str: string, capacity: number): string {
  const maxLength = capacity - 1;
  if (str.length <= maxLength) {
    return str;
  }
  // Never split a surrogate pair
  const splitsPair = maxLength > 0 && isHighSurrogate(str.charCodeAt(maxLength - 1));
  return str.slice(0, splitsPair ? maxLength - 1 : maxLength);
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

export function hasLineBreak(str: string): boolean {
  return LINE_BREAK.test(str);
}

/**
 * Case-insensitive comparison used for keys
 */
export function equalsIgnoreCase(a: string, b: string): boolean {
  return a.length === b.length && a.toLowerCase() === b.toLowerCase();
}
