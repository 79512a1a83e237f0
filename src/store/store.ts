/**
 * INI Store - Store Interface
 * @module store/store
 *
 * The engine's single entry surface. Every call goes back to disk: reads
 * open, scan and close the file; writes stage the new content in a
 * temporary file and rename it over the original.
 *
 * No cross-process locking is done. Callers that write the same file from
 * several places must serialize those writers themselves.
 */

import type { Delimiter, SectionName } from '../parser/types.js';
import type { NumberParsing } from '../utils/numbers.js';

// =============================================================================
// Store Interface
// =============================================================================

export interface IniStore {
  /** Absolute path of the INI file */
  readonly path: string;

  /** False once `close()` has been called */
  readonly isOpen: boolean;

  /**
   * Read a value as text.
   *
   * @returns the decoded value with its length, or the default with length 0
   *          and `found: false` when the key is absent
   */
  readString(
    section: SectionName,
    key: string,
    defaultValue?: string,
    options?: ReadOptions
  ): StringReadResult;

  /** Read a base-10 integer, or `defaultValue` when absent */
  readLong(section: SectionName, key: string, defaultValue: number): number;

  /** Read a signed 32-bit integer, or `defaultValue` when absent */
  readInt(section: SectionName, key: string, defaultValue: number): number;

  /** Read a floating-point number, or `defaultValue` when absent */
  readDouble(section: SectionName, key: string, defaultValue: number): number;

  /**
   * Insert or replace an entry.
   *
   * @returns false if the file could not be rewritten; it is then unchanged
   */
  writeString(section: SectionName, key: string, value: string): boolean;

  writeLong(section: SectionName, key: string, value: number): boolean;

  writeInt(section: SectionName, key: string, value: number): boolean;

  writeDouble(section: SectionName, key: string, value: number): boolean;

  /** Delete a key. Absent keys are not an error; failures are only logged. */
  removeKey(section: SectionName, key: string): void;

  /** Delete a section header and everything under it */
  removeSection(section: string): boolean;

  /** Section name at `index`, or null past the last header */
  enumerateSections(index: number): string | null;

  /** Key name at `index` within `section`, or null past the last key */
  enumerateKeys(section: SectionName, index: number): string | null;

  sections(): IterableIterator<string>;

  keys(section: SectionName): IterableIterator<string>;

  close(): void;
}

// =============================================================================
// Options
// =============================================================================

/** Terminator for lines the store creates */
export type LineTerminatorOption = 'auto' | 'lf' | 'crlf';

export interface IniFileOptions {
  /** Prefix of the staging file used during rewrites (default: '~') */
  tempPrefix?: string;
  /** Line terminator for new lines; 'auto' follows the file (default: 'auto') */
  lineTerminator?: LineTerminatorOption;
  /** Delimiter written between key and value (default: '=') */
  delimiter?: Delimiter;
  /** Numeric read mode (default: 'lenient') */
  numberParsing?: NumberParsing;
}

export interface ReadOptions {
  /**
   * Buffer capacity, terminator included. The returned string is cut to
   * `maxLength - 1` characters.
   */
  maxLength?: number;
}

export interface StringReadResult {
  value: string;
  /** Length of `value`; 0 when the default was used */
  length: number;
  /** Whether the key was present */
  found: boolean;
}

// =============================================================================
// Constants
// =============================================================================

/** Capacity of the scratch read behind numeric reads */
export const NUMERIC_SCRATCH_SIZE = 64;

export const LINE_TERMINATORS: Record<Exclude<LineTerminatorOption, 'auto'>, string> = {
  lf: '\n',
  crlf: '\r\n',
};
