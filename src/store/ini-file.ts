/**
 * INI Store - File-backed Store
 * @module store/ini-file
 *
 * Synchronous INI store bound to one file path.
 */

import { closeSync, openSync, readFileSync, renameSync, rmSync, writeSync } from 'node:fs';

import { detectLineTerminator, splitLines } from '../parser/lexer.js';
import { findEntry, listKeys, listSections, normalizeSection } from '../parser/scanner.js';
import { removeEntries, removeSectionBlocks, setEntry } from '../parser/writer.js';
import type { Delimiter, LineRecord, SectionName } from '../parser/types.js';
import { ContractViolationError, StoreIOError, requireArgument } from '../utils/errors.js';
import { logger, type ChildLogger } from '../utils/logger.js';
import {
  formatDouble,
  formatLong,
  isInt32,
  parseLeadingFloat,
  parseLeadingInteger,
  parseStrictFloat,
  parseStrictInteger,
  toInt32,
  type NumberParsing,
} from '../utils/numbers.js';
import { DEFAULT_TEMP_PREFIX, pathExists, resolveStorePath, tempPathFor } from '../utils/paths.js';
import { truncateToCapacity } from '../utils/strings.js';
import {
  type IniFileOptions,
  type IniStore,
  type LineTerminatorOption,
  type ReadOptions,
  type StringReadResult,
  LINE_TERMINATORS,
  NUMERIC_SCRATCH_SIZE,
} from './store.js';
import {
  assertCapacity,
  assertIndex,
  assertKey,
  assertNamedSection,
  assertSection,
  assertValue,
} from './validation.js';

type LoadResult =
  | { status: 'ok'; lines: LineRecord[] }
  | { status: 'missing' }
  | { status: 'failed'; error: StoreIOError };

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function causeOf(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

// =============================================================================
// IniFile
// =============================================================================

/**
 * Store handle for one INI file.
 *
 * A constructed instance is usable until `close()`; every call after that
 * throws `HANDLE_CLOSED`. The handle caches nothing, so separate handles on
 * the same path never see stale content from each other.
 *
 * @example
 * ```ts
 * const ini = new IniFile('settings.ini');
 * ini.writeLong('Example', 'foo', 42);
 * ini.readLong('Example', 'foo', -1); // 42
 * ini.close();
 * ```
 */
export class IniFile implements IniStore {
  readonly path: string;

  private open = true;
  private failure: StoreIOError | null = null;
  private readonly tempPrefix: string;
  private readonly lineTerminator: LineTerminatorOption;
  private readonly delimiter: Delimiter;
  private readonly numberParsing: NumberParsing;
  private readonly log: ChildLogger;

  constructor(path: string, options: IniFileOptions = {}) {
    requireArgument(typeof path === 'string' && path.length > 0, 'path must be a non-empty string');

    const tempPrefix = options.tempPrefix ?? DEFAULT_TEMP_PREFIX;
    requireArgument(
      tempPrefix.length > 0 && !/[\\/]/.test(tempPrefix),
      `tempPrefix must be a non-empty file name prefix: "${tempPrefix}"`
    );

    this.path = resolveStorePath(path);
    this.tempPrefix = tempPrefix;
    this.lineTerminator = options.lineTerminator ?? 'auto';
    this.delimiter = options.delimiter ?? '=';
    this.numberParsing = options.numberParsing ?? 'lenient';
    this.log = logger.child({ path: this.path });
  }

  get isOpen(): boolean {
    return this.open;
  }

  /**
   * Last operational failure (unreadable file, failed commit), or null.
   * Cleared at the start of every write.
   */
  get lastError(): StoreIOError | null {
    return this.failure;
  }

  /** Whether the file currently exists on disk */
  exists(): boolean {
    this.assertOpen();
    return pathExists(this.path);
  }

  close(): void {
    this.assertOpen();
    this.open = false;
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  readString(
    section: SectionName,
    key: string,
    defaultValue = '',
    options: ReadOptions = {}
  ): StringReadResult {
    this.assertOpen();
    assertSection(section);
    assertKey(key);
    if (options.maxLength !== undefined) {
      assertCapacity(options.maxLength);
    }

    const fit = (text: string): string =>
      options.maxLength === undefined ? text : truncateToCapacity(text, options.maxLength);

    const lines = this.linesForRead();
    const match = lines && findEntry(lines, section, key);

    if (!match) {
      this.log.debug('Key not found, using default', { section, key });
      return { value: fit(defaultValue), length: 0, found: false };
    }

    const value = fit(match.line.value);
    return { value, length: value.length, found: true };
  }

  readLong(section: SectionName, key: string, defaultValue: number): number {
    return this.readNumber(section, key, 'integer') ?? defaultValue;
  }

  readInt(section: SectionName, key: string, defaultValue: number): number {
    const value = this.readNumber(section, key, 'integer');
    return value === null ? defaultValue : toInt32(value);
  }

  readDouble(section: SectionName, key: string, defaultValue: number): number {
    return this.readNumber(section, key, 'float') ?? defaultValue;
  }

  /**
   * Numeric read through a bounded scratch string. Null means "use the
   * default": the key is absent or empty, or strict parsing rejected it.
   */
  private readNumber(section: SectionName, key: string, kind: 'integer' | 'float'): number | null {
    const { value, length } = this.readString(section, key, '', {
      maxLength: NUMERIC_SCRATCH_SIZE,
    });
    if (length === 0) {
      return null;
    }

    if (this.numberParsing === 'lenient') {
      return kind === 'integer' ? parseLeadingInteger(value) : parseLeadingFloat(value);
    }

    const parsed = kind === 'integer' ? parseStrictInteger(value) : parseStrictFloat(value);
    if (parsed === null) {
      this.log.warn('Value is not a number, using default', { section, key, value });
    }
    return parsed;
  }

  // ===========================================================================
  // Enumeration
  // ===========================================================================

  enumerateSections(index: number): string | null {
    this.assertOpen();
    assertIndex(index);

    const lines = this.linesForRead();
    return (lines && listSections(lines)[index]) ?? null;
  }

  enumerateKeys(section: SectionName, index: number): string | null {
    this.assertOpen();
    assertSection(section);
    assertIndex(index);

    const lines = this.linesForRead();
    return (lines && listKeys(lines, section)[index]) ?? null;
  }

  *sections(): IterableIterator<string> {
    for (let index = 0; ; index++) {
      const name = this.enumerateSections(index);
      if (name === null) return;
      yield name;
    }
  }

  *keys(section: SectionName): IterableIterator<string> {
    for (let index = 0; ; index++) {
      const name = this.enumerateKeys(section, index);
      if (name === null) return;
      yield name;
    }
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  writeString(section: SectionName, key: string, value: string): boolean {
    this.assertOpen();
    assertSection(section);
    assertKey(key);
    assertValue(value);
    this.failure = null;

    const loaded = this.load();
    if (loaded.status === 'failed') {
      return this.fail(loaded.error, 'write');
    }

    const lines = loaded.status === 'ok' ? loaded.lines : [];
    const eol = this.eolFor(lines);
    const result = setEntry(lines, section, key, value, { eol, delimiter: this.delimiter });

    if (!result.changed) {
      this.log.debug('Entry already up to date', { section, key });
      return true;
    }
    return this.commit(result.lines, 'write', { section: normalizeSection(section), key });
  }

  writeLong(section: SectionName, key: string, value: number): boolean {
    requireArgument(Number.isSafeInteger(value), `writeLong needs a safe integer: ${value}`);
    return this.writeString(section, key, formatLong(value));
  }

  writeInt(section: SectionName, key: string, value: number): boolean {
    requireArgument(isInt32(value), `writeInt needs a 32-bit integer: ${value}`);
    return this.writeString(section, key, formatLong(value));
  }

  writeDouble(section: SectionName, key: string, value: number): boolean {
    requireArgument(typeof value === 'number', 'writeDouble needs a number');
    return this.writeString(section, key, formatDouble(value));
  }

  removeKey(section: SectionName, key: string): void {
    this.assertOpen();
    assertSection(section);
    assertKey(key);
    this.failure = null;

    const loaded = this.load();
    if (loaded.status === 'missing') {
      return;
    }
    if (loaded.status === 'failed') {
      this.fail(loaded.error, 'removeKey');
      return;
    }

    const result = removeEntries(loaded.lines, section, key);
    if (result.changed) {
      this.commit(result.lines, 'removeKey', { section: normalizeSection(section), key });
    }
  }

  removeSection(section: string): boolean {
    this.assertOpen();
    assertNamedSection(section);
    this.failure = null;

    const loaded = this.load();
    if (loaded.status === 'missing') {
      return true;
    }
    if (loaded.status === 'failed') {
      return this.fail(loaded.error, 'removeSection');
    }

    const result = removeSectionBlocks(loaded.lines, section);
    if (!result.changed) {
      return true;
    }
    return this.commit(result.lines, 'removeSection', { section });
  }

  // ===========================================================================
  // File access
  // ===========================================================================

  private assertOpen(): void {
    if (!this.open) {
      throw new ContractViolationError('HANDLE_CLOSED', `IniFile for ${this.path} is closed`);
    }
  }

  private load(): LoadResult {
    this.log.debug('Scanning file');
    try {
      return { status: 'ok', lines: splitLines(readFileSync(this.path, 'utf-8')) };
    } catch (error) {
      if (isMissingFileError(error)) {
        return { status: 'missing' };
      }
      return {
        status: 'failed',
        error: new StoreIOError('READ_FAILED', `Failed to read ${this.path}`, {
          path: this.path,
          cause: causeOf(error),
        }),
      };
    }
  }

  /**
   * Lines for a query. A missing file reads as empty; an unreadable one is
   * recorded and also reads as empty so the caller gets its default.
   */
  private linesForRead(): LineRecord[] | null {
    const loaded = this.load();
    if (loaded.status === 'ok') {
      return loaded.lines;
    }
    if (loaded.status === 'failed') {
      this.failure = loaded.error;
      this.log.warn('File unreadable, using defaults', loaded.error.toJSON());
    }
    return null;
  }

  private eolFor(lines: readonly LineRecord[]): string {
    if (this.lineTerminator !== 'auto') {
      return LINE_TERMINATORS[this.lineTerminator];
    }
    return detectLineTerminator(lines) ?? LINE_TERMINATORS.lf;
  }

  /**
   * Stage `lines` in the temporary file, then rename it over the original.
   * The rename is the only step that touches the original.
   */
  private commit(lines: readonly LineRecord[], action: string, context: Record<string, unknown>): boolean {
    const tempFile = tempPathFor(this.path, this.tempPrefix);
    let fd: number | null = null;

    try {
      fd = openSync(tempFile, 'w');
      for (const line of lines) {
        writeSync(fd, line.text + line.eol);
      }
      closeSync(fd);
      fd = null;
      renameSync(tempFile, this.path);
    } catch (error) {
      this.discardTemp(tempFile, fd);
      return this.fail(
        new StoreIOError('WRITE_FAILED', `Failed to rewrite ${this.path}`, {
          path: this.path,
          cause: causeOf(error),
          technical: { tempFile },
        }),
        action
      );
    }

    this.log.info('File rewritten', { action, ...context, lines: lines.length });
    return true;
  }

  private discardTemp(tempFile: string, fd: number | null): void {
    try {
      if (fd !== null) {
        closeSync(fd);
      }
      rmSync(tempFile, { force: true });
    } catch (cleanupError) {
      this.log.warn('Could not remove temporary file', {
        tempFile,
        error: causeOf(cleanupError)?.message ?? String(cleanupError),
      });
    }
  }

  private fail(error: StoreIOError, action: string): false {
    this.failure = error;
    this.log.error('Operation failed, file left unchanged', { action, ...error.toJSON() });
    return false;
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Open a store handle for `path`
 */
export function openIniFile(path: string, options?: IniFileOptions): IniFile {
  return new IniFile(path, options);
}

/**
 * Run `fn` with a handle that is closed on every exit path
 */
export function withIniFile<T>(path: string, fn: (ini: IniFile) => T, options?: IniFileOptions): T {
  const ini = new IniFile(path, options);
  try {
    return fn(ini);
  } finally {
    if (ini.isOpen) {
      ini.close();
    }
  }
}
