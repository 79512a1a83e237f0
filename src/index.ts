/**
 * INI Store
 *
 * Read and write key/value configuration in INI files: sections, keys,
 * values and comments. Every call re-reads the file; rewrites go through a
 * temporary file that replaces the original in a single rename, and lines
 * that are not touched keep their exact bytes.
 *
 * @packageDocumentation
 * @module ini-store
 *
 * @example Quick Start
 * ```ts
 * import { withIniFile } from 'ini-store';
 *
 * const port = withIniFile('server.ini', (ini) => {
 *   ini.writeLong('http', 'port', 8080);
 *   return ini.readLong('http', 'port', 80);
 * });
 * ```
 *
 * @example Iterating
 * ```ts
 * import { IniFile } from 'ini-store';
 *
 * const ini = new IniFile('server.ini');
 * for (const section of ini.sections()) {
 *   for (const key of ini.keys(section)) {
 *     console.log(section, key, ini.readString(section, key).value);
 *   }
 * }
 * ini.close();
 * ```
 */

// ============================================================================
// STORE
// ============================================================================

export {
  IniFile,
  openIniFile,
  withIniFile,
  NUMERIC_SCRATCH_SIZE,
  LINE_TERMINATORS,
  type IniStore,
  type IniFileOptions,
  type LineTerminatorOption,
  type ReadOptions,
  type StringReadResult,
} from './store/index.js';

// ============================================================================
// PARSER
// ============================================================================

export {
  splitLines,
  joinLines,
  classifyLine,
  decodeValue,
  encodeValue,
  needsQuoting,
  findEntry,
  listSections,
  listKeys,
  setEntry,
  removeEntries,
  removeSectionBlocks,
  type LineRecord,
  type LineKind,
  type SectionLine,
  type EntryLine,
  type SectionName,
  type Delimiter,
  type LineFormat,
  type RewriteResult,
} from './parser/index.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export {
  loadConfig,
  mergeConfig,
  validateConfig,
  toIniFileOptions,
  generateDefaultConfig,
  DEFAULT_CONFIG,
  type IniStoreConfig,
  type LoadConfigOptions,
} from './config.js';

// ============================================================================
// UTILITIES
// ============================================================================

export {
  IniStoreError,
  ContractViolationError,
  StoreIOError,
  ConfigError,
  ErrorCodes,
  isIniStoreError,
  wrapError,
  logger,
  createLogger,
  parseLeadingInteger,
  parseLeadingFloat,
  type ErrorCode,
  type LogLevel,
  type LoggerOptions,
  type LogDestination,
  type NumberParsing,
} from './utils/index.js';
