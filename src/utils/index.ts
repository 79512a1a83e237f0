/**
 * INI Store - Utilities Module
 * @module utils
 *
 * Re-exports all utility functions and types.
 */

// Error handling
export {
  IniStoreError,
  ContractViolationError,
  StoreIOError,
  ConfigError,
  ErrorCodes,
  isIniStoreError,
  wrapError,
  requireArgument,
  type ErrorCode,
} from './errors.js';

// Logging
export {
  Logger,
  logger,
  createLogger,
  isLogLevel,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LoggerOptions,
  type LogDestination,
  type ChildLogger,
} from './logger.js';

// Number parsing and formatting
export {
  parseLeadingInteger,
  parseLeadingFloat,
  parseStrictInteger,
  parseStrictFloat,
  toInt32,
  isInt32,
  formatLong,
  formatDouble,
  type NumberParsing,
} from './numbers.js';

// Path utilities
export {
  resolveStorePath,
  tempPathFor,
  pathExists,
  DEFAULT_TEMP_PREFIX,
} from './paths.js';

// String utilities
export { truncateToCapacity, hasLineBreak, equalsIgnoreCase } from './strings.js';
