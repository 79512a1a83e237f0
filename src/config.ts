/**
 * INI Store - Configuration
 *
 * Loads and validates store configuration from:
 * - .inistorerc.json
 * - .inistorerc
 * - package.json "iniStore" field
 *
 * @module config
 */

import * as fs from 'fs';
import * as path from 'path';

import type { Delimiter } from './parser/types.js';
import type { IniFileOptions, LineTerminatorOption } from './store/store.js';
import { ConfigError } from './utils/errors.js';
import { isLogLevel, logger, type LogLevel } from './utils/logger.js';
import type { NumberParsing } from './utils/numbers.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * ini-store configuration schema
 */
export interface IniStoreConfig {
  /** Prefix of the staging file used during rewrites */
  tempPrefix: string;

  /** Terminator for lines the store creates */
  lineTerminator: LineTerminatorOption;

  /** Delimiter written between key and value */
  delimiter: Delimiter;

  /** 'lenient' reads the leading numeral; 'strict' needs the whole value to be a number */
  numberParsing: NumberParsing;

  /** Minimum log level */
  logLevel: LogLevel;
}

export interface LoadConfigOptions {
  /** Throw ConfigError on unreadable or invalid files instead of warning */
  strict?: boolean;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: IniStoreConfig = {
  tempPrefix: '~',
  lineTerminator: 'auto',
  delimiter: '=',
  numberParsing: 'lenient',
  logLevel: 'warn',
};

const LINE_TERMINATOR_VALUES: readonly LineTerminatorOption[] = ['auto', 'lf', 'crlf'];
const DELIMITER_VALUES: readonly Delimiter[] = ['=', ':'];
const NUMBER_PARSING_VALUES: readonly NumberParsing[] = ['lenient', 'strict'];

// ============================================================================
// LOADING
// ============================================================================

/**
 * Configuration file names to search for (in order of priority)
 */
const CONFIG_FILES = ['.inistorerc.json', '.inistorerc'];

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some((candidate) => candidate === value);
}

/**
 * Load configuration from a project root
 *
 * @param projectRoot - Directory to search
 * @returns Merged configuration with defaults
 */
export function loadConfig(projectRoot: string, options: LoadConfigOptions = {}): IniStoreConfig {
  const resolvedRoot = path.resolve(projectRoot);

  for (const configFile of CONFIG_FILES) {
    const configPath = path.join(resolvedRoot, configFile);
    if (fs.existsSync(configPath)) {
      return fromSource(configFile, () => JSON.parse(fs.readFileSync(configPath, 'utf-8')), options);
    }
  }

  const packageJsonPath = path.join(resolvedRoot, 'package.json');
  if (fs.existsSync(packageJsonPath)) {
    return fromSource(
      'package.json',
      () => {
        const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
        return isRecord(packageJson) ? packageJson.iniStore : undefined;
      },
      options
    );
  }

  return { ...DEFAULT_CONFIG };
}

function fromSource(source: string, read: () => unknown, options: LoadConfigOptions): IniStoreConfig {
  let raw: unknown;
  try {
    raw = read();
  } catch (error) {
    const message = `Failed to load ${source}: ${error instanceof Error ? error.message : String(error)}`;
    if (options.strict) {
      throw new ConfigError(message, { cause: error instanceof Error ? error : undefined });
    }
    logger.warn(message);
    return { ...DEFAULT_CONFIG };
  }

  if (raw === undefined) {
    return { ...DEFAULT_CONFIG };
  }

  const { valid, errors } = validateConfig(raw);
  if (!valid) {
    if (options.strict) {
      throw new ConfigError(`Invalid configuration in ${source}`, { errors });
    }
    logger.warn('Ignoring invalid configuration fields', { source, errors });
  }

  return mergeConfig(isRecord(raw) ? raw : {});
}

/**
 * Merge user config with defaults. Fields with invalid values keep their default.
 */
export function mergeConfig(userConfig: RawConfig): IniStoreConfig {
  const { tempPrefix, lineTerminator, delimiter, numberParsing, logLevel } = userConfig;
  return {
    tempPrefix: isTempPrefix(tempPrefix) ? tempPrefix : DEFAULT_CONFIG.tempPrefix,
    lineTerminator: isOneOf(LINE_TERMINATOR_VALUES, lineTerminator)
      ? lineTerminator
      : DEFAULT_CONFIG.lineTerminator,
    delimiter: isOneOf(DELIMITER_VALUES, delimiter) ? delimiter : DEFAULT_CONFIG.delimiter,
    numberParsing: isOneOf(NUMBER_PARSING_VALUES, numberParsing)
      ? numberParsing
      : DEFAULT_CONFIG.numberParsing,
    logLevel: isLogLevel(logLevel) ? logLevel : DEFAULT_CONFIG.logLevel,
  };
}

function isTempPrefix(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0 && !/[\\/]/.test(value);
}

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Validate a configuration object as read from disk
 */
export function validateConfig(config: unknown): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!isRecord(config)) {
    return { valid: false, errors: ['configuration must be a JSON object'] };
  }

  if (config.tempPrefix !== undefined && !isTempPrefix(config.tempPrefix)) {
    errors.push('tempPrefix must be a non-empty string without path separators');
  }

  if (config.lineTerminator !== undefined && !isOneOf(LINE_TERMINATOR_VALUES, config.lineTerminator)) {
    errors.push(`lineTerminator must be one of: ${LINE_TERMINATOR_VALUES.join(', ')}`);
  }

  if (config.delimiter !== undefined && !isOneOf(DELIMITER_VALUES, config.delimiter)) {
    errors.push(`delimiter must be one of: ${DELIMITER_VALUES.join(', ')}`);
  }

  if (config.numberParsing !== undefined && !isOneOf(NUMBER_PARSING_VALUES, config.numberParsing)) {
    errors.push(`numberParsing must be one of: ${NUMBER_PARSING_VALUES.join(', ')}`);
  }

  if (config.logLevel !== undefined && !isLogLevel(config.logLevel)) {
    errors.push('logLevel must be one of: debug, info, warn, error');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Store options carried by a configuration
 */
export function toIniFileOptions(config: IniStoreConfig): IniFileOptions {
  return {
    tempPrefix: config.tempPrefix,
    lineTerminator: config.lineTerminator,
    delimiter: config.delimiter,
    numberParsing: config.numberParsing,
  };
}

/**
 * Generate a default .inistorerc.json
 */
export function generateDefaultConfig(): string {
  return JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n';
}
