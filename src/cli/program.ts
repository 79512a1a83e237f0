/**
 * INI Store - CLI Program
 *
 * Command definitions for the `inistore` tool. Kept apart from the entry
 * point so tests can drive the commands without spawning a process.
 *
 * @module cli/program
 */

import { Command, Option } from 'commander';
import * as fs from 'fs';
import * as path from 'path';

import { generateDefaultConfig, loadConfig, toIniFileOptions } from '../config.js';
import { withIniFile } from '../store/ini-file.js';
import type { IniFile } from '../store/ini-file.js';
import { isIniStoreError, wrapError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { parseStrictFloat, parseStrictInteger } from '../utils/numbers.js';

export const VERSION = '1.0.0';

const VALUE_TYPES = ['string', 'long', 'int', 'double'] as const;
type ValueType = (typeof VALUE_TYPES)[number];

interface SectionOption {
  section?: string;
}

interface GetOptions extends SectionOption {
  default?: string;
  type: ValueType;
  maxLength?: string;
}

interface SetOptions extends SectionOption {
  type: ValueType;
}

type GlobalOptions = {
  config: string;
  verbose?: boolean;
};

// ============================================================================
// HELPERS
// ============================================================================

function sectionArg(options: SectionOption): string | null {
  return options.section ?? null;
}

/**
 * Report a failure and mark the process as failed
 */
function reportError(error: unknown): void {
  const wrapped = isIniStoreError(error) ? error : wrapError(error);
  console.error(wrapped.toCliOutput());
  process.exitCode = 1;
}

function numberArg(text: string, type: 'long' | 'int' | 'double'): number {
  const value = type === 'double' ? parseStrictFloat(text) : parseStrictInteger(text);
  if (value === null) {
    throw new Error(`"${text}" is not a valid ${type}`);
  }
  return value;
}

function readValue(ini: IniFile, section: string | null, key: string, options: GetOptions): string {
  switch (options.type) {
    case 'long':
      return String(ini.readLong(section, key, numberArg(options.default ?? '0', 'long')));
    case 'int':
      return String(ini.readInt(section, key, numberArg(options.default ?? '0', 'int')));
    case 'double':
      return String(ini.readDouble(section, key, numberArg(options.default ?? '0', 'double')));
    case 'string': {
      const maxLength = options.maxLength === undefined ? undefined : numberArg(options.maxLength, 'int');
      return ini.readString(section, key, options.default ?? '', { maxLength }).value;
    }
  }
}

function writeValue(ini: IniFile, section: string | null, key: string, value: string, type: ValueType): boolean {
  switch (type) {
    case 'long':
      return ini.writeLong(section, key, numberArg(value, 'long'));
    case 'int':
      return ini.writeInt(section, key, numberArg(value, 'int'));
    case 'double':
      return ini.writeDouble(section, key, numberArg(value, 'double'));
    case 'string':
      return ini.writeString(section, key, value);
  }
}

// ============================================================================
// PROGRAM
// ============================================================================

/**
 * Build the `inistore` command tree
 */
export function createProgram(): Command {
  const program = new Command();

  const typeOption = () =>
    new Option('-t, --type <type>', 'Value type').choices(VALUE_TYPES).default('string');

  program
    .name('inistore')
    .description('Read and write INI configuration files')
    .version(VERSION)
    .option('-c, --config <dir>', 'Directory holding .inistorerc.json', process.cwd())
    .option('-v, --verbose', 'Log scans and rewrites');

  /**
   * Run `fn` with a handle on `file` configured from the global options
   */
  const withStore = (file: string, fn: (ini: IniFile) => void): void => {
    try {
      const globals = program.opts<GlobalOptions>();
      const config = loadConfig(globals.config);
      // stdout carries command output only
      logger.configure({
        level: globals.verbose ? 'debug' : config.logLevel,
        destination: 'stderr',
      });
      withIniFile(file, fn, toIniFileOptions(config));
    } catch (error) {
      reportError(error);
    }
  };

  // ==========================================================================
  // GET
  // ==========================================================================

  program
    .command('get <file> <key>')
    .description('Print the value of a key')
    .option('-s, --section <name>', 'Section (omit for global keys)')
    .option('-d, --default <value>', 'Value printed when the key is absent')
    .option('-m, --max-length <n>', 'Buffer capacity; output is cut to n-1 characters')
    .addOption(typeOption())
    .action((file: string, key: string, options: GetOptions) => {
      withStore(file, (ini) => {
        console.log(readValue(ini, sectionArg(options), key, options));
      });
    });

  // ==========================================================================
  // SET
  // ==========================================================================

  program
    .command('set <file> <key> <value>')
    .description('Insert or replace a key')
    .option('-s, --section <name>', 'Section (omit for global keys)')
    .addOption(typeOption())
    .action((file: string, key: string, value: string, options: SetOptions) => {
      withStore(file, (ini) => {
        if (!writeValue(ini, sectionArg(options), key, value, options.type)) {
          reportError(ini.lastError);
        }
      });
    });

  // ==========================================================================
  // RM / RM-SECTION
  // ==========================================================================

  program
    .command('rm <file> <key>')
    .description('Remove a key')
    .option('-s, --section <name>', 'Section (omit for global keys)')
    .action((file: string, key: string, options: SectionOption) => {
      withStore(file, (ini) => {
        ini.removeKey(sectionArg(options), key);
        if (ini.lastError) {
          reportError(ini.lastError);
        }
      });
    });

  program
    .command('rm-section <file> <section>')
    .description('Remove a section and all of its keys')
    .action((file: string, section: string) => {
      withStore(file, (ini) => {
        if (!ini.removeSection(section)) {
          reportError(ini.lastError);
        }
      });
    });

  // ==========================================================================
  // SECTIONS / KEYS
  // ==========================================================================

  program
    .command('sections <file>')
    .description('List section headers in file order')
    .action((file: string) => {
      withStore(file, (ini) => {
        for (const name of ini.sections()) {
          console.log(name);
        }
      });
    });

  program
    .command('keys <file>')
    .description('List keys of a section in file order')
    .option('-s, --section <name>', 'Section (omit for global keys)')
    .action((file: string, options: SectionOption) => {
      withStore(file, (ini) => {
        for (const key of ini.keys(sectionArg(options))) {
          console.log(key);
        }
      });
    });

  // ==========================================================================
  // INIT-CONFIG
  // ==========================================================================

  program
    .command('init-config')
    .description('Write a default .inistorerc.json')
    .option('-f, --force', 'Overwrite an existing file')
    .action((options: { force?: boolean }) => {
      const target = path.join(program.opts<GlobalOptions>().config, '.inistorerc.json');
      if (fs.existsSync(target) && !options.force) {
        console.error(`${target} already exists (use --force to overwrite)`);
        process.exitCode = 1;
        return;
      }
      fs.writeFileSync(target, generateDefaultConfig());
      console.log(`Created ${target}`);
    });

  return program;
}
