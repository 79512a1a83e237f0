/**
 * INI Store - Store Module
 * @module store
 *
 * The engine's public surface: the store contract and its file-backed handle.
 */

// Store interface
export {
  type IniStore,
  type IniFileOptions,
  type LineTerminatorOption,
  type ReadOptions,
  type StringReadResult,
  NUMERIC_SCRATCH_SIZE,
  LINE_TERMINATORS,
} from './store.js';

// File-backed implementation
export { IniFile, openIniFile, withIniFile } from './ini-file.js';
