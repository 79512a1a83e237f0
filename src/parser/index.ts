/**
 * INI Store - Parser Module
 *
 * Line classification, value codec, read scans and rewrite plans.
 *
 * @module parser
 */

export * from './types.js';
export {
  splitLines,
  joinLines,
  detectLineTerminator,
  classifyLine,
  decodeValue,
  encodeValue,
  needsQuoting,
  createEntryLine,
  createSectionLine,
} from './lexer.js';
export {
  normalizeSection,
  sameSection,
  sectionOwners,
  findEntry,
  listSections,
  listKeys,
  type EntryMatch,
} from './scanner.js';
export { setEntry, removeEntries, removeSectionBlocks, type RewriteResult } from './writer.js';
