/**
 * INI Store - Scanner
 *
 * Linear scans over line records. The current section is tracked as headers
 * go by; a section name that repeats continues the same logical section.
 * Section names match case-sensitively, keys case-insensitively.
 *
 * @module parser/scanner
 */

import { equalsIgnoreCase } from '../utils/strings.js';
import type { EntryLine, LineRecord, SectionName } from './types.js';

/**
 * Map '' to null so both spellings address the global block
 */
export function normalizeSection(section: SectionName): SectionName {
  return section === '' ? null : section;
}

export function sameSection(a: SectionName, b: SectionName): boolean {
  return normalizeSection(a) === normalizeSection(b);
}

/**
 * Section owning each line. A header line is owned by the section it opens.
 */
export function sectionOwners(lines: readonly LineRecord[]): SectionName[] {
  const owners: SectionName[] = [];
  let current: SectionName = null;
  for (const line of lines) {
    if (line.kind === 'section') {
      current = line.name;
    }
    owners.push(current);
  }
  return owners;
}

export interface EntryMatch {
  index: number;
  line: EntryLine;
}

/**
 * First entry for (section, key) in file order
 */
export function findEntry(
  lines: readonly LineRecord[],
  section: SectionName,
  key: string
): EntryMatch | null {
  let current: SectionName = null;
  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];
    if (line.kind === 'section') {
      current = line.name;
    } else if (
      line.kind === 'entry' &&
      sameSection(current, section) &&
      equalsIgnoreCase(line.key, key)
    ) {
      return { index, line };
    }
  }
  return null;
}

/**
 * Every header name, top to bottom, repeats included
 */
export function listSections(lines: readonly LineRecord[]): string[] {
  const names: string[] = [];
  for (const line of lines) {
    if (line.kind === 'section') {
      names.push(line.name);
    }
  }
  return names;
}

/**
 * Keys under a section (or the global block), in file order
 */
export function listKeys(lines: readonly LineRecord[], section: SectionName): string[] {
  const keys: string[] = [];
  let current: SectionName = null;
  for (const line of lines) {
    if (line.kind === 'section') {
      current = line.name;
    } else if (line.kind === 'entry' && sameSection(current, section)) {
      keys.push(line.key);
    }
  }
  return keys;
}
