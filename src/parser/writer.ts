/**
 * INI Store - Rewrite Plans
 *
 * Each function takes the current lines and returns the lines to commit.
 * Lines that are not targeted are carried over as the same records, so
 * their bytes (terminators included) are unchanged. The caller decides
 * whether and how to commit the result.
 *
 * @module parser/writer
 */

import { equalsIgnoreCase } from '../utils/strings.js';
import { createEntryLine, createSectionLine } from './lexer.js';
import { findEntry, normalizeSection, sameSection, sectionOwners } from './scanner.js';
import type { LineFormat, LineRecord, SectionName } from './types.js';

export interface RewriteResult {
  lines: LineRecord[];
  /** False when the result is identical to the input */
  changed: boolean;
}

// ============================================================================
// SET
// ============================================================================

/**
 * Set (section, key) to `value`.
 *
 * - An existing entry is replaced in place (the first in file order).
 * - A new key goes after the last non-blank line of the section's last block,
 *   so blank separators stay in front of the next header.
 * - A new section is appended at end of file, after a blank separator line.
 */
export function setEntry(
  lines: readonly LineRecord[],
  section: SectionName,
  key: string,
  value: string,
  format: LineFormat
): RewriteResult {
  const target = normalizeSection(section);
  const match = findEntry(lines, target, key);

  if (match) {
    const replacement = createEntryLine(key, value, format.delimiter, match.line.eol);
    if (replacement.text === match.line.text) {
      return { lines: [...lines], changed: false };
    }
    const next = [...lines];
    next[match.index] = replacement;
    return { lines: next, changed: true };
  }

  const entry = createEntryLine(key, value, format.delimiter, format.eol);
  const insertAt = findInsertionPoint(lines, target);

  if (insertAt === null) {
    return { lines: appendSection(lines, target ?? '', entry, format.eol), changed: true };
  }

  const next = [...lines];
  terminatePrevious(next, insertAt, format.eol);
  next.splice(insertAt, 0, entry);
  return { lines: next, changed: true };
}

/**
 * Index at which a new entry for `section` goes, or null if the section has
 * no header yet. The global block always exists, possibly empty.
 */
function findInsertionPoint(lines: readonly LineRecord[], section: SectionName): number | null {
  let blockStart = -1;
  let blockEnd = lines.length;

  if (section === null) {
    const firstHeader = lines.findIndex((line) => line.kind === 'section');
    blockEnd = firstHeader === -1 ? lines.length : firstHeader;
  } else {
    for (let i = lines.length - 1; i >= 0; i--) {
      const line = lines[i];
      if (line.kind === 'section' && line.name === section) {
        blockStart = i;
        break;
      }
    }
    if (blockStart === -1) {
      return null;
    }
    for (let i = blockStart + 1; i < lines.length; i++) {
      if (lines[i].kind === 'section') {
        blockEnd = i;
        break;
      }
    }
  }

  let last = blockStart;
  for (let i = blockStart + 1; i < blockEnd; i++) {
    if (lines[i].kind !== 'blank') {
      last = i;
    }
  }
  return last + 1;
}

function appendSection(
  lines: readonly LineRecord[],
  section: string,
  entry: LineRecord,
  eol: string
): LineRecord[] {
  const next = [...lines];
  terminatePrevious(next, next.length, eol);
  const last = next[next.length - 1];
  if (last !== undefined && last.kind !== 'blank') {
    next.push({ kind: 'blank', text: '', eol });
  }
  next.push(createSectionLine(section, eol), entry);
  return next;
}

/**
 * Give the line before `index` a terminator if it is the unterminated last line
 */
function terminatePrevious(lines: LineRecord[], index: number, eol: string): void {
  const previous = lines[index - 1];
  if (index > 0 && previous !== undefined && previous.eol === '') {
    lines[index - 1] = { ...previous, eol };
  }
}

// ============================================================================
// REMOVE
// ============================================================================

/**
 * Drop every entry for (section, key)
 */
export function removeEntries(
  lines: readonly LineRecord[],
  section: SectionName,
  key: string
): RewriteResult {
  const owners = sectionOwners(lines);
  const next = lines.filter(
    (line, i) =>
      !(line.kind === 'entry' && sameSection(owners[i], section) && equalsIgnoreCase(line.key, key))
  );
  return { lines: next, changed: next.length !== lines.length };
}

/**
 * Drop every header named `section` and all lines under each one
 */
export function removeSectionBlocks(lines: readonly LineRecord[], section: string): RewriteResult {
  const owners = sectionOwners(lines);
  const next = lines.filter((_, i) => owners[i] !== section);
  return { lines: next, changed: next.length !== lines.length };
}
