/**
 * INI Store - Line Lexer
 *
 * Splits file content into line records and converts values between their
 * on-disk and decoded forms.
 *
 * @module parser/lexer
 */

import type { Delimiter, EntryLine, LineRecord, SectionLine } from './types.js';

const DELIMITER = /[=:]/;
const COMMENT_START = /[;#]/;
const NEEDS_QUOTES = /["#;]/;

// ============================================================================
// SPLITTING
// ============================================================================

/**
 * Split content into classified lines. Each record keeps its own terminator,
 * so joining `text + eol` of every record reproduces the input exactly.
 */
export function splitLines(content: string): LineRecord[] {
  const lines: LineRecord[] = [];
  let start = 0;

  while (start < content.length) {
    const newline = content.indexOf('\n', start);
    if (newline === -1) {
      lines.push(classifyLine(content.slice(start), ''));
      break;
    }

    const hasCarriageReturn = newline > start && content[newline - 1] === '\r';
    const text = content.slice(start, hasCarriageReturn ? newline - 1 : newline);
    lines.push(classifyLine(text, hasCarriageReturn ? '\r\n' : '\n'));
    start = newline + 1;
  }

  return lines;
}

export function joinLines(lines: readonly LineRecord[]): string {
  let content = '';
  for (const line of lines) {
    content += line.text + line.eol;
  }
  return content;
}

/**
 * First terminator used in the file, or null when no line is terminated
 */
export function detectLineTerminator(lines: readonly LineRecord[]): string | null {
  for (const line of lines) {
    if (line.eol) return line.eol;
  }
  return null;
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

export function classifyLine(text: string, eol: string): LineRecord {
  const trimmed = text.trim();

  if (trimmed === '') {
    return { kind: 'blank', text, eol };
  }

  const first = trimmed[0];
  if (first === ';' || first === '#') {
    return { kind: 'comment', text, eol };
  }

  if (first === '[') {
    const close = trimmed.indexOf(']', 1);
    if (close !== -1) {
      return { kind: 'section', name: trimmed.slice(1, close), text, eol };
    }
  }

  const delimiterAt = trimmed.search(DELIMITER);
  if (delimiterAt <= 0) {
    return { kind: 'other', text, eol };
  }

  const key = trimmed.slice(0, delimiterAt).trimEnd();
  return {
    kind: 'entry',
    key,
    value: decodeValue(trimmed.slice(delimiterAt + 1)),
    text,
    eol,
  };
}

// ============================================================================
// VALUES
// ============================================================================

/**
 * Decode the raw text after the delimiter.
 *
 * A value opening with `"` runs to the next unescaped `"`, with `\"` and `\\`
 * unescaped; anything after the closing quote is ignored. An unquoted value
 * stops at the first `;` or `#` and is trimmed.
 */
export function decodeValue(raw: string): string {
  const text = raw.trimStart();

  if (text.startsWith('"')) {
    let value = '';
    for (let i = 1; i < text.length; i++) {
      const ch = text[i];
      const next = text[i + 1];
      if (ch === '\\' && (next === '"' || next === '\\')) {
        value += next;
        i++;
        continue;
      }
      if (ch === '"') {
        return value;
      }
      value += ch;
    }
    // unterminated quote: keep the rest of the line
    return value.trimEnd();
  }

  const commentAt = text.search(COMMENT_START);
  return (commentAt === -1 ? text : text.slice(0, commentAt)).trim();
}

/**
 * Whether a value must be quoted to read back unchanged
 */
export function needsQuoting(value: string): boolean {
  return value !== value.trim() || NEEDS_QUOTES.test(value);
}

/**
 * Encode a value for disk, quoting and escaping only when required
 */
export function encodeValue(value: string): string {
  if (!needsQuoting(value)) {
    return value;
  }
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

// ============================================================================
// LINE CONSTRUCTION
// ============================================================================

export function createEntryLine(
  key: string,
  value: string,
  delimiter: Delimiter,
  eol: string
): EntryLine {
  return { kind: 'entry', key, value, text: `${key}${delimiter}${encodeValue(value)}`, eol };
}

export function createSectionLine(name: string, eol: string): SectionLine {
  return { kind: 'section', name, text: `[${name}]`, eol };
}
