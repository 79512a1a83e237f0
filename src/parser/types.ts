/**
 * INI Store - Parser Types
 *
 * Line records produced by a scan. They live only for the duration of one
 * operation; nothing is cached between calls.
 *
 * @module parser/types
 */

// ============================================================================
// LINE RECORDS
// ============================================================================

/**
 * Classification of one physical line
 */
export type LineKind = 'section' | 'entry' | 'comment' | 'blank' | 'other';

interface LineBase {
  /** Line content without its terminator, exactly as read */
  text: string;
  /** The terminator that followed the line: '\n', '\r\n', or '' on a final unterminated line */
  eol: string;
}

/** `[name]` header */
export interface SectionLine extends LineBase {
  kind: 'section';
  name: string;
}

/** `key=value` or `key:value` */
export interface EntryLine extends LineBase {
  kind: 'entry';
  /** Trimmed key as written */
  key: string;
  /** Decoded value: trimmed, unquoted, trailing comment removed */
  value: string;
}

export interface CommentLine extends LineBase {
  kind: 'comment';
}

export interface BlankLine extends LineBase {
  kind: 'blank';
}

/** Text with no header brackets and no delimiter; kept verbatim, never matched */
export interface OtherLine extends LineBase {
  kind: 'other';
}

export type LineRecord = SectionLine | EntryLine | CommentLine | BlankLine | OtherLine;

// ============================================================================
// ADDRESSING
// ============================================================================

/**
 * Section selector. `null` (or '') addresses the global block that precedes
 * the first header.
 */
export type SectionName = string | null;

/** Delimiter written between key and value */
export type Delimiter = '=' | ':';

/**
 * Formatting choices for lines the writer creates
 */
export interface LineFormat {
  /** Terminator for new lines */
  eol: string;
  delimiter: Delimiter;
}
