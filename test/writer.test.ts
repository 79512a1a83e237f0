/**
 * Tests for rewrite plans
 */

import { describe, it, expect } from 'vitest';
import { joinLines, splitLines } from '../src/parser/lexer.js';
import type { LineFormat, SectionName } from '../src/parser/types.js';
import { removeEntries, removeSectionBlocks, setEntry } from '../src/parser/writer.js';

const LF: LineFormat = { eol: '\n', delimiter: '=' };

function set(content: string, section: SectionName, key: string, value: string, format = LF): string {
  return joinLines(setEntry(splitLines(content), section, key, value, format).lines);
}

describe('setEntry', () => {
  it('should replace an existing entry in place', () => {
    expect(set('[A]\nx=1 ; old\ny=2\n', 'A', 'x', '5')).toBe('[A]\nx=5\ny=2\n');
  });

  it('should write the key as given when replacing a differently-cased key', () => {
    expect(set('[S]\nFOO=1\n', 'S', 'foo', '2')).toBe('[S]\nfoo=2\n');
  });

  it('should insert a new key before the blank line separating sections', () => {
    expect(set('[A]\nx=1\n\n[B]\ny=2\n', 'A', 'z', '3')).toBe('[A]\nx=1\nz=3\n\n[B]\ny=2\n');
  });

  it('should append a new key to the last block of a repeated section', () => {
    expect(set('[A]\nx=1\n[B]\ny=2\n[A]\nz=3\n', 'A', 'w', '4')).toBe(
      '[A]\nx=1\n[B]\ny=2\n[A]\nz=3\nw=4\n'
    );
  });

  it('should append a missing section after a blank line', () => {
    expect(set('[A]\nx=1\n', 'B', 'y', 'v')).toBe('[A]\nx=1\n\n[B]\ny=v\n');
  });

  it('should terminate an unterminated last line before appending', () => {
    expect(set('[A]\nx=1', 'B', 'y', 'v')).toBe('[A]\nx=1\n\n[B]\ny=v\n');
  });

  it('should start an empty file with the section header', () => {
    expect(set('', 'B', 'y', 'v')).toBe('[B]\ny=v\n');
  });

  it('should place global keys before the first header', () => {
    expect(set('; header\n[A]\nx=1\n', null, 'g', '1')).toBe('; header\ng=1\n[A]\nx=1\n');
    expect(set('[A]\nx=1\n', null, 'g', '1')).toBe('g=1\n[A]\nx=1\n');
  });

  it('should quote values that need it', () => {
    expect(set('', 'A', 's', '  padded  ')).toBe('[A]\ns="  padded  "\n');
  });

  it('should use the requested terminator and delimiter for new lines', () => {
    expect(set('[A]\r\nx=1\r\n', 'A', 'y', '2', { eol: '\r\n', delimiter: ':' })).toBe(
      '[A]\r\nx=1\r\ny:2\r\n'
    );
  });

  it('should report no change when the entry already matches', () => {
    const result = setEntry(splitLines('[A]\nx=5\n'), 'A', 'x', '5', LF);
    expect(result.changed).toBe(false);
  });
});

describe('removeEntries', () => {
  it('should remove every entry of the key in the section', () => {
    const result = removeEntries(splitLines('[A]\nx=1\nX=2\ny=3\n[B]\nx=4\n'), 'A', 'x');

    expect(result.changed).toBe(true);
    expect(joinLines(result.lines)).toBe('[A]\ny=3\n[B]\nx=4\n');
  });

  it('should report no change for an absent key', () => {
    expect(removeEntries(splitLines('[A]\nx=1\n'), 'A', 'nope').changed).toBe(false);
  });
});

describe('removeSectionBlocks', () => {
  it('should remove every block of the section with its lines', () => {
    const content = '; top\n[A]\nx=1\n\n[B]\ny=2\n[A]\nz=3\n';
    const result = removeSectionBlocks(splitLines(content), 'A');

    expect(joinLines(result.lines)).toBe('; top\n[B]\ny=2\n');
  });

  it('should report no change for an absent section', () => {
    expect(removeSectionBlocks(splitLines('[A]\nx=1\n'), 'Z').changed).toBe(false);
  });
});
