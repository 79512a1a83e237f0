/**
 * Tests for read scans over line records
 */

import { describe, it, expect } from 'vitest';
import { splitLines } from '../src/parser/lexer.js';
import {
  findEntry,
  listKeys,
  listSections,
  sameSection,
  sectionOwners,
} from '../src/parser/scanner.js';

const content = ['top=1', '[A]', 'x=1', '[B]', 'y=2', '[A]', 'z=3', 'X=dup', ''].join('\n');

describe('Scanner', () => {
  const lines = splitLines(content);

  describe('findEntry', () => {
    it('should find a key in its section', () => {
      expect(findEntry(lines, 'A', 'x')).toMatchObject({ index: 2, line: { value: '1' } });
    });

    it('should match keys case-insensitively and return the first match', () => {
      expect(findEntry(lines, 'A', 'X')?.index).toBe(2);
    });

    it('should continue a section across repeated headers', () => {
      expect(findEntry(lines, 'A', 'z')?.index).toBe(6);
    });

    it('should match section names case-sensitively', () => {
      expect(findEntry(lines, 'a', 'x')).toBeNull();
    });

    it('should not find a key under another section', () => {
      expect(findEntry(lines, 'B', 'x')).toBeNull();
    });

    it('should address global keys with null or an empty name', () => {
      expect(findEntry(lines, null, 'top')?.index).toBe(0);
      expect(findEntry(lines, '', 'top')?.index).toBe(0);
    });
  });

  describe('listSections', () => {
    it('should list headers in order, repeats included', () => {
      expect(listSections(lines)).toEqual(['A', 'B', 'A']);
    });
  });

  describe('listKeys', () => {
    it('should list keys of every block of a section', () => {
      expect(listKeys(lines, 'A')).toEqual(['x', 'z', 'X']);
    });

    it('should list global keys for null', () => {
      expect(listKeys(lines, null)).toEqual(['top']);
    });

    it('should return nothing for an unknown section', () => {
      expect(listKeys(lines, 'C')).toEqual([]);
    });
  });

  describe('sectionOwners', () => {
    it('should assign each line to the section it belongs to', () => {
      expect(sectionOwners(lines)).toEqual([null, 'A', 'A', 'B', 'B', 'A', 'A', 'A']);
    });
  });

  describe('sameSection', () => {
    it('should treat null and empty string as the global section', () => {
      expect(sameSection(null, '')).toBe(true);
      expect(sameSection('A', 'a')).toBe(false);
    });
  });
});
