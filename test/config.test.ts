/**
 * Tests for configuration loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_CONFIG,
  generateDefaultConfig,
  loadConfig,
  mergeConfig,
  toIniFileOptions,
  validateConfig,
} from '../src/config.js';
import { ConfigError } from '../src/utils/errors.js';
import { logger, type LogEntry } from '../src/utils/logger.js';

describe('config', () => {
  let testDir: string;
  let entries: LogEntry[];

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ini-store-config-'));
    entries = [];
    logger.configure({ level: 'debug', output: (entry) => entries.push(entry) });
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('should return defaults when no config exists', () => {
      expect(loadConfig(testDir)).toEqual(DEFAULT_CONFIG);
    });

    it('should merge .inistorerc.json over defaults', () => {
      fs.writeFileSync(
        path.join(testDir, '.inistorerc.json'),
        JSON.stringify({ tempPrefix: '.tmp-', delimiter: ':' })
      );

      expect(loadConfig(testDir)).toEqual({
        ...DEFAULT_CONFIG,
        tempPrefix: '.tmp-',
        delimiter: ':',
      });
    });

    it('should read the iniStore field of package.json', () => {
      fs.writeFileSync(
        path.join(testDir, 'package.json'),
        JSON.stringify({ name: 'demo', iniStore: { numberParsing: 'strict' } })
      );

      expect(loadConfig(testDir).numberParsing).toBe('strict');
    });

    it('should ignore a package.json without an iniStore field', () => {
      fs.writeFileSync(path.join(testDir, 'package.json'), JSON.stringify({ name: 'demo' }));

      expect(loadConfig(testDir)).toEqual(DEFAULT_CONFIG);
    });

    it('should keep defaults for invalid fields and warn', () => {
      fs.writeFileSync(
        path.join(testDir, '.inistorerc.json'),
        JSON.stringify({ delimiter: '->', lineTerminator: 'crlf' })
      );

      const config = loadConfig(testDir);

      expect(config.delimiter).toBe('=');
      expect(config.lineTerminator).toBe('crlf');
      expect(entries.map((entry) => entry.level)).toEqual(['warn']);
    });

    it('should throw ConfigError for invalid fields in strict mode', () => {
      fs.writeFileSync(path.join(testDir, '.inistorerc.json'), JSON.stringify({ delimiter: '->' }));

      expect(() => loadConfig(testDir, { strict: true })).toThrow(ConfigError);
      try {
        loadConfig(testDir, { strict: true });
      } catch (error) {
        expect(error).toMatchObject({
          code: 'CONFIG_INVALID',
          errors: ['delimiter must be one of: =, :'],
        });
      }
    });

    it('should fall back to defaults for malformed JSON unless strict', () => {
      fs.writeFileSync(path.join(testDir, '.inistorerc'), '{ not json');

      expect(loadConfig(testDir)).toEqual(DEFAULT_CONFIG);
      expect(() => loadConfig(testDir, { strict: true })).toThrow(ConfigError);
    });
  });

  describe('validateConfig', () => {
    it('should accept a complete valid config', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [] });
    });

    it('should reject non-objects', () => {
      expect(validateConfig([])).toEqual({
        valid: false,
        errors: ['configuration must be a JSON object'],
      });
    });

    it('should report each invalid field', () => {
      const result = validateConfig({ tempPrefix: 'a/b', numberParsing: 'loose', logLevel: 'trace' });

      expect(result.errors).toEqual([
        'tempPrefix must be a non-empty string without path separators',
        'numberParsing must be one of: lenient, strict',
        'logLevel must be one of: debug, info, warn, error',
      ]);
    });
  });

  describe('helpers', () => {
    it('should merge partial objects', () => {
      expect(mergeConfig({ logLevel: 'debug' })).toEqual({ ...DEFAULT_CONFIG, logLevel: 'debug' });
    });

    it('should generate a config that loads back to the defaults', () => {
      fs.writeFileSync(path.join(testDir, '.inistorerc.json'), generateDefaultConfig());

      expect(loadConfig(testDir, { strict: true })).toEqual(DEFAULT_CONFIG);
    });

    it('should map a config to store options', () => {
      expect(toIniFileOptions(DEFAULT_CONFIG)).toEqual({
        tempPrefix: '~',
        lineTerminator: 'auto',
        delimiter: '=',
        numberParsing: 'lenient',
      });
    });
  });
});
