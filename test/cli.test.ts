/**
 * Tests for the inistore command-line tool
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createProgram } from '../src/cli/program.js';
import { logger } from '../src/utils/logger.js';

describe('CLI', () => {
  let testDir: string;
  let iniPath: string;
  let stdout: string[];
  let stderr: string[];

  const run = (...args: string[]): void => {
    createProgram().exitOverride().parse(['node', 'inistore', '-c', testDir, ...args]);
  };

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ini-store-cli-'));
    iniPath = path.join(testDir, 'app.ini');
    stdout = [];
    stderr = [];
    logger.configure({ output: () => {} });
    vi.spyOn(console, 'log').mockImplementation((line: string) => {
      stdout.push(line);
    });
    vi.spyOn(console, 'error').mockImplementation((line: string) => {
      stderr.push(line);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('should set and get a typed value', () => {
    run('set', iniPath, 'port', '8080', '-s', 'http', '-t', 'long');
    run('get', iniPath, 'port', '-s', 'http', '-t', 'long');

    expect(fs.readFileSync(iniPath, 'utf-8')).toBe('[http]\nport=8080\n');
    expect(stdout).toEqual(['8080']);
  });

  it('should print the default for a missing key', () => {
    run('get', iniPath, 'host', '-s', 'http', '-d', 'localhost');

    expect(stdout).toEqual(['localhost']);
  });

  it('should cut string output to the given capacity', () => {
    fs.writeFileSync(iniPath, 'name=abcdef\n');
    run('get', iniPath, 'name', '-m', '4');

    expect(stdout).toEqual(['abc']);
  });

  it('should list sections and keys', () => {
    fs.writeFileSync(iniPath, 'g=1\n[A]\na=1\nb=2\n[B]\n');

    run('sections', iniPath);
    run('keys', iniPath, '-s', 'A');
    run('keys', iniPath);

    expect(stdout).toEqual(['A', 'B', 'a', 'b', 'g']);
  });

  it('should remove keys and sections', () => {
    fs.writeFileSync(iniPath, '[A]\na=1\nb=2\n\n[B]\nc=3\n');

    run('rm', iniPath, 'a', '-s', 'A');
    run('rm-section', iniPath, 'B');

    expect(fs.readFileSync(iniPath, 'utf-8')).toBe('[A]\nb=2\n\n');
  });

  it('should report a contract violation and set the exit code', () => {
    run('set', iniPath, 'bad=key', 'v');

    expect(process.exitCode).toBe(1);
    expect(stderr[0]).toMatch(/^✗ key must not contain "=", ":" or a line break: bad=key/);
    expect(fs.existsSync(iniPath)).toBe(false);
  });

  it('should reject a malformed number', () => {
    run('set', iniPath, 'port', 'eighty', '-t', 'int');

    expect(process.exitCode).toBe(1);
    expect(stderr[0]).toMatch(/^✗ "eighty" is not a valid int/);
  });

  it('should apply options from .inistorerc.json', () => {
    fs.writeFileSync(path.join(testDir, '.inistorerc.json'), JSON.stringify({ delimiter: ':' }));

    run('set', iniPath, 'k', 'v', '-s', 'S');

    expect(fs.readFileSync(iniPath, 'utf-8')).toBe('[S]\nk:v\n');
  });

  it('should write a default config file once', () => {
    run('init-config');
    run('init-config');

    expect(fs.existsSync(path.join(testDir, '.inistorerc.json'))).toBe(true);
    expect(stdout).toEqual([`Created ${path.join(testDir, '.inistorerc.json')}`]);
    expect(process.exitCode).toBe(1);
  });
});
