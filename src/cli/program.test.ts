// Tests for the preflight program: option parsing and command wiring

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createProgram } from './program.js';
import { LogLevel, getLogger } from '../core/logger.js';
import { completeHypershellTree, createTree, removeTree } from '../test-utils/fixture-tree.js';

describe('preflight program', () => {
  let root: string | undefined;
  let stdout: string[];
  let logged: string[];

  beforeEach(() => {
    stdout = [];
    logged = [];
    vi.spyOn(process.stdout, 'write').mockImplementation(chunk => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
      logged.push(String(line));
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation(code => {
      throw new Error(`exit ${String(code)}`);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    getLogger().setLevel(LogLevel.WARN);
    if (root) {
      removeTree(root);
      root = undefined;
    }
  });

  describe('check', () => {
    it('should set exit code 0 for a complete tree', () => {
      root = createTree(completeHypershellTree());

      createProgram().parse(['--root', root], { from: 'user' });

      expect(process.exitCode).toBe(0);
      expect(stdout).toContain('Rooted Hypershell Architecture Validation\n');
      expect(stdout).toContain('✓ All validation checks passed!\n');
    });

    it('should set exit code 1 when a component fails', () => {
      const files = completeHypershellTree();
      delete files['hypershell.lua'];
      root = createTree(files);

      createProgram().parse(['-r', root], { from: 'user' });

      expect(process.exitCode).toBe(1);
      expect(stdout).toContain(`${'Hypershell'.padEnd(20)}: ✗ FAIL\n`);
    });

    it('should print only the JSON report with --json', () => {
      root = createTree(completeHypershellTree());

      createProgram().parse(['--root', root, '--json'], { from: 'user' });

      expect(stdout).toHaveLength(1);
      expect(JSON.parse(stdout[0])).toMatchObject({ manifest: 'Rooted Hypershell Architecture', passed: true });
    });

    it('should run the named bundled manifest', () => {
      root = createTree({});

      createProgram().parse(['--root', root, '--manifest', 'atomspace-integration'], { from: 'user' });

      expect(process.exitCode).toBe(1);
      expect(stdout).toContain('AtomSpace Integration Validation\n');
    });

    it('should raise the log level with --verbose', () => {
      root = createTree(completeHypershellTree());

      createProgram().parse(['--root', root, '--verbose'], { from: 'user' });

      expect(getLogger().level).toBe(LogLevel.DEBUG);
    });

    it('should leave the log level alone without --verbose', () => {
      root = createTree(completeHypershellTree());

      createProgram().parse(['--root', root], { from: 'user' });

      expect(getLogger().level).toBe(LogLevel.WARN);
    });

    it('should exit with 4 for an unknown manifest', () => {
      root = createTree({});
      const dir = root;

      expect(() => createProgram().parse(['--root', dir, '--manifest', 'no-such-manifest'], { from: 'user' })).toThrow(
        'exit 4'
      );
      expect(console.error).toHaveBeenCalledWith('\n❌ Not Found: Manifest not found: no-such-manifest\n');
    });

    it('should exit with 2 for a root that is not a directory', () => {
      root = createTree({ 'file.txt': 'x' });

      expect(() => createProgram().parse(['--root', `${root}/file.txt`], { from: 'user' })).toThrow('exit 2');
    });
  });

  describe('manifests', () => {
    it('should list bundled manifests with their names', () => {
      createProgram().parse(['manifests'], { from: 'user' });

      expect(logged).toEqual([
        `${'atomspace-integration'.padEnd(24)} AtomSpace Integration`,
        `${'rooted-hypershell'.padEnd(24)} Rooted Hypershell Architecture (default)`
      ]);
      expect(stdout).toEqual([]);
    });

    it('should take --json for itself after the subcommand', () => {
      createProgram().parse(['manifests', '--json'], { from: 'user' });

      expect(logged).toHaveLength(1);
      expect(JSON.parse(logged[0])).toEqual(['atomspace-integration', 'rooted-hypershell']);
      expect(process.exitCode).toBeUndefined();
    });
  });
});
