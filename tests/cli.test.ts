import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { main } from '../src/cli.js';

describe('CLI', () => {
  const testDir = join(tmpdir(), 'polyparse-cli-test-' + Date.now());
  let consoleLogs: string[] = [];
  let consoleErrors: string[] = [];
  let originalLog: typeof console.log;
  let originalError: typeof console.error;

  function writeInput(name: string, content: string): string {
    const path = join(testDir, name);
    writeFileSync(path, content);
    return path;
  }

  beforeEach(() => {
    mkdirSync(testDir, { recursive: true });
    consoleLogs = [];
    consoleErrors = [];
    originalLog = console.log;
    originalError = console.error;
    console.log = (...args) => consoleLogs.push(args.join(' '));
    console.error = (...args) => consoleErrors.push(args.join(' '));
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('argument parsing', () => {
    it('should show help with no arguments', () => {
      expect(main(['node', 'cli.ts'])).toBe(1);
      expect(consoleLogs.some(l => l.includes('Usage'))).toBe(true);
    });

    it('should show help with --help', () => {
      expect(main(['node', 'cli.ts', '--help'])).toBe(0);
      expect(consoleLogs.some(l => l.includes('Usage'))).toBe(true);
    });

    it('should error on unknown options', () => {
      expect(main(['node', 'cli.ts', '--unknown'])).toBe(1);
      expect(consoleErrors).toContain("Error: Unknown option '--unknown'");
    });

    it('should error on unknown dialects and fields', () => {
      expect(main(['node', 'cli.ts', 'a.pil', '--dialect', 'cobol'])).toBe(1);
      expect(consoleErrors).toContain("Error: Unknown dialect 'cobol'");
      expect(main(['node', 'cli.ts', 'a.pil', '--field', 'mersenne'])).toBe(1);
      expect(consoleErrors).toContain("Error: Unknown field 'mersenne'");
    });

    it('should error when a flag value is missing', () => {
      expect(main(['node', 'cli.ts', 'a.pil', '--dialect'])).toBe(1);
      expect(consoleErrors).toContain('Error: --dialect requires a value');
    });

    it('should require a known extension or --dialect', () => {
      expect(main(['node', 'cli.ts', 'notes.txt'])).toBe(1);
      expect(consoleErrors).toContain("Error: Cannot infer dialect of 'notes.txt', use --dialect");
    });

    it('should only accept --data for riscv input', () => {
      expect(main(['node', 'cli.ts', 'a.pil', '--data'])).toBe(1);
      expect(consoleErrors).toContain('Error: --data only applies to the riscv dialect');
    });
  });

  describe('file operations', () => {
    it('should error on a missing input file', () => {
      const path = join(testDir, 'missing.pil');
      expect(main(['node', 'cli.ts', path])).toBe(1);
      expect(consoleErrors).toContain(`Error: File not found: ${path}`);
    });

    it('should print a PIL file', () => {
      const path = writeInput('test.pil', 'pol commit a, b;\na = b;\n');
      expect(main(['node', 'cli.ts', path])).toBe(0);
      expect(consoleLogs).toEqual(['pol commit a, b;\na = b;']);
    });

    it('should print an ASM file', () => {
      const path = writeInput('test.asm', 'degree 8;\nreg pc[@pc];');
      expect(main(['node', 'cli.ts', path])).toBe(0);
      expect(consoleLogs).toEqual(['degree 8;\nreg pc[@pc];']);
    });

    it('should print assembly with canonical registers', () => {
      const path = writeInput('test.s', 'loop: addi x2, x2, -16\n');
      expect(main(['node', 'cli.ts', path])).toBe(0);
      expect(consoleLogs).toEqual(['loop:\n  addi sp, sp, -16']);
    });

    it('should honor --dialect over the extension', () => {
      const path = writeInput('prog.txt', 'ret\n');
      expect(main(['node', 'cli.ts', path, '--dialect', 'riscv'])).toBe(0);
      expect(consoleLogs).toEqual(['  ret']);
    });

    it('should print JSON', () => {
      const path = writeInput('test.pil', 'pol commit a;');
      expect(main(['node', 'cli.ts', path, '--json'])).toBe(0);
      const json = JSON.parse(consoleLogs[0]);
      expect(json.statements[0]).toEqual({
        type: 'PolynomialCommitDeclaration',
        polynomials: [{ name: 'a' }],
        loc: { line: 1, column: 1, offset: 0 },
      });
    });

    it('should print data objects', () => {
      const path = writeInput('data.s', '.type msg, @object\nmsg:\n.asciz "hi"\n.size msg, 3\n');
      expect(main(['node', 'cli.ts', path, '--data'])).toBe(0);
      expect(consoleLogs).toEqual(['msg: 68 69 00']);
    });
  });

  describe('diagnostics', () => {
    it('should report parse errors with their position', () => {
      const path = writeInput('error.pil', 'pol commit ;');
      expect(main(['node', 'cli.ts', path])).toBe(1);
      expect(consoleErrors).toEqual([`${path}:1:12: Expected identifier, found ';'`]);
    });

    it('should check literals against the selected field', () => {
      const path = writeInput('big.pil', 'pol x = 0xffffffff00000001;');
      expect(main(['node', 'cli.ts', path])).toBe(1);
      expect(consoleErrors).toEqual([
        `${path}:1:9: Integer literal '0xffffffff00000001' does not fit in the goldilocks field`,
      ]);

      expect(main(['node', 'cli.ts', path, '--field', 'bn254'])).toBe(0);
      expect(consoleLogs).toEqual(['pol x = 18446744069414584321;']);
    });

    it('should report data object errors', () => {
      const path = writeInput('size.s', '.type n, @object\nn:\n.word 1\n.size n, 8\n');
      expect(main(['node', 'cli.ts', path, '--data'])).toBe(1);
      expect(consoleErrors).toEqual([
        `${path}:4:1: Invalid size for data object n: computed: 4 vs. specified: 8`,
      ]);
    });
  });
});
