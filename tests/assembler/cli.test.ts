import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync, readFileSync, mkdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { main, formatHexDump } from '../../src/assembler/cli.js';

describe('CLI', () => {
  const testDir = join(tmpdir(), 'm68k-asm-test-' + Date.now());
  let consoleLogs: string[] = [];
  let consoleErrors: string[] = [];
  let originalLog: typeof console.log;
  let originalError: typeof console.error;

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

  function writeSource(name: string, source: string): string {
    const path = join(testDir, name);
    writeFileSync(path, source);
    return path;
  }

  describe('argument parsing', () => {
    it('should show help with no arguments', () => {
      expect(main(['node', 'cli.js'])).toBe(1);
      expect(consoleLogs.some((l) => l.includes('Usage'))).toBe(true);
    });

    it('should show help with -h', () => {
      expect(main(['node', 'cli.js', '-h'])).toBe(0);
      expect(consoleLogs.some((l) => l.includes('Usage'))).toBe(true);
    });

    it('should error on unknown option', () => {
      expect(main(['node', 'cli.js', '--unknown'])).toBe(1);
      expect(consoleErrors).toContain("Error: Unknown option '--unknown'");
    });

    it('should error when -o is missing filename', () => {
      expect(main(['node', 'cli.js', 'test.s', '-o'])).toBe(1);
      expect(consoleErrors).toContain('Error: -o requires an output filename');
    });

    it('should error on an odd origin', () => {
      expect(main(['node', 'cli.js', 'test.s', '--origin', '3'])).toBe(1);
      expect(consoleErrors).toContain('Error: --origin requires an even address, such as 1024 or $400');
    });
  });

  describe('assembling', () => {
    it('should write the machine code', () => {
      const input = writeSource('prog.s', 'start: NOT.W D3\nRTS\n');
      const output = join(testDir, 'out.bin');

      expect(main(['node', 'cli.js', input, '-o', output])).toBe(0);
      expect([...readFileSync(output)]).toEqual([0x46, 0x43, 0x4e, 0x75]);
      expect(consoleLogs).toContain(`Assembled 4 bytes to ${output}`);
      expect(consoleLogs).toContain('\nSymbols: 1');
    });

    it('should derive the output name from the input', () => {
      const input = writeSource('derived.s', 'NOP');
      expect(main(['node', 'cli.js', input])).toBe(0);
      expect([...readFileSync(join(testDir, 'derived.bin'))]).toEqual([0x4e, 0x71]);
    });

    it('should print a listing at the origin', () => {
      const input = writeSource('list.s', 'NOP');
      const output = join(testDir, 'list.bin');
      expect(main(['node', 'cli.js', input, '-o', output, '--origin', '$400', '--list'])).toBe(0);
      expect(consoleLogs).toContain('00000400  4e71' + ' '.repeat(21) + 'NOP');
    });

    it('should print a hex dump', () => {
      const input = writeSource('hex.s', 'NOT.W D3\nRTS');
      const output = join(testDir, 'hex.bin');
      expect(main(['node', 'cli.js', input, '-o', output, '--hex'])).toBe(0);
      expect(consoleLogs).toContain('\nHex dump:');
      expect(consoleLogs[consoleLogs.indexOf('\nHex dump:') + 1]).toBe(
        '00000000  ' + '4643 4e75'.padEnd(39) + '  FCNu'
      );
    });
  });

  describe('errors', () => {
    it('should report assembly errors with their location', () => {
      const input = writeSource('bad.s', 'NOP\nNOT.W D8');
      expect(main(['node', 'cli.js', input])).toBe(1);
      expect(consoleErrors).toEqual([
        `${input}:2:7: Register D8 doesn't exist. Register indices go from 0 to 7.`,
      ]);
    });

    it('should report a missing input file', () => {
      const input = join(testDir, 'missing.s');
      expect(main(['node', 'cli.js', input])).toBe(1);
      expect(consoleErrors).toEqual([`Error: File not found: ${input}`]);
    });
  });
});

describe('formatHexDump', () => {
  it('should offset addresses by the origin', () => {
    expect(formatHexDump(new Uint8Array(18), 0x100).split('\n')).toEqual([
      '00000100  ' + Array(8).fill('0000').join(' ') + '  ' + '.'.repeat(16),
      '00000110  ' + '0000'.padEnd(39) + '  ..',
    ]);
  });

  it('should show a trailing odd byte on its own', () => {
    expect(formatHexDump(new Uint8Array([0x4e, 0x71, 0x41]))).toBe('00000000  ' + '4e71 41'.padEnd(39) + '  NqA');
  });

  it('should return nothing for no bytes', () => {
    expect(formatHexDump(new Uint8Array(0))).toBe('');
  });
});
