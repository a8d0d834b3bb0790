#!/usr/bin/env node
/**
 * M68K Assembler CLI
 *
 * Usage: m68k-asm <source> [-o file] [--origin address] [--list] [--hex]
 */

import { readFileSync, realpathSync, writeFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { Assembler, formatListing } from './assembler.js';
import { parseInteger } from '../parser/lexer.js';

interface CliOptions {
  inputFile: string;
  outputFile: string;
  hexDump: boolean;
  listing: boolean;
  origin: number;
}

const SOURCE_EXTENSION = /\.(asm|s|x68)$/i;
const BYTES_PER_ROW = 16;

function parseArgs(args: string[]): CliOptions | null {
  const options: CliOptions = { inputFile: '', outputFile: '', hexDump: false, listing: false, origin: 0 };
  const rest = args.slice(2);
  if (rest.length === 0) {
    return null;
  }

  while (rest.length > 0) {
    const arg = rest.shift() ?? '';
    switch (arg) {
      case '-o':
      case '--output': {
        const file = rest.shift();
        if (file === undefined) {
          console.error('Error: -o requires an output filename');
          return null;
        }
        options.outputFile = file;
        break;
      }
      case '--origin': {
        const text = rest.shift();
        const origin = text === undefined ? undefined : parseInteger(text);
        if (origin === undefined || origin % 2 !== 0) {
          console.error('Error: --origin requires an even address, such as 1024 or $400');
          return null;
        }
        options.origin = origin;
        break;
      }
      case '--hex':
        options.hexDump = true;
        break;
      case '--list':
        options.listing = true;
        break;
      case '-h':
      case '--help':
        return null;
      default:
        if (arg.startsWith('-')) {
          console.error(`Error: Unknown option '${arg}'`);
          return null;
        }
        options.inputFile = arg;
    }
  }

  if (options.inputFile === '') {
    console.error('Error: No input file specified');
    return null;
  }
  if (options.outputFile === '') {
    options.outputFile = options.inputFile.replace(SOURCE_EXTENSION, '') + '.bin';
  }
  return options;
}

function printUsage(): void {
  console.log(`Usage: m68k-asm <source> [options]

Assembles 68000 source into a flat big-endian binary.

  -o, --output <file>   where to write the binary (default: source with .bin)
  --origin <address>    load address of the first instruction, even (default: 0)
  --list                print each instruction with its address and words
  --hex                 print the binary as words
  -h, --help            print this text

Addresses take decimal, $hex or %binary, as in the source: --origin $1000`);
}

/**
 * One row per 16 bytes: the load address, the bytes as big-endian words and
 * their printable characters.
 */
export function formatHexDump(bytes: Uint8Array, origin: number = 0): string {
  const rows: string[] = [];
  for (let offset = 0; offset < bytes.length; offset += BYTES_PER_ROW) {
    const row = bytes.subarray(offset, offset + BYTES_PER_ROW);
    const words: string[] = [];
    for (let i = 0; i < row.length; i += 2) {
      words.push([...row.subarray(i, i + 2)].map((byte) => byte.toString(16).padStart(2, '0')).join(''));
    }
    const text = [...row].map((byte) => (byte >= 0x20 && byte < 0x7f ? String.fromCharCode(byte) : '.')).join('');
    const address = (origin + offset).toString(16).padStart(8, '0');
    rows.push(`${address}  ${words.join(' ').padEnd(39)}  ${text}`);
  }
  return rows.join('\n');
}

export function main(args: string[] = process.argv): number {
  const options = parseArgs(args);

  if (!options) {
    printUsage();
    return args.some(a => a === '-h' || a === '--help') ? 0 : 1;
  }

  // Read input file
  let source: string;
  try {
    source = readFileSync(options.inputFile, 'utf-8');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      console.error(`Error: File not found: ${options.inputFile}`);
    } else {
      console.error(`Error: Cannot read file: ${options.inputFile}`);
    }
    return 1;
  }

  const assembler = new Assembler(source, { origin: options.origin });
  const result = assembler.assemble();

  if (result.errors.length > 0) {
    for (const error of result.errors) {
      console.error(`${options.inputFile}:${error.line}:${error.column}: ${error.message}`);
    }
    return 1;
  }

  try {
    writeFileSync(options.outputFile, result.bytes);
    console.log(`Assembled ${result.bytes.length} bytes to ${options.outputFile}`);
  } catch (e) {
    const reason = e instanceof Error ? `: ${e.message}` : '';
    console.error(`Error: Cannot write file: ${options.outputFile}${reason}`);
    return 1;
  }

  if (options.listing) {
    console.log('\nListing:');
    console.log(formatListing(result.listing));
  }

  if (options.hexDump) {
    console.log('\nHex dump:');
    console.log(formatHexDump(result.bytes, options.origin));
  }

  if (result.symbols.size > 0) {
    console.log(`\nSymbols: ${result.symbols.size}`);
  }

  return 0;
}

function isEntrypoint(): boolean {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    return realpathSync(script) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

// Run if executed directly
if (isEntrypoint()) {
  process.exit(main());
}
