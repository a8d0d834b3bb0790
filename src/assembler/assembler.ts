/**
 * M68K Assembler
 *
 * Two-pass assembler that converts M68K assembly source to machine code.
 * Pass 1 lays out every statement and resolves label addresses, pass 2
 * encodes the instructions.
 */

import { type Diagnostic, EncoderError, ErrorCollector, LexerError } from '../parser/errors.js';
import { tokenize } from '../parser/lexer.js';
import type { OperationTable } from '../parser/operations.js';
import { parse } from '../parser/parser.js';
import { compileWords, instructionWordCount, wordsToBytes } from '../compiler/encoder.js';
import {
  type LabelStatement,
  type OperationStatement,
  type Program,
  formatAlignedStatement,
  isLocalLabel,
} from '../types/ast.js';

export interface AssemblerError {
  message: string;
  line: number;
  column: number;
}

export interface ListingEntry {
  address: number;
  words: number[];
  line: number;
  text: string;
}

export interface AssemblerResult {
  bytes: Uint8Array;
  symbols: Map<string, number>;
  listing: ListingEntry[];
  errors: AssemblerError[];
}

export interface AssemblerOptions {
  // Address of the first instruction, 0 by default
  origin?: number;
  operations?: OperationTable;
}

export class Assembler {
  private source: string;
  private origin: number;
  private operations: OperationTable | undefined;
  private symbols: Map<string, number> = new Map();
  private addresses: number[] = [];
  private errors: AssemblerError[] = [];

  constructor(source: string, options: AssemblerOptions = {}) {
    const origin = options.origin ?? 0;
    if (!Number.isInteger(origin) || origin < 0 || origin % 2 !== 0) {
      throw new RangeError(`Origin must be a non-negative even address, but was ${origin}`);
    }
    this.source = source;
    this.origin = origin;
    this.operations = options.operations;
  }

  assemble(): AssemblerResult {
    this.symbols = new Map();
    this.addresses = [];
    this.errors = [];

    const program = this.parse();
    if (program === undefined || this.errors.length > 0) {
      return this.result(new Uint8Array(), []);
    }

    this.pass1(program);
    if (this.errors.length > 0) {
      return this.result(new Uint8Array(), []);
    }

    const listing = this.pass2(program);
    const words = listing.flatMap((entry) => entry.words);
    return this.result(wordsToBytes(words), listing);
  }

  private parse(): Program | undefined {
    const collector = new ErrorCollector();
    try {
      const tokens = tokenize(this.source);
      const program = parse(tokens, collector, { operations: this.operations });
      this.addDiagnostics(collector.diagnostics());
      return program;
    } catch (error) {
      if (error instanceof LexerError) {
        this.errors.push({ message: error.message, line: error.line, column: error.column });
        return undefined;
      }
      throw error;
    }
  }

  // Pass 1: statement addresses and the symbol table
  private pass1(program: Program): void {
    let pc = this.origin;
    for (const statement of program.statements) {
      this.addresses.push(pc);
      if (statement.type === 'Operation') {
        pc += instructionWordCount(statement) * 2;
      }
    }

    let scope: string | undefined;
    for (const [label, index] of program.labels) {
      if (!isLocalLabel(label)) {
        scope = label.name;
      }
      this.defineSymbol(qualifiedName(label, scope), label, this.addresses[index]);
    }
  }

  private defineSymbol(name: string, label: LabelStatement, address: number): void {
    if (this.symbols.has(name)) {
      this.errors.push({
        message: `Duplicate label '${name}'`,
        line: label.loc.line,
        column: label.loc.column,
      });
      return;
    }
    this.symbols.set(name, address);
  }

  // Pass 2: encode each instruction at its address
  private pass2(program: Program): ListingEntry[] {
    const listing: ListingEntry[] = [];
    program.statements.forEach((statement, index) => {
      if (statement.type !== 'Operation') return;
      listing.push({
        address: this.addresses[index],
        words: this.encode(statement),
        line: statement.loc.line,
        text: formatAlignedStatement(statement),
      });
    });
    return listing;
  }

  // Zero words stand in for an instruction that fails to encode
  private encode(statement: OperationStatement): number[] {
    try {
      return compileWords(statement);
    } catch (error) {
      if (error instanceof EncoderError) {
        this.addDiagnostics([{ location: error.location, message: error.message }]);
        return new Array<number>(instructionWordCount(statement)).fill(0);
      }
      throw error;
    }
  }

  private addDiagnostics(diagnostics: readonly Diagnostic[]): void {
    for (const diagnostic of diagnostics) {
      this.errors.push({
        message: diagnostic.message,
        line: diagnostic.location.line,
        column: diagnostic.location.column,
      });
    }
  }

  private result(bytes: Uint8Array, listing: ListingEntry[]): AssemblerResult {
    return { bytes, symbols: this.symbols, listing, errors: this.errors };
  }
}

// Local labels live under the closest global label before them, as in main.loop
function qualifiedName(label: LabelStatement, scope: string | undefined): string {
  if (!isLocalLabel(label) || scope === undefined) return label.name;
  return `${scope}${label.name}`;
}

export function formatListing(listing: readonly ListingEntry[]): string {
  return listing.map((entry) => {
    const address = entry.address.toString(16).padStart(8, '0');
    const words = entry.words.map((word) => word.toString(16).padStart(4, '0')).join(' ');
    return `${address}  ${words.padEnd(25)}${entry.text}`;
  }).join('\n');
}

export function assemble(source: string, options: AssemblerOptions = {}): AssemblerResult {
  return new Assembler(source, options).assemble();
}
