/**
 * Diagnostics and error types shared by the parser, validator and encoder.
 *
 * User mistakes are collected as diagnostics so one run reports every problem
 * in a file. Broken invariants in the operation table or the encoder raise
 * InternalError and are never collected.
 */

import { type SourceLocation, formatLocation } from '../types/ast.js';

export interface Diagnostic {
  location: SourceLocation;
  message: string;
}

export class ErrorCollector {
  private readonly entries: Diagnostic[] = [];

  add(diagnostic: Diagnostic): this {
    this.entries.push(diagnostic);
    return this;
  }

  diagnostics(): readonly Diagnostic[] {
    return this.entries;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }
}

export class LexerError extends Error {
  constructor(message: string, public line: number, public column: number) {
    super(message);
    this.name = 'LexerError';
  }
}

/** A malformed line. Caught per line and turned into a diagnostic. */
export class ParserError extends Error {
  constructor(message: string, public location: SourceLocation) {
    super(message);
    this.name = 'ParserError';
  }
}

/** No configuration of an operation accepts the given size or operands. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** A well-formed statement whose values don't fit the instruction's fields. */
export class EncoderError extends Error {
  constructor(message: string, public location: SourceLocation) {
    super(message);
    this.name = 'EncoderError';
  }
}

export class InternalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InternalError';
  }
}

export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InternalError(message);
  }
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `${formatLocation(diagnostic.location)}: ${diagnostic.message}`;
}
