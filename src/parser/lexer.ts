/**
 * M68K Assembler Lexer
 *
 * Tokenizes assembly source into located tokens. Lines are not marked with
 * tokens of their own; the parser groups tokens by their line number.
 */

import type { SourceLocation } from '../types/ast.js';
import { LexerError } from './errors.js';

export enum TokenType {
  IDENTIFIER = 'IDENTIFIER',
  NUMBER = 'NUMBER',
  COMMENT = 'COMMENT',

  // Punctuation
  DOT = 'DOT',
  COLON = 'COLON',
  COMMA = 'COMMA',
  LPAREN = 'LPAREN',
  RPAREN = 'RPAREN',
  PLUS = 'PLUS',
  MINUS = 'MINUS',
  HASH = 'HASH',
}

export interface Token {
  type: TokenType;
  lexeme: string;
  location: SourceLocation;
}

const PUNCTUATION: Record<string, TokenType> = {
  '.': TokenType.DOT,
  ':': TokenType.COLON,
  ',': TokenType.COMMA,
  '(': TokenType.LPAREN,
  ')': TokenType.RPAREN,
  '+': TokenType.PLUS,
  '-': TokenType.MINUS,
  '#': TokenType.HASH,
};

const DECIMAL_EXPR = /^[0-9]+$/;
const HEX_EXPR = /^(?:\$|0[xX])([0-9a-fA-F]+)$/;
const BINARY_EXPR = /^%([01]+)$/;

/**
 * Parses the lexeme of a NUMBER token: decimal, $hex, 0xhex or %binary.
 * Returns undefined if the lexeme is none of those.
 */
export function parseInteger(lexeme: string): number | undefined {
  if (DECIMAL_EXPR.test(lexeme)) {
    return parseInt(lexeme, 10);
  }
  const hex = HEX_EXPR.exec(lexeme);
  if (hex !== null) {
    return parseInt(hex[1], 16);
  }
  const binary = BINARY_EXPR.exec(lexeme);
  if (binary !== null) {
    return parseInt(binary[1], 2);
  }
  return undefined;
}

export class Lexer {
  private source: string;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;
  private lineHasTokens: boolean = false;
  private tokens: Token[] = [];

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.pos = 0;
    this.line = 1;
    this.column = 1;
    this.lineHasTokens = false;

    while (!this.isAtEnd()) {
      this.scanToken();
    }

    return this.tokens;
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.source[this.pos];
  }

  private advance(): string {
    const char = this.source[this.pos++];
    if (char === '\n') {
      this.line++;
      this.column = 1;
      this.lineHasTokens = false;
    } else {
      this.column++;
    }
    return char;
  }

  private scanToken(): void {
    const location = { line: this.line, column: this.column };
    const char = this.advance();

    if (char === ' ' || char === '\t' || char === '\r' || char === '\n') {
      return;
    }

    // '*' opens a comment only where a statement could start
    if (char === ';' || (char === '*' && !this.lineHasTokens)) {
      this.scanComment(location);
      return;
    }

    const punctuation = PUNCTUATION[char];
    if (punctuation !== undefined) {
      this.addToken(punctuation, char, location);
      return;
    }

    if (this.isDigit(char) || char === '$' || char === '%') {
      this.addToken(TokenType.NUMBER, char + this.scanWhile((c) => this.isAlphaNumeric(c)), location);
      return;
    }

    if (this.isAlpha(char) || char === '_') {
      this.addToken(TokenType.IDENTIFIER, char + this.scanWhile((c) => this.isAlphaNumeric(c)), location);
      return;
    }

    throw new LexerError(`Unexpected character '${char}'`, location.line, location.column);
  }

  private scanComment(location: SourceLocation): void {
    const text = this.scanWhile((c) => c !== '\n');
    this.addToken(TokenType.COMMENT, text.trim(), location);
  }

  private scanWhile(predicate: (char: string) => boolean): string {
    let text = '';
    while (!this.isAtEnd() && predicate(this.peek())) {
      text += this.advance();
    }
    return text;
  }

  private addToken(type: TokenType, lexeme: string, location: SourceLocation): void {
    this.tokens.push({ type, lexeme, location });
    this.lineHasTokens = true;
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isAlpha(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z');
  }

  private isAlphaNumeric(char: string): boolean {
    return this.isAlpha(char) || this.isDigit(char) || char === '_';
  }
}

export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
