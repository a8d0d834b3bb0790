// Cursor over the tokens of a single source line

import { type SourceLocation, INVALID_LOCATION } from '../types/ast.js';
import { type ErrorCollector, ParserError } from './errors.js';
import { type Token, TokenType } from './lexer.js';

export class LineCursor {
  private pos: number = 0;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly errors: ErrorCollector,
  ) {}

  isAtEnd(): boolean {
    return this.pos >= this.tokens.length;
  }

  peek(offset: number = 0): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  check(type: TokenType, offset: number = 0): boolean {
    return this.peek(offset)?.type === type;
  }

  advance(): Token {
    const token = this.tokens[this.pos];
    if (token === undefined) {
      throw new ParserError('Unexpected end of line', this.location());
    }
    this.pos++;
    return token;
  }

  match(type: TokenType): boolean {
    if (this.check(type)) {
      this.pos++;
      return true;
    }
    return false;
  }

  /**
   * Consumes a token of the given type, or throws a ParserError describing
   * what was expected and what was found instead.
   */
  expect(type: TokenType, expected: string): Token {
    const token = this.peek();
    if (token?.type !== type) {
      throw new ParserError(`Expected ${expected}, but found ${this.describeCurrent()} instead.`, this.location());
    }
    this.pos++;
    return token;
  }

  describeCurrent(): string {
    const token = this.peek();
    return token === undefined ? 'the end of the line' : `'${token.lexeme}'`;
  }

  /** Location of the current token, or of the last token once the line is used up. */
  location(): SourceLocation {
    const token = this.peek() ?? this.tokens[this.tokens.length - 1];
    return token === undefined ? INVALID_LOCATION : token.location;
  }

  // Skips to the next comma outside parentheses, leaving it unconsumed
  skipToOperandEnd(): void {
    let depth = 0;
    while (!this.isAtEnd()) {
      const type = this.tokens[this.pos].type;
      if (type === TokenType.COMMA && depth === 0) return;
      if (type === TokenType.LPAREN) depth++;
      if (type === TokenType.RPAREN && depth > 0) depth--;
      this.pos++;
    }
  }

  report(message: string, location: SourceLocation = this.location()): void {
    this.errors.add({ location, message });
  }

  /**
   * Runs `callback`, turning a ParserError into a collected diagnostic.
   * Returns undefined if it failed.
   */
  tryOrReport<T>(callback: () => T): T | undefined {
    try {
      return callback();
    } catch (error) {
      if (error instanceof ParserError) {
        this.report(error.message, error.location);
        return undefined;
      }
      throw error;
    }
  }
}
