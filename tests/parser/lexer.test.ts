import { describe, it, expect } from 'vitest';
import { Lexer, TokenType, parseInteger, tokenize } from '../../src/parser/lexer.js';
import { LexerError } from '../../src/parser/errors.js';

describe('Lexer', () => {
  function types(source: string): TokenType[] {
    return tokenize(source).map((t) => t.type);
  }

  describe('instructions', () => {
    it('should tokenize a sized instruction', () => {
      const tokens = new Lexer('NOT.W D3').tokenize();
      expect(tokens.map((t) => t.lexeme)).toEqual(['NOT', '.', 'W', 'D3']);
      expect(tokens.map((t) => t.type)).toEqual([
        TokenType.IDENTIFIER,
        TokenType.DOT,
        TokenType.IDENTIFIER,
        TokenType.IDENTIFIER,
      ]);
    });

    it('should tokenize addressing mode punctuation', () => {
      expect(types('-(A0),(A1)+')).toEqual([
        TokenType.MINUS,
        TokenType.LPAREN,
        TokenType.IDENTIFIER,
        TokenType.RPAREN,
        TokenType.COMMA,
        TokenType.LPAREN,
        TokenType.IDENTIFIER,
        TokenType.RPAREN,
        TokenType.PLUS,
      ]);
    });

    it('should tokenize immediates', () => {
      const tokens = tokenize('#$FF');
      expect(tokens).toHaveLength(2);
      expect(tokens[0].type).toBe(TokenType.HASH);
      expect(tokens[1]).toEqual({ type: TokenType.NUMBER, lexeme: '$FF', location: { line: 1, column: 2 } });
    });

    it('should tokenize labels', () => {
      expect(types('loop: NOP')).toEqual([TokenType.IDENTIFIER, TokenType.COLON, TokenType.IDENTIFIER]);
      expect(types('.loop:')).toEqual([TokenType.DOT, TokenType.IDENTIFIER, TokenType.COLON]);
    });
  });

  describe('locations', () => {
    it('should track lines and columns', () => {
      const tokens = tokenize('NOP\n  CLR.L D1');
      expect(tokens[0].location).toEqual({ line: 1, column: 1 });
      expect(tokens[1].location).toEqual({ line: 2, column: 3 });
      expect(tokens[4].location).toEqual({ line: 2, column: 9 });
    });

    it('should not emit tokens for blank lines', () => {
      const tokens = tokenize('\n\nNOP\n');
      expect(tokens).toHaveLength(1);
      expect(tokens[0].location.line).toBe(3);
    });
  });

  describe('comments', () => {
    it('should read a semicolon comment to the end of the line', () => {
      const tokens = tokenize('NOP ; does nothing  \nRTS');
      expect(tokens[1]).toEqual({
        type: TokenType.COMMENT,
        lexeme: 'does nothing',
        location: { line: 1, column: 5 },
      });
      expect(tokens[2].lexeme).toBe('RTS');
    });

    it('should treat a leading asterisk as a comment', () => {
      const tokens = tokenize('   * header');
      expect(tokens).toHaveLength(1);
      expect(tokens[0].type).toBe(TokenType.COMMENT);
      expect(tokens[0].lexeme).toBe('header');
    });

    it('should reject an asterisk after other tokens', () => {
      expect(() => tokenize('NOP *')).toThrow(LexerError);
    });
  });

  describe('errors', () => {
    it('should report the location of an unexpected character', () => {
      try {
        tokenize('NOP\nCLR @');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(LexerError);
        if (error instanceof LexerError) {
          expect(error.message).toBe("Unexpected character '@'");
          expect(error.line).toBe(2);
          expect(error.column).toBe(5);
        }
      }
    });
  });
});

describe('parseInteger', () => {
  it('should parse decimal numbers', () => {
    expect(parseInteger('42')).toBe(42);
  });

  it('should parse hexadecimal numbers', () => {
    expect(parseInteger('$1F')).toBe(31);
    expect(parseInteger('0x1f')).toBe(31);
  });

  it('should parse binary numbers', () => {
    expect(parseInteger('%1010')).toBe(10);
  });

  it('should reject malformed numbers', () => {
    expect(parseInteger('12AB')).toBeUndefined();
    expect(parseInteger('$')).toBeUndefined();
    expect(parseInteger('%102')).toBeUndefined();
  });
});
