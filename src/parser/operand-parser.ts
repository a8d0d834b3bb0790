/**
 * Operand Parser
 *
 * Recursive descent over the addressing-mode grammar. The forms are tried in
 * this order, first match wins:
 *
 *   CCR, SR, USP            fixed registers
 *   An, Dn                  register direct
 *   #n                      immediate
 *   -(An)                   predecrement
 *   (An), (An)+             indirect, postincrement
 *   (n).W, (n).L            absolute
 *   (d,An), (d,PC)          displacement
 *   (d,An,Xn.s), (d,PC,Xn.s) index
 *
 * The displacement forms may also be written with the displacement in front,
 * as in d(An) or -5(A3,D2.W).
 */

import {
  type AddressRegister,
  type IndexRegister,
  type Operand,
  type Register,
  type SourceLocation,
  OperandType,
  Size,
  formatRegister,
  operandTypeToString,
  parseSizeName,
} from '../types/ast.js';
import { ParserError } from './errors.js';
import { type Token, TokenType, parseInteger } from './lexer.js';
import type { LineCursor } from './line-cursor.js';

const REGISTER_EXPR = /^([AD])([0-9]+)$/;

export function parseOperand(cursor: LineCursor): Operand {
  const first = cursor.peek();
  if (first === undefined) {
    throw new ParserError('Expected an operand, but found the end of the line instead.', cursor.location());
  }
  const loc = first.location;

  switch (first.type) {
    case TokenType.IDENTIFIER:
      return parseDirect(cursor, loc);

    case TokenType.HASH: {
      cursor.advance();
      const value = parseSignedNumber(cursor, `a value for an ${operandTypeToString(OperandType.Immediate)} operand`);
      return { type: OperandType.Immediate, value, loc };
    }

    case TokenType.MINUS:
      if (cursor.check(TokenType.LPAREN, 1)) {
        cursor.advance();
        cursor.advance();
        const register = expectAddressRegister(cursor, OperandType.AddressIndirectPreDecrement);
        cursor.expect(TokenType.RPAREN, `a closing parenthesis for an ${operandTypeToString(OperandType.AddressIndirectPreDecrement)} operand`);
        return { type: OperandType.AddressIndirectPreDecrement, register, loc };
      }
      return parseDisplacementFirst(cursor, loc);

    case TokenType.NUMBER:
      return parseDisplacementFirst(cursor, loc);

    case TokenType.LPAREN:
      cursor.advance();
      return parseParenthesized(cursor, loc);

    default:
      throw new ParserError(`Expected an operand, but found '${first.lexeme}' instead.`, loc);
  }
}

/**
 * Parses a B, W or L size suffix. The dot before it must already be consumed.
 */
export function parseSize(cursor: LineCursor): Size {
  const token = cursor.expect(TokenType.IDENTIFIER, 'a size (either B for byte, W for word or L for long word)');
  const size = parseSizeName(token.lexeme);
  if (size === undefined) {
    throw new ParserError(
      `A size was expected. That's either B for byte, W for word or L for long word. ` +
      `But ${token.lexeme} was given. That's not a valid size.`,
      token.location
    );
  }
  return size;
}

// CCR, SR, USP, An or Dn
function parseDirect(cursor: LineCursor, loc: SourceLocation): Operand {
  const identifier = cursor.advance();
  switch (identifier.lexeme.toUpperCase()) {
    case 'CCR': return { type: OperandType.ConditionCodeRegister, loc };
    case 'SR': return { type: OperandType.StatusRegister, loc };
    case 'USP': return { type: OperandType.UserStackPointer, loc };
  }

  const register = tryRegister(identifier);
  if (register === undefined || register.type === 'ProgramCounter') {
    throw new ParserError(
      `Unexpected identifier ${identifier.lexeme}. Expected a data or address register, CCR, SR or USP.`,
      loc
    );
  }
  return register.type === 'AddressRegister'
    ? { type: OperandType.AddressRegisterDirect, register, loc }
    : { type: OperandType.DataRegisterDirect, register, loc };
}

// After '(': (An), (An)+, (n).s, (d,An...), (d,PC...)
function parseParenthesized(cursor: LineCursor, loc: SourceLocation): Operand {
  if (cursor.check(TokenType.IDENTIFIER)) {
    const register = expectAddressRegister(cursor, OperandType.AddressIndirect);
    cursor.expect(TokenType.RPAREN, 'a closing parenthesis for an address register operand');
    if (cursor.match(TokenType.PLUS)) {
      return { type: OperandType.AddressIndirectPostIncrement, register, loc };
    }
    return { type: OperandType.AddressIndirect, register, loc };
  }

  const number = parseSignedNumber(cursor, 'a number for a displaced or absolute operand');

  if (cursor.match(TokenType.RPAREN)) {
    cursor.expect(TokenType.DOT, 'a dot for an absolute (xxx).s operand');
    const sizeLocation = cursor.location();
    const size = parseSize(cursor);
    switch (size) {
      case Size.Word:
        return { type: OperandType.AbsoluteWord, value: number, loc };
      case Size.LongWord:
        return { type: OperandType.AbsoluteLongWord, value: number, loc };
      case Size.Byte:
        throw new ParserError(
          'Only word (W) or long word (L) sizes are permitted after an absolute (xxx).s operand.',
          sizeLocation
        );
    }
  }

  cursor.expect(TokenType.COMMA, 'a comma after the displacement');
  return parseBaseAndIndex(cursor, number, loc);
}

// d(An), d(PC), d(An,Xn.s), d(PC,Xn.s)
function parseDisplacementFirst(cursor: LineCursor, loc: SourceLocation): Operand {
  const displacement = parseSignedNumber(cursor, 'a displacement');
  cursor.expect(TokenType.LPAREN, 'an opening parenthesis after the displacement');
  return parseBaseAndIndex(cursor, displacement, loc);
}

// Everything after the displacement and its separator, up to the closing parenthesis
function parseBaseAndIndex(cursor: LineCursor, displacement: number, loc: SourceLocation): Operand {
  const base = parseRegister(cursor, 'either An or PC for a displaced operand');
  if (base.type === 'DataRegister') {
    throw new ParserError('Data register cannot be displaced.', base.loc);
  }

  if (cursor.match(TokenType.RPAREN)) {
    return base.type === 'ProgramCounter'
      ? { type: OperandType.PcIndirectDisplacement, displacement, loc }
      : { type: OperandType.AddressIndirectDisplacement, register: base, displacement, loc };
  }

  const type = base.type === 'ProgramCounter' ? OperandType.PcIndirectIndex : OperandType.AddressIndirectIndex;
  cursor.expect(TokenType.COMMA, `a comma for an ${operandTypeToString(type)} operand`);
  const index = parseIndexRegister(cursor);
  cursor.expect(TokenType.DOT, `a dot after the index register for an ${operandTypeToString(type)} operand`);
  const indexSize = parseSize(cursor);
  cursor.expect(TokenType.RPAREN, `a closing parenthesis for an ${operandTypeToString(type)} operand`);

  return base.type === 'ProgramCounter'
    ? { type: OperandType.PcIndirectIndex, displacement, index, indexSize, loc }
    : { type: OperandType.AddressIndirectIndex, register: base, displacement, index, indexSize, loc };
}

function parseIndexRegister(cursor: LineCursor): IndexRegister {
  const token = cursor.peek();
  const register = token?.type === TokenType.IDENTIFIER ? tryRegister(token) : undefined;
  if (register === undefined || register.type === 'ProgramCounter') {
    throw new ParserError(`Expected index register, but found ${cursor.describeCurrent()}.`, cursor.location());
  }
  cursor.advance();
  return register;
}

function parseRegister(cursor: LineCursor, expected: string): Register {
  const token = cursor.expect(TokenType.IDENTIFIER, expected);
  const register = tryRegister(token);
  if (register === undefined) {
    throw new ParserError(`Expected register, but found ${token.lexeme}.`, token.location);
  }
  return register;
}

function expectAddressRegister(cursor: LineCursor, type: OperandType): AddressRegister {
  const register = parseRegister(cursor, `An for an ${operandTypeToString(type)} operand`);
  if (register.type !== 'AddressRegister') {
    throw new ParserError(
      `Expected an address register for an ${operandTypeToString(type)} operand, ` +
      `but found ${formatRegister(register)}.`,
      register.loc
    );
  }
  return register;
}

/**
 * Reads a register name: PC, SP (alias of A7), A0-A7 or D0-D7, in any case.
 * Returns undefined for identifiers that don't name a register and throws for
 * register names with an index outside 0-7.
 */
function tryRegister(token: Token): Register | undefined {
  const name = token.lexeme.toUpperCase();
  const loc = token.location;
  if (name === 'PC') return { type: 'ProgramCounter', loc };
  if (name === 'SP') return { type: 'AddressRegister', index: 7, loc };

  const match = REGISTER_EXPR.exec(name);
  if (match === null) return undefined;

  const index = parseInt(match[2], 10);
  if (index > 7) {
    throw new ParserError(`Register ${token.lexeme} doesn't exist. Register indices go from 0 to 7.`, loc);
  }
  return match[1] === 'A'
    ? { type: 'AddressRegister', index, loc }
    : { type: 'DataRegister', index, loc };
}

function parseSignedNumber(cursor: LineCursor, expected: string): number {
  const negative = cursor.match(TokenType.MINUS);
  const token = cursor.expect(TokenType.NUMBER, expected);
  const value = parseInteger(token.lexeme);
  if (value === undefined) {
    throw new ParserError(`An integer was expected, but found ${token.lexeme}.`, token.location);
  }
  return negative ? -value : value;
}
