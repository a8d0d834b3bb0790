/**
 * M68K Instruction Encoder
 *
 * Turns validated operation statements into machine code. Each instruction
 * family builds its opcode word(s) from a bit template and encoded fields;
 * the extension words of its operands follow, source before destination.
 */

import {
  type Operand,
  type OperationStatement,
  type Size,
  OperandType,
  formatStatement,
} from '../types/ast.js';
import { EncoderError, InternalError, invariant } from '../parser/errors.js';
import { ensureMatchingConfigurationExists } from '../parser/validator.js';
import { Bits } from './bits.js';
import {
  effectiveAddress,
  extensionWordCount,
  extensionWords,
  modeBits,
  registerBits,
  sizeBits,
} from './fields.js';

interface InstructionFormat {
  // Opcode words, without extensions
  opcode(statement: OperationStatement, size: Size | undefined): Bits[];
  // Operands whose extension words follow the opcode; all of them by default
  extended?(operands: readonly Operand[]): readonly Operand[];
}

// NOT, NEG, ... : template, size, <ea>
function singleOperand(template: string): InstructionFormat {
  return {
    opcode: (statement, size) => [
      Bits.fromTemplate(template).concat(sizeBits(size, 'zeroBased'), effectiveAddress(operandAt(statement, 0))),
    ],
  };
}

function fixed(word: number): InstructionFormat {
  return { opcode: () => [Bits.unsigned(word, 16)] };
}

// ORI, ANDI, ... : template, size, <ea>, with CCR and SR as the special <ea> 111100
function immediate(template: string): InstructionFormat {
  return {
    opcode: (statement, size) => {
      const destination = operandAt(statement, 1);
      const target = destination.type === OperandType.ConditionCodeRegister ||
        destination.type === OperandType.StatusRegister
        ? Bits.fromTemplate('111100')
        : effectiveAddress(destination);
      return [Bits.fromTemplate(template).concat(sizeBits(size, 'zeroBased'), target)];
    },
  };
}

// ADDQ, SUBQ: 0101, data, direction, size, <ea>. The data 8 is written as 0.
function quick(direction: '0' | '1'): InstructionFormat {
  return {
    opcode: (statement, size) => {
      const data = operandAt(statement, 0);
      invariant(data.type === OperandType.Immediate, `${statement.operation.code} expects immediate data`);
      if (!Number.isInteger(data.value) || data.value < 1 || data.value > 8) {
        throw new EncoderError(
          `The data of ${statement.operation.code} must be between 1 and 8, but it was ${data.value}.`,
          data.loc
        );
      }
      return [
        Bits.fromTemplate('0101').concat(
          Bits.unsigned(data.value % 8, 3),
          Bits.fromTemplate(direction),
          sizeBits(size, 'zeroBased'),
          effectiveAddress(operandAt(statement, 1)),
        ),
      ];
    },
    extended: (operands) => operands.slice(1),
  };
}

// ADDA, SUBA, CMPA: template, An, size bit, 11, <ea>
function addressArithmetic(template: string): InstructionFormat {
  return {
    opcode: (statement, size) => [
      Bits.fromTemplate(template).concat(
        registerBits(operandAt(statement, 1)),
        sizeBits(size, 'singleBit'),
        Bits.fromTemplate('11'),
        effectiveAddress(operandAt(statement, 0)),
      ),
    ],
  };
}

// PEA, JMP, JSR: template, <ea>
function control(template: string): InstructionFormat {
  return {
    opcode: (statement) => [Bits.fromTemplate(template).concat(effectiveAddress(operandAt(statement, 0)))],
  };
}

const lea: InstructionFormat = {
  opcode: (statement) => [
    Bits.fromTemplate('0100').concat(
      registerBits(operandAt(statement, 1)),
      Bits.fromTemplate('111'),
      effectiveAddress(operandAt(statement, 0)),
    ),
  ],
};

const ext: InstructionFormat = {
  opcode: (statement, size) => [
    Bits.fromTemplate('010010001').concat(
      sizeBits(size, 'singleBit'),
      Bits.fromTemplate('000'),
      registerBits(operandAt(statement, 0)),
    ),
  ],
};

const swap: InstructionFormat = {
  opcode: (statement) => [Bits.fromTemplate('0100100001000').concat(registerBits(operandAt(statement, 0)))],
};

// MOVE covers the general form as well as the moves to and from CCR, SR and USP
const move: InstructionFormat = {
  opcode: (statement, size) => {
    const source = operandAt(statement, 0);
    const destination = operandAt(statement, 1);

    switch (destination.type) {
      case OperandType.ConditionCodeRegister:
        return [Bits.fromTemplate('0100010011').concat(effectiveAddress(source))];
      case OperandType.StatusRegister:
        return [Bits.fromTemplate('0100011011').concat(effectiveAddress(source))];
      case OperandType.UserStackPointer:
        return [Bits.fromTemplate('010011100110 0').concat(registerBits(source))];
    }
    switch (source.type) {
      case OperandType.StatusRegister:
        return [Bits.fromTemplate('0100000011').concat(effectiveAddress(destination))];
      case OperandType.UserStackPointer:
        return [Bits.fromTemplate('010011100110 1').concat(registerBits(destination))];
    }
    return generalMove(source, destination, size);
  },
};

const movea: InstructionFormat = {
  opcode: (statement, size) => generalMove(operandAt(statement, 0), operandAt(statement, 1), size),
};

// 00, size, destination register and mode, source mode and register
function generalMove(source: Operand, destination: Operand, size: Size | undefined): Bits[] {
  return [
    Bits.fromTemplate('00').concat(
      sizeBits(size, 'move'),
      registerBits(destination),
      modeBits(destination),
      effectiveAddress(source),
    ),
  ];
}

// CAS Dc,Du,<ea>
const cas: InstructionFormat = {
  opcode: (statement, size) => [
    Bits.fromTemplate('00001').concat(
      sizeBits(size, 'oneBased'),
      Bits.fromTemplate('011'),
      effectiveAddress(operandAt(statement, 2)),
    ),
    Bits.fromTemplate('0000000').concat(
      registerBits(operandAt(statement, 1)),
      Bits.fromTemplate('000'),
      registerBits(operandAt(statement, 0)),
    ),
  ],
  extended: (operands) => operands.slice(2),
};

const FORMATS: ReadonlyMap<string, InstructionFormat> = new Map([
  ['NOT', singleOperand('01000110')],
  ['NEG', singleOperand('01000100')],
  ['NEGX', singleOperand('01000000')],
  ['CLR', singleOperand('01000010')],
  ['TST', singleOperand('01001010')],
  ['EXT', ext],
  ['SWAP', swap],
  ['NOP', fixed(0x4e71)],
  ['RTS', fixed(0x4e75)],
  ['RTE', fixed(0x4e73)],
  ['RTR', fixed(0x4e77)],
  ['RESET', fixed(0x4e70)],
  ['TRAPV', fixed(0x4e76)],
  ['ILLEGAL', fixed(0x4afc)],
  ['ORI', immediate('00000000')],
  ['ANDI', immediate('00000010')],
  ['SUBI', immediate('00000100')],
  ['ADDI', immediate('00000110')],
  ['EORI', immediate('00001010')],
  ['CMPI', immediate('00001100')],
  ['ADDQ', quick('0')],
  ['SUBQ', quick('1')],
  ['ADDA', addressArithmetic('1101')],
  ['SUBA', addressArithmetic('1001')],
  ['CMPA', addressArithmetic('1011')],
  ['LEA', lea],
  ['PEA', control('0100100001')],
  ['JMP', control('0100111011')],
  ['JSR', control('0100111010')],
  ['MOVE', move],
  ['MOVEA', movea],
  ['CAS', cas],
]);

export function isEncodable(code: string): boolean {
  return FORMATS.has(code);
}

/**
 * Encodes a statement into 16-bit words: the opcode words followed by the
 * extension words. Throws EncoderError when a value doesn't fit its field.
 */
export function compileWords(statement: OperationStatement): number[] {
  const { format, size } = resolve(statement);
  const opcode = format.opcode(statement, size);
  for (const word of opcode) {
    word.assertWordLength();
  }
  const extensions = extendedOperands(format, statement)
    .flatMap((operand) => extensionWords(operand, size));
  return [...opcode, ...extensions].map((word) => word.assertWordLength().toNumber());
}

/** Encodes a statement into big-endian bytes. */
export function compileStatement(statement: OperationStatement): Uint8Array {
  return wordsToBytes(compileWords(statement));
}

/**
 * Number of words the statement encodes to, computed without encoding it.
 */
export function instructionWordCount(statement: OperationStatement): number {
  const { format, size } = resolve(statement);
  const opcodeWords = format === cas ? 2 : 1;
  return extendedOperands(format, statement)
    .reduce((count, operand) => count + extensionWordCount(operand, size), opcodeWords);
}

export function wordsToBytes(words: readonly number[]): Uint8Array {
  const bytes = new Uint8Array(words.length * 2);
  words.forEach((word, i) => {
    bytes[i * 2] = (word >> 8) & 0xff;
    bytes[i * 2 + 1] = word & 0xff;
  });
  return bytes;
}

function resolve(statement: OperationStatement): { format: InstructionFormat; size: Size | undefined } {
  const format = FORMATS.get(statement.operation.code);
  if (format === undefined) {
    throw new InternalError(`No encoding for operation ${statement.operation.code}`);
  }
  const { size } = ensureMatchingConfigurationExists(statement.operation, statement.size, statement.operands);
  return { format, size };
}

function extendedOperands(format: InstructionFormat, statement: OperationStatement): readonly Operand[] {
  return format.extended === undefined ? statement.operands : format.extended(statement.operands);
}

function operandAt(statement: OperationStatement, index: number): Operand {
  const operand = statement.operands[index];
  if (operand === undefined) {
    throw new InternalError(`${formatStatement(statement)} is missing operand ${index + 1}`);
  }
  return operand;
}
