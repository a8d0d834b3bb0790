/**
 * Encoders for the fields shared by M68K instructions: size, the 6-bit
 * effective address (mode + register) and the extension words that follow
 * the opcode.
 */

import {
  type Operand,
  OperandType,
  Size,
  formatOperand,
  sizeToString,
} from '../types/ast.js';
import { EncoderError, InternalError } from '../parser/errors.js';
import { Bits, WORD_LENGTH, fitsSigned, fitsUnsigned } from './bits.js';

/**
 * How an instruction lays out its size field.
 *
 * - zeroBased: 2 bits, B=00 W=01 L=10
 * - oneBased: 2 bits, B=01 W=10 L=11
 * - singleBit: 1 bit, W=0 L=1
 * - move: 2 bits, B=01 W=11 L=10
 */
export type SizeEncoding = 'zeroBased' | 'oneBased' | 'singleBit' | 'move';

const SIZE_FIELDS: Record<SizeEncoding, Partial<Record<Size, string>>> = {
  zeroBased: { [Size.Byte]: '00', [Size.Word]: '01', [Size.LongWord]: '10' },
  oneBased: { [Size.Byte]: '01', [Size.Word]: '10', [Size.LongWord]: '11' },
  singleBit: { [Size.Word]: '0', [Size.LongWord]: '1' },
  move: { [Size.Byte]: '01', [Size.Word]: '11', [Size.LongWord]: '10' },
};

export function sizeBits(size: Size | undefined, encoding: SizeEncoding): Bits {
  if (size === undefined) {
    throw new InternalError(`A size is required for the ${encoding} size field`);
  }
  const template = SIZE_FIELDS[encoding][size];
  if (template === undefined) {
    throw new InternalError(`The ${encoding} size field can't encode ${sizeToString(size)}`);
  }
  return Bits.fromTemplate(template);
}

export function modeBits(operand: Operand): Bits {
  switch (operand.type) {
    case OperandType.DataRegisterDirect: return Bits.fromTemplate('000');
    case OperandType.AddressRegisterDirect: return Bits.fromTemplate('001');
    case OperandType.AddressIndirect: return Bits.fromTemplate('010');
    case OperandType.AddressIndirectPostIncrement: return Bits.fromTemplate('011');
    case OperandType.AddressIndirectPreDecrement: return Bits.fromTemplate('100');
    case OperandType.AddressIndirectDisplacement: return Bits.fromTemplate('101');
    case OperandType.AddressIndirectIndex: return Bits.fromTemplate('110');
    case OperandType.AbsoluteWord:
    case OperandType.AbsoluteLongWord:
    case OperandType.PcIndirectDisplacement:
    case OperandType.PcIndirectIndex:
    case OperandType.Immediate:
      return Bits.fromTemplate('111');
    default:
      throw new InternalError(`${formatOperand(operand)} has no effective address mode`);
  }
}

export function registerBits(operand: Operand): Bits {
  switch (operand.type) {
    case OperandType.DataRegisterDirect:
    case OperandType.AddressRegisterDirect:
    case OperandType.AddressIndirect:
    case OperandType.AddressIndirectPostIncrement:
    case OperandType.AddressIndirectPreDecrement:
    case OperandType.AddressIndirectDisplacement:
    case OperandType.AddressIndirectIndex:
      return Bits.unsigned(operand.register.index, 3);
    case OperandType.AbsoluteWord: return Bits.fromTemplate('000');
    case OperandType.AbsoluteLongWord: return Bits.fromTemplate('001');
    case OperandType.PcIndirectDisplacement: return Bits.fromTemplate('010');
    case OperandType.PcIndirectIndex: return Bits.fromTemplate('011');
    case OperandType.Immediate: return Bits.fromTemplate('100');
    default:
      throw new InternalError(`${formatOperand(operand)} has no effective address register`);
  }
}

// Mode followed by register, as in the low six bits of most opcodes
export function effectiveAddress(operand: Operand): Bits {
  return modeBits(operand).concat(registerBits(operand));
}

/**
 * Number of extension words `operand` adds, without checking its values.
 */
export function extensionWordCount(operand: Operand, size: Size | undefined): number {
  switch (operand.type) {
    case OperandType.AddressIndirectDisplacement:
    case OperandType.AddressIndirectIndex:
    case OperandType.AbsoluteWord:
    case OperandType.PcIndirectDisplacement:
    case OperandType.PcIndirectIndex:
      return 1;
    case OperandType.AbsoluteLongWord:
      return 2;
    case OperandType.Immediate:
      return size === Size.LongWord ? 2 : 1;
    default:
      return 0;
  }
}

export function extensionWords(operand: Operand, size: Size | undefined): Bits[] {
  switch (operand.type) {
    case OperandType.AddressIndirectDisplacement:
    case OperandType.PcIndirectDisplacement:
      return [signedField(operand.displacement, 16, 'Displacement', operand)];

    case OperandType.AddressIndirectIndex:
    case OperandType.PcIndirectIndex: {
      if (operand.indexSize === Size.Byte) {
        throw new EncoderError(
          `The index register of ${formatOperand(operand)} can only be used as word (W) or long word (L).`,
          operand.loc
        );
      }
      return [
        Bits.fromTemplate(operand.index.type === 'AddressRegister' ? '1' : '0').concat(
          Bits.unsigned(operand.index.index, 3),
          Bits.fromTemplate(operand.indexSize === Size.LongWord ? '1' : '0'),
          Bits.fromTemplate('000'),
          signedField(operand.displacement, 8, 'Displacement', operand),
        ),
      ];
    }

    case OperandType.AbsoluteWord:
      return [valueField(operand.value, 16, 'Address', operand)];

    case OperandType.AbsoluteLongWord:
      return splitWords(valueField(operand.value, 32, 'Address', operand));

    case OperandType.Immediate:
      return immediateWords(operand.value, size, operand);

    default:
      return [];
  }
}

function immediateWords(value: number, size: Size | undefined, operand: Operand): Bits[] {
  switch (size) {
    case Size.Byte:
      return [Bits.unsigned(0, 8).concat(valueField(value, 8, 'Immediate value', operand))];
    case Size.Word:
      return [valueField(value, 16, 'Immediate value', operand)];
    case Size.LongWord:
      return splitWords(valueField(value, 32, 'Immediate value', operand));
    case undefined:
      throw new InternalError(`Immediate ${formatOperand(operand)} needs a size to be encoded`);
  }
}

function signedField(value: number, width: number, what: string, operand: Operand): Bits {
  if (!fitsSigned(value, width)) {
    throw new EncoderError(
      `${what} ${value} of ${formatOperand(operand)} is out of range. ` +
      `It must be between ${-(2 ** (width - 1))} and ${2 ** (width - 1) - 1}.`,
      operand.loc
    );
  }
  return Bits.signed(value, width);
}

// Accepts both the signed and the unsigned reading of the field
function valueField(value: number, width: number, what: string, operand: Operand): Bits {
  if (fitsSigned(value, width)) return Bits.signed(value, width);
  if (fitsUnsigned(value, width)) return Bits.unsigned(value, width);
  throw new EncoderError(
    `${what} ${value} of ${formatOperand(operand)} doesn't fit in ${width} bits.`,
    operand.loc
  );
}

function splitWords(field: Bits): Bits[] {
  const value = field.toNumber();
  return [
    Bits.unsigned(Math.floor(value / 2 ** WORD_LENGTH), WORD_LENGTH),
    Bits.unsigned(value % 2 ** WORD_LENGTH, WORD_LENGTH),
  ];
}
