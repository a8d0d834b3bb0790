import { describe, it, expect } from 'vitest';
import {
  effectiveAddress,
  extensionWordCount,
  extensionWords,
  modeBits,
  registerBits,
  sizeBits,
} from '../../src/compiler/fields.js';
import { parseOperand } from '../../src/parser/operand-parser.js';
import { LineCursor } from '../../src/parser/line-cursor.js';
import { tokenize } from '../../src/parser/lexer.js';
import { EncoderError, ErrorCollector, InternalError } from '../../src/parser/errors.js';
import { Size, type Operand } from '../../src/types/ast.js';

function operand(source: string): Operand {
  return parseOperand(new LineCursor(tokenize(source), new ErrorCollector()));
}

function words(source: string, size?: Size): number[] {
  return extensionWords(operand(source), size).map((word) => word.toNumber());
}

describe('Instruction fields', () => {
  describe('sizeBits', () => {
    it('should encode every scheme', () => {
      expect(sizeBits(Size.Byte, 'zeroBased').toString()).toBe('00');
      expect(sizeBits(Size.LongWord, 'zeroBased').toString()).toBe('10');
      expect(sizeBits(Size.Byte, 'oneBased').toString()).toBe('01');
      expect(sizeBits(Size.LongWord, 'oneBased').toString()).toBe('11');
      expect(sizeBits(Size.Word, 'singleBit').toString()).toBe('0');
      expect(sizeBits(Size.LongWord, 'singleBit').toString()).toBe('1');
      expect(sizeBits(Size.Word, 'move').toString()).toBe('11');
      expect(sizeBits(Size.LongWord, 'move').toString()).toBe('10');
    });

    it('should refuse sizes a scheme cannot encode', () => {
      expect(() => sizeBits(Size.Byte, 'singleBit')).toThrow(InternalError);
      expect(() => sizeBits(undefined, 'zeroBased')).toThrow(InternalError);
    });
  });

  describe('effective address', () => {
    it('should encode register modes with the register number', () => {
      expect(effectiveAddress(operand('D3')).toString()).toBe('000011');
      expect(effectiveAddress(operand('A1')).toString()).toBe('001001');
      expect(effectiveAddress(operand('-(A7)')).toString()).toBe('100111');
      expect(effectiveAddress(operand('(0,A2,D0.W)')).toString()).toBe('110010');
    });

    it('should share mode 111 for the special modes', () => {
      const special = ['(1).W', '(1).L', '(1,PC)', '(1,PC,D0.W)', '#1'];
      expect(special.map((source) => modeBits(operand(source)).toString())).toEqual(['111', '111', '111', '111', '111']);
      expect(special.map((source) => registerBits(operand(source)).toString())).toEqual(['000', '001', '010', '011', '100']);
    });

    it('should refuse operands without an effective address', () => {
      expect(() => modeBits(operand('CCR'))).toThrow(InternalError);
      expect(() => registerBits(operand('USP'))).toThrow(InternalError);
    });
  });

  describe('extensionWords', () => {
    it('should encode displacements as signed words', () => {
      expect(words('(-2,A0)')).toEqual([0xfffe]);
      expect(words('(8,PC)')).toEqual([0x0008]);
    });

    it('should encode the brief index word', () => {
      expect(words('(-5,A3,D2.W)')).toEqual([0x20fb]);
      expect(words('(2,PC,A1.L)')).toEqual([0x9802]);
    });

    it('should encode absolute addresses', () => {
      expect(words('(5).W')).toEqual([0x0005]);
      expect(words('($12345678).L')).toEqual([0x1234, 0x5678]);
    });

    it('should encode immediates by size', () => {
      expect(words('#-1', Size.Byte)).toEqual([0x00ff]);
      expect(words('#$1234', Size.Word)).toEqual([0x1234]);
      expect(words('#1', Size.LongWord)).toEqual([0x0000, 0x0001]);
    });

    it('should add nothing for register operands', () => {
      expect(words('D0')).toEqual([]);
      expect(words('SR')).toEqual([]);
    });

    it('should reject values out of range', () => {
      expect(() => words('(128,A0,D0.W)')).toThrow(
        'Displacement 128 of (128,A0,D0.W) is out of range. It must be between -128 and 127.'
      );
      expect(() => words('(32768,A0)')).toThrow(
        'Displacement 32768 of (32768,A0) is out of range. It must be between -32768 and 32767.'
      );
      expect(() => words('($10000).W')).toThrow('Address 65536 of (65536).W doesn\'t fit in 16 bits.');
      expect(() => words('#256', Size.Byte)).toThrow(EncoderError);
    });

    it('should reject byte sized index registers', () => {
      expect(() => words('(0,A0,D0.B)')).toThrow(
        'The index register of (0,A0,D0.B) can only be used as word (W) or long word (L).'
      );
    });
  });

  describe('extensionWordCount', () => {
    it('should count without encoding', () => {
      expect(extensionWordCount(operand('#1'), Size.LongWord)).toBe(2);
      expect(extensionWordCount(operand('#1'), Size.Byte)).toBe(1);
      expect(extensionWordCount(operand('(70000,A0)'), Size.Word)).toBe(1);
      expect(extensionWordCount(operand('(1).L'), undefined)).toBe(2);
      expect(extensionWordCount(operand('(A0)+'), Size.Word)).toBe(0);
    });
  });
});
