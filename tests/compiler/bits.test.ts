import { describe, it, expect } from 'vitest';
import { Bits, fitsSigned, fitsUnsigned } from '../../src/compiler/bits.js';
import { InternalError } from '../../src/parser/errors.js';

describe('Bits', () => {
  describe('construction', () => {
    it('should read templates', () => {
      const bits = Bits.fromTemplate('0100 0110');
      expect(bits.length).toBe(8);
      expect(bits.toString()).toBe('01000110');
      expect(bits.toNumber()).toBe(0x46);
    });

    it('should reject invalid template characters', () => {
      expect(() => Bits.fromTemplate('01a')).toThrow(InternalError);
    });

    it('should encode unsigned fields', () => {
      expect(Bits.unsigned(5, 3).toString()).toBe('101');
      expect(Bits.unsigned(0, 2).toString()).toBe('00');
      expect(Bits.unsigned(0xffffffff, 32).toNumber()).toBe(4294967295);
    });

    it('should encode signed fields in two\'s complement', () => {
      expect(Bits.signed(-1, 4).toString()).toBe('1111');
      expect(Bits.signed(-8, 4).toString()).toBe('1000');
      expect(Bits.signed(7, 4).toString()).toBe('0111');
    });

    it('should reject values that do not fit', () => {
      expect(() => Bits.unsigned(8, 3)).toThrow(InternalError);
      expect(() => Bits.signed(8, 4)).toThrow(InternalError);
      expect(() => Bits.unsigned(-1, 4)).toThrow(InternalError);
    });
  });

  describe('concat', () => {
    it('should append in order', () => {
      const bits = Bits.fromTemplate('01').concat(Bits.unsigned(2, 2), Bits.fromTemplate('1'));
      expect(bits.toString()).toBe('01101');
    });

    it('should leave the original unchanged', () => {
      const head = Bits.fromTemplate('1');
      head.concat(Bits.fromTemplate('0'));
      expect(head.toString()).toBe('1');
      expect(Bits.EMPTY.concat(head).toString()).toBe('1');
    });
  });

  describe('assertWordLength', () => {
    it('should pass a 16 bit word through', () => {
      const word = Bits.unsigned(0x4643, 16);
      expect(word.assertWordLength()).toBe(word);
    });

    it('should throw for other lengths', () => {
      expect(() => Bits.unsigned(0, 15).assertWordLength()).toThrow(
        'Expected a 16 bit word, but got 15 bits: 000000000000000'
      );
    });
  });
});

describe('field range checks', () => {
  it('should check signed ranges', () => {
    expect(fitsSigned(-128, 8)).toBe(true);
    expect(fitsSigned(127, 8)).toBe(true);
    expect(fitsSigned(-129, 8)).toBe(false);
    expect(fitsSigned(128, 8)).toBe(false);
  });

  it('should check unsigned ranges', () => {
    expect(fitsUnsigned(255, 8)).toBe(true);
    expect(fitsUnsigned(256, 8)).toBe(false);
    expect(fitsUnsigned(1.5, 8)).toBe(false);
  });
});
