/**
 * Immutable bit sequence, most significant bit first.
 *
 * Instruction words are assembled by concatenating fixed templates with
 * encoded fields, then checked to be exactly one 16-bit word.
 */

import { InternalError, invariant } from '../parser/errors.js';

type Bit = 0 | 1;

export const WORD_LENGTH = 16;

export function fitsUnsigned(value: number, width: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < 2 ** width;
}

export function fitsSigned(value: number, width: number): boolean {
  return Number.isInteger(value) && value >= -(2 ** (width - 1)) && value < 2 ** (width - 1);
}

export class Bits {
  static readonly EMPTY = new Bits([]);

  private constructor(private readonly bits: readonly Bit[]) {}

  /** Reads a template such as '0100 0110'. Spaces and underscores are ignored. */
  static fromTemplate(template: string): Bits {
    const bits: Bit[] = [];
    for (const char of template) {
      if (char === '0') bits.push(0);
      else if (char === '1') bits.push(1);
      else if (char !== ' ' && char !== '_') {
        throw new InternalError(`Invalid character '${char}' in bit template '${template}'`);
      }
    }
    return new Bits(bits);
  }

  static unsigned(value: number, width: number): Bits {
    invariant(fitsUnsigned(value, width), `${value} doesn't fit in ${width} unsigned bits`);
    const bits: Bit[] = [];
    for (let i = width - 1; i >= 0; i--) {
      bits.push(Math.floor(value / 2 ** i) % 2 === 1 ? 1 : 0);
    }
    return new Bits(bits);
  }

  // Two's complement
  static signed(value: number, width: number): Bits {
    invariant(fitsSigned(value, width), `${value} doesn't fit in ${width} signed bits`);
    return Bits.unsigned(value < 0 ? value + 2 ** width : value, width);
  }

  get length(): number {
    return this.bits.length;
  }

  concat(...others: Bits[]): Bits {
    return new Bits(this.bits.concat(...others.map((other) => other.bits)));
  }

  assertWordLength(): this {
    if (this.bits.length !== WORD_LENGTH) {
      throw new InternalError(`Expected a ${WORD_LENGTH} bit word, but got ${this.bits.length} bits: ${this.toString()}`);
    }
    return this;
  }

  toNumber(): number {
    return this.bits.reduce<number>((value, bit) => value * 2 + bit, 0);
  }

  toString(): string {
    return this.bits.join('');
  }
}
