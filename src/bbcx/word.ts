/**
 * @fileoverview Tagged 24-bit words.
 * A word is a tag plus raw bits; typed values are decoded on demand.
 */

import { NUL, charFromCode, codeFromChar } from './charset';
import {
  CHAR_BITS,
  CHAR_MASK,
  FWORD_EXPONENT_BIAS,
  FWORD_EXPONENT_MASK,
  FWORD_EXPONENT_MAX,
  FWORD_EXPONENT_SHIFT,
  FWORD_MANTISSA_BITS,
  FWORD_MANTISSA_MASK,
  FWORD_SIGN_MASK,
  INT_MAX,
  INT_MIN,
  SWORD_CHARS,
  WORD_MASK,
  WORD_MODULUS,
  WORD_SIGN,
} from './constants';
import { WordError } from './errors';

export type WordTag = 'Undefined' | 'I' | 'F' | 'S' | 'P';

export interface Word {
  readonly tag: WordTag;
  /** Raw 24-bit payload; always 0 for Undefined */
  readonly bits: number;
}

export const UNDEFINED_WORD: Word = Object.freeze({ tag: 'Undefined', bits: 0 });

/** Type codes reported by TTYP and accepted by TTTT */
export const TYPE_CODES: readonly WordTag[] = ['I', 'F', 'S', 'P'] as const;

export function makeWord(tag: WordTag, bits: number): Word {
  if (tag === 'Undefined') {
    return UNDEFINED_WORD;
  }
  return { tag, bits: bits & WORD_MASK };
}

export function isNumeric(word: Word): boolean {
  return word.tag === 'I' || word.tag === 'F';
}

/** Interprets 24 raw bits as a two's-complement integer */
export function signExtend(bits: number): number {
  const masked = bits & WORD_MASK;
  return masked & WORD_SIGN ? masked - WORD_MODULUS : masked;
}

// ============================================================================
// I-words
// ============================================================================

/**
 * Encodes an integer literal.
 * @throws WordError InvalidIWordValue when the value is not a 24-bit integer
 */
export function iWord(value: number): Word {
  if (!Number.isInteger(value) || value < INT_MIN || value > INT_MAX) {
    throw WordError.invalidIWord(value);
  }
  return makeWord('I', value);
}

/** Encodes an integer result, wrapping it to 24 bits */
export function wrapIWord(value: number | bigint): Word {
  if (typeof value === 'bigint') {
    return makeWord('I', Number(BigInt.asUintN(24, value)));
  }
  const wrapped = ((Math.trunc(value) % WORD_MODULUS) + WORD_MODULUS) % WORD_MODULUS;
  return makeWord('I', wrapped);
}

export function intValue(word: Word): number {
  return signExtend(word.bits);
}

// ============================================================================
// F-words
// ============================================================================

/**
 * Encodes a float. The mantissa keeps the top 16 fraction bits.
 * @throws WordError InvalidFWordValue for NaN, infinities and out-of-range exponents
 */
export function fWord(value: number): Word {
  if (!Number.isFinite(value)) {
    throw WordError.invalidFWord(value);
  }
  if (value === 0) {
    return makeWord('F', 0);
  }
  const magnitude = Math.abs(value);
  let exponent = Math.floor(Math.log2(magnitude));
  let fraction = magnitude / Math.pow(2, exponent);
  // log2 can be off by one near powers of two
  if (fraction >= 2) {
    fraction /= 2;
    exponent += 1;
  } else if (fraction < 1) {
    fraction *= 2;
    exponent -= 1;
  }
  const stored = exponent + FWORD_EXPONENT_BIAS;
  if (stored < 1 || stored > FWORD_EXPONENT_MAX) {
    throw WordError.invalidFWord(value);
  }
  const mantissa = Math.floor((fraction - 1) * 2 ** FWORD_MANTISSA_BITS);
  const sign = value < 0 ? FWORD_SIGN_MASK : 0;
  return makeWord('F', sign | (stored << FWORD_EXPONENT_SHIFT) | mantissa);
}

export function floatValue(word: Word): number {
  const bits = word.bits;
  if (bits === 0) {
    return 0;
  }
  const sign = bits & FWORD_SIGN_MASK ? -1 : 1;
  const exponent = ((bits & FWORD_EXPONENT_MASK) >>> FWORD_EXPONENT_SHIFT) - FWORD_EXPONENT_BIAS;
  const mantissa = (bits & FWORD_MANTISSA_MASK) / 2 ** FWORD_MANTISSA_BITS;
  return sign * (1 + mantissa) * Math.pow(2, exponent);
}

/**
 * Reads an I or F word as a JavaScript number.
 * @throws WordError ArithmeticTypeMismatch for any other tag
 */
export function numericValue(word: Word, operation: string): number {
  switch (word.tag) {
    case 'I':
      return intValue(word);
    case 'F':
      return floatValue(word);
    default:
      throw WordError.typeMismatch(operation, word.tag);
  }
}

/** Reads an I or F word as an integer count, truncating floats */
export function integerOperand(word: Word, operation: string): number {
  return Math.trunc(numericValue(word, operation));
}

// ============================================================================
// S-words
// ============================================================================

/**
 * Encodes up to four characters, first character most significant.
 * @throws WordError InvalidSWordValue for long strings or unknown characters
 */
export function sWord(text: string): Word {
  if (text.length > SWORD_CHARS) {
    throw WordError.invalidSWord(text);
  }
  let bits = 0;
  for (let i = 0; i < SWORD_CHARS; i += 1) {
    const code = i < text.length ? codeFromChar(text.charAt(i)) : 0;
    if (code === undefined) {
      throw WordError.invalidSWord(text);
    }
    bits = (bits << CHAR_BITS) | code;
  }
  return makeWord('S', bits);
}

/** Splits 24 bits into four six-bit codes, most significant first */
export function charCodes(bits: number): number[] {
  const codes: number[] = [];
  for (let i = SWORD_CHARS - 1; i >= 0; i -= 1) {
    codes.push((bits >>> (i * CHAR_BITS)) & CHAR_MASK);
  }
  return codes;
}

/**
 * Decodes all four characters, NUL padding included.
 * @throws WordError InvalidSWordValue when a code is unused
 */
export function stringValue(word: Word): string {
  return charCodes(word.bits)
    .map((code) => {
      const ch = charFromCode(code);
      if (ch === undefined) {
        throw WordError.invalidSWord(`code ${code}`);
      }
      return ch;
    })
    .join('');
}

/** Strips the NUL padding from a decoded S-word */
export function trimNul(text: string): string {
  const end = text.indexOf(NUL);
  return end === -1 ? text : text.slice(0, end);
}
