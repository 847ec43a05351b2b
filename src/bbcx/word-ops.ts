/**
 * @fileoverview Arithmetic, bitwise, comparison and type operations on words.
 * (I, I) pairs stay integer and wrap to 24 bits; any F operand promotes to float.
 */

import { WORD_MASK, FWORD_SIGN_MASK } from './constants';
import { WordError } from './errors';
import {
  TYPE_CODES,
  Word,
  fWord,
  intValue,
  isNumeric,
  makeWord,
  numericValue,
  wrapIWord,
} from './word';

export type ArithmeticOp = 'add' | 'subtract' | 'multiply' | 'divide';
export type BitwiseOp = 'or' | 'xor' | 'and';

const requireNumericPair = (operation: string, left: Word, right: Word): void => {
  if (!isNumeric(left) || !isNumeric(right)) {
    throw WordError.typeMismatch(operation, left.tag, right.tag);
  }
};

/**
 * Applies one of the four arithmetic operations.
 * Integer division truncates toward zero.
 */
export function arithmetic(op: ArithmeticOp, left: Word, right: Word): Word {
  requireNumericPair(op, left, right);
  if (left.tag === 'I' && right.tag === 'I') {
    const a = intValue(left);
    const b = intValue(right);
    switch (op) {
      case 'add':
        return wrapIWord(a + b);
      case 'subtract':
        return wrapIWord(a - b);
      case 'multiply':
        return wrapIWord(BigInt(a) * BigInt(b));
      case 'divide':
        if (b === 0) {
          throw WordError.divisionByZero();
        }
        return wrapIWord(Math.trunc(a / b));
    }
  }
  const a = numericValue(left, op);
  const b = numericValue(right, op);
  switch (op) {
    case 'add':
      return fWord(a + b);
    case 'subtract':
      return fWord(a - b);
    case 'multiply':
      return fWord(a * b);
    case 'divide':
      if (b === 0) {
        throw WordError.divisionByZero();
      }
      return fWord(a / b);
  }
}

/** Bitwise operation on raw bits; the result keeps the left operand's tag */
export function bitwise(op: BitwiseOp, left: Word, right: Word): Word {
  if (left.tag === 'Undefined') {
    throw WordError.typeMismatch(op, left.tag, right.tag);
  }
  switch (op) {
    case 'or':
      return makeWord(left.tag, left.bits | right.bits);
    case 'xor':
      return makeWord(left.tag, left.bits ^ right.bits);
    case 'and':
      return makeWord(left.tag, left.bits & right.bits);
  }
}

export function negate(word: Word): Word {
  switch (word.tag) {
    case 'I':
      return wrapIWord(-intValue(word));
    case 'F':
      return word.bits === 0 ? word : makeWord('F', word.bits ^ FWORD_SIGN_MASK);
    default:
      throw WordError.typeMismatch('negate', word.tag);
  }
}

export function invert(word: Word): Word {
  if (word.tag === 'Undefined') {
    throw WordError.typeMismatch('not', word.tag);
  }
  return makeWord(word.tag, ~word.bits & WORD_MASK);
}

/**
 * Word equality: numeric words compare by value, anything else by tag and bits.
 */
export function wordsEqual(left: Word, right: Word): boolean {
  if (isNumeric(left) && isNumeric(right)) {
    return numericValue(left, 'compare') === numericValue(right, 'compare');
  }
  return left.tag === right.tag && left.bits === right.bits;
}

/**
 * Orders two numeric words.
 * @returns Negative, zero or positive like a sort comparator
 */
export function compareWords(left: Word, right: Word): number {
  requireNumericPair('compare', left, right);
  return Math.sign(numericValue(left, 'compare') - numericValue(right, 'compare'));
}

/**
 * Raises left to the power of right. An I zero exponent yields I 1.
 */
export function power(left: Word, right: Word): Word {
  if (right.tag === 'I' && intValue(right) === 0) {
    return wrapIWord(1);
  }
  requireNumericPair('power', left, right);
  const exponent = numericValue(right, 'power');
  if (left.tag === 'I' && right.tag === 'I' && exponent > 0) {
    return wrapIWord(integerPower(BigInt(intValue(left)), BigInt(exponent)));
  }
  return fWord(Math.pow(numericValue(left, 'power'), exponent));
}

// Square-and-multiply kept to 24 bits at every step.
const integerPower = (base: bigint, exponent: bigint): bigint => {
  let result = 1n;
  let factor = BigInt.asUintN(24, base);
  let remaining = exponent;
  while (remaining > 0n) {
    if (remaining & 1n) {
      result = BigInt.asUintN(24, result * factor);
    }
    factor = BigInt.asUintN(24, factor * factor);
    remaining >>= 1n;
  }
  return result;
};

/** Absolute value, keeping the I or F tag */
export function absolute(word: Word): Word {
  return numericValue(word, 'abs') < 0 ? negate(word) : word;
}

/** Converts a numeric word to float */
export function toFloatWord(word: Word): Word {
  return word.tag === 'F' ? word : fWord(numericValue(word, 'float'));
}

// ============================================================================
// Type Introspection
// ============================================================================

export function wordType(word: Word): Word {
  const code = TYPE_CODES.indexOf(word.tag);
  if (code === -1) {
    throw WordError.invalidOperand(`${word.tag} word has no type code`);
  }
  return wrapIWord(code);
}

export function wordBits(word: Word): Word {
  return makeWord('I', word.bits);
}

/** Retags a word using the low two bits of the type code */
export function setWordType(word: Word, code: number): Word {
  const tag = TYPE_CODES[code & 3] ?? 'I';
  return makeWord(tag, word.bits);
}

