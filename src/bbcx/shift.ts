/**
 * @fileoverview Single and double-length shift, rotate, multiply and divide.
 * A double-length value is the accumulator pair (acc-1, acc), acc-1 most significant.
 */

import { DOUBLE_WORD_SIZE, WORD_MASK, WORD_SIZE } from './constants';
import { WordError } from './errors';
import { Word, WordTag, intValue, makeWord, wrapIWord } from './word';

export interface WordPair {
  high: Word;
  low: Word;
}

const DOUBLE_MASK = (1n << BigInt(DOUBLE_WORD_SIZE)) - 1n;

/** Shifted bits keep the word's tag; an Undefined word reads as zero and yields I */
const shiftedTag = (word: Word): WordTag => (word.tag === 'Undefined' ? 'I' : word.tag);

/**
 * Shift left by n bits, discarding bits above the word.
 * A negative count shifts right logically.
 */
export const shiftLeft = (word: Word, n: number): Word => {
  if (n >= WORD_SIZE || n <= -WORD_SIZE) {
    return makeWord(shiftedTag(word), 0);
  }
  const bits = n >= 0 ? (word.bits << n) & WORD_MASK : word.bits >>> -n;
  return makeWord(shiftedTag(word), bits);
};

/**
 * Rotate left by n bits; the count is taken modulo the word size.
 */
export const rotate = (word: Word, n: number): Word => {
  const count = ((n % WORD_SIZE) + WORD_SIZE) % WORD_SIZE;
  if (count === 0) {
    return word;
  }
  const bits = ((word.bits << count) | (word.bits >>> (WORD_SIZE - count))) & WORD_MASK;
  return makeWord(shiftedTag(word), bits);
};

/** Joins a pair into an unsigned 48-bit value */
export const joinPair = (pair: WordPair): bigint =>
  (BigInt(pair.high.bits) << BigInt(WORD_SIZE)) | BigInt(pair.low.bits);

/** Joins a pair into a signed 48-bit value */
export const joinSignedPair = (pair: WordPair): bigint =>
  (BigInt(intValue(pair.high)) << BigInt(WORD_SIZE)) | BigInt(pair.low.bits);

/** Splits 48 bits back into a pair, keeping each half's tag */
const splitPair = (value: bigint, pair: WordPair): WordPair => ({
  high: makeWord(shiftedTag(pair.high), Number((value >> BigInt(WORD_SIZE)) & BigInt(WORD_MASK))),
  low: makeWord(shiftedTag(pair.low), Number(value & BigInt(WORD_MASK))),
});

/**
 * Double-length shift left by n bits; negative n shifts right logically.
 */
export const doubleShiftLeft = (pair: WordPair, n: number): WordPair => {
  const value = joinPair(pair);
  let shifted: bigint;
  if (n >= DOUBLE_WORD_SIZE || n <= -DOUBLE_WORD_SIZE) {
    shifted = 0n;
  } else if (n >= 0) {
    shifted = (value << BigInt(n)) & DOUBLE_MASK;
  } else {
    shifted = value >> BigInt(-n);
  }
  return splitPair(shifted, pair);
};

/**
 * Double-length rotate left; bits leaving bit 47 re-enter at bit 0.
 */
export const doubleRotate = (pair: WordPair, n: number): WordPair => {
  const count = BigInt(((n % DOUBLE_WORD_SIZE) + DOUBLE_WORD_SIZE) % DOUBLE_WORD_SIZE);
  const value = joinPair(pair);
  const rotated =
    ((value << count) | (value >> (BigInt(DOUBLE_WORD_SIZE) - count))) & DOUBLE_MASK;
  return splitPair(rotated, pair);
};

const requireIntegerOperand = (operation: string, operand: Word): bigint => {
  if (operand.tag !== 'I') {
    throw WordError.typeMismatch(operation, operand.tag);
  }
  return BigInt(intValue(operand));
};

/** Splits a signed result into two I-words */
const splitSigned = (value: bigint): WordPair => ({
  high: wrapIWord(BigInt.asIntN(WORD_SIZE, value >> BigInt(WORD_SIZE))),
  low: wrapIWord(BigInt.asIntN(WORD_SIZE, value)),
});

/**
 * Multiplies the signed pair by an I operand, keeping the low 48 bits.
 */
export const doubleMultiply = (pair: WordPair, operand: Word): WordPair => {
  const factor = requireIntegerOperand('double multiply', operand);
  const product = BigInt.asIntN(DOUBLE_WORD_SIZE, joinSignedPair(pair) * factor);
  return splitSigned(product);
};

/**
 * Divides the signed pair by an I operand, truncating toward zero.
 */
export const doubleDivide = (pair: WordPair, operand: Word): WordPair => {
  const divisor = requireIntegerOperand('double divide', operand);
  if (divisor === 0n) {
    throw WordError.divisionByZero();
  }
  const quotient = BigInt.asIntN(DOUBLE_WORD_SIZE, joinSignedPair(pair) / divisor);
  return splitSigned(quotient);
};

/**
 * Squashes the signed pair to its low 24 bits, with the low half's tag.
 */
export const squash = (pair: WordPair): Word => {
  const value = joinSignedPair(pair);
  return makeWord(pair.low.tag, Number(BigInt.asUintN(WORD_SIZE, value)));
};
