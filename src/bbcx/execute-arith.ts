/**
 * @fileoverview Accumulator instructions: logic, arithmetic, loads, type
 * operations, shifts and the exchanging X forms.
 */

import {
  accumulator,
  directWord,
  pairHigh,
  readPair,
  setAccumulator,
  setDirectWord,
  writePair,
} from './execute-helpers';
import { InstructionHandler } from './execute-types';
import {
  doubleDivide,
  doubleMultiply,
  doubleRotate,
  doubleShiftLeft,
  rotate,
  shiftLeft,
} from './shift';
import { Word, integerOperand, numericValue, wrapIWord } from './word';
import {
  arithmetic,
  bitwise,
  invert,
  negate,
  power,
  setWordType,
  wordBits,
  wordType,
} from './word-ops';

type BinaryOp = (left: Word, right: Word) => Word;

const or: BinaryOp = (a, b) => bitwise('or', a, b);
const xor: BinaryOp = (a, b) => bitwise('xor', a, b);
const and: BinaryOp = (a, b) => bitwise('and', a, b);
const add: BinaryOp = (a, b) => arithmetic('add', a, b);
const subtract: BinaryOp = (a, b) => arithmetic('subtract', a, b);
const multiply: BinaryOp = (a, b) => arithmetic('multiply', a, b);
const divide: BinaryOp = (a, b) => arithmetic('divide', a, b);

/** acc ← acc op operand */
const accumulate =
  (op: BinaryOp): InstructionHandler =>
  (ctx) => {
    setAccumulator(ctx, op(accumulator(ctx), ctx.operand()));
  };

/** acc ← f(operand) */
const load =
  (f: (operand: Word) => Word): InstructionHandler =>
  (ctx) => {
    setAccumulator(ctx, f(ctx.operand()));
  };

/**
 * Computes acc op operand, then exchanges: the direct address receives the
 * result and the accumulator receives the word it held.
 */
const accumulateAndSwap =
  (op: BinaryOp): InstructionHandler =>
  (ctx) => {
    const result = op(accumulator(ctx), ctx.operand());
    const previous = directWord(ctx);
    setDirectWord(ctx, result);
    setAccumulator(ctx, previous);
  };

const swap: InstructionHandler = (ctx) => {
  const acc = accumulator(ctx);
  const previous = directWord(ctx);
  setDirectWord(ctx, acc);
  setAccumulator(ctx, previous);
};

/** TSTR: acc ← operand; acc-1 ← -1 when operand < 1, else 0 */
const takeAndTest: InstructionHandler = (ctx) => {
  const operand = ctx.operand();
  const high = pairHigh(ctx);
  const flag = numericValue(operand, 'TSTR') < 1 ? -1 : 0;
  ctx.memory.write(high, wrapIWord(flag));
  setAccumulator(ctx, operand);
};

const shiftBy =
  (name: string, f: (word: Word, n: number) => Word): InstructionHandler =>
  (ctx) => {
    setAccumulator(ctx, f(accumulator(ctx), integerOperand(ctx.operand(), name)));
  };

export const arithmeticHandlers = {
  NIL: () => undefined,
  OR: accumulate(or),
  NEQV: accumulate(xor),
  AND: accumulate(and),
  ADD: accumulate(add),
  SUBT: accumulate(subtract),
  MULT: accumulate(multiply),
  DVD: accumulate(divide),
  TAKE: load((operand) => operand),
  TSTR: takeAndTest,
  TNEG: load(negate),
  TNOT: load(invert),
  TTYP: load(wordType),
  TTYZ: load(wordBits),
  TTTT: (ctx) => {
    setAccumulator(ctx, setWordType(accumulator(ctx), integerOperand(ctx.operand(), 'TTTT')));
  },
  SHL: shiftBy('SHL', shiftLeft),
  ROT: shiftBy('ROT', rotate),
  DSHL: (ctx) => {
    writePair(ctx, doubleShiftLeft(readPair(ctx), integerOperand(ctx.operand(), 'DSHL')));
  },
  DROT: (ctx) => {
    writePair(ctx, doubleRotate(readPair(ctx), integerOperand(ctx.operand(), 'DROT')));
  },
  POWR: accumulate(power),
  DMULT: (ctx) => {
    writePair(ctx, doubleMultiply(readPair(ctx), ctx.operand()));
  },
  DIV: accumulate(divide),
  DDIV: (ctx) => {
    writePair(ctx, doubleDivide(readPair(ctx), ctx.operand()));
  },
  NILX: swap,
  ORX: accumulateAndSwap(or),
  NEQVX: accumulateAndSwap(xor),
  ANDX: accumulateAndSwap(and),
  ADDX: accumulateAndSwap(add),
  SUBTX: accumulateAndSwap(subtract),
  MULTX: accumulateAndSwap(multiply),
  DVDX: accumulateAndSwap(divide),
} satisfies Record<string, InstructionHandler>;
