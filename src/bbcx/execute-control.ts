/**
 * @fileoverview Skips, jumps, counting instructions and EXEC.
 */

import { accumulator, jump, setAccumulator, skip } from './execute-helpers';
import { ExecuteContext, InstructionHandler } from './execute-types';
import { WordError } from './errors';
import { Word, numericValue, wrapIWord } from './word';
import { arithmetic, compareWords, wordsEqual } from './word-ops';

const ONE = wrapIWord(1);

const skipIf =
  (test: (acc: Word, operand: Word) => boolean): InstructionHandler =>
  (ctx) => {
    if (test(accumulator(ctx), ctx.operand())) {
      skip(ctx);
    }
  };

/** Skips on equality, otherwise steps the accumulator by ±1 */
const skipOrStep =
  (op: 'add' | 'subtract'): InstructionHandler =>
  (ctx) => {
    const acc = accumulator(ctx);
    if (wordsEqual(acc, ctx.operand())) {
      skip(ctx);
    } else {
      setAccumulator(ctx, arithmetic(op, acc, ONE));
    }
  };

const accumulatorSign = (ctx: ExecuteContext, name: string): number =>
  Math.sign(numericValue(accumulator(ctx), name));

const jumpIf =
  (name: string, test: (sign: number) => boolean): InstructionHandler =>
  (ctx) => {
    if (test(accumulatorSign(ctx, name))) {
      jump(ctx, ctx.effectiveAddress());
    }
  };

/** Jumps when the accumulator is zero, otherwise steps it by ±1 */
const jumpOrStep =
  (name: string, op: 'add' | 'subtract'): InstructionHandler =>
  (ctx) => {
    const acc = accumulator(ctx);
    if (numericValue(acc, name) === 0) {
      jump(ctx, ctx.effectiveAddress());
    } else {
      setAccumulator(ctx, arithmetic(op, acc, ONE));
    }
  };

const stepOperand =
  (op: 'add' | 'subtract'): InstructionHandler =>
  (ctx) => {
    const address = ctx.effectiveAddress();
    ctx.memory.write(address, arithmetic(op, ctx.memory.read(address), ONE));
  };

/**
 * JUMP: links the jump's own address into acc-1 (skipped for accumulator 0),
 * then continues at the effective address.
 */
const jumpAndLink: InstructionHandler = (ctx) => {
  const target = ctx.effectiveAddress();
  const acc = ctx.instruction.accumulator;
  if (acc !== 0) {
    ctx.memory.write(acc - 1, wrapIWord(ctx.location));
  }
  jump(ctx, target);
};

const unsupported =
  (name: string): InstructionHandler =>
  () => {
    throw WordError.unsupported(name);
  };

export const controlHandlers = {
  SKIP: skip,
  SKAE: skipIf(wordsEqual),
  SKAN: skipIf((acc, operand) => !wordsEqual(acc, operand)),
  SKET: skipIf((acc, operand) => acc.tag === operand.tag),
  SKAL: skipIf((acc, operand) => compareWords(acc, operand) < 0),
  SKAG: skipIf((acc, operand) => compareWords(acc, operand) > 0),
  SKED: skipOrStep('subtract'),
  SKEI: skipOrStep('add'),
  JUMP: jumpAndLink,
  JEZ: jumpIf('JEZ', (sign) => sign === 0),
  JNZ: jumpIf('JNZ', (sign) => sign !== 0),
  JAT: unsupported('JAT'),
  JLZ: jumpIf('JLZ', (sign) => sign < 0),
  JGZ: jumpIf('JGZ', (sign) => sign > 0),
  JZD: jumpOrStep('JZD', 'subtract'),
  JZI: jumpOrStep('JZI', 'add'),
  DECR: stepOperand('subtract'),
  INCR: stepOperand('add'),
  MOCKP: unsupported('MOCKP'),
  MOCKS: unsupported('MOCKS'),
  DBYTE: unsupported('DBYTE'),
  UNUSED: unsupported('UNUSED'),
  EXEC: (ctx) => {
    ctx.execute(ctx.operand());
  },
} satisfies Record<string, InstructionHandler>;
