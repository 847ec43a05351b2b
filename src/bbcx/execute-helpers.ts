/**
 * @fileoverview Helpers shared by the instruction handlers.
 */

import { WordError } from './errors';
import { ExecuteContext } from './execute-types';
import { Instruction, decodeInstruction } from './instruction';
import { Memory } from './memory';
import { WordPair } from './shift';
import { Word, intValue } from './word';

/**
 * Computes an instruction's effective address: indirection first, then
 * the signed value of the index register.
 * @throws WordError InvalidOperand when indexing fails or leaves memory
 */
export function resolveEffectiveAddress(memory: Memory, instruction: Instruction): number {
  let address = instruction.address;
  if (instruction.indirect) {
    address = decodeInstruction(memory.read(address)).address;
  }
  const index = memory.indexRegister(instruction.indexRegister);
  if (index !== undefined) {
    if (index.tag !== 'I') {
      throw WordError.invalidOperand(
        `index register ${instruction.indexRegister} holds a ${index.tag} word`
      );
    }
    address += intValue(index);
  }
  if (!Memory.isAddress(address)) {
    throw WordError.invalidOperand(`effective address ${address} outside memory`);
  }
  return address;
}

export const accumulator = (ctx: ExecuteContext): Word =>
  ctx.memory.accumulator(ctx.instruction.accumulator);

export const setAccumulator = (ctx: ExecuteContext, word: Word): void => {
  ctx.memory.setAccumulator(ctx.instruction.accumulator, word);
};

/** The word at the instruction's direct address, ignoring indexing and indirection */
export const directWord = (ctx: ExecuteContext): Word => ctx.memory.read(ctx.instruction.address);

export const setDirectWord = (ctx: ExecuteContext, word: Word): void => {
  ctx.memory.write(ctx.instruction.address, word);
};

/**
 * The accumulator that holds the high half of a pair.
 * @throws WordError InvalidOperand for accumulator 0
 */
export const pairHigh = (ctx: ExecuteContext): number => {
  const acc = ctx.instruction.accumulator;
  if (acc === 0) {
    throw WordError.invalidOperand(`${ctx.instruction.function} needs an accumulator above 0`);
  }
  return acc - 1;
};

export const readPair = (ctx: ExecuteContext): WordPair => ({
  high: ctx.memory.read(pairHigh(ctx)),
  low: accumulator(ctx),
});

export const writePair = (ctx: ExecuteContext, pair: WordPair): void => {
  const high = pairHigh(ctx);
  ctx.memory.write(high, pair.high);
  setAccumulator(ctx, pair.low);
};

/** Skips the next instruction */
export const skip = (ctx: ExecuteContext): void => {
  ctx.state.pc += 1;
};

export const jump = (ctx: ExecuteContext, address: number): void => {
  ctx.state.pc = address;
};
