/**
 * @fileoverview Store instructions (P-group) and character I/O.
 * Stores address memory directly: indexing and indirection do not apply.
 */

import { charFromByte, charFromCode } from './charset';
import { CHAR_MASK } from './constants';
import { WordError } from './errors';
import { accumulator, directWord, readPair, setDirectWord } from './execute-helpers';
import { InstructionHandler } from './execute-types';
import { END_OF_DATA, writeText } from './io';
import { squash } from './shift';
import { Word, makeWord, sWord } from './word';
import { invert, negate } from './word-ops';

const store =
  (f: (acc: Word) => Word): InstructionHandler =>
  (ctx) => {
    setDirectWord(ctx, f(accumulator(ctx)));
  };

/** PTYZ: the accumulator's bits under the target's tag; an Undefined target becomes I */
const storeBits: InstructionHandler = (ctx) => {
  const target = directWord(ctx);
  const tag = target.tag === 'Undefined' ? 'I' : target.tag;
  setDirectWord(ctx, makeWord(tag, accumulator(ctx).bits));
};

const storeType: InstructionHandler = (ctx) => {
  const target = directWord(ctx);
  setDirectWord(ctx, makeWord(accumulator(ctx).tag, target.bits));
};

/**
 * PIN: reads one byte and stores it as a one-character S-word, echoing it.
 * At end of input the end-of-data marker is written and memory is untouched.
 */
const input: InstructionHandler = (ctx) => {
  const byte = ctx.io.read();
  if (byte === undefined) {
    writeText(ctx.io, END_OF_DATA);
    return;
  }
  const ch = charFromByte(byte);
  if (ch === undefined) {
    throw WordError.invalidSWord(String.fromCharCode(byte));
  }
  setDirectWord(ctx, sWord(ch));
  ctx.io.write(byte);
};

/** TOUT: writes the character for the operand's low six bits */
const output: InstructionHandler = (ctx) => {
  const code = ctx.operand().bits & CHAR_MASK;
  const ch = charFromCode(code);
  if (ch === undefined) {
    throw WordError.invalidSWord(`code ${code}`);
  }
  writeText(ctx.io, ch);
};

export const storeHandlers = {
  TOUT: output,
  PUT: store((acc) => acc),
  PSQU: (ctx) => {
    setDirectWord(ctx, squash(readPair(ctx)));
  },
  PNEG: store(negate),
  PNOT: store(invert),
  PTYP: storeType,
  PTYZ: storeBits,
  PFFP: () => {
    throw WordError.unsupported('PFFP');
  },
  PIN: input,
} satisfies Record<string, InstructionHandler>;
