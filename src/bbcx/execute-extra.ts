/**
 * @fileoverview EXTRA: the library routines selected by the address field.
 * Each routine works on the instruction's accumulator.
 */

import { WordError } from './errors';
import { accumulator, setAccumulator } from './execute-helpers';
import { ExecuteContext, InstructionHandler } from './execute-types';
import { formatWord } from './format';
import { END_OF_DATA, writeText } from './io';
import { LibraryRoutine, libraryRoutineOf } from './opcodes';
import { Word, fWord, iWord, numericValue, stringValue, trimNul } from './word';
import { absolute, toFloatWord } from './word-ops';

const FORM_FEED = '\f';
const NUMBER_CHARS = /^[+\-0-9.@]$/;
const WHITESPACE_CHARS = /^[ \t\r\n]$/;

const mathFunction =
  (name: string, f: (x: number) => number) =>
  (acc: Word): Word =>
    fWord(f(numericValue(acc, name)));

/**
 * Reads the next whitespace-delimited token from input.
 * @returns The token, or undefined at end of input
 */
const readToken = (ctx: ExecuteContext): string | undefined => {
  let token = '';
  for (;;) {
    const byte = ctx.io.read();
    if (byte === undefined) {
      return token === '' ? undefined : token;
    }
    const ch = String.fromCharCode(byte);
    if (WHITESPACE_CHARS.test(ch)) {
      if (token !== '') {
        return token;
      }
      continue;
    }
    token += ch;
  }
};

/** Parses a number in source notation: integers become I, anything with `.` or `@` F */
export const parseNumber = (token: string): Word => {
  const invalid = (): WordError => WordError.invalidOperand(`cannot read "${token}" as a number`);
  if (![...token].every((ch) => NUMBER_CHARS.test(ch))) {
    throw invalid();
  }
  const value = Number(token.replace('@', 'e'));
  if (Number.isNaN(value)) {
    throw invalid();
  }
  return token.includes('.') || token.includes('@') ? fWord(value) : iWord(value);
};

const transforms: Partial<Record<LibraryRoutine, (acc: Word) => Word>> = {
  SQRT: mathFunction('SQRT', Math.sqrt),
  LN: mathFunction('LN', Math.log),
  EXP: mathFunction('EXP', Math.exp),
  SIN: mathFunction('SIN', Math.sin),
  COS: mathFunction('COS', Math.cos),
  TAN: mathFunction('TAN', Math.tan),
  ATN: mathFunction('ATN', Math.atan),
  INT: (acc) => iWord(Math.trunc(numericValue(acc, 'INT'))),
  FRAC: (acc) => {
    const value = numericValue(acc, 'FRAC');
    return fWord(value - Math.trunc(value));
  },
  FLOAT: toFloatWord,
  ABS: absolute,
};

function runRoutine(ctx: ExecuteContext, routine: LibraryRoutine): void {
  const transform = transforms[routine];
  if (transform !== undefined) {
    setAccumulator(ctx, transform(accumulator(ctx)));
    return;
  }
  switch (routine) {
    case 'RND':
      setAccumulator(ctx, fWord(ctx.io.random()));
      return;
    case 'READ': {
      const token = readToken(ctx);
      if (token === undefined) {
        writeText(ctx.io, END_OF_DATA);
        return;
      }
      setAccumulator(ctx, parseNumber(token));
      return;
    }
    case 'PRINT': {
      const acc = accumulator(ctx);
      if (acc.tag === 'Undefined') {
        throw WordError.typeMismatch('PRINT', acc.tag);
      }
      writeText(ctx.io, formatWord(acc));
      return;
    }
    case 'CAPTN': {
      const acc = accumulator(ctx);
      if (acc.tag !== 'S') {
        throw WordError.typeMismatch('CAPTN', acc.tag);
      }
      writeText(ctx.io, trimNul(stringValue(acc)));
      return;
    }
    case 'LINE':
      writeText(ctx.io, '\n');
      return;
    case 'PAGE':
      writeText(ctx.io, FORM_FEED);
      return;
    case 'STOP':
      ctx.state.halted = true;
      return;
    default:
      throw WordError.unsupported(routine);
  }
}

export const extraHandlers = {
  EXTRA: (ctx) => {
    const routine = libraryRoutineOf(ctx.instruction.address);
    if (routine === undefined) {
      throw WordError.unsupported(`EXTRA ${ctx.instruction.address}`);
    }
    runRoutine(ctx, routine);
  },
} satisfies Record<string, InstructionHandler>;
