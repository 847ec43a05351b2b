/**
 * @fileoverview BBC-X six-bit character set.
 * Maps between host characters and the codes stored in S-words and
 * exchanged by TOUT/PIN. Unused codes are absent from both directions.
 */

import { CHAR_MASK } from './constants';

// Position is the character code; '\u0000' marks code 0 (NUL), '\uffff' an unused one.
const CODE_TABLE =
  '\u0000ABCDEFGHIJKLMNOPQRSTUVWXYZ\'<>\uffff\uffff' +
  '0123456789.@+-()[]*/=\uffff^\uffff?":;, \n\uffff';

const UNUSED = '\uffff';

const codeToChar = new Map<number, string>();
const charToCode = new Map<string, number>();

for (let code = 0; code < CODE_TABLE.length; code += 1) {
  const ch = CODE_TABLE.charAt(code);
  if (ch === UNUSED) {
    continue;
  }
  codeToChar.set(code, ch);
  charToCode.set(ch, code);
}

/** The NUL character used to pad S-words */
export const NUL = '\u0000';

/**
 * Looks up the character for a six-bit code.
 * @returns The character, or undefined for an unused code
 */
export function charFromCode(code: number): string | undefined {
  return codeToChar.get(code & CHAR_MASK);
}

/**
 * Looks up the six-bit code for a character.
 * @returns The code, or undefined when the character is not in the set
 */
export function codeFromChar(ch: string): number | undefined {
  return charToCode.get(ch);
}

/** Converts a byte read from input into its character, if the set has one */
export function charFromByte(byte: number): string | undefined {
  const ch = String.fromCharCode(byte);
  return charToCode.has(ch) ? ch : undefined;
}

/** Whether a character can be stored in an S-word */
export function isCharSetChar(ch: string): boolean {
  return charToCode.has(ch);
}
