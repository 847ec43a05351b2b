/**
 * @fileoverview Renders words in source notation for traces, dumps and PRINT.
 */

import { NUL, charFromCode } from './charset';
import { decodeInstruction, formatInstruction } from './instruction';
import { Word, charCodes, floatValue, intValue } from './word';

const signed = (text: string): string => (text.startsWith('-') ? text : `+${text}`);

export function formatInteger(value: number): string {
  return signed(String(value));
}

/** `+1.5`, `-2.5@-7`: JavaScript exponent notation with `@` for `e` */
export function formatFloat(value: number): string {
  const text = Number.isInteger(value) && Math.abs(value) < 1e21 ? value.toFixed(1) : String(value);
  return signed(text.replace(/e\+?/, '@'));
}

/** Quoted characters up to the first NUL; unused codes show as `?` */
export function formatString(bits: number): string {
  let text = '';
  for (const code of charCodes(bits)) {
    const ch = charFromCode(code) ?? '?';
    if (ch === NUL) {
      break;
    }
    text += ch === '\n' ? '\\n' : ch;
  }
  return `"${text}"`;
}

export function formatWord(word: Word): string {
  switch (word.tag) {
    case 'Undefined':
      return 'UNDEFINED';
    case 'I':
      return formatInteger(intValue(word));
    case 'F':
      return formatFloat(floatValue(word));
    case 'S':
      return formatString(word.bits);
    case 'P':
      return formatInstruction(decodeInstruction(word));
  }
}
