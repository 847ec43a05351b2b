/**
 * @fileoverview Syntax tree for BBC-X source programs.
 */

import { Mnemonic } from './opcodes';

export type Address =
  | { kind: 'identifier'; name: string }
  | { kind: 'numeric'; value: number };

export type StoreOperand =
  | { kind: 'address'; address: Address; indirect: boolean; indexRegister: number }
  | { kind: 'integer'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'none' };

export interface PWordSource {
  kind: 'P';
  function: Mnemonic;
  accumulator: number;
  operand: StoreOperand;
}

export type SourceWord =
  | { kind: 'I'; value: number }
  | { kind: 'F'; value: number }
  | { kind: 'S'; value: string }
  | PWordSource;

/** One translated line: the word destined for `location` */
export interface SourceLine {
  location: number;
  label?: string;
  word: SourceWord;
  comment?: string;
}

/** Outcome of parsing one line of text, kept for listings */
export type ParsedLine =
  | { kind: 'code'; lineNumber: number; text: string; line: SourceLine }
  | { kind: 'blank'; lineNumber: number; text: string }
  | { kind: 'failed'; lineNumber: number; text: string; reason: string };

export interface ParsedProgram {
  lines: ParsedLine[];
}

/** Default accumulator when the source omits `acc,` */
export const DEFAULT_ACCUMULATOR = 1;

/** Whether an operand is a literal that the linker must allocate */
export function isConstantOperand(operand: StoreOperand): boolean {
  return operand.kind === 'integer' || operand.kind === 'float' || operand.kind === 'string';
}

/** The identifier a source word refers to, if any */
export function referencedIdentifier(word: SourceWord): string | undefined {
  if (word.kind !== 'P' || word.operand.kind !== 'address') {
    return undefined;
  }
  const address = word.operand.address;
  return address.kind === 'identifier' ? address.name : undefined;
}

export function sourceLines(program: ParsedProgram): SourceLine[] {
  const lines: SourceLine[] = [];
  for (const parsed of program.lines) {
    if (parsed.kind === 'code') {
      lines.push(parsed.line);
    }
  }
  return lines;
}
