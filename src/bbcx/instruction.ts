/**
 * @fileoverview Packing and unpacking of P-word instructions.
 */

import {
  PWORD_ACCUMULATOR_MASK,
  PWORD_ACCUMULATOR_SHIFT,
  PWORD_ADDRESS_MASK,
  PWORD_FUNCTION_MASK,
  PWORD_FUNCTION_SHIFT,
  PWORD_INDEX_REGISTER_MASK,
  PWORD_INDEX_REGISTER_SHIFT,
  PWORD_INDIRECT_MASK,
  PWORD_PAGE_MASK,
} from './constants';
import { WordError } from './errors';
import { FUNCTION_COUNT, Mnemonic, functionCode, mnemonicOf } from './opcodes';
import { Word, makeWord } from './word';

export interface Instruction {
  function: Mnemonic;
  /** Accumulator 0..7 */
  accumulator: number;
  /** Index register 0..7; 0 means no indexing */
  indexRegister: number;
  indirect: boolean;
  /** Page bit 0..1; carried but not interpreted */
  page: number;
  /** Address 0..1023 */
  address: number;
}

const ADDRESS_LIMIT = PWORD_ADDRESS_MASK;

const checkField = (name: string, value: number, max: number): void => {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw WordError.invalidOperand(`${name} ${value} outside 0..${max}`);
  }
};

/**
 * Packs an instruction into a P-word.
 * @throws WordError InvalidOperand when a field is out of range
 */
export function encodeInstruction(instruction: Instruction): Word {
  const code = functionCode(instruction.function);
  checkField('function', code, FUNCTION_COUNT - 1);
  checkField('accumulator', instruction.accumulator, 7);
  checkField('index register', instruction.indexRegister, 7);
  checkField('page', instruction.page, 1);
  checkField('address', instruction.address, ADDRESS_LIMIT);
  const bits =
    (code << PWORD_FUNCTION_SHIFT) |
    (instruction.accumulator << PWORD_ACCUMULATOR_SHIFT) |
    (instruction.indexRegister << PWORD_INDEX_REGISTER_SHIFT) |
    (instruction.indirect ? PWORD_INDIRECT_MASK : 0) |
    (instruction.page ? PWORD_PAGE_MASK : 0) |
    instruction.address;
  return makeWord('P', bits);
}

/**
 * Unpacks the instruction fields of any defined word.
 * @throws WordError CannotConvertWordToInstruction for an Undefined word
 */
export function decodeInstruction(word: Word): Instruction {
  if (word.tag === 'Undefined') {
    throw WordError.notAnInstruction(word.tag);
  }
  const bits = word.bits;
  return {
    function: mnemonicOf((bits & PWORD_FUNCTION_MASK) >>> PWORD_FUNCTION_SHIFT),
    accumulator: (bits & PWORD_ACCUMULATOR_MASK) >>> PWORD_ACCUMULATOR_SHIFT,
    indexRegister: (bits & PWORD_INDEX_REGISTER_MASK) >>> PWORD_INDEX_REGISTER_SHIFT,
    indirect: (bits & PWORD_INDIRECT_MASK) !== 0,
    page: bits & PWORD_PAGE_MASK ? 1 : 0,
    address: bits & PWORD_ADDRESS_MASK,
  };
}

/**
 * Formats an instruction in source notation, e.g. `ADD 1,*20[3]`.
 */
export function formatInstruction(instruction: Instruction): string {
  const indirect = instruction.indirect ? '*' : '';
  const index = instruction.indexRegister !== 0 ? `[${instruction.indexRegister}]` : '';
  return `${instruction.function} ${instruction.accumulator},${indirect}${instruction.address}${index}`;
}
