/**
 * @fileoverview Writes an Assembly into a fresh memory image.
 *
 * Locations are visited in ascending order. Literal operands are stored in
 * the highest word that is still Undefined at the time, one slot per literal;
 * a later source line may overwrite that slot.
 */

import { PWordSource, SourceWord, StoreOperand } from './ast';
import { Assembly } from './assembly';
import { LinkError, WordError, isWordError } from './errors';
import { encodeInstruction } from './instruction';
import { Memory } from './memory';
import { Word, fWord, iWord, sWord } from './word';

export interface LinkedProgram {
  memory: Memory;
  /** Smallest location holding a P-word, or 0 */
  entry: number;
  /** Literal slot allocated for each instruction location that needed one */
  literals: ReadonlyMap<number, number>;
}

const encodeData = (word: Exclude<SourceWord, PWordSource>): Word => {
  switch (word.kind) {
    case 'I':
      return iWord(word.value);
    case 'F':
      return fWord(word.value);
    case 'S':
      return sWord(word.value);
  }
};

const encodeLiteral = (operand: StoreOperand): Word | undefined => {
  switch (operand.kind) {
    case 'integer':
      return iWord(operand.value);
    case 'float':
      return fWord(operand.value);
    case 'string':
      return sWord(operand.value);
    default:
      return undefined;
  }
};

function linkPWord(
  assembly: Assembly,
  memory: Memory,
  location: number,
  word: PWordSource,
  literals: Map<number, number>
): Word {
  const operand = word.operand;
  let address = 0;
  let indirect = false;
  let indexRegister = 0;

  const literal = encodeLiteral(operand);
  if (literal !== undefined) {
    const slot = memory.highestFree();
    if (slot === undefined) {
      throw LinkError.outOfMemory(location);
    }
    memory.write(slot, literal);
    literals.set(location, slot);
    address = slot;
  } else if (operand.kind === 'address') {
    indirect = operand.indirect;
    indexRegister = operand.indexRegister;
    if (operand.address.kind === 'identifier') {
      const resolved = assembly.lookup(operand.address.name);
      if (resolved === undefined) {
        throw LinkError.undefinedSymbol(location, operand.address.name);
      }
      address = resolved;
    } else if (Memory.isAddress(operand.address.value)) {
      address = operand.address.value;
    } else {
      throw WordError.invalidOperand(`address ${operand.address.value} outside memory`);
    }
  }

  return encodeInstruction({
    function: word.function,
    accumulator: word.accumulator,
    indexRegister,
    indirect,
    page: 0,
    address,
  });
}

/**
 * Links an assembly into memory.
 * @throws LinkError carrying the location of the failing line
 */
export function link(assembly: Assembly): LinkedProgram {
  const memory = new Memory();
  const literals = new Map<number, number>();
  let entry: number | undefined;

  for (const location of assembly.locations()) {
    const word = assembly.wordAt(location);
    if (word === undefined) {
      continue;
    }
    try {
      const encoded =
        word.kind === 'P'
          ? linkPWord(assembly, memory, location, word, literals)
          : encodeData(word);
      memory.write(location, encoded);
    } catch (err) {
      if (isWordError(err)) {
        throw LinkError.fromWordError(location, err);
      }
      throw err;
    }
    if (word.kind === 'P' && entry === undefined) {
      entry = location;
    }
  }

  return { memory, entry: entry ?? 0, literals };
}
