/**
 * @fileoverview 128-word BBC-X memory.
 * Accumulators and index registers are ordinary cells of the same array.
 */

import { MAX_ADDRESS, MEMORY_SIZE } from './constants';
import { WordError } from './errors';
import { UNDEFINED_WORD, Word } from './word';

export class Memory {
  private readonly words: Word[];

  constructor(words?: readonly Word[]) {
    this.words = new Array<Word>(MEMORY_SIZE).fill(UNDEFINED_WORD);
    if (words !== undefined) {
      words.slice(0, MEMORY_SIZE).forEach((word, address) => {
        this.words[address] = word;
      });
    }
  }

  static isAddress(address: number): boolean {
    return Number.isInteger(address) && address >= 0 && address <= MAX_ADDRESS;
  }

  /**
   * @throws WordError InvalidOperand outside 0..127
   */
  read(address: number): Word {
    const word = Memory.isAddress(address) ? this.words[address] : undefined;
    if (word === undefined) {
      throw WordError.invalidOperand(`address ${address} outside memory`);
    }
    return word;
  }

  write(address: number, word: Word): void {
    if (!Memory.isAddress(address)) {
      throw WordError.invalidOperand(`address ${address} outside memory`);
    }
    this.words[address] = word;
  }

  /** The word held by accumulator `acc` */
  accumulator(acc: number): Word {
    return this.read(acc);
  }

  setAccumulator(acc: number, word: Word): void {
    this.write(acc, word);
  }

  /** The index register's cell, or undefined for register 0 (no indexing) */
  indexRegister(register: number): Word | undefined {
    return register === 0 ? undefined : this.read(register);
  }

  /** Highest address whose word is still Undefined */
  highestFree(): number | undefined {
    for (let address = MAX_ADDRESS; address >= 0; address -= 1) {
      if (this.words[address]?.tag === 'Undefined') {
        return address;
      }
    }
    return undefined;
  }

  snapshot(): Word[] {
    return [...this.words];
  }

  clone(): Memory {
    return new Memory(this.words);
  }
}
