/**
 * @file BBC-X Execute Context Types
 * @description Shared types for the instruction handler modules.
 * The context bundles machine state, memory and I/O so handlers can live
 * in separate modules without closures over the runtime.
 *
 * @module bbcx/execute-types
 */

import { Instruction } from './instruction';
import { IoHandlers } from './io';
import { Memory } from './memory';
import { Mnemonic } from './opcodes';
import { Word } from './word';

/** Registers that live outside memory */
export interface MachineState {
  pc: number;
  halted: boolean;
}

/**
 * Execute context for one dispatched instruction.
 */
export interface ExecuteContext {
  memory: Memory;
  state: MachineState;
  io: Required<IoHandlers>;
  instruction: Instruction;
  /** Address the instruction was fetched from */
  location: number;
  /** Address after indirection and indexing */
  effectiveAddress: () => number;
  /** Word at the effective address */
  operand: () => Word;
  /** Executes another instruction word in place (EXEC) */
  execute: (word: Word) => void;
}

/**
 * Instruction handler that operates on an execute context.
 * Handlers compute every result before writing memory, so a fault leaves
 * memory as it was.
 */
export type InstructionHandler = (ctx: ExecuteContext) => void;

/** A total dispatch table */
export type InstructionTable = Readonly<Record<Mnemonic, InstructionHandler>>;
