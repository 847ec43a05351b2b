/**
 * @fileoverview BBC-X interpreter: fetch, decode, resolve operand, dispatch.
 * Execution halts normally when the word at PC is not a P-word.
 */

import { DEFAULT_MAX_STEPS } from './constants';
import { RuntimeError, WordError, isWordError } from './errors';
import { resolveEffectiveAddress } from './execute-helpers';
import { instructionTable } from './execute-tables';
import { ExecuteContext, MachineState } from './execute-types';
import { Instruction, decodeInstruction } from './instruction';
import { IoHandlers, resolveIoHandlers } from './io';
import { LinkedProgram } from './linker';
import { Memory } from './memory';
import { Word } from './word';

/** EXEC may run an EXEC; this bounds the chain */
const MAX_EXEC_DEPTH = 64;

export interface BbcxRuntime {
  readonly memory: Memory;
  readonly state: MachineState;
  step: (options?: { trace?: StepTrace }) => RunResult;
  run: (maxSteps?: number, onStep?: (trace: StepTrace) => void) => RunResult;
  isHalted: () => boolean;
  getPC: () => number;
  reset: (program?: LinkedProgram, entry?: number) => void;
}

export interface RuntimeOptions {
  /** Default step limit for run() */
  maxSteps?: number;
}

export interface RunResult {
  halted: boolean;
  pc: number;
  /** halt: non-P word at PC; stop: STOP routine; limit: step limit reached */
  reason: 'running' | 'halt' | 'stop' | 'limit';
}

/** What one step executed, filled in by step() */
export interface StepTrace {
  pc?: number;
  instruction?: Instruction;
  /** Accumulator contents after the instruction */
  accumulator?: Word;
}

type BbcxRuntimeImpl = BbcxRuntime & {
  io: Required<IoHandlers>;
  program: LinkedProgram;
  maxSteps: number;
  stopped: boolean;
};

export function createBbcxRuntime(
  program: LinkedProgram,
  entry?: number,
  ioHandlers?: IoHandlers,
  options?: RuntimeOptions
): BbcxRuntime {
  const memory = new Memory();
  const state: MachineState = { pc: 0, halted: false };

  const runtime: BbcxRuntimeImpl = {
    memory,
    state,
    io: resolveIoHandlers(ioHandlers),
    program,
    maxSteps: options?.maxSteps ?? DEFAULT_MAX_STEPS,
    stopped: false,
    step: stepRuntime,
    run: runRuntime,
    isHalted,
    getPC,
    reset: resetRuntime,
  };
  loadProgram(runtime, program, entry);
  return runtime;
}

function loadProgram(runtime: BbcxRuntimeImpl, prog: LinkedProgram, ent?: number): void {
  prog.memory.snapshot().forEach((word, address) => {
    runtime.memory.write(address, word);
  });
  runtime.program = prog;
  runtime.state.pc = ent !== undefined && Memory.isAddress(ent) ? ent : prog.entry;
  runtime.state.halted = false;
  runtime.stopped = false;
}

function dispatch(
  runtime: BbcxRuntimeImpl,
  instruction: Instruction,
  location: number,
  depth: number
): void {
  const memory = runtime.memory;
  let effective: number | undefined;
  const effectiveAddress = (): number => {
    if (effective === undefined) {
      effective = resolveEffectiveAddress(memory, instruction);
    }
    return effective;
  };
  const ctx: ExecuteContext = {
    memory,
    state: runtime.state,
    io: runtime.io,
    instruction,
    location,
    effectiveAddress,
    operand: () => memory.read(effectiveAddress()),
    execute: (word: Word) => {
      if (word.tag !== 'P') {
        throw WordError.notAnInstruction(word.tag);
      }
      if (depth >= MAX_EXEC_DEPTH) {
        throw WordError.invalidOperand('EXEC chain too deep');
      }
      dispatch(runtime, decodeInstruction(word), location, depth + 1);
    },
  };
  instructionTable[instruction.function](ctx);
}

/** The P-word at PC, or undefined when execution would halt there */
function pendingInstruction(runtime: BbcxRuntimeImpl): Word | undefined {
  const pc = runtime.state.pc;
  const word = Memory.isAddress(pc) ? runtime.memory.read(pc) : undefined;
  return word !== undefined && word.tag === 'P' ? word : undefined;
}

function stepRuntime(this: BbcxRuntimeImpl, options?: { trace?: StepTrace }): RunResult {
  const state = this.state;
  if (state.halted) {
    return { halted: true, pc: state.pc, reason: this.stopped ? 'stop' : 'halt' };
  }
  const pc = state.pc;
  const word = pendingInstruction(this);
  if (word === undefined) {
    state.halted = true;
    return { halted: true, pc, reason: 'halt' };
  }

  const instruction = decodeInstruction(word);
  state.pc = pc + 1;
  try {
    dispatch(this, instruction, pc, 0);
  } catch (err) {
    state.pc = pc;
    if (isWordError(err)) {
      throw RuntimeError.fromWordError(pc, err);
    }
    throw err;
  }

  if (options?.trace) {
    options.trace.pc = pc;
    options.trace.instruction = instruction;
    options.trace.accumulator = this.memory.read(instruction.accumulator);
  }
  if (state.halted) {
    this.stopped = true;
    return { halted: true, pc: state.pc, reason: 'stop' };
  }
  return { halted: false, pc: state.pc, reason: 'running' };
}

function runRuntime(
  this: BbcxRuntimeImpl,
  maxSteps?: number,
  onStep?: (trace: StepTrace) => void
): RunResult {
  const limit = maxSteps ?? this.maxSteps;
  for (let steps = 0; steps < limit; steps += 1) {
    const trace: StepTrace = {};
    const result = stepRuntime.call(this, { trace });
    if (onStep && trace.pc !== undefined) {
      onStep(trace);
    }
    if (result.halted) {
      return result;
    }
  }
  // Only a pending instruction counts as running past the limit
  if (pendingInstruction(this) === undefined) {
    return stepRuntime.call(this);
  }
  return { halted: this.state.halted, pc: this.state.pc, reason: 'limit' };
}

function isHalted(this: BbcxRuntimeImpl): boolean {
  return this.state.halted;
}

function getPC(this: BbcxRuntimeImpl): number {
  return this.state.pc;
}

function resetRuntime(this: BbcxRuntimeImpl, prog?: LinkedProgram, ent?: number): void {
  loadProgram(this, prog ?? this.program, ent);
}
