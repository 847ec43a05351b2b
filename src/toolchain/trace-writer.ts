/**
 * @fileoverview Trace files: one line per executed instruction, the halt
 * line, then a dump of every defined memory cell.
 */

import { formatInstruction } from '../bbcx/instruction';
import { formatWord } from '../bbcx/format';
import { Memory } from '../bbcx/memory';
import { RunResult, StepTrace } from '../bbcx/runtime';
import { Word } from '../bbcx/word';

const pad4 = (value: number): string => String(value).padStart(4, '0');

/** `0100  ADD 1,127  =>  ACC 1 = +22` */
export function formatStep(trace: StepTrace): string | undefined {
  const { pc, instruction, accumulator } = trace;
  if (pc === undefined || instruction === undefined || accumulator === undefined) {
    return undefined;
  }
  return (
    `${pad4(pc)}  ${formatInstruction(instruction)}  =>  ` +
    `ACC ${instruction.accumulator} = ${formatWord(accumulator)}`
  );
}

/** `0003  I  00000026  +22` */
export function formatCell(address: number, word: Word): string {
  return `${pad4(address)}  ${word.tag}  ${word.bits.toString(8).padStart(8, '0')}  ${formatWord(word)}`;
}

/** Lines for every cell that is not Undefined, in address order */
export function dumpMemory(memory: Memory): string[] {
  const lines: string[] = [];
  memory.snapshot().forEach((word, address) => {
    if (word.tag !== 'Undefined') {
      lines.push(formatCell(address, word));
    }
  });
  return lines;
}

/**
 * Accumulates a trace while a program runs.
 */
export class TraceWriter {
  private readonly lines: string[] = [];

  /** Suitable as the onStep callback of BbcxRuntime.run */
  readonly record = (trace: StepTrace): void => {
    const line = formatStep(trace);
    if (line !== undefined) {
      this.lines.push(line);
    }
  };

  /** Ends the trace after a run */
  finish(result: RunResult, memory: Memory): void {
    this.lines.push(`HALT ${pad4(result.pc)} (${result.reason})`);
    this.appendDump(memory);
  }

  /** Ends the trace after a fault */
  fail(pc: number, message: string, memory: Memory): void {
    this.lines.push(`FAULT ${pad4(pc)} (${message})`);
    this.appendDump(memory);
  }

  toString(): string {
    return `${this.lines.join('\n')}\n`;
  }

  private appendDump(memory: Memory): void {
    this.lines.push('', ...dumpMemory(memory));
  }
}
