/**
 * @fileoverview Source-to-memory pipeline: parse, assemble, link.
 */

import { sourceLines } from './ast';
import { assemble } from './assembler';
import { ParseError } from './errors';
import { IoHandlers } from './io';
import { LinkedProgram, link } from './linker';
import { parseFailures, parseProgram } from './parser';
import { BbcxRuntime, RunResult, RuntimeOptions, createBbcxRuntime } from './runtime';

/**
 * Builds a memory image from source text.
 * @throws ParseError, AssemblyError or LinkError
 */
export function buildProgram(source: string): LinkedProgram {
  const parsed = parseProgram(source);
  const failures = parseFailures(parsed);
  if (failures.length > 0) {
    throw new ParseError(failures);
  }
  return link(assemble(sourceLines(parsed)));
}

/**
 * Builds and runs a program to completion or the step limit.
 * @throws RuntimeError when execution faults
 */
export function runSource(
  source: string,
  io?: IoHandlers,
  options?: RuntimeOptions
): { runtime: BbcxRuntime; result: RunResult } {
  const runtime = createBbcxRuntime(buildProgram(source), undefined, io, options);
  const result = runtime.run();
  return { runtime, result };
}
