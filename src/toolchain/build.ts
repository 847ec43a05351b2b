/**
 * @fileoverview The build loop: for each source file, list, assemble, link
 * and optionally run with a trace. Every file is attempted; failures are
 * collected into the report.
 */

import { ParsedProgram, sourceLines } from '../bbcx/ast';
import { Assembly } from '../bbcx/assembly';
import { assemble } from '../bbcx/assembler';
import {
  AssemblyProblem,
  ConfigurationError,
  ParseError,
  RuntimeError,
  getErrorMessage,
  isAssemblyError,
  isRuntimeError,
  wrapError,
} from '../bbcx/errors';
import { bufferInput, collectOutput } from '../bbcx/io';
import { LinkedProgram, link } from '../bbcx/linker';
import { parseFailures, parseProgram } from '../bbcx/parser';
import { createBbcxRuntime } from '../bbcx/runtime';
import { populateFromConfig, resolveBuildOptions } from './config-loader';
import { validateLanguage } from './config-validation';
import { formatListing } from './list-writer';
import { LISTING_EXTENSION, TRACE_EXTENSION, artifactPath } from './path-utils';
import { readInput, readSource, writeArtifact } from './source-loader';
import { TraceWriter } from './trace-writer';
import { BuildArguments, BuildReport, FileOutcome, ResolvedBuildOptions } from './types';

/** Host services the build uses; all optional */
export interface BuildEnvironment {
  log?: (message: string) => void;
  /** Receives program output after each run */
  stdout?: (bytes: Uint8Array) => void;
  /** Input used when no input file is configured */
  readStdin?: () => Uint8Array;
  /** Clock for listing titles */
  now?: () => Date;
  random?: () => number;
}

const noop = (): void => undefined;

/** Defers fetching input until the program first reads */
const lazyReader = (input: () => Uint8Array): (() => number | undefined) => {
  let read: (() => number | undefined) | undefined;
  return () => {
    if (read === undefined) {
      read = bufferInput(input());
    }
    return read();
  };
};

type Assembled =
  | { ok: true; assembly: Assembly }
  | { ok: false; error: Error; problems?: AssemblyProblem[] };

function tryAssemble(parsed: ParsedProgram): Assembled {
  const failures = parseFailures(parsed);
  if (failures.length > 0) {
    return { ok: false, error: new ParseError(failures) };
  }
  try {
    return { ok: true, assembly: assemble(sourceLines(parsed)) };
  } catch (err) {
    if (!isAssemblyError(err)) {
      throw err;
    }
    return { ok: false, error: err, problems: err.problems };
  }
}

/**
 * Parses and assembles, writing the listing when asked, whatever the outcome.
 * @throws ParseError or AssemblyError
 */
function assembleFile(
  file: string,
  source: string,
  options: ResolvedBuildOptions,
  env: BuildEnvironment,
  outcome: FileOutcome
): Assembly {
  const parsed = parseProgram(source);
  const assembled = tryAssemble(parsed);

  if (options.list) {
    const listingPath = artifactPath(file, LISTING_EXTENSION, options.listPath);
    const now = env.now !== undefined ? env.now() : new Date();
    writeArtifact(
      listingPath,
      formatListing(
        assembled.ok
          ? { fileName: file, parsed, now, assembly: assembled.assembly }
          : { fileName: file, parsed, now, problems: assembled.problems ?? [] }
      )
    );
    outcome.listingPath = listingPath;
    env.log?.(`Listing written to ${listingPath}`);
  }

  if (!assembled.ok) {
    throw assembled.error;
  }
  return assembled.assembly;
}

/**
 * Runs a linked program, sending its output to env.stdout.
 * @throws RuntimeError on a fault or when the step limit is reached
 */
function runProgram(
  file: string,
  program: LinkedProgram,
  options: ResolvedBuildOptions,
  env: BuildEnvironment,
  input: () => Uint8Array,
  outcome: FileOutcome
): void {
  const output = collectOutput();
  const runtime = createBbcxRuntime(
    program,
    undefined,
    {
      read: lazyReader(input),
      write: output.write,
      ...(env.random !== undefined ? { random: env.random } : {}),
    },
    { maxSteps: options.maxSteps }
  );
  const trace = options.trace ? new TraceWriter() : undefined;

  const writeTrace = (): void => {
    if (trace === undefined) {
      return;
    }
    const tracePath = artifactPath(file, TRACE_EXTENSION, options.tracePath);
    writeArtifact(tracePath, trace.toString());
    outcome.tracePath = tracePath;
    env.log?.(`Trace written to ${tracePath}`);
  };

  try {
    const result = runtime.run(undefined, trace?.record);
    trace?.finish(result, runtime.memory);
    if (result.reason === 'limit') {
      throw RuntimeError.stepLimit(result.pc, options.maxSteps);
    }
  } catch (err) {
    if (isRuntimeError(err) && err.code !== 'StepLimitReached') {
      trace?.fail(err.pc, getErrorMessage(err), runtime.memory);
    }
    throw err;
  } finally {
    (env.stdout ?? noop)(output.bytes());
    writeTrace();
  }
}

/**
 * Builds one file.
 */
export function buildFile(
  file: string,
  options: ResolvedBuildOptions,
  env: BuildEnvironment = {},
  input: () => Uint8Array = (): Uint8Array => new Uint8Array(0)
): FileOutcome {
  const outcome: FileOutcome = { file, ok: false };
  try {
    const assembly = assembleFile(file, readSource(file), options, env, outcome);
    const program = link(assembly);
    if (options.run) {
      runProgram(file, program, options, env, input, outcome);
    }
    outcome.ok = true;
  } catch (err) {
    outcome.error = wrapError(err);
    env.log?.(`${file}: ${getErrorMessage(err)}`);
  }
  return outcome;
}

/**
 * Applies configuration and builds every file in order.
 * @throws ConfigurationError when settings are invalid
 */
export function buildAll(args: BuildArguments, env: BuildEnvironment = {}): BuildReport {
  const merged = populateFromConfig(args, env.log);
  const language = validateLanguage(merged.language);
  if (!language.valid) {
    throw new ConfigurationError(language.errors.join('\n'));
  }
  const options = resolveBuildOptions(merged);

  let cached: Uint8Array | undefined;
  const input = (): Uint8Array => {
    if (cached === undefined) {
      if (options.input !== undefined) {
        cached = readInput(options.input);
      } else {
        cached = env.readStdin?.() ?? new Uint8Array(0);
      }
    }
    return cached;
  };

  const outcomes = merged.files.map((file) => buildFile(file, options, env, input));
  return { outcomes, ok: outcomes.every((outcome) => outcome.ok) };
}
