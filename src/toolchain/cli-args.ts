/**
 * @fileoverview Command-line parsing for the bbcx driver.
 */

import { parseArgs } from 'node:util';
import { ConfigurationError, getErrorMessage } from '../bbcx/errors';
import { validateLanguage, validateStepLimit } from './config-validation';
import { BuildArguments } from './types';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'build'; args: BuildArguments };

export const USAGE = `Usage: bbcx [options] <file...>

Assemble BBC-X source files and optionally run them.

Options:
      --language <name>   source dialect (default: bbc-x)
  -l, --list              write a listing file beside each source
      --list-path <dir>   write listing files to <dir> (implies --list)
  -r, --run               run each program after it assembles
  -t, --trace             write a trace file per run (implies --run)
      --trace-path <dir>  write trace files to <dir> (implies --trace)
  -i, --input <file>      feed <file> to PIN and READ
      --max-steps <n>     stop a run after <n> instructions
  -c, --config <file>     read settings from <file>
  -h, --help              show this help
  -v, --version           show the version`;

const OPTIONS = {
  language: { type: 'string' },
  lang: { type: 'string' },
  list: { type: 'boolean', short: 'l' },
  'list-path': { type: 'string' },
  run: { type: 'boolean', short: 'r' },
  trace: { type: 'boolean', short: 't' },
  'trace-path': { type: 'string' },
  input: { type: 'string', short: 'i' },
  'max-steps': { type: 'string' },
  config: { type: 'string', short: 'c' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' },
} as const;

const usageError = (message: string): ConfigurationError =>
  new ConfigurationError(`${message}\n\n${USAGE}`);

const parseStepLimit = (raw: string): number => {
  const value = /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
  const result = validateStepLimit(Number.isNaN(value) ? raw : value, '--max-steps');
  if (!result.valid) {
    throw usageError(result.errors.join('\n'));
  }
  return value;
};

const parseRaw = (argv: string[]) => {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  } catch (err) {
    throw usageError(getErrorMessage(err));
  }
};

/**
 * Parses the arguments after the program name.
 * Only flags that were given appear in the result, so a configuration file
 * can supply the rest.
 *
 * @throws ConfigurationError on unknown options, missing files or bad values
 */
export function parseCommandLine(argv: string[]): CliCommand {
  const { values, positionals } = parseRaw(argv);

  if (values.help === true) {
    return { kind: 'help' };
  }
  if (values.version === true) {
    return { kind: 'version' };
  }
  if (positionals.length === 0) {
    throw usageError('No source files given');
  }

  const args: BuildArguments = { files: positionals };
  const language = values.language ?? values.lang;
  if (language !== undefined) {
    const result = validateLanguage(language);
    if (!result.valid) {
      throw usageError(result.errors.join('\n'));
    }
    args.language = language;
  }
  if (values.list === true) args.list = true;
  if (values['list-path'] !== undefined) args.listPath = values['list-path'];
  if (values.run === true) args.run = true;
  if (values.trace === true) args.trace = true;
  if (values['trace-path'] !== undefined) args.tracePath = values['trace-path'];
  if (values.input !== undefined) args.input = values.input;
  if (values['max-steps'] !== undefined) args.maxSteps = parseStepLimit(values['max-steps']);
  if (values.config !== undefined) args.config = values.config;

  return { kind: 'build', args };
}
