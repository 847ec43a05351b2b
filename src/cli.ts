#!/usr/bin/env node
/**
 * @fileoverview bbcx command: assemble, list, run and trace BBC-X programs.
 */

import * as fs from 'fs';
import * as path from 'path';
import { getErrorMessage, isConfigurationError } from './bbcx/errors';
import { BuildEnvironment, buildAll } from './toolchain/build';
import { USAGE, parseCommandLine } from './toolchain/cli-args';

export interface CliStreams {
  out: (text: string) => void;
  err: (text: string) => void;
}

const defaultStreams: CliStreams = {
  out: (text) => {
    process.stdout.write(text);
  },
  err: (text) => {
    process.stderr.write(text);
  },
};

function readVersion(): string {
  const pkgPath = path.join(__dirname, '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    const version =
      typeof pkg === 'object' && pkg !== null ? Reflect.get(pkg, 'version') : undefined;
    return typeof version === 'string' ? version : 'unknown';
  } catch (err) {
    return `unknown (${getErrorMessage(err)})`;
  }
}

/**
 * Runs the command and returns the exit status: 0 on success, 1 when any
 * file failed, 2 on a usage or configuration error.
 */
export function main(
  argv: string[],
  streams: CliStreams = defaultStreams,
  env: BuildEnvironment = {}
): number {
  const log = (message: string): void => streams.err(`${message}\n`);
  try {
    const command = parseCommandLine(argv);
    if (command.kind === 'help') {
      streams.out(`${USAGE}\n`);
      return 0;
    }
    if (command.kind === 'version') {
      streams.out(`${readVersion()}\n`);
      return 0;
    }

    const report = buildAll(command.args, {
      log,
      stdout: (bytes) => {
        streams.out(Buffer.from(bytes).toString('latin1'));
      },
      readStdin: () => fs.readFileSync(0),
      ...env,
    });
    if (!report.ok) {
      const failed = report.outcomes.filter((outcome) => !outcome.ok).length;
      log(`${failed} of ${report.outcomes.length} file(s) failed`);
      return 1;
    }
    return 0;
  } catch (err) {
    log(getErrorMessage(err));
    return isConfigurationError(err) ? 2 : 1;
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
