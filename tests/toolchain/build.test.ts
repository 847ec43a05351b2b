/**
 * @file Build loop tests: listings, runs, traces and failure collection.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { ConfigurationError } from '../../src/bbcx/errors';
import { BuildEnvironment, buildAll, buildFile } from '../../src/toolchain/build';
import { resolveBuildOptions } from '../../src/toolchain/config-loader';

const SUM = '0001 +12\n0100 ADD 1, +10\n';
const ECHO = '0100 PIN 1, 50\n0101 PIN 1, 50\n0102 PIN 1, 50\n';

let root: string;
let messages: string[];
let printed: string[];
let env: BuildEnvironment;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'bbcx-build-'));
  messages = [];
  printed = [];
  env = {
    log: (message) => {
      messages.push(message);
    },
    stdout: (bytes) => {
      printed.push(Buffer.from(bytes).toString('latin1'));
    },
    now: () => new Date(Date.UTC(2026, 9, 18, 14, 5)),
  };
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

const write = (name: string, content: string): string => {
  const full = path.join(root, name);
  fs.writeFileSync(full, content);
  return full;
};

const lines = (file: string): string[] => fs.readFileSync(file, 'utf-8').split('\n');

describe('buildAll', () => {
  it('assembles without writing anything by default', () => {
    const source = write('sum.bbx', SUM);
    const report = buildAll({ files: [source] }, env);
    expect(report).toEqual({ ok: true, outcomes: [{ file: source, ok: true }] });
    expect(fs.readdirSync(root)).toEqual(['sum.bbx']);
    expect(printed).toEqual([]);
  });

  it('writes listings into the listing directory', () => {
    const source = write('sum.bbx', SUM);
    const listDir = path.join(root, 'lst');
    const report = buildAll({ files: [source], listPath: listDir }, env);
    const listingPath = path.join(listDir, 'sum.lst');
    expect(report.outcomes[0]?.listingPath).toBe(listingPath);
    expect(lines(listingPath)[2]).toBe('    3         0001 +12');
    expect(messages).toEqual([`Listing written to ${listingPath}`]);
  });

  it('traces a run beside the source', () => {
    const source = write('sum.bbx', SUM);
    const report = buildAll({ files: [source], trace: true }, env);
    const tracePath = path.join(root, 'sum.out');
    expect(report.outcomes[0]).toEqual({ file: source, ok: true, tracePath });
    expect(fs.readFileSync(tracePath, 'utf-8')).toBe(
      [
        '0100  ADD 1,127  =>  ACC 1 = +22',
        'HALT 0101 (halt)',
        '',
        '0001  I  00000026  +22',
        '0100  P  04100177  ADD 1,127',
        '0127  I  00000012  +10',
        '',
      ].join('\n')
    );
  });

  it('builds every file and reports the failures', () => {
    const bad = write('bad.bbx', '0100 ADD 1,+1\n0100 ADD 1,+1\n');
    const good = write('good.bbx', SUM);
    const report = buildAll({ files: [bad, good], list: true }, env);
    expect(report.ok).toBe(false);
    expect(report.outcomes.map((outcome) => outcome.ok)).toEqual([false, true]);
    expect(report.outcomes[0]?.error?.code).toBe('DuplicatedLocations');
    expect(lines(path.join(root, 'bad.lst')).some((l) => l.endsWith(' ***** Errors: *****'))).toBe(
      true
    );
    expect(messages.some((m) => m.startsWith(`${bad}: Assembly failed`))).toBe(true);
  });

  it('feeds the input file to the program', () => {
    const source = write('echo.bbx', ECHO);
    const input = write('data.txt', '12');
    const report = buildAll({ files: [source], run: true, input }, env);
    expect(report.ok).toBe(true);
    expect(printed).toEqual(['12DATA*']);
  });

  it('reads standard input once for all files', () => {
    const first = write('one.bbx', ECHO);
    const second = write('two.bbx', ECHO);
    const readStdin = vi.fn(() => Buffer.from('AB', 'latin1'));
    const report = buildAll({ files: [first, second], run: true }, { ...env, readStdin });
    expect(report.ok).toBe(true);
    expect(printed).toEqual(['ABDATA*', 'ABDATA*']);
    expect(readStdin).toHaveBeenCalledTimes(1);
  });

  it('leaves standard input alone when nothing reads', () => {
    const source = write('sum.bbx', SUM);
    const readStdin = vi.fn(() => new Uint8Array(0));
    buildAll({ files: [source], run: true }, { ...env, readStdin });
    expect(readStdin).not.toHaveBeenCalled();
  });

  it('rejects unsupported languages', () => {
    const source = write('sum.bbx', SUM);
    expect(() => buildAll({ files: [source], language: 'bbc-3' }, env)).toThrow(
      ConfigurationError
    );
  });
});

describe('buildFile', () => {
  it('records a fault in the trace', () => {
    const source = write('div.bbx', '0001 +1\n0100 DVD 1,+0\n');
    const outcome = buildFile(source, resolveBuildOptions({ trace: true }), env);
    expect(outcome.ok).toBe(false);
    expect(outcome.error?.code).toBe('DivisionByZero');
    const trace = lines(path.join(root, 'div.out'));
    expect(trace[0]).toBe('FAULT 0100 (PC 100: Division by zero)');
    expect(trace[2]).toBe('0001  I  00000001  +1');
  });

  it('fails a program that runs past the step limit', () => {
    const source = write('loop.bbx', '0100 JUMP 0,100\n');
    const outcome = buildFile(source, resolveBuildOptions({ trace: true, maxSteps: 10 }), env);
    expect(outcome.ok).toBe(false);
    expect(outcome.error?.code).toBe('StepLimitReached');
    expect(outcome.error?.message).toBe('PC 100: no halt after 10 instructions');
    expect(lines(path.join(root, 'loop.out'))[10]).toBe('HALT 0100 (limit)');
  });

  it('accepts a program that ends on its last allowed step', () => {
    const source = write('exact.bbx', SUM);
    const outcome = buildFile(source, resolveBuildOptions({ trace: true, maxSteps: 1 }), env);
    expect(outcome.ok).toBe(true);
    expect(lines(path.join(root, 'exact.out'))[1]).toBe('HALT 0101 (halt)');
  });

  it('reports unreadable sources', () => {
    const missing = path.join(root, 'missing.bbx');
    const outcome = buildFile(missing, resolveBuildOptions({}), env);
    expect(outcome.ok).toBe(false);
    expect(outcome.error?.code).toBe('FILE_RESOLUTION_ERROR');
    expect(outcome.error?.message.startsWith(`Cannot read ${missing}`)).toBe(true);
  });
});
