/**
 * @file Command entry point tests.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { CliStreams, main } from '../../src/cli';
import { USAGE } from '../../src/toolchain/cli-args';

let root: string;
let out: string;
let err: string;
const streams: CliStreams = {
  out: (text) => {
    out += text;
  },
  err: (text) => {
    err += text;
  },
};
const noStdin = { readStdin: (): Uint8Array => new Uint8Array(0) };

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'bbcx-cli-'));
  out = '';
  err = '';
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

describe('main', () => {
  it('prints the usage', () => {
    expect(main(['-h'], streams)).toBe(0);
    expect(out).toBe(`${USAGE}\n`);
  });

  it('prints the package version', () => {
    expect(main(['--version'], streams)).toBe(0);
    expect(out).toBe('0.1.0\n');
  });

  it('exits with 2 on usage errors', () => {
    expect(main([], streams)).toBe(2);
    expect(err.startsWith('No source files given\n')).toBe(true);
  });

  it('runs a program and prints its output', () => {
    const source = path.join(root, 'hello.bbx');
    fs.writeFileSync(source, '0001 "HI"\n0100 CAPTN 1\n0101 LINE\n');
    expect(main(['-r', source], streams, noStdin)).toBe(0);
    expect(out).toBe('HI\n');
    expect(err).toBe('');
  });

  it('passes the input file to the program', () => {
    const source = path.join(root, 'echo.bbx');
    const input = path.join(root, 'data.txt');
    fs.writeFileSync(source, '0100 PIN 1, 50\n0101 PIN 1, 50\n');
    fs.writeFileSync(input, 'OK');
    expect(main(['--run', '--input', input, source], streams)).toBe(0);
    expect(out).toBe('OK');
  });

  it('exits with 1 when a file fails', () => {
    const missing = path.join(root, 'missing.bbx');
    expect(main([missing], streams, noStdin)).toBe(1);
    expect(err.startsWith(`${missing}: Cannot read ${missing}`)).toBe(true);
    expect(err.endsWith('\n1 of 1 file(s) failed\n')).toBe(true);
  });
});
