/**
 * @file Configuration discovery and merging tests.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { DEFAULT_MAX_STEPS } from '../../src/bbcx/constants';
import { ConfigurationError } from '../../src/bbcx/errors';
import {
  findConfigFile,
  getConfigCandidates,
  loadConfigFile,
  mergeConfig,
  populateFromConfig,
  resolveBuildOptions,
} from '../../src/toolchain/config-loader';

let root: string;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'bbcx-config-'));
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

const write = (relative: string, content: string): string => {
  const full = path.join(root, relative);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, content);
  return full;
};

describe('getConfigCandidates', () => {
  it('puts an explicit file first', () => {
    expect(getConfigCandidates()).toEqual(['bbcx.json', '.bbcx.json']);
    expect(getConfigCandidates('ci.json')).toEqual(['ci.json', 'bbcx.json', '.bbcx.json']);
  });
});

describe('findConfigFile', () => {
  it('walks up from the start directory', () => {
    const config = write('bbcx.json', '{}');
    fs.mkdirSync(path.join(root, 'progs', 'deep'), { recursive: true });
    expect(findConfigFile(path.join(root, 'progs', 'deep'), getConfigCandidates())).toBe(config);
  });

  it('prefers the nearest directory', () => {
    write('bbcx.json', '{}');
    const nearer = write('progs/.bbcx.json', '{}');
    expect(findConfigFile(path.join(root, 'progs'), getConfigCandidates())).toBe(nearer);
  });

  it('uses package.json only with a bbcx section', () => {
    write('progs/package.json', '{"name":"progs"}');
    const pkg = write('package.json', '{"bbcx":{"list":true}}');
    expect(findConfigFile(path.join(root, 'progs'), getConfigCandidates())).toBe(pkg);
  });

  it('logs unreadable package.json files and keeps looking', () => {
    const broken = write('progs/package.json', '{oops');
    const config = write('bbcx.json', '{}');
    const messages: string[] = [];
    const found = findConfigFile(path.join(root, 'progs'), getConfigCandidates(), (m) =>
      messages.push(m)
    );
    expect(found).toBe(config);
    expect(messages).toHaveLength(1);
    expect(messages[0]).toContain(`Skipping ${broken}: Invalid JSON in ${broken}`);
  });
});

describe('loadConfigFile', () => {
  it('reads the bbcx section of package.json', () => {
    const pkg = write('package.json', '{"name":"x","bbcx":{"run":true,"maxSteps":50}}');
    expect(loadConfigFile(pkg)).toEqual({ run: true, maxSteps: 50 });
  });

  it('warns about unknown keys', () => {
    const config = write('bbcx.json', '{"list":true,"colour":"red"}');
    const messages: string[] = [];
    expect(loadConfigFile(config, (m) => messages.push(m))).toEqual({ list: true });
    expect(messages).toEqual([`${config}: Unknown configuration key "colour" ignored`]);
  });

  it('rejects invalid JSON', () => {
    const config = write('bbcx.json', '{"list": tru}');
    expect(() => loadConfigFile(config)).toThrow(ConfigurationError);
    expect(() => loadConfigFile(config)).toThrow(`Invalid JSON in ${config}`);
  });

  it('rejects invalid settings', () => {
    const config = write('bbcx.json', '{"run":"always"}');
    expect(() => loadConfigFile(config)).toThrow(
      `Invalid configuration in ${config}:\n- run must be a boolean, got string`
    );
  });
});

describe('mergeConfig', () => {
  it('lets arguments win and resolves file paths against the config directory', () => {
    const merged = mergeConfig(
      { files: ['a.bbx'], list: false, input: 'cli.txt' },
      { list: true, listPath: 'listings', input: 'data.txt', maxSteps: 9 },
      '/work'
    );
    expect(merged).toEqual({
      files: ['a.bbx'],
      list: false,
      listPath: path.resolve('/work', 'listings'),
      input: 'cli.txt',
      maxSteps: 9,
    });
  });
});

describe('populateFromConfig', () => {
  it('merges the configuration found beside the first file', () => {
    const config = write('bbcx.json', '{"tracePath":"traces"}');
    const source = write('prog.bbx', '');
    const messages: string[] = [];
    const merged = populateFromConfig({ files: [source], run: false }, (m) => messages.push(m));
    expect(merged).toEqual({ files: [source], run: false, tracePath: path.join(root, 'traces') });
    expect(messages).toEqual([`Using configuration ${config}`]);
  });

  it('returns the arguments unchanged without a configuration', () => {
    const source = write('prog.bbx', '');
    const args = { files: [source] };
    expect(populateFromConfig(args)).toBe(args);
  });

  it('reads an explicit configuration', () => {
    write('bbcx.json', '{"list":true}');
    const explicit = write('ci/settings.json', '{"run":true}');
    const source = write('prog.bbx', '');
    expect(populateFromConfig({ files: [source], config: explicit })).toEqual({
      files: [source],
      config: explicit,
      run: true,
    });
  });

  it('fails when an explicit configuration is missing', () => {
    const missing = path.join(root, 'nope.json');
    expect(() => populateFromConfig({ files: ['prog.bbx'], config: missing })).toThrow(
      `Configuration file not found: ${missing}`
    );
  });
});

describe('resolveBuildOptions', () => {
  it('defaults to assembling only', () => {
    expect(resolveBuildOptions({})).toEqual({
      list: false,
      run: false,
      trace: false,
      maxSteps: DEFAULT_MAX_STEPS,
    });
  });

  it('derives listing and tracing from their directories', () => {
    expect(resolveBuildOptions({ listPath: 'l', tracePath: 't', input: 'in.txt', maxSteps: 7 })).toEqual({
      list: true,
      listPath: 'l',
      run: true,
      trace: true,
      tracePath: 't',
      input: 'in.txt',
      maxSteps: 7,
    });
  });

  it('runs when tracing', () => {
    expect(resolveBuildOptions({ trace: true, run: false })).toMatchObject({ run: true, trace: true });
  });
});
