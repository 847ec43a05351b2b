/**
 * @file Assembler and linker tests.
 */

import { describe, it, expect } from 'vitest';
import { assemble } from '../../src/bbcx/assembler';
import { isAssemblyError, isLinkError } from '../../src/bbcx/errors';
import { decodeInstruction } from '../../src/bbcx/instruction';
import { link } from '../../src/bbcx/linker';
import { parseSource } from '../../src/bbcx/parser';
import { buildProgram } from '../../src/bbcx/program';
import { fWord, iWord, intValue, sWord } from '../../src/bbcx/word';

const assembleSource = (source: string) => assemble(parseSource(source));

const assemblyFailure = (source: string) => {
  try {
    assembleSource(source);
  } catch (err) {
    if (isAssemblyError(err)) {
      return err;
    }
    throw err;
  }
  throw new Error('assembly unexpectedly succeeded');
};

const linkFailure = (source: string) => {
  try {
    buildProgram(source);
  } catch (err) {
    if (isLinkError(err)) {
      return err;
    }
    throw err;
  }
  throw new Error('link unexpectedly succeeded');
};

describe('assemble', () => {
  it('records lines by location and labels by name', () => {
    const assembly = assembleSource('0100 START: TAKE 1,DATA\n0010 DATA: +5\n');
    expect(assembly.size).toBe(2);
    expect(assembly.locations()).toEqual([10, 100]);
    expect(assembly.lookup('START')).toBe(100);
    expect(assembly.lookup('DATA')).toBe(10);
    expect(assembly.wordAt(10)).toEqual({ kind: 'I', value: 5 });
    expect(assembly.symbolTable()).toEqual([
      { name: 'DATA', location: 10 },
      { name: 'START', location: 100 },
    ]);
  });

  it('accepts an empty program', () => {
    expect(assemble([]).size).toBe(0);
  });

  it('reports every problem, sorted, in a fixed order', () => {
    const error = assemblyFailure(
      [
        '0005 B: +1',
        '0005 +2',
        '0002 B: +3',
        '0003 A: +4',
        '0004 A: +5',
        '0100 TAKE 1,ZED',
        '0101 TAKE 1,YOU',
        '0200 +1',
      ].join('\n')
    );
    expect(error.problems).toEqual([
      { kind: 'DuplicatedLocations', offenders: ['5'] },
      { kind: 'DuplicatedSymbols', offenders: ['A', 'B'] },
      { kind: 'UndefinedSymbols', offenders: ['YOU', 'ZED'] },
      { kind: 'OutOfRangeLocations', offenders: ['200'] },
    ]);
    expect(error.code).toBe('DuplicatedLocations');
  });

  it('summarises the problems in its message', () => {
    const error = assemblyFailure('0001 +1\n0001 +2\n0100 ADD 1,NOPE\n');
    expect(error.message).toBe(
      'Assembly failed: duplicated locations: 1; undefined symbols: NOPE'
    );
  });
});

describe('link', () => {
  it('places data words at their locations', () => {
    const program = buildProgram('0001 +12\n0002 1.5\n0003 "AB"\n');
    expect(program.memory.read(1)).toEqual(iWord(12));
    expect(program.memory.read(2)).toEqual(fWord(1.5));
    expect(program.memory.read(3)).toEqual(sWord('AB'));
    expect(program.entry).toBe(0);
  });

  it('allocates literals from the top of memory, one slot each', () => {
    const program = buildProgram('0100 TAKE 1,+7\n0101 ADD 1,+7\n0102 TAKE 2,"HI"\n');
    expect(program.memory.read(127)).toEqual(iWord(7));
    expect(program.memory.read(126)).toEqual(iWord(7));
    expect(program.memory.read(125)).toEqual(sWord('HI'));
    expect([...program.literals.entries()]).toEqual([
      [100, 127],
      [101, 126],
      [102, 125],
    ]);
    expect(decodeInstruction(program.memory.read(101)).address).toBe(126);
  });

  it('lets a later source line overwrite a literal slot', () => {
    const program = buildProgram('0100 TAKE 1,+5\n0127 +7\n');
    expect(program.literals.get(100)).toBe(127);
    expect(decodeInstruction(program.memory.read(100)).address).toBe(127);
    expect(intValue(program.memory.read(127))).toBe(7);
  });

  it('takes the slot of the instruction being linked when it is the highest free word', () => {
    const data = Array.from({ length: 127 }, (_, i) => `${String(i).padStart(4, '0')} +0`);
    const program = buildProgram([...data, '0127 ADD 1,+1'].join('\n'));
    expect(program.literals.get(127)).toBe(127);
    expect(decodeInstruction(program.memory.read(127))).toMatchObject({
      function: 'ADD',
      accumulator: 1,
      address: 127,
    });
  });

  it('resolves identifiers and keeps operand flags', () => {
    const program = buildProgram('0010 X: +3\n0100 TAKE 2,*X[4]\n');
    expect(decodeInstruction(program.memory.read(100))).toEqual({
      function: 'TAKE',
      accumulator: 2,
      indexRegister: 4,
      indirect: true,
      page: 0,
      address: 10,
    });
    expect(program.entry).toBe(100);
  });

  it('encodes library routines with their routine number', () => {
    const program = buildProgram('0100 PRINT 3\n');
    expect(decodeInstruction(program.memory.read(100))).toMatchObject({
      function: 'EXTRA',
      accumulator: 3,
      address: 5,
    });
  });

  it('rejects numeric addresses outside memory', () => {
    const error = linkFailure('0100 ADD 1,200\n');
    expect(error.code).toBe('InvalidOperand');
    expect(error.location).toBe(100);
    expect(error.message).toBe('Location 100: Invalid operand: address 200 outside memory');
  });

  it('rejects literals that do not fit', () => {
    const error = linkFailure('0100 ADD 1,+9999999\n');
    expect(error.code).toBe('InvalidIWordValue');
    expect(error.location).toBe(100);
  });

  it('runs out of memory when no slot is free', () => {
    // 0..63 each take a slot from 127 down to 64, leaving nothing for 64
    const lines = Array.from({ length: 65 }, (_, i) => `${String(i).padStart(4, '0')} ADD 1,+1`);
    const error = linkFailure(lines.join('\n'));
    expect(error.code).toBe('OutOfMemory');
    expect(error.location).toBe(64);
  });
});
