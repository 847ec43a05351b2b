/**
 * @file Line parser tests.
 */

import { describe, it, expect } from 'vitest';
import { isParseError } from '../../src/bbcx/errors';
import { parseFailures, parseLine, parseProgram, parseSource } from '../../src/bbcx/parser';
import { ParsedLine, SourceLine } from '../../src/bbcx/ast';

const codeLine = (parsed: ParsedLine): SourceLine => {
  if (parsed.kind !== 'code') {
    throw new Error(`expected a code line, got ${parsed.kind}`);
  }
  return parsed.line;
};

const failureReason = (parsed: ParsedLine): string => {
  if (parsed.kind !== 'failed') {
    throw new Error(`expected a failed line, got ${parsed.kind}`);
  }
  return parsed.reason;
};

describe('parseLine', () => {
  describe('data words', () => {
    it('parses signed and unsigned integers', () => {
      expect(codeLine(parseLine('0001 +12', 1))).toEqual({
        location: 1,
        word: { kind: 'I', value: 12 },
      });
      expect(codeLine(parseLine('0002 -7', 1)).word).toEqual({ kind: 'I', value: -7 });
      expect(codeLine(parseLine('0003 42', 1)).word).toEqual({ kind: 'I', value: 42 });
    });

    it('parses floats with @ exponents', () => {
      expect(codeLine(parseLine('0001 -1.5', 1)).word).toEqual({ kind: 'F', value: -1.5 });
      expect(codeLine(parseLine('0001 1.5@2', 1)).word).toEqual({ kind: 'F', value: 150 });
      expect(codeLine(parseLine('0001 +.25', 1)).word).toEqual({ kind: 'F', value: 0.25 });
      expect(codeLine(parseLine('0001 +3@-1', 1)).word).toEqual({ kind: 'F', value: 0.3 });
    });

    it('parses strings', () => {
      expect(codeLine(parseLine('0003 "ABCD"', 1)).word).toEqual({ kind: 'S', value: 'ABCD' });
      expect(codeLine(parseLine('0003 "A B"', 1)).word).toEqual({ kind: 'S', value: 'A B' });
    });
  });

  describe('instructions', () => {
    it('parses accumulator and constant operand', () => {
      expect(codeLine(parseLine('0100 ADD 1, +10', 2))).toEqual({
        location: 100,
        word: {
          kind: 'P',
          function: 'ADD',
          accumulator: 1,
          operand: { kind: 'integer', value: 10 },
        },
      });
    });

    it('parses labels, indirection, index registers and comments', () => {
      expect(codeLine(parseLine('0005 LOOP: TAKE 2,*X[3] ; load', 1))).toEqual({
        location: 5,
        label: 'LOOP',
        comment: '; load',
        word: {
          kind: 'P',
          function: 'TAKE',
          accumulator: 2,
          operand: {
            kind: 'address',
            address: { kind: 'identifier', name: 'X' },
            indirect: true,
            indexRegister: 3,
          },
        },
      });
    });

    it('defaults the accumulator and allows a missing operand', () => {
      expect(codeLine(parseLine('0100 NTHG', 1)).word).toEqual({
        kind: 'P',
        function: 'NIL',
        accumulator: 1,
        operand: { kind: 'none' },
      });
    });

    it('treats an unsigned number as an address', () => {
      expect(codeLine(parseLine('0100 PIN 1, 50', 1)).word).toEqual({
        kind: 'P',
        function: 'PIN',
        accumulator: 1,
        operand: {
          kind: 'address',
          address: { kind: 'numeric', value: 50 },
          indirect: false,
          indexRegister: 0,
        },
      });
    });

    it('parses float and string constants', () => {
      expect(codeLine(parseLine('0100 TAKE 3,-2.5', 1)).word).toMatchObject({
        operand: { kind: 'float', value: -2.5 },
      });
      expect(codeLine(parseLine('0100 TAKE 3,"HI"', 1)).word).toMatchObject({
        operand: { kind: 'string', value: 'HI' },
      });
    });

    it('encodes library routines as EXTRA', () => {
      expect(codeLine(parseLine('0100 SQRT 2', 1)).word).toEqual({
        kind: 'P',
        function: 'EXTRA',
        accumulator: 2,
        operand: {
          kind: 'address',
          address: { kind: 'numeric', value: 1 },
          indirect: false,
          indexRegister: 0,
        },
      });
      expect(codeLine(parseLine('0101 STOP', 1)).word).toMatchObject({
        function: 'EXTRA',
        accumulator: 1,
        operand: { address: { kind: 'numeric', value: 10 } },
      });
    });
  });

  describe('blank lines', () => {
    it('keeps empty and comment-only lines', () => {
      expect(parseLine('   ', 4)).toEqual({ kind: 'blank', lineNumber: 4, text: '   ' });
      expect(parseLine('; heading', 5).kind).toBe('blank');
    });
  });

  describe('failures', () => {
    it('needs a location', () => {
      expect(failureReason(parseLine('ADD 1,2', 1))).toBe('expected a location followed by a space');
    });

    it('rejects unknown mnemonics', () => {
      expect(failureReason(parseLine('0100 ADDD 1,2', 1))).toBe('unknown mnemonic ADDD');
      expect(failureReason(parseLine('0100 ADD1,2', 1))).toBe('unknown mnemonic ADD1');
    });

    it('rejects trailing text', () => {
      expect(failureReason(parseLine('0100 ADD 1,2 junk', 1))).toBe('unexpected text "junk"');
    });

    it('rejects lines without a source word', () => {
      expect(failureReason(parseLine('0100 !', 1))).toBe('expected a source word');
    });
  });
});

describe('parseProgram', () => {
  it('numbers lines from one and ignores the final newline', () => {
    const program = parseProgram('0001 +1\n\n0002 +2\n');
    expect(program.lines.map((line) => [line.kind, line.lineNumber])).toEqual([
      ['code', 1],
      ['blank', 2],
      ['code', 3],
    ]);
  });

  it('accepts CRLF line endings', () => {
    const program = parseProgram('0001 +1\r\n0002 +2\r\n');
    expect(program.lines.map((line) => line.kind)).toEqual(['code', 'code']);
  });

  it('collects failed lines', () => {
    const program = parseProgram('0001 +1\n0100 FOO\n0101 ADD 1,2 x\n');
    expect(parseFailures(program)).toEqual([
      { line: 2, content: '0100 FOO', reason: 'unknown mnemonic FOO' },
      { line: 3, content: '0101 ADD 1,2 x', reason: 'unexpected text "x"' },
    ]);
  });
});

describe('parseSource', () => {
  it('returns source lines in order', () => {
    const lines = parseSource('0001 +12\n0100 ADD 1, +10\n');
    expect(lines.map((line) => line.location)).toEqual([1, 100]);
  });

  it('throws a ParseError listing every failure', () => {
    try {
      parseSource('0100 FOO\n0101 BAR\n');
      expect.unreachable();
    } catch (err) {
      expect(isParseError(err)).toBe(true);
      if (isParseError(err)) {
        expect(err.failures.map((failure) => failure.line)).toEqual([1, 2]);
        expect(err.message).toBe(
          'Parse failed: line 1: unknown mnemonic FOO; line 2: unknown mnemonic BAR'
        );
      }
    }
  });
});
