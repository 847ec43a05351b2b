/**
 * @fileoverview Line parser for BBC-X source.
 *
 * Each line is `LOCATION [LABEL:] SOURCE-WORD [;comment]`, where the source
 * word is a P-word, F-word, I-word or S-word, tried in that order.
 * Blank lines and lines holding only a comment are kept for listings.
 */

import {
  Address,
  DEFAULT_ACCUMULATOR,
  ParsedLine,
  ParsedProgram,
  SourceLine,
  SourceWord,
  StoreOperand,
  sourceLines,
} from './ast';
import { FailedLine, ParseError } from './errors';
import { isLibraryRoutine, libraryCode, resolveMnemonic } from './opcodes';

const LOCATION = /\d+/y;
const WHITESPACE = /[ \t]+/y;
const LABEL = /([A-Z][A-Z0-9]*):/y;
const MNEMONIC = /[A-Z]+/y;
const ACCUMULATOR = /([0-7]),/y;
const ROUTINE_ACCUMULATOR = /[0-7](?![0-9,])/y;
const ADDRESS_OPERAND = /(\*)?(?:([A-Z][A-Z0-9]*)|(\d+))(?:\[(\d{1,2})\])?/y;
const SIGNED_FLOAT = /[+-](?:\d+\.\d+(?:@[+-]?\d\d?)?|\.\d+(?:@[+-]?\d\d?)?|\d+@[+-]?\d\d?)(?![\d@.])/y;
const UNSIGNED_FLOAT = /(?:\d+\.\d+(?:@[+-]?\d\d?)?|\.\d+(?:@[+-]?\d\d?)?|\d+@[+-]?\d\d?)(?![\d@.])/y;
const SIGNED_INTEGER = /[+-]\d+/y;
const UNSIGNED_INTEGER = /\d+/y;
const STRING = /"([A-Z0-9+\-@.<>'*\/:)=?^~#; ]{1,4})"/y;
const COMMENT = /;.*/y;

/**
 * Cursor over one line of text using sticky regular expressions.
 */
class LineScanner {
  private pos = 0;

  constructor(private readonly text: string) {}

  match(pattern: RegExp): RegExpExecArray | undefined {
    pattern.lastIndex = this.pos;
    const result = pattern.exec(this.text);
    if (result === null) {
      return undefined;
    }
    this.pos += result[0].length;
    return result;
  }

  skipWhitespace(): boolean {
    return this.match(WHITESPACE) !== undefined;
  }

  atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string {
    return this.text.charAt(this.pos);
  }

  rest(): string {
    return this.text.slice(this.pos);
  }
}

type Parsed<T> = { ok: true; value: T } | { ok: false; reason: string };

const ok = <T>(value: T): Parsed<T> => ({ ok: true, value });
const fail = <T>(reason: string): Parsed<T> => ({ ok: false, reason });

const toFloat = (text: string): number => Number(text.replace('@', 'e'));

function parseAddress(identifier: string | undefined, numeric: string | undefined): Address {
  if (identifier !== undefined) {
    return { kind: 'identifier', name: identifier };
  }
  return { kind: 'numeric', value: Number(numeric ?? '0') };
}

function parseStoreOperand(scanner: LineScanner): StoreOperand {
  const address = scanner.match(ADDRESS_OPERAND);
  if (address !== undefined) {
    const index = address[4];
    return {
      kind: 'address',
      address: parseAddress(address[2], address[3]),
      indirect: address[1] !== undefined,
      indexRegister: index !== undefined ? Number(index) : 0,
    };
  }
  const float = scanner.match(SIGNED_FLOAT);
  if (float !== undefined) {
    return { kind: 'float', value: toFloat(float[0]) };
  }
  const integer = scanner.match(SIGNED_INTEGER);
  if (integer !== undefined) {
    return { kind: 'integer', value: Number(integer[0]) };
  }
  const text = scanner.match(STRING);
  if (text !== undefined) {
    return { kind: 'string', value: text[1] ?? '' };
  }
  return { kind: 'none' };
}

function parsePWord(scanner: LineScanner, name: string): Parsed<SourceWord> {
  const next = scanner.peek();
  if (next !== '' && next !== ' ' && next !== '\t' && next !== ';') {
    return fail(`unknown mnemonic ${name}${next}`);
  }
  scanner.skipWhitespace();

  if (isLibraryRoutine(name)) {
    const acc = scanner.match(ROUTINE_ACCUMULATOR);
    return ok<SourceWord>({
      kind: 'P',
      function: 'EXTRA',
      accumulator: acc !== undefined ? Number(acc[0]) : DEFAULT_ACCUMULATOR,
      operand: {
        kind: 'address',
        address: { kind: 'numeric', value: libraryCode(name) },
        indirect: false,
        indexRegister: 0,
      },
    });
  }

  const mnemonic = resolveMnemonic(name);
  if (mnemonic === undefined) {
    return fail(`unknown mnemonic ${name}`);
  }
  const acc = scanner.match(ACCUMULATOR);
  scanner.skipWhitespace();
  return ok<SourceWord>({
    kind: 'P',
    function: mnemonic,
    accumulator: acc !== undefined ? Number(acc[1]) : DEFAULT_ACCUMULATOR,
    operand: parseStoreOperand(scanner),
  });
}

function parseSourceWord(scanner: LineScanner): Parsed<SourceWord> {
  const mnemonic = scanner.match(MNEMONIC);
  if (mnemonic !== undefined) {
    return parsePWord(scanner, mnemonic[0]);
  }
  const float = scanner.match(SIGNED_FLOAT) ?? scanner.match(UNSIGNED_FLOAT);
  if (float !== undefined) {
    return ok<SourceWord>({ kind: 'F', value: toFloat(float[0]) });
  }
  const integer = scanner.match(SIGNED_INTEGER) ?? scanner.match(UNSIGNED_INTEGER);
  if (integer !== undefined) {
    return ok<SourceWord>({ kind: 'I', value: Number(integer[0]) });
  }
  const text = scanner.match(STRING);
  if (text !== undefined) {
    return ok<SourceWord>({ kind: 'S', value: text[1] ?? '' });
  }
  return fail('expected a source word');
}

/**
 * Parses one line of source text.
 * @param text - Raw line; surrounding whitespace is ignored
 * @param lineNumber - 1-based line number for diagnostics
 */
export function parseLine(text: string, lineNumber: number): ParsedLine {
  const trimmed = text.trim();
  if (trimmed === '' || trimmed.startsWith(';')) {
    return { kind: 'blank', lineNumber, text };
  }
  const failed = (reason: string): ParsedLine => ({ kind: 'failed', lineNumber, text, reason });

  const scanner = new LineScanner(trimmed);
  const location = scanner.match(LOCATION);
  if (location === undefined || !scanner.skipWhitespace()) {
    return failed('expected a location followed by a space');
  }
  const label = scanner.match(LABEL);
  scanner.skipWhitespace();

  const word = parseSourceWord(scanner);
  if (!word.ok) {
    return failed(word.reason);
  }
  scanner.skipWhitespace();
  const comment = scanner.match(COMMENT);
  if (!scanner.atEnd()) {
    return failed(`unexpected text "${scanner.rest()}"`);
  }

  const line: SourceLine = { location: Number(location[0]), word: word.value };
  if (label?.[1] !== undefined) {
    line.label = label[1];
  }
  if (comment !== undefined) {
    line.comment = comment[0];
  }
  return { kind: 'code', lineNumber, text, line };
}

/**
 * Parses a whole program, keeping every line's outcome.
 */
export function parseProgram(source: string): ParsedProgram {
  const texts = source.split(/\r?\n/);
  // A trailing newline does not start another line
  if (texts.length > 0 && texts[texts.length - 1] === '') {
    texts.pop();
  }
  return { lines: texts.map((text, idx) => parseLine(text, idx + 1)) };
}

/** Collects the failed lines of a parsed program */
export function parseFailures(program: ParsedProgram): FailedLine[] {
  const failures: FailedLine[] = [];
  for (const parsed of program.lines) {
    if (parsed.kind === 'failed') {
      failures.push({ line: parsed.lineNumber, content: parsed.text, reason: parsed.reason });
    }
  }
  return failures;
}

/**
 * Parses a program and returns its source lines.
 * @throws ParseError listing every line that failed
 */
export function parseSource(source: string): SourceLine[] {
  const program = parseProgram(source);
  const failures = parseFailures(program);
  if (failures.length > 0) {
    throw new ParseError(failures);
  }
  return sourceLines(program);
}
