/**
 * @fileoverview BBC-X function codes, mnemonic aliases and library routines.
 * A function code is the position of its mnemonic in FUNCTION_NAMES.
 */

export const FUNCTION_NAMES = [
  // 0o00
  'NIL', 'OR', 'NEQV', 'AND', 'ADD', 'SUBT', 'MULT', 'DVD',
  // 0o10
  'TAKE', 'TSTR', 'TNEG', 'TNOT', 'TTYP', 'TTYZ', 'TTTT', 'TOUT',
  // 0o20
  'SKIP', 'SKAE', 'SKAN', 'SKET', 'SKAL', 'SKAG', 'SKED', 'SKEI',
  // 0o30
  'SHL', 'ROT', 'DSHL', 'DROT', 'POWR', 'DMULT', 'DIV', 'DDIV',
  // 0o40
  'NILX', 'ORX', 'NEQVX', 'ANDX', 'ADDX', 'SUBTX', 'MULTX', 'DVDX',
  // 0o50
  'PUT', 'PSQU', 'PNEG', 'PNOT', 'PTYP', 'PTYZ', 'PFFP', 'PIN',
  // 0o60
  'JUMP', 'JEZ', 'JNZ', 'JAT', 'JLZ', 'JGZ', 'JZD', 'JZI',
  // 0o70
  'DECR', 'INCR', 'MOCKP', 'MOCKS', 'DBYTE', 'UNUSED', 'EXEC', 'EXTRA',
] as const;

export type Mnemonic = (typeof FUNCTION_NAMES)[number];

export const FUNCTION_COUNT = FUNCTION_NAMES.length;

/** Alternative spellings accepted in source */
export const MNEMONIC_ALIASES: Readonly<Record<string, Mnemonic>> = {
  NTHG: 'NIL',
  SWAP: 'NILX',
  MPLY: 'MULT',
  MPLYX: 'MULTX',
};

/**
 * Library routines, encoded as EXTRA with the routine number
 * (position + 1) in the address field.
 */
export const LIBRARY_ROUTINES = [
  'SQRT', 'LN', 'EXP', 'READ', 'PRINT', 'SIN', 'COS', 'TAN', 'ATN',
  'STOP', 'LINE', 'INT', 'FRAC', 'FLOAT', 'CAPTN', 'PAGE', 'RND', 'ABS',
] as const;

export type LibraryRoutine = (typeof LIBRARY_ROUTINES)[number];

const functionCodes = new Map<string, number>(FUNCTION_NAMES.map((name, code) => [name, code]));

const isMnemonic = (name: string): name is Mnemonic => functionCodes.has(name);

export const isLibraryRoutine = (name: string): name is LibraryRoutine =>
  LIBRARY_ROUTINES.some((known) => known === name);

/**
 * Resolves a source mnemonic, following aliases.
 * @returns The canonical mnemonic, or undefined if unknown
 */
export function resolveMnemonic(name: string): Mnemonic | undefined {
  if (isMnemonic(name)) {
    return name;
  }
  return MNEMONIC_ALIASES[name];
}

export function functionCode(mnemonic: Mnemonic): number {
  return FUNCTION_NAMES.indexOf(mnemonic);
}

/** Mnemonic for a six-bit function code */
export function mnemonicOf(code: number): Mnemonic {
  return FUNCTION_NAMES[code & 0o77] ?? 'NIL';
}

export function libraryCode(routine: LibraryRoutine): number {
  return LIBRARY_ROUTINES.indexOf(routine) + 1;
}

/** Routine for an EXTRA address field, if one is assigned */
export function libraryRoutineOf(code: number): LibraryRoutine | undefined {
  return LIBRARY_ROUTINES[code - 1];
}
