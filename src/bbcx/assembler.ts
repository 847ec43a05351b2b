/**
 * @fileoverview Builds an Assembly from parsed source lines.
 * Every structural problem is collected before failing.
 */

import { SourceLine, referencedIdentifier } from './ast';
import { Assembly } from './assembly';
import { AssemblyError, AssemblyProblem } from './errors';
import { Memory } from './memory';

const byName = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Records each line at its location and each label against it.
 * @throws AssemblyError listing duplicated locations, duplicated labels,
 * undefined identifiers and locations outside memory
 */
export function assemble(lines: readonly SourceLine[]): Assembly {
  const code = new Map<number, SourceLine>();
  const symbols = new Map<string, number>();
  const duplicatedLocations = new Set<number>();
  const duplicatedLabels = new Set<string>();
  const outOfRange = new Set<number>();

  for (const line of lines) {
    if (!Memory.isAddress(line.location)) {
      outOfRange.add(line.location);
    }
    if (code.has(line.location)) {
      duplicatedLocations.add(line.location);
    } else {
      code.set(line.location, line);
    }
    if (line.label !== undefined) {
      if (symbols.has(line.label)) {
        duplicatedLabels.add(line.label);
      } else {
        symbols.set(line.label, line.location);
      }
    }
  }

  const undefinedSymbols = new Set<string>();
  for (const line of lines) {
    const identifier = referencedIdentifier(line.word);
    if (identifier !== undefined && !symbols.has(identifier)) {
      undefinedSymbols.add(identifier);
    }
  }

  const problems: AssemblyProblem[] = [];
  const report = (kind: AssemblyProblem['kind'], offenders: string[]): void => {
    if (offenders.length > 0) {
      problems.push({ kind, offenders });
    }
  };
  const numeric = (values: Set<number>): string[] =>
    [...values].sort((a, b) => a - b).map(String);

  report('DuplicatedLocations', numeric(duplicatedLocations));
  report('DuplicatedSymbols', [...duplicatedLabels].sort(byName));
  report('UndefinedSymbols', [...undefinedSymbols].sort(byName));
  report('OutOfRangeLocations', numeric(outOfRange));

  if (problems.length > 0) {
    throw new AssemblyError(problems);
  }
  return new Assembly(symbols, code);
}
