/**
 * @fileoverview Assembled program: symbol table plus code map.
 * Built only by the assembler, which guarantees unique locations and labels.
 */

import { SourceLine, SourceWord } from './ast';

export class Assembly {
  private readonly symbols: ReadonlyMap<string, number>;
  private readonly code: ReadonlyMap<number, SourceLine>;

  constructor(symbols: ReadonlyMap<string, number>, code: ReadonlyMap<number, SourceLine>) {
    this.symbols = symbols;
    this.code = code;
  }

  /** Location of a label */
  lookup(label: string): number | undefined {
    return this.symbols.get(label);
  }

  wordAt(location: number): SourceWord | undefined {
    return this.code.get(location)?.word;
  }

  lineAt(location: number): SourceLine | undefined {
    return this.code.get(location);
  }

  /** Occupied locations in ascending order */
  locations(): number[] {
    return [...this.code.keys()].sort((a, b) => a - b);
  }

  /** Symbol table entries sorted by name */
  symbolTable(): Array<{ name: string; location: number }> {
    return [...this.symbols.entries()]
      .map(([name, location]) => ({ name, location }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  get size(): number {
    return this.code.size;
  }
}
