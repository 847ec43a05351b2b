/**
 * @fileoverview Listing files: numbered source text with failures marked,
 * followed by the symbol table or the assembly problems.
 */

import { ParsedProgram } from '../bbcx/ast';
import { Assembly } from '../bbcx/assembly';
import { AssemblyProblem, AssemblyProblemKind } from '../bbcx/errors';

const WEEKDAYS = ['SUN', 'MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT'] as const;
const MONTHS = [
  'JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN',
  'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC',
] as const;

const SOURCE_INDENT = ' '.repeat(8);
const FAILED_MARK = ' *****  ';
const REASON_INDENT = ' '.repeat(9);

export interface ListingInput {
  /** Source path as shown in the title */
  fileName: string;
  parsed: ParsedProgram;
  /** Present when assembly succeeded */
  assembly?: Assembly;
  /** Present when assembly reported problems */
  problems?: readonly AssemblyProblem[];
  /** Time shown in the title */
  now: Date;
}

const pad2 = (value: number): string => String(value).padStart(2, '0');

/** `SUN 18 OCT 2026 14:05`, in UTC */
export function formatTimestamp(date: Date): string {
  const weekday = WEEKDAYS[date.getUTCDay()] ?? '';
  const month = MONTHS[date.getUTCMonth()] ?? '';
  return (
    `${weekday} ${pad2(date.getUTCDate())} ${month} ${date.getUTCFullYear()} ` +
    `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}`
  );
}

const problemLabel = (kind: AssemblyProblemKind): string => {
  switch (kind) {
    case 'DuplicatedLocations':
      return 'Duplicated location';
    case 'DuplicatedSymbols':
      return 'Duplicated symbol';
    case 'UndefinedSymbols':
      return 'Undefined symbol';
    case 'OutOfRangeLocations':
      return 'Location out of range';
  }
};

/** Body lines before numbering */
function listingBody(input: ListingInput): string[] {
  const body: string[] = [
    `${''.padEnd(14)}${input.fileName.padEnd(42)} ${formatTimestamp(input.now)}`.toUpperCase(),
    '',
  ];

  for (const line of input.parsed.lines) {
    if (line.kind === 'failed') {
      body.push(`${FAILED_MARK}${line.text}`, `${REASON_INDENT}${line.reason}`);
    } else {
      body.push(`${SOURCE_INDENT}${line.text}`);
    }
  }

  if (input.assembly !== undefined) {
    body.push('', 'SYMBOL TABLE:', '=============', '');
    for (const { name, location } of input.assembly.symbolTable()) {
      body.push(`${name.padEnd(8)}${location.toString(8).padStart(8, '0')}`);
    }
  }

  if (input.problems !== undefined && input.problems.length > 0) {
    body.push('', '***** Errors: *****', '');
    for (const problem of input.problems) {
      for (const offender of problem.offenders) {
        body.push(`${problemLabel(problem.kind)}: ${offender}`);
      }
    }
  }

  return body;
}

/**
 * Renders a listing. Every line carries a five-column line number; trailing
 * spaces are trimmed and there is no final newline.
 */
export function formatListing(input: ListingInput): string {
  return listingBody(input)
    .map((text, index) => `${String(index + 1).padStart(5)} ${text}`.trimEnd())
    .join('\n');
}
