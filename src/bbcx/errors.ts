/**
 * @file BBC-X Error Types
 * @description Custom error classes for the BBC-X toolchain.
 * Covers the static (parse/assembly), link-time and runtime layers, plus
 * the driver's configuration and file errors.
 * @module bbcx/errors
 */

// ============================================================================
// Error Codes
// ============================================================================

/** Faults raised while encoding, decoding or operating on words */
export type WordErrorCode =
  | 'InvalidIWordValue'
  | 'InvalidFWordValue'
  | 'InvalidSWordValue'
  | 'CannotConvertWordToInstruction'
  | 'InvalidOperand'
  | 'ArithmeticTypeMismatch'
  | 'DivisionByZero'
  | 'UnsupportedFunction';

/** Static problems found while building an assembly */
export type AssemblyProblemKind =
  | 'DuplicatedLocations'
  | 'DuplicatedSymbols'
  | 'UndefinedSymbols'
  | 'OutOfRangeLocations';

export type LinkErrorCode = WordErrorCode | 'OutOfMemory' | 'UndefinedSymbols';

export type RuntimeErrorCode = WordErrorCode | 'StepLimitReached';

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all BBC-X errors.
 * Provides a consistent error structure with error codes and context.
 */
export class BbcxError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Additional context about the error */
  readonly context?: Record<string, unknown>;

  /**
   * Creates a new BbcxError.
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param context - Optional additional context
   */
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'BbcxError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    // Maintains proper stack trace in V8
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Word Errors
// ============================================================================

/**
 * Error thrown by the word model and the instruction decoder.
 */
export class WordError extends BbcxError {
  declare readonly code: WordErrorCode;

  constructor(message: string, code: WordErrorCode, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = 'WordError';
  }

  static invalidIWord(value: number | bigint): WordError {
    return new WordError(`Integer ${value} does not fit in an I-word`, 'InvalidIWordValue', {
      value: String(value),
    });
  }

  static invalidFWord(value: number): WordError {
    return new WordError(`Float ${value} does not fit in an F-word`, 'InvalidFWordValue', {
      value,
    });
  }

  static invalidSWord(text: string): WordError {
    return new WordError(`Invalid S-word value ${JSON.stringify(text)}`, 'InvalidSWordValue', {
      text,
    });
  }

  static notAnInstruction(tag: string): WordError {
    return new WordError(
      `Cannot convert ${tag} word to an instruction`,
      'CannotConvertWordToInstruction',
      { tag }
    );
  }

  static invalidOperand(detail: string): WordError {
    return new WordError(`Invalid operand: ${detail}`, 'InvalidOperand');
  }

  static typeMismatch(operation: string, left: string, right?: string): WordError {
    const operands = right === undefined ? left : `${left} and ${right}`;
    return new WordError(
      `Cannot apply ${operation} to ${operands}`,
      'ArithmeticTypeMismatch',
      { operation, left, right }
    );
  }

  static divisionByZero(): WordError {
    return new WordError('Division by zero', 'DivisionByZero');
  }

  static unsupported(mnemonic: string): WordError {
    return new WordError(`Function ${mnemonic} is not supported`, 'UnsupportedFunction', {
      mnemonic,
    });
  }
}

// ============================================================================
// Parse Errors
// ============================================================================

/** A source line the parser rejected */
export interface FailedLine {
  /** 1-based line number */
  line: number;
  content: string;
  reason: string;
}

/**
 * Error thrown when one or more source lines fail to parse.
 */
export class ParseError extends BbcxError {
  readonly failures: FailedLine[];

  constructor(failures: FailedLine[]) {
    const summary = failures
      .map((failure) => `line ${failure.line}: ${failure.reason}`)
      .join('; ');
    super(`Parse failed: ${summary}`, 'ParseFailed', { lines: failures.map((f) => f.line) });
    this.name = 'ParseError';
    this.failures = failures;
  }
}

// ============================================================================
// Assembly Errors
// ============================================================================

export interface AssemblyProblem {
  kind: AssemblyProblemKind;
  /** Offending labels or locations, sorted */
  offenders: string[];
}

/**
 * Error thrown when a parsed program cannot be assembled.
 * Every problem found is reported, not just the first.
 */
export class AssemblyError extends BbcxError {
  readonly problems: AssemblyProblem[];

  constructor(problems: AssemblyProblem[]) {
    const summary = problems
      .map((problem) => `${describeProblem(problem.kind)}: ${problem.offenders.join(', ')}`)
      .join('; ');
    super(`Assembly failed: ${summary}`, problems[0]?.kind ?? 'AssemblyFailed', { problems });
    this.name = 'AssemblyError';
    this.problems = problems;
  }
}

function describeProblem(kind: AssemblyProblemKind): string {
  switch (kind) {
    case 'DuplicatedLocations':
      return 'duplicated locations';
    case 'DuplicatedSymbols':
      return 'duplicated labels';
    case 'UndefinedSymbols':
      return 'undefined symbols';
    case 'OutOfRangeLocations':
      return 'locations out of range';
  }
}

// ============================================================================
// Link Errors
// ============================================================================

/**
 * Error thrown while writing an assembly into memory.
 */
export class LinkError extends BbcxError {
  declare readonly code: LinkErrorCode;
  /** Source location of the offending line */
  readonly location: number;

  constructor(message: string, code: LinkErrorCode, location: number) {
    super(`Location ${location}: ${message}`, code, { location });
    this.name = 'LinkError';
    this.location = location;
  }

  static outOfMemory(location: number): LinkError {
    return new LinkError('no free word left for a literal', 'OutOfMemory', location);
  }

  static undefinedSymbol(location: number, symbol: string): LinkError {
    return new LinkError(`undefined symbol ${symbol}`, 'UndefinedSymbols', location);
  }

  static fromWordError(location: number, error: WordError): LinkError {
    return new LinkError(error.message, error.code, location);
  }
}

// ============================================================================
// Runtime Errors
// ============================================================================

/**
 * Error thrown when execution faults.
 */
export class RuntimeError extends BbcxError {
  declare readonly code: RuntimeErrorCode;
  /** Program counter of the faulting instruction */
  readonly pc: number;

  constructor(message: string, code: RuntimeErrorCode, pc: number) {
    super(`PC ${pc}: ${message}`, code, { pc });
    this.name = 'RuntimeError';
    this.pc = pc;
  }

  static fromWordError(pc: number, error: WordError): RuntimeError {
    return new RuntimeError(error.message, error.code, pc);
  }

  static stepLimit(pc: number, limit: number): RuntimeError {
    return new RuntimeError(`no halt after ${limit} instructions`, 'StepLimitReached', pc);
  }
}

// ============================================================================
// Driver Errors
// ============================================================================

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends BbcxError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when a source or output file cannot be read or written.
 */
export class FileResolutionError extends BbcxError {
  /** The path that could not be resolved */
  readonly filePath: string;

  constructor(message: string, filePath: string) {
    super(message, 'FILE_RESOLUTION_ERROR', { filePath });
    this.name = 'FileResolutionError';
    this.filePath = filePath;
  }

  static unreadable(filePath: string, cause: unknown): FileResolutionError {
    return new FileResolutionError(`Cannot read ${filePath}: ${getErrorMessage(cause)}`, filePath);
  }

  static unwritable(filePath: string, cause: unknown): FileResolutionError {
    return new FileResolutionError(`Cannot write ${filePath}: ${getErrorMessage(cause)}`, filePath);
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isBbcxError(error: unknown): error is BbcxError {
  return error instanceof BbcxError;
}

export function isWordError(error: unknown): error is WordError {
  return error instanceof WordError;
}

export function isParseError(error: unknown): error is ParseError {
  return error instanceof ParseError;
}

export function isAssemblyError(error: unknown): error is AssemblyError {
  return error instanceof AssemblyError;
}

export function isLinkError(error: unknown): error is LinkError {
  return error instanceof LinkError;
}

export function isRuntimeError(error: unknown): error is RuntimeError {
  return error instanceof RuntimeError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Wraps an unknown error in a BbcxError if it isn't already one.
 * @param error - The error to wrap
 * @param defaultMessage - Default message if error is not an Error
 */
export function wrapError(
  error: unknown,
  defaultMessage = 'An unknown error occurred'
): BbcxError {
  if (isBbcxError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new BbcxError(error.message, 'UNKNOWN_ERROR', { originalError: error.name });
  }
  return new BbcxError(defaultMessage, 'UNKNOWN_ERROR', { originalValue: String(error) });
}

/**
 * Gets a user-friendly error message from any error.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
