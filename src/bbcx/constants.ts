/**
 * @fileoverview BBC-X machine constants: word geometry and field masks.
 */

/** Bits per word */
export const WORD_SIZE = 24;
export const WORD_MASK = 0o77777777;
export const WORD_SIGN = 0o40000000;
export const WORD_MODULUS = 0o100000000;

export const INT_MIN = -WORD_SIGN;
export const INT_MAX = WORD_SIGN - 1;

/** Bits in an accumulator pair */
export const DOUBLE_WORD_SIZE = 48;

export const MEMORY_SIZE = 128;
export const MAX_ADDRESS = MEMORY_SIZE - 1;

// F-word layout
export const FWORD_SIGN_MASK = 0o40000000;
export const FWORD_EXPONENT_MASK = 0o37600000;
export const FWORD_EXPONENT_SHIFT = 16;
export const FWORD_MANTISSA_MASK = 0o00177777;
export const FWORD_MANTISSA_BITS = 16;
export const FWORD_EXPONENT_BIAS = 63;
export const FWORD_EXPONENT_MAX = 127;

// P-word layout
export const PWORD_FUNCTION_MASK = 0o77000000;
export const PWORD_FUNCTION_SHIFT = 18;
export const PWORD_ACCUMULATOR_MASK = 0o00700000;
export const PWORD_ACCUMULATOR_SHIFT = 15;
export const PWORD_INDEX_REGISTER_MASK = 0o00070000;
export const PWORD_INDEX_REGISTER_SHIFT = 12;
export const PWORD_INDIRECT_MASK = 0o00004000;
export const PWORD_PAGE_MASK = 0o00002000;
export const PWORD_ADDRESS_MASK = 0o00001777;

// S-word layout
export const SWORD_CHARS = 4;
export const CHAR_BITS = 6;
export const CHAR_MASK = 0o77;

/** Default instruction step limit for a run */
export const DEFAULT_MAX_STEPS = 100_000;
