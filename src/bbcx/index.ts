/**
 * @fileoverview BBC-X core exports.
 */

export * from './ast';
export * from './assembler';
export * from './assembly';
export * from './charset';
export * from './constants';
export * from './errors';
export * from './format';
export * from './instruction';
export * from './io';
export * from './linker';
export * from './memory';
export * from './opcodes';
export * from './parser';
export * from './program';
export * from './runtime';
export * from './shift';
export * from './word';
export * from './word-ops';
