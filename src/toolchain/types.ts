/**
 * @fileoverview Shared driver types: build settings and file outcomes.
 */

import type { BbcxError } from '../bbcx/errors';

/** Settings that may come from a configuration file or the command line */
export interface BuildConfig {
  /** Source dialect; only bbc-x is supported */
  language?: string;
  /** Write a listing file per source */
  list?: boolean;
  /** Directory for listing files; implies list */
  listPath?: string;
  /** Run each program after it assembles */
  run?: boolean;
  /** Write a trace file per run; implies run */
  trace?: boolean;
  /** Directory for trace files; implies trace */
  tracePath?: string;
  /** File whose bytes feed PIN and READ */
  input?: string;
  /** Instruction limit per run */
  maxSteps?: number;
}

export interface BuildArguments extends BuildConfig {
  files: string[];
  /** Explicit configuration file */
  config?: string;
}

/** Settings after implications and defaults have been applied */
export interface ResolvedBuildOptions {
  list: boolean;
  listPath?: string;
  run: boolean;
  trace: boolean;
  tracePath?: string;
  input?: string;
  maxSteps: number;
}

export interface FileOutcome {
  file: string;
  ok: boolean;
  error?: BbcxError;
  listingPath?: string;
  tracePath?: string;
}

export interface BuildReport {
  outcomes: FileOutcome[];
  ok: boolean;
}
