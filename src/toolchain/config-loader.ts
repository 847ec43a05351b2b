/**
 * @fileoverview Configuration loading and merging for the bbcx driver.
 * Handles reading bbcx.json files and merging them under command-line settings.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError, FileResolutionError, getErrorMessage } from '../bbcx/errors';
import { DEFAULT_MAX_STEPS } from '../bbcx/constants';
import { assertValidBuildConfig, validateBuildConfig } from './config-validation';
import { BuildArguments, BuildConfig, ResolvedBuildOptions } from './types';

/** Section name read from package.json */
export const PACKAGE_SECTION = 'bbcx';

type Log = (message: string) => void;

const readJson = (filePath: string): unknown => {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw FileResolutionError.unreadable(filePath, err);
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (err) {
    throw new ConfigurationError(`Invalid JSON in ${filePath}: ${getErrorMessage(err)}`, {
      path: filePath,
    });
  }
};

const packageSection = (pkg: unknown): unknown =>
  typeof pkg === 'object' && pkg !== null && PACKAGE_SECTION in pkg
    ? Reflect.get(pkg, PACKAGE_SECTION)
    : undefined;

/**
 * Searches for a configuration file starting from startDir and walking up
 * the directory tree.
 *
 * @param startDir - Directory to start searching from
 * @param configCandidates - List of config file names to look for
 * @param log - Receives notes about package.json files that could not be read
 * @returns The absolute path to the config file, or undefined if not found
 */
export function findConfigFile(
  startDir: string,
  configCandidates: string[],
  log?: Log
): string | undefined {
  const dirsToCheck: string[] = [];
  for (let dir = path.resolve(startDir); ; ) {
    dirsToCheck.push(dir);
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }

  for (const dir of dirsToCheck) {
    for (const candidate of configCandidates) {
      const full = path.isAbsolute(candidate) ? candidate : path.join(dir, candidate);
      if (fs.existsSync(full)) {
        return full;
      }
    }

    // A package.json counts only when it has a bbcx section
    const pkgPath = path.join(dir, 'package.json');
    if (fs.existsSync(pkgPath)) {
      try {
        if (packageSection(readJson(pkgPath)) !== undefined) {
          return pkgPath;
        }
      } catch (err) {
        log?.(`Skipping ${pkgPath}: ${getErrorMessage(err)}`);
      }
    }
  }

  return undefined;
}

/**
 * Loads and validates configuration from a file path.
 *
 * @throws ConfigurationError if the file is not valid JSON or fails validation
 */
export function loadConfigFile(configPath: string, log?: Log): BuildConfig {
  const parsed = readJson(configPath);
  const raw = path.basename(configPath) === 'package.json' ? packageSection(parsed) : parsed;
  if (raw === undefined) {
    return {};
  }
  const result = validateBuildConfig(raw);
  for (const warning of result.warnings) {
    log?.(`${configPath}: ${warning}`);
  }
  return assertValidBuildConfig(raw, `configuration in ${configPath}`);
}

/**
 * Gets the list of configuration file candidates, most specific first.
 */
export function getConfigCandidates(explicit?: string): string[] {
  const candidates: string[] = [];

  if (explicit !== undefined && explicit !== '') {
    candidates.push(explicit);
  }

  candidates.push('bbcx.json');
  candidates.push('.bbcx.json');

  return candidates;
}

/**
 * Merges file configuration with command-line settings.
 * Priority: args > cfg. Paths in cfg are taken relative to baseDir.
 */
export function mergeConfig(args: BuildArguments, cfg: BuildConfig, baseDir: string): BuildArguments {
  const fromFile = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : path.resolve(baseDir, value);

  const merged: BuildArguments = { ...args };

  const languageResolved = args.language ?? cfg.language;
  if (languageResolved !== undefined) {
    merged.language = languageResolved;
  }

  const listResolved = args.list ?? cfg.list;
  if (listResolved !== undefined) {
    merged.list = listResolved;
  }

  const listPathResolved = args.listPath ?? fromFile(cfg.listPath);
  if (listPathResolved !== undefined) {
    merged.listPath = listPathResolved;
  }

  const runResolved = args.run ?? cfg.run;
  if (runResolved !== undefined) {
    merged.run = runResolved;
  }

  const traceResolved = args.trace ?? cfg.trace;
  if (traceResolved !== undefined) {
    merged.trace = traceResolved;
  }

  const tracePathResolved = args.tracePath ?? fromFile(cfg.tracePath);
  if (tracePathResolved !== undefined) {
    merged.tracePath = tracePathResolved;
  }

  const inputResolved = args.input ?? fromFile(cfg.input);
  if (inputResolved !== undefined) {
    merged.input = inputResolved;
  }

  const maxStepsResolved = args.maxSteps ?? cfg.maxSteps;
  if (maxStepsResolved !== undefined) {
    merged.maxSteps = maxStepsResolved;
  }

  return merged;
}

/**
 * Finds a configuration file for the build and merges it into args.
 * The search starts beside the first source file.
 *
 * @throws ConfigurationError when an explicit config file is missing or invalid
 */
export function populateFromConfig(args: BuildArguments, log?: Log): BuildArguments {
  if (args.config !== undefined && args.config !== '' && !fs.existsSync(args.config)) {
    throw new ConfigurationError(`Configuration file not found: ${args.config}`, {
      path: args.config,
    });
  }

  const first = args.files[0];
  const startDir = first !== undefined ? path.dirname(path.resolve(first)) : process.cwd();
  const configPath =
    args.config !== undefined && args.config !== ''
      ? path.resolve(args.config)
      : findConfigFile(startDir, getConfigCandidates(), log);

  if (configPath === undefined) {
    return args;
  }

  log?.(`Using configuration ${configPath}`);
  const cfg = loadConfigFile(configPath, log);
  return mergeConfig(args, cfg, path.dirname(configPath));
}

/**
 * Applies the implications between settings: a listing directory implies a
 * listing, a trace directory implies a trace, and a trace implies a run.
 */
export function resolveBuildOptions(args: BuildConfig): ResolvedBuildOptions {
  const trace = args.trace === true || args.tracePath !== undefined;
  const resolved: ResolvedBuildOptions = {
    list: args.list === true || args.listPath !== undefined,
    run: args.run === true || trace,
    trace,
    maxSteps: args.maxSteps ?? DEFAULT_MAX_STEPS,
  };
  if (args.listPath !== undefined) {
    resolved.listPath = args.listPath;
  }
  if (args.tracePath !== undefined) {
    resolved.tracePath = args.tracePath;
  }
  if (args.input !== undefined) {
    resolved.input = args.input;
  }
  return resolved;
}
