/**
 * @file Configuration validation for bbcx build settings.
 * @description Runtime validation of configuration files and command-line
 * settings with detailed error messages.
 * @module toolchain/config-validation
 */

import { ConfigurationError } from '../bbcx/errors';
import { BuildConfig } from './types';

// ============================================================================
// Constants
// ============================================================================

/** Supported source dialects */
export const VALID_LANGUAGES = ['bbc-x'] as const;
export type ValidLanguage = (typeof VALID_LANGUAGES)[number];

/** Keys a configuration file may set */
export const CONFIG_KEYS = [
  'language',
  'list',
  'listPath',
  'run',
  'trace',
  'tracePath',
  'input',
  'maxSteps',
] as const;

const STEP_LIMIT_MIN = 1;
const STEP_LIMIT_MAX = 100_000_000;

// ============================================================================
// Validation Result Types
// ============================================================================

export interface ValidationResult {
  /** Whether the configuration is valid */
  valid: boolean;
  /** List of error messages */
  errors: string[];
  /** List of warning messages */
  warnings: string[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isValidLanguage = (value: string): value is ValidLanguage =>
  VALID_LANGUAGES.some((known) => known === value);

// ============================================================================
// Individual Validators
// ============================================================================

export function validateLanguage(language: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (language === undefined || language === null || language === '') {
    return { valid: true, errors, warnings };
  }
  if (typeof language !== 'string') {
    errors.push(`language must be a string, got ${typeof language}`);
    return { valid: false, errors, warnings };
  }
  if (!isValidLanguage(language.trim().toLowerCase())) {
    errors.push(
      `Unsupported language "${language}". Valid languages: ${VALID_LANGUAGES.join(', ')}`
    );
    return { valid: false, errors, warnings };
  }
  return { valid: true, errors, warnings };
}

export function validateBoolean(value: unknown, fieldName: string): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (value === undefined || value === null) {
    return { valid: true, errors, warnings };
  }
  if (typeof value !== 'boolean') {
    errors.push(`${fieldName} must be a boolean, got ${typeof value}`);
    return { valid: false, errors, warnings };
  }
  return { valid: true, errors, warnings };
}

export function validatePath(value: unknown, fieldName: string): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (value === undefined || value === null || value === '') {
    return { valid: true, errors, warnings };
  }
  if (typeof value !== 'string') {
    errors.push(`${fieldName} must be a string, got ${typeof value}`);
    return { valid: false, errors, warnings };
  }
  if (value.includes('\0')) {
    errors.push(`${fieldName} contains invalid null character`);
    return { valid: false, errors, warnings };
  }
  return { valid: true, errors, warnings };
}

/**
 * Validates an instruction limit.
 */
export function validateStepLimit(value: unknown, fieldName: string): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (value === undefined || value === null) {
    return { valid: true, errors, warnings };
  }
  if (typeof value !== 'number') {
    errors.push(`${fieldName} must be a number, got ${typeof value}`);
    return { valid: false, errors, warnings };
  }
  if (!Number.isInteger(value)) {
    errors.push(`${fieldName} must be an integer, got ${value}`);
    return { valid: false, errors, warnings };
  }
  if (value < STEP_LIMIT_MIN) {
    errors.push(`${fieldName} must be at least ${STEP_LIMIT_MIN}, got ${value}`);
    return { valid: false, errors, warnings };
  }
  if (value > STEP_LIMIT_MAX) {
    warnings.push(`${fieldName} is very large (${value}). Runaway programs may take a long time.`);
  }
  return { valid: true, errors, warnings };
}

// ============================================================================
// Composite Validators
// ============================================================================

/**
 * Validates a whole configuration object. Unknown keys are warnings.
 */
export function validateBuildConfig(config: unknown): ValidationResult {
  if (!isRecord(config)) {
    return {
      valid: false,
      errors: [`configuration must be an object, got ${config === null ? 'null' : typeof config}`],
      warnings: [],
    };
  }

  const results: ValidationResult[] = [
    validateLanguage(config.language),
    validateBoolean(config.list, 'list'),
    validatePath(config.listPath, 'listPath'),
    validateBoolean(config.run, 'run'),
    validateBoolean(config.trace, 'trace'),
    validatePath(config.tracePath, 'tracePath'),
    validatePath(config.input, 'input'),
    validateStepLimit(config.maxSteps, 'maxSteps'),
  ];

  const known: readonly string[] = CONFIG_KEYS;
  const unknownKeys = Object.keys(config).filter((key) => !known.includes(key));
  const merged = mergeResults(results);
  for (const key of unknownKeys) {
    merged.warnings.push(`Unknown configuration key "${key}" ignored`);
  }
  return merged;
}

/**
 * Validates a configuration object and narrows it.
 * @throws ConfigurationError listing every error
 */
export function assertValidBuildConfig(config: unknown, source = 'configuration'): BuildConfig {
  const result = validateBuildConfig(config);
  if (!result.valid || !isRecord(config)) {
    throw new ConfigurationError(`Invalid ${source}:\n- ${result.errors.join('\n- ')}`, {
      errors: result.errors,
    });
  }
  return pickBuildConfig(config);
}

// Copies the known keys; types have been checked by validateBuildConfig.
function pickBuildConfig(config: Record<string, unknown>): BuildConfig {
  const picked: BuildConfig = {};
  const { language, list, listPath, run, trace, tracePath, input, maxSteps } = config;
  if (typeof language === 'string' && language !== '') picked.language = language;
  if (typeof list === 'boolean') picked.list = list;
  if (typeof listPath === 'string' && listPath !== '') picked.listPath = listPath;
  if (typeof run === 'boolean') picked.run = run;
  if (typeof trace === 'boolean') picked.trace = trace;
  if (typeof tracePath === 'string' && tracePath !== '') picked.tracePath = tracePath;
  if (typeof input === 'string' && input !== '') picked.input = input;
  if (typeof maxSteps === 'number') picked.maxSteps = maxSteps;
  return picked;
}

function mergeResults(results: ValidationResult[]): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  let valid = true;

  for (const result of results) {
    if (!result.valid) {
      valid = false;
    }
    errors.push(...result.errors);
    warnings.push(...result.warnings);
  }

  return { valid, errors, warnings };
}
