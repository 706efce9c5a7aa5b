/**
 * Semantic validation for configuration values.
 *
 * Validates that configuration values are semantically correct beyond just type checking:
 * - Duplication thresholds lie in (0, 1)
 * - The lead section name is not blank
 * - The rule catalog path can be checked via a custom function
 *
 * @packageDocumentation
 */

import type { Config, DuplicationConfig } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/**
 * Result of a path check operation.
 */
export interface PathCheckResult {
  /** Whether the path exists. */
  exists: boolean;
  /** Whether the path is a directory (if it exists). */
  isDirectory?: boolean;
  /** Error message if the check failed. */
  errorMessage?: string;
}

/**
 * Function type for checking path existence.
 */
export type PathChecker = (path: string, isDirectory: boolean) => PathCheckResult;

/**
 * Options for semantic validation.
 */
export interface ValidateConfigOptions {
  /**
   * Function to check if paths exist.
   * If not provided, path validation is skipped.
   */
  pathChecker?: PathChecker;
}

/**
 * Validates that a similarity threshold lies in (0, 1).
 *
 * @param value - The threshold value to validate.
 * @param fieldPath - The field path for error reporting.
 * @param errors - Array to accumulate errors into.
 */
function validateSimilarityThreshold(
  value: number,
  fieldPath: string,
  errors: ValidationError[]
): void {
  if (!Number.isFinite(value) || value <= 0 || value >= 1) {
    errors.push({
      field: fieldPath,
      value,
      message: `Threshold '${fieldPath}' must be greater than 0 and less than 1, got ${String(value)}`,
    });
  }
}

function validateDuplication(duplication: DuplicationConfig, errors: ValidationError[]): void {
  validateSimilarityThreshold(duplication.threshold, 'duplication.threshold', errors);
  validateSimilarityThreshold(
    duplication.lead_section_threshold,
    'duplication.lead_section_threshold',
    errors
  );

  if (duplication.lead_section.trim() === '') {
    errors.push({
      field: 'duplication.lead_section',
      value: duplication.lead_section,
      message: `'duplication.lead_section' must not be empty`,
    });
  }
}

function validateRulesPath(config: Config, errors: ValidationError[], pathChecker: PathChecker): void {
  const rules = config.paths.rules;
  if (rules === undefined) {
    return;
  }

  const result = pathChecker(rules, false);
  if (!result.exists) {
    errors.push({
      field: 'paths.rules',
      value: rules,
      message: result.errorMessage ?? `Path does not exist: '${rules}'`,
    });
    return;
  }
  if (result.isDirectory === true) {
    errors.push({
      field: 'paths.rules',
      value: rules,
      message: `Path is a directory, expected a rule catalog file: '${rules}'`,
    });
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @param options - Validation options.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 *
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(
  config: Config,
  options: ValidateConfigOptions = {}
): ValidationResult {
  const errors: ValidationError[] = [];

  validateDuplication(config.duplication, errors);

  if (options.pathChecker !== undefined) {
    validateRulesPath(config, errors, options.pathChecker);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @param options - Validation options.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: Config, options: ValidateConfigOptions = {}): void {
  const result = validateConfig(config, options);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed with ${String(result.errors.length)} error(s):\n${errorMessages}`,
      result.errors
    );
  }
}
