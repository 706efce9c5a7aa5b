/**
 * Error suggestion system for the protocol-qa CLI.
 *
 * Provides contextual suggestions based on error types to help users
 * resolve issues quickly.
 *
 * @packageDocumentation
 */

import { ConfigParseError, ConfigValidationError, EnvCoercionError } from '../config/index.js';
import { DocumentLoadError } from '../document/index.js';
import { ProtocolInvocationError } from '../quality/index.js';
import { RuleCatalogLoadError } from '../rules/index.js';
import type { DisplayOptions } from './utils/displayUtils.js';

/**
 * Error types that can occur while running a command.
 */
export type ErrorType = 'config_error' | 'rules_error' | 'document_error' | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

/**
 * Error context with details needed for generating suggestions.
 */
export interface ErrorContext {
  /** Type of error that occurred. */
  errorType: ErrorType;
  /** Error message or description. */
  errorMessage?: string;
  /** Command that failed (optional). */
  command?: string;
  /** Additional error details (optional). */
  details?: {
    /** File the error relates to. */
    filePath?: string;
    /** Field or JSON path the error relates to. */
    field?: string;
  };
}

/**
 * Error suggestion mappings.
 */
const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  config_error: [
    {
      text: 'Check protocol-qa.toml for syntax errors and value types',
    },
    {
      text: 'Duplication thresholds must be greater than 0 and less than 1',
    },
    {
      text: 'Check PROTOCOL_QA_* environment variables',
      action: 'env | grep PROTOCOL_QA_',
    },
  ],

  rules_error: [
    {
      text: 'Check the rule catalog path',
      action: 'pqa rules --rules <path>',
    },
    {
      text: 'Review the field named in the error message',
    },
    {
      text: 'Fall back to the bundled catalog by removing paths.rules',
    },
  ],

  document_error: [
    {
      text: 'Check that the document is valid JSON',
    },
    {
      text: 'Documents need a "sections" object of section texts',
      action: '{ "studyType": "phase2", "sections": { "objectives": "..." } }',
    },
    {
      text: 'Pass the study type explicitly if the document has none',
      action: 'pqa validate <document.json> --study-type phase2',
    },
  ],

  unknown: [
    {
      text: 'Run with debug logging for more detail',
      action: 'PROTOCOL_QA_DEBUG=true pqa <command>',
    },
    {
      text: 'Show usage for the command',
      action: 'pqa help <command>',
    },
  ],
};

/**
 * Extracts error type from error message.
 *
 * @param errorMessage - The error message to analyze.
 * @returns The identified error type.
 */
export function inferErrorType(errorMessage: string): ErrorType {
  const lowerMessage = errorMessage.toLowerCase();

  if (
    lowerMessage.includes('rule catalog') ||
    lowerMessage.includes('rules file') ||
    lowerMessage.includes('[sections')
  ) {
    return 'rules_error';
  }

  if (
    lowerMessage.includes('config') ||
    lowerMessage.includes('toml') ||
    lowerMessage.includes('threshold') ||
    lowerMessage.includes('environment variable') ||
    lowerMessage.includes('protocol_qa_')
  ) {
    return 'config_error';
  }

  if (
    lowerMessage.includes('protocol document') ||
    lowerMessage.includes('json') ||
    lowerMessage.includes('sections') ||
    lowerMessage.includes('study type')
  ) {
    return 'document_error';
  }

  return 'unknown';
}

/**
 * Classifies a thrown value, by class where known and by message otherwise.
 *
 * @param error - The thrown value.
 * @returns The identified error type.
 */
export function classifyError(error: unknown): ErrorType {
  if (
    error instanceof ConfigParseError ||
    error instanceof ConfigValidationError ||
    error instanceof EnvCoercionError
  ) {
    return 'config_error';
  }
  if (error instanceof RuleCatalogLoadError) {
    return 'rules_error';
  }
  if (error instanceof DocumentLoadError || error instanceof ProtocolInvocationError) {
    return 'document_error';
  }
  return inferErrorType(error instanceof Error ? error.message : String(error));
}

/**
 * Gets suggestions for a given error type.
 *
 * @param errorType - The type of error.
 * @returns Array of suggestions.
 */
function getSuggestions(errorType: ErrorType): readonly Suggestion[] {
  return ERROR_SUGGESTIONS[errorType];
}

/**
 * Formats a suggestion for display.
 *
 * @param suggestion - The suggestion to format.
 * @param index - The suggestion index (1-based).
 * @param options - Display options.
 * @returns Formatted suggestion string.
 */
function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText = suggestion.action ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats error message with contextual suggestions.
 *
 * @param errorMessage - The error message.
 * @param context - Additional error context.
 * @param options - Display options.
 * @returns Formatted error with suggestions.
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true, unicode: true }
): string {
  const errorType = context.errorType ?? inferErrorType(errorMessage);
  const suggestions = getSuggestions(errorType);

  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';
  const yellowCode = options.colors ? '\x1b[33m' : '';

  let result = `${redCode}Error:${resetCode} ${errorMessage}`;

  if (context.details?.filePath !== undefined) {
    result += `\n  ${yellowCode}File:${resetCode} ${context.details.filePath}`;
  }

  if (context.details?.field !== undefined) {
    result += `\n  ${yellowCode}Field:${resetCode} ${context.details.field}`;
  }

  if (context.command !== undefined) {
    result += `\n  ${yellowCode}Command:${resetCode} ${context.command}`;
  }

  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  for (let i = 0; i < suggestions.length; i++) {
    const suggestion = suggestions[i];
    if (suggestion !== undefined) {
      result += '\n' + formatSuggestion(suggestion, i + 1, options);
    }
  }

  return result;
}

/**
 * Builds the error context for a thrown value.
 *
 * @param error - The thrown value.
 * @param command - The command that was running.
 */
export function errorContextFor(error: unknown, command?: string): Partial<ErrorContext> {
  const context: Partial<ErrorContext> = { errorType: classifyError(error) };
  if (command !== undefined) {
    context.command = command;
  }
  if (error instanceof DocumentLoadError) {
    context.details = { filePath: error.source };
  } else if (error instanceof RuleCatalogLoadError) {
    context.details =
      error.details.field !== undefined
        ? { filePath: error.details.filePath, field: error.details.field }
        : { filePath: error.details.filePath };
  }
  return context;
}

/**
 * Displays error message with suggestions to console.
 *
 * @param errorMessage - The error message.
 * @param context - Additional error context.
 * @param options - Display options.
 */
export function displayErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true, unicode: true }
): void {
  console.error();
  console.error(formatErrorWithSuggestions(errorMessage, context, options));
  console.error();
}
