/**
 * TOML rule catalog parser.
 *
 * Parses section rules, study-type exclusions and language rules from a
 * TOML catalog into a {@link RuleRegistry}, with field-level validation.
 *
 * @packageDocumentation
 */

import * as toml from '@iarna/toml';
import { fileURLToPath } from 'node:url';
import { safeReadFile } from '../utils/safe-fs.js';
import {
  createRuleRegistry,
  type RuleDefinition,
  type RuleRegistry,
  type RuleRegistryDefinition,
} from './registry.js';
import type { StudyTypeExclusion } from './types.js';

/**
 * Error type for catalog parsing failures.
 */
export interface RuleCatalogError {
  /** Discriminator for error type. */
  error: true;
  /** Type of parsing error. */
  type: 'parse_error' | 'validation_error';
  /** Human-readable error message. */
  message: string;
  /** Path to the file that caused the error. */
  filePath: string;
  /** Field path that caused the error. */
  field?: string;
}

/**
 * Result type for catalog parsing.
 */
export type CatalogResult<T> = T | RuleCatalogError;

/**
 * Thrown by {@link assertRuleRegistry} and {@link loadRuleRegistryOrThrow}.
 */
export class RuleCatalogLoadError extends Error {
  /** The underlying catalog error. */
  public readonly details: RuleCatalogError;

  constructor(details: RuleCatalogError) {
    const location = details.field !== undefined ? ` (${details.field})` : '';
    super(`Invalid rule catalog ${details.filePath}${location}: ${details.message}`);
    this.name = 'RuleCatalogLoadError';
    this.details = details;
  }
}

/**
 * Location of the catalog bundled with the package.
 */
export const DEFAULT_RULES_PATH = fileURLToPath(
  new URL('../../rules/protocol-rules.toml', import.meta.url)
);

/**
 * Type guard to check if a result is an error.
 */
export function isRuleCatalogError<T>(result: CatalogResult<T>): result is RuleCatalogError {
  return typeof result === 'object' && result !== null && 'error' in result && result.error === true;
}

function createError(
  type: 'parse_error' | 'validation_error',
  message: string,
  filePath: string,
  field?: string
): RuleCatalogError {
  if (field !== undefined) {
    return { error: true, type, message, filePath, field };
  }
  return { error: true, type, message, filePath };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads an array of non-empty strings.
 */
function readStringList(
  value: unknown,
  field: string,
  filePath: string
): CatalogResult<string[]> {
  if (!Array.isArray(value)) {
    return createError('validation_error', `"${field}" must be an array of strings`, filePath, field);
  }
  const result: string[] = [];
  for (let i = 0; i < value.length; i++) {
    const item: unknown = value[i];
    if (typeof item !== 'string' || item.trim().length === 0) {
      return createError(
        'validation_error',
        `Entry ${String(i)} of "${field}" must be a non-empty string`,
        filePath,
        `${field}[${String(i)}]`
      );
    }
    result.push(item);
  }
  return result;
}

/**
 * Reads a table of study type to string list.
 */
function readStudyTypeLists(
  value: unknown,
  field: string,
  filePath: string
): CatalogResult<Record<string, string[]>> {
  if (!isRecord(value)) {
    return createError('validation_error', `[${field}] must be a table`, filePath, field);
  }
  const result: Record<string, string[]> = {};
  for (const [studyType, list] of Object.entries(value)) {
    const parsed = readStringList(list, `${field}.${studyType}`, filePath);
    if (isRuleCatalogError(parsed)) {
      return parsed;
    }
    Object.defineProperty(result, studyType, { value: parsed, enumerable: true });
  }
  return result;
}

/**
 * Reads a table of string to string.
 */
function readStringTable(
  value: unknown,
  field: string,
  filePath: string
): CatalogResult<Record<string, string>> {
  if (!isRecord(value)) {
    return createError('validation_error', `[${field}] must be a table`, filePath, field);
  }
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      return createError(
        'validation_error',
        `"${field}.${key}" must be a string`,
        filePath,
        `${field}.${key}`
      );
    }
    Object.defineProperty(result, key, { value: entry, enumerable: true });
  }
  return result;
}

/**
 * Parses one `[sections.<name>]` table.
 */
function parseSectionRule(
  name: string,
  raw: unknown,
  filePath: string
): CatalogResult<RuleDefinition> {
  const field = `sections.${name}`;
  if (name.trim().length === 0) {
    return createError('validation_error', 'Section names must not be empty', filePath, field);
  }
  if (!isRecord(raw)) {
    return createError('validation_error', `[${field}] must be a table`, filePath, field);
  }

  const rule: RuleDefinition = {};

  if ('required_elements' in raw) {
    const list = readStringList(raw.required_elements, `${field}.required_elements`, filePath);
    if (isRuleCatalogError(list)) return list;
    rule.requiredElements = list;
  }

  if ('forbidden_terms' in raw) {
    const list = readStringList(raw.forbidden_terms, `${field}.forbidden_terms`, filePath);
    if (isRuleCatalogError(list)) return list;
    rule.forbiddenTerms = list;
  }

  if ('min_length' in raw) {
    const minLength = raw.min_length;
    if (typeof minLength !== 'number' || !Number.isInteger(minLength) || minLength < 0) {
      return createError(
        'validation_error',
        `"${field}.min_length" must be a non-negative integer`,
        filePath,
        `${field}.min_length`
      );
    }
    rule.minLength = minLength;
  }

  if ('study_type_elements' in raw) {
    const lists = readStudyTypeLists(
      raw.study_type_elements,
      `${field}.study_type_elements`,
      filePath
    );
    if (isRuleCatalogError(lists)) return lists;
    rule.studyTypeRequiredElements = lists;
  }

  if ('required_subsections' in raw) {
    const lists = readStudyTypeLists(
      raw.required_subsections,
      `${field}.required_subsections`,
      filePath
    );
    if (isRuleCatalogError(lists)) return lists;
    rule.requiredSubsections = lists;
  }

  return rule;
}

/**
 * Parses the `[study_type_exclusions.<type>]` tables.
 */
function parseExclusions(
  raw: unknown,
  filePath: string
): CatalogResult<Record<string, StudyTypeExclusion>> {
  if (!isRecord(raw)) {
    return createError(
      'validation_error',
      '[study_type_exclusions] must be a table',
      filePath,
      'study_type_exclusions'
    );
  }

  const result: Record<string, StudyTypeExclusion> = {};
  for (const [studyType, entry] of Object.entries(raw)) {
    const field = `study_type_exclusions.${studyType}`;
    if (!isRecord(entry)) {
      return createError('validation_error', `[${field}] must be a table`, filePath, field);
    }
    const terms = readStringList(entry.terms, `${field}.terms`, filePath);
    if (isRuleCatalogError(terms)) return terms;
    const message =
      typeof entry.message === 'string'
        ? entry.message
        : `Contains elements not applicable to ${studyType} studies`;
    Object.defineProperty(result, studyType, { value: { terms, message }, enumerable: true });
  }
  return result;
}

/**
 * Parses the `[language]` table.
 */
function parseLanguage(
  raw: unknown,
  filePath: string
): CatalogResult<NonNullable<RuleRegistryDefinition['language']>> {
  if (!isRecord(raw)) {
    return createError('validation_error', '[language] must be a table', filePath, 'language');
  }

  const language: NonNullable<RuleRegistryDefinition['language']> = {};

  if ('informal_terms' in raw) {
    const table = readStringTable(raw.informal_terms, 'language.informal_terms', filePath);
    if (isRuleCatalogError(table)) return table;
    language.informalTerms = table;
  }
  if ('imprecise_terms' in raw) {
    const table = readStringTable(raw.imprecise_terms, 'language.imprecise_terms', filePath);
    if (isRuleCatalogError(table)) return table;
    language.impreciseTerms = table;
  }
  if ('filler_terms' in raw) {
    const list = readStringList(raw.filler_terms, 'language.filler_terms', filePath);
    if (isRuleCatalogError(list)) return list;
    language.fillerTerms = list;
  }

  return language;
}

/**
 * Parses a rule catalog from a TOML string.
 *
 * @param tomlStr - The TOML catalog.
 * @param filePath - Path used in error messages and recorded as the registry source.
 * @returns Either a RuleRegistry or a RuleCatalogError.
 *
 * @example
 * ```typescript
 * const result = parseRuleCatalog(`
 * [sections.objectives]
 * required_elements = ["primary_objective"]
 * forbidden_terms = ["tbd"]
 * min_length = 200
 * `);
 *
 * if (!isRuleCatalogError(result)) {
 *   result.rulesFor('objectives').minLength; // 200
 * }
 * ```
 */
export function parseRuleCatalog(
  tomlStr: string,
  filePath = '<string>'
): CatalogResult<RuleRegistry> {
  let parsed: unknown;
  try {
    parsed = toml.parse(tomlStr);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return createError('parse_error', `Failed to parse TOML: ${message}`, filePath);
  }

  if (!isRecord(parsed)) {
    return createError('validation_error', 'Parsed TOML is not an object', filePath);
  }

  const definition: RuleRegistryDefinition = { sections: {}, source: filePath };

  if ('sections' in parsed) {
    if (!isRecord(parsed.sections)) {
      return createError('validation_error', '[sections] must be a table', filePath, 'sections');
    }
    const sections: Record<string, RuleDefinition> = {};
    for (const [name, raw] of Object.entries(parsed.sections)) {
      const rule = parseSectionRule(name, raw, filePath);
      if (isRuleCatalogError(rule)) {
        return rule;
      }
      Object.defineProperty(sections, name, { value: rule, enumerable: true });
    }
    definition.sections = sections;
  }

  if ('study_type_exclusions' in parsed) {
    const exclusions = parseExclusions(parsed.study_type_exclusions, filePath);
    if (isRuleCatalogError(exclusions)) return exclusions;
    definition.studyTypeExclusions = exclusions;
  }

  if ('language' in parsed) {
    const language = parseLanguage(parsed.language, filePath);
    if (isRuleCatalogError(language)) return language;
    definition.language = language;
  }

  return createRuleRegistry(definition);
}

/**
 * Converts a catalog result into a registry, throwing on error.
 *
 * @param result - Output of {@link parseRuleCatalog}.
 * @returns The registry.
 * @throws RuleCatalogLoadError if the result is an error.
 */
export function assertRuleRegistry(result: CatalogResult<RuleRegistry>): RuleRegistry {
  if (isRuleCatalogError(result)) {
    throw new RuleCatalogLoadError(result);
  }
  return result;
}

/**
 * Loads a rule catalog from disk.
 *
 * @param filePath - Path to the TOML catalog. Defaults to the bundled catalog.
 * @returns Either a RuleRegistry or a RuleCatalogError.
 */
export async function loadRuleRegistry(
  filePath: string = DEFAULT_RULES_PATH
): Promise<CatalogResult<RuleRegistry>> {
  let content: string;
  try {
    content = await safeReadFile(filePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return createError('parse_error', `Failed to read rule catalog: ${message}`, filePath);
  }
  return parseRuleCatalog(content, filePath);
}

/**
 * Loads a rule catalog from disk and throws on any error.
 *
 * @param filePath - Path to the TOML catalog. Defaults to the bundled catalog.
 * @returns The registry.
 * @throws RuleCatalogLoadError if the catalog cannot be read or is invalid.
 */
export async function loadRuleRegistryOrThrow(
  filePath: string = DEFAULT_RULES_PATH
): Promise<RuleRegistry> {
  return assertRuleRegistry(await loadRuleRegistry(filePath));
}
