/**
 * Section validator.
 *
 * Evaluates one section's text against the rule registry for a study type.
 * Issues are emitted in a fixed order: required elements, study-type
 * elements, forbidden terms, study-type exclusions, drafting markers,
 * length. Missing subsections are reported as warnings and never scored.
 *
 * @packageDocumentation
 */

import type { RuleRegistry } from '../rules/registry.js';
import type { Rule } from '../rules/types.js';
import { adviseLanguage } from './language.js';
import { score } from './scoring.js';
import { createIssue, type Issue, type SectionResult } from './types.js';

/**
 * Case-insensitive substring test.
 */
export function containsTerm(text: string, term: string): boolean {
  return text.toLowerCase().includes(term.toLowerCase());
}

/**
 * Normalizes a heading or subsection name for comparison.
 */
function normalizeHeading(value: string): string {
  return value.replace(/[_\s]+/g, ' ').trim().toLowerCase();
}

const HEADING_PREFIX = /^(?:#{1,6}\s*|\d+(?:\.\d+)*(?:[.)]\s*|\s+)|[ivxlc]+[.)]\s+|[-*+•]\s+)/i;
const TRAILING_COLON = /\s*:\s*$/;

/**
 * Strips markdown and numbering decoration from a line.
 */
function stripHeadingDecoration(line: string): string {
  let result = line.trim();
  let previous: string;
  do {
    previous = result;
    result = result.replace(HEADING_PREFIX, '').trim();
  } while (result !== previous);
  result = result.replace(TRAILING_COLON, '');
  const emphasis = /^(\*\*|__)(.*)\1$/.exec(result);
  if (emphasis?.[2] !== undefined) {
    result = emphasis[2].trim();
  }
  return result.replace(TRAILING_COLON, '');
}

/**
 * Whether the text contains a heading-like line naming the subsection.
 *
 * A heading-like line is one that, once its markdown `#` prefix, numbering
 * (`2.`, `3.1`, `IV.`), bullet, surrounding `**`/`__` and trailing colon are
 * removed, equals the subsection name ignoring case, underscores and spacing.
 *
 * @param text - Section text.
 * @param subsection - Expected subsection name.
 */
export function hasSubsectionHeading(text: string, subsection: string): boolean {
  const expected = normalizeHeading(subsection);
  if (expected.length === 0) {
    return true;
  }
  return text
    .split(/\r?\n/)
    .some((line) => normalizeHeading(stripHeadingDecoration(line)) === expected);
}

function checkRequiredElements(text: string, sectionName: string, rule: Rule, issues: Issue[]): void {
  for (const element of rule.requiredElements) {
    if (!containsTerm(text, element)) {
      issues.push(
        createIssue(
          'MISSING_ELEMENT',
          'MAJOR',
          `Missing required element '${element}' in ${sectionName}`,
          `Add ${element} to the ${sectionName} section`,
          element
        )
      );
    }
  }
}

function checkStudyTypeElements(
  text: string,
  sectionName: string,
  studyType: string,
  rule: Rule,
  issues: Issue[]
): void {
  const elements = rule.studyTypeRequiredElements.get(studyType);
  if (elements === undefined) {
    return;
  }
  for (const element of elements) {
    if (!containsTerm(text, element)) {
      issues.push(
        createIssue(
          'MISSING_ELEMENT',
          'MAJOR',
          `Missing ${studyType}-specific element '${element}' in ${sectionName}`,
          `Add ${element} as required for ${studyType} studies`,
          element
        )
      );
    }
  }
}

function checkForbiddenTerms(
  text: string,
  sectionName: string,
  studyType: string,
  rule: Rule,
  issues: Issue[]
): void {
  for (const term of rule.forbiddenTerms) {
    if (containsTerm(text, term)) {
      issues.push(
        createIssue(
          'FORBIDDEN_TERM',
          'CRITICAL',
          `Forbidden term '${term}' found in ${sectionName}`,
          `Replace '${term}' with final content`
        )
      );
    }
  }

  const exclusion = rule.studyTypeForbiddenTerms.get(studyType);
  if (exclusion === undefined) {
    return;
  }
  for (const term of exclusion.terms) {
    if (containsTerm(text, term)) {
      issues.push(
        createIssue(
          'FORBIDDEN_TERM',
          'CRITICAL',
          `${exclusion.message}: '${term}'`,
          `Remove or replace content about ${term} as it is not applicable for ${studyType} studies`
        )
      );
    }
  }
}

const PLACEHOLDER_MARKER = /\[PLACEHOLDER:\s*\*(.*?)\*\]/g;
const RECOMMENDED_MARKER = /\[RECOMMENDED:\s*\*(.*?)\*\]/g;

function markerLabels(text: string, pattern: RegExp): string[] {
  const labels = new Set<string>();
  for (const match of text.matchAll(pattern)) {
    labels.add((match[1] ?? '').trim());
  }
  return [...labels];
}

/**
 * Labels of `[PLACEHOLDER: *label*]` markers, deduplicated, in order of
 * appearance.
 */
export function findPlaceholders(text: string): string[] {
  return markerLabels(text, PLACEHOLDER_MARKER);
}

/**
 * Labels of `[RECOMMENDED: *label*]` markers, deduplicated, in order of
 * appearance.
 */
export function findRecommendations(text: string): string[] {
  return markerLabels(text, RECOMMENDED_MARKER);
}

function checkMarkers(text: string, sectionName: string, issues: Issue[]): void {
  for (const label of findPlaceholders(text)) {
    issues.push(
      createIssue(
        'FORBIDDEN_TERM',
        'CRITICAL',
        `Unresolved placeholder '${label}' in ${sectionName}`,
        `Provide ${label} in place of the placeholder`
      )
    );
  }
  for (const label of findRecommendations(text)) {
    issues.push(
      createIssue(
        'FORBIDDEN_TERM',
        'MINOR',
        `Unreviewed recommendation '${label}' in ${sectionName}`,
        `Review the recommended ${label} and replace the marker with final content`
      )
    );
  }
}

function checkLength(text: string, sectionName: string, rule: Rule, issues: Issue[]): void {
  if (text.length < rule.minLength) {
    issues.push(
      createIssue(
        'INSUFFICIENT_LENGTH',
        'MINOR',
        `Section ${sectionName} is ${String(text.length)} characters; at least ${String(rule.minLength)} expected`,
        `Expand the ${sectionName} section with more detail`
      )
    );
  }
}

function checkSubsections(
  text: string,
  sectionName: string,
  studyType: string,
  rule: Rule,
  warnings: Issue[]
): void {
  const subsections = rule.requiredSubsections.get(studyType);
  if (subsections === undefined) {
    return;
  }
  for (const subsection of subsections) {
    if (!hasSubsectionHeading(text, subsection)) {
      warnings.push(
        createIssue(
          'MISSING_SUBSECTION',
          'MINOR',
          `Subsection '${subsection}' not found in ${sectionName}`,
          `Add a '${subsection}' subsection to ${sectionName}`
        )
      );
    }
  }
}

/**
 * Collects the suggestions of issues then warnings, followed by extra hints,
 * keeping the first occurrence of each.
 *
 * @param issues - Scored issues.
 * @param warnings - Unscored warnings.
 * @param hints - Additional advisory suggestions.
 */
export function collectSuggestions(
  issues: readonly Issue[],
  warnings: readonly Issue[],
  hints: readonly string[] = []
): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const suggestion of [
    ...issues.map((issue) => issue.suggestion),
    ...warnings.map((warning) => warning.suggestion),
    ...hints,
  ]) {
    if (!seen.has(suggestion)) {
      seen.add(suggestion);
      result.push(suggestion);
    }
  }
  return result;
}

/**
 * Builds a frozen section result and computes its score.
 *
 * @param issues - Scored issues.
 * @param warnings - Unscored warnings.
 * @param hints - Language hints appended to the suggestions.
 */
export function createSectionResult(
  issues: readonly Issue[],
  warnings: readonly Issue[],
  hints: readonly string[] = []
): SectionResult {
  return Object.freeze({
    issues: Object.freeze([...issues]),
    warnings: Object.freeze([...warnings]),
    suggestions: Object.freeze(collectSuggestions(issues, warnings, hints)),
    score: score(issues),
  });
}

/**
 * Validates one section against the registry.
 *
 * Sections and study types without configured rules produce no
 * requirement issues: the registry answers with an empty rule. Drafting
 * markers are only checked in configured sections.
 *
 * @param sectionName - Section identifier (e.g. "objectives").
 * @param text - Section text, possibly empty.
 * @param studyType - Study type selecting study-specific rules.
 * @param registry - The loaded rule registry.
 * @returns The section result.
 *
 * @example
 * ```typescript
 * const result = validateSection('objectives', 'tbd', 'phase2', registry);
 * result.issues.map((i) => i.kind);
 * // ['MISSING_ELEMENT', 'MISSING_ELEMENT', 'FORBIDDEN_TERM', 'INSUFFICIENT_LENGTH']
 * result.score; // 55
 * ```
 */
export function validateSection(
  sectionName: string,
  text: string,
  studyType: string,
  registry: RuleRegistry
): SectionResult {
  const rule = registry.rulesFor(sectionName);
  const issues: Issue[] = [];
  const warnings: Issue[] = [];

  checkRequiredElements(text, sectionName, rule, issues);
  checkStudyTypeElements(text, sectionName, studyType, rule, issues);
  checkForbiddenTerms(text, sectionName, studyType, rule, issues);
  if (registry.hasRule(sectionName)) {
    checkMarkers(text, sectionName, issues);
  }
  checkLength(text, sectionName, rule, issues);
  checkSubsections(text, sectionName, studyType, rule, warnings);

  return createSectionResult(issues, warnings, adviseLanguage(text, registry.language));
}
