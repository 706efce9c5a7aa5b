/**
 * Protocol aggregator.
 *
 * Runs every check over a whole protocol and composes the report. The
 * registry is passed in explicitly; nothing here holds process state.
 *
 * @packageDocumentation
 */

import { RuleRegistry } from '../rules/registry.js';
import type { Logger } from '../utils/logger.js';
import { detectDuplication, type DuplicationOptions } from './duplication.js';
import { adviseLanguage } from './language.js';
import { createSectionResult, validateSection } from './section-validator.js';
import { checkTimeline } from './timeline.js';
import {
  sectionEntries,
  type Issue,
  type MissingElement,
  type ProtocolReport,
  type ProtocolSections,
  type SectionResult,
} from './types.js';

/**
 * Raised when validateProtocol is called with a structurally invalid request.
 * Content problems never raise; they become issues in the report.
 */
export class ProtocolInvocationError extends Error {
  /** The argument that was invalid. */
  public readonly argument: string;

  constructor(argument: string, message: string) {
    super(message);
    this.name = 'ProtocolInvocationError';
    this.argument = argument;
  }
}

/**
 * Options for {@link validateProtocol}.
 */
export interface ValidateProtocolOptions {
  /** Duplication thresholds. Defaults apply when omitted. */
  readonly duplication?: DuplicationOptions;
  /** Receives debug events for each stage. */
  readonly logger?: Logger;
}

function assertInvocation(
  sections: unknown,
  studyType: unknown,
  registry: unknown
): asserts sections is ProtocolSections {
  if (
    sections === null ||
    sections === undefined ||
    typeof sections !== 'object' ||
    Array.isArray(sections)
  ) {
    throw new ProtocolInvocationError('sections', 'sections must be a map or object of section texts');
  }
  if (typeof studyType !== 'string') {
    throw new ProtocolInvocationError('studyType', 'studyType must be a string');
  }
  if (!(registry instanceof RuleRegistry)) {
    throw new ProtocolInvocationError('registry', 'registry must be a RuleRegistry');
  }
  const entries: Iterable<[unknown, unknown]> =
    sections instanceof Map ? sections.entries() : Object.entries(sections);
  for (const [name, text] of entries) {
    if (typeof name !== 'string') {
      throw new ProtocolInvocationError('sections', 'section names must be strings');
    }
    if (typeof text !== 'string') {
      throw new ProtocolInvocationError('sections', `text of section '${name}' must be a string`);
    }
  }
}

function roundScore(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Validates a whole protocol document.
 *
 * Each section is validated against the registry, then checked for
 * timeline ordering; timeline issues are merged into that section and its
 * score recomputed, with their suggestions ahead of the language hints. Duplication is checked once across all sections and
 * reported separately, outside every section score.
 *
 * @param sections - Section name to text, in document order.
 * @param studyType - Study type selecting study-specific rules.
 * @param registry - The loaded rule registry.
 * @param options - Duplication thresholds and logging.
 * @returns The consolidated report.
 * @throws ProtocolInvocationError if an argument is structurally invalid.
 *
 * @example
 * ```typescript
 * const registry = await loadRuleRegistryOrThrow();
 * const report = validateProtocol(
 *   { objectives: 'tbd', synopsis: '...' },
 *   'phase2',
 *   registry
 * );
 * report.guidelineAdherence; // false
 * ```
 */
export function validateProtocol(
  sections: ProtocolSections,
  studyType: string,
  registry: RuleRegistry,
  options: ValidateProtocolOptions = {}
): ProtocolReport {
  assertInvocation(sections, studyType, registry);
  const { logger } = options;
  const entries = sectionEntries(sections);

  logger?.debug('validation_start', {
    studyType,
    sections: entries.length,
    rules: registry.source,
  });

  const perSection = new Map<string, SectionResult>();
  const missingElements: MissingElement[] = [];

  for (const [name, text] of entries) {
    const base = validateSection(name, text, studyType, registry);
    const timelineIssues = checkTimeline(text);
    const result =
      timelineIssues.length === 0
        ? base
        : createSectionResult(
            [...base.issues, ...timelineIssues],
            base.warnings,
            adviseLanguage(text, registry.language)
          );
    perSection.set(name, result);

    for (const issue of result.issues) {
      if (issue.kind === 'MISSING_ELEMENT' && issue.element !== undefined) {
        missingElements.push(Object.freeze({ section: name, element: issue.element }));
      }
    }

    logger?.debug('section_validated', {
      section: name,
      issues: result.issues.length,
      warnings: result.warnings.length,
      score: result.score,
    });
  }

  const duplicationIssues = detectDuplication(sections, options.duplication);
  if (duplicationIssues.length > 0) {
    logger?.debug('duplication_detected', { count: duplicationIssues.length });
  }

  const results = [...perSection.values()];
  const hasCritical = [
    ...results.flatMap((result) => [...result.issues, ...result.warnings]),
    ...duplicationIssues,
  ].some((issue: Issue) => issue.severity === 'CRITICAL');

  const overallScore =
    results.length === 0
      ? 100
      : roundScore(results.reduce((sum, result) => sum + result.score, 0) / results.length);

  const report: ProtocolReport = Object.freeze({
    studyType,
    perSection,
    duplicationIssues: Object.freeze(duplicationIssues),
    missingElements: Object.freeze(missingElements),
    guidelineAdherence: !hasCritical && missingElements.length === 0,
    overallScore,
  });

  logger?.debug('validation_complete', {
    overallScore,
    guidelineAdherence: report.guidelineAdherence,
    missingElements: missingElements.length,
  });

  return report;
}
