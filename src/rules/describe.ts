/**
 * Plain-object views of rules for display and JSON output.
 *
 * @packageDocumentation
 */

import type { Rule, StudyType, StudyTypeExclusion } from './types.js';

/**
 * JSON-compatible description of one section rule.
 *
 * Study-type keyed tables keep their catalog order. Keys are defined as own
 * data properties, so a study type called `__proto__` stays data.
 */
export interface RuleDescription {
  requiredElements: string[];
  forbiddenTerms: string[];
  minLength: number;
  studyTypeRequiredElements: Record<StudyType, string[]>;
  requiredSubsections: Record<StudyType, string[]>;
  studyTypeForbiddenTerms: Record<StudyType, { terms: string[]; message: string }>;
}

function toRecord<V, R>(
  map: ReadonlyMap<StudyType, V>,
  convert: (value: V) => R,
  studyType: StudyType | undefined
): Record<StudyType, R> {
  const record: Record<StudyType, R> = {};
  for (const [key, value] of map) {
    if (studyType !== undefined && key !== studyType) {
      continue;
    }
    Object.defineProperty(record, key, {
      value: convert(value),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return record;
}

function copyExclusion(exclusion: StudyTypeExclusion): { terms: string[]; message: string } {
  return { terms: [...exclusion.terms], message: exclusion.message };
}

/**
 * Describes a rule as a plain object.
 *
 * @param rule - The rule to describe.
 * @param studyType - When given, study-type tables keep only this study type.
 *
 * @example
 * ```typescript
 * describeRule(registry.rulesFor('study_design'), 'phase1').studyTypeRequiredElements;
 * // { phase1: ['dose_escalation', 'safety_monitoring'] }
 * ```
 */
export function describeRule(rule: Rule, studyType?: StudyType): RuleDescription {
  return {
    requiredElements: [...rule.requiredElements],
    forbiddenTerms: [...rule.forbiddenTerms],
    minLength: rule.minLength,
    studyTypeRequiredElements: toRecord(rule.studyTypeRequiredElements, (v) => [...v], studyType),
    requiredSubsections: toRecord(rule.requiredSubsections, (v) => [...v], studyType),
    studyTypeForbiddenTerms: toRecord(rule.studyTypeForbiddenTerms, copyExclusion, studyType),
  };
}
