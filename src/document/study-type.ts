/**
 * Study-type inference from a protocol's synopsis.
 *
 * Used when neither the command line nor the document names a study type.
 * The first family found wins, checked in this order: systematic review,
 * trial phase, real-world evidence, observational.
 *
 * @packageDocumentation
 */

import { KNOWN_STUDY_TYPES, type KnownStudyType } from '../rules/index.js';

/**
 * Section whose text is used for inference.
 */
export const SYNOPSIS_SECTION = 'synopsis';

const REVIEW_PATTERN = /\bsystematic\s+(?:literature\s+)?review\b|\bslr\b|\bmeta[-\s]?analys[ie]s\b/;
const PHASE_PATTERN = /\bphase\s*(iv|i{1,3}|[1-4])\b/;
const REAL_WORLD_PATTERN = /\breal[-\s]world\b|\brwe\b/;
const OBSERVATIONAL_PATTERN = /\bobservational\b|\bcohort\s+study\b|\bcase[-\s]control\b/;

const ROMAN_PHASES: Readonly<Record<string, string>> = { i: '1', ii: '2', iii: '3', iv: '4' };

function isKnownStudyType(value: string): value is KnownStudyType {
  return KNOWN_STUDY_TYPES.some((known) => known === value);
}

/**
 * Infers a study type from free text.
 *
 * @param text - Usually the synopsis section.
 * @returns A study type from the default catalog, or undefined when no
 * keyword matches.
 *
 * @example
 * ```typescript
 * inferStudyType('A randomized, double-blind Phase III trial'); // 'phase3'
 * inferStudyType('A systematic literature review of ...');     // 'systematic_review'
 * ```
 */
export function inferStudyType(text: string): KnownStudyType | undefined {
  const lower = text.toLowerCase();

  if (REVIEW_PATTERN.test(lower)) {
    return 'systematic_review';
  }

  const phase = PHASE_PATTERN.exec(lower)?.[1];
  if (phase !== undefined) {
    const candidate = `phase${ROMAN_PHASES[phase] ?? phase}`;
    if (isKnownStudyType(candidate)) {
      return candidate;
    }
  }

  if (REAL_WORLD_PATTERN.test(lower)) {
    return 'secondary_rwe';
  }
  if (OBSERVATIONAL_PATTERN.test(lower)) {
    return 'observational';
  }
  return undefined;
}
