/**
 * Types for the protocol rule registry.
 *
 * @packageDocumentation
 */

/**
 * Study type identifier.
 *
 * Free-form: the registry decides which values carry extra rules. Unknown
 * values are valid and simply select no study-specific rules.
 */
export type StudyType = string;

/**
 * Study types that ship with rules in the default catalog.
 */
export const KNOWN_STUDY_TYPES = Object.freeze([
  'phase1',
  'phase2',
  'phase3',
  'phase4',
  'systematic_review',
  'secondary_rwe',
  'observational',
] as const);

/**
 * A study type from the default catalog.
 */
export type KnownStudyType = (typeof KNOWN_STUDY_TYPES)[number];

/**
 * Terms that are inappropriate for a given study type, with the message
 * reported when one is found.
 */
export interface StudyTypeExclusion {
  readonly terms: readonly string[];
  readonly message: string;
}

/**
 * Completeness requirements for one protocol section.
 */
export interface Rule {
  /** Elements that must appear (case-insensitive substring). */
  readonly requiredElements: readonly string[];
  /** Placeholder or disallowed terms (case-insensitive substring). */
  readonly forbiddenTerms: readonly string[];
  /** Minimum text length in characters. */
  readonly minLength: number;
  /** Additional required elements per study type. */
  readonly studyTypeRequiredElements: ReadonlyMap<StudyType, readonly string[]>;
  /** Ordered subsection headings expected per study type. */
  readonly requiredSubsections: ReadonlyMap<StudyType, readonly string[]>;
  /** Terms that must not appear for a given study type. */
  readonly studyTypeForbiddenTerms: ReadonlyMap<StudyType, StudyTypeExclusion>;
}

/**
 * Wording rules used for advisory language suggestions.
 */
export interface LanguageRules {
  /** Informal phrase to preferred formal replacement. */
  readonly informalTerms: ReadonlyMap<string, string>;
  /** Vague quantifier to the advice shown for it. */
  readonly impreciseTerms: ReadonlyMap<string, string>;
  /** Phrases that add nothing and should be removed. */
  readonly fillerTerms: readonly string[];
}
