/**
 * Types for protocol quality validation.
 *
 * Defines issues, severities, per-section results and the consolidated
 * protocol report produced by the validation engine.
 *
 * @packageDocumentation
 */

/**
 * Impact level of an issue.
 *
 * - CRITICAL: blocks guideline adherence (e.g. placeholder text left in a section)
 * - MAJOR: a required element or consistency problem that needs fixing
 * - MINOR: cosmetic or advisory problems
 */
export type Severity = 'CRITICAL' | 'MAJOR' | 'MINOR';

/**
 * All severities ordered from highest to lowest impact.
 */
export const SEVERITY_ORDER: readonly Severity[] = Object.freeze([
  'CRITICAL',
  'MAJOR',
  'MINOR',
] as const);

/**
 * The kind of finding an issue represents.
 */
export type IssueKind =
  | 'MISSING_ELEMENT'
  | 'FORBIDDEN_TERM'
  | 'INSUFFICIENT_LENGTH'
  | 'INCONSISTENCY'
  | 'MISSING_SUBSECTION';

/**
 * All issue kinds as an array.
 */
export const ISSUE_KINDS: readonly IssueKind[] = Object.freeze([
  'MISSING_ELEMENT',
  'FORBIDDEN_TERM',
  'INSUFFICIENT_LENGTH',
  'INCONSISTENCY',
  'MISSING_SUBSECTION',
] as const);

/**
 * A single finding against a section or a whole document.
 *
 * Issues carry no reference to the section they were raised against;
 * callers associate them by context.
 */
export interface Issue {
  readonly kind: IssueKind;
  readonly severity: Severity;
  /** Human-readable description of the finding. */
  readonly message: string;
  /** Recommended fix. */
  readonly suggestion: string;
  /** The missing element, set on MISSING_ELEMENT issues only. */
  readonly element?: string;
}

/**
 * Outcome of validating one section.
 */
export interface SectionResult {
  /** Issues counted toward the score, in detection order. */
  readonly issues: readonly Issue[];
  /** Advisory findings that do not affect the score (missing subsections). */
  readonly warnings: readonly Issue[];
  /** De-duplicated suggestions from issues, warnings and language hints. */
  readonly suggestions: readonly string[];
  /** Quality score in [0, 100]. */
  readonly score: number;
}

/**
 * A required element that was not found, tagged with its section.
 */
export interface MissingElement {
  readonly section: string;
  readonly element: string;
}

/**
 * Consolidated result of validating a whole protocol.
 */
export interface ProtocolReport {
  /** Study type the document was validated against. */
  readonly studyType: string;
  /** Per-section results, in input order. */
  readonly perSection: ReadonlyMap<string, SectionResult>;
  /** Cross-section duplication findings; not counted in any section score. */
  readonly duplicationIssues: readonly Issue[];
  /** Every missing required element across all sections. */
  readonly missingElements: readonly MissingElement[];
  /** True iff no CRITICAL issue exists anywhere and nothing is missing. */
  readonly guidelineAdherence: boolean;
  /** Mean of the section scores (100 for an empty document). */
  readonly overallScore: number;
}

/**
 * A protocol document as supplied by callers: section name to section text.
 *
 * Maps keep their insertion order; records are read in property order.
 */
export type ProtocolSections = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

/**
 * Creates a frozen issue.
 *
 * @param kind - The issue kind.
 * @param severity - The issue severity.
 * @param message - Human-readable description.
 * @param suggestion - Recommended fix.
 * @param element - Missing element, for MISSING_ELEMENT issues.
 * @returns The immutable issue.
 */
export function createIssue(
  kind: IssueKind,
  severity: Severity,
  message: string,
  suggestion: string,
  element?: string
): Issue {
  if (element !== undefined) {
    return Object.freeze({ kind, severity, message, suggestion, element });
  }
  return Object.freeze({ kind, severity, message, suggestion });
}

function isSectionMap(sections: ProtocolSections): sections is ReadonlyMap<string, string> {
  return sections instanceof Map;
}

/**
 * Returns the `[name, text]` pairs of a protocol document in input order.
 *
 * @param sections - A map or a plain record of section texts.
 */
export function sectionEntries(sections: ProtocolSections): [string, string][] {
  if (isSectionMap(sections)) {
    return [...sections.entries()];
  }
  return Object.entries(sections);
}
