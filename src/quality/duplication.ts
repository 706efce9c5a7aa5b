/**
 * Cross-section duplication detector.
 *
 * Compares every pair of sections by word-set overlap and flags pairs
 * whose overlap exceeds a threshold. Pairs involving the lead section
 * (the synopsis) legitimately repeat other sections, so they get a higher
 * threshold and a lower severity.
 *
 * @packageDocumentation
 */

import { createIssue, sectionEntries, type Issue, type ProtocolSections } from './types.js';

/**
 * Thresholds and the lead section name used by the detector.
 */
export interface DuplicationOptions {
  /** Overlap above which ordinary pairs are flagged. */
  readonly threshold?: number;
  /** Section whose pairs use {@link DuplicationOptions.leadSectionThreshold}. */
  readonly leadSection?: string;
  /** Overlap above which pairs involving the lead section are flagged. */
  readonly leadSectionThreshold?: number;
}

/**
 * Default detector settings.
 */
export const DEFAULT_DUPLICATION_OPTIONS: Required<DuplicationOptions> = Object.freeze({
  threshold: 0.6,
  leadSection: 'synopsis',
  leadSectionThreshold: 0.8,
});

const WORD_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * Splits text into its set of lowercase word tokens.
 *
 * @param text - Text to tokenize.
 */
export function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().match(WORD_PATTERN) ?? []);
}

/**
 * Overlap of two token sets: shared tokens divided by the size of the
 * smaller set, or 0 when either set is empty.
 */
export function setOverlap(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) {
    return 0;
  }
  const [smaller, larger] = a.size <= b.size ? [a, b] : [b, a];
  let shared = 0;
  for (const token of smaller) {
    if (larger.has(token)) {
      shared++;
    }
  }
  return shared / smaller.size;
}

/**
 * Similarity of two texts in [0, 1]. Symmetric; identical non-empty texts
 * score 1.
 *
 * @param a - First text.
 * @param b - Second text.
 */
export function computeSimilarity(a: string, b: string): number {
  return setOverlap(tokenize(a), tokenize(b));
}

/**
 * Flags section pairs with excessive textual overlap.
 *
 * Pairs are taken in sorted name order, each unordered pair once. A pair
 * is flagged when its similarity is strictly greater than its threshold.
 *
 * @param sections - Section name to section text.
 * @param options - Threshold overrides.
 * @returns INCONSISTENCY issues, MAJOR for ordinary pairs and MINOR for
 * pairs involving the lead section.
 *
 * @example
 * ```typescript
 * detectDuplication(new Map([
 *   ['background', text],
 *   ['rationale', text],
 * ]));
 * // [{ kind: 'INCONSISTENCY', severity: 'MAJOR',
 * //    message: "Sections 'background' and 'rationale' overlap (similarity 1.00)", ... }]
 * ```
 */
export function detectDuplication(
  sections: ProtocolSections,
  options: DuplicationOptions = {}
): Issue[] {
  const {
    threshold = DEFAULT_DUPLICATION_OPTIONS.threshold,
    leadSection = DEFAULT_DUPLICATION_OPTIONS.leadSection,
    leadSectionThreshold = DEFAULT_DUPLICATION_OPTIONS.leadSectionThreshold,
  } = options;
  const lead = leadSection.toLowerCase();

  const tokenSets = new Map<string, Set<string>>();
  for (const [name, text] of sectionEntries(sections)) {
    tokenSets.set(name, tokenize(text));
  }
  const names = [...tokenSets.keys()].sort();

  const issues: Issue[] = [];
  for (let i = 0; i < names.length; i++) {
    for (let j = i + 1; j < names.length; j++) {
      const first = names[i];
      const second = names[j];
      if (first === undefined || second === undefined) {
        continue;
      }
      const similarity = setOverlap(
        tokenSets.get(first) ?? new Set<string>(),
        tokenSets.get(second) ?? new Set<string>()
      );
      const involvesLead = first.toLowerCase() === lead || second.toLowerCase() === lead;
      const limit = involvesLead ? leadSectionThreshold : threshold;

      if (similarity > limit) {
        issues.push(
          createIssue(
            'INCONSISTENCY',
            involvesLead ? 'MINOR' : 'MAJOR',
            `Sections '${first}' and '${second}' overlap (similarity ${similarity.toFixed(2)})`,
            involvesLead
              ? 'Review if duplication is justified'
              : 'Consolidate or cross-reference'
          )
        );
      }
    }
  }

  return issues;
}
