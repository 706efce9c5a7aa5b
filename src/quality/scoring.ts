/**
 * Scoring policy for section quality.
 *
 * @packageDocumentation
 */

import type { Issue, Severity } from './types.js';

/** Score every section starts from. */
export const BASE_SCORE = 100;

/** Bonus when no counted issue is CRITICAL. */
export const NO_CRITICAL_BONUS = 5;

/** Bonus when no issue is counted at all. */
export const CLEAN_SECTION_BONUS = 10;

/**
 * Points deducted for one counted issue of the given severity.
 *
 * @param severity - Issue severity.
 */
export function severityPenalty(severity: Severity): number {
  switch (severity) {
    case 'CRITICAL':
      return 20;
    case 'MAJOR':
      return 10;
    case 'MINOR':
      return 5;
    default: {
      const exhaustiveCheck: never = severity;
      return exhaustiveCheck;
    }
  }
}

/**
 * Whether an issue counts toward the score. Missing subsections are
 * warnings and never deduct.
 *
 * @param issue - The issue to check.
 */
export function isScoredIssue(issue: Issue): boolean {
  return issue.kind !== 'MISSING_SUBSECTION';
}

/**
 * Clamps a value into [0, 100].
 */
export function clampScore(value: number): number {
  return Math.min(BASE_SCORE, Math.max(0, value));
}

/**
 * Converts a list of issues into a quality score in [0, 100].
 *
 * Starts at 100, deducts 20/10/5 per CRITICAL/MAJOR/MINOR issue, then adds
 * 5 when no CRITICAL issue is present and 10 when nothing was counted.
 *
 * @param issues - Issues raised against a section.
 * @returns The clamped score.
 *
 * @example
 * ```typescript
 * score([]); // 100
 * score([criticalIssue, majorIssue]); // 70
 * ```
 */
export function score(issues: readonly Issue[]): number {
  const counted = issues.filter(isScoredIssue);

  let total = BASE_SCORE;
  for (const issue of counted) {
    total -= severityPenalty(issue.severity);
  }

  if (!counted.some((issue) => issue.severity === 'CRITICAL')) {
    total += NO_CRITICAL_BONUS;
  }
  if (counted.length === 0) {
    total += CLEAN_SECTION_BONUS;
  }

  return clampScore(total);
}

/**
 * Counts issues per severity.
 *
 * @param issues - Issues to count.
 * @returns A record with an entry for every severity.
 */
export function countBySeverity(issues: readonly Issue[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { CRITICAL: 0, MAJOR: 0, MINOR: 0 };
  for (const issue of issues) {
    switch (issue.severity) {
      case 'CRITICAL':
        counts.CRITICAL++;
        break;
      case 'MAJOR':
        counts.MAJOR++;
        break;
      case 'MINOR':
        counts.MINOR++;
        break;
    }
  }
  return counts;
}
