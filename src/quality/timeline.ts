/**
 * Timeline extraction and consistency checking.
 *
 * Extraction turns free text into an ordered list of temporal mentions
 * such as "7 days prior to Visit". The checker then assumes the text
 * narrates timepoints in increasing order and flags any adjacent pair
 * where the earlier mention is not shorter than the later one. That
 * assumption misfires on text that lists windows out of order; the
 * behavior is kept as-is and findings should be read as prompts for
 * review.
 *
 * @packageDocumentation
 */

import { createIssue, type Issue } from './types.js';

/**
 * Time unit of a mention.
 */
export type TimeUnit = 'day' | 'week' | 'month' | 'year';

/**
 * Relation between the duration and its referent.
 */
export type TimeRelation = 'prior to' | 'after' | 'from' | 'to';

/**
 * Day equivalents of each unit.
 */
export const DAYS_PER_UNIT: Readonly<Record<TimeUnit, number>> = Object.freeze({
  day: 1,
  week: 7,
  month: 30,
  year: 365,
});

/**
 * A temporal expression found in text.
 */
export interface TimelineMention {
  /** The integer quantity. */
  readonly value: number;
  readonly unit: TimeUnit;
  readonly relation: TimeRelation;
  /** The word the duration is anchored to (e.g. "Visit", "randomization"). */
  readonly referent: string;
  /** The raw matched text. */
  readonly phrase: string;
  /** Offset of the match in the source text. */
  readonly index: number;
  /** Duration in days using {@link DAYS_PER_UNIT}. */
  readonly days: number;
}

const MENTION_PATTERN =
  /(?<![\d.])\b(\d+)\s+(day|week|month|year)s?\s+(prior\s+to|after|from|to)\s+([\p{L}\p{N}_-]+)/giu;

function parseUnit(raw: string): TimeUnit | undefined {
  switch (raw.toLowerCase()) {
    case 'day':
      return 'day';
    case 'week':
      return 'week';
    case 'month':
      return 'month';
    case 'year':
      return 'year';
    default:
      return undefined;
  }
}

function parseRelation(raw: string): TimeRelation | undefined {
  const normalized = raw.toLowerCase().replace(/\s+/g, ' ');
  switch (normalized) {
    case 'prior to':
      return 'prior to';
    case 'after':
      return 'after';
    case 'from':
      return 'from';
    case 'to':
      return 'to';
    default:
      return undefined;
  }
}

/**
 * Converts a quantity to days.
 *
 * @param value - Quantity.
 * @param unit - Unit of the quantity.
 */
export function toDays(value: number, unit: TimeUnit): number {
  return value * DAYS_PER_UNIT[unit];
}

/**
 * Extracts temporal mentions in order of appearance.
 *
 * Matches `<integer> <day|week|month|year>[s] <prior to|after|from|to> <word>`,
 * ignoring case.
 *
 * @param text - Text to scan.
 * @returns Mentions ordered by position.
 *
 * @example
 * ```typescript
 * extractTimeline('Screening occurs 14 days prior to randomization.');
 * // [{ value: 14, unit: 'day', relation: 'prior to', referent: 'randomization',
 * //    phrase: '14 days prior to randomization', index: 17, days: 14 }]
 * ```
 */
export function extractTimeline(text: string): TimelineMention[] {
  const mentions: TimelineMention[] = [];
  for (const match of text.matchAll(MENTION_PATTERN)) {
    const [phrase, rawValue, rawUnit, rawRelation, referent] = match;
    if (
      rawValue === undefined ||
      rawUnit === undefined ||
      rawRelation === undefined ||
      referent === undefined
    ) {
      continue;
    }
    const unit = parseUnit(rawUnit);
    const relation = parseRelation(rawRelation);
    const value = Number.parseInt(rawValue, 10);
    if (unit === undefined || relation === undefined || !Number.isSafeInteger(value)) {
      continue;
    }
    mentions.push(
      Object.freeze({
        value,
        unit,
        relation,
        referent,
        phrase,
        index: match.index ?? 0,
        days: toDays(value, unit),
      })
    );
  }
  return mentions;
}

/**
 * Flags adjacent mentions that are not in increasing order.
 *
 * @param mentions - Mentions in order of appearance.
 * @returns One MAJOR INCONSISTENCY issue per out-of-order adjacent pair.
 */
export function checkMentionOrder(mentions: readonly TimelineMention[]): Issue[] {
  const issues: Issue[] = [];
  for (let i = 1; i < mentions.length; i++) {
    const earlier = mentions[i - 1];
    const later = mentions[i];
    if (earlier === undefined || later === undefined) {
      continue;
    }
    if (earlier.days >= later.days) {
      issues.push(
        createIssue(
          'INCONSISTENCY',
          'MAJOR',
          `Timeline inconsistency: '${earlier.phrase}' (${String(earlier.days)} days) is followed by '${later.phrase}' (${String(later.days)} days)`,
          'Check that timepoints are described in chronological order'
        )
      );
    }
  }
  return issues;
}

/**
 * Extracts the timeline from text and checks its ordering.
 *
 * @param text - Section text.
 * @returns Timeline issues, possibly empty.
 *
 * @example
 * ```typescript
 * checkTimeline('Labs 7 days prior to Visit 1. Consent 3 days prior to Visit 1.');
 * // one MAJOR INCONSISTENCY naming '7 days prior to Visit' and '3 days prior to Visit'
 * ```
 */
export function checkTimeline(text: string): Issue[] {
  return checkMentionOrder(extractTimeline(text));
}
