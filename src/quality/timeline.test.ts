import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { checkMentionOrder, checkTimeline, extractTimeline, toDays } from './timeline.js';

describe('Timeline Consistency Checker', () => {
  describe('toDays', () => {
    it('should use fixed unit multipliers', () => {
      expect(toDays(2, 'day')).toBe(2);
      expect(toDays(2, 'week')).toBe(14);
      expect(toDays(2, 'month')).toBe(60);
      expect(toDays(2, 'year')).toBe(730);
    });
  });

  describe('extractTimeline', () => {
    it('should extract a structured mention', () => {
      expect(extractTimeline('Screening occurs 14 days prior to randomization.')).toEqual([
        {
          value: 14,
          unit: 'day',
          relation: 'prior to',
          referent: 'randomization',
          phrase: '14 days prior to randomization',
          index: 17,
          days: 14,
        },
      ]);
    });

    it('should accept singular and plural units in any case', () => {
      const mentions = extractTimeline('1 Week after dosing and 6 MONTHS from baseline');
      expect(mentions.map((m) => [m.value, m.unit, m.relation, m.referent, m.days])).toEqual([
        [1, 'week', 'after', 'dosing', 7],
        [6, 'month', 'from', 'baseline', 180],
      ]);
    });

    it('should normalize whitespace inside "prior to"', () => {
      const [mention] = extractTimeline('2 years  prior   to enrollment');
      expect(mention?.relation).toBe('prior to');
      expect(mention?.phrase).toBe('2 years  prior   to enrollment');
      expect(mention?.days).toBe(730);
    });

    it('should keep mentions in order of appearance', () => {
      const mentions = extractTimeline('3 days to discharge, then 1 year after surgery');
      expect(mentions.map((m) => m.phrase)).toEqual([
        '3 days to discharge',
        '1 year after surgery',
      ]);
    });

    it('should not read the fraction of a decimal duration as a whole number', () => {
      expect(extractTimeline('Dose 1.5 weeks after baseline')).toEqual([]);
      expect(extractTimeline('Visit 2 occurs .5 days after dosing')).toEqual([]);
    });

    it('should ignore durations without a relation', () => {
      expect(extractTimeline('The study lasts 12 weeks in total.')).toEqual([]);
    });

    it('should never throw on arbitrary text', () => {
      fc.assert(
        fc.property(fc.string(), (text) => {
          extractTimeline(text);
          return true;
        })
      );
    });
  });

  describe('checkTimeline', () => {
    it('should flag a later mention that is not longer than the earlier one', () => {
      const issues = checkTimeline(
        'Screening labs are collected 7 days prior to Visit 1. Consent is obtained 3 days prior to Visit 1.'
      );

      expect(issues).toEqual([
        {
          kind: 'INCONSISTENCY',
          severity: 'MAJOR',
          message:
            "Timeline inconsistency: '7 days prior to Visit' (7 days) is followed by '3 days prior to Visit' (3 days)",
          suggestion: 'Check that timepoints are described in chronological order',
        },
      ]);
    });

    it('should flag equal day-equivalents', () => {
      const issues = checkTimeline('Follow-up 2 weeks after dosing and 14 days after dosing.');
      expect(issues).toHaveLength(1);
    });

    it('should accept increasing mentions', () => {
      expect(checkTimeline('Visit at 1 day after dosing, 2 weeks after dosing and 3 months after dosing.')).toEqual(
        []
      );
    });

    it('should compare adjacent mentions only', () => {
      expect(checkTimeline('1 day after a, 5 days after b, 3 days after c')).toHaveLength(1);
      expect(checkTimeline('10 days after a, 5 days after b, 1 day after c')).toHaveLength(2);
    });

    it('should return nothing for text without mentions', () => {
      expect(checkTimeline('')).toEqual([]);
    });
  });

  describe('checkMentionOrder', () => {
    it('should produce one issue per out-of-order pair for descending values', () => {
      fc.assert(
        fc.property(fc.integer({ min: 2, max: 8 }), (count) => {
          const text = Array.from(
            { length: count },
            (_, i) => `${String(count - i)} days after visit`
          ).join('; ');
          return checkMentionOrder(extractTimeline(text)).length === count - 1;
        })
      );
    });
  });
});
