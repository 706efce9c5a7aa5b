import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { clampScore, countBySeverity, isScoredIssue, score, severityPenalty } from './scoring.js';
import { createIssue, ISSUE_KINDS, SEVERITY_ORDER, type Issue } from './types.js';

const critical = createIssue('FORBIDDEN_TERM', 'CRITICAL', 'critical', 'fix');
const major = createIssue('MISSING_ELEMENT', 'MAJOR', 'major', 'fix', 'primary_objective');
const minor = createIssue('INSUFFICIENT_LENGTH', 'MINOR', 'minor', 'fix');
const subsection = createIssue('MISSING_SUBSECTION', 'MINOR', 'warning', 'fix');

const issueArb: fc.Arbitrary<Issue> = fc
  .record({
    kind: fc.constantFrom(...ISSUE_KINDS),
    severity: fc.constantFrom(...SEVERITY_ORDER),
    message: fc.string(),
  })
  .map(({ kind, severity, message }) => createIssue(kind, severity, message, 'fix'));

describe('Scoring', () => {
  describe('severityPenalty', () => {
    it('should deduct 20, 10 and 5 by severity', () => {
      expect(severityPenalty('CRITICAL')).toBe(20);
      expect(severityPenalty('MAJOR')).toBe(10);
      expect(severityPenalty('MINOR')).toBe(5);
    });
  });

  describe('score', () => {
    it('should return 100 for no issues', () => {
      expect(score([])).toBe(100);
    });

    it('should score two majors, a critical and a minor as 55', () => {
      expect(score([major, major, critical, minor])).toBe(55);
    });

    it('should add the no-critical bonus when only majors are present', () => {
      expect(score([major])).toBe(95);
      expect(score([major, major, major])).toBe(75);
    });

    it('should not add the no-critical bonus when a critical issue is present', () => {
      expect(score([critical])).toBe(80);
    });

    it('should ignore missing subsection warnings', () => {
      expect(score([subsection])).toBe(100);
      expect(score([subsection, minor])).toBe(100);
      expect(score([subsection, critical])).toBe(80);
    });

    it('should clamp at 0', () => {
      expect(score(Array.from({ length: 10 }, () => critical))).toBe(0);
    });

    it('should always lie in [0, 100]', () => {
      fc.assert(
        fc.property(fc.array(issueArb, { maxLength: 30 }), (issues) => {
          const result = score(issues);
          return result >= 0 && result <= 100;
        })
      );
    });
  });

  describe('isScoredIssue', () => {
    it('should exclude only missing subsections', () => {
      expect(isScoredIssue(subsection)).toBe(false);
      expect(isScoredIssue(minor)).toBe(true);
    });
  });

  describe('clampScore', () => {
    it('should clamp into range', () => {
      expect(clampScore(-15)).toBe(0);
      expect(clampScore(115)).toBe(100);
      expect(clampScore(42)).toBe(42);
    });
  });

  describe('countBySeverity', () => {
    it('should count every severity', () => {
      expect(countBySeverity([critical, major, major, minor])).toEqual({
        CRITICAL: 1,
        MAJOR: 2,
        MINOR: 1,
      });
      expect(countBySeverity([])).toEqual({ CRITICAL: 0, MAJOR: 0, MINOR: 0 });
    });
  });
});
