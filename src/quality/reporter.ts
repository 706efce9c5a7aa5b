/**
 * Report formatting and serialization.
 *
 * @packageDocumentation
 */

import { countBySeverity } from './scoring.js';
import {
  SEVERITY_ORDER,
  type Issue,
  type MissingElement,
  type ProtocolReport,
  type SectionResult,
  type Severity,
} from './types.js';

/**
 * Options for {@link formatProtocolReport}.
 */
export interface ReportFormatOptions {
  /** Emit ANSI color codes. */
  colors?: boolean;
  /** Include per-section suggestions. Defaults to true. */
  suggestions?: boolean;
}

/**
 * JSON shape of a section result.
 */
export interface SerializedSectionResult {
  issues: Issue[];
  warnings: Issue[];
  suggestions: string[];
  score: number;
}

/**
 * JSON shape of a protocol report. `perSection` keeps document order.
 */
export interface SerializedProtocolReport {
  studyType: string;
  overallScore: number;
  guidelineAdherence: boolean;
  perSection: Record<string, SerializedSectionResult>;
  duplicationIssues: Issue[];
  missingElements: MissingElement[];
}

/**
 * Headline numbers for a report.
 */
export interface ReportSummary {
  sections: number;
  overallScore: number;
  guidelineAdherence: boolean;
  issues: Record<Severity, number>;
  warnings: number;
  duplicationIssues: number;
  missingElements: number;
}

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

const SEVERITY_COLORS: Readonly<Record<Severity, string>> = {
  CRITICAL: '\x1b[31m',
  MAJOR: '\x1b[33m',
  MINOR: '\x1b[36m',
};

function copyIssue(issue: Issue): Issue {
  return issue.element !== undefined
    ? {
        kind: issue.kind,
        severity: issue.severity,
        message: issue.message,
        suggestion: issue.suggestion,
        element: issue.element,
      }
    : { kind: issue.kind, severity: issue.severity, message: issue.message, suggestion: issue.suggestion };
}

/**
 * Converts a section result to a plain JSON-compatible object.
 *
 * @param result - The section result.
 */
export function serializeSectionResult(result: SectionResult): SerializedSectionResult {
  return {
    issues: result.issues.map(copyIssue),
    warnings: result.warnings.map(copyIssue),
    suggestions: [...result.suggestions],
    score: result.score,
  };
}

/**
 * Converts a report to a plain JSON-compatible object.
 *
 * Section names become own properties defined with `Object.defineProperty`,
 * so a section called `__proto__` is kept as data.
 *
 * @param report - The report to serialize.
 * @returns A plain object; `JSON.stringify` of it is stable for identical reports.
 */
export function serializeReport(report: ProtocolReport): SerializedProtocolReport {
  const perSection: Record<string, SerializedSectionResult> = {};
  for (const [name, result] of report.perSection) {
    Object.defineProperty(perSection, name, {
      value: serializeSectionResult(result),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }

  return {
    studyType: report.studyType,
    overallScore: report.overallScore,
    guidelineAdherence: report.guidelineAdherence,
    perSection,
    duplicationIssues: report.duplicationIssues.map(copyIssue),
    missingElements: report.missingElements.map((missing) => ({
      section: missing.section,
      element: missing.element,
    })),
  };
}

/**
 * Summarizes a report into counts.
 *
 * Issue counts include section issues and duplication issues; warnings are
 * counted separately.
 *
 * @param report - The report to summarize.
 */
export function summarizeReport(report: ProtocolReport): ReportSummary {
  const results = [...report.perSection.values()];
  return {
    sections: results.length,
    overallScore: report.overallScore,
    guidelineAdherence: report.guidelineAdherence,
    issues: countBySeverity([
      ...results.flatMap((result) => result.issues),
      ...report.duplicationIssues,
    ]),
    warnings: results.reduce((sum, result) => sum + result.warnings.length, 0),
    duplicationIssues: report.duplicationIssues.length,
    missingElements: report.missingElements.length,
  };
}

function paint(text: string, code: string, colors: boolean): string {
  return colors ? `${code}${text}${RESET}` : text;
}

function formatIssue(issue: Issue, colors: boolean): string {
  const tag = paint(`[${issue.severity}]`, SEVERITY_COLORS[issue.severity], colors);
  return `    ${tag} ${issue.kind}: ${issue.message}`;
}

function sortBySeverity(issues: readonly Issue[]): Issue[] {
  return SEVERITY_ORDER.flatMap((severity) => issues.filter((issue) => issue.severity === severity));
}

/**
 * Renders a report as human-readable text.
 *
 * Issues within a section are listed from CRITICAL to MINOR, keeping
 * detection order within a severity.
 *
 * @param report - The report to render.
 * @param options - Color and verbosity options.
 * @returns The text, without a trailing newline.
 *
 * @example
 * ```typescript
 * console.log(formatProtocolReport(report, { colors: false }));
 * // Protocol quality report
 * // Study type: phase2
 * // Overall score: 55
 * // Guideline adherence: NO
 * // ...
 * ```
 */
export function formatProtocolReport(
  report: ProtocolReport,
  options: ReportFormatOptions = {}
): string {
  const colors = options.colors ?? false;
  const showSuggestions = options.suggestions ?? true;
  const lines: string[] = [];

  lines.push(paint('Protocol quality report', BOLD, colors));
  lines.push(`Study type: ${report.studyType}`);
  lines.push(`Overall score: ${String(report.overallScore)}`);
  lines.push(
    `Guideline adherence: ${
      report.guidelineAdherence
        ? paint('YES', '\x1b[32m', colors)
        : paint('NO', SEVERITY_COLORS.CRITICAL, colors)
    }`
  );

  for (const [name, result] of report.perSection) {
    lines.push('');
    lines.push(`${paint(name, BOLD, colors)} (score ${String(result.score)})`);
    if (result.issues.length === 0 && result.warnings.length === 0) {
      lines.push(paint('    no issues', DIM, colors));
    }
    for (const issue of sortBySeverity(result.issues)) {
      lines.push(formatIssue(issue, colors));
    }
    for (const warning of result.warnings) {
      lines.push(`    ${paint('[warning]', DIM, colors)} ${warning.message}`);
    }
    if (showSuggestions && result.suggestions.length > 0) {
      lines.push('  Suggestions:');
      for (const suggestion of result.suggestions) {
        lines.push(`    - ${suggestion}`);
      }
    }
  }

  if (report.duplicationIssues.length > 0) {
    lines.push('');
    lines.push(paint('Duplication', BOLD, colors));
    for (const issue of report.duplicationIssues) {
      lines.push(formatIssue(issue, colors));
      lines.push(`      ${issue.suggestion}`);
    }
  }

  if (report.missingElements.length > 0) {
    lines.push('');
    lines.push(paint('Missing elements', BOLD, colors));
    for (const missing of report.missingElements) {
      lines.push(`    ${missing.section}: ${missing.element}`);
    }
  }

  return lines.join('\n');
}
