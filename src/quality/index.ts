/**
 * Protocol quality-validation engine.
 *
 * @packageDocumentation
 */

export type {
  Issue,
  IssueKind,
  MissingElement,
  ProtocolReport,
  ProtocolSections,
  SectionResult,
  Severity,
} from './types.js';
export {
  createIssue,
  ISSUE_KINDS,
  sectionEntries,
  SEVERITY_ORDER,
} from './types.js';

export {
  BASE_SCORE,
  CLEAN_SECTION_BONUS,
  clampScore,
  countBySeverity,
  isScoredIssue,
  NO_CRITICAL_BONUS,
  score,
  severityPenalty,
} from './scoring.js';

export {
  collectSuggestions,
  containsTerm,
  createSectionResult,
  findPlaceholders,
  findRecommendations,
  hasSubsectionHeading,
  validateSection,
} from './section-validator.js';

export { adviseLanguage, containsPhrase } from './language.js';

export type { DuplicationOptions } from './duplication.js';
export {
  computeSimilarity,
  DEFAULT_DUPLICATION_OPTIONS,
  detectDuplication,
  setOverlap,
  tokenize,
} from './duplication.js';

export type { TimelineMention, TimeRelation, TimeUnit } from './timeline.js';
export {
  checkMentionOrder,
  checkTimeline,
  DAYS_PER_UNIT,
  extractTimeline,
  toDays,
} from './timeline.js';

export type { ValidateProtocolOptions } from './aggregator.js';
export { ProtocolInvocationError, validateProtocol } from './aggregator.js';

export type {
  ReportFormatOptions,
  ReportSummary,
  SerializedProtocolReport,
  SerializedSectionResult,
} from './reporter.js';
export {
  formatProtocolReport,
  serializeReport,
  serializeSectionResult,
  summarizeReport,
} from './reporter.js';
