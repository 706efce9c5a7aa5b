/**
 * protocol-qa
 *
 * Rule-driven quality validation for clinical-trial protocol documents.
 *
 * @packageDocumentation
 */

import { getVersion } from './utils/version.js';

/**
 * Library version string, read from package.json.
 */
export const VERSION = getVersion();

// Rule catalog and registry
export {
  assertRuleRegistry,
  createRule,
  createRuleRegistry,
  DEFAULT_RULES_PATH,
  describeRule,
  EMPTY_LANGUAGE_RULES,
  EMPTY_RULE,
  isRuleCatalogError,
  KNOWN_STUDY_TYPES,
  loadRuleRegistry,
  loadRuleRegistryOrThrow,
  parseRuleCatalog,
  RuleCatalogLoadError,
  RuleRegistry,
  type CatalogResult,
  type KnownStudyType,
  type LanguageRules,
  type Rule,
  type RuleCatalogError,
  type RuleDefinition,
  type RuleDescription,
  type RuleRegistryDefinition,
  type StudyType,
  type StudyTypeExclusion,
} from './rules/index.js';

// Validation engine
export {
  checkMentionOrder,
  checkTimeline,
  computeSimilarity,
  createIssue,
  DEFAULT_DUPLICATION_OPTIONS,
  detectDuplication,
  extractTimeline,
  formatProtocolReport,
  ISSUE_KINDS,
  ProtocolInvocationError,
  score,
  serializeReport,
  serializeSectionResult,
  SEVERITY_ORDER,
  summarizeReport,
  validateProtocol,
  validateSection,
  type DuplicationOptions,
  type Issue,
  type IssueKind,
  type MissingElement,
  type ProtocolReport,
  type ProtocolSections,
  type ReportFormatOptions,
  type ReportSummary,
  type SectionResult,
  type SerializedProtocolReport,
  type SerializedSectionResult,
  type Severity,
  type TimelineMention,
  type ValidateProtocolOptions,
} from './quality/index.js';

// Protocol documents
export {
  DocumentLoadError,
  inferStudyType,
  loadProtocolDocument,
  parseProtocolDocument,
  type ProtocolDocument,
} from './document/index.js';

// Configuration
export {
  ConfigParseError,
  ConfigValidationError,
  loadConfig,
  type Config,
  type LoadConfigOptions,
} from './config/index.js';

// Logging and version
export { getVersion } from './utils/version.js';
export { Logger, type LogEntry, type LogLevel, type LoggerOptions } from './utils/logger.js';
