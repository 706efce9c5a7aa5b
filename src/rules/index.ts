/**
 * Rule registry and TOML rule catalog.
 *
 * @packageDocumentation
 */

export type { KnownStudyType, LanguageRules, Rule, StudyType, StudyTypeExclusion } from './types.js';
export { KNOWN_STUDY_TYPES } from './types.js';

export type { RuleDefinition, RuleRegistryDefinition } from './registry.js';
export {
  createRule,
  createRuleRegistry,
  EMPTY_LANGUAGE_RULES,
  EMPTY_RULE,
  RuleRegistry,
} from './registry.js';

export type { CatalogResult, RuleCatalogError } from './catalog-parser.js';
export {
  assertRuleRegistry,
  DEFAULT_RULES_PATH,
  isRuleCatalogError,
  loadRuleRegistry,
  loadRuleRegistryOrThrow,
  parseRuleCatalog,
  RuleCatalogLoadError,
} from './catalog-parser.js';

export type { RuleDescription } from './describe.js';
export { describeRule } from './describe.js';
