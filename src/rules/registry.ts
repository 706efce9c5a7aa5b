/**
 * Rule registry for protocol sections.
 *
 * Holds the immutable, load-once table of per-section requirements and
 * answers lookups by section name. Sections without a configured rule get
 * {@link EMPTY_RULE}; that is a supported outcome, not a failure.
 *
 * @packageDocumentation
 */

import type { LanguageRules, Rule, StudyType, StudyTypeExclusion } from './types.js';

/**
 * The rule returned for unconfigured sections: no requirements at all.
 */
export const EMPTY_RULE: Rule = Object.freeze({
  requiredElements: Object.freeze([]),
  forbiddenTerms: Object.freeze([]),
  minLength: 0,
  studyTypeRequiredElements: new Map<StudyType, readonly string[]>(),
  requiredSubsections: new Map<StudyType, readonly string[]>(),
  studyTypeForbiddenTerms: new Map<StudyType, StudyTypeExclusion>(),
});

/**
 * Language rules with nothing configured.
 */
export const EMPTY_LANGUAGE_RULES: LanguageRules = Object.freeze({
  informalTerms: new Map<string, string>(),
  impreciseTerms: new Map<string, string>(),
  fillerTerms: Object.freeze([]),
});

/**
 * Mutable-looking input accepted when defining a rule in code.
 */
export interface RuleDefinition {
  requiredElements?: readonly string[];
  forbiddenTerms?: readonly string[];
  minLength?: number;
  studyTypeRequiredElements?: Readonly<Record<StudyType, readonly string[]>>;
  requiredSubsections?: Readonly<Record<StudyType, readonly string[]>>;
  studyTypeForbiddenTerms?: Readonly<Record<StudyType, StudyTypeExclusion>>;
}

/**
 * Input accepted by {@link createRuleRegistry}.
 */
export interface RuleRegistryDefinition {
  /** Rules keyed by section name. */
  sections: Readonly<Record<string, RuleDefinition>>;
  /** Exclusions applied to every configured section. */
  studyTypeExclusions?: Readonly<Record<StudyType, StudyTypeExclusion>>;
  /** Advisory wording rules. */
  language?: {
    informalTerms?: Readonly<Record<string, string>>;
    impreciseTerms?: Readonly<Record<string, string>>;
    fillerTerms?: readonly string[];
  };
  /** Where the rules came from, for diagnostics. */
  source?: string;
}

/**
 * Immutable lookup table of section rules.
 *
 * @example
 * ```typescript
 * const registry = createRuleRegistry({
 *   sections: { objectives: { requiredElements: ['primary_objective'], minLength: 200 } },
 * });
 *
 * registry.rulesFor('objectives').minLength; // 200
 * registry.rulesFor('appendix') === EMPTY_RULE; // true
 * ```
 */
export class RuleRegistry {
  private readonly rules: ReadonlyMap<string, Rule>;
  /** Advisory wording rules shared by all sections. */
  readonly language: LanguageRules;
  /** Where the rules came from (file path or `<inline>`). */
  readonly source: string;

  constructor(rules: ReadonlyMap<string, Rule>, language: LanguageRules, source: string) {
    this.rules = rules;
    this.language = language;
    this.source = source;
    Object.freeze(this);
  }

  /**
   * Returns the rule for a section, or {@link EMPTY_RULE} when none is configured.
   *
   * @param sectionName - Section identifier.
   */
  rulesFor(sectionName: string): Rule {
    return this.rules.get(sectionName) ?? EMPTY_RULE;
  }

  /**
   * Whether a rule is configured for the section.
   *
   * @param sectionName - Section identifier.
   */
  hasRule(sectionName: string): boolean {
    return this.rules.has(sectionName);
  }

  /**
   * Names of all configured sections, in catalog order.
   */
  sectionNames(): string[] {
    return [...this.rules.keys()];
  }

  /**
   * Every study type mentioned by any rule, sorted.
   */
  studyTypes(): string[] {
    const types = new Set<string>();
    for (const rule of this.rules.values()) {
      for (const key of rule.studyTypeRequiredElements.keys()) types.add(key);
      for (const key of rule.requiredSubsections.keys()) types.add(key);
      for (const key of rule.studyTypeForbiddenTerms.keys()) types.add(key);
    }
    return [...types].sort();
  }
}

function freezeList(values: readonly string[] | undefined): readonly string[] {
  return Object.freeze([...(values ?? [])]);
}

function toListMap(
  record: Readonly<Record<string, readonly string[]>> | undefined
): ReadonlyMap<string, readonly string[]> {
  const map = new Map<string, readonly string[]>();
  for (const [key, values] of Object.entries(record ?? {})) {
    map.set(key, freezeList(values));
  }
  return map;
}

function toExclusionMap(
  ...records: (Readonly<Record<string, StudyTypeExclusion>> | undefined)[]
): ReadonlyMap<string, StudyTypeExclusion> {
  const map = new Map<string, StudyTypeExclusion>();
  for (const record of records) {
    for (const [studyType, exclusion] of Object.entries(record ?? {})) {
      const existing = map.get(studyType);
      const terms = [...(existing?.terms ?? [])];
      for (const term of exclusion.terms) {
        if (!terms.includes(term)) terms.push(term);
      }
      map.set(
        studyType,
        Object.freeze({ terms: Object.freeze(terms), message: exclusion.message })
      );
    }
  }
  return map;
}

/**
 * Builds a frozen rule from a definition, merging global study-type exclusions.
 *
 * @param definition - Rule fields; omitted fields default to empty.
 * @param exclusions - Exclusions shared by every section.
 * @returns The immutable rule.
 */
export function createRule(
  definition: RuleDefinition,
  exclusions?: Readonly<Record<StudyType, StudyTypeExclusion>>
): Rule {
  return Object.freeze({
    requiredElements: freezeList(definition.requiredElements),
    forbiddenTerms: freezeList(definition.forbiddenTerms),
    minLength: definition.minLength ?? 0,
    studyTypeRequiredElements: toListMap(definition.studyTypeRequiredElements),
    requiredSubsections: toListMap(definition.requiredSubsections),
    studyTypeForbiddenTerms: toExclusionMap(exclusions, definition.studyTypeForbiddenTerms),
  });
}

/**
 * Creates a registry from plain definitions.
 *
 * @param definition - Section rules, exclusions and language rules.
 * @returns The immutable registry.
 */
export function createRuleRegistry(definition: RuleRegistryDefinition): RuleRegistry {
  const rules = new Map<string, Rule>();
  for (const [sectionName, ruleDefinition] of Object.entries(definition.sections)) {
    rules.set(sectionName, createRule(ruleDefinition, definition.studyTypeExclusions));
  }

  const language: LanguageRules =
    definition.language === undefined
      ? EMPTY_LANGUAGE_RULES
      : Object.freeze({
          informalTerms: new Map(Object.entries(definition.language.informalTerms ?? {})),
          impreciseTerms: new Map(Object.entries(definition.language.impreciseTerms ?? {})),
          fillerTerms: freezeList(definition.language.fillerTerms),
        });

  return new RuleRegistry(rules, language, definition.source ?? '<inline>');
}
