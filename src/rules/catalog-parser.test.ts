/**
 * Tests for the TOML rule catalog parser.
 */

import { describe, expect, it } from 'vitest';
import {
  assertRuleRegistry,
  DEFAULT_RULES_PATH,
  isRuleCatalogError,
  loadRuleRegistry,
  parseRuleCatalog,
  RuleCatalogLoadError,
  type CatalogResult,
  type RuleCatalogError,
} from './catalog-parser.js';
import type { RuleRegistry } from './registry.js';

function expectError(result: CatalogResult<RuleRegistry>): RuleCatalogError {
  if (!isRuleCatalogError(result)) {
    throw new Error('expected a catalog error');
  }
  return result;
}

describe('parseRuleCatalog', () => {
  it('parses sections, study-type rules, exclusions and language rules', () => {
    const toml = `
[sections.objectives]
required_elements = ["primary_objective", "secondary_objectives"]
forbidden_terms = ["tbd"]
min_length = 200

[sections.study_design.study_type_elements]
phase3 = ["randomization", "blinding"]

[sections.study_design.required_subsections]
phase3 = ["Randomization"]

[study_type_exclusions.secondary_rwe]
terms = ["unblinding"]
message = "Contains elements not applicable to secondary RWE studies"

[language]
filler_terms = ["basically"]

[language.informal_terms]
"find out" = "determine"
`;

    const registry = assertRuleRegistry(parseRuleCatalog(toml, 'rules.toml'));

    expect(registry.source).toBe('rules.toml');
    expect(registry.sectionNames()).toEqual(['objectives', 'study_design']);

    const objectives = registry.rulesFor('objectives');
    expect(objectives.requiredElements).toEqual(['primary_objective', 'secondary_objectives']);
    expect(objectives.forbiddenTerms).toEqual(['tbd']);
    expect(objectives.minLength).toBe(200);
    expect(objectives.studyTypeForbiddenTerms.get('secondary_rwe')?.terms).toEqual(['unblinding']);

    const design = registry.rulesFor('study_design');
    expect(design.minLength).toBe(0);
    expect(design.studyTypeRequiredElements.get('phase3')).toEqual(['randomization', 'blinding']);
    expect(design.requiredSubsections.get('phase3')).toEqual(['Randomization']);

    expect(registry.language.informalTerms.get('find out')).toBe('determine');
    expect(registry.language.impreciseTerms.size).toBe(0);
    expect(registry.language.fillerTerms).toEqual(['basically']);
  });

  it('parses an empty catalog to an empty registry', () => {
    const registry = assertRuleRegistry(parseRuleCatalog(''));
    expect(registry.sectionNames()).toEqual([]);
    expect(registry.source).toBe('<string>');
  });

  it('uses a default exclusion message', () => {
    const registry = assertRuleRegistry(
      parseRuleCatalog(`
[sections.background]
min_length = 10

[study_type_exclusions.observational]
terms = ["placebo"]
`)
    );
    expect(registry.rulesFor('background').studyTypeForbiddenTerms.get('observational')).toEqual({
      terms: ['placebo'],
      message: 'Contains elements not applicable to observational studies',
    });
  });

  it('returns a parse error for invalid TOML', () => {
    const error = expectError(parseRuleCatalog('[sections.objectives\nmin_length = 1'));
    expect(error.type).toBe('parse_error');
    expect(error.message).toMatch(/^Failed to parse TOML: /);
    expect(error.filePath).toBe('<string>');
  });

  it('rejects a negative min_length with its field path', () => {
    const error = expectError(parseRuleCatalog('[sections.objectives]\nmin_length = -1'));
    expect(error).toEqual({
      error: true,
      type: 'validation_error',
      message: '"sections.objectives.min_length" must be a non-negative integer',
      filePath: '<string>',
      field: 'sections.objectives.min_length',
    });
  });

  it('rejects an empty list entry with its index', () => {
    const error = expectError(
      parseRuleCatalog('[sections.objectives]\nrequired_elements = ["primary_objective", " "]')
    );
    expect(error.field).toBe('sections.objectives.required_elements[1]');
    expect(error.message).toBe('Entry 1 of "sections.objectives.required_elements" must be a non-empty string');
  });

  it('rejects a non-list required_elements', () => {
    const error = expectError(parseRuleCatalog('[sections.objectives]\nrequired_elements = "primary_objective"'));
    expect(error.field).toBe('sections.objectives.required_elements');
  });

  it('rejects sections that are not a table', () => {
    const error = expectError(parseRuleCatalog('sections = "objectives"'));
    expect(error.field).toBe('sections');
    expect(error.message).toBe('[sections] must be a table');
  });

  it('rejects non-string language replacements', () => {
    const error = expectError(parseRuleCatalog('[language.informal_terms]\n"find out" = 3'));
    expect(error.field).toBe('language.informal_terms.find out');
  });

  it('rejects exclusions without terms', () => {
    const error = expectError(parseRuleCatalog('[study_type_exclusions.observational]\nmessage = "x"'));
    expect(error.field).toBe('study_type_exclusions.observational.terms');
  });
});

describe('assertRuleRegistry', () => {
  it('throws a RuleCatalogLoadError naming the file and field', () => {
    const result = parseRuleCatalog('[sections.objectives]\nmin_length = 1.5', 'rules.toml');
    expect(() => assertRuleRegistry(result)).toThrow(RuleCatalogLoadError);
    expect(() => assertRuleRegistry(result)).toThrow(
      'Invalid rule catalog rules.toml (sections.objectives.min_length): "sections.objectives.min_length" must be a non-negative integer'
    );
  });
});

describe('loadRuleRegistry', () => {
  it('loads the bundled catalog', async () => {
    const registry = assertRuleRegistry(await loadRuleRegistry(DEFAULT_RULES_PATH));

    expect(registry.sectionNames()).toEqual([
      'background',
      'objectives',
      'study_design',
      'population',
      'statistical_analysis',
      'safety',
      'synopsis',
    ]);
    expect(registry.rulesFor('objectives').requiredElements).toEqual([
      'primary_objective',
      'secondary_objectives',
    ]);
    expect(registry.rulesFor('objectives').minLength).toBe(200);
    expect(registry.studyTypes()).toEqual([
      'observational',
      'phase1',
      'phase2',
      'phase3',
      'phase4',
      'secondary_rwe',
      'systematic_review',
    ]);
    expect(registry.language.impreciseTerms.get('several')).toBe('specify number');
  });

  it('returns a parse error for a missing file', async () => {
    const error = expectError(await loadRuleRegistry('/nonexistent/protocol-rules.toml'));
    expect(error.type).toBe('parse_error');
    expect(error.message).toMatch(/^Failed to read rule catalog: /);
    expect(error.filePath).toBe('/nonexistent/protocol-rules.toml');
  });
});
