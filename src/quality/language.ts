/**
 * Advisory wording checks.
 *
 * Flags informal phrasing, vague quantifiers and filler phrases. The result
 * is a list of suggestions only; nothing here raises an issue or changes a
 * score.
 *
 * @packageDocumentation
 */

import type { LanguageRules } from '../rules/types.js';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whether the phrase occurs in the text as whole words, ignoring case.
 *
 * @param text - Text to search.
 * @param phrase - Word or phrase to find.
 */
export function containsPhrase(text: string, phrase: string): boolean {
  const trimmed = phrase.trim();
  if (trimmed.length === 0) {
    return false;
  }
  const pattern = trimmed.split(/\s+/).map(escapeRegExp).join('\\s+');
  return new RegExp(`(?<![\\p{L}\\p{N}])${pattern}(?![\\p{L}\\p{N}])`, 'iu').test(text);
}

/**
 * Returns wording suggestions for the text, in catalog order: informal
 * terms, then imprecise terms, then filler phrases.
 *
 * @param text - Section text.
 * @param rules - Language rules from the registry.
 * @returns Suggestions, possibly empty.
 *
 * @example
 * ```typescript
 * adviseLanguage('We will find out several things.', registry.language);
 * // ["Replace informal 'find out' with 'determine'", "Quantify 'several': specify number"]
 * ```
 */
export function adviseLanguage(text: string, rules: LanguageRules): string[] {
  const suggestions: string[] = [];

  for (const [term, replacement] of rules.informalTerms) {
    if (containsPhrase(text, term)) {
      suggestions.push(`Replace informal '${term}' with '${replacement}'`);
    }
  }

  for (const [term, advice] of rules.impreciseTerms) {
    if (containsPhrase(text, term)) {
      suggestions.push(`Quantify '${term}': ${advice}`);
    }
  }

  for (const term of rules.fillerTerms) {
    if (containsPhrase(text, term)) {
      suggestions.push(`Remove filler phrase '${term}'`);
    }
  }

  return suggestions;
}
