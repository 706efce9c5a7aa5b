/**
 * Rules command handler for the protocol-qa CLI.
 *
 * Lists the sections a rule catalog configures, or shows the
 * requirements for one section.
 */

import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from '../../config/index.js';
import { describeRule, type RuleDescription, type RuleRegistry } from '../../rules/index.js';
import { loadCommandEnvironment } from '../environment.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { CliUsageError, parseArgs } from '../utils/args.js';
import { bold, wrapInBox, type DisplayOptions } from '../utils/displayUtils.js';

/**
 * Parsed options of the rules command.
 */
export interface RulesArgs {
  section: string | undefined;
  studyType: string | undefined;
  rulesPath: string | undefined;
  configPath: string | undefined;
  format: OutputFormat | undefined;
  noColor: boolean;
}

/**
 * Parses rules command arguments.
 *
 * @param args - Arguments following `rules`.
 * @throws CliUsageError when an option is invalid.
 */
export function parseRulesArgs(args: readonly string[]): RulesArgs {
  const parsed = parseArgs(args, {
    valueOptions: ['--study-type', '--rules', '--config', '--format'],
    flagOptions: ['--no-color'],
  });

  if (parsed.positionals.length > 1) {
    throw new CliUsageError(`Unexpected argument: ${parsed.positionals[1] ?? ''}`);
  }

  const format = parsed.values.get('--format');
  if (format !== undefined && !isOutputFormat(format)) {
    throw new CliUsageError(
      `Invalid --format '${format}'. Expected one of: ${OUTPUT_FORMATS.join(', ')}`
    );
  }

  return {
    section: parsed.positionals[0],
    studyType: parsed.values.get('--study-type'),
    rulesPath: parsed.values.get('--rules'),
    configPath: parsed.values.get('--config'),
    format,
    noColor: parsed.flags.has('--no-color'),
  };
}

function formatList(values: readonly string[]): string {
  return values.length === 0 ? '(none)' : values.join(', ');
}

/**
 * Formats the catalog overview. The catalog source is boxed with
 * unicode or ASCII borders depending on the display options.
 *
 * @param registry - The loaded registry.
 * @param options - Display options.
 */
export function formatCatalogOverview(registry: RuleRegistry, options: DisplayOptions): string {
  const lines = [wrapInBox(bold(`Rule catalog: ${registry.source}`, options), options), 'Sections:'];
  for (const name of registry.sectionNames()) {
    lines.push(`  ${name}`);
  }
  lines.push(`Study types: ${formatList(registry.studyTypes())}`);
  return lines.join('\n');
}

/**
 * Formats one section's rule description.
 *
 * @param section - Section name.
 * @param description - Output of {@link describeRule}.
 * @param options - Display options.
 */
export function formatRuleDescription(
  section: string,
  description: RuleDescription,
  options: DisplayOptions
): string {
  const lines = [
    bold(`Section: ${section}`, options),
    `  Required elements: ${formatList(description.requiredElements)}`,
    `  Forbidden terms: ${formatList(description.forbiddenTerms)}`,
    `  Minimum length: ${String(description.minLength)}`,
  ];

  const elements = Object.entries(description.studyTypeRequiredElements);
  if (elements.length > 0) {
    lines.push('  Study-type elements:');
    for (const [studyType, values] of elements) {
      lines.push(`    ${studyType}: ${formatList(values)}`);
    }
  }

  const subsections = Object.entries(description.requiredSubsections);
  if (subsections.length > 0) {
    lines.push('  Required subsections:');
    for (const [studyType, values] of subsections) {
      lines.push(`    ${studyType}: ${formatList(values)}`);
    }
  }

  const exclusions = Object.entries(description.studyTypeForbiddenTerms);
  if (exclusions.length > 0) {
    lines.push('  Study-type exclusions:');
    for (const [studyType, exclusion] of exclusions) {
      lines.push(`    ${studyType}: ${formatList(exclusion.terms)}`);
    }
  }

  return lines.join('\n');
}

/**
 * Handles the rules command.
 *
 * @param context - The CLI context.
 * @returns Exit code 0; an unconfigured section is reported, not an error.
 */
export async function handleRulesCommand(context: CliContext): Promise<CliCommandResult> {
  const args = parseRulesArgs(context.args);
  const { config, registry } = await loadCommandEnvironment(context, {
    configPath: args.configPath,
    rulesPath: args.rulesPath,
  });

  const format = args.format ?? config.output.format;
  const display: DisplayOptions = {
    colors: !args.noColor && context.config.colors && config.output.colors,
    unicode: context.config.unicode,
  };

  if (args.section === undefined) {
    if (format === 'json') {
      console.log(
        JSON.stringify(
          {
            source: registry.source,
            sections: registry.sectionNames(),
            studyTypes: registry.studyTypes(),
          },
          null,
          2
        )
      );
    } else {
      console.log(formatCatalogOverview(registry, display));
    }
    return { exitCode: 0 };
  }

  const configured = registry.hasRule(args.section);
  const description = describeRule(registry.rulesFor(args.section), args.studyType);

  if (format === 'json') {
    console.log(
      JSON.stringify({ section: args.section, configured, rules: description }, null, 2)
    );
  } else if (!configured) {
    console.log(`No rules configured for section '${args.section}'`);
  } else {
    console.log(formatRuleDescription(args.section, description, display));
  }

  return { exitCode: 0 };
}
