/**
 * Timeline command handler for the protocol-qa CLI.
 *
 * Prints the timepoints found in a text file and any out-of-order pairs.
 */

import * as path from 'node:path';
import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from '../../config/index.js';
import {
  checkMentionOrder,
  extractTimeline,
  type Issue,
  type TimelineMention,
} from '../../quality/index.js';
import { safeReadFile } from '../../utils/safe-fs.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { CliUsageError, parseArgs } from '../utils/args.js';
import { bold, dim, type DisplayOptions } from '../utils/displayUtils.js';

/**
 * Exit code when timeline issues are found.
 */
export const EXIT_TIMELINE_ISSUES = 2;

/**
 * Parsed options of the timeline command.
 */
export interface TimelineArgs {
  filePath: string;
  format: OutputFormat;
  noColor: boolean;
}

/**
 * Parses timeline command arguments.
 *
 * @param args - Arguments following `timeline`.
 * @throws CliUsageError when the file path is missing or an option is invalid.
 */
export function parseTimelineArgs(args: readonly string[]): TimelineArgs {
  const parsed = parseArgs(args, {
    valueOptions: ['--format'],
    flagOptions: ['--no-color'],
  });

  const filePath = parsed.positionals[0];
  if (filePath === undefined) {
    throw new CliUsageError('Missing text file path. Usage: pqa timeline <file>');
  }
  if (parsed.positionals.length > 1) {
    throw new CliUsageError(`Unexpected argument: ${parsed.positionals[1] ?? ''}`);
  }

  const format = parsed.values.get('--format') ?? 'text';
  if (!isOutputFormat(format)) {
    throw new CliUsageError(
      `Invalid --format '${format}'. Expected one of: ${OUTPUT_FORMATS.join(', ')}`
    );
  }

  return { filePath, format, noColor: parsed.flags.has('--no-color') };
}

/**
 * Formats mentions and issues as text.
 *
 * @param mentions - Mentions in order of appearance.
 * @param issues - Ordering issues.
 * @param options - Display options.
 */
export function formatTimeline(
  mentions: readonly TimelineMention[],
  issues: readonly Issue[],
  options: DisplayOptions
): string {
  if (mentions.length === 0) {
    return 'No timeline mentions found';
  }

  const lines = [bold('Timeline mentions:', options)];
  mentions.forEach((mention, i) => {
    const days = dim(`(${String(mention.days)} days)`, options);
    lines.push(`  ${String(i + 1)}. ${mention.phrase} ${days}`);
  });

  if (issues.length === 0) {
    lines.push('Timeline is consistent');
    return lines.join('\n');
  }

  lines.push(bold('Issues:', options));
  for (const issue of issues) {
    lines.push(`  [${issue.severity}] ${issue.kind}: ${issue.message}`);
  }
  return lines.join('\n');
}

/**
 * Handles the timeline command.
 *
 * @param context - The CLI context.
 * @returns Exit code 0 when consistent, 2 when issues are found.
 */
export async function handleTimelineCommand(context: CliContext): Promise<CliCommandResult> {
  const args = parseTimelineArgs(context.args);
  const filePath = path.resolve(context.cwd, args.filePath);

  let text: string;
  try {
    text = await safeReadFile(filePath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read text file ${filePath}: ${message}`);
  }

  const mentions = extractTimeline(text);
  const issues = checkMentionOrder(mentions);

  if (args.format === 'json') {
    console.log(JSON.stringify({ mentions, issues }, null, 2));
  } else {
    console.log(
      formatTimeline(mentions, issues, {
        colors: !args.noColor && context.config.colors,
        unicode: context.config.unicode,
      })
    );
  }

  return { exitCode: issues.length === 0 ? 0 : EXIT_TIMELINE_ISSUES };
}
