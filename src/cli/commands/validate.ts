/**
 * Validate command handler for the protocol-qa CLI.
 *
 * Loads a protocol document, validates it against the rule catalog and
 * prints the quality report as text or JSON.
 */

import * as path from 'node:path';
import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from '../../config/index.js';
import {
  DocumentLoadError,
  inferStudyType,
  loadProtocolDocument,
  SYNOPSIS_SECTION,
} from '../../document/index.js';
import {
  formatProtocolReport,
  serializeReport,
  summarizeReport,
  validateProtocol,
  type ProtocolReport,
} from '../../quality/index.js';
import { safeWriteFile } from '../../utils/safe-fs.js';
import { loadCommandEnvironment } from '../environment.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { CliUsageError, parseArgs } from '../utils/args.js';

/**
 * Exit code for a report that is not guideline-adherent.
 */
export const EXIT_NOT_ADHERENT = 2;

/**
 * Parsed options of the validate command.
 */
export interface ValidateArgs {
  documentPath: string;
  studyType: string | undefined;
  rulesPath: string | undefined;
  configPath: string | undefined;
  format: OutputFormat | undefined;
  outputPath: string | undefined;
  noColor: boolean;
  debug: boolean;
}

/**
 * Parses validate command arguments.
 *
 * @param args - Arguments following `validate`.
 * @throws CliUsageError when the document path is missing or an option is invalid.
 */
export function parseValidateArgs(args: readonly string[]): ValidateArgs {
  const parsed = parseArgs(args, {
    valueOptions: ['--study-type', '--rules', '--config', '--format', '--output'],
    flagOptions: ['--no-color', '--debug'],
  });

  const documentPath = parsed.positionals[0];
  if (documentPath === undefined) {
    throw new CliUsageError('Missing protocol document path. Usage: pqa validate <document.json>');
  }
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
    documentPath,
    studyType: parsed.values.get('--study-type'),
    rulesPath: parsed.values.get('--rules'),
    configPath: parsed.values.get('--config'),
    format,
    outputPath: parsed.values.get('--output'),
    noColor: parsed.flags.has('--no-color'),
    debug: parsed.flags.has('--debug'),
  };
}

/**
 * Renders a report in the requested format.
 *
 * @param report - The report.
 * @param format - Output format.
 * @param colors - Whether text output uses ANSI colors.
 */
export function renderReport(report: ProtocolReport, format: OutputFormat, colors: boolean): string {
  if (format === 'json') {
    return JSON.stringify(serializeReport(report), null, 2);
  }
  return formatProtocolReport(report, { colors });
}

/**
 * Handles the validate command.
 *
 * @param context - The CLI context.
 * @returns Exit code 0 when the protocol is guideline-adherent, 2 when not.
 */
export async function handleValidateCommand(context: CliContext): Promise<CliCommandResult> {
  const args = parseValidateArgs(context.args);
  const { config, registry, logger } = await loadCommandEnvironment(context, {
    configPath: args.configPath,
    rulesPath: args.rulesPath,
    debug: args.debug,
  });

  const documentPath = path.resolve(context.cwd, args.documentPath);
  const document = await loadProtocolDocument(documentPath);

  const declaredStudyType = args.studyType ?? document.studyType;
  const studyType =
    declaredStudyType ?? inferStudyType(document.sections.get(SYNOPSIS_SECTION) ?? '');
  if (studyType === undefined) {
    throw new DocumentLoadError(
      'No study type: pass --study-type, set "studyType" in the protocol document, or name the design in its synopsis',
      documentPath
    );
  }
  if (declaredStudyType === undefined) {
    logger.debug('study_type_inferred', { studyType, section: SYNOPSIS_SECTION });
  }

  const report = validateProtocol(document.sections, studyType, registry, {
    duplication: {
      threshold: config.duplication.threshold,
      leadSection: config.duplication.lead_section,
      leadSectionThreshold: config.duplication.lead_section_threshold,
    },
    logger,
  });

  const summary = summarizeReport(report);
  logger.debug('protocol_validated', {
    document: documentPath,
    studyType,
    sections: summary.sections,
    overallScore: summary.overallScore,
    guidelineAdherence: summary.guidelineAdherence,
  });

  const format = args.format ?? config.output.format;
  const colors =
    args.outputPath === undefined &&
    !args.noColor &&
    context.config.colors &&
    config.output.colors;
  const rendered = renderReport(report, format, colors);

  if (args.outputPath !== undefined) {
    const outputPath = path.resolve(context.cwd, args.outputPath);
    await safeWriteFile(outputPath, rendered + '\n', 'utf-8');
    console.log(`Report written to ${outputPath}`);
  } else {
    console.log(rendered);
  }

  return { exitCode: report.guidelineAdherence ? 0 : EXIT_NOT_ADHERENT };
}
