/**
 * Usage text for the protocol-qa CLI.
 */

/**
 * Builds the top-level usage text.
 *
 * @param version - Version shown in the header.
 */
export function getHelpText(version: string): string {
  return `
protocol-qa CLI v${version}

USAGE:
  pqa <command> [options]

COMMANDS:
  validate    Validate a protocol document and print its quality report
  rules       List configured sections or show the rules for one section
  timeline    Extract timepoints from a text file and check their order
  help        Show this help message
  version     Show version information

OPTIONS:
  --help, -h     Show help for a command
  --version, -v  Show version information

EXAMPLES:
  pqa validate protocol.json
  pqa validate protocol.json --study-type phase3 --format json
  pqa rules objectives --study-type phase2
  pqa timeline schedule.txt
`;
}

const COMMAND_HELP: ReadonlyMap<string, string> = new Map([
  [
    'validate',
    `
USAGE: pqa validate <document.json> [options]

Validates every section of a protocol document against the rule catalog,
checks timeline ordering and cross-section duplication, and prints the
quality report. Without --study-type or a "studyType" in the document, the
study type is inferred from the synopsis.

Exit codes: 0 when guideline-adherent, 2 when not, 1 on errors.

OPTIONS:
  --study-type <type>  Study type (overrides the document's studyType)
  --rules <path>       Rule catalog to load (overrides paths.rules)
  --config <path>      Config file (default: ./protocol-qa.toml)
  --format <format>    Report format: text or json
  --output <path>      Write the report to a file instead of stdout
  --no-color           Disable ANSI colors
  --debug              Emit debug log entries on stderr

EXAMPLES:
  pqa validate protocol.json
  pqa validate protocol.json --study-type phase1 --no-color
  pqa validate protocol.json --format json --output report.json
`,
  ],
  [
    'rules',
    `
USAGE: pqa rules [section] [options]

Without a section, lists the sections and study types the catalog
configures. With a section, shows its requirements.

OPTIONS:
  --study-type <type>  Show only the rules that apply to this study type
  --rules <path>       Rule catalog to load (overrides paths.rules)
  --config <path>      Config file (default: ./protocol-qa.toml)
  --format <format>    Output format: text or json
  --no-color           Disable ANSI colors

EXAMPLES:
  pqa rules
  pqa rules study_design --study-type phase3
`,
  ],
  [
    'timeline',
    `
USAGE: pqa timeline <file> [options]

Extracts timepoints such as "14 days prior to randomization" from a text
file, in order of appearance, and reports out-of-order pairs.

The check assumes timepoints are written in chronological order. Text that
describes a later window before an earlier one (a follow-up visit before
screening) is reported too; treat findings as prompts for review.

Exit codes: 0 when consistent, 2 when issues are found, 1 on errors.

OPTIONS:
  --format <format>    Output format: text or json
  --no-color           Disable ANSI colors

EXAMPLES:
  pqa timeline schedule.txt
`,
  ],
]);

/**
 * Returns the usage text for one command, if it exists.
 *
 * @param commandName - The command name.
 */
export function getCommandHelp(commandName: string): string | undefined {
  return COMMAND_HELP.get(commandName);
}
