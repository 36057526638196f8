/**
 * @fileoverview Detailed help text for triage CLI commands
 */

const HELP_TEXT = {
  main: `
triage - rank root-cause hypotheses for an incident

USAGE:
    triage <command> [options]

COMMANDS:
    analyze <incident.json>   Run the pipeline against an incident file
    demo                      Run the pipeline against the bundled sample incident
    help [command]            Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information

EXIT CODES:
    0   analysis finished (check "Human review" in the report)
    1   unexpected failure
    2   invalid arguments
    3   incident file not found
    4   incident payload invalid
    5   configuration invalid

For more information on a specific command, run:
    triage help <command>
`,

  analyze: `
triage analyze - Run the pipeline against an incident file

USAGE:
    triage analyze <incident.json> [options]

OPTIONS:
    -c, --config <file>   YAML or JSON pipeline config
    -t, --timeout <ms>    Per-worker deadline (overrides config and env)
    --json                Print the full result as JSON on stdout

DESCRIPTION:
    Extracts signals from the incident, runs every registered worker in
    parallel, validates each result against the extracted signals and prints
    up to five merged hypotheses ranked by confidence.

    Worker progress and logs go to stderr.

CONFIGURATION:
    workerTimeoutMs        TRIAGE_WORKER_TIMEOUT_MS       default 30000
    humanReviewThreshold   TRIAGE_REVIEW_THRESHOLD        default 0.5
    grouping               TRIAGE_GROUPING                representative | pairwise
    eventQueueCapacity     TRIAGE_EVENT_QUEUE_CAPACITY    default 256
    logLevel               TRIAGE_LOG_LEVEL               debug | info | warn | error | silent

    Environment variables override the config file.

EXAMPLES:
    triage analyze incident.json
    triage analyze incident.json --timeout 5000 --json
    triage analyze incident.json --config triage.yaml
`,

  demo: `
triage demo - Run the pipeline against the bundled sample incident

USAGE:
    triage demo [--config <file>] [--timeout <ms>] [--json]

DESCRIPTION:
    Same as "triage analyze" with fixtures/incident_demo.json.
`,

  help: `
triage help - Show help information

USAGE:
    triage help [command]
`,
};

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, value);
}

export function getCommandHelp(command?: string): string {
  return command && isHelpTopic(command) ? HELP_TEXT[command] : HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  if (command && !isHelpTopic(command)) {
    console.log(`Unknown command: ${command}`);
  }
  console.log(getCommandHelp(command));
}
