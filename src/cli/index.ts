#!/usr/bin/env node
/**
 * @fileoverview triage CLI
 *
 * Commands:
 *   triage analyze <incident.json>  - Rank root-cause hypotheses for an incident
 *   triage demo                     - Same, against the bundled sample incident
 *   triage help [command]           - Show help
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { TRIAGE_VERSION } from '../version.js';
import { analyzeCommand } from './commands/analyze.js';
import { demoCommand } from './commands/demo.js';
import { createError, formatErrorWithSuggestion, getExitCode } from './errors.js';
import { showHelp } from './help.js';

type Command = 'analyze' | 'demo' | 'help';

const COMMANDS: Record<Command, (args: string[]) => Promise<void>> = {
  analyze: (args) => analyzeCommand({ args }),
  demo: (args) => demoCommand({ args }),
  help: async (args) => showHelp(args[0]),
};

function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Global flags only; each command parses its own options.
  const { values, positionals } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
    },
    allowPositionals: true,
    strict: false,
  });

  if (values.version) {
    console.log(`triage ${TRIAGE_VERSION}`);
    return;
  }

  const command = positionals[0];
  if (values.help || !command) {
    showHelp(command);
    return;
  }

  if (!isCommand(command)) {
    throw createError('INVALID_ARGUMENT', `Unknown command: ${command}. Available commands: ${Object.keys(COMMANDS).join(', ')}`);
  }

  const commandIndex = args.indexOf(command);
  await COMMANDS[command](args.slice(commandIndex + 1));
}

main().catch((error: unknown) => {
  console.error(formatErrorWithSuggestion(error));
  process.exitCode = getExitCode(error);
});
