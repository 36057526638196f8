/**
 * @fileoverview Demo Command
 *
 * Runs the pipeline against the bundled incident fixture.
 */

import { fileURLToPath } from 'node:url';
import { createError } from '../errors.js';
import { parseRunOptions, readIncidentFile, runTriage } from './analyze.js';

export interface DemoCommandOptions {
  args: string[];
}

// src/cli/commands and dist/cli/commands both sit three levels below the package root.
export const DEMO_INCIDENT_PATH = fileURLToPath(new URL('../../../fixtures/incident_demo.json', import.meta.url));

export async function demoCommand(options: DemoCommandOptions): Promise<void> {
  const { positionals, options: runOptions } = parseRunOptions(options.args);
  if (positionals.length > 0) {
    throw createError('INVALID_ARGUMENT', `demo takes no arguments, got: ${positionals.join(' ')}`);
  }
  const incident = await readIncidentFile(DEMO_INCIDENT_PATH);
  await runTriage(incident, runOptions);
}
