/**
 * Centralized Vitest setup.
 *
 * The pipeline logs every rejected verdict and failed worker on stderr. Tests
 * exercise those paths on purpose, so logging is silenced unless
 * TRIAGE_TEST_VERBOSE=true.
 */

import { afterAll, beforeAll } from 'vitest';
import { getLogLevel, setLogLevel } from './src/telemetry/logger.js';

const verbose = process.env.TRIAGE_TEST_VERBOSE === 'true';
const previousLevel = getLogLevel();

beforeAll(() => {
  if (!verbose) setLogLevel('silent');
});

afterAll(() => {
  setLogLevel(previousLevel);
});
