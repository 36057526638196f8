/**
 * @fileoverview Narrative synthesis.
 *
 * A `NarrativeSynthesizer` turns the ranked list into a short story for a
 * human. It never changes the ranking. When none is configured, or the
 * configured one fails, `fallbackSynthesis` produces a deterministic text.
 */

import type { NarrativeSynthesis, RankedHypothesis, Signal } from '../types.js';
import { formatContributors } from '../types.js';

export interface NarrativeSynthesizer {
  synthesize(signals: readonly Signal[], ranked: readonly RankedHypothesis[]): Promise<NarrativeSynthesis>;
}

export const NO_HYPOTHESES_SUMMARY =
  'No validated hypotheses were produced from the current signal set. ' +
  'A human should review logs, metrics, and recent changes directly.';
export const NO_HYPOTHESES_FINDING = 'Insufficient evidence to identify a likely root cause.';

export function fallbackSynthesis(ranked: readonly RankedHypothesis[]): NarrativeSynthesis {
  const top = ranked[0];
  if (!top) {
    return { summary: NO_HYPOTHESES_SUMMARY, keyFinding: NO_HYPOTHESES_FINDING, confidence: 0 };
  }

  const count = top.supportingSignals.length;
  return {
    summary:
      `${top.label} is the highest-ranked explanation, supported by ${count} signal(s) ` +
      `from ${formatContributors(top)}.`,
    keyFinding: `${top.label}: ${top.description}`,
    confidence: top.confidence,
  };
}
