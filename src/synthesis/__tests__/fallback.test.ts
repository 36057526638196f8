import { describe, expect, it } from 'vitest';
import { fallbackSynthesis, NO_HYPOTHESES_FINDING, NO_HYPOTHESES_SUMMARY } from '../fallback.js';
import type { RankedHypothesis } from '../../types.js';

const ranked: RankedHypothesis = {
  label: 'DB Connection Pool Exhaustion',
  description: 'Pool saturated after the deploy',
  confidence: 0.91,
  severity: 'high',
  supportingSignals: ['sig_002', 'sig_005'],
  contributingAgents: ['config_agent', 'metrics_agent'],
};

describe('fallbackSynthesis', () => {
  it('describes an empty ranking', () => {
    expect(fallbackSynthesis([])).toEqual({
      summary: NO_HYPOTHESES_SUMMARY,
      keyFinding: NO_HYPOTHESES_FINDING,
      confidence: 0,
    });
  });

  it('summarizes the top hypothesis', () => {
    expect(fallbackSynthesis([ranked, { ...ranked, label: 'Other', confidence: 0.3 }])).toEqual({
      summary:
        'DB Connection Pool Exhaustion is the highest-ranked explanation, supported by 2 signal(s) ' +
        'from config_agent, metrics_agent.',
      keyFinding: 'DB Connection Pool Exhaustion: Pool saturated after the deploy',
      confidence: 0.91,
    });
  });
});
