import { describe, expect, it } from 'vitest';
import { AGREEMENT_BONUS, Aggregator, labelsMatch, MAX_RANKED_HYPOTHESES } from '../aggregator.js';
import { formatContributors } from '../../types.js';
import type { Hypothesis, Verdict } from '../../types.js';

function hypothesis(agent: string, label: string, confidence: number, extra: Partial<Hypothesis> = {}): Hypothesis {
  return {
    label,
    description: `${label} per ${agent}`,
    confidence,
    severity: 'high',
    supportingSignals: ['sig_001'],
    contributingAgent: agent,
    ...extra,
  };
}

function valid(...hypotheses: Hypothesis[]): Verdict {
  const agentName = hypotheses[0]?.contributingAgent ?? 'agent';
  return { valid: true, result: { agentName, hypotheses, executionTimeMs: 1 } };
}

describe('labelsMatch', () => {
  it('ignores case and surrounding or repeated whitespace', () => {
    expect(labelsMatch('  DB   Pool ', 'db pool')).toBe(true);
  });

  it('matches when one label contains the other', () => {
    expect(labelsMatch('Cache Removal', 'Cache Removal Impact')).toBe(true);
    expect(labelsMatch('Cache Removal Impact', 'cache removal')).toBe(true);
  });

  it('matches when every word of one label appears in the other', () => {
    expect(labelsMatch('DB Pool', 'DB Connection Pool Exhaustion')).toBe(true);
  });

  it('does not match unrelated labels', () => {
    expect(labelsMatch('Cache Miss', 'Pool Leak')).toBe(false);
    expect(labelsMatch('Pool Leak', 'DB Pool Exhaustion')).toBe(false);
  });
});

describe('Aggregator', () => {
  const aggregator = new Aggregator();

  it('returns an empty list when nothing is valid', () => {
    expect(aggregator.aggregate([])).toEqual([]);
    expect(aggregator.aggregate([valid()])).toEqual([]);
  });

  it('merges corroborating hypotheses from two agents', () => {
    const ranked = aggregator.aggregate([
      valid(hypothesis('agent_a', 'DB Pool', 0.8)),
      valid(hypothesis('agent_b', 'DB Connection Pool Exhaustion', 0.7)),
    ]);

    expect(ranked).toHaveLength(1);
    expect(ranked[0]).toEqual({
      label: 'DB Pool',
      description: 'DB Pool per agent_a',
      confidence: 0.9,
      severity: 'high',
      supportingSignals: ['sig_001'],
      contributingAgents: ['agent_a', 'agent_b'],
    });
    expect(formatContributors(ranked[0] ?? { contributingAgents: [] })).toBe('agent_a, agent_b');
  });

  it('keeps the top five of many distinct hypotheses', () => {
    const labels = ['Alpha', 'Bravo', 'Charlie', 'Delta', 'Echo', 'Foxtrot', 'Golf', 'Hotel'];
    const verdicts = labels.map((label, index) => valid(hypothesis(`agent_${index}`, label, (index + 1) / 10)));

    const ranked = aggregator.aggregate(verdicts);

    expect(ranked).toHaveLength(MAX_RANKED_HYPOTHESES);
    expect(ranked.map((h) => h.label)).toEqual(['Hotel', 'Golf', 'Foxtrot', 'Echo', 'Delta']);
    expect(ranked.map((h) => h.confidence)).toEqual([0.8, 0.7, 0.6, 0.5, 0.4]);
  });

  it('adds the agreement bonus per extra member and caps at 1.0', () => {
    expect(AGREEMENT_BONUS).toBe(0.1);

    const ranked = aggregator.aggregate([
      valid(hypothesis('a', 'Pool Exhaustion', 0.95)),
      valid(hypothesis('b', 'pool exhaustion', 0.9)),
      valid(hypothesis('c', 'POOL EXHAUSTION', 0.6)),
    ]);

    expect(ranked).toHaveLength(1);
    expect(ranked[0]?.confidence).toBe(1);
    expect(ranked[0]?.contributingAgents).toEqual(['a', 'b', 'c']);
  });

  it('takes label and description from the first member with the highest confidence', () => {
    const [merged] = aggregator.aggregate([
      valid(hypothesis('z_agent', 'Cache', 0.7, { description: 'first', severity: 'medium' })),
      valid(hypothesis('a_agent', 'cache', 0.7, { description: 'second' })),
    ]);

    expect(merged?.label).toBe('Cache');
    expect(merged?.description).toBe('first');
    expect(merged?.severity).toBe('medium');
    expect(merged?.contributingAgents).toEqual(['a_agent', 'z_agent']);
  });

  it('unions supporting signals in first-seen order', () => {
    const [merged] = aggregator.aggregate([
      valid(hypothesis('a', 'Cache', 0.5, { supportingSignals: ['sig_002', 'sig_001'] })),
      valid(hypothesis('b', 'Cache', 0.6, { supportingSignals: ['sig_001', 'sig_003'] })),
    ]);

    expect(merged?.supportingSignals).toEqual(['sig_002', 'sig_001', 'sig_003']);
  });

  it('deduplicates an agent that proposes the same cause twice', () => {
    const [merged] = aggregator.aggregate([valid(hypothesis('a', 'Cache', 0.5), hypothesis('a', 'Cache', 0.4))]);

    expect(merged?.contributingAgents).toEqual(['a']);
    expect(merged?.confidence).toBe(0.6);
  });

  it('keeps flattening order for equal confidences', () => {
    const ranked = aggregator.aggregate([
      valid(hypothesis('a', 'Cache Miss', 0.6)),
      valid(hypothesis('b', 'Pool Leak', 0.6)),
      valid(hypothesis('c', 'Disk Full', 0.6)),
    ]);

    expect(ranked.map((h) => h.label)).toEqual(['Cache Miss', 'Pool Leak', 'Disk Full']);
  });

  it('ignores hypotheses from rejected verdicts', () => {
    const rejected: Verdict = {
      valid: false,
      result: { agentName: 'bad', hypotheses: [hypothesis('bad', 'Cache', 0.99)], executionTimeMs: 1 },
      rejectionCode: 'unknown_signal',
      rejectionReason: 'test',
    };

    const ranked = aggregator.aggregate([rejected, valid(hypothesis('good', 'Pool Leak', 0.4))]);

    expect(ranked.map((h) => h.contributingAgents)).toEqual([['good']]);
  });

  it('leaves its input untouched and gives the same output twice', () => {
    const verdicts = [valid(hypothesis('a', 'DB Pool', 0.8)), valid(hypothesis('b', 'DB Pool', 0.7))];
    const before = JSON.stringify(verdicts);

    const first = aggregator.aggregate(verdicts);
    const second = aggregator.aggregate(verdicts);

    expect(second).toEqual(first);
    expect(JSON.stringify(verdicts)).toBe(before);
    expect(first[0]?.supportingSignals).not.toBe(verdicts[0]?.result.hypotheses[0]?.supportingSignals);
  });

  describe('grouping strategy', () => {
    const verdicts = [
      valid(hypothesis('a', 'Pool', 0.5)),
      valid(hypothesis('b', 'DB Pool Exhaustion', 0.6)),
      valid(hypothesis('c', 'Pool Leak', 0.7)),
    ];

    it('joins the first group whose representative matches by default', () => {
      const ranked = new Aggregator().aggregate(verdicts);

      expect(ranked).toHaveLength(1);
      expect(ranked[0]?.label).toBe('Pool Leak');
      expect(ranked[0]?.confidence).toBe(0.9);
    });

    it('requires a match with every member when pairwise', () => {
      const ranked = new Aggregator({ grouping: 'pairwise' }).aggregate(verdicts);

      expect(ranked.map((h) => [h.label, h.confidence])).toEqual([
        ['DB Pool Exhaustion', 0.7],
        ['Pool Leak', 0.7],
      ]);
    });
  });
});
