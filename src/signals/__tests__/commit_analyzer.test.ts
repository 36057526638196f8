import { describe, expect, it } from 'vitest';
import { analyzeCommits } from '../commit_analyzer.js';

describe('analyzeCommits', () => {
  it('returns nothing for unremarkable commits', () => {
    expect(analyzeCommits([])).toEqual([]);
    expect(analyzeCommits([{ sha: 'a1', message: 'docs: fix typo', diffSummary: 'README.md' }])).toEqual([]);
  });

  it('detects cache removal', () => {
    const signals = analyzeCommits([
      { sha: 'a1b2c3', message: 'perf: trim request path', diffSummary: 'Removed @cache decorator from get_user' },
    ]);

    expect(signals).toEqual([
      {
        type: 'commit_change',
        description: 'Cache decorator removed in commit a1b2c3',
        severity: 'medium',
        source: 'commit_analyzer',
      },
    ]);
  });

  it('detects an unindexed join', () => {
    const signals = analyzeCommits([
      { sha: 'f00d', message: 'add report', diffSummary: 'SELECT * FROM orders JOIN customers' },
    ]);

    expect(signals.map((s) => s.description)).toEqual(['Potentially unindexed query added in commit f00d']);
  });

  it('rates a pool reduction high and carries the new size', () => {
    const signals = analyzeCommits([
      { sha: 'd4e5f6', message: 'tune db', diffSummary: 'MAX_DB_CONNECTIONS from 50 to 10' },
    ]);

    expect(signals).toEqual([
      {
        type: 'commit_change',
        description: 'DB connection pool reduced from 50 to 10 in commit d4e5f6',
        value: 10,
        severity: 'high',
        source: 'commit_analyzer',
      },
    ]);
  });

  it('reports a pool increase as a medium change without a value', () => {
    const [signal] = analyzeCommits([{ sha: 'beef', message: 'pool_size from 10 to 20', diffSummary: '' }]);

    expect(signal).toEqual({
      type: 'commit_change',
      description: 'DB connection pool size changed in commit beef',
      severity: 'medium',
      source: 'commit_analyzer',
    });
  });

  it('emits one signal per family in a fixed order', () => {
    const signals = analyzeCommits([
      {
        sha: 'c0ffee',
        message: 'disable cache and shrink DB_POOL_SIZE from 20 to 5',
        diffSummary: 'full table scan on events',
      },
    ]);

    expect(signals.map((s) => s.description)).toEqual([
      'Cache decorator removed in commit c0ffee',
      'Potentially unindexed query added in commit c0ffee',
      'DB connection pool reduced from 20 to 5 in commit c0ffee',
    ]);
  });
});
