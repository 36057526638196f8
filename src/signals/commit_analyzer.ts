/**
 * @fileoverview Commit analyzer: pattern matching over commit diff summaries
 * and messages. At most one signal per pattern family per commit.
 */

import type { CommitRecord } from '../types.js';
import type { SignalDraft } from './types.js';

const SOURCE = 'commit_analyzer';

const CACHE_REMOVAL_PATTERNS = [
  /removed?\s+@?cache/i,
  /cache\s+decorator\s+removed/i,
  /cache\s*=\s*False/i,
  /no.?cache/i,
  /disabled?\s+cach/i,
  /CACHE_TTL\s*=\s*0/i,
];

const UNINDEXED_QUERY_PATTERNS = [
  /SELECT\s+\*\s+FROM\s+\w+\s+JOIN/i,
  /JOIN\b(?!.*\bINDEX\b)/i,
  /without\s+index/i,
  /no\s+index\s+hint/i,
  /full\s+table\s+scan/i,
];

const POOL_REDUCTION_PATTERNS = [
  /MAX_DB_CONNECTIONS\s+from\s+(\d+)\s+to\s+(\d+)/i,
  /pool_size\s+from\s+(\d+)\s+to\s+(\d+)/i,
  /MAX_CONNECTIONS\s+from\s+(\d+)\s+to\s+(\d+)/i,
  /DB_POOL_SIZE\s+from\s+(\d+)\s+to\s+(\d+)/i,
];

export function analyzeCommits(commits: readonly CommitRecord[]): SignalDraft[] {
  const signals: SignalDraft[] = [];
  for (const commit of commits) {
    const { sha } = commit;
    const text = `${commit.diffSummary} ${commit.message}`;

    if (CACHE_REMOVAL_PATTERNS.some((pattern) => pattern.test(text))) {
      signals.push({
        type: 'commit_change',
        description: `Cache decorator removed in commit ${sha}`,
        severity: 'medium',
        source: SOURCE,
      });
    }
    if (UNINDEXED_QUERY_PATTERNS.some((pattern) => pattern.test(text))) {
      signals.push({
        type: 'commit_change',
        description: `Potentially unindexed query added in commit ${sha}`,
        severity: 'medium',
        source: SOURCE,
      });
    }
    const pool = checkPoolReduction(text, sha);
    if (pool) signals.push(pool);
  }
  return signals;
}

function checkPoolReduction(text: string, sha: string): SignalDraft | null {
  for (const pattern of POOL_REDUCTION_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;
    const before = Number(match[1]);
    const after = Number(match[2]);
    if (Number.isFinite(before) && Number.isFinite(after) && after < before) {
      return {
        type: 'commit_change',
        description: `DB connection pool reduced from ${before} to ${after} in commit ${sha}`,
        value: after,
        severity: 'high',
        source: SOURCE,
      };
    }
    return {
      type: 'commit_change',
      description: `DB connection pool size changed in commit ${sha}`,
      severity: 'medium',
      source: SOURCE,
    };
  }
  return null;
}
