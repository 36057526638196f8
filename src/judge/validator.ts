/**
 * @fileoverview Deterministic validation of worker output.
 *
 * Four checks, always in the same order, stopping at the first failure so
 * each rejection has exactly one reason. The checks read only their inputs:
 * a rejection can be reproduced from the logged result and signal ids
 * without re-running the worker.
 */

import type { EvidenceStore } from '../memory/evidence_store.js';
import type { Hypothesis, RejectionCode, Verdict, WorkerResult } from '../types.js';

type Check = (result: WorkerResult, knownIds: ReadonlySet<string>) => Rejection | null;

interface Rejection {
  code: RejectionCode;
  reason: string;
}

function subject(hypothesis: Hypothesis, result: WorkerResult): string {
  return `Hypothesis '${hypothesis.label}' from agent '${result.agentName}'`;
}

const checkAgentName: Check = (result) => {
  if (typeof result.agentName === 'string' && result.agentName.trim().length > 0) return null;
  return { code: 'empty_agent_name', reason: 'agentName is empty or whitespace.' };
};

const checkSupport: Check = (result) => {
  for (const hypothesis of result.hypotheses) {
    if (!Array.isArray(hypothesis.supportingSignals) || hypothesis.supportingSignals.length === 0) {
      return {
        code: 'unsupported_hypothesis',
        reason: `${subject(hypothesis, result)} has no supporting signals.`,
      };
    }
  }
  return null;
};

const checkCitations: Check = (result, knownIds) => {
  for (const hypothesis of result.hypotheses) {
    for (const signalId of hypothesis.supportingSignals) {
      if (!knownIds.has(signalId)) {
        const valid = [...knownIds].sort();
        return {
          code: 'unknown_signal',
          reason: `${subject(hypothesis, result)} cites unknown signal ID '${signalId}'. Valid IDs: [${valid.join(', ')}]`,
        };
      }
    }
  }
  return null;
};

const checkConfidence: Check = (result) => {
  for (const hypothesis of result.hypotheses) {
    const { confidence } = hypothesis;
    if (!(confidence >= 0 && confidence <= 1)) {
      return {
        code: 'confidence_out_of_range',
        reason: `${subject(hypothesis, result)} has invalid confidence ${confidence} (must be 0.0-1.0).`,
      };
    }
  }
  return null;
};

const CHECKS: readonly Check[] = [checkAgentName, checkSupport, checkCitations, checkConfidence];

export class Validator {
  validate(result: WorkerResult, store: Pick<EvidenceStore, 'signalIds'>): Verdict {
    const knownIds = store.signalIds();
    for (const check of CHECKS) {
      const rejection = check(result, knownIds);
      if (rejection) {
        return {
          valid: false,
          result,
          rejectionCode: rejection.code,
          rejectionReason: rejection.reason,
        };
      }
    }
    return { valid: true, result };
  }
}
