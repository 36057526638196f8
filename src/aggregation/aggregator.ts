/**
 * @fileoverview Hypothesis aggregator.
 *
 * Turns the hypotheses of every valid verdict into one ranked list:
 *
 * 1. Deduplication: hypotheses whose labels match are merged into one, and
 *    every contributing agent is kept.
 * 2. Scoring: final = min(max confidence + 0.1 per extra member, 1.0).
 *
 * Grouping is greedy over flattening order. With the default
 * `representative` strategy a hypothesis joins the first group whose first
 * member it matches, so two non-representative members need not match each
 * other. `pairwise` requires a match against every member instead.
 */

import type { Hypothesis, RankedHypothesis, Verdict } from '../types.js';

export const MAX_RANKED_HYPOTHESES = 5;
export const AGREEMENT_BONUS = 0.1;

export type GroupingStrategy = 'representative' | 'pairwise';

export interface AggregatorOptions {
  grouping?: GroupingStrategy;
}

function normalizeLabel(label: string): string {
  return label.trim().toLowerCase().replace(/\s+/g, ' ');
}

function containsAllWords(longer: string, shorter: string): boolean {
  const words = new Set(longer.split(' '));
  return shorter.split(' ').every((word) => words.has(word));
}

/**
 * Two labels describe the same root cause when, after trimming and
 * lower-casing, either contains the other, or every word of one appears in
 * the other ("DB Pool" / "DB Connection Pool Exhaustion").
 */
export function labelsMatch(labelA: string, labelB: string): boolean {
  const a = normalizeLabel(labelA);
  const b = normalizeLabel(labelB);
  if (a.includes(b) || b.includes(a)) return true;
  if (a.length === 0 || b.length === 0) return false;
  return containsAllWords(a, b) || containsAllWords(b, a);
}

export function roundConfidence(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export class Aggregator {
  readonly grouping: GroupingStrategy;

  constructor(options: AggregatorOptions = {}) {
    this.grouping = options.grouping ?? 'representative';
  }

  /**
   * Up to five merged hypotheses, highest confidence first. Inputs are left
   * untouched, so aggregating the same verdicts twice gives the same output.
   */
  aggregate(verdicts: readonly Verdict[]): RankedHypothesis[] {
    const hypotheses = collectValid(verdicts);
    if (hypotheses.length === 0) return [];

    const merged = this.group(hypotheses).map(mergeGroup);
    // Array.prototype.sort is stable: equal confidences keep flattening order.
    merged.sort((a, b) => b.confidence - a.confidence);
    return merged.slice(0, MAX_RANKED_HYPOTHESES);
  }

  private group(hypotheses: Hypothesis[]): Hypothesis[][] {
    const groups: Hypothesis[][] = [];
    for (const hypothesis of hypotheses) {
      const target = groups.find((group) => this.belongs(hypothesis, group));
      if (target) {
        target.push(hypothesis);
      } else {
        groups.push([hypothesis]);
      }
    }
    return groups;
  }

  private belongs(hypothesis: Hypothesis, group: Hypothesis[]): boolean {
    if (this.grouping === 'pairwise') {
      return group.every((member) => labelsMatch(hypothesis.label, member.label));
    }
    return labelsMatch(hypothesis.label, group[0].label);
  }
}

function collectValid(verdicts: readonly Verdict[]): Hypothesis[] {
  const hypotheses: Hypothesis[] = [];
  for (const verdict of verdicts) {
    if (verdict.valid) hypotheses.push(...verdict.result.hypotheses);
  }
  return hypotheses;
}

function mergeGroup(group: Hypothesis[]): RankedHypothesis {
  let best = group[0];
  for (const member of group) {
    if (member.confidence > best.confidence) best = member;
  }

  const bonus = AGREEMENT_BONUS * (group.length - 1);
  const confidence = roundConfidence(Math.min(best.confidence + bonus, 1.0));
  const contributingAgents = [...new Set(group.map((member) => member.contributingAgent))].sort();

  const seen = new Set<string>();
  const supportingSignals: string[] = [];
  for (const member of group) {
    for (const signalId of member.supportingSignals) {
      if (seen.has(signalId)) continue;
      seen.add(signalId);
      supportingSignals.push(signalId);
    }
  }

  return {
    label: best.label,
    description: best.description,
    severity: best.severity,
    confidence,
    supportingSignals,
    contributingAgents,
  };
}
