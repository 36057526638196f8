/**
 * @fileoverview Evidence store for a single pipeline invocation.
 *
 * Append-only: signals can be added but never removed or modified. Workers
 * read a snapshot concurrently during dispatch and the validator trusts that
 * an id present now was present while they ran. A new store is created for
 * every `execute()` call and dropped when it returns.
 */

import type { Signal } from '../types.js';
import { logWarning } from '../telemetry/logger.js';

export class EvidenceStore {
  private readonly entries: Signal[] = [];
  private readonly ids = new Set<string>();

  addSignal(signal: Signal): void {
    if (this.ids.has(signal.id)) {
      logWarning('EvidenceStore: duplicate signal id appended', { signalId: signal.id, source: signal.source });
    }
    this.entries.push(Object.freeze({ ...signal }));
    this.ids.add(signal.id);
  }

  addSignals(signals: readonly Signal[]): void {
    for (const signal of signals) this.addSignal(signal);
  }

  /** Copy of every stored signal, in insertion order. */
  signals(): Signal[] {
    return [...this.entries];
  }

  signalIds(): ReadonlySet<string> {
    return new Set(this.ids);
  }

  get size(): number {
    return this.entries.length;
  }
}
