import { DuplicateNameError } from '../core/errors.js';
import type { Worker } from './types.js';

/**
 * Name-keyed roster of workers.
 *
 * Iteration follows registration order. The aggregator breaks confidence
 * ties by that order, so it must stay fixed for output to be reproducible.
 */
export class WorkerRegistry {
  private workers = new Map<string, Worker>();

  /** @throws DuplicateNameError when the name is taken */
  register(worker: Worker): void {
    if (this.workers.has(worker.name)) {
      throw new DuplicateNameError(worker.name);
    }
    this.workers.set(worker.name, worker);
  }

  all(): Worker[] {
    return Array.from(this.workers.values());
  }

  lookup(name: string): Worker | undefined {
    return this.workers.get(name);
  }

  count(): number {
    return this.workers.size;
  }
}
