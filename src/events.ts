import type { WorkerEvent, WorkerEventSink } from './types.js';

export type { WorkerEvent, WorkerEventSink };

export const DEFAULT_EVENT_QUEUE_CAPACITY = 256;

/**
 * Bounded, non-blocking worker event channel.
 *
 * `emit` never waits: when the buffer is full the oldest event is dropped
 * and counted, so a slow or absent consumer cannot hold up a worker.
 * Consumers read with `for await`; iteration ends once `close()` has been
 * called and the buffer is empty.
 */
export class WorkerEventQueue implements WorkerEventSink, AsyncIterable<WorkerEvent> {
  private buffer: WorkerEvent[] = [];
  private waiters: Array<(result: IteratorResult<WorkerEvent>) => void> = [];
  private closed = false;
  private droppedCount = 0;

  constructor(readonly capacity: number = DEFAULT_EVENT_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Event queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  emit(event: WorkerEvent): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: event, done: false });
      return;
    }
    if (this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this.droppedCount += 1;
    }
    this.buffer.push(event);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Events discarded because the buffer was full. */
  get dropped(): number {
    return this.droppedCount;
  }

  get pending(): number {
    return this.buffer.length;
  }

  /** Remove and return everything buffered right now. */
  drain(): WorkerEvent[] {
    return this.buffer.splice(0);
  }

  [Symbol.asyncIterator](): AsyncIterator<WorkerEvent> {
    return {
      next: (): Promise<IteratorResult<WorkerEvent>> => {
        const event = this.buffer.shift();
        if (event) return Promise.resolve({ value: event, done: false });
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise((resolve) => {
          this.waiters.push(resolve);
        });
      },
    };
  }
}
