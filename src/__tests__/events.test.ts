import { describe, expect, it } from 'vitest';
import { DEFAULT_EVENT_QUEUE_CAPACITY, WorkerEventQueue } from '../events.js';
import type { WorkerEvent } from '../types.js';

function event(worker: string, phase: WorkerEvent['phase'] = 'started'): WorkerEvent {
  return { worker, phase, message: 'analyzing...', relativeMs: 0 };
}

async function collect(queue: WorkerEventQueue): Promise<string[]> {
  const seen: string[] = [];
  for await (const item of queue) seen.push(`${item.worker}:${item.phase}`);
  return seen;
}

describe('WorkerEventQueue', () => {
  it('defaults to a capacity of 256', () => {
    expect(new WorkerEventQueue().capacity).toBe(DEFAULT_EVENT_QUEUE_CAPACITY);
    expect(DEFAULT_EVENT_QUEUE_CAPACITY).toBe(256);
  });

  it('rejects a non-positive or fractional capacity', () => {
    expect(() => new WorkerEventQueue(0)).toThrow(RangeError);
    expect(() => new WorkerEventQueue(1.5)).toThrow(RangeError);
  });

  it('drains buffered events before ending iteration', async () => {
    const queue = new WorkerEventQueue();
    queue.emit(event('a'));
    queue.emit(event('a', 'completed'));
    queue.close();

    await expect(collect(queue)).resolves.toEqual(['a:started', 'a:completed']);
  });

  it('delivers events to a waiting consumer', async () => {
    const queue = new WorkerEventQueue();
    const consumed = collect(queue);

    queue.emit(event('a'));
    queue.emit(event('b', 'errored'));
    queue.close();

    await expect(consumed).resolves.toEqual(['a:started', 'b:errored']);
  });

  it('drops the oldest events when full', () => {
    const queue = new WorkerEventQueue(2);
    queue.emit(event('a'));
    queue.emit(event('b'));
    queue.emit(event('c'));

    expect(queue.dropped).toBe(1);
    expect(queue.pending).toBe(2);
    expect(queue.drain().map((e) => e.worker)).toEqual(['b', 'c']);
    expect(queue.pending).toBe(0);
  });

  it('ignores events after close', () => {
    const queue = new WorkerEventQueue();
    queue.close();
    queue.close();
    queue.emit(event('late'));

    expect(queue.isClosed).toBe(true);
    expect(queue.pending).toBe(0);
  });
});
