import { describe, it, expect } from 'vitest';
import { EventQueue, STOP_SIGNAL } from '../../src/application/event-queue.js';

describe('EventQueue', () => {
  it('delivers items in push order', async () => {
    const queue = new EventQueue<number>();
    queue.push(1);
    queue.pushAll([2, 3]);

    expect(queue.size).toBe(3);
    expect(await queue.pull()).toBe(1);
    expect(await queue.pull()).toBe(2);
    expect(await queue.pull()).toBe(3);
    expect(queue.size).toBe(0);
  });

  it('makes a waiting pull resolve with the next push', async () => {
    const queue = new EventQueue<string>();
    const pending = queue.pull();
    queue.push('late');

    expect(await pending).toBe('late');
    expect(queue.size).toBe(0);
  });

  it('serves waiting pulls in the order they were made', async () => {
    const queue = new EventQueue<string>();
    const first = queue.pull();
    const second = queue.pull();
    queue.push('a');
    queue.push('b');

    expect(await first).toBe('a');
    expect(await second).toBe('b');
  });

  it('places the stop signal behind queued items', async () => {
    const queue = new EventQueue<string>();
    queue.push('a');
    queue.pushStop();
    queue.push('after');

    expect(await queue.pull()).toBe('a');
    expect(await queue.pull()).toBe(STOP_SIGNAL);
    expect(await queue.pull()).toBe('after');
  });

  it('carries undefined items', async () => {
    const queue = new EventQueue<string | undefined>();
    queue.push(undefined);

    expect(queue.size).toBe(1);
    expect(await queue.pull()).toBeUndefined();
    expect(queue.size).toBe(0);
  });
});
