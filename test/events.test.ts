import { describe, it, expect } from 'vitest';
import { EventBus } from '../src/core/events.js';

type TestEvent =
  | { type: 'ping'; n: number }
  | { type: 'pong'; text: string };

describe('EventBus', () => {
  it('delivers typed handlers before wildcard handlers', () => {
    const bus = new EventBus<TestEvent>();
    const seen: string[] = [];
    bus.on('*', (e) => seen.push(`*:${e.type}`));
    bus.on('ping', (e) => seen.push(`ping:${e.n}`));
    bus.on('pong', (e) => seen.push(`pong:${e.text}`));

    bus.emit({ type: 'ping', n: 1 });
    bus.emit({ type: 'pong', text: 'a' });
    expect(seen).toEqual(['ping:1', '*:ping', 'pong:a', '*:pong']);
  });

  it('unsubscribes', () => {
    const bus = new EventBus<TestEvent>();
    const seen: number[] = [];
    const handler = (e: { n: number }) => {
      seen.push(e.n);
    };
    const off = bus.on('ping', handler);

    bus.emit({ type: 'ping', n: 1 });
    off();
    bus.emit({ type: 'ping', n: 2 });
    expect(seen).toEqual([1]);
  });

  it('rethrows handler errors by default', () => {
    const bus = new EventBus<TestEvent>();
    bus.on('ping', () => {
      throw new Error('bad handler');
    });
    expect(() => bus.emit({ type: 'ping', n: 1 })).toThrow('bad handler');
  });

  it('routes handler errors to onError and keeps delivering', () => {
    const errors: string[] = [];
    const bus = new EventBus<TestEvent>((err, event) => {
      errors.push(`${event.type}:${err instanceof Error ? err.message : String(err)}`);
    });
    const seen: string[] = [];
    bus.on('ping', () => {
      throw new Error('first');
    });
    bus.on('ping', () => seen.push('second'));

    bus.emit({ type: 'ping', n: 1 });
    expect(errors).toEqual(['ping:first']);
    expect(seen).toEqual(['second']);
  });

  it('clear removes every handler', () => {
    const bus = new EventBus<TestEvent>();
    const seen: string[] = [];
    bus.on('*', (e) => seen.push(e.type));
    bus.clear();
    bus.emit({ type: 'ping', n: 1 });
    expect(seen).toEqual([]);
  });
});
