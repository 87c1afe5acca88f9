import { computed } from '@tldraw/state';
import { describe, expect, it, vi } from 'vitest';
import { ChangeEventChannel, CurrentValueChannel, DisposedError } from '../src/index.js';

describe('ChangeEventChannel', () => {
  it('should deliver only values published after subscribing', () => {
    const channel = new ChangeEventChannel<number>('numbers', vi.fn());
    const seen: number[] = [];
    channel.publish(1);
    channel.subscribe((value) => seen.push(value));
    channel.publish(2);
    expect(seen).toEqual([2]);
  });

  it('should deliver in subscription order', () => {
    const channel = new ChangeEventChannel<number>('numbers', vi.fn());
    const log: string[] = [];
    channel.subscribe((value) => log.push(`a:${value}`));
    channel.subscribe((value) => log.push(`b:${value}`));
    channel.publish(1);
    expect(log).toEqual(['a:1', 'b:1']);
  });

  it('should report a failing listener and keeps delivering', () => {
    const report = vi.fn();
    const channel = new ChangeEventChannel<number>('numbers', report);
    const failure = new Error('boom');
    const seen: number[] = [];
    channel.subscribe(() => {
      throw failure;
    });
    channel.subscribe((value) => seen.push(value));

    channel.publish(5);

    expect(seen).toEqual([5]);
    expect(report).toHaveBeenCalledWith(failure, 5);
  });

  it('should unsubscribe one listener, idempotently', () => {
    const channel = new ChangeEventChannel<number>('numbers', vi.fn());
    const log: string[] = [];
    const stopA = channel.subscribe((value) => log.push(`a:${value}`));
    channel.subscribe((value) => log.push(`b:${value}`));
    stopA();
    stopA();
    channel.publish(1);
    expect(log).toEqual(['b:1']);
    expect(channel.size).toBe(1);
  });

  it('should queue values published from inside a listener', () => {
    const channel = new ChangeEventChannel<number>('numbers', vi.fn());
    const log: string[] = [];
    channel.subscribe((value) => {
      log.push(`A${value}`);
      if (value === 1) channel.publish(2);
    });
    channel.subscribe((value) => log.push(`B${value}`));

    channel.publish(1);

    expect(log).toEqual(['A1', 'B1', 'A2', 'B2']);
  });

  it('should do not hand the in-flight value to a listener added during delivery', () => {
    const channel = new ChangeEventChannel<number>('numbers', vi.fn());
    const late: number[] = [];
    let added = false;
    channel.subscribe(() => {
      if (added) return;
      added = true;
      channel.subscribe((value) => late.push(value));
    });

    channel.publish(1);
    channel.publish(2);

    expect(late).toEqual([2]);
  });

  it('should filter through a stream', () => {
    const channel = new ChangeEventChannel<number>('numbers', vi.fn());
    const seen: number[] = [];
    channel
      .asStream()
      .filter((value) => value % 2 === 0)
      .subscribe((value) => seen.push(value));
    for (const value of [1, 2, 3, 4]) channel.publish(value);
    expect(seen).toEqual([2, 4]);
  });

  it('should notify subscribers on close and refuses further use', () => {
    const channel = new ChangeEventChannel<number>('numbers', vi.fn());
    const onClose = vi.fn();
    channel.subscribe(() => {}, onClose);

    channel.close();
    channel.close();

    expect(onClose).toHaveBeenCalledTimes(1);
    expect(channel.isClosed).toBe(true);
    expect(() => channel.publish(1)).toThrow(DisposedError);
    expect(() => channel.subscribe(() => {})).toThrow('Cannot subscribe: channel numbers has been disposed');
  });
});

describe('CurrentValueChannel', () => {
  it('should replay the latest value to each new subscriber', () => {
    const channel = new CurrentValueChannel('count', 1, vi.fn());
    const first: number[] = [];
    const second: number[] = [];
    channel.subscribe((value) => first.push(value));
    channel.publish(2);
    channel.subscribe((value) => second.push(value));

    expect(first).toEqual([1, 2]);
    expect(second).toEqual([2]);
    expect(channel.value).toBe(2);
  });

  it('should report a listener that fails on replay', () => {
    const report = vi.fn();
    const channel = new CurrentValueChannel('count', 1, report);
    const failure = new Error('replay');
    channel.subscribe(() => {
      throw failure;
    });
    expect(report).toHaveBeenCalledWith(failure, 1);
  });

  it('should advance its signal when the same instance is republished', () => {
    const state = { n: 1 };
    const channel = new CurrentValueChannel('state', state, vi.fn());
    const n = computed('n', () => channel.signal.get().n);
    expect(n.get()).toBe(1);

    state.n = 2;
    channel.publish(state);

    expect(n.get()).toBe(2);
  });
});
