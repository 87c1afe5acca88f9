import { type Atom, atom, type Signal } from '@tldraw/state';
import { DisposedError } from './errors.js';
import type { Logger } from './logger.js';
import type { HandlerErrorHook, Listener, Predicate, Stream, Unsubscribe } from './types.js';

/**
 * Receives every error thrown by a listener (or by the predicate of a filtered stream)
 */
export type ChannelErrorReporter = (error: unknown, value: unknown) => void;

/**
 * Build the reporter a channel hands listener failures to: log, then call the configured hook.
 * A hook that throws is logged too; nothing propagates back into the channel.
 */
export function channelErrorReporter(
  logger: Logger,
  hook: HandlerErrorHook | undefined,
  source: 'store' | 'bus',
  channel: string,
): ChannelErrorReporter {
  return (error, value) => {
    logger.error(`Listener on ${channel} failed:`, error);
    if (!hook) return;
    try {
      hook(error, { source, channel, value });
    } catch (hookError) {
      logger.error(`onHandlerError hook failed for ${channel}:`, hookError);
    }
  };
}

export interface ChannelSubscriber<T> {
  readonly listener: Listener<T>;
  readonly onClose?: () => void;
  /** Only values published at or after this sequence number are delivered */
  readonly since: number;
  active: boolean;
}

interface Queued<T> {
  readonly seq: number;
  readonly value: T;
}

type Subscribable<T> = Pick<Stream<T>, 'subscribe'>;

/**
 * Wrap anything subscribable as a `Stream`. Each `filter` layers a predicate in front of the
 * listener; the subscription itself still lives on the underlying channel.
 */
export function streamOf<T>(source: Subscribable<T>): Stream<T> {
  return {
    subscribe: (listener, onClose) => source.subscribe(listener, onClose),
    filter: (predicate: Predicate<T>) =>
      streamOf<T>({
        subscribe: (listener, onClose) =>
          source.subscribe((value) => {
            if (predicate(value)) listener(value);
          }, onClose),
      }),
  };
}

/**
 * Multi-subscriber fan-out with forward-only delivery (no replay).
 *
 * Delivery is synchronous and in subscription order. A value published from inside a listener
 * is queued and delivered once the current value reached every subscriber, so all subscribers
 * observe the same order. A throwing listener is reported and does not stop the others.
 */
export class ChangeEventChannel<T> {
  private readonly subscribers = new Set<ChannelSubscriber<T>>();
  private queue: Queued<T>[] = [];
  private seq = 0;
  private dispatching = false;
  private closed = false;

  constructor(
    readonly name: string,
    private readonly reportError: ChannelErrorReporter,
  ) {}

  get size(): number {
    return this.subscribers.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  publish(value: T): void {
    this.assertOpen('publish');
    this.queue.push({ seq: this.seq++, value });
    if (this.dispatching) return;

    this.dispatching = true;
    try {
      while (this.queue.length > 0) {
        const queue = this.queue;
        this.queue = [];
        for (const item of queue) {
          for (const subscriber of [...this.subscribers]) {
            if (subscriber.active && item.seq >= subscriber.since) {
              this.deliver(subscriber, item.value);
            }
          }
        }
      }
    } finally {
      this.dispatching = false;
    }
  }

  subscribe(listener: Listener<T>, onClose?: () => void): Unsubscribe {
    this.assertOpen('subscribe');
    const subscriber: ChannelSubscriber<T> = { listener, onClose, since: this.seq, active: true };
    this.subscribers.add(subscriber);
    this.onSubscribed(subscriber);
    return () => {
      subscriber.active = false;
      this.subscribers.delete(subscriber);
    };
  }

  asStream(): Stream<T> {
    return streamOf<T>(this);
  }

  /**
   * Notify every subscriber's `onClose` and drop them. Later `publish` and `subscribe` calls
   * throw `DisposedError`.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue = [];
    const subscribers = [...this.subscribers];
    this.subscribers.clear();
    for (const subscriber of subscribers) {
      subscriber.active = false;
      if (!subscriber.onClose) continue;
      try {
        subscriber.onClose();
      } catch (error) {
        this.reportError(error, undefined);
      }
    }
  }

  protected onSubscribed(_subscriber: ChannelSubscriber<T>): void {}

  protected deliver(subscriber: ChannelSubscriber<T>, value: T): void {
    try {
      subscriber.listener(value);
    } catch (error) {
      this.reportError(error, value);
    }
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new DisposedError(`channel ${this.name}`, operation);
    }
  }
}

/**
 * Fan-out that holds the latest value and replays it to every new subscriber.
 *
 * The value also lives in a `@tldraw/state` atom, so derived views can track it. The atom never
 * treats two values as equal: republishing the same instance after an in-place mutation still
 * advances it.
 */
export class CurrentValueChannel<T> extends ChangeEventChannel<T> {
  private current: T;
  private readonly cell: Atom<T>;

  constructor(name: string, initial: T, reportError: ChannelErrorReporter) {
    super(name, reportError);
    this.current = initial;
    this.cell = atom(name, initial, { isEqual: () => false });
  }

  get value(): T {
    return this.current;
  }

  get signal(): Signal<T> {
    return this.cell;
  }

  publish(value: T): void {
    if (!this.isClosed) {
      this.current = value;
      this.cell.set(value);
    }
    super.publish(value);
  }

  protected onSubscribed(subscriber: ChannelSubscriber<T>): void {
    this.deliver(subscriber, this.current);
  }
}
