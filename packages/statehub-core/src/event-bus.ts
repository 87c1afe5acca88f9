import { ChangeEventChannel, type ChannelErrorReporter, channelErrorReporter } from './channel.js';
import { mergeConfig, resolveLogger, type StateHubConfig } from './config.js';
import { DisposedError } from './errors.js';
import { type Logger, scopedLogger } from './logger.js';
import type { EventKey, EventOf, Listener, Predicate, Stream, Unsubscribe } from './types.js';

/**
 * Published on the bus whenever a handler throws while receiving an event.
 * A failure inside a `HandlerFailed` handler is only logged.
 */
export class HandlerFailed {
  constructor(
    readonly error: unknown,
    readonly event: unknown,
    readonly key: EventKey,
  ) {}
}

function isEventKey(value: unknown): value is EventKey {
  return typeof value === 'function';
}

/**
 * The constructor an event is routed by. Primitives route to their wrapper constructor;
 * objects without a prototype route to `Object`.
 */
export function eventKeyOf(event: NonNullable<unknown>): EventKey {
  const proto: unknown = Object.getPrototypeOf(event);
  const ctor: unknown = typeof proto === 'object' && proto !== null ? Reflect.get(proto, 'constructor') : undefined;
  return isEventKey(ctor) ? ctor : Object;
}

/**
 * Type-keyed publish/subscribe.
 *
 * Each event constructor gets its own channel, created on first publish or subscribe. Delivery is
 * synchronous, in subscription order, on the publishing call. Subscribers register against the
 * exact constructor: a subclass event does not reach subscribers of its base class.
 *
 * @example
 * ```ts
 * class ItemAdded {
 *   constructor(readonly sku: string) {}
 * }
 *
 * const bus = new EventBus();
 * const stop = bus.subscribeAction(ItemAdded, (event) => console.log(event.sku));
 * bus.publish(new ItemAdded('apple'));
 * bus.publish(7); // routed to subscribers of Number
 * stop();
 * ```
 */
export class EventBus {
  readonly config: StateHubConfig;
  private readonly logger: Logger;
  private readonly channels = new Map<EventKey, ChangeEventChannel<unknown>>();
  private isDisposed = false;

  constructor(config: Partial<StateHubConfig> = {}) {
    this.config = mergeConfig(config);
    this.logger = scopedLogger(resolveLogger(this.config), 'bus');
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  /**
   * Deliver `event` to every current subscriber of its constructor.
   * `null` and `undefined` are ignored; an event nobody listens for is dropped.
   * Handler failures never reach the publisher: they are logged, passed to `onHandlerError`
   * and republished as `HandlerFailed`.
   */
  publish<E>(event: E | null | undefined): void {
    this.assertOpen('publish');
    if (event === null || event === undefined) return;
    this.channel(eventKeyOf(event)).publish(event);
  }

  subscribe<K extends EventKey>(key: K): Stream<EventOf<K>> {
    this.assertOpen('subscribe');
    return this.channel(key).asStream();
  }

  subscribeFiltered<K extends EventKey>(key: K, predicate: Predicate<EventOf<K>>): Stream<EventOf<K>> {
    return this.subscribe(key).filter(predicate);
  }

  /**
   * Call `handler` for every event (passing `predicate`, when given).
   * The returned function stops delivery to this handler only.
   */
  subscribeAction<K extends EventKey>(
    key: K,
    handler: Listener<EventOf<K>>,
    predicate?: Predicate<EventOf<K>>,
  ): Unsubscribe {
    const stream = predicate ? this.subscribeFiltered(key, predicate) : this.subscribe(key);
    return stream.subscribe(handler);
  }

  /**
   * Number of live subscriptions for a constructor
   */
  subscriberCount(key: EventKey): number {
    return this.channels.get(key)?.size ?? 0;
  }

  /**
   * Close every channel. Later calls throw `DisposedError`.
   */
  dispose(): void {
    if (this.isDisposed) return;
    this.isDisposed = true;
    this.logger.debug(`Disposing bus (${this.channels.size} channels)`);
    for (const channel of this.channels.values()) channel.close();
    this.channels.clear();
  }

  // Channels are created below under the constructor they carry, so reading one back under
  // that constructor's event type is sound.
  private channel<K extends EventKey>(key: K): ChangeEventChannel<EventOf<K>> {
    const existing = this.channels.get(key);
    if (existing) return existing as ChangeEventChannel<EventOf<K>>;

    const channel = new ChangeEventChannel<EventOf<K>>(key.name, this.reporter(key));
    this.channels.set(key, channel as ChangeEventChannel<unknown>);
    this.logger.debug(`Registered event channel ${key.name}`);
    return channel;
  }

  private reporter(key: EventKey): ChannelErrorReporter {
    const report = channelErrorReporter(this.logger, this.config.onHandlerError, 'bus', key.name);
    return (error, event) => {
      report(error, event);
      if (key === HandlerFailed || this.isDisposed) return;
      this.publish(new HandlerFailed(error, event, key));
    };
  }

  private assertOpen(operation: string): void {
    if (this.isDisposed) {
      throw new DisposedError('EventBus', operation);
    }
  }
}
