import type {
  EventKey,
  EventOf,
  Listener,
  Predicate,
  StateChange,
  StateType,
  Unsubscribe,
  UpdateFn,
} from 'statehub-core';
import type { StateHub } from './hub.js';

const noop = () => {};

/**
 * One consumer's handle on a shared hub. Every subscription made through it is released by
 * `dispose()`; the hub itself is left running.
 */
export class StateConsumer {
  private readonly subscriptions = new Set<Unsubscribe>();
  private isDisposed = false;

  constructor(readonly hub: StateHub) {}

  get disposed(): boolean {
    return this.isDisposed;
  }

  /** Live subscriptions held by this consumer */
  get size(): number {
    return this.subscriptions.size;
  }

  state<T extends object>(type: StateType<T>): T {
    return this.hub.store.get(type);
  }

  mutate<T extends object>(type: StateType<T>, update: UpdateFn<T>): Promise<StateChange<T> | null> {
    return this.hub.store.mutate(type, update);
  }

  replace<T extends object>(type: StateType<T>, value: T): void {
    this.hub.store.replace(type, value);
  }

  /**
   * Call `listener` with the current value now and with every later value
   */
  observe<T extends object>(type: StateType<T>, listener: Listener<T>): Unsubscribe {
    return this.subscribe(() => this.hub.store.observeCurrent(type).subscribe(listener));
  }

  onChange<T extends object>(type: StateType<T>, listener: Listener<StateChange<T>>): Unsubscribe {
    return this.subscribe(() => this.hub.store.observeChanges(type).subscribe(listener));
  }

  publish<E>(event: E | null | undefined): void {
    this.hub.bus.publish(event);
  }

  on<K extends EventKey>(key: K, handler: Listener<EventOf<K>>, predicate?: Predicate<EventOf<K>>): Unsubscribe {
    return this.subscribe(() => this.hub.bus.subscribeAction(key, handler, predicate));
  }

  /**
   * Hold an externally created subscription until `dispose()`. The returned function releases it
   * early and forgets it. On a disposed consumer the subscription is released right away.
   */
  track(unsubscribe: Unsubscribe): Unsubscribe {
    if (this.isDisposed) {
      unsubscribe();
      return unsubscribe;
    }
    this.subscriptions.add(unsubscribe);
    return () => {
      this.subscriptions.delete(unsubscribe);
      unsubscribe();
    };
  }

  // Nothing is opened on a disposed consumer, not even for a current-value replay
  private subscribe(open: () => Unsubscribe): Unsubscribe {
    if (this.isDisposed) return noop;
    return this.track(open());
  }

  /**
   * Release every subscription. The hub itself is left alone.
   */
  dispose(): void {
    if (this.isDisposed) return;
    this.isDisposed = true;
    for (const unsubscribe of this.subscriptions) unsubscribe();
    this.subscriptions.clear();
  }
}
