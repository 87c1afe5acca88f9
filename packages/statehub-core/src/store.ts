import type { Signal } from '@tldraw/state';
import { ChangeDetector, strategyFor } from './change-detector.js';
import { ChangeEventChannel, CurrentValueChannel, channelErrorReporter } from './channel.js';
import { mergeConfig, resolveLogger, type StateHubConfig } from './config.js';
import { DisposedError } from './errors.js';
import { LockPool } from './lock.js';
import { type Logger, scopedLogger } from './logger.js';
import type { StateChange, StateType, Stream, UpdateFn } from './types.js';

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    typeof Reflect.get(value, 'then') === 'function'
  );
}

/**
 * Holds one live instance per state type and broadcasts what happens to it.
 *
 * @example
 * ```ts
 * class Cart {
 *   items: string[] = [];
 *   coupon: string | null = null;
 * }
 *
 * const store = new TypedStateStore();
 * store.observeChanges(Cart).subscribe(({ changedProperties }) => {
 *   console.log(changedProperties.map((c) => c.propertyName)); // ['items']
 * });
 * await store.mutate(Cart, (cart) => {
 *   cart.items.push('apple');
 * });
 * ```
 */
export class TypedStateStore {
  readonly config: StateHubConfig;
  private readonly logger: Logger;
  private readonly detector: ChangeDetector;
  private readonly locks: LockPool;
  private readonly states = new Map<StateType, object>();
  private readonly currentChannels = new Map<StateType, CurrentValueChannel<object>>();
  private readonly changeChannels = new Map<StateType, ChangeEventChannel<StateChange<object>>>();
  private isDisposed = false;

  constructor(config: Partial<StateHubConfig> = {}) {
    this.config = mergeConfig(config);
    this.logger = scopedLogger(resolveLogger(this.config), 'store');
    this.detector = new ChangeDetector(strategyFor(this.config.changeDetection), this.logger);
    this.locks = new LockPool(this.config.mutationLock, 'TypedStateStore');
  }

  get disposed(): boolean {
    return this.isDisposed;
  }

  /**
   * The stored instance, default-constructed and registered on first call
   */
  get<T extends object>(type: StateType<T>): T {
    this.assertOpen('get state');
    return this.instance(type);
  }

  /**
   * Install `value` as the instance for `type` and publish it to current-value subscribers.
   * This is a reset: no change detection runs and no change event is published.
   */
  replace<T extends object>(type: StateType<T>, value: T): void {
    this.assertOpen('replace state');
    this.states.set(type, value);
    this.currentChannel(type, false)?.publish(value);
  }

  /**
   * Run `update` against the live instance under the mutation lock, then publish.
   *
   * The current value is always republished. When at least one field changed, a `StateChange`
   * is published to change subscribers and returned; otherwise the result is `null`.
   * When `replace` installed another instance while `update` ran, nothing is published and the
   * result is `null`.
   * If `update` throws or rejects, the lock is released, nothing is published and the error
   * propagates. On a disposed store the promise rejects with `DisposedError`.
   */
  async mutate<T extends object>(type: StateType<T>, update: UpdateFn<T>): Promise<StateChange<T> | null> {
    this.assertOpen('mutate state');
    return this.locks.lockFor(type).run(() => this.runMutation(type, update));
  }

  /**
   * The current value right away, then every value `replace` and `mutate` produce
   */
  observeCurrent<T extends object>(type: StateType<T>): Stream<T> {
    this.assertOpen('observe state');
    return this.currentChannel(type, true).asStream();
  }

  /**
   * Future `StateChange`s only
   */
  observeChanges<T extends object>(type: StateType<T>): Stream<StateChange<T>> {
    this.assertOpen('observe changes');
    return this.changeChannel(type, true).asStream();
  }

  /**
   * The current value as a `@tldraw/state` signal, for derived views
   */
  signal<T extends object>(type: StateType<T>): Signal<T> {
    this.assertOpen('read signal');
    return this.currentChannel(type, true).signal;
  }

  /**
   * Close every channel and release the lock pool. Later calls throw `DisposedError`.
   */
  dispose(): void {
    if (this.isDisposed) return;
    this.isDisposed = true;
    this.logger.debug(
      `Disposing store (${this.states.size} states, ${this.currentChannels.size + this.changeChannels.size} channels)`,
    );
    for (const channel of this.currentChannels.values()) channel.close();
    for (const channel of this.changeChannels.values()) channel.close();
    this.locks.dispose();
    this.currentChannels.clear();
    this.changeChannels.clear();
    this.states.clear();
  }

  private async runMutation<T extends object>(type: StateType<T>, update: UpdateFn<T>): Promise<StateChange<T> | null> {
    this.assertOpen('mutate state');
    const state = this.instance(type);
    const before = this.detector.snapshot(type, state);

    const pending = update(state);
    if (isPromiseLike(pending)) await pending;
    this.assertOpen('mutate state');
    if (this.states.get(type) !== state) {
      this.logger.debug(`${type.name} was replaced during a mutation; dropping the detached instance`);
      return null;
    }

    const changedProperties = this.detector.diff(before, state);
    this.currentChannel(type, false)?.publish(state);
    if (changedProperties.length === 0) {
      return null;
    }

    const change: StateChange<T> = Object.freeze({ state, changedProperties: Object.freeze(changedProperties) });
    this.logger.debug(`${type.name} changed: ${changedProperties.map((c) => c.propertyName).join(', ')}`);
    this.changeChannel(type, false)?.publish(change);
    return change;
  }

  // #region Registries
  // Values are written only through the typed methods below, keyed by the constructor that
  // produced them, so reading one back under its constructor's type is sound.
  private instance<T extends object>(type: StateType<T>): T {
    const existing = this.states.get(type);
    if (existing) return existing as T;

    const created = new type();
    this.states.set(type, created);
    this.logger.debug(`Registered state ${type.name}`);
    return created;
  }

  private currentChannel<T extends object>(type: StateType<T>, create: true): CurrentValueChannel<T>;
  private currentChannel<T extends object>(type: StateType<T>, create: boolean): CurrentValueChannel<T> | undefined;
  private currentChannel<T extends object>(type: StateType<T>, create: boolean): CurrentValueChannel<T> | undefined {
    const existing = this.currentChannels.get(type);
    if (existing || !create) return existing as CurrentValueChannel<T> | undefined;

    const name = `${type.name}:current`;
    const channel = new CurrentValueChannel<T>(
      name,
      this.instance(type),
      channelErrorReporter(this.logger, this.config.onHandlerError, 'store', name),
    );
    this.currentChannels.set(type, channel as CurrentValueChannel<object>);
    return channel;
  }

  private changeChannel<T extends object>(type: StateType<T>, create: true): ChangeEventChannel<StateChange<T>>;
  private changeChannel<T extends object>(
    type: StateType<T>,
    create: boolean,
  ): ChangeEventChannel<StateChange<T>> | undefined;
  private changeChannel<T extends object>(
    type: StateType<T>,
    create: boolean,
  ): ChangeEventChannel<StateChange<T>> | undefined {
    const existing = this.changeChannels.get(type);
    if (existing || !create) return existing as ChangeEventChannel<StateChange<T>> | undefined;

    const name = `${type.name}:changes`;
    const channel = new ChangeEventChannel<StateChange<T>>(
      name,
      channelErrorReporter(this.logger, this.config.onHandlerError, 'store', name),
    );
    this.changeChannels.set(type, channel as ChangeEventChannel<StateChange<object>>);
    return channel;
  }
  // #endregion

  private assertOpen(operation: string): void {
    if (this.isDisposed) {
      throw new DisposedError('TypedStateStore', operation);
    }
  }
}
