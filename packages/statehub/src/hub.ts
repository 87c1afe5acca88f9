import { EventBus, mergeConfig, type StateHubConfig, TypedStateStore } from 'statehub-core';

/**
 * One state store and one event bus sharing a configuration
 */
export class StateHub {
  readonly config: StateHubConfig;
  readonly store: TypedStateStore;
  readonly bus: EventBus;

  constructor(config: Partial<StateHubConfig> = {}) {
    this.config = mergeConfig(config);
    this.store = new TypedStateStore(this.config);
    this.bus = new EventBus(this.config);
  }

  get disposed(): boolean {
    return this.store.disposed && this.bus.disposed;
  }

  /** Dispose the store and the bus. Safe to call more than once. */
  dispose(): void {
    this.store.dispose();
    this.bus.dispose();
  }
}
