import { type Computed, computed as computedSignal } from '@tldraw/state';

import type { TypedStateStore } from './store.js';
import type { StateType } from './types.js';

export type ViewPrimitiveProp = undefined | null | string | number;

export type ViewProps = never | ViewPrimitiveProp | Record<string, ViewPrimitiveProp>;

/** Reads a state instance and records it as a dependency of the view */
export type ViewReader = <T extends object>(type: StateType<T>) => T;

export type ViewFunction<Props extends ViewProps, R> = (read: ViewReader, props: Props) => R;

export function sortedKeyValuePairs(props: Record<string, ViewPrimitiveProp>): [string, ViewPrimitiveProp][] {
  return Object.entries(props).sort(([k1], [k2]) => k1.localeCompare(k2));
}

export function computedPropsString(props: ViewProps): string {
  if (props === undefined || props === null) {
    return '';
  }
  if (typeof props === 'string' || typeof props === 'number') {
    return props.toString();
  }
  return sortedKeyValuePairs(props)
    .map(([k, v]) => `${k}=${v?.toString()}`)
    .join(',');
}

/**
 * A value derived from one or more state types. It recomputes lazily, the next time it is read
 * after a `replace` or `mutate` of any type it read last time.
 *
 * @example
 * ```ts
 * const itemCount = computed(store, 'itemCount', (read) => read(Cart).items.length, undefined);
 * itemCount.get(); // 0
 * await store.mutate(Cart, (cart) => {
 *   cart.items.push('apple');
 * });
 * itemCount.get(); // 1
 * ```
 */
export function computed<Props extends ViewProps, R>(
  store: TypedStateStore,
  viewId: string,
  view: ViewFunction<Props, R>,
  props: Props,
): Computed<R> {
  // Make a unique name for the computed signal based on the viewId and props
  const name = `${viewId}${props ? `:${computedPropsString(props)}` : ''}`;
  const read: ViewReader = (type) => store.signal(type).get();
  return computedSignal(name, () => view(read, props));
}
