import { describe, expect, it } from 'vitest';
import { computed, computedPropsString, sortedKeyValuePairs, TypedStateStore } from '../src/index.js';

class Cart {
  items: string[] = [];
}

class Pricing {
  unit = 2;
}

describe('computed', () => {
  it('should recompute after mutate and replace of a type it read', async () => {
    const store = new TypedStateStore();
    const total = computed(store, 'total', (read) => read(Cart).items.length * read(Pricing).unit, undefined);
    expect(total.get()).toBe(0);

    await store.mutate(Cart, (cart) => {
      cart.items.push('apple');
    });
    expect(total.get()).toBe(2);

    const pricing = new Pricing();
    pricing.unit = 5;
    store.replace(Pricing, pricing);
    expect(total.get()).toBe(5);
  });

  it('should name the signal after the view and its props', () => {
    const store = new TypedStateStore();
    const view = computed(store, 'badge', (_read, props) => props.a + props.b, { b: 2, a: 1 });
    expect(view.name).toBe('badge:a=1,b=2');
    expect(view.get()).toBe(3);
  });
});

describe('computedPropsString', () => {
  it('should render each kind of props', () => {
    expect(computedPropsString(undefined)).toBe('');
    expect(computedPropsString(null)).toBe('');
    expect(computedPropsString(5)).toBe('5');
    expect(computedPropsString({ z: 'last', a: null })).toBe('a=undefined,z=last');
  });

  it('should sort key-value pairs by key', () => {
    expect(sortedKeyValuePairs({ b: 1, a: 2 })).toEqual([
      ['a', 2],
      ['b', 1],
    ]);
  });
});
