import { describe, expect, it } from 'vitest';
import { type StateChange, StateConsumer, StateHub } from '../src/index.js';

class Cart {
  items: string[] = [];
}

class ItemAdded {
  constructor(readonly sku: string) {}
}

describe('StateConsumer', () => {
  it('should observe the current value and later values', async () => {
    const consumer = new StateConsumer(new StateHub());
    const sizes: number[] = [];
    consumer.observe(Cart, (cart) => sizes.push(cart.items.length));

    await consumer.mutate(Cart, (cart) => {
      cart.items.push('apple');
    });

    expect(sizes).toEqual([0, 1]);
    expect(consumer.state(Cart).items).toEqual(['apple']);
  });

  it('should release every subscription on dispose and leaves the hub usable', async () => {
    const hub = new StateHub();
    const consumer = new StateConsumer(hub);
    const sizes: number[] = [];
    const skus: string[] = [];
    consumer.observe(Cart, (cart) => sizes.push(cart.items.length));
    consumer.on(ItemAdded, (event) => skus.push(event.sku));
    expect(consumer.size).toBe(2);

    consumer.dispose();
    consumer.dispose();

    expect(consumer.disposed).toBe(true);
    expect(consumer.size).toBe(0);
    await hub.store.mutate(Cart, (cart) => {
      cart.items.push('apple');
    });
    hub.bus.publish(new ItemAdded('apple'));
    expect(sizes).toEqual([0]);
    expect(skus).toEqual([]);
    expect(hub.disposed).toBe(false);
  });

  it('should not subscribe once disposed', () => {
    const hub = new StateHub();
    const consumer = new StateConsumer(hub);
    const sizes: number[] = [];
    const skus: string[] = [];
    consumer.dispose();

    const release = consumer.observe(Cart, (cart) => sizes.push(cart.items.length));
    consumer.on(ItemAdded, (event) => skus.push(event.sku));
    release();
    hub.bus.publish(new ItemAdded('apple'));

    expect(sizes).toEqual([]);
    expect(skus).toEqual([]);
    expect(consumer.size).toBe(0);
    expect(hub.bus.subscriberCount(ItemAdded)).toBe(0);
  });

  it('should filter handlers by predicate', () => {
    const consumer = new StateConsumer(new StateHub());
    const skus: string[] = [];
    consumer.on(
      ItemAdded,
      (event) => skus.push(event.sku),
      (event) => event.sku.startsWith('a'),
    );

    consumer.publish(new ItemAdded('apple'));
    consumer.publish(new ItemAdded('pear'));

    expect(skus).toEqual(['apple']);
  });

  it('should track external subscriptions and releases them early on request', () => {
    const hub = new StateHub();
    const consumer = new StateConsumer(hub);
    const skus: string[] = [];
    const release = consumer.track(hub.bus.subscribeAction(ItemAdded, (event) => skus.push(event.sku)));
    expect(consumer.size).toBe(1);

    release();

    expect(consumer.size).toBe(0);
    hub.bus.publish(new ItemAdded('apple'));
    expect(skus).toEqual([]);
  });

  it('should release a subscription tracked after dispose right away', () => {
    const hub = new StateHub();
    const consumer = new StateConsumer(hub);
    consumer.dispose();

    consumer.track(hub.bus.subscribeAction(ItemAdded, () => {}));

    expect(hub.bus.subscriberCount(ItemAdded)).toBe(0);
  });

  it('should let consumers of one hub coordinate through events and state', async () => {
    const hub = new StateHub();
    const ui = new StateConsumer(hub);
    const cartService = new StateConsumer(hub);
    const pending: Promise<unknown>[] = [];
    const changes: StateChange<Cart>[] = [];

    cartService.on(ItemAdded, (event) => {
      pending.push(
        cartService.mutate(Cart, (cart) => {
          cart.items.push(event.sku);
        }),
      );
    });
    ui.onChange(Cart, (change) => changes.push(change));

    ui.publish(new ItemAdded('apple'));
    await Promise.all(pending);

    expect(changes).toHaveLength(1);
    expect(changes[0]?.changedProperties).toEqual([{ propertyName: 'items', oldValue: [], newValue: ['apple'] }]);
  });

  it('should replace state through the hub', () => {
    const hub = new StateHub();
    const consumer = new StateConsumer(hub);
    const next = new Cart();
    consumer.replace(Cart, next);
    expect(hub.store.get(Cart)).toBe(next);
  });
});
