/**
 * Item Store Tests
 * @module tests/unit/bench-app/item-store
 */

import { describe, it, expect } from 'vitest';
import { ItemStore, SEED_ITEM_COUNT } from '../../../src/bench-app/item-store.js';

describe('ItemStore', () => {
  it('should seed the fixture items once', () => {
    const store = new ItemStore();

    expect(store.seed()).toBe(SEED_ITEM_COUNT);
    expect(store.seed()).toBe(0);
    expect(store.size).toBe(2000);
    expect(store.get(1)).toEqual({ id: 1, name: 'item-1', value: 1 });
  });

  it('should increment an existing item', () => {
    const store = new ItemStore();
    store.seed(3);

    expect(store.increment(2)).toEqual({ id: 2, name: 'item-2-updated', value: 3 });
    expect(store.increment(2)).toEqual({ id: 2, name: 'item-2-updated', value: 4 });
  });

  it('should return undefined for an unknown item', () => {
    const store = new ItemStore();
    store.seed(3);

    expect(store.get(4)).toBeUndefined();
    expect(store.increment(4)).toBeUndefined();
  });
});
