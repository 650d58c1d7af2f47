/**
 * Item Store
 * @module bench-app/item-store
 *
 * In-memory fixture store behind the sample service's read/write routes.
 * Seeding is idempotent: a populated store is left untouched.
 */

export interface Item {
  readonly id: number;
  readonly name: string;
  readonly value: number;
}

export const SEED_ITEM_COUNT = 2000;

export class ItemStore {
  private readonly items = new Map<number, Item>();

  /**
   * Insert the fixture items if the store is empty
   *
   * @returns the number of items inserted
   */
  seed(count: number = SEED_ITEM_COUNT): number {
    if (this.items.size > 0) {
      return 0;
    }
    for (let id = 1; id <= count; id++) {
      this.items.set(id, { id, name: `item-${id}`, value: id });
    }
    return count;
  }

  get(id: number): Item | undefined {
    return this.items.get(id);
  }

  /**
   * Bump an item's value and mark it updated
   */
  increment(id: number): Item | undefined {
    const current = this.items.get(id);
    if (!current) {
      return undefined;
    }
    const updated: Item = { id, name: `item-${id}-updated`, value: current.value + 1 };
    this.items.set(id, updated);
    return updated;
  }

  get size(): number {
    return this.items.size;
  }
}
