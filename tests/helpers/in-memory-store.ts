import type { ItemStore } from '../../src/repositories/item.repository';
import type { Item } from '../../src/types/item.types';
import { StoreError } from '../../src/types/error.types';

/**
 * In-process ItemStore for tests. Keeps deep copies so tests can compare
 * what was saved with what the engine holds.
 */
export class InMemoryItemStore implements ItemStore {
  saved: Item[];
  saveCount = 0;
  loadCount = 0;
  failSaves = false;
  failLoads = false;

  constructor(initial: Item[] = []) {
    this.saved = initial.map(clone);
  }

  async load(): Promise<Item[]> {
    this.loadCount += 1;
    if (this.failLoads) throw new StoreError('Failed to load checklist items: store offline');
    return this.saved.map(clone);
  }

  async save(items: readonly Item[]): Promise<void> {
    this.saveCount += 1;
    if (this.failSaves) throw new StoreError('Failed to save checklist items: store offline');
    this.saved = items.map(clone);
  }

  names(): string[] {
    return [...this.saved].sort((a, b) => a.order - b.order).map((item) => item.name);
  }
}

export function clone(item: Item): Item {
  return { ...item, createdAt: new Date(item.createdAt.getTime()) };
}

export function makeItem(overrides: Partial<Item> & Pick<Item, 'id' | 'name'>): Item {
  return {
    quantity: 1,
    isCompleted: false,
    order: 0,
    createdAt: new Date('2024-01-01T00:00:00.000Z'),
    ...overrides,
  };
}
