import { randomUUID } from 'crypto';
import {
  Item,
  AddItemOptions,
  AddItemResult,
  AddMultipleResult,
  ItemUpdateResult,
  QuantityUpdateResult,
  RenameResult,
  MoveResult,
  MAX_QUANTITY,
} from '../types/item.types';
import { normalizeName } from '../utils/bulk-text';

export interface ListEngineOptions {
  generateId?: () => string;
  now?: () => Date;
}

/**
 * List Engine
 *
 * In-memory ordered checklist. Owns deduplication, the quantity floor and
 * dense ordering: after every structural change `order` runs 0..N-1 in
 * display order. Nothing here touches storage; callers persist `list()`.
 */
export class ListEngine {
  // Kept in display order at all times
  private items: Item[];
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(initial: readonly Item[] = [], options: ListEngineOptions = {}) {
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());

    // Stored records may carry gaps or ties from an earlier failed save
    this.items = initial
      .map((item) => ({ ...item }))
      .sort((a, b) => a.order - b.order || a.createdAt.getTime() - b.createdAt.getTime());
    this.resequence();
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Items in display order (copies)
   */
  list(): Item[] {
    return this.items.map(copy);
  }

  findById(id: string): Item | null {
    const item = this.items.find((candidate) => candidate.id === id);
    return item ? copy(item) : null;
  }

  hasName(name: string): boolean {
    const key = normalizeName(name);
    return this.items.some((item) => normalizeName(item.name) === key);
  }

  addItem(rawName: string, options: AddItemOptions): AddItemResult {
    const name = rawName.trim();
    if (!name) return { status: 'skipped', reason: 'empty' };
    if (this.hasName(name)) return { status: 'skipped', reason: 'duplicate' };

    const item = this.createItem(name);

    if (options.insertAtTop) {
      for (const existing of this.items) {
        existing.order += 1;
      }
      item.order = 0;
      this.items.unshift(item);
    } else {
      item.order = this.items.length;
      this.items.push(item);
    }

    this.resequence();
    return { status: 'added', item: copy(item) };
  }

  /**
   * Add a batch of names at the tail, in input order.
   *
   * Duplicates are dropped against existing items and against names
   * accepted earlier in the same batch (first occurrence wins).
   */
  addMultiple(rawNames: readonly string[]): AddMultipleResult {
    const seen = new Set(this.items.map((item) => normalizeName(item.name)));
    const added: Item[] = [];

    for (const rawName of rawNames) {
      const name = rawName.trim();
      if (!name) continue;

      const key = normalizeName(name);
      if (seen.has(key)) continue;
      seen.add(key);

      const item = this.createItem(name);
      item.order = this.items.length;
      this.items.push(item);
      added.push(item);
    }

    this.resequence();
    return { addedCount: added.length, added: added.map(copy) };
  }

  toggleCompletion(id: string): ItemUpdateResult {
    const item = this.items.find((candidate) => candidate.id === id);
    if (!item) return { status: 'not_found' };

    item.isCompleted = !item.isCompleted;
    return { status: 'updated', item: copy(item) };
  }

  updateQuantity(id: string, delta: number): QuantityUpdateResult {
    const item = this.items.find((candidate) => candidate.id === id);
    if (!item) return { status: 'not_found' };

    const quantity = item.quantity + delta;
    if (!Number.isSafeInteger(quantity) || quantity <= 0 || quantity > MAX_QUANTITY) {
      return { status: 'rejected', item: copy(item) };
    }

    item.quantity = quantity;
    return { status: 'updated', item: copy(item) };
  }

  // Rename does not re-check uniqueness against other items
  renameItem(id: string, newName: string): RenameResult {
    const item = this.items.find((candidate) => candidate.id === id);
    if (!item) return { status: 'not_found' };

    const name = newName.trim();
    if (!name) return { status: 'skipped', reason: 'empty' };

    item.name = name;
    return { status: 'updated', item: copy(item) };
  }

  /**
   * Remove items by id. Survivors keep their relative order.
   */
  deleteItems(ids: Iterable<string>): Item[] {
    const doomed = new Set(ids);
    const removed = this.items.filter((item) => doomed.has(item.id));
    if (removed.length === 0) return [];

    this.items = this.items.filter((item) => !doomed.has(item.id));
    this.resequence();
    return removed.map(copy);
  }

  /**
   * Remove items by display position. Positions outside the list are ignored.
   */
  deleteAt(positions: Iterable<number>): Item[] {
    const ids: string[] = [];
    for (const position of positions) {
      const item = Number.isInteger(position) ? this.items[position] : undefined;
      if (item) ids.push(item.id);
    }
    return this.deleteItems(ids);
  }

  moveItem(fromIndex: number, toIndex: number): MoveResult {
    if (!this.isValidIndex(fromIndex) || !this.isValidIndex(toIndex)) {
      return { status: 'out_of_range' };
    }

    const [item] = this.items.splice(fromIndex, 1);
    if (!item) return { status: 'out_of_range' };
    this.items.splice(toIndex, 0, item);

    this.resequence();
    return { status: 'moved', item: copy(item), items: this.list() };
  }

  deleteAll(): number {
    const count = this.items.length;
    this.items = [];
    return count;
  }

  private isValidIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.items.length;
  }

  private createItem(name: string): Item {
    return {
      id: this.generateId(),
      name,
      quantity: 1,
      isCompleted: false,
      order: 0,
      createdAt: this.now(),
    };
  }

  /**
   * Reassign `order := position` for every item
   */
  private resequence(): void {
    this.items.forEach((item, index) => {
      item.order = index;
    });
  }
}

function copy(item: Item): Item {
  return { ...item, createdAt: new Date(item.createdAt.getTime()) };
}
