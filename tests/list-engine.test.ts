import { describe, it, expect, beforeEach } from 'vitest';
import { ListEngine } from '../src/services/list-engine';
import { normalizeName } from '../src/utils/bulk-text';
import { MAX_QUANTITY, type Item } from '../src/types/item.types';
import { makeItem } from './helpers/in-memory-store';

const TOP = { insertAtTop: true };
const BOTTOM = { insertAtTop: false };

function createEngine(initial: Item[] = []): ListEngine {
  let next = 0;
  return new ListEngine(initial, {
    generateId: () => `item-${++next}`,
    now: () => new Date('2024-05-01T10:00:00.000Z'),
  });
}

function names(engine: ListEngine): string[] {
  return engine.list().map((item) => item.name);
}

function orders(engine: ListEngine): number[] {
  return engine.list().map((item) => item.order);
}

function idOf(engine: ListEngine, name: string): string {
  const item = engine.list().find((candidate) => candidate.name === name);
  if (!item) throw new Error(`No item named ${name}`);
  return item.id;
}

describe('ListEngine', () => {
  let engine: ListEngine;

  beforeEach(() => {
    engine = createEngine();
  });

  describe('addItem', () => {
    it('creates an item with defaults', () => {
      const result = engine.addItem('  Milk ', BOTTOM);

      expect(result).toEqual({
        status: 'added',
        item: {
          id: 'item-1',
          name: 'Milk',
          quantity: 1,
          isCompleted: false,
          order: 0,
          createdAt: new Date('2024-05-01T10:00:00.000Z'),
        },
      });
    });

    it('skips empty names', () => {
      expect(engine.addItem('   ', BOTTOM)).toEqual({ status: 'skipped', reason: 'empty' });
      expect(engine.size).toBe(0);
    });

    it('skips names that match ignoring case and whitespace', () => {
      engine.addItem('Milk', BOTTOM);

      expect(engine.addItem(' mILK  ', BOTTOM)).toEqual({ status: 'skipped', reason: 'duplicate' });
      expect(names(engine)).toEqual(['Milk']);
    });

    it('appends when insertAtTop is off', () => {
      engine.addItem('A', BOTTOM);
      engine.addItem('B', BOTTOM);
      engine.addItem('C', BOTTOM);

      expect(names(engine)).toEqual(['A', 'B', 'C']);
      expect(orders(engine)).toEqual([0, 1, 2]);
    });

    it('inserts at the top when insertAtTop is on', () => {
      engine.addItem('A', TOP);
      engine.addItem('B', TOP);
      engine.addItem('C', TOP);

      expect(names(engine)).toEqual(['C', 'B', 'A']);
      expect(orders(engine)).toEqual([0, 1, 2]);
    });

    it('mixes placements within one list', () => {
      engine.addItem('A', BOTTOM);
      engine.addItem('B', TOP);
      engine.addItem('C', BOTTOM);

      expect(names(engine)).toEqual(['B', 'A', 'C']);
    });

    it('never holds two names equal after normalization', () => {
      for (const name of ['Eggs', 'eggs', ' EGGS', 'Bread', 'bread ', 'Jam', '', 'jam']) {
        engine.addItem(name, TOP);
      }

      const keys = engine.list().map((item) => normalizeName(item.name));
      expect(new Set(keys).size).toBe(keys.length);
      expect(names(engine)).toEqual(['Jam', 'Bread', 'Eggs']);
    });
  });

  describe('addMultiple', () => {
    it('drops duplicates of existing items and within the batch', () => {
      engine.addItem('milk', BOTTOM);

      const result = engine.addMultiple(['Milk', 'Bread', 'Bread']);

      expect(result.addedCount).toBe(1);
      expect(result.added.map((item) => item.name)).toEqual(['Bread']);
      expect(names(engine)).toEqual(['milk', 'Bread']);
    });

    it('keeps the first spelling of a name repeated in a batch', () => {
      const result = engine.addMultiple(['Tea', ' TEA ', 'tea']);

      expect(result.added.map((item) => item.name)).toEqual(['Tea']);
    });

    it('appends in input order after existing items', () => {
      engine.addItem('A', BOTTOM);
      engine.addMultiple(['  B', '', 'C  ', '   ']);

      expect(names(engine)).toEqual(['A', 'B', 'C']);
      expect(orders(engine)).toEqual([0, 1, 2]);
    });

    it('appends even after top inserts', () => {
      engine.addItem('A', TOP);
      engine.addItem('B', TOP);
      engine.addMultiple(['C', 'D']);

      expect(names(engine)).toEqual(['B', 'A', 'C', 'D']);
    });

    it('reports nothing added for an empty batch', () => {
      expect(engine.addMultiple([])).toEqual({ addedCount: 0, added: [] });
    });
  });

  describe('toggleCompletion', () => {
    it('flips the completion flag', () => {
      engine.addItem('Milk', BOTTOM);

      const first = engine.toggleCompletion('item-1');
      const second = engine.toggleCompletion('item-1');

      expect(first.status === 'updated' && first.item.isCompleted).toBe(true);
      expect(second.status === 'updated' && second.item.isCompleted).toBe(false);
    });

    it('reports unknown ids', () => {
      expect(engine.toggleCompletion('missing')).toEqual({ status: 'not_found' });
    });
  });

  describe('updateQuantity', () => {
    it('applies positive and negative deltas', () => {
      engine.addItem('Eggs', BOTTOM);

      engine.updateQuantity('item-1', 3);
      const result = engine.updateQuantity('item-1', -2);

      expect(result.status).toBe('updated');
      expect(engine.findById('item-1')?.quantity).toBe(2);
    });

    it('rejects a decrement past 1', () => {
      engine.addItem('Eggs', BOTTOM);

      const result = engine.updateQuantity('item-1', -1);

      expect(result.status).toBe('rejected');
      expect(engine.findById('item-1')?.quantity).toBe(1);
    });

    it('rejects rather than clamps a large decrement', () => {
      engine.addItem('Eggs', BOTTOM);
      engine.updateQuantity('item-1', 4);

      expect(engine.updateQuantity('item-1', -10).status).toBe('rejected');
      expect(engine.findById('item-1')?.quantity).toBe(5);
    });

    it('rejects an increment past the maximum quantity', () => {
      engine.addItem('Eggs', BOTTOM);
      engine.updateQuantity('item-1', MAX_QUANTITY - 1);

      expect(engine.updateQuantity('item-1', 1).status).toBe('rejected');
      expect(engine.updateQuantity('item-1', 1e300).status).toBe('rejected');
      expect(engine.findById('item-1')?.quantity).toBe(MAX_QUANTITY);
    });

    it('reports unknown ids', () => {
      expect(engine.updateQuantity('missing', 1)).toEqual({ status: 'not_found' });
    });
  });

  describe('renameItem', () => {
    it('renames and trims', () => {
      engine.addItem('Milk', BOTTOM);

      const result = engine.renameItem('item-1', '  Oat milk ');

      expect(result.status === 'updated' && result.item.name).toBe('Oat milk');
    });

    it('does not re-check uniqueness', () => {
      engine.addItem('Milk', BOTTOM);
      engine.addItem('Bread', BOTTOM);

      expect(engine.renameItem('item-2', 'milk').status).toBe('updated');
      expect(names(engine)).toEqual(['Milk', 'milk']);
    });

    it('skips empty names', () => {
      engine.addItem('Milk', BOTTOM);

      expect(engine.renameItem('item-1', '  ')).toEqual({ status: 'skipped', reason: 'empty' });
      expect(names(engine)).toEqual(['Milk']);
    });

    it('reports unknown ids', () => {
      expect(engine.renameItem('missing', 'x')).toEqual({ status: 'not_found' });
    });
  });

  describe('deleteItems', () => {
    it('renumbers survivors densely in their previous order', () => {
      engine.addMultiple(['A', 'B', 'C', 'D']);

      const removed = engine.deleteItems([idOf(engine, 'B')]);

      expect(removed.map((item) => item.name)).toEqual(['B']);
      expect(names(engine)).toEqual(['A', 'C', 'D']);
      expect(orders(engine)).toEqual([0, 1, 2]);
    });

    it('removes several ids and ignores unknown ones', () => {
      engine.addMultiple(['A', 'B', 'C', 'D']);

      const removed = engine.deleteItems(new Set([idOf(engine, 'A'), idOf(engine, 'D'), 'missing']));

      expect(removed).toHaveLength(2);
      expect(names(engine)).toEqual(['B', 'C']);
      expect(orders(engine)).toEqual([0, 1]);
    });

    it('returns nothing when no id matches', () => {
      engine.addItem('A', BOTTOM);

      expect(engine.deleteItems(['missing'])).toEqual([]);
      expect(engine.size).toBe(1);
    });
  });

  describe('deleteAt', () => {
    it('deletes by display position', () => {
      engine.addMultiple(['A', 'B', 'C', 'D']);

      const removed = engine.deleteAt([3, 1, 9, -1]);

      expect(removed.map((item) => item.name)).toEqual(['B', 'D']);
      expect(names(engine)).toEqual(['A', 'C']);
      expect(orders(engine)).toEqual([0, 1]);
    });
  });

  describe('moveItem', () => {
    it('moves the last item to the front and shifts the rest by one', () => {
      engine.addMultiple(['A', 'B', 'C', 'D', 'E']);

      const result = engine.moveItem(4, 0);

      expect(result.status === 'moved' && result.item).toMatchObject({ name: 'E', order: 0 });
      expect(names(engine)).toEqual(['E', 'A', 'B', 'C', 'D']);
      expect(orders(engine)).toEqual([0, 1, 2, 3, 4]);
    });

    it('moves an item down', () => {
      engine.addMultiple(['A', 'B', 'C', 'D']);

      engine.moveItem(0, 2);

      expect(names(engine)).toEqual(['B', 'C', 'A', 'D']);
      expect(orders(engine)).toEqual([0, 1, 2, 3]);
    });

    it('treats a move onto itself as a no-op reorder', () => {
      engine.addMultiple(['A', 'B']);

      expect(engine.moveItem(1, 1).status).toBe('moved');
      expect(names(engine)).toEqual(['A', 'B']);
    });

    it.each([
      [-1, 0],
      [0, 3],
      [3, 0],
      [0.5, 1],
    ])('rejects move(%s, %s) on a 3-item list without changing it', (from, to) => {
      engine.addMultiple(['A', 'B', 'C']);

      expect(engine.moveItem(from, to)).toEqual({ status: 'out_of_range' });
      expect(names(engine)).toEqual(['A', 'B', 'C']);
    });

    it('rejects any move on an empty list', () => {
      expect(engine.moveItem(0, 0)).toEqual({ status: 'out_of_range' });
    });
  });

  describe('deleteAll', () => {
    it('empties the list and returns the count', () => {
      engine.addMultiple(['A', 'B', 'C']);

      expect(engine.deleteAll()).toBe(3);
      expect(engine.list()).toEqual([]);
    });
  });

  describe('ordering invariant', () => {
    it('keeps order dense across a mixed sequence of operations', () => {
      engine.addItem('A', BOTTOM);
      engine.addItem('B', TOP);
      engine.addMultiple(['C', 'D', 'E']);
      engine.moveItem(4, 1);
      engine.deleteItems([idOf(engine, 'A')]);
      engine.addItem('F', TOP);
      engine.deleteAt([2]);
      engine.moveItem(0, 3);

      expect(names(engine)).toEqual(['B', 'C', 'D', 'F']);
      expect(orders(engine)).toEqual([0, 1, 2, 3]);
    });
  });

  describe('hydration', () => {
    it('sorts stored items and closes gaps and ties', () => {
      const stored = [
        makeItem({ id: 'c', name: 'C', order: 7 }),
        makeItem({ id: 'a', name: 'A', order: 2, createdAt: new Date('2024-01-02T00:00:00.000Z') }),
        makeItem({ id: 'b', name: 'B', order: 2, createdAt: new Date('2024-01-03T00:00:00.000Z') }),
      ];

      const hydrated = createEngine(stored);

      expect(names(hydrated)).toEqual(['A', 'B', 'C']);
      expect(orders(hydrated)).toEqual([0, 1, 2]);
      expect(stored.map((item) => item.order)).toEqual([7, 2, 2]);
    });
  });

  it('hands out copies that do not alias engine state', () => {
    engine.addItem('Milk', BOTTOM);

    const [listed] = engine.list();
    if (listed) listed.name = 'Changed';

    expect(names(engine)).toEqual(['Milk']);
  });
});
