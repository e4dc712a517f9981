import { ListEngine, type ListEngineOptions } from './list-engine';
import type { ItemStore } from '../repositories/item.repository';
import type {
  Item,
  AddItemResult,
  AddMultipleResult,
  EntryResult,
  ItemUpdateResult,
} from '../types/item.types';
import { MAX_NAME_LENGTH } from '../types/item.types';
import { AppError, ErrorCode, StoreError } from '../types/error.types';
import { createComponentLogger } from '../config/logger';
import { containsBulkDelimiter, parseBulkText } from '../utils/bulk-text';

const log = createComponentLogger('checklist-service');

/**
 * What happened to durable state after an operation:
 * - saved: the store accepted the new list
 * - unchanged: nothing was mutated, so nothing was saved
 * - failed: memory was mutated but the store rejected it
 */
export type Persistence = 'saved' | 'unchanged' | 'failed';

export interface MutationOutcome<T> {
  result: T;
  persistence: Persistence;
}

export interface QuantityChange {
  item: Item;
  applied: boolean;
}

export interface ChecklistServiceOptions {
  // Default placement for single adds when the caller does not choose
  insertAtTop: boolean;
  engine?: ListEngineOptions;
}

export interface ChecklistStatus {
  loaded: boolean;
  itemCount: number;
  unsavedChanges: number;
}

interface Applied<T> {
  result: T;
  changed: boolean;
}

/**
 * Checklist Service
 *
 * Engine boundary. Loads the list from the store once, runs operations one
 * at a time and saves the full list after every mutation. A failed save is
 * logged and the in-memory state is kept; the next successful save catches
 * the store up.
 */
export class ChecklistService {
  private engine: ListEngine | null = null;
  private queue: Promise<void> = Promise.resolve();
  private unsavedChanges = 0;

  constructor(
    private store: ItemStore,
    private options: ChecklistServiceOptions
  ) {}

  async listItems(): Promise<Item[]> {
    return this.enqueue(async () => (await this.getEngine()).list());
  }

  async getItem(id: string): Promise<Item> {
    const item = await this.enqueue(async () => (await this.getEngine()).findById(id));
    if (!item) throw notFound(id);
    return item;
  }

  async addItem(rawName: string, insertAtTop?: boolean): Promise<MutationOutcome<AddItemResult>> {
    const placeAtTop = insertAtTop ?? this.options.insertAtTop;
    if (!withinNameLimit(rawName)) {
      throw new AppError(
        ErrorCode.VALIDATION_ERROR,
        `Name must be at most ${MAX_NAME_LENGTH} characters`,
        400
      );
    }
    log.info('Adding item', { nameLength: rawName.length, insertAtTop: placeAtTop });

    return this.mutate('addItem', (engine) => {
      const result = engine.addItem(rawName, { insertAtTop: placeAtTop });
      if (result.status === 'skipped') {
        log.debug('Item skipped', { reason: result.reason });
      } else {
        log.debug('Item added', { id: result.item.id });
      }
      return { result, changed: result.status === 'added' };
    });
  }

  /**
   * Bulk add. Always appends; one save for the whole batch.
   * Names longer than MAX_NAME_LENGTH are dropped.
   */
  async addMultiple(rawNames: readonly string[]): Promise<MutationOutcome<AddMultipleResult>> {
    const names = rawNames.filter(withinNameLimit);
    log.info('Adding multiple items', {
      submitted: rawNames.length,
      tooLong: rawNames.length - names.length,
    });

    return this.mutate('addMultiple', (engine) => {
      const result = engine.addMultiple(names);
      return { result, changed: result.addedCount > 0 };
    });
  }

  async addFromText(text: string): Promise<MutationOutcome<AddMultipleResult>> {
    return this.addMultiple(parseBulkText(text));
  }

  /**
   * Free-typed entry: text holding a newline or comma takes the bulk path
   */
  async submitEntry(text: string, insertAtTop?: boolean): Promise<MutationOutcome<EntryResult>> {
    if (containsBulkDelimiter(text)) {
      const outcome = await this.addFromText(text);
      return { ...outcome, result: { mode: 'bulk', result: outcome.result } };
    }

    const outcome = await this.addItem(text, insertAtTop);
    return { ...outcome, result: { mode: 'single', result: outcome.result } };
  }

  parseBulkText(text: string): string[] {
    return parseBulkText(text);
  }

  async toggleCompletion(id: string): Promise<MutationOutcome<Item>> {
    const outcome = await this.mutate('toggleCompletion', (engine) => {
      const result = engine.toggleCompletion(id);
      return { result, changed: result.status === 'updated' };
    });
    return { ...outcome, result: requireItem(outcome.result, id) };
  }

  async updateQuantity(id: string, delta: number): Promise<MutationOutcome<QuantityChange>> {
    const outcome = await this.mutate('updateQuantity', (engine) => {
      const result = engine.updateQuantity(id, delta);
      return { result, changed: result.status === 'updated' };
    });

    const { result } = outcome;
    if (result.status === 'not_found') throw notFound(id);
    if (result.status === 'rejected') {
      log.debug('Quantity change rejected out of range', { id, delta, quantity: result.item.quantity });
    }

    return { ...outcome, result: { item: result.item, applied: result.status === 'updated' } };
  }

  async renameItem(id: string, newName: string): Promise<MutationOutcome<Item>> {
    const outcome = await this.mutate('renameItem', (engine) => {
      const result = engine.renameItem(id, newName);
      return { result, changed: result.status === 'updated' };
    });

    const { result } = outcome;
    if (result.status === 'skipped') {
      throw new AppError(ErrorCode.VALIDATION_ERROR, 'Item name cannot be empty', 400);
    }
    return { ...outcome, result: requireItem(result, id) };
  }

  async deleteItems(ids: readonly string[]): Promise<MutationOutcome<Item[]>> {
    return this.mutate('deleteItems', (engine) => {
      const removed = engine.deleteItems(ids);
      return { result: removed, changed: removed.length > 0 };
    });
  }

  async deleteItem(id: string): Promise<MutationOutcome<Item>> {
    const outcome = await this.deleteItems([id]);
    const [removed] = outcome.result;
    if (!removed) throw notFound(id);
    return { ...outcome, result: removed };
  }

  async deleteAt(positions: readonly number[]): Promise<MutationOutcome<Item[]>> {
    return this.mutate('deleteAt', (engine) => {
      const removed = engine.deleteAt(positions);
      return { result: removed, changed: removed.length > 0 };
    });
  }

  async moveItem(fromIndex: number, toIndex: number): Promise<MutationOutcome<Item[]>> {
    const outcome = await this.mutate('moveItem', (engine) => {
      const result = engine.moveItem(fromIndex, toIndex);
      return { result, changed: result.status === 'moved' };
    });

    const { result } = outcome;
    if (result.status === 'out_of_range') {
      throw new AppError(
        ErrorCode.INDEX_OUT_OF_RANGE,
        `Cannot move from index ${fromIndex} to ${toIndex}`,
        400,
        { fromIndex, toIndex }
      );
    }
    return { ...outcome, result: result.items };
  }

  async deleteAll(): Promise<MutationOutcome<number>> {
    log.warn('Deleting all items');

    return this.mutate('deleteAll', (engine) => {
      const removed = engine.deleteAll();
      return { result: removed, changed: removed > 0 };
    });
  }

  getStatus(): ChecklistStatus {
    return {
      loaded: this.engine !== null,
      itemCount: this.engine?.size ?? 0,
      unsavedChanges: this.unsavedChanges,
    };
  }

  private async mutate<T>(
    operation: string,
    apply: (engine: ListEngine) => Applied<T>
  ): Promise<MutationOutcome<T>> {
    return this.enqueue<MutationOutcome<T>>(async () => {
      const engine = await this.getEngine();
      const { result, changed } = apply(engine);

      if (!changed) {
        return { result, persistence: 'unchanged' };
      }

      const persistence = await this.persist(engine, operation);
      return { result, persistence };
    });
  }

  /**
   * Run `task` after every previously queued task has settled
   */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // Failures reach the caller through `run`; the queue only tracks completion
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async getEngine(): Promise<ListEngine> {
    if (this.engine) return this.engine;

    try {
      const items = await this.store.load();
      this.engine = new ListEngine(items, this.options.engine);
      log.info('Checklist loaded', { itemCount: items.length });
      return this.engine;
    } catch (error) {
      if (error instanceof StoreError) {
        throw new AppError(ErrorCode.STORE_ERROR, 'Checklist is unavailable', 503, {
          reason: error.message,
        });
      }
      throw error;
    }
  }

  private async persist(engine: ListEngine, operation: string): Promise<Persistence> {
    try {
      await this.store.save(engine.list());
      this.unsavedChanges = 0;
      return 'saved';
    } catch (error) {
      if (!(error instanceof StoreError)) throw error;

      this.unsavedChanges += 1;
      log.error('Failed to persist checklist, keeping in-memory state', {
        operation,
        error: error.message,
        unsavedChanges: this.unsavedChanges,
      });
      return 'failed';
    }
  }
}

function withinNameLimit(rawName: string): boolean {
  return rawName.trim().length <= MAX_NAME_LENGTH;
}

function notFound(id: string): AppError {
  return new AppError(ErrorCode.ITEM_NOT_FOUND, `Item with ID ${id} not found`, 404);
}

function requireItem(result: ItemUpdateResult, id: string): Item {
  if (result.status === 'not_found') throw notFound(id);
  return result.item;
}
