import type { SupabaseClient } from '@supabase/supabase-js';
import type { Item, ItemRow } from '../types/item.types';
import { StoreError } from '../types/error.types';
import { logger } from '../config/logger';

/**
 * Durable owner of checklist items across restarts
 */
export interface ItemStore {
  load(): Promise<Item[]>;
  save(items: readonly Item[]): Promise<void>;
}

/**
 * Item Repository
 *
 * Handles all database operations for the checklist_items table
 */
export class ItemRepository implements ItemStore {
  constructor(private client: SupabaseClient) {}

  /**
   * Load every stored item, ordered by sort_order
   */
  async load(): Promise<Item[]> {
    const { data, error } = await this.client
      .from('checklist_items')
      .select('*')
      .order('sort_order', { ascending: true })
      .order('created_at', { ascending: true });

    if (error) {
      logger.error('Failed to load checklist items', { error: error.message });
      throw new StoreError(`Failed to load checklist items: ${error.message}`, error);
    }

    const rows: ItemRow[] = data ?? [];
    return rows.map((row) => this.mapToItem(row));
  }

  /**
   * Replace the stored list with `items`
   *
   * Uses PostgreSQL function replace_checklist_items() which, in one
   * transaction, deletes rows missing from the payload and upserts the rest.
   */
  async save(items: readonly Item[]): Promise<void> {
    logger.debug('Saving checklist items', { count: items.length });

    const { error } = await this.client.rpc('replace_checklist_items', {
      p_items: items.map((item) => this.mapToRow(item)),
    });

    if (error) {
      logger.error('Failed to save checklist items', { error: error.message });
      throw new StoreError(`Failed to save checklist items: ${error.message}`, error);
    }
  }

  /**
   * Map database row to domain model
   */
  private mapToItem(row: ItemRow): Item {
    return {
      id: row.id,
      name: row.name,
      quantity: row.quantity,
      isCompleted: row.is_completed,
      order: row.sort_order,
      createdAt: new Date(row.created_at),
    };
  }

  private mapToRow(item: Item): ItemRow {
    return {
      id: item.id,
      name: item.name,
      quantity: item.quantity,
      is_completed: item.isCompleted,
      sort_order: item.order,
      created_at: item.createdAt.toISOString(),
    };
  }
}
