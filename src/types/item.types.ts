/**
 * Checklist item domain types
 */

// Bounds of the stored columns (quantity is int4)
export const MAX_QUANTITY = 2_147_483_647;
export const MAX_NAME_LENGTH = 255;

export interface Item {
  id: string;
  name: string;
  quantity: number;
  isCompleted: boolean;
  order: number;
  createdAt: Date;
}

// Database row type (snake_case from PostgreSQL)
export interface ItemRow {
  id: string;
  name: string;
  quantity: number;
  is_completed: boolean;
  sort_order: number;
  created_at: string;
}

// Placement policy for single adds
export interface AddItemOptions {
  insertAtTop: boolean;
}

export type SkipReason = 'empty' | 'duplicate';

export type AddItemResult =
  | { status: 'added'; item: Item }
  | { status: 'skipped'; reason: SkipReason };

export interface AddMultipleResult {
  addedCount: number;
  added: Item[];
}

export type ItemUpdateResult = { status: 'updated'; item: Item } | { status: 'not_found' };

// Quantity changes that would leave [1, MAX_QUANTITY] are rejected, not clamped
export type QuantityUpdateResult = ItemUpdateResult | { status: 'rejected'; item: Item };

export type RenameResult = ItemUpdateResult | { status: 'skipped'; reason: 'empty' };

export type MoveResult = { status: 'moved'; item: Item; items: Item[] } | { status: 'out_of_range' };

// Free-typed entry goes down one of two paths
export type EntryResult =
  | { mode: 'single'; result: AddItemResult }
  | { mode: 'bulk'; result: AddMultipleResult };
