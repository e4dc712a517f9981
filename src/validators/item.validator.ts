import { z } from 'zod';
import { MAX_NAME_LENGTH, MAX_QUANTITY } from '../types/item.types';

/**
 * Checklist item validation schemas
 */

const itemIdParams = z.object({
  id: z.string().uuid('Invalid item ID format'),
});

const itemName = z
  .string({ required_error: 'Name is required', invalid_type_error: 'Name must be a string' })
  .max(MAX_NAME_LENGTH, `Name must be at most ${MAX_NAME_LENGTH} characters`);

const index = (label: string) =>
  z
    .number({
      required_error: `${label} is required`,
      invalid_type_error: `${label} must be a number`,
    })
    .int(`${label} must be an integer`);

// Add a single item; blank names are accepted and reported as skipped
export const addItemSchema = z.object({
  body: z.object({
    name: itemName,
    insert_at_top: z.boolean().optional(),
  }),
});

// Bulk add from a list of names or from pasted text
export const addMultipleSchema = z.object({
  body: z
    .object({
      names: z.array(itemName).max(1000, 'At most 1000 names per batch').optional(),
      text: z.string().max(100_000, 'Text is too long').optional(),
    })
    .refine((body) => (body.names === undefined) !== (body.text === undefined), {
      message: 'Provide exactly one of names or text',
    }),
});

// Free-typed entry
export const submitEntrySchema = z.object({
  body: z.object({
    text: z.string({ required_error: 'Text is required' }).max(100_000, 'Text is too long'),
    insert_at_top: z.boolean().optional(),
  }),
});

export const parseTextSchema = z.object({
  body: z.object({
    text: z.string({ required_error: 'Text is required' }).max(100_000, 'Text is too long'),
  }),
});

export const getItemSchema = z.object({
  params: itemIdParams,
});

export const toggleItemSchema = z.object({
  params: itemIdParams,
});

export const updateQuantitySchema = z.object({
  params: itemIdParams,
  body: z.object({
    delta: z
      .number({
        required_error: 'Delta is required',
        invalid_type_error: 'Delta must be a number',
      })
      .int('Delta must be an integer')
      .min(-MAX_QUANTITY, `Delta must be at least -${MAX_QUANTITY}`)
      .max(MAX_QUANTITY, `Delta must be at most ${MAX_QUANTITY}`),
  }),
});

export const renameItemSchema = z.object({
  params: itemIdParams,
  body: z.object({
    name: itemName.refine((name) => name.trim().length > 0, 'Name cannot be empty'),
  }),
});

export const deleteItemSchema = z.object({
  params: itemIdParams,
});

export const deleteItemsSchema = z.object({
  body: z.object({
    ids: z.array(z.string().uuid('Invalid item ID format')).min(1, 'At least one ID is required'),
  }),
});

export const deletePositionsSchema = z.object({
  body: z.object({
    positions: z.array(index('Position').nonnegative('Position cannot be negative')).min(1),
  }),
});

export const moveItemSchema = z.object({
  body: z.object({
    from_index: index('From index'),
    to_index: index('To index'),
  }),
});

// Infer TypeScript types from schemas
export type AddItemRequest = z.infer<typeof addItemSchema>;
export type AddMultipleRequest = z.infer<typeof addMultipleSchema>;
export type SubmitEntryRequest = z.infer<typeof submitEntrySchema>;
export type ParseTextRequest = z.infer<typeof parseTextSchema>;
export type UpdateQuantityRequest = z.infer<typeof updateQuantitySchema>;
export type RenameItemRequest = z.infer<typeof renameItemSchema>;
export type DeleteItemsRequest = z.infer<typeof deleteItemsSchema>;
export type DeletePositionsRequest = z.infer<typeof deletePositionsSchema>;
export type MoveItemRequest = z.infer<typeof moveItemSchema>;
