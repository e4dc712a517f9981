import type { Request } from 'express';
import type { ChecklistService } from '../services/checklist.service';
import type {
  AddItemRequest,
  AddMultipleRequest,
  SubmitEntryRequest,
  ParseTextRequest,
  UpdateQuantityRequest,
  RenameItemRequest,
  DeleteItemsRequest,
  DeletePositionsRequest,
  MoveItemRequest,
} from '../validators/item.validator';
import { AppError, ErrorCode } from '../types/error.types';
import { MAX_QUANTITY } from '../types/item.types';
import { createSuccessResponse, createMutationResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';

/**
 * Item Controller
 *
 * HTTP request handlers for checklist item endpoints
 */
export class ItemController {
  constructor(private checklistService: ChecklistService) {}

  /**
   * GET /v1/items
   * List items in display order
   */
  listItems = asyncHandler(async (_req, res) => {
    const items = await this.checklistService.listItems();

    res.status(200).json(createSuccessResponse(items));
  });

  /**
   * GET /v1/items/:id
   */
  getItem = asyncHandler(async (req, res) => {
    const item = await this.checklistService.getItem(itemId(req));

    res.status(200).json(createSuccessResponse(item));
  });

  /**
   * POST /v1/items
   * Add one item; duplicates and blank names are skipped, not rejected
   */
  addItem = asyncHandler<AddItemRequest['body']>(async (req, res) => {
    const { name, insert_at_top } = req.body;

    const { result, persistence } = await this.checklistService.addItem(name, insert_at_top);

    if (result.status === 'skipped') {
      res.status(200).json(createSuccessResponse(result, `Item skipped (${result.reason})`));
      return;
    }

    res.status(201).json(createMutationResponse(result, persistence));
  });

  /**
   * POST /v1/items/bulk
   * Add many items from a list of names or from pasted text
   */
  addMultiple = asyncHandler<AddMultipleRequest['body']>(async (req, res) => {
    const { names, text } = req.body;

    const { result, persistence } =
      text !== undefined
        ? await this.checklistService.addFromText(text)
        : await this.checklistService.addMultiple(names ?? []);

    res
      .status(200)
      .json(createMutationResponse(result, persistence, `Added ${result.addedCount} items`));
  });

  /**
   * POST /v1/items/entry
   * Typed entry; a newline or comma switches to bulk add
   */
  submitEntry = asyncHandler<SubmitEntryRequest['body']>(async (req, res) => {
    const { text, insert_at_top } = req.body;

    const { result, persistence } = await this.checklistService.submitEntry(text, insert_at_top);

    res.status(200).json(createMutationResponse(result, persistence));
  });

  /**
   * POST /v1/items/parse
   * Split text into item names without adding them
   */
  parseText = asyncHandler<ParseTextRequest['body']>(async (req, res) => {
    res.status(200).json(createSuccessResponse(this.checklistService.parseBulkText(req.body.text)));
  });

  /**
   * POST /v1/items/:id/toggle
   */
  toggleCompletion = asyncHandler(async (req, res) => {
    const { result, persistence } = await this.checklistService.toggleCompletion(itemId(req));

    res.status(200).json(createMutationResponse(result, persistence));
  });

  /**
   * PATCH /v1/items/:id/quantity
   */
  updateQuantity = asyncHandler<UpdateQuantityRequest['body']>(async (req, res) => {
    const { result, persistence } = await this.checklistService.updateQuantity(
      itemId(req),
      req.body.delta
    );

    const message = result.applied
      ? undefined
      : `Quantity must stay between 1 and ${MAX_QUANTITY}; nothing changed`;
    res.status(200).json(createMutationResponse(result, persistence, message));
  });

  /**
   * PATCH /v1/items/:id
   * Rename an item
   */
  renameItem = asyncHandler<RenameItemRequest['body']>(async (req, res) => {
    const { result, persistence } = await this.checklistService.renameItem(
      itemId(req),
      req.body.name
    );

    res.status(200).json(createMutationResponse(result, persistence));
  });

  /**
   * DELETE /v1/items/:id
   */
  deleteItem = asyncHandler(async (req, res) => {
    const { result, persistence } = await this.checklistService.deleteItem(itemId(req));

    res.status(200).json(createMutationResponse(result, persistence));
  });

  /**
   * POST /v1/items/delete
   * Delete a set of items by ID; unknown IDs are ignored
   */
  deleteItems = asyncHandler<DeleteItemsRequest['body']>(async (req, res) => {
    const { result, persistence } = await this.checklistService.deleteItems(req.body.ids);

    res
      .status(200)
      .json(createMutationResponse({ deletedCount: result.length }, persistence));
  });

  /**
   * POST /v1/items/delete-positions
   * Delete items at display positions
   */
  deletePositions = asyncHandler<DeletePositionsRequest['body']>(async (req, res) => {
    const { result, persistence } = await this.checklistService.deleteAt(req.body.positions);

    res
      .status(200)
      .json(createMutationResponse({ deletedCount: result.length }, persistence));
  });

  /**
   * POST /v1/items/move
   */
  moveItem = asyncHandler<MoveItemRequest['body']>(async (req, res) => {
    const { from_index, to_index } = req.body;

    const { result, persistence } = await this.checklistService.moveItem(from_index, to_index);

    res.status(200).json(createMutationResponse(result, persistence));
  });

  /**
   * DELETE /v1/items
   * Empty the checklist
   */
  deleteAll = asyncHandler(async (_req, res) => {
    const { result, persistence } = await this.checklistService.deleteAll();

    res
      .status(200)
      .json(createMutationResponse({ deletedCount: result }, persistence, `Deleted ${result} items`));
  });
}

function itemId(req: Request<Record<string, string>, unknown, unknown>): string {
  const { id } = req.params;
  if (!id) {
    throw new AppError(ErrorCode.VALIDATION_ERROR, 'Item ID is required', 400);
  }
  return id;
}
