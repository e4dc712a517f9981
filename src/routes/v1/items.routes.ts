import { Router } from 'express';
import { ItemController } from '../../controllers/item.controller';
import type { ChecklistService } from '../../services/checklist.service';
import { validate } from '../../middleware/validation.middleware';
import {
  addItemSchema,
  addMultipleSchema,
  submitEntrySchema,
  parseTextSchema,
  getItemSchema,
  toggleItemSchema,
  updateQuantitySchema,
  renameItemSchema,
  deleteItemSchema,
  deleteItemsSchema,
  deletePositionsSchema,
  moveItemSchema,
} from '../../validators/item.validator';

/**
 * Item routes (v1)
 */
export function createItemsRouter(checklistService: ChecklistService): Router {
  const router = Router();
  const itemController = new ItemController(checklistService);

  /**
   * @swagger
   * /v1/items:
   *   get:
   *     summary: List checklist items in display order
   *     tags: [Items]
   *     responses:
   *       200:
   *         description: Items ordered by their order index
   */
  router.get('/', itemController.listItems);

  /**
   * @swagger
   * /v1/items:
   *   post:
   *     summary: Add an item
   *     description: Blank names and names already on the list (ignoring case and surrounding whitespace) are skipped.
   *     tags: [Items]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - name
   *             properties:
   *               name:
   *                 type: string
   *               insert_at_top:
   *                 type: boolean
   *                 description: Overrides the INSERT_AT_TOP default for this add
   *     responses:
   *       201:
   *         description: Item added
   *       200:
   *         description: Item skipped (empty or duplicate)
   */
  router.post('/', validate(addItemSchema), itemController.addItem);

  /**
   * @swagger
   * /v1/items/bulk:
   *   post:
   *     summary: Add several items at the end of the list
   *     tags: [Items]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             properties:
   *               names:
   *                 type: array
   *                 items:
   *                   type: string
   *               text:
   *                 type: string
   *                 description: Split on newlines and commas
   *     responses:
   *       200:
   *         description: Number of items added
   */
  router.post('/bulk', validate(addMultipleSchema), itemController.addMultiple);

  /**
   * @swagger
   * /v1/items/entry:
   *   post:
   *     summary: Submit typed text as one item, or as many when it holds a newline or comma
   *     tags: [Items]
   *     responses:
   *       200:
   *         description: Entry processed
   */
  router.post('/entry', validate(submitEntrySchema), itemController.submitEntry);

  /**
   * @swagger
   * /v1/items/parse:
   *   post:
   *     summary: Split bulk text into item names without adding them
   *     tags: [Items]
   *     responses:
   *       200:
   *         description: Parsed names
   */
  router.post('/parse', validate(parseTextSchema), itemController.parseText);

  /**
   * @swagger
   * /v1/items/move:
   *   post:
   *     summary: Move the item at from_index to to_index
   *     tags: [Items]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - from_index
   *               - to_index
   *             properties:
   *               from_index:
   *                 type: integer
   *               to_index:
   *                 type: integer
   *     responses:
   *       200:
   *         description: Reordered list
   *       400:
   *         description: Index out of range
   */
  router.post('/move', validate(moveItemSchema), itemController.moveItem);

  /**
   * @swagger
   * /v1/items/delete:
   *   post:
   *     summary: Delete items by ID
   *     tags: [Items]
   *     responses:
   *       200:
   *         description: Number of items deleted
   */
  router.post('/delete', validate(deleteItemsSchema), itemController.deleteItems);

  /**
   * @swagger
   * /v1/items/delete-positions:
   *   post:
   *     summary: Delete items at display positions
   *     tags: [Items]
   *     responses:
   *       200:
   *         description: Number of items deleted
   */
  router.post('/delete-positions', validate(deletePositionsSchema), itemController.deletePositions);

  /**
   * @swagger
   * /v1/items:
   *   delete:
   *     summary: Delete every item
   *     tags: [Items]
   *     responses:
   *       200:
   *         description: Number of items deleted
   */
  router.delete('/', itemController.deleteAll);

  /**
   * @swagger
   * /v1/items/{id}:
   *   get:
   *     summary: Get an item
   *     tags: [Items]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *           format: uuid
   *     responses:
   *       200:
   *         description: Item retrieved successfully
   *       404:
   *         description: Item not found
   */
  router.get('/:id', validate(getItemSchema), itemController.getItem);

  /**
   * @swagger
   * /v1/items/{id}:
   *   patch:
   *     summary: Rename an item
   *     tags: [Items]
   *     responses:
   *       200:
   *         description: Item renamed
   *       404:
   *         description: Item not found
   */
  router.patch('/:id', validate(renameItemSchema), itemController.renameItem);

  /**
   * @swagger
   * /v1/items/{id}:
   *   delete:
   *     summary: Delete an item
   *     tags: [Items]
   *     responses:
   *       200:
   *         description: Item deleted
   *       404:
   *         description: Item not found
   */
  router.delete('/:id', validate(deleteItemSchema), itemController.deleteItem);

  /**
   * @swagger
   * /v1/items/{id}/toggle:
   *   post:
   *     summary: Check or uncheck an item
   *     tags: [Items]
   *     responses:
   *       200:
   *         description: Item toggled
   *       404:
   *         description: Item not found
   */
  router.post('/:id/toggle', validate(toggleItemSchema), itemController.toggleCompletion);

  /**
   * @swagger
   * /v1/items/{id}/quantity:
   *   patch:
   *     summary: Change an item's quantity by delta
   *     description: A change that would take the quantity below 1 is ignored.
   *     tags: [Items]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required:
   *               - delta
   *             properties:
   *               delta:
   *                 type: integer
   *     responses:
   *       200:
   *         description: Quantity updated or left unchanged
   *       404:
   *         description: Item not found
   */
  router.patch('/:id/quantity', validate(updateQuantitySchema), itemController.updateQuantity);

  return router;
}
