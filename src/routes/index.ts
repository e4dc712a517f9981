import { Router } from 'express';
import { createItemsRouter } from './v1/items.routes';
import type { ChecklistService } from '../services/checklist.service';
import type { HealthCheckResponse } from '../types/api.types';

/**
 * API Routes Aggregator
 */
export function createRoutes(checklistService: ChecklistService): Router {
  const router = Router();

  // v1 routes
  router.use('/v1/items', createItemsRouter(checklistService));

  // Health check endpoint; degraded while changes are waiting to be saved
  router.get('/health', (_req, res) => {
    const status = checklistService.getStatus();
    const body: HealthCheckResponse = {
      status: status.unsavedChanges > 0 ? 'degraded' : 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      itemCount: status.itemCount,
      unsavedChanges: status.unsavedChanges,
    };

    res.status(200).json(body);
  });

  // API version info
  router.get('/v1', (_req, res) => {
    res.status(200).json({
      version: '1.0.0',
      api: 'Checklist API',
    });
  });

  return router;
}
