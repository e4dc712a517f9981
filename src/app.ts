import express, { type Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { requestLogger } from './middleware/logger.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { createRoutes } from './routes';
import { ChecklistService } from './services/checklist.service';
import { ItemRepository, type ItemStore } from './repositories/item.repository';
import { swaggerSpec } from './swagger/swagger.config';
import { getSupabaseClient } from './config/database';
import { ALLOWED_ORIGINS, env } from './config/environment';
import { logger } from './config/logger';

const SWAGGER_UI_VERSION = '5.11.0';

export interface AppOptions {
  // Defaults to the Supabase-backed repository
  store?: ItemStore;
  insertAtTop?: boolean;
}

export interface ChecklistApp {
  app: Application;
  checklistService: ChecklistService;
}

/**
 * Creates and configures the Express application
 */
export function createApp(options: AppOptions = {}): ChecklistApp {
  const app = express();

  const store = options.store ?? new ItemRepository(getSupabaseClient());
  const checklistService = new ChecklistService(store, {
    insertAtTop: options.insertAtTop ?? env.INSERT_AT_TOP,
  });

  // Security middleware
  app.use(
    helmet({
      contentSecurityPolicy: false, // Disable for Swagger UI
    })
  );

  app.use(
    cors({
      origin: ALLOWED_ORIGINS,
    })
  );

  // Body parsing middleware; pasted lists can be long
  app.use(express.json({ limit: '1mb' }));

  // Request logging middleware
  app.use(requestLogger);

  // API Documentation - Swagger UI from CDN
  app.get('/docs', (_req, res) => {
    res.send(`<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>Checklist API Docs</title>
  <link rel="stylesheet" href="https://unpkg.com/swagger-ui-dist@${SWAGGER_UI_VERSION}/swagger-ui.css">
</head>
<body>
  <div id="swagger-ui"></div>
  <script src="https://unpkg.com/swagger-ui-dist@${SWAGGER_UI_VERSION}/swagger-ui-bundle.js"></script>
  <script>
    window.onload = function() {
      SwaggerUIBundle({ url: '/openapi.json', dom_id: '#swagger-ui', deepLinking: true });
    };
  </script>
</body>
</html>`);
  });

  app.get('/openapi.json', (_req, res) => {
    res.json(swaggerSpec);
  });

  // Mount API routes
  app.use('/', createRoutes(checklistService));

  // 404 handler
  app.use(notFoundHandler);

  // Global error handling middleware (must be last)
  app.use(errorHandler);

  logger.info('Express application configured successfully');

  return { app, checklistService };
}
