import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';
import { env } from '../config/environment';

/**
 * Swagger/OpenAPI Configuration
 *
 * Generates the OpenAPI 3.0 document from JSDoc comments in route files
 */
const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Checklist API',
      version: '1.0.0',
      description: `
A REST API for a single ordered checklist.

## Rules
- Names are unique ignoring case and surrounding whitespace; duplicate adds are skipped
- \`order\` always runs 0..N-1 in display order, after every add, delete and move
- Quantity never drops below 1; decrements past the floor are ignored
- Bulk text is split on newlines and commas, trimmed, and empty entries dropped

## Placement
Single adds go to the ${env.INSERT_AT_TOP ? 'top' : 'bottom'} of the list by default (\`INSERT_AT_TOP\`),
overridable per request with \`insert_at_top\`. Bulk adds always append.

## Persistence
Every change saves the whole list. If a save fails the change is kept in memory,
the response message says so and \`/health\` reports \`degraded\` until a later save succeeds.
      `.trim(),
    },
    servers: [
      {
        url: `http://localhost:${env.PORT}`,
        description: env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
      },
    ],
    tags: [
      {
        name: 'Items',
        description: 'Checklist item operations',
      },
    ],
    components: {
      schemas: {
        Item: {
          type: 'object',
          properties: {
            id: {
              type: 'string',
              format: 'uuid',
            },
            name: {
              type: 'string',
            },
            quantity: {
              type: 'integer',
              minimum: 1,
            },
            isCompleted: {
              type: 'boolean',
            },
            order: {
              type: 'integer',
              minimum: 0,
              description: 'Display position',
            },
            createdAt: {
              type: 'string',
              format: 'date-time',
            },
          },
        },
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'object',
              properties: {
                code: {
                  type: 'string',
                  enum: [
                    'VALIDATION_ERROR',
                    'INDEX_OUT_OF_RANGE',
                    'ITEM_NOT_FOUND',
                    'STORE_ERROR',
                    'INTERNAL_ERROR',
                    'NOT_FOUND',
                  ],
                },
                message: {
                  type: 'string',
                },
                details: {
                  type: 'object',
                },
              },
            },
          },
        },
      },
    },
  },
  // Route files carry the @swagger blocks; .js once compiled to dist/
  apis: [path.join(__dirname, '../routes/**/*.{ts,js}')],
};

export const swaggerSpec = swaggerJsdoc(options);
