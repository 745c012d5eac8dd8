import { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { config } from '../config/index.js';

export async function registerSwagger(fastify: FastifyInstance) {
  await fastify.register(swagger, {
    openapi: {
      openapi: '3.1.0',
      info: {
        title: 'Inquiry Quote API',
        description: `
## Overview

Turns free-form customer inquiry emails into structured records, a templated
acknowledgment and a priced quote.

### Pipeline

1. **Extract** - Sender, products with quantities and units, urgency, currency and information gaps
2. **Acknowledge** - Reply with subject, body and up to two follow-up questions
3. **Quote** - Price against the catalog with tiered discount and tax, or mark the quote pending

### Key Features

- **Content-derived IDs**: Resubmitting the same email is detected and skipped
- **All-or-nothing quoting**: One unknown product or missing quantity makes the whole quote pending
- **Activity timeline**: Every step is recorded in an append-only log
        `,
        version: '1.0.0',
        contact: {
          name: 'Sales Operations',
        },
        license: {
          name: 'MIT',
        },
      },
      servers: [
        {
          url: `http://localhost:${config.port}`,
          description: 'Development server',
        },
      ],
      tags: [
        {
          name: 'Health',
          description: 'Health check endpoints',
        },
        {
          name: 'Inquiries',
          description: 'Inquiry submission and stored records',
        },
        {
          name: 'Quotes',
          description: 'Quote previews',
        },
        {
          name: 'Activity',
          description: 'Processing timeline',
        },
      ],
      components: {
        schemas: {
          ErrorResponse: {
            type: 'object',
            properties: {
              success: { type: 'boolean', example: false },
              error: {
                type: 'object',
                properties: {
                  code: { type: 'string' },
                  message: { type: 'string' },
                },
              },
            },
          },
        },
      },
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: true,
      displayRequestDuration: true,
    },
    staticCSP: true,
  });
}
