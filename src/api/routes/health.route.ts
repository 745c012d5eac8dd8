import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { access, mkdir } from 'fs/promises';
import { constants } from 'fs';
import { ACKNOWLEDGMENT_TEMPLATES } from '../../acknowledgment/index.js';
import { hasTemplate } from '../../templates/engine.js';

export type HealthRouteOptions = {
  dataDir: string;
};

const serviceCheckSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['healthy', 'unhealthy'] },
    latencyMs: { type: 'integer' },
    error: { type: 'string' },
  },
} as const;

export async function healthRoutes(fastify: FastifyInstance, options: HealthRouteOptions) {
  // Basic health check
  fastify.get(
    '/health',
    {
      schema: {
        tags: ['Health'],
        summary: 'Basic health check',
        description: 'Returns basic service status',
        response: {
          200: {
            description: 'Service is healthy',
            type: 'object',
            properties: {
              status: { type: 'string', enum: ['ok'] },
              timestamp: { type: 'string', format: 'date-time' },
              service: { type: 'string' },
            },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      return reply.send({
        status: 'ok',
        timestamp: new Date().toISOString(),
        service: 'inquiry-quote',
      });
    }
  );

  // Detailed readiness check
  fastify.get(
    '/health/ready',
    {
      schema: {
        tags: ['Health'],
        summary: 'Detailed readiness check',
        description: 'Checks that the data directory is writable and the reply templates are loaded',
        response: {
          200: {
            description: 'All checks passed',
            type: 'object',
            properties: {
              status: { type: 'string', enum: ['ready', 'not_ready'] },
              timestamp: { type: 'string', format: 'date-time' },
              checks: {
                type: 'object',
                properties: {
                  storage: serviceCheckSchema,
                  templates: serviceCheckSchema,
                },
              },
            },
          },
          503: {
            description: 'One or more checks failed',
            type: 'object',
            properties: {
              status: { type: 'string', enum: ['not_ready'] },
              timestamp: { type: 'string', format: 'date-time' },
              checks: {
                type: 'object',
                properties: {
                  storage: serviceCheckSchema,
                  templates: serviceCheckSchema,
                },
              },
            },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const checks: Record<string, { status: string; latencyMs?: number; error?: string }> = {};

      // Check data directory
      const storageStart = Date.now();
      try {
        await mkdir(options.dataDir, { recursive: true });
        await access(options.dataDir, constants.W_OK);
        checks.storage = {
          status: 'healthy',
          latencyMs: Date.now() - storageStart,
        };
      } catch (error) {
        checks.storage = {
          status: 'unhealthy',
          error: error instanceof Error ? error.message : 'Unknown error',
        };
      }

      // Check templates
      const missing = ACKNOWLEDGMENT_TEMPLATES.filter((name) => !hasTemplate(name));
      checks.templates =
        missing.length === 0
          ? { status: 'healthy' }
          : { status: 'unhealthy', error: `Missing templates: ${missing.join(', ')}` };

      const allHealthy = Object.values(checks).every((c) => c.status === 'healthy');

      return reply.status(allHealthy ? 200 : 503).send({
        status: allHealthy ? 'ready' : 'not_ready',
        timestamp: new Date().toISOString(),
        checks,
      });
    }
  );
}
