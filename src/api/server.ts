import Fastify from 'fastify';
import { config } from '../config/index.js';
import type { ActivityReader } from '../core/activity/activity-log.js';
import type { PipelineService } from '../core/pipeline/pipeline.service.js';
import { logger } from '../shared/utils/logger.js';
import { errorHandler } from './middleware/error-handler.js';
import { activityRoutes, healthRoutes, inquiryRoutes, quoteRoutes } from './routes/index.js';
import { registerSwagger } from './swagger.config.js';

export interface ServerDependencies {
  pipeline: PipelineService;
  activity: ActivityReader;
  dataDir: string;
}

export async function createServer(deps: ServerDependencies) {
  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      transport:
        config.nodeEnv === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                colorize: true,
                translateTime: 'SYS:standard',
              },
            }
          : undefined,
    },
  });

  // Register Swagger documentation
  await registerSwagger(fastify);

  // Register error handler
  fastify.setErrorHandler(errorHandler);

  // Register routes
  await fastify.register(healthRoutes, { dataDir: deps.dataDir });
  await fastify.register(inquiryRoutes, { prefix: '/api/v1', pipeline: deps.pipeline });
  await fastify.register(quoteRoutes, { prefix: '/api/v1', quoteEngine: deps.pipeline.quoteEngine });
  await fastify.register(activityRoutes, { prefix: '/api/v1', activity: deps.activity });

  // Add request logging hook
  fastify.addHook('onRequest', async (request) => {
    logger.debug(
      { method: request.method, url: request.url },
      'Incoming request'
    );
  });

  // Add response logging hook
  fastify.addHook('onResponse', async (request, reply) => {
    logger.debug(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed'
    );
  });

  return fastify;
}

export async function startServer(deps: ServerDependencies) {
  const server = await createServer(deps);

  try {
    await server.listen({ port: config.port, host: config.host });
    logger.info({ port: config.port, host: config.host }, 'Server started');
    return server;
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    throw error;
  }
}
