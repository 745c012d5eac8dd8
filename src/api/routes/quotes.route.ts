import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { QuoteEngine } from '../../quoting/index.js';
import { QuoteRequestSchema } from '../../core/storage/record.schemas.js';
import { errorResponseSchema, quoteSchema } from '../schemas.js';

export type QuoteRouteOptions = {
  quoteEngine: QuoteEngine;
};

export async function quoteRoutes(fastify: FastifyInstance, options: QuoteRouteOptions) {
  const { quoteEngine } = options;

  // Price an event without storing anything
  fastify.post(
    '/quotes/preview',
    {
      schema: {
        tags: ['Quotes'],
        summary: 'Preview a quote',
        description: 'Price a list of products against the current catalog and discount tiers',
        body: {
          type: 'object',
          required: ['email_id', 'products'],
          properties: {
            email_id: { type: 'string' },
            products: {
              type: 'array',
              items: {
                type: 'object',
                required: ['name'],
                properties: {
                  name: { type: 'string' },
                  quantity: { type: 'number', nullable: true },
                },
              },
            },
            currency: { type: 'string', nullable: true },
          },
        },
        response: {
          200: {
            description: 'Quote preview',
            type: 'object',
            properties: {
              success: { type: 'boolean' },
              quote: quoteSchema,
              summary: { type: 'string' },
            },
          },
          400: errorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const quoteRequest = QuoteRequestSchema.parse(request.body);
      const quote = quoteEngine.generate(quoteRequest);

      return reply.send({
        success: true,
        quote,
        summary: quoteEngine.summarize(quote),
      });
    }
  );
}
