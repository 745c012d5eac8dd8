import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { PipelineService } from '../../core/pipeline/pipeline.service.js';
import { EMAIL_ID_PATTERN } from '../../shared/types/index.js';
import { NotFoundError } from '../../shared/utils/errors.js';
import {
  acknowledgmentSchema,
  emailIdParamsSchema,
  errorResponseSchema,
  parsedEventSchema,
  quoteSchema,
} from '../schemas.js';

export type InquiryRouteOptions = {
  pipeline: PipelineService;
};

// Request schemas
const CreateInquirySchema = z.object({
  content: z.string().min(1),
  source: z.string().min(1).default('api'),
});

const EmailIdParamsSchema = z.object({
  emailId: z.string().regex(EMAIL_ID_PATTERN),
});

export async function inquiryRoutes(fastify: FastifyInstance, options: InquiryRouteOptions) {
  const { pipeline } = options;

  // Submit a raw inquiry email
  fastify.post(
    '/inquiries',
    {
      schema: {
        tags: ['Inquiries'],
        summary: 'Submit inquiry email',
        description: `
Run a raw inquiry email through extraction, acknowledgment and quoting.

The email ID is derived from the content, so submitting the same text twice
returns \`status: "skipped"\` without regenerating any record.
        `,
        body: {
          type: 'object',
          required: ['content'],
          properties: {
            content: { type: 'string', minLength: 1, description: 'Raw email text' },
            source: { type: 'string', description: 'Label recorded in the activity log' },
          },
        },
        response: {
          201: {
            description: 'Inquiry processed',
            type: 'object',
            properties: {
              success: { type: 'boolean' },
              emailId: { type: 'string' },
              status: { type: 'string', enum: ['processed'] },
              event: parsedEventSchema,
              acknowledgment: acknowledgmentSchema,
              quote: quoteSchema,
            },
          },
          200: {
            description: 'Inquiry already processed',
            type: 'object',
            properties: {
              success: { type: 'boolean' },
              emailId: { type: 'string' },
              status: { type: 'string', enum: ['skipped'] },
            },
          },
          400: errorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const body = CreateInquirySchema.parse(request.body);
      const result = await pipeline.processContent(body.content, body.source);

      return reply.status(result.status === 'processed' ? 201 : 200).send({
        success: true,
        ...result,
      });
    }
  );

  // Get the parsed event
  fastify.get(
    '/inquiries/:emailId',
    {
      schema: {
        tags: ['Inquiries'],
        summary: 'Get parsed inquiry',
        description: 'Returns the structured event extracted from the email',
        params: emailIdParamsSchema,
        response: {
          200: {
            description: 'Parsed inquiry',
            type: 'object',
            properties: {
              success: { type: 'boolean' },
              event: parsedEventSchema,
            },
          },
          404: errorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { emailId } = EmailIdParamsSchema.parse(request.params);
      const event = await pipeline.store.getEvent(emailId);

      if (!event) {
        throw new NotFoundError('Inquiry', emailId);
      }

      return reply.send({ success: true, event });
    }
  );

  // Get the stored quote
  fastify.get(
    '/inquiries/:emailId/quote',
    {
      schema: {
        tags: ['Inquiries'],
        summary: 'Get inquiry quote',
        description: 'Returns the stored quote with a one-line summary and any validation errors',
        params: emailIdParamsSchema,
        response: {
          200: {
            description: 'Stored quote',
            type: 'object',
            properties: {
              success: { type: 'boolean' },
              quote: quoteSchema,
              summary: { type: 'string' },
              validation: { type: 'array', items: { type: 'string' } },
            },
          },
          404: errorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { emailId } = EmailIdParamsSchema.parse(request.params);
      const quote = await pipeline.store.getQuote(emailId);

      if (!quote) {
        throw new NotFoundError('Quote', emailId);
      }

      return reply.send({
        success: true,
        quote,
        summary: pipeline.quoteEngine.summarize(quote),
        validation: pipeline.quoteEngine.validate(quote),
      });
    }
  );

  // Get the generated acknowledgment
  fastify.get(
    '/inquiries/:emailId/acknowledgment',
    {
      schema: {
        tags: ['Inquiries'],
        summary: 'Get inquiry acknowledgment',
        params: emailIdParamsSchema,
        response: {
          200: {
            description: 'Stored acknowledgment',
            type: 'object',
            properties: {
              success: { type: 'boolean' },
              acknowledgment: acknowledgmentSchema,
            },
          },
          404: errorResponseSchema,
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { emailId } = EmailIdParamsSchema.parse(request.params);
      const acknowledgment = await pipeline.store.getAcknowledgment(emailId);

      if (!acknowledgment) {
        throw new NotFoundError('Acknowledgment', emailId);
      }

      return reply.send({ success: true, acknowledgment });
    }
  );
}
