import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { ActivityReader } from '../../core/activity/activity-log.js';
import { ACTIVITY_ACTIONS, type ActivityEntry } from '../../shared/types/index.js';
import { activityEntrySchema } from '../schemas.js';

export type ActivityRouteOptions = {
  activity: ActivityReader;
};

const ListActivityQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(20),
  emailId: z.string().min(1).optional(),
  action: z.enum(ACTIVITY_ACTIONS).optional(),
});

export async function activityRoutes(fastify: FastifyInstance, options: ActivityRouteOptions) {
  const { activity } = options;

  // List timeline entries
  fastify.get(
    '/activity',
    {
      schema: {
        tags: ['Activity'],
        summary: 'List activity',
        description: 'Most recent activity entries, oldest first, optionally filtered by email or action',
        querystring: {
          type: 'object',
          properties: {
            limit: { type: 'integer', minimum: 1, maximum: 1000, default: 20, description: 'Number of results' },
            emailId: { type: 'string', description: 'Filter by email ID' },
            action: { type: 'string', enum: [...ACTIVITY_ACTIONS], description: 'Filter by action' },
          },
        },
        response: {
          200: {
            description: 'Activity entries',
            type: 'object',
            properties: {
              success: { type: 'boolean' },
              entries: { type: 'array', items: activityEntrySchema },
              count: { type: 'integer' },
            },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const query = ListActivityQuerySchema.parse(request.query);

      let entries: ActivityEntry[];
      if (query.emailId) {
        entries = await activity.byEmail(query.emailId);
        if (query.action) {
          const action = query.action;
          entries = entries.filter((entry) => entry.action === action);
        }
      } else if (query.action) {
        entries = await activity.byAction(query.action);
      } else {
        entries = await activity.recent(query.limit);
      }

      entries = entries.slice(-query.limit);

      return reply.send({
        success: true,
        entries,
        count: entries.length,
      });
    }
  );

  // Aggregate statistics
  fastify.get(
    '/activity/summary',
    {
      schema: {
        tags: ['Activity'],
        summary: 'Activity summary',
        description: 'Entry counts per action and the emails seen',
        response: {
          200: {
            description: 'Summary statistics',
            type: 'object',
            properties: {
              success: { type: 'boolean' },
              summary: {
                type: 'object',
                properties: {
                  total_entries: { type: 'integer' },
                  actions: { type: 'object', additionalProperties: { type: 'integer' } },
                  email_ids: { type: 'array', items: { type: 'string' } },
                  unique_emails: { type: 'integer' },
                  errors: { type: 'integer' },
                },
              },
            },
          },
        },
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const summary = await activity.summary();
      return reply.send({ success: true, summary });
    }
  );
}
