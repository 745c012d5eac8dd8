import { z } from 'zod';
import {
  SUPPORTED_CURRENCIES,
  type Acknowledgment,
  type ParsedEvent,
  type Quote,
  type QuoteRequest,
} from '../../shared/types/index.js';

const UrgencySchema = z.enum(['low', 'medium', 'high']);

export const ParsedEventSchema: z.ZodType<ParsedEvent> = z.object({
  email_id: z.string(),
  timestamp: z.string(),
  sender: z.object({
    name: z.string(),
    email: z.string(),
    confidence: z.number(),
  }),
  products: z.array(
    z.object({
      name: z.string(),
      quantity: z.number().nullable(),
      unit: z.string().nullable(),
      confidence: z.number(),
      notes: z.string(),
    })
  ),
  urgency: UrgencySchema.nullable(),
  currency: z.enum(SUPPORTED_CURRENCIES).nullable(),
  gaps: z.array(z.string()),
  raw_content: z.string(),
});

export const AcknowledgmentSchema: z.ZodType<Acknowledgment> = z.object({
  email_id: z.string(),
  timestamp: z.string(),
  to: z.string(),
  subject: z.string(),
  greeting: z.string(),
  body: z.string(),
  questions: z.array(z.string()),
  closing: z.string(),
  sla_hours: z.number(),
  urgency_level: UrgencySchema.nullable(),
});

export const QuoteSchema: z.ZodType<Quote> = z.object({
  email_id: z.string(),
  timestamp: z.string(),
  status: z.enum(['complete', 'pending']),
  line_items: z.array(
    z.object({
      product: z.string(),
      quantity: z.number(),
      unit_price: z.number(),
      total: z.number(),
      unit: z.string(),
    })
  ),
  subtotal: z.number(),
  discount: z.number(),
  tax: z.number(),
  total: z.number(),
  currency: z.string(),
  pending_reasons: z.array(z.string()),
  valid_until: z.string(),
  discount_rate: z.number(),
});

/**
 * Minimal event shape accepted for quote previews. An omitted quantity is
 * treated as missing.
 */
export const QuoteRequestSchema: z.ZodType<QuoteRequest, z.ZodTypeDef, unknown> = z.object({
  email_id: z.string().min(1),
  products: z.array(
    z.object({
      name: z.string().min(1),
      quantity: z.number().nonnegative().nullable().default(null),
    })
  ),
  currency: z.string().length(3).nullable().optional(),
});
