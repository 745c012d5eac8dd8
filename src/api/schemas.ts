// JSON schemas shared by route definitions and the OpenAPI document

export const errorResponseSchema = {
  type: 'object',
  properties: {
    success: { type: 'boolean' },
    error: {
      type: 'object',
      properties: {
        code: { type: 'string' },
        message: { type: 'string' },
        details: { type: 'array', items: { type: 'object', additionalProperties: true } },
      },
    },
  },
} as const;

export const senderSchema = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    email: { type: 'string' },
    confidence: { type: 'number' },
  },
} as const;

export const productMentionSchema = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    quantity: { type: 'number', nullable: true },
    unit: { type: 'string', nullable: true },
    confidence: { type: 'number' },
    notes: { type: 'string' },
  },
} as const;

export const parsedEventSchema = {
  type: 'object',
  properties: {
    email_id: { type: 'string' },
    timestamp: { type: 'string', format: 'date-time' },
    sender: senderSchema,
    products: { type: 'array', items: productMentionSchema },
    urgency: { type: 'string', nullable: true, description: 'low, medium or high' },
    currency: { type: 'string', nullable: true },
    gaps: { type: 'array', items: { type: 'string' } },
    raw_content: { type: 'string' },
  },
} as const;

export const acknowledgmentSchema = {
  type: 'object',
  properties: {
    email_id: { type: 'string' },
    timestamp: { type: 'string', format: 'date-time' },
    to: { type: 'string' },
    subject: { type: 'string' },
    greeting: { type: 'string' },
    body: { type: 'string' },
    questions: { type: 'array', items: { type: 'string' } },
    closing: { type: 'string' },
    sla_hours: { type: 'number' },
    urgency_level: { type: 'string', nullable: true },
  },
} as const;

export const quoteSchema = {
  type: 'object',
  properties: {
    email_id: { type: 'string' },
    timestamp: { type: 'string', format: 'date-time' },
    status: { type: 'string', enum: ['complete', 'pending'] },
    line_items: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          product: { type: 'string' },
          quantity: { type: 'number' },
          unit_price: { type: 'number' },
          total: { type: 'number' },
          unit: { type: 'string' },
        },
      },
    },
    subtotal: { type: 'number' },
    discount: { type: 'number' },
    tax: { type: 'number' },
    total: { type: 'number' },
    currency: { type: 'string' },
    pending_reasons: { type: 'array', items: { type: 'string' } },
    valid_until: { type: 'string', format: 'date-time' },
    discount_rate: { type: 'number', description: 'Applied discount in percent' },
  },
} as const;

export const activityEntrySchema = {
  type: 'object',
  properties: {
    id: { type: 'string', format: 'uuid' },
    timestamp: { type: 'string', format: 'date-time' },
    action: { type: 'string' },
    email_id: { type: 'string' },
    message: { type: 'string' },
    details: { type: 'object', additionalProperties: true },
  },
} as const;

export const emailIdParamsSchema = {
  type: 'object',
  required: ['emailId'],
  properties: {
    emailId: {
      type: 'string',
      pattern: '^[0-9a-f]{8}$',
      description: 'Content-derived email ID (8 hex characters)',
    },
  },
} as const;
