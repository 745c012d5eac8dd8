/**
 * Urgency tiers recognised in inquiry text
 */
export type UrgencyLevel = 'low' | 'medium' | 'high';

export const SUPPORTED_CURRENCIES = ['USD', 'EUR', 'GBP', 'CAD', 'AUD', 'JPY'] as const;

export type CurrencyCode = (typeof SUPPORTED_CURRENCIES)[number];

// First 8 hex characters of the content's MD5
export const EMAIL_ID_PATTERN = /^[0-9a-f]{8}$/;

export const UNKNOWN_SENDER_NAME = 'Unknown';
export const UNKNOWN_SENDER_EMAIL = 'unknown@example.com';

export interface SenderInfo {
  name: string;
  email: string;
  confidence: number;
}

/**
 * One occurrence of a catalog product in the inquiry text
 */
export interface ProductMention {
  name: string;
  quantity: number | null;
  unit: string | null;
  confidence: number;
  notes: string;
}

/**
 * Structured record extracted from a single inquiry email
 */
export interface ParsedEvent {
  email_id: string;
  timestamp: string;
  sender: SenderInfo;
  products: ProductMention[];
  urgency: UrgencyLevel | null;
  currency: CurrencyCode | null;
  gaps: string[];
  raw_content: string;
}

export interface Acknowledgment {
  email_id: string;
  timestamp: string;
  to: string;
  subject: string;
  greeting: string;
  body: string;
  questions: string[];
  closing: string;
  sla_hours: number;
  urgency_level: UrgencyLevel | null;
}
