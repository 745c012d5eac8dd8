export const ACTIVITY_ACTIONS = [
  'start',
  'skip',
  'parse',
  'ack',
  'quote',
  'error',
  'info',
  'complete',
] as const;

export type ActivityAction = (typeof ACTIVITY_ACTIONS)[number];

/**
 * Email id used for entries that concern a whole batch
 */
export const SYSTEM_ACTIVITY_ID = 'system';

export interface ActivityEntry {
  id: string;
  timestamp: string;
  action: ActivityAction;
  email_id: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface ActivitySummary {
  total_entries: number;
  actions: Record<string, number>;
  email_ids: string[];
  unique_emails: number;
  errors: number;
}
