import { appendFile, mkdir, readFile } from 'fs/promises';
import { dirname } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
  ACTIVITY_ACTIONS,
  type ActivityAction,
  type ActivityEntry,
  type ActivitySummary,
} from '../../shared/types/index.js';
import { logger } from '../../shared/utils/logger.js';
import { StorageError } from '../../shared/utils/errors.js';

export interface ActivityInput {
  action: ActivityAction;
  emailId: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Destination for pipeline activity entries
 */
export interface ActivitySink {
  append(input: ActivityInput): Promise<ActivityEntry>;
}

/**
 * Read side of the activity timeline
 */
export interface ActivityReader {
  recent(limit?: number): Promise<ActivityEntry[]>;
  byEmail(emailId: string): Promise<ActivityEntry[]>;
  byAction(action: ActivityAction): Promise<ActivityEntry[]>;
  summary(): Promise<ActivitySummary>;
}

export interface ActivityLogOptions {
  clock?: () => Date;
}

const ActivityEntrySchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  action: z.enum(ACTIVITY_ACTIONS),
  email_id: z.string(),
  message: z.string(),
  details: z.record(z.unknown()).optional(),
});

interface ReadResult {
  entries: ActivityEntry[];
  malformed: number;
}

/**
 * Append-only activity timeline stored as one JSON object per line
 */
export class JsonlActivityLog implements ActivitySink, ActivityReader {
  private readonly clock: () => Date;

  constructor(
    private readonly filePath: string,
    options: ActivityLogOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async append(input: ActivityInput): Promise<ActivityEntry> {
    const entry: ActivityEntry = {
      id: uuidv4(),
      timestamp: this.clock().toISOString(),
      action: input.action,
      email_id: input.emailId,
      message: input.message,
    };
    if (input.details && Object.keys(input.details).length > 0) {
      entry.details = input.details;
    }

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, `${JSON.stringify(entry)}\n`, 'utf-8');
    } catch (error) {
      throw new StorageError(`Failed to append activity: ${error}`);
    }

    logger.debug(
      { emailId: entry.email_id, action: entry.action },
      entry.message
    );

    return entry;
  }

  /**
   * Get the most recent entries, oldest first
   */
  async recent(limit: number = 10): Promise<ActivityEntry[]> {
    if (limit <= 0) return [];
    const { entries } = await this.read();
    return entries.slice(-limit);
  }

  async byEmail(emailId: string): Promise<ActivityEntry[]> {
    const { entries } = await this.read();
    return entries.filter((entry) => entry.email_id === emailId);
  }

  async byAction(action: ActivityAction): Promise<ActivityEntry[]> {
    const { entries } = await this.read();
    return entries.filter((entry) => entry.action === action);
  }

  /**
   * Count entries per action and per email. Unreadable lines count as errors.
   */
  async summary(): Promise<ActivitySummary> {
    const { entries, malformed } = await this.read();

    const actions: Record<string, number> = {};
    const emailIds = new Set<string>();
    let errors = malformed;

    for (const entry of entries) {
      actions[entry.action] = (actions[entry.action] ?? 0) + 1;
      emailIds.add(entry.email_id);
      if (entry.action === 'error') errors++;
    }

    return {
      total_entries: entries.length,
      actions,
      email_ids: [...emailIds],
      unique_emails: emailIds.size,
      errors,
    };
  }

  private async read(): Promise<ReadResult> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return { entries: [], malformed: 0 };
      throw new StorageError(`Failed to read activity log: ${error}`);
    }

    const entries: ActivityEntry[] = [];
    let malformed = 0;

    for (const line of content.split('\n')) {
      if (line.trim() === '') continue;

      const parsed = ActivityEntrySchema.safeParse(parseJson(line));
      if (parsed.success) {
        entries.push(parsed.data);
      } else {
        malformed++;
      }
    }

    return { entries, malformed };
  }
}

function parseJson(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
