import { createHash } from 'crypto';
import { readdir, readFile, stat } from 'fs/promises';
import { join } from 'path';
import { AcknowledgmentGenerator } from '../../acknowledgment/index.js';
import type { BusinessConfig } from '../../config/catalog.js';
import { EmailParser } from '../../extraction/index.js';
import { QuoteEngine } from '../../quoting/index.js';
import {
  SYSTEM_ACTIVITY_ID,
  type Acknowledgment,
  type ParsedEvent,
  type Quote,
} from '../../shared/types/index.js';
import { InboxError } from '../../shared/utils/errors.js';
import { logger } from '../../shared/utils/logger.js';
import { formatMoney } from '../../shared/utils/money.js';
import { JsonlActivityLog, type ActivitySink } from '../activity/activity-log.js';
import { FileRecordStore, type RecordStore } from '../storage/record.store.js';

export const INBOX_EXTENSION = '.txt';

export interface PipelineDependencies {
  parser: EmailParser;
  acknowledgments: AcknowledgmentGenerator;
  quotes: QuoteEngine;
  store: RecordStore;
  activity: ActivitySink;
}

export type ProcessStatus = 'processed' | 'skipped';

export interface ProcessResult {
  emailId: string;
  status: ProcessStatus;
  event?: ParsedEvent;
  acknowledgment?: Acknowledgment;
  quote?: Quote;
}

export interface InboxResult {
  processed: number;
  skipped: number;
  failed: number;
  total: number;
}

/**
 * Stable identifier derived from the raw email content
 */
export function computeEmailId(content: string): string {
  return createHash('md5').update(content, 'utf8').digest('hex').slice(0, 8);
}

/**
 * Runs each inquiry through parse, acknowledgment and quote, persisting
 * every record and tracking progress on the activity timeline
 */
export class PipelineService {
  constructor(private readonly deps: PipelineDependencies) {}

  get quoteEngine(): QuoteEngine {
    return this.deps.quotes;
  }

  get store(): RecordStore {
    return this.deps.store;
  }

  /**
   * Process one email. Content seen before is skipped.
   */
  async processContent(content: string, source: string): Promise<ProcessResult> {
    const { parser, acknowledgments, quotes, store, activity } = this.deps;
    const emailId = computeEmailId(content);

    if (await store.has(emailId)) {
      await activity.append({
        action: 'skip',
        emailId,
        message: `Already processed: ${source}`,
      });
      logger.info({ emailId, source }, 'Email already processed, skipping');
      return { emailId, status: 'skipped' };
    }

    await activity.append({ action: 'start', emailId, message: `Processing: ${source}` });

    const event = parser.parse(content, emailId);
    await store.saveEvent(event);
    await activity.append({
      action: 'parse',
      emailId,
      message: `Extracted ${event.products.length} products`,
      details: { gaps: event.gaps.length },
    });

    const acknowledgment = acknowledgments.generate(event);
    await store.saveAcknowledgment(acknowledgment);
    await activity.append({
      action: 'ack',
      emailId,
      message: `Generated acknowledgment with ${acknowledgment.questions.length} questions`,
    });

    const quote = quotes.generate(event);
    await store.saveQuote(quote);
    await activity.append({
      action: 'quote',
      emailId,
      message: `Generated ${quote.status} quote: ${quote.currency} ${formatMoney(quote.total)}`,
    });

    logger.info(
      { emailId, source, status: quote.status, products: event.products.length },
      'Email processed'
    );

    return { emailId, status: 'processed', event, acknowledgment, quote };
  }

  /**
   * Process every .txt file of a directory in name order. A failing email is
   * recorded and counted; the rest of the batch still runs.
   */
  async processInbox(inboxDir: string): Promise<InboxResult> {
    const files = await listInbox(inboxDir);
    const { activity } = this.deps;
    const result: InboxResult = { processed: 0, skipped: 0, failed: 0, total: files.length };

    if (files.length === 0) {
      await activity.append({
        action: 'info',
        emailId: SYSTEM_ACTIVITY_ID,
        message: `No ${INBOX_EXTENSION} files found in ${inboxDir}`,
      });
      return result;
    }

    await activity.append({
      action: 'start',
      emailId: SYSTEM_ACTIVITY_ID,
      message: `Processing ${files.length} emails from ${inboxDir}`,
    });

    for (const file of files) {
      let emailId = SYSTEM_ACTIVITY_ID;
      try {
        const content = await readFile(join(inboxDir, file), 'utf-8');
        emailId = computeEmailId(content);

        const { status } = await this.processContent(content, file);
        result[status]++;
      } catch (error) {
        result.failed++;
        const message = error instanceof Error ? error.message : String(error);
        logger.error({ error, emailId, file }, 'Failed to process email');
        await activity.append({
          action: 'error',
          emailId,
          message: `Failed to process ${file}: ${message}`,
        });
      }
    }

    await activity.append({
      action: 'complete',
      emailId: SYSTEM_ACTIVITY_ID,
      message: `Workflow complete: ${result.processed} processed, ${result.failed} failed, ${result.skipped} skipped`,
      details: { ...result },
    });

    return result;
  }
}

async function listInbox(inboxDir: string): Promise<string[]> {
  try {
    const info = await stat(inboxDir);
    if (!info.isDirectory()) {
      throw new InboxError(`Inbox path is not a directory: ${inboxDir}`);
    }
  } catch (error) {
    if (error instanceof InboxError) throw error;
    throw new InboxError(`Inbox directory not found: ${inboxDir}`);
  }

  const entries = await readdir(inboxDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(INBOX_EXTENSION))
    .map((entry) => entry.name)
    .sort();
}

export interface PipelineOptions {
  dataDir: string;
  quantityWindow?: number;
  clock?: () => Date;
  /** Defaults to the JSONL timeline under the data directory */
  activity?: ActivitySink;
}

export function activityLogPath(dataDir: string): string {
  return join(dataDir, 'timeline', 'activity.jsonl');
}

/**
 * Wire the file-backed pipeline for a business configuration
 */
export function createPipeline(business: BusinessConfig, options: PipelineOptions): PipelineService {
  const { clock } = options;

  return new PipelineService({
    parser: new EmailParser(business.catalog, { quantityWindow: options.quantityWindow, clock }),
    acknowledgments: new AcknowledgmentGenerator(business.settings, { clock }),
    quotes: new QuoteEngine(business.catalog, business.tiers, business.settings, { clock }),
    store: new FileRecordStore(options.dataDir),
    activity: options.activity ?? new JsonlActivityLog(activityLogPath(options.dataDir), { clock }),
  });
}
