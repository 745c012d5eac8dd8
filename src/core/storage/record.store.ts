import { access, mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { z } from 'zod';
import { EMAIL_ID_PATTERN } from '../../shared/types/index.js';
import type { Acknowledgment, ParsedEvent, Quote } from '../../shared/types/index.js';
import { logger } from '../../shared/utils/logger.js';
import { StorageError, ValidationError } from '../../shared/utils/errors.js';
import { isMissingFile } from '../activity/activity-log.js';
import { AcknowledgmentSchema, ParsedEventSchema, QuoteSchema } from './record.schemas.js';

/**
 * Persistence for the three records produced per inquiry
 */
export interface RecordStore {
  has(emailId: string): Promise<boolean>;
  saveEvent(event: ParsedEvent): Promise<void>;
  saveAcknowledgment(ack: Acknowledgment): Promise<void>;
  saveQuote(quote: Quote): Promise<void>;
  getEvent(emailId: string): Promise<ParsedEvent | undefined>;
  getAcknowledgment(emailId: string): Promise<Acknowledgment | undefined>;
  getQuote(emailId: string): Promise<Quote | undefined>;
}

/**
 * Stores records as pretty-printed JSON files:
 * events/{id}.json, outbox/{id}_ack.json and quotes/{id}.json
 */
export class FileRecordStore implements RecordStore {
  constructor(private readonly dataDir: string) {}

  async has(emailId: string): Promise<boolean> {
    const filePath = this.eventPath(emailId);
    try {
      await access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async saveEvent(event: ParsedEvent): Promise<void> {
    await this.write(this.eventPath(event.email_id), event);
  }

  async saveAcknowledgment(ack: Acknowledgment): Promise<void> {
    await this.write(this.acknowledgmentPath(ack.email_id), ack);
  }

  async saveQuote(quote: Quote): Promise<void> {
    await this.write(this.quotePath(quote.email_id), quote);
  }

  async getEvent(emailId: string): Promise<ParsedEvent | undefined> {
    return this.read(this.eventPath(emailId), ParsedEventSchema);
  }

  async getAcknowledgment(emailId: string): Promise<Acknowledgment | undefined> {
    return this.read(this.acknowledgmentPath(emailId), AcknowledgmentSchema);
  }

  async getQuote(emailId: string): Promise<Quote | undefined> {
    return this.read(this.quotePath(emailId), QuoteSchema);
  }

  private eventPath(emailId: string): string {
    return join(this.dataDir, 'events', `${checkEmailId(emailId)}.json`);
  }

  private acknowledgmentPath(emailId: string): string {
    return join(this.dataDir, 'outbox', `${checkEmailId(emailId)}_ack.json`);
  }

  private quotePath(emailId: string): string {
    return join(this.dataDir, 'quotes', `${checkEmailId(emailId)}.json`);
  }

  private async write(filePath: string, record: object): Promise<void> {
    try {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, JSON.stringify(record, null, 2), 'utf-8');
    } catch (error) {
      logger.error({ error, filePath }, 'Failed to write record');
      throw new StorageError(`Failed to write ${filePath}: ${error}`);
    }

    logger.debug({ filePath }, 'Record saved');
  }

  private async read<T>(filePath: string, schema: z.ZodType<T>): Promise<T | undefined> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw new StorageError(`Failed to read ${filePath}: ${error}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new StorageError(`Corrupt record ${filePath}: ${error}`);
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      throw new StorageError(`Corrupt record ${filePath}: ${result.error.message}`);
    }
    return result.data;
  }
}

// Ids become file names, so only content-derived ids are accepted
function checkEmailId(emailId: string): string {
  if (!EMAIL_ID_PATTERN.test(emailId)) {
    throw new ValidationError(`Invalid email ID '${emailId}'`);
  }
  return emailId;
}
