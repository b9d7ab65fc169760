import fs from 'node:fs';
import path from 'node:path';

import { createLogger, describeError, Logger } from './logger';

export const AUDIT_TRUNCATE_LENGTH = 500;

export type AuditRecord = {
  timestamp: string;
  event: string;
  model: string;
  prompt: string;
  response: string;
  temperature?: number;
  parsedScore?: number;
};

export type AuditEntry = Omit<AuditRecord, 'timestamp'>;

export interface AuditLog {
  record(entry: AuditEntry): void;
}

export const truncateForAudit = (text: string, limit = AUDIT_TRUNCATE_LENGTH): string =>
  text.length > limit ? `${text.slice(0, limit)}...` : text;

type AuditLogOptions = {
  filePath?: string;
  /** How many of the latest records to keep readable through `entries()`. Off by default. */
  retain?: number;
  logger?: Logger;
  now?: () => Date;
};

/**
 * Appends each audit record to a JSON-lines file when a path is given.
 * Optionally keeps the latest `retain` records in memory.
 */
export class JsonlAuditLog implements AuditLog {
  private readonly records: AuditRecord[] = [];

  private readonly retain: number;

  private readonly filePath?: string;

  private readonly logger: Logger;

  private readonly now: () => Date;

  constructor({ filePath, retain, logger, now }: AuditLogOptions = {}) {
    this.retain = Math.max(0, Math.floor(retain ?? 0));
    this.filePath = filePath ? path.resolve(filePath) : undefined;
    this.logger = logger ?? createLogger('audit');
    this.now = now ?? (() => new Date());
  }

  record(entry: AuditEntry): void {
    const record: AuditRecord = {
      timestamp: this.now().toISOString(),
      ...entry,
      prompt: truncateForAudit(entry.prompt),
      response: truncateForAudit(entry.response),
    };

    if (this.retain > 0) {
      this.records.push(record);

      if (this.records.length > this.retain) {
        this.records.shift();
      }
    }

    if (!this.filePath) {
      return;
    }

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`);
    } catch (error) {
      this.logger.error(`Failed to append audit record to ${this.filePath}: ${describeError(error)}`);
    }
  }

  entries(): readonly AuditRecord[] {
    return this.records;
  }
}
