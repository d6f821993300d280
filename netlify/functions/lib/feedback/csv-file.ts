import { promises as fs } from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify/sync';
import { parse } from 'csv-parse/sync';
import { FeedbackBackend, toBackendWriteError } from './backend';
import { CsvFileConfig } from './config';
import { FeedbackRecord } from './types';
import { Logger } from '../logger';

export const CSV_HEADER = ['Timestamp', 'Name', 'Email', 'Message'];

// fs errors can come from another realm (Jest's VM context), so check the shape
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

function toRecord(row: unknown): FeedbackRecord | null {
  if (!Array.isArray(row) || row.length !== CSV_HEADER.length) return null;
  const [timestamp, name, email, message]: unknown[] = row;
  if (typeof timestamp !== 'string' || typeof name !== 'string'
    || typeof email !== 'string' || typeof message !== 'string') {
    return null;
  }
  return { timestamp, name, email, message };
}

export class CsvFileBackend implements FeedbackBackend {
  readonly name = 'csv' as const;
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly config: CsvFileConfig) {}

  get filePath(): string {
    return path.join(this.config.baseDirectory, this.config.filename);
  }

  isConfigured(): boolean {
    return true;
  }

  save(record: FeedbackRecord): Promise<void> {
    const write = this.queue.then(() => this.appendRecord(record));
    // The caller gets the failure through `write`; the queue only orders writes
    this.queue = write.catch(() => undefined);
    return write;
  }

  async readAll(): Promise<FeedbackRecord[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return [];
      throw error;
    }

    const rows: unknown = parse(content, { skip_empty_lines: true, relax_column_count: true });
    if (!Array.isArray(rows)) return [];

    return rows
      .slice(1)
      .map(toRecord)
      .filter((record): record is FeedbackRecord => record !== null);
  }

  private async appendRecord(record: FeedbackRecord): Promise<void> {
    const row = stringify([[record.timestamp, record.name, record.email, record.message]]);

    try {
      await fs.mkdir(this.config.baseDirectory, { recursive: true });

      try {
        // 'ax' creates the file in append mode and fails if it already exists,
        // so only the writer that creates the file adds the header
        await fs.writeFile(this.filePath, stringify([CSV_HEADER]) + row, { encoding: 'utf8', flag: 'ax' });
        Logger.info(`Created ${this.filePath}`);
        return;
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'EEXIST') throw error;
      }

      await fs.appendFile(this.filePath, row, { encoding: 'utf8', flag: 'a' });
    } catch (error) {
      throw toBackendWriteError(this.name, error);
    }
  }
}
