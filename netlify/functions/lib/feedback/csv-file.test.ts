import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { BackendWriteError } from './backend';
import { CsvFileBackend, isErrnoException } from './csv-file';
import { FeedbackRecord } from './types';

const record = (overrides: Partial<FeedbackRecord> = {}): FeedbackRecord => ({
  timestamp: '2026-03-01T12:00:00.000Z',
  name: 'Alice',
  email: 'alice@example.com',
  message: 'Great tool!',
  ...overrides
});

describe('CsvFileBackend', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'feedback-csv-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  test('should always be configured', () => {
    expect(new CsvFileBackend({ baseDirectory: tempDir, filename: 'feedback.csv' }).isConfigured()).toBe(true);
  });

  test('should create the directory and write the header once', async () => {
    const baseDirectory = path.join(tempDir, 'nested', 'data');
    const backend = new CsvFileBackend({ baseDirectory, filename: 'feedback.csv' });

    await backend.save(record({ name: 'Alice' }));
    await backend.save(record({ name: 'Bob' }));
    await backend.save(record({ name: 'Carol' }));

    const content = await fs.readFile(path.join(baseDirectory, 'feedback.csv'), 'utf8');
    const lines = content.trimEnd().split('\n');
    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe('Timestamp,Name,Email,Message');
    expect(lines[1]).toBe('2026-03-01T12:00:00.000Z,Alice,alice@example.com,Great tool!');
  });

  test('should not add a second header to an existing file', async () => {
    const first = new CsvFileBackend({ baseDirectory: tempDir, filename: 'feedback.csv' });
    await first.save(record());

    const second = new CsvFileBackend({ baseDirectory: tempDir, filename: 'feedback.csv' });
    await second.save(record({ name: 'Bob' }));

    const content = await fs.readFile(path.join(tempDir, 'feedback.csv'), 'utf8');
    expect(content).toBe(
      'Timestamp,Name,Email,Message\n'
      + '2026-03-01T12:00:00.000Z,Alice,alice@example.com,Great tool!\n'
      + '2026-03-01T12:00:00.000Z,Bob,alice@example.com,Great tool!\n'
    );
  });

  test('should quote commas, quotes and newlines in the message', async () => {
    const backend = new CsvFileBackend({ baseDirectory: tempDir, filename: 'feedback.csv' });

    await backend.save(record({ message: 'Hello, "world"\nsecond line' }));

    const content = await fs.readFile(backend.filePath, 'utf8');
    expect(content).toBe(
      'Timestamp,Name,Email,Message\n'
      + '2026-03-01T12:00:00.000Z,Alice,alice@example.com,"Hello, ""world""\nsecond line"\n'
    );
  });

  test('should read back exactly what was written', async () => {
    const backend = new CsvFileBackend({ baseDirectory: tempDir, filename: 'feedback.csv' });
    const written = record({ name: 'Zoë', message: 'Hello, "world"\nsecond line' });

    await backend.save(written);

    expect(await backend.readAll()).toEqual([written]);
  });

  test('should keep rows intact when saves race', async () => {
    const backend = new CsvFileBackend({ baseDirectory: tempDir, filename: 'feedback.csv' });
    const names = ['Ann', 'Ben', 'Cat', 'Dan', 'Eve'];

    await Promise.all(names.map(name => backend.save(record({ name }))));

    const stored = await backend.readAll();
    expect(stored.map(entry => entry.name)).toEqual(names);
    const content = await fs.readFile(backend.filePath, 'utf8');
    expect(content.split('\n').filter(line => line === 'Timestamp,Name,Email,Message')).toHaveLength(1);
  });

  test('should return no records when the file does not exist', async () => {
    const backend = new CsvFileBackend({ baseDirectory: tempDir, filename: 'missing.csv' });

    expect(await backend.readAll()).toEqual([]);
  });

  test('should reject with a write error when the directory cannot be created', async () => {
    const blocker = path.join(tempDir, 'not-a-directory');
    await fs.writeFile(blocker, 'occupied');
    const backend = new CsvFileBackend({ baseDirectory: blocker, filename: 'feedback.csv' });

    await expect(backend.save(record())).rejects.toBeInstanceOf(BackendWriteError);
  });

  test('should keep accepting writes after a failed one', async () => {
    const blocker = path.join(tempDir, 'blocked');
    await fs.writeFile(blocker, 'occupied');
    const backend = new CsvFileBackend({ baseDirectory: blocker, filename: 'feedback.csv' });
    await expect(backend.save(record())).rejects.toBeInstanceOf(BackendWriteError);

    await fs.rm(blocker);
    await backend.save(record({ name: 'Bob' }));

    expect(await backend.readAll()).toEqual([record({ name: 'Bob' })]);
  });
});

describe('isErrnoException', () => {
  test('should accept errors from another realm by their code', () => {
    expect(isErrnoException({ code: 'EEXIST', message: 'file already exists' })).toBe(true);
    expect(isErrnoException(Object.assign(new Error('missing'), { code: 'ENOENT' }))).toBe(true);
  });

  test('should reject values without a code', () => {
    expect(isErrnoException(new Error('plain'))).toBe(false);
    expect(isErrnoException('ENOENT')).toBe(false);
    expect(isErrnoException(null)).toBe(false);
  });
});
