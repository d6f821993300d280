import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { jest, describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { createBackend, createFeedbackPipeline, loadFeedbackConfig } from './index';
import { CsvFileBackend } from './csv-file';

describe('createFeedbackPipeline', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'feedback-pipeline-'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  test('should reuse the csv backend for the same file', () => {
    const config = loadFeedbackConfig({ FEEDBACK_DATA_DIR: tempDir });
    const other = loadFeedbackConfig({ FEEDBACK_DATA_DIR: tempDir, FEEDBACK_CSV_FILENAME: 'other.csv' });

    const first = createBackend('csv', config);

    expect(createBackend('csv', loadFeedbackConfig({ FEEDBACK_DATA_DIR: tempDir }))).toBe(first);
    expect(createBackend('csv', other)).not.toBe(first);
  });

  test('should write the header once when separate pipelines race on a new file', async () => {
    const config = loadFeedbackConfig({ FEEDBACK_DATA_DIR: tempDir });
    const pipelines = [createFeedbackPipeline(config), createFeedbackPipeline(loadFeedbackConfig({ FEEDBACK_DATA_DIR: tempDir }))];
    const names = ['Ann', 'Ben', 'Cat', 'Dan', 'Eve', 'Fay'];

    const outcomes = await Promise.all(names.map((name, index) =>
      pipelines[index % pipelines.length].submit(name, `${name.toLowerCase()}@example.com`, 'Hello')
    ));

    expect(outcomes.map(outcome => outcome.kind)).toEqual(names.map(() => 'persisted'));

    const csv = new CsvFileBackend(config.csv);
    const stored = await csv.readAll();
    expect(stored.map(entry => entry.name)).toEqual(names);

    const content = await fs.readFile(csv.filePath, 'utf8');
    expect(content.split('\n').filter(line => line === 'Timestamp,Name,Email,Message')).toHaveLength(1);
  });
});
