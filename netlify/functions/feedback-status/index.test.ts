import { describe, test, expect } from '@jest/globals';
import { createStatusHandler } from './index';
import { loadFeedbackConfig } from '../lib/feedback';

describe('feedback-status function', () => {
  const handler = createStatusHandler(() => loadFeedbackConfig({
    GITHUB_TOKEN: 'test-token',
    GITHUB_REPO_OWNER: 'acme',
    GITHUB_REPO_NAME: 'feedback-inbox',
    GOOGLE_SHEETS_SPREADSHEET_ID: 'sheet-123'
  }));

  test('should list backends in chain order with their configuration state', async () => {
    const response = await handler({ httpMethod: 'GET' });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body ?? '')).toEqual({
      backends: [
        { name: 'issue-tracker', configured: true },
        { name: 'spreadsheet', configured: false },
        { name: 'csv', configured: true }
      ]
    });
  });

  test('should never echo credentials', async () => {
    const response = await handler({ httpMethod: 'GET' });

    expect(response.body).not.toContain('test-token');
    expect(response.body).not.toContain('sheet-123');
  });

  test('should reject other methods', async () => {
    const response = await handler({ httpMethod: 'POST' });

    expect(response.statusCode).toBe(405);
  });
});
