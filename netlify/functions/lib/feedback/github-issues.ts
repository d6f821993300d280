import fetch, { RequestInit, Response } from 'node-fetch';
import { format } from 'date-fns';
import { UTCDate } from '@date-fns/utc';
import { BackendUnavailableError, BackendWriteError, FeedbackBackend, toBackendWriteError } from './backend';
import { GitHubIssuesConfig, isPlaceholder } from './config';
import { FeedbackRecord } from './types';
import { Logger } from '../logger';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const ISSUE_LABELS = ['feedback', 'contact-form'];

export function formatUtc(timestamp: string): string {
  return format(new UTCDate(timestamp), 'yyyy-MM-dd HH:mm:ss');
}

export function buildIssue(record: FeedbackRecord) {
  const submittedAt = `${formatUtc(record.timestamp)} UTC`;

  const body = [
    '## User Feedback',
    '',
    `**Name:** ${record.name}  `,
    `**Email:** ${record.email}  `,
    `**Timestamp:** ${submittedAt}  `,
    '',
    '---',
    '',
    '### Message',
    record.message,
    '',
    '---',
    '',
    '*Submitted through the contact form.*'
  ].join('\n');

  return {
    title: `Feedback from ${record.name} - ${submittedAt}`,
    body,
    labels: ISSUE_LABELS
  };
}

export class GitHubIssuesBackend implements FeedbackBackend {
  readonly name = 'issue-tracker' as const;

  constructor(
    private readonly config: GitHubIssuesConfig,
    private readonly timeoutMs: number,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  isConfigured(): boolean {
    return !isPlaceholder(this.config.token)
      && !isPlaceholder(this.config.repoOwner)
      && !isPlaceholder(this.config.repoName);
  }

  private get repoUrl(): string {
    return `${this.config.apiUrl}/repos/${this.config.repoOwner}/${this.config.repoName}`;
  }

  private get headers() {
    return {
      'Authorization': `Bearer ${this.config.token}`,
      'Accept': 'application/vnd.github+json',
      'Content-Type': 'application/json'
    };
  }

  /** GET on the repository; any answer other than 200 counts as unreachable. */
  async testConnection(): Promise<boolean> {
    if (!this.isConfigured()) return false;

    try {
      const response = await this.fetchImpl(this.repoUrl, {
        method: 'GET',
        headers: this.headers,
        timeout: this.timeoutMs
      });
      return response.status === 200;
    } catch (error) {
      Logger.warn('GitHub connectivity check errored:', error instanceof Error ? error.message : error);
      return false;
    }
  }

  async save(record: FeedbackRecord): Promise<void> {
    if (!this.isConfigured()) {
      throw new BackendUnavailableError(this.name, 'token or repository not set');
    }

    if (this.config.selfTest && !(await this.testConnection())) {
      Logger.warn(`GitHub self-test failed for ${this.config.repoOwner}/${this.config.repoName}, attempting the write anyway`);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.repoUrl}/issues`, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify(buildIssue(record)),
        timeout: this.timeoutMs
      });
    } catch (error) {
      throw toBackendWriteError(this.name, error);
    }

    if (response.status !== 201) {
      const details = await response.text().catch(() => '');
      throw new BackendWriteError(
        this.name,
        `GitHub API responded ${response.status}${details ? `: ${details.slice(0, 200)}` : ''}`,
        response.status
      );
    }

    const issue: { number?: number } | null = await response.json().catch(() => null);
    Logger.info('Feedback stored as GitHub issue', { issueNumber: issue?.number });
  }
}
