import path from 'path';
import { FeedbackBackend } from './backend';
import { CsvFileConfig, FeedbackConfig } from './config';
import { CsvFileBackend } from './csv-file';
import { FetchLike, GitHubIssuesBackend } from './github-issues';
import { AccessTokenProvider, GoogleSheetsBackend } from './google-sheets';
import { FeedbackSubmissionPipeline, PipelineOptions } from './pipeline';
import { BackendName } from './types';

export interface PipelineDependencies extends PipelineOptions {
  fetch?: FetchLike;
  getAccessToken?: AccessTokenProvider;
}

// Warm invocations share one backend per file so their writes go through one queue
const csvBackends = new Map<string, CsvFileBackend>();

function csvBackendFor(config: CsvFileConfig): CsvFileBackend {
  const filePath = path.resolve(config.baseDirectory, config.filename);
  let backend = csvBackends.get(filePath);
  if (!backend) {
    backend = new CsvFileBackend(config);
    csvBackends.set(filePath, backend);
  }
  return backend;
}

export function createBackend(
  name: BackendName,
  config: FeedbackConfig,
  deps: PipelineDependencies = {}
): FeedbackBackend {
  switch (name) {
    case 'issue-tracker':
      return new GitHubIssuesBackend(config.github, config.remoteTimeoutMs, deps.fetch);
    case 'spreadsheet':
      return new GoogleSheetsBackend(config.sheets, config.remoteTimeoutMs, deps.fetch, deps.getAccessToken);
    case 'csv':
      return csvBackendFor(config.csv);
  }
}

export function createFeedbackPipeline(
  config: FeedbackConfig,
  deps: PipelineDependencies = {}
): FeedbackSubmissionPipeline {
  const backends = config.backendOrder.map(name => createBackend(name, config, deps));
  return new FeedbackSubmissionPipeline(backends, { now: deps.now });
}

export { FeedbackSubmissionPipeline } from './pipeline';
export { loadFeedbackConfig } from './config';
export type { FeedbackConfig } from './config';
export type { SubmissionOutcome, FeedbackRecord, BackendName } from './types';
