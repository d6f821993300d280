export type FeedbackField = 'name' | 'email' | 'message';

export type BackendName = 'issue-tracker' | 'spreadsheet' | 'csv';

export const BACKEND_NAMES: readonly BackendName[] = ['issue-tracker', 'spreadsheet', 'csv'];

export interface FeedbackRecord {
  readonly timestamp: string;
  readonly name: string;
  readonly email: string;
  readonly message: string;
}

export type AttemptStatus = 'unavailable' | 'failed' | 'persisted';

export interface BackendAttempt {
  backend: BackendName;
  status: AttemptStatus;
  reason?: string;
}

export type SubmissionOutcome =
  | { kind: 'validation_failed'; missingFields: FeedbackField[] }
  | { kind: 'persisted'; backend: BackendName; record: FeedbackRecord; attempts: BackendAttempt[] }
  | { kind: 'all_backends_failed'; attempts: BackendAttempt[] };

export interface BackendStatus {
  name: BackendName;
  configured: boolean;
}
