import { BackendUnavailableError, FeedbackBackend } from './backend';
import { BackendAttempt, BackendStatus, FeedbackRecord, SubmissionOutcome } from './types';
import { validateSubmission } from './validation';
import { Logger, describeError } from '../logger';

export interface PipelineOptions {
  now?: () => Date;
}

/**
 * Stores a contact form submission in the first backend that accepts it.
 *
 * Backends are tried once each, in order. Unconfigured ones are skipped,
 * failures are logged and the next backend is tried. Nothing is retried and
 * nothing is rolled back: a remote write that half-succeeded before erroring
 * may leave a copy behind while a later backend also stores the record.
 */
export class FeedbackSubmissionPipeline {
  private readonly now: () => Date;

  constructor(
    private readonly backends: FeedbackBackend[],
    options: PipelineOptions = {}
  ) {
    if (backends.length === 0) {
      throw new Error('A feedback pipeline needs at least one backend');
    }
    this.now = options.now ?? (() => new Date());
  }

  describeBackends(): BackendStatus[] {
    return this.backends.map(backend => ({
      name: backend.name,
      configured: backend.isConfigured()
    }));
  }

  async submit(name: string, email: string, message: string): Promise<SubmissionOutcome> {
    const validation = validateSubmission({ name, email, message });
    if (!validation.valid) {
      Logger.debug('Rejected submission with missing fields:', validation.missingFields);
      return { kind: 'validation_failed', missingFields: validation.missingFields };
    }

    const record: FeedbackRecord = Object.freeze({
      timestamp: this.now().toISOString(),
      ...validation.submission
    });

    const attempts: BackendAttempt[] = [];

    for (const backend of this.backends) {
      if (!backend.isConfigured()) {
        Logger.debug(`Skipping ${backend.name}: not configured`);
        attempts.push({ backend: backend.name, status: 'unavailable', reason: 'not configured' });
        continue;
      }

      try {
        await backend.save(record);
      } catch (error) {
        if (error instanceof BackendUnavailableError) {
          Logger.debug(error.message);
          attempts.push({ backend: backend.name, status: 'unavailable', reason: error.message });
        } else {
          Logger.error(`Saving feedback to ${backend.name} failed:`, describeError(error));
          attempts.push({
            backend: backend.name,
            status: 'failed',
            reason: error instanceof Error ? error.message : String(error)
          });
        }
        continue;
      }

      attempts.push({ backend: backend.name, status: 'persisted' });
      Logger.info(`Feedback persisted via ${backend.name}`, { timestamp: record.timestamp });
      return { kind: 'persisted', backend: backend.name, record, attempts };
    }

    Logger.error('Feedback could not be stored by any backend', attempts);
    return { kind: 'all_backends_failed', attempts };
  }
}
