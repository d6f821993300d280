import { BackendName, FeedbackRecord } from './types';

export interface FeedbackBackend {
  readonly name: BackendName;
  /** False when required settings are missing or still placeholders. */
  isConfigured(): boolean;
  /** Resolves once the record is stored; rejects with a BackendWriteError otherwise. */
  save(record: FeedbackRecord): Promise<void>;
}

export class BackendUnavailableError extends Error {
  constructor(public readonly backend: BackendName, reason: string) {
    super(`${backend} backend unavailable: ${reason}`);
    this.name = 'BackendUnavailableError';
  }
}

export class BackendWriteError extends Error {
  constructor(
    public readonly backend: BackendName,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BackendWriteError';
  }
}

export function toBackendWriteError(backend: BackendName, error: unknown): BackendWriteError {
  if (error instanceof BackendWriteError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new BackendWriteError(backend, message, undefined, { cause: error });
}
