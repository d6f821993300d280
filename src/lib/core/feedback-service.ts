import { FeedbackField, FeedbackResponse, FeedbackState, FeedbackSubmission } from './types';
import { FEEDBACK_MESSAGES, missingFieldsMessage } from '../constants/messages';

export const DEFAULT_FEEDBACK_ENDPOINT = '/.netlify/functions/feedback';

const FIELD_NAMES: FeedbackField[] = ['name', 'email', 'message'];

interface FunctionPayload {
  backend?: unknown;
  fields?: unknown;
}

function isFunctionPayload(value: unknown): value is FunctionPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readMissingFields(payload: FunctionPayload | null): FeedbackField[] {
  const fields = payload?.fields;
  if (!Array.isArray(fields)) return [];
  return FIELD_NAMES.filter(field => fields.includes(field));
}

export class FeedbackService {
  private state: FeedbackState = 'normal';
  private listeners: Set<(state: FeedbackState) => void> = new Set();

  constructor(
    private readonly endpoint: string = DEFAULT_FEEDBACK_ENDPOINT,
    private readonly fetchImpl: typeof fetch = (input, init) => fetch(input, init)
  ) {}

  getState(): FeedbackState {
    return this.state;
  }

  subscribe(listener: (state: FeedbackState) => void): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private setState(newState: FeedbackState) {
    this.state = newState;
    this.listeners.forEach(listener => listener(newState));
  }

  async submitFeedback(submission: FeedbackSubmission): Promise<FeedbackResponse> {
    this.setState('submitting');

    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Accept': 'application/json'
        },
        body: JSON.stringify(submission)
      });
    } catch {
      this.setState('error');
      return {
        success: false,
        error: { message: FEEDBACK_MESSAGES.error.networkError, code: 'network' }
      };
    }

    const body: unknown = await response.json().catch(() => null);
    const payload = isFunctionPayload(body) ? body : null;

    if (response.ok) {
      this.setState('success');
      const backend = payload?.backend;
      return { success: true, backend: typeof backend === 'string' ? backend : undefined };
    }

    this.setState('error');

    if (response.status === 400) {
      const fields = readMissingFields(payload);
      return {
        success: false,
        error: { message: missingFieldsMessage(fields), code: 'validation', fields }
      };
    }

    return {
      success: false,
      error: { message: FEEDBACK_MESSAGES.error.retryLater, code: 'server' }
    };
  }

  reset() {
    this.setState('normal');
  }
}
