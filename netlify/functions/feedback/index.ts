import { Handler, HandlerEvent, HandlerResponse } from '@netlify/functions';
import {
  BackendName,
  createFeedbackPipeline,
  FeedbackConfig,
  loadFeedbackConfig,
  PipelineDependencies
} from '../lib/feedback';
import { Analytics, createAnalytics } from '../lib/posthog';
import { Logger, describeError } from '../lib/logger';

export const RETRY_LATER_MESSAGE = 'We could not save your message right now. Please try again later.';

type FeedbackEvent = Pick<HandlerEvent, 'httpMethod' | 'headers' | 'body'>;

export interface FeedbackHandlerOptions {
  loadConfig?: () => FeedbackConfig;
  deps?: PipelineDependencies;
  analytics?: (config: FeedbackConfig) => Analytics;
}

function getCorsHeaders(origin: string | undefined) {
  return {
    'Access-Control-Allow-Origin': origin || '*',
    'Access-Control-Allow-Headers': 'Content-Type, Accept, Origin',
    'Access-Control-Allow-Methods': 'POST, OPTIONS',
    'Access-Control-Max-Age': '86400',
    'Content-Type': 'application/json',
    'Vary': 'Origin'
  };
}

function parseBody(body: string | null): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(body || '{}');
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;
    return Object.fromEntries(Object.entries(parsed));
  } catch {
    return null;
  }
}

function asField(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

// The record is already stored at this point, so analytics must never turn it into a 500
async function trackSubmission(getAnalytics: () => Analytics, email: string, backend: BackendName) {
  try {
    const analytics = getAnalytics();
    analytics.trackEvent('feedback_submitted', email, { backend });
    await analytics.shutdown();
  } catch (error) {
    Logger.error('Analytics error:', describeError(error));
  }
}

export function createFeedbackHandler(options: FeedbackHandlerOptions = {}) {
  const loadConfig = options.loadConfig ?? (() => loadFeedbackConfig(process.env));
  const analyticsFor = options.analytics ?? ((config: FeedbackConfig) => createAnalytics(config.analytics));

  return async (event: FeedbackEvent): Promise<HandlerResponse> => {
    const origin = event.headers.origin || event.headers.Origin;
    const headers = getCorsHeaders(origin);

    // Handle preflight
    if (event.httpMethod === 'OPTIONS') {
      return { statusCode: 204, headers };
    }

    if (event.httpMethod !== 'POST') {
      return {
        statusCode: 405,
        headers,
        body: JSON.stringify({ error: 'Method not allowed' })
      };
    }

    const body = parseBody(event.body);
    if (!body) {
      return {
        statusCode: 400,
        headers,
        body: JSON.stringify({ error: 'Invalid request body' })
      };
    }

    try {
      const config = loadConfig();
      const pipeline = createFeedbackPipeline(config, options.deps);
      const outcome = await pipeline.submit(asField(body.name), asField(body.email), asField(body.message));

      switch (outcome.kind) {
        case 'validation_failed':
          return {
            statusCode: 400,
            headers,
            body: JSON.stringify({ error: 'Missing required fields', fields: outcome.missingFields })
          };

        case 'persisted': {
          await trackSubmission(() => analyticsFor(config), outcome.record.email, outcome.backend);

          return {
            statusCode: 200,
            headers,
            body: JSON.stringify({
              success: true,
              backend: outcome.backend,
              timestamp: outcome.record.timestamp
            })
          };
        }

        case 'all_backends_failed':
          return {
            statusCode: 500,
            headers,
            body: JSON.stringify({ error: RETRY_LATER_MESSAGE })
          };
      }
    } catch (error) {
      Logger.error('Feedback function error:', describeError(error));
      return {
        statusCode: 500,
        headers,
        body: JSON.stringify({ error: RETRY_LATER_MESSAGE })
      };
    }
  };
}

export const handler: Handler = createFeedbackHandler();
