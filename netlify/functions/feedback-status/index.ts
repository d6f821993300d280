import { Handler, HandlerEvent, HandlerResponse } from '@netlify/functions';
import { createFeedbackPipeline, FeedbackConfig, loadFeedbackConfig } from '../lib/feedback';

type StatusEvent = Pick<HandlerEvent, 'httpMethod'>;

const headers = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type'
};

/**
 * Reports which feedback backends would be tried, in order, and whether each
 * has its settings. Only names and booleans leave this function.
 */
export function createStatusHandler(loadConfig: () => FeedbackConfig = () => loadFeedbackConfig(process.env)) {
  return async (event: StatusEvent): Promise<HandlerResponse> => {
    if (event.httpMethod !== 'GET') {
      return {
        statusCode: 405,
        headers,
        body: JSON.stringify({ error: 'Method not allowed' })
      };
    }

    const pipeline = createFeedbackPipeline(loadConfig());
    return {
      statusCode: 200,
      headers,
      body: JSON.stringify({ backends: pipeline.describeBackends() })
    };
  };
}

export const handler: Handler = createStatusHandler();
