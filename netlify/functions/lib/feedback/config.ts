import path from 'path';
import { BACKEND_NAMES, BackendName } from './types';

export interface GitHubIssuesConfig {
  token: string;
  repoOwner: string;
  repoName: string;
  apiUrl: string;
  selfTest: boolean;
}

export interface ServiceAccountKey {
  type: string;
  project_id: string;
  private_key_id: string;
  private_key: string;
  client_email: string;
  client_id: string;
  auth_uri: string;
  token_uri: string;
}

export const SERVICE_ACCOUNT_FIELDS: (keyof ServiceAccountKey)[] = [
  'type',
  'project_id',
  'private_key_id',
  'private_key',
  'client_email',
  'client_id',
  'auth_uri',
  'token_uri'
];

export interface GoogleSheetsConfig {
  credentials: Partial<ServiceAccountKey>;
  spreadsheetId: string;
  worksheetName: string;
}

export interface CsvFileConfig {
  baseDirectory: string;
  filename: string;
}

export interface AnalyticsConfig {
  apiKey: string;
  host: string;
}

export interface FeedbackConfig {
  backendOrder: BackendName[];
  remoteTimeoutMs: number;
  github: GitHubIssuesConfig;
  sheets: GoogleSheetsConfig;
  csv: CsvFileConfig;
  analytics: AnalyticsConfig;
}

export const DEFAULT_WORKSHEET_NAME = 'Feedback';
export const DEFAULT_CSV_FILENAME = 'feedback.csv';
export const DEFAULT_REMOTE_TIMEOUT_MS = 5000;

const PLACEHOLDER_PATTERNS = [
  /^your[-_]/i,
  /^<.*>$/,
  /^changeme$/i,
  /^placeholder$/i,
  /^x{3,}$/i
];

/**
 * True for values that are missing or were left as template text
 * (`your-project-id`, `<token>`, `changeme`...).
 */
export function isPlaceholder(value: string | undefined | null): boolean {
  const trimmed = value?.trim() ?? '';
  if (!trimmed) return true;
  return PLACEHOLDER_PATTERNS.some(pattern => pattern.test(trimmed));
}

export function isServiceAccountKeyComplete(credentials: Partial<ServiceAccountKey>): credentials is ServiceAccountKey {
  if (credentials.type !== 'service_account') return false;
  return SERVICE_ACCOUNT_FIELDS.every(field => !isPlaceholder(credentials[field]));
}

export function parseBackendOrder(value: string | undefined): BackendName[] {
  const requested = (value || BACKEND_NAMES.join(','))
    .split(',')
    .map(name => name.trim().toLowerCase());

  const order: BackendName[] = [];
  for (const name of requested) {
    const backend = BACKEND_NAMES.find(candidate => candidate === name);
    if (backend && !order.includes(backend)) {
      order.push(backend);
    }
  }

  // The local file is the last resort and is never left out of the chain
  if (!order.includes('csv')) {
    order.push('csv');
  }
  return order;
}

function parseTimeout(value: string | undefined): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_REMOTE_TIMEOUT_MS;
}

function readServiceAccountJson(raw: string): Partial<ServiceAccountKey> {
  const parsed: Partial<Record<keyof ServiceAccountKey, unknown>> | null = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null) {
    return {};
  }

  const credentials: Partial<ServiceAccountKey> = {};
  for (const field of SERVICE_ACCOUNT_FIELDS) {
    const value = parsed[field];
    if (typeof value === 'string') {
      credentials[field] = value;
    }
  }
  return credentials;
}

function readServiceAccountKey(env: NodeJS.ProcessEnv): Partial<ServiceAccountKey> {
  const json = env.GOOGLE_SERVICE_ACCOUNT_JSON;
  if (json) {
    try {
      return readServiceAccountJson(json);
    } catch {
      // Malformed JSON leaves the spreadsheet backend unconfigured
      return {};
    }
  }

  return {
    type: env.GOOGLE_SERVICE_ACCOUNT_TYPE,
    project_id: env.GOOGLE_SERVICE_ACCOUNT_PROJECT_ID,
    private_key_id: env.GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY_ID,
    // Hosting dashboards store the PEM on one line with escaped newlines
    private_key: env.GOOGLE_SERVICE_ACCOUNT_PRIVATE_KEY?.replace(/\\n/g, '\n'),
    client_email: env.GOOGLE_SERVICE_ACCOUNT_CLIENT_EMAIL,
    client_id: env.GOOGLE_SERVICE_ACCOUNT_CLIENT_ID,
    auth_uri: env.GOOGLE_SERVICE_ACCOUNT_AUTH_URI,
    token_uri: env.GOOGLE_SERVICE_ACCOUNT_TOKEN_URI
  };
}

export function loadFeedbackConfig(env: NodeJS.ProcessEnv = process.env): FeedbackConfig {
  return {
    backendOrder: parseBackendOrder(env.FEEDBACK_BACKEND_ORDER),
    remoteTimeoutMs: parseTimeout(env.FEEDBACK_REMOTE_TIMEOUT_MS),
    github: {
      token: env.GITHUB_TOKEN || '',
      repoOwner: env.GITHUB_REPO_OWNER || '',
      repoName: env.GITHUB_REPO_NAME || '',
      apiUrl: (env.GITHUB_API_URL || 'https://api.github.com').replace(/\/+$/, ''),
      selfTest: env.GITHUB_SELF_TEST === 'true'
    },
    sheets: {
      credentials: readServiceAccountKey(env),
      spreadsheetId: env.GOOGLE_SHEETS_SPREADSHEET_ID || '',
      worksheetName: env.GOOGLE_SHEETS_WORKSHEET_NAME || DEFAULT_WORKSHEET_NAME
    },
    csv: {
      baseDirectory: env.FEEDBACK_DATA_DIR || path.join(process.cwd(), 'data'),
      filename: env.FEEDBACK_CSV_FILENAME || DEFAULT_CSV_FILENAME
    },
    analytics: {
      apiKey: env.POSTHOG_API_KEY || '',
      host: env.POSTHOG_HOST || 'https://app.posthog.com'
    }
  };
}
