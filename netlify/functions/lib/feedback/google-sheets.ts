import fetch, { Response } from 'node-fetch';
import { JWT } from 'google-auth-library';
import { BackendUnavailableError, BackendWriteError, FeedbackBackend, toBackendWriteError } from './backend';
import { GoogleSheetsConfig, ServiceAccountKey, isPlaceholder, isServiceAccountKeyComplete } from './config';
import { FetchLike } from './github-issues';
import { FeedbackRecord } from './types';
import { Logger } from '../logger';

export const SHEETS_API_URL = 'https://sheets.googleapis.com/v4/spreadsheets';
export const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';
export const SHEET_HEADER = ['Timestamp', 'Name', 'Email', 'Message', 'Status'];
export const NEW_ROW_STATUS = 'New';

export type AccessTokenProvider = (credentials: ServiceAccountKey) => Promise<string>;

export const serviceAccountToken: AccessTokenProvider = async (credentials) => {
  const client = new JWT({
    email: credentials.client_email,
    key: credentials.private_key,
    keyId: credentials.private_key_id,
    scopes: [SHEETS_SCOPE]
  });
  const { token } = await client.getAccessToken();
  if (!token) {
    throw new Error('Service account did not return an access token');
  }
  return token;
};

// Sheet titles with spaces or quotes must be quoted in A1 notation
export function worksheetRange(title: string): string {
  return `'${title.replace(/'/g, "''")}'!A1`;
}

export function readSheetTitles(payload: unknown): string[] {
  if (typeof payload !== 'object' || payload === null || !('sheets' in payload)) return [];
  const { sheets } = payload;
  if (!Array.isArray(sheets)) return [];

  const titles: string[] = [];
  for (const sheet of sheets) {
    const title = sheet?.properties?.title;
    if (typeof title === 'string') titles.push(title);
  }
  return titles;
}

export class GoogleSheetsBackend implements FeedbackBackend {
  readonly name = 'spreadsheet' as const;

  constructor(
    private readonly config: GoogleSheetsConfig,
    private readonly timeoutMs: number,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly getAccessToken: AccessTokenProvider = serviceAccountToken
  ) {}

  isConfigured(): boolean {
    return !isPlaceholder(this.config.spreadsheetId)
      && isServiceAccountKeyComplete(this.config.credentials);
  }

  async save(record: FeedbackRecord): Promise<void> {
    const credentials = this.config.credentials;
    if (isPlaceholder(this.config.spreadsheetId) || !isServiceAccountKeyComplete(credentials)) {
      throw new BackendUnavailableError(this.name, 'service account key or spreadsheet id incomplete');
    }

    try {
      const token = await this.getAccessToken(credentials);
      await this.ensureWorksheet(token);
      await this.appendRow(token, [record.timestamp, record.name, record.email, record.message, NEW_ROW_STATUS]);
      Logger.info(`Feedback appended to worksheet "${this.config.worksheetName}"`);
    } catch (error) {
      throw toBackendWriteError(this.name, error);
    }
  }

  private async request(url: string, token: string, method: 'GET' | 'POST', body?: unknown): Promise<unknown> {
    const response: Response = await this.fetchImpl(url, {
      method,
      headers: {
        'Authorization': `Bearer ${token}`,
        'Content-Type': 'application/json'
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      timeout: this.timeoutMs
    });

    if (!response.ok) {
      throw new BackendWriteError(this.name, `Sheets API responded ${response.status}`, response.status);
    }
    return response.json();
  }

  private async ensureWorksheet(token: string): Promise<void> {
    const spreadsheetUrl = `${SHEETS_API_URL}/${encodeURIComponent(this.config.spreadsheetId)}`;
    const metadata = await this.request(`${spreadsheetUrl}?fields=sheets.properties.title`, token, 'GET');
    if (readSheetTitles(metadata).includes(this.config.worksheetName)) return;

    Logger.info(`Creating worksheet "${this.config.worksheetName}"`);
    await this.request(`${spreadsheetUrl}:batchUpdate`, token, 'POST', {
      requests: [{ addSheet: { properties: { title: this.config.worksheetName } } }]
    });
    await this.appendRow(token, SHEET_HEADER);
  }

  private async appendRow(token: string, row: string[]): Promise<void> {
    const range = encodeURIComponent(worksheetRange(this.config.worksheetName));
    const url = `${SHEETS_API_URL}/${encodeURIComponent(this.config.spreadsheetId)}/values/${range}:append`
      + '?valueInputOption=RAW&insertDataOption=INSERT_ROWS';
    await this.request(url, token, 'POST', { values: [row] });
  }
}
