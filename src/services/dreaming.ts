import axios, { AxiosInstance } from 'axios';
import { toMigrationError } from '../errors.js';
import { DreamingConfig, Language, TimeEntrySubmission, TimeEntryPage } from '../types/dreaming.js';
import {
  findEntryList,
  identityOf,
  isJsonObject,
  JsonObject,
  normalizeEntries,
  ParsedEntries,
  parseTimeEntries,
  tryParseJson,
} from '../utils/entries.js';

export const DEFAULT_BASE_URL = 'https://app.dreaming.com/.netlify/functions';

const USER_AGENT = 'Dreaming Progress Migration Tool';

function readCursor(body: unknown): string | undefined {
  if (!isJsonObject(body)) {
    return undefined;
  }
  const cursor = body.nextCursor ?? body.next;
  return typeof cursor === 'string' && cursor.length > 0 ? cursor : undefined;
}

function readPage(body: unknown): TimeEntryPage {
  if (typeof body === 'string') {
    const parsed = tryParseJson(body);
    if (isJsonObject(parsed)) {
      return readPage(parsed);
    }
  }

  // A single-record object is not a page wrapper, so it never carries a cursor.
  const isWrapper = isJsonObject(body) && findEntryList(body) !== undefined;
  return {
    entries: normalizeEntries(body),
    nextCursor: isWrapper ? readCursor(body) : undefined,
  };
}

export class DreamingService {
  private client: AxiosInstance;
  private config: DreamingConfig;

  constructor(config: DreamingConfig, client: AxiosInstance = axios.create()) {
    this.config = config;
    this.client = client;
    this.client.defaults.baseURL = config.baseUrl;

    this.client.interceptors.request.use((request) => {
      request.headers.set('accept', '*/*');
      request.headers.set('authorization', `Bearer ${this.config.token}`);
      request.headers.set('User-Agent', USER_AGENT);
      return request;
    });
  }

  async getTimeEntries(language: Language): Promise<ParsedEntries> {
    const records = await this.getTimeEntryRecords(language);
    return parseTimeEntries(records);
  }

  /**
   * Fetches every raw record for the language, following `nextCursor` until
   * the service stops returning one. Records come back in service order.
   */
  async getTimeEntryRecords(language: Language): Promise<JsonObject[]> {
    const records: JsonObject[] = [];
    const seen = new Set<string>();
    let cursor: string | undefined;

    do {
      const params: Record<string, string> = { language };
      if (cursor) {
        params.cursor = cursor;
        seen.add(cursor);
      }

      let page: TimeEntryPage;
      try {
        const response = await this.client.get('/externalTime', { params });
        page = readPage(response.data);
      } catch (error) {
        throw toMigrationError(error, 'fetch');
      }

      records.push(...page.entries);
      cursor = page.nextCursor && !seen.has(page.nextCursor) ? page.nextCursor : undefined;
    } while (cursor);

    return records;
  }

  async createTimeEntry(entry: TimeEntrySubmission, language: Language): Promise<unknown> {
    try {
      const response = await this.client.post('/externalTime', JSON.stringify(entry), {
        params: { language },
        headers: { 'content-type': 'text/plain;charset=UTF-8' },
      });
      return response.data;
    } catch (error) {
      throw toMigrationError(error, 'submit', identityOf(entry));
    }
  }
}
