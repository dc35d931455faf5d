import { isValid, parseISO } from 'date-fns';
import { EntryIdentity } from '../errors.js';
import { TimeEntry } from '../types/dreaming.js';
import { SkippedEntry } from '../types/migration.js';

// Keys the externalTime function has been seen to wrap its list in, in lookup order.
const LIST_KEYS = ['externalTimes', 'entries', 'data', 'items', 'results'] as const;

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function findEntryList(body: JsonObject): unknown[] | undefined {
  for (const key of LIST_KEYS) {
    const value = body[key];
    if (Array.isArray(value)) {
      return value;
    }
  }
  return undefined;
}

/**
 * Turns a list response body into plain records.
 *
 * Accepts a bare array, an object wrapping the array under one of the known
 * keys (or a single record object), and a double-encoded JSON string of
 * either. String members holding a JSON object are decoded; anything else
 * that is not an object is dropped.
 */
export function normalizeEntries(body: unknown): JsonObject[] {
  let raw: unknown[];

  if (Array.isArray(body)) {
    raw = body;
  } else if (isJsonObject(body)) {
    raw = findEntryList(body) ?? [body];
  } else if (typeof body === 'string') {
    const parsed = tryParseJson(body);
    if (Array.isArray(parsed) || isJsonObject(parsed)) {
      return normalizeEntries(parsed);
    }
    raw = [];
  } else {
    raw = [];
  }

  const records: JsonObject[] = [];
  for (const item of raw) {
    if (isJsonObject(item)) {
      records.push(item);
    } else if (typeof item === 'string') {
      const parsed = tryParseJson(item);
      if (isJsonObject(parsed)) {
        records.push(parsed);
      }
    }
  }
  return records;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export type EntryParseResult =
  | { ok: true; entry: TimeEntry }
  | { ok: false; reason: string };

export function parseTimeEntry(record: JsonObject): EntryParseResult {
  const seconds = record.timeSeconds;
  if (typeof seconds !== 'number' || !Number.isInteger(seconds) || seconds <= 0) {
    return { ok: false, reason: `timeSeconds must be a positive integer, got ${JSON.stringify(seconds) ?? 'nothing'}` };
  }

  const date = optionalString(record.date);
  if (!date || !isValid(parseISO(date))) {
    return { ok: false, reason: `date is not a calendar date: ${JSON.stringify(record.date) ?? 'nothing'}` };
  }

  const { id, ...rest } = record;
  const entry: TimeEntry = {
    ...rest,
    title: optionalString(record.title),
    description: optionalString(record.description),
    timeSeconds: seconds,
    type: optionalString(record.type) ?? 'other',
    date,
    url: optionalString(record.url),
  };
  if (typeof id === 'string' || typeof id === 'number') {
    entry.id = String(id);
  }

  // Keep absent optional fields absent rather than explicitly undefined.
  for (const key of ['title', 'description', 'url'] as const) {
    if (entry[key] === undefined) {
      delete entry[key];
    }
  }
  return { ok: true, entry };
}

export interface ParsedEntries {
  entries: TimeEntry[];
  skipped: SkippedEntry[];
}

export function parseTimeEntries(records: JsonObject[]): ParsedEntries {
  const entries: TimeEntry[] = [];
  const skipped: SkippedEntry[] = [];

  records.forEach((record, index) => {
    const result = parseTimeEntry(record);
    if (result.ok) {
      entries.push(result.entry);
    } else {
      skipped.push({ position: index + 1, reason: result.reason });
    }
  });

  return { entries, skipped };
}

export function displayTitle(entry: { title?: string; description?: string }): string {
  return entry.title ?? entry.description ?? 'No description';
}

export function identityOf(entry: { title?: string; description?: string; date: string }): EntryIdentity {
  return { title: displayTitle(entry), date: entry.date };
}
