export type Language = 'es' | 'fr';

export const LANGUAGES: readonly Language[] = ['es', 'fr'];

export const LANGUAGE_NAMES: Record<Language, string> = {
  es: 'Spanish',
  fr: 'French',
};

// The service records more activity kinds than these two; unknown ones are kept verbatim.
export type ActivityType = 'watching' | 'listening' | (string & {});

interface TimeEntryFields {
  title?: string;
  description?: string;
  timeSeconds: number;
  type: ActivityType;
  date: string;
  url?: string;
}

// Fields the service adds beyond the known ones ride along untouched.
export interface TimeEntry extends TimeEntryFields {
  id?: string;
  [field: string]: unknown;
}

export interface TimeEntrySubmission extends TimeEntryFields {
  idempotencyKey: string;
  [field: string]: unknown;
}

export interface TimeEntryPage {
  entries: Record<string, unknown>[];
  nextCursor?: string;
}

export interface DreamingConfig {
  token: string;
  baseUrl: string;
}
