import axios from 'axios';

export type MigrationStage = 'config' | 'fetch' | 'submit';

export interface EntryIdentity {
  title: string;
  date: string;
}

export interface ErrorDetails {
  status?: number;
  body?: unknown;
  entry?: EntryIdentity;
}

export class MigrationError extends Error {
  readonly stage: MigrationStage;
  readonly status?: number;
  readonly body?: unknown;
  readonly entry?: EntryIdentity;

  constructor(message: string, stage: MigrationStage, details: ErrorDetails = {}) {
    super(message);
    this.name = 'MigrationError';
    this.stage = stage;
    this.status = details.status;
    this.body = details.body;
    this.entry = details.entry;
  }
}

/** Non-2xx response other than an authorization failure. */
export class ApiError extends MigrationError {
  constructor(message: string, stage: MigrationStage, details: ErrorDetails = {}) {
    super(message, stage, details);
    this.name = 'ApiError';
  }
}

/** 401 or 403: the bearer token is invalid or expired. */
export class AuthError extends MigrationError {
  constructor(message: string, stage: MigrationStage, details: ErrorDetails = {}) {
    super(message, stage, details);
    this.name = 'AuthError';
  }
}

/** The request left but no response came back. */
export class NetworkError extends MigrationError {
  constructor(message: string, stage: MigrationStage, details: ErrorDetails = {}) {
    super(message, stage, details);
    this.name = 'NetworkError';
  }
}

export class ConfigError extends MigrationError {
  constructor(message: string) {
    super(message, 'config');
    this.name = 'ConfigError';
  }
}

export function describeBody(body: unknown): string {
  if (body === undefined || body === null || body === '') {
    return '<empty body>';
  }
  return typeof body === 'string' ? body : JSON.stringify(body);
}

function stageLabel(stage: MigrationStage, entry?: EntryIdentity): string {
  switch (stage) {
    case 'fetch':
      return 'Failed to fetch time entries';
    case 'submit':
      return entry
        ? `Failed to create time entry "${entry.title}" (${entry.date})`
        : 'Failed to create time entry';
    case 'config':
      return 'Invalid configuration';
  }
}

export function toMigrationError(error: unknown, stage: MigrationStage, entry?: EntryIdentity): MigrationError {
  if (error instanceof MigrationError) {
    return error;
  }

  const label = stageLabel(stage, entry);

  if (axios.isAxiosError(error)) {
    const response = error.response;
    if (!response) {
      return new NetworkError(`${label}: ${error.message}`, stage, { entry });
    }

    const details: ErrorDetails = { status: response.status, body: response.data, entry };
    const message = `${label} (HTTP ${response.status}): ${describeBody(response.data)}`;
    if (response.status === 401 || response.status === 403) {
      return new AuthError(message, stage, details);
    }
    return new ApiError(message, stage, details);
  }

  const reason = error instanceof Error ? error.message : String(error);
  return new MigrationError(`${label}: ${reason}`, stage, { entry });
}
