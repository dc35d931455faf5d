import { Language, TimeEntry } from './dreaming.js';

export type MigrationMode = 'dry-run' | 'execute';

export interface MigrationConfig {
  source: { token: string; language: Language };
  target: { token: string; language: Language };
  baseUrl: string;
  mode: MigrationMode;
  failFast: boolean;
}

export interface EntrySummary {
  count: number;
  totalSeconds: number;
}

export interface SkippedEntry {
  position: number;
  reason: string;
}

export interface FailedSubmission {
  position: number;
  entry: TimeEntry;
  message: string;
  status?: number;
}

export interface MigrationResult {
  mode: MigrationMode;
  total: number;
  submitted: number;
  failed: number;
  failures: FailedSubmission[];
  skipped: SkippedEntry[];
  cancelled: boolean;
  aborted: boolean;
  elapsedMs: number;
}
