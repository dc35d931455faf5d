import { formatDuration, intervalToDuration } from 'date-fns';
import { v4 as uuidv4 } from 'uuid';
import { AuthError, MigrationError, NetworkError, toMigrationError } from '../errors.js';
import { LANGUAGE_NAMES, TimeEntry, TimeEntrySubmission } from '../types/dreaming.js';
import { EntrySummary, FailedSubmission, MigrationConfig, MigrationResult, SkippedEntry } from '../types/migration.js';
import { displayTitle } from '../utils/entries.js';
import { consoleReporter, Reporter } from '../utils/reporter.js';
import { DreamingService } from './dreaming.js';

export const PREVIEW_LIMIT = 5;
export const PROGRESS_INTERVAL = 10;

export type KeyGenerator = () => string;

export function summarizeEntries(entries: TimeEntry[]): EntrySummary {
  return {
    count: entries.length,
    totalSeconds: entries.reduce((total, entry) => total + entry.timeSeconds, 0),
  };
}

export function formatSummary(summary: EntrySummary): string[] {
  const hours = (summary.totalSeconds / 3600).toFixed(2);
  return [
    `Found ${summary.count} time entries`,
    `Total time: ${hours} hours (${summary.totalSeconds} seconds)`,
  ];
}

/**
 * Builds the create payload for the target account: the fetched record
 * without its `id`, plus a fresh idempotency key.
 */
export function toSubmission(entry: TimeEntry, generateKey: KeyGenerator = () => uuidv4()): TimeEntrySubmission {
  const { id, ...fields } = entry;
  let idempotencyKey = generateKey();
  while (idempotencyKey === id) {
    idempotencyKey = generateKey();
  }
  return { ...fields, idempotencyKey };
}

export function formatPreview(submission: TimeEntrySubmission, position: number): string[] {
  return [
    `${position}. ${displayTitle(submission)}`,
    `   Date: ${submission.date}`,
    `   Duration: ${submission.timeSeconds} seconds`,
    `   Type: ${submission.type}`,
    `   URL: ${submission.url ?? 'N/A'}`,
  ];
}

export function formatElapsed(elapsedMs: number): string {
  const duration = intervalToDuration({ start: 0, end: elapsedMs });
  return formatDuration(duration) || '0 seconds';
}

export type ConfirmPrompt = (message: string) => Promise<boolean>;

export interface MigrationServiceOptions {
  reporter?: Reporter;
  // Asked once before the first write in execute mode.
  confirm?: ConfirmPrompt;
  generateKey?: KeyGenerator;
  now?: () => number;
}

export class MigrationService {
  private reporter: Reporter;
  private generateKey: KeyGenerator;
  private now: () => number;
  private confirm?: ConfirmPrompt;

  constructor(
    private source: DreamingService,
    private target: DreamingService,
    options: MigrationServiceOptions = {}
  ) {
    this.reporter = options.reporter ?? consoleReporter;
    this.generateKey = options.generateKey ?? (() => uuidv4());
    this.now = options.now ?? Date.now;
    this.confirm = options.confirm;
  }

  /**
   * Runs one migration. Fetch failures are thrown. A rejected submission is
   * collected into the result; auth and network failures, or any failure when
   * `failFast` is set, stop the run and are thrown after the report.
   */
  async migrate(config: MigrationConfig): Promise<MigrationResult> {
    const startedAt = this.now();
    const sourceName = LANGUAGE_NAMES[config.source.language];

    this.reporter.info(`Fetching ${sourceName} progress from source account...`);
    const { entries, skipped } = await this.source.getTimeEntries(config.source.language);
    this.reportSkipped(skipped);

    for (const line of formatSummary(summarizeEntries(entries))) {
      this.reporter.info(line);
    }

    const result: MigrationResult = {
      mode: config.mode,
      total: entries.length,
      submitted: 0,
      failed: 0,
      failures: [],
      skipped,
      cancelled: false,
      aborted: false,
      elapsedMs: 0,
    };

    if (entries.length === 0) {
      this.reporter.info('No entries to migrate');
      result.elapsedMs = this.now() - startedAt;
      if (config.mode === 'execute') {
        this.reportCompletion(result);
      }
      return result;
    }

    if (config.mode === 'dry-run') {
      this.preview(entries);
      result.elapsedMs = this.now() - startedAt;
      return result;
    }

    const targetName = LANGUAGE_NAMES[config.target.language];
    if (this.confirm && !(await this.confirm(`Migrate ${entries.length} entries to ${targetName} in the target account?`))) {
      this.reporter.info('Migration cancelled.');
      result.cancelled = true;
      result.elapsedMs = this.now() - startedAt;
      return result;
    }

    this.reporter.info('');
    this.reporter.info(`Migrating entries to ${targetName} in target account...`);

    let abortError: MigrationError | undefined;
    for (const [index, entry] of entries.entries()) {
      const position = index + 1;
      try {
        await this.target.createTimeEntry(toSubmission(entry, this.generateKey), config.target.language);
        result.submitted++;
      } catch (error) {
        const failure = this.recordFailure(result, entry, position, error);
        // Auth and network failures end the run; other rejections only skip the entry.
        if (config.failFast || failure instanceof AuthError || failure instanceof NetworkError) {
          abortError = failure;
          result.aborted = true;
          break;
        }
      }

      if (position % PROGRESS_INTERVAL === 0) {
        this.reporter.info(`Progress: ${position} / ${entries.length} submitted`);
      }
    }

    result.elapsedMs = this.now() - startedAt;
    this.reportCompletion(result);

    if (abortError) {
      throw abortError;
    }
    return result;
  }

  private preview(entries: TimeEntry[]): void {
    this.reporter.info('');
    this.reporter.info(`DRY RUN - showing first ${PREVIEW_LIMIT} entries that would be migrated:`);

    entries.slice(0, PREVIEW_LIMIT).forEach((entry, index) => {
      this.reporter.info('');
      for (const line of formatPreview(toSubmission(entry, this.generateKey), index + 1)) {
        this.reporter.info(line);
      }
    });

    if (entries.length > PREVIEW_LIMIT) {
      this.reporter.info('');
      this.reporter.info(`... and ${entries.length - PREVIEW_LIMIT} more entries`);
    }

    this.reporter.info('');
    this.reporter.info('To actually migrate, run with --execute flag');
  }

  private recordFailure(result: MigrationResult, entry: TimeEntry, position: number, error: unknown): MigrationError {
    const failure = toMigrationError(error, 'submit');
    const record: FailedSubmission = { position, entry, message: failure.message, status: failure.status };
    result.failures.push(record);
    result.failed++;
    this.reporter.error(`Error migrating entry ${position}: ${failure.message}`);
    return failure;
  }

  private reportSkipped(skipped: SkippedEntry[]): void {
    for (const { position, reason } of skipped) {
      this.reporter.warn(`Skipping record ${position}: ${reason}`);
    }
  }

  private reportCompletion(result: MigrationResult): void {
    this.reporter.info('');
    this.reporter.info(result.aborted ? 'Migration aborted!' : 'Migration complete!');
    this.reporter.info(`Successfully migrated: ${result.submitted}`);
    this.reporter.info(`Errors: ${result.failed}`);
    this.reporter.info(`Elapsed: ${formatElapsed(result.elapsedMs)}`);
  }
}
