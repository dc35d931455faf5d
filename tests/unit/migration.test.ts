import { ApiError, AuthError, NetworkError } from '../../src/errors.js';
import { DreamingService } from '../../src/services/dreaming.js';
import {
  formatElapsed,
  formatSummary,
  MigrationService,
  summarizeEntries,
  toSubmission,
} from '../../src/services/migration.js';
import { TimeEntry } from '../../src/types/dreaming.js';
import { MigrationConfig } from '../../src/types/migration.js';
import { createCollectingReporter } from '../helpers/collectingReporter.js';
import { createFakeDreaming, FakeDreaming, FakeReply, makeRecords } from '../helpers/fakeDreaming.js';

const BASE_URL = 'https://functions.example.test';

function configFor(mode: MigrationConfig['mode'], failFast = false): MigrationConfig {
  return {
    source: { token: 'source-token', language: 'es' },
    target: { token: 'target-token', language: 'fr' },
    baseUrl: BASE_URL,
    mode,
    failFast,
  };
}

function entry(overrides: Partial<TimeEntry> = {}): TimeEntry {
  return {
    id: 'src-1',
    description: 'Episode 1',
    timeSeconds: 600,
    type: 'watching',
    date: '2024-03-01',
    ...overrides,
  };
}

interface Harness {
  source: FakeDreaming;
  target: FakeDreaming;
  reporter: ReturnType<typeof createCollectingReporter>;
  migrator: MigrationService;
}

function harness(
  records: Record<string, unknown>[],
  failWhen: (body: Record<string, unknown>) => boolean = () => false,
  confirm?: (message: string) => Promise<boolean>
): Harness {
  const source = createFakeDreaming(() => ({ status: 200, data: { externalTimes: records } }));
  const target = createFakeDreaming((request) =>
    request.body && failWhen(request.body)
      ? { status: 500, data: { error: 'internal' } }
      : { status: 200, data: { ok: true } }
  );
  const reporter = createCollectingReporter();
  const migrator = new MigrationService(
    new DreamingService({ token: 'source-token', baseUrl: BASE_URL }, source.client),
    new DreamingService({ token: 'target-token', baseUrl: BASE_URL }, target.client),
    { reporter, confirm }
  );
  return { source, target, reporter, migrator };
}

function progressLines(lines: string[]): string[] {
  return lines.filter((line) => line.startsWith('Progress:'));
}

describe('summarizeEntries()', () => {
  it('totals the durations of every entry', () => {
    const entries = [entry({ timeSeconds: 30 }), entry({ timeSeconds: 45 }), entry({ timeSeconds: 1200 })];
    expect(summarizeEntries(entries)).toEqual({ count: 3, totalSeconds: 1275 });
  });

  it('renders hours with two decimals', () => {
    expect(formatSummary({ count: 42, totalSeconds: 54900 })).toEqual([
      'Found 42 time entries',
      'Total time: 15.25 hours (54900 seconds)',
    ]);
    expect(formatSummary({ count: 0, totalSeconds: 0 })).toEqual([
      'Found 0 time entries',
      'Total time: 0.00 hours (0 seconds)',
    ]);
  });
});

describe('toSubmission()', () => {
  it('drops the source id and attaches the generated key', () => {
    const source = entry({ url: 'https://video.example.test/1', level: 'beginner' });
    expect(toSubmission(source, () => 'key-1')).toEqual({
      description: 'Episode 1',
      timeSeconds: 600,
      type: 'watching',
      date: '2024-03-01',
      url: 'https://video.example.test/1',
      level: 'beginner',
      idempotencyKey: 'key-1',
    });
  });

  it('never reuses the source id as the key', () => {
    const keys = ['src-1', 'fresh'];
    const submission = toSubmission(entry(), () => keys.shift() ?? 'exhausted');
    expect(submission.idempotencyKey).toBe('fresh');
  });

  it('generates a different key per call by default', () => {
    expect(toSubmission(entry()).idempotencyKey).not.toBe(toSubmission(entry()).idempotencyKey);
  });
});

describe('formatElapsed()', () => {
  it('renders whole seconds', () => {
    expect(formatElapsed(2500)).toBe('2 seconds');
    expect(formatElapsed(0)).toBe('0 seconds');
  });
});

describe('MigrationService', () => {
  it('summarizes 42 entries totalling 54900 seconds', async () => {
    const records = [...makeRecords(41, 1300), ...makeRecords(1, 1600)];
    const { reporter, migrator } = harness(records);

    await migrator.migrate(configFor('dry-run'));

    expect(reporter.lines).toContain('Found 42 time entries');
    expect(reporter.lines).toContain('Total time: 15.25 hours (54900 seconds)');
  });

  describe('dry run', () => {
    it('previews five entries and never writes to the target', async () => {
      const { target, reporter, migrator } = harness(makeRecords(42));

      const result = await migrator.migrate(configFor('dry-run'));

      expect(target.requests).toHaveLength(0);
      expect(result).toMatchObject({ mode: 'dry-run', total: 42, submitted: 0, failed: 0 });
      expect(reporter.lines.filter((line) => /^\d+\. /.test(line))).toEqual([
        '1. Episode 1',
        '2. Episode 2',
        '3. Episode 3',
        '4. Episode 4',
        '5. Episode 5',
      ]);
      expect(reporter.lines).toContain('   Type: listening');
      expect(reporter.lines).toContain('   URL: https://video.example.test/episode-5');
      expect(reporter.lines).toContain('... and 37 more entries');
      expect(reporter.lines[reporter.lines.length - 1]).toBe('To actually migrate, run with --execute flag');
    });

    it('omits the remainder line for short lists', async () => {
      const { reporter, migrator } = harness(makeRecords(3));

      await migrator.migrate(configFor('dry-run'));

      expect(reporter.lines.some((line) => line.startsWith('...'))).toBe(false);
    });
  });

  describe('execute', () => {
    it('submits every entry in source order with fresh unique keys', async () => {
      const { target, migrator } = harness(makeRecords(25));

      const result = await migrator.migrate(configFor('execute'));

      const bodies = target.posts().map((post) => post.body ?? {});
      const keys = bodies.map((body) => body.idempotencyKey);
      expect(result.submitted).toBe(25);
      expect(bodies.map((body) => body.description)).toEqual(
        Array.from({ length: 25 }, (_, index) => `Episode ${index + 1}`)
      );
      expect(bodies.every((body) => !('id' in body))).toBe(true);
      expect(new Set(keys).size).toBe(25);
      expect(keys.some((key) => typeof key === 'string' && key.startsWith('src-'))).toBe(false);
      expect(target.posts().every((post) => post.params.language === 'fr')).toBe(true);
    });

    it('reports progress every ten submissions plus one final report', async () => {
      const { reporter, migrator } = harness(makeRecords(42));

      await migrator.migrate(configFor('execute'));

      expect(progressLines(reporter.lines)).toEqual([
        'Progress: 10 / 42 submitted',
        'Progress: 20 / 42 submitted',
        'Progress: 30 / 42 submitted',
        'Progress: 40 / 42 submitted',
      ]);
      expect(reporter.lines.filter((line) => line === 'Migration complete!')).toHaveLength(1);
      expect(reporter.lines).toContain('Successfully migrated: 42');
    });

    it('completes immediately when there is nothing to migrate', async () => {
      const { target, reporter, migrator } = harness([]);

      const result = await migrator.migrate(configFor('execute'));

      expect(result).toMatchObject({ total: 0, submitted: 0, failed: 0, failures: [] });
      expect(target.requests).toHaveLength(0);
      expect(reporter.lines).toContain('No entries to migrate');
      expect(reporter.lines).toContain('Successfully migrated: 0');
      expect(reporter.errors).toEqual([]);
      expect(progressLines(reporter.lines)).toEqual([]);
    });

    it('keeps going after a failed entry', async () => {
      const { target, reporter, migrator } = harness(
        makeRecords(20),
        (body) => body.description === 'Episode 10'
      );

      const result = await migrator.migrate(configFor('execute'));

      expect(target.posts()).toHaveLength(20);
      expect(result.submitted).toBe(19);
      expect(result.failed).toBe(1);
      expect(result.failures).toHaveLength(1);
      expect(result.failures[0]).toMatchObject({ position: 10, status: 500 });
      expect(result.failures[0].entry.id).toBe('src-10');
      expect(reporter.errors).toEqual([
        'Error migrating entry 10: Failed to create time entry "Episode 10" (2024-03-01) (HTTP 500): {"error":"internal"}',
      ]);
      expect(progressLines(reporter.lines)).toEqual(['Progress: 10 / 20 submitted', 'Progress: 20 / 20 submitted']);
      expect(reporter.lines).toContain('Successfully migrated: 19');
      expect(reporter.lines).toContain('Errors: 1');
    });

    it('stops at the first failure with failFast', async () => {
      const { target, reporter, migrator } = harness(makeRecords(8), (body) => body.description === 'Episode 3');

      await expect(migrator.migrate(configFor('execute', true))).rejects.toBeInstanceOf(ApiError);

      expect(target.posts()).toHaveLength(3);
      expect(reporter.lines).toContain('Migration aborted!');
      expect(reporter.lines).toContain('Successfully migrated: 2');
      expect(reporter.lines).toContain('Errors: 1');
    });

    describe('when the target cannot be reached', () => {
      function migratorAgainst(reply: FakeReply) {
        const source = createFakeDreaming(() => ({ status: 200, data: makeRecords(20) }));
        const target = createFakeDreaming(() => reply);
        const reporter = createCollectingReporter();
        const migrator = new MigrationService(
          new DreamingService({ token: 'source-token', baseUrl: BASE_URL }, source.client),
          new DreamingService({ token: 'target-token', baseUrl: BASE_URL }, target.client),
          { reporter }
        );
        return { target, reporter, migrator };
      }

      it('stops at the first post rejected for its token', async () => {
        const { target, reporter, migrator } = migratorAgainst({ status: 401, data: { error: 'token expired' } });

        await expect(migrator.migrate(configFor('execute'))).rejects.toBeInstanceOf(AuthError);

        expect(target.posts()).toHaveLength(1);
        expect(reporter.errors).toEqual([
          'Error migrating entry 1: Failed to create time entry "Episode 1" (2024-03-01) (HTTP 401): {"error":"token expired"}',
        ]);
        expect(reporter.lines).toContain('Migration aborted!');
        expect(reporter.lines).toContain('Successfully migrated: 0');
        expect(reporter.lines).toContain('Errors: 1');
      });

      it('stops at the first post that gets no response', async () => {
        const { target, reporter, migrator } = migratorAgainst({ networkError: 'connect ECONNREFUSED 127.0.0.1:443' });

        await expect(migrator.migrate(configFor('execute'))).rejects.toBeInstanceOf(NetworkError);

        expect(target.posts()).toHaveLength(1);
        expect(reporter.errors).toEqual([
          'Error migrating entry 1: Failed to create time entry "Episode 1" (2024-03-01): connect ECONNREFUSED 127.0.0.1:443',
        ]);
        expect(reporter.lines).toContain('Migration aborted!');
      });
    });

    it('writes nothing when the operator declines', async () => {
      const confirm = jest.fn().mockResolvedValue(false);
      const { target, reporter, migrator } = harness(makeRecords(3), () => false, confirm);

      const result = await migrator.migrate(configFor('execute'));

      expect(confirm).toHaveBeenCalledWith('Migrate 3 entries to French in the target account?');
      expect(result.cancelled).toBe(true);
      expect(target.requests).toHaveLength(0);
      expect(reporter.lines).toContain('Migration cancelled.');
    });

    it('warns about records it cannot migrate', async () => {
      const [good, bad] = makeRecords(2);
      const { target, reporter, migrator } = harness([good, { ...bad, timeSeconds: null }]);

      const result = await migrator.migrate(configFor('execute'));

      expect(result.skipped).toEqual([{ position: 2, reason: 'timeSeconds must be a positive integer, got null' }]);
      expect(reporter.warnings).toEqual(['Skipping record 2: timeSeconds must be a positive integer, got null']);
      expect(target.posts()).toHaveLength(1);
    });
  });
});
