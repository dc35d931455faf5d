import { Command, Option } from 'commander';
import inquirer from 'inquirer';
import { CliOptions, loadConfig } from './config.js';
import { MigrationError } from './errors.js';
import { DEFAULT_BASE_URL, DreamingService } from './services/dreaming.js';
import { ConfirmPrompt, MigrationService } from './services/migration.js';
import { DreamingConfig, LANGUAGES } from './types/dreaming.js';
import { consoleReporter, Reporter } from './utils/reporter.js';

export interface CliDependencies {
  createService: (config: DreamingConfig) => DreamingService;
  confirm: ConfirmPrompt;
  isInteractive: () => boolean;
  reporter: Reporter;
  exit: (code: number) => void;
}

async function confirmWithPrompt(message: string): Promise<boolean> {
  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: 'confirm',
      name: 'confirm',
      message,
      default: false,
    },
  ]);
  return confirm;
}

const defaultDependencies: CliDependencies = {
  createService: (config) => new DreamingService(config),
  confirm: confirmWithPrompt,
  isInteractive: () => Boolean(process.stdin.isTTY && process.stdout.isTTY),
  reporter: consoleReporter,
  exit: (code) => process.exit(code),
};

function describeFailure(error: unknown): string {
  // The migrator has already printed the failing entry.
  if (error instanceof MigrationError && error.stage === 'submit') {
    return `Migration aborted (${error.name})`;
  }
  if (error instanceof MigrationError) {
    return `[${error.stage}] ${error.message}`;
  }
  return error instanceof Error ? error.message : 'An unknown error occurred';
}

export function createProgram(overrides: Partial<CliDependencies> = {}): Command {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides };
  const program = new Command();

  program
    .name('progress-migrate')
    .description('Copy Dreaming time entries from one account/language to another')
    .version('1.0.0')
    .addOption(new Option('--source-token <token>', 'bearer token for the source account').env('SOURCE_TOKEN'))
    .addOption(new Option('--target-token <token>', 'bearer token for the target account').env('TARGET_TOKEN'))
    .addOption(new Option('--source-language <lang>', 'language to copy from').choices(LANGUAGES).default('es'))
    .addOption(new Option('--target-language <lang>', 'language to copy into').choices(LANGUAGES).default('fr'))
    .addOption(new Option('--base-url <url>', 'Dreaming functions endpoint').env('DREAMING_API_URL').default(DEFAULT_BASE_URL))
    .option('--execute', 'submit entries to the target (default is a dry run)')
    .option('--fail-fast', 'stop at the first entry that fails to submit')
    .option('-y, --yes', 'skip the confirmation prompt before writing')
    .action(async (options: CliOptions) => {
      try {
        const config = loadConfig(options);
        const source = deps.createService({ token: config.source.token, baseUrl: config.baseUrl });
        const target = deps.createService({ token: config.target.token, baseUrl: config.baseUrl });
        const askFirst = config.mode === 'execute' && !options.yes && deps.isInteractive();

        if (config.mode === 'dry-run') {
          deps.reporter.info('Running in DRY RUN mode (no changes will be made)');
          deps.reporter.info('');
        }

        const migrator = new MigrationService(source, target, {
          reporter: deps.reporter,
          confirm: askFirst ? deps.confirm : undefined,
        });
        await migrator.migrate(config);
      } catch (error) {
        deps.reporter.error(`Error: ${describeFailure(error)}`);
        deps.exit(1);
      }
    });

  return program;
}
