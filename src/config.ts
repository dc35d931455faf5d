import { ConfigError } from './errors.js';
import { Language, LANGUAGES } from './types/dreaming.js';
import { MigrationConfig } from './types/migration.js';

export interface CliOptions {
  sourceToken?: string;
  targetToken?: string;
  sourceLanguage: string;
  targetLanguage: string;
  baseUrl: string;
  execute?: boolean;
  failFast?: boolean;
  yes?: boolean;
}

function isLanguage(value: string): value is Language {
  return LANGUAGES.some((language) => language === value);
}

function parseLanguage(value: string, flag: string): Language {
  if (!isLanguage(value)) {
    throw new ConfigError(`${flag} must be one of ${LANGUAGES.join(', ')} (got "${value}")`);
  }
  return value;
}

export function loadConfig(options: CliOptions): MigrationConfig {
  const missing: string[] = [];
  const sourceToken = options.sourceToken?.trim() || '';
  const targetToken = options.targetToken?.trim() || '';

  if (!sourceToken) {
    missing.push('--source-token (or SOURCE_TOKEN)');
  }
  if (!targetToken) {
    missing.push('--target-token (or TARGET_TOKEN)');
  }
  if (missing.length > 0) {
    throw new ConfigError(`Missing required credentials: ${missing.join(', ')}`);
  }

  const baseUrl = options.baseUrl.trim().replace(/\/+$/, '');
  if (!baseUrl) {
    throw new ConfigError('--base-url (or DREAMING_API_URL) must not be empty');
  }

  return {
    source: { token: sourceToken, language: parseLanguage(options.sourceLanguage, '--source-language') },
    target: { token: targetToken, language: parseLanguage(options.targetLanguage, '--target-language') },
    baseUrl,
    mode: options.execute ? 'execute' : 'dry-run',
    failFast: options.failFast ?? false,
  };
}
