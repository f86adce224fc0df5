import path from 'path';
import { ConfigError } from './errors.js';

export interface MediaCredentials {
  readonly username: string;
  readonly appPassword: string;
}

export interface AiSettings {
  readonly apiKey: string;
  readonly model: string;
  readonly baseUrl: string;
}

export interface AppConfig {
  readonly storeUrl: string;
  readonly consumerKey: string;
  readonly consumerSecret: string;
  readonly media?: MediaCredentials;
  readonly defaultCategoryId?: number;
  readonly concurrency: number;
  readonly requestTimeoutMs: number;
  readonly authFailureThreshold: number;
  readonly maxAttempts: number;
  readonly batchLogDir: string;
  readonly ai?: AiSettings;
}

export const CONFIG_DEFAULTS = {
  concurrency: 1,
  maxConcurrency: 10,
  requestTimeoutMs: 30000,
  authFailureThreshold: 3,
  maxAttempts: 3,
  batchLogDir: 'batch_logs',
  aiModel: 'gpt-4o-mini',
  aiBaseUrl: 'https://api.openai.com/v1'
} as const;

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readInteger(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  problems: string[],
  bounds: { min: number; max?: number }
): number {
  const raw = readString(env, key);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  const tooLarge = bounds.max !== undefined && value > bounds.max;
  if (!Number.isInteger(value) || value < bounds.min || tooLarge) {
    const range = bounds.max !== undefined ? `${bounds.min}..${bounds.max}` : `>= ${bounds.min}`;
    problems.push(`${key} must be an integer ${range} (got "${raw}")`);
    return fallback;
  }
  return value;
}

/**
 * Builds the process-wide configuration from environment variables. Every
 * problem is collected and reported in a single ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const problems: string[] = [];

  const storeUrl = readString(env, 'STORE_URL');
  const consumerKey = readString(env, 'WC_CONSUMER_KEY');
  const consumerSecret = readString(env, 'WC_CONSUMER_SECRET');

  if (!storeUrl) {
    problems.push('STORE_URL is required');
  } else if (!/^https?:\/\//i.test(storeUrl)) {
    problems.push(`STORE_URL must start with http:// or https:// (got "${storeUrl}")`);
  }
  if (!consumerKey) {
    problems.push('WC_CONSUMER_KEY is required');
  }
  if (!consumerSecret) {
    problems.push('WC_CONSUMER_SECRET is required');
  }

  const wpUser = readString(env, 'WP_USERNAME');
  const wpPassword = readString(env, 'WP_APP_PASSWORD');
  if (Boolean(wpUser) !== Boolean(wpPassword)) {
    problems.push('WP_USERNAME and WP_APP_PASSWORD must be set together');
  }

  const rawCategory = readString(env, 'WC_DEFAULT_CATEGORY_ID');
  let defaultCategoryId: number | undefined;
  if (rawCategory !== undefined) {
    defaultCategoryId = readInteger(env, 'WC_DEFAULT_CATEGORY_ID', 0, problems, { min: 1 });
  }

  const concurrency = readInteger(env, 'UPLOAD_CONCURRENCY', CONFIG_DEFAULTS.concurrency, problems, {
    min: 1,
    max: CONFIG_DEFAULTS.maxConcurrency
  });
  const requestTimeoutMs = readInteger(env, 'REQUEST_TIMEOUT_MS', CONFIG_DEFAULTS.requestTimeoutMs, problems, {
    min: 1
  });
  const authFailureThreshold = readInteger(
    env,
    'AUTH_FAILURE_THRESHOLD',
    CONFIG_DEFAULTS.authFailureThreshold,
    problems,
    { min: 1 }
  );
  const maxAttempts = readInteger(env, 'UPLOAD_MAX_ATTEMPTS', CONFIG_DEFAULTS.maxAttempts, problems, { min: 1 });

  if (problems.length > 0 || !storeUrl || !consumerKey || !consumerSecret) {
    throw new ConfigError(problems);
  }

  const aiKey = readString(env, 'OPENAI_API_KEY');
  const config: AppConfig = {
    storeUrl: storeUrl.replace(/\/+$/, ''),
    consumerKey,
    consumerSecret,
    media: wpUser && wpPassword ? Object.freeze({ username: wpUser, appPassword: wpPassword }) : undefined,
    defaultCategoryId,
    concurrency,
    requestTimeoutMs,
    authFailureThreshold,
    maxAttempts,
    batchLogDir: path.resolve(readString(env, 'BATCH_LOG_DIR') ?? CONFIG_DEFAULTS.batchLogDir),
    ai: aiKey
      ? Object.freeze({
          apiKey: aiKey,
          model: readString(env, 'OPENAI_MODEL') ?? CONFIG_DEFAULTS.aiModel,
          baseUrl: (readString(env, 'OPENAI_BASE_URL') ?? CONFIG_DEFAULTS.aiBaseUrl).replace(/\/+$/, '')
        })
      : undefined
  };

  return Object.freeze(config);
}
