import path from 'path';
import fs from 'fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CONFIG_DEFAULTS, loadConfig } from '../src/config.js';
import { loadDotEnv } from '../src/env.js';
import { ConfigError } from '../src/errors.js';
import { makeTempDir } from './helpers.js';

const BASE_ENV: NodeJS.ProcessEnv = {
  STORE_URL: 'https://shop.example.com/',
  WC_CONSUMER_KEY: 'ck_test',
  WC_CONSUMER_SECRET: 'test-secret'
};

function problemsFor(env: NodeJS.ProcessEnv): string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.problems;
    }
    throw error;
  }
  return [];
}

describe('loadConfig', () => {
  it('applies defaults to a minimal environment', () => {
    const config = loadConfig(BASE_ENV);

    expect(config).toEqual({
      storeUrl: 'https://shop.example.com',
      consumerKey: 'ck_test',
      consumerSecret: 'test-secret',
      media: undefined,
      defaultCategoryId: undefined,
      concurrency: CONFIG_DEFAULTS.concurrency,
      requestTimeoutMs: 30000,
      authFailureThreshold: 3,
      maxAttempts: 3,
      batchLogDir: path.resolve('batch_logs'),
      ai: undefined
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('collects every missing credential in one error', () => {
    expect(problemsFor({})).toEqual([
      'STORE_URL is required',
      'WC_CONSUMER_KEY is required',
      'WC_CONSUMER_SECRET is required'
    ]);
  });

  it('rejects malformed values', () => {
    expect(
      problemsFor({
        ...BASE_ENV,
        STORE_URL: 'shop.example.com',
        UPLOAD_CONCURRENCY: '0',
        WC_DEFAULT_CATEGORY_ID: 'abc',
        WP_USERNAME: 'editor'
      })
    ).toEqual([
      'STORE_URL must start with http:// or https:// (got "shop.example.com")',
      'WP_USERNAME and WP_APP_PASSWORD must be set together',
      'WC_DEFAULT_CATEGORY_ID must be an integer >= 1 (got "abc")',
      'UPLOAD_CONCURRENCY must be an integer 1..10 (got "0")'
    ]);
  });

  it('reads optional media, category and AI settings', () => {
    const config = loadConfig({
      ...BASE_ENV,
      WP_USERNAME: 'editor',
      WP_APP_PASSWORD: 'test-password',
      WC_DEFAULT_CATEGORY_ID: '15',
      UPLOAD_CONCURRENCY: '4',
      BATCH_LOG_DIR: 'logs/uploads',
      OPENAI_API_KEY: 'test-key',
      OPENAI_BASE_URL: 'http://localhost:8080/v1/'
    });

    expect(config.media).toEqual({ username: 'editor', appPassword: 'test-password' });
    expect(config.defaultCategoryId).toBe(15);
    expect(config.concurrency).toBe(4);
    expect(config.batchLogDir).toBe(path.resolve('logs/uploads'));
    expect(config.ai).toEqual({ apiKey: 'test-key', model: 'gpt-4o-mini', baseUrl: 'http://localhost:8080/v1' });
  });
});

describe('loadDotEnv', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('applies unset keys and leaves existing ones alone', async () => {
    const envPath = path.join(tempDir, '.env');
    await fs.writeFile(
      envPath,
      [
        '# store',
        'STORE_URL=https://shop.example.com',
        'export WC_CONSUMER_KEY="ck_test"',
        "WC_CONSUMER_SECRET='test-secret'",
        '',
        'EXISTING=override',
        'NOT_A_PAIR'
      ].join('\n')
    );
    const target: NodeJS.ProcessEnv = { EXISTING: 'keep' };

    const applied = await loadDotEnv(envPath, target);

    expect(applied).toEqual(['STORE_URL', 'WC_CONSUMER_KEY', 'WC_CONSUMER_SECRET']);
    expect(target).toEqual({
      EXISTING: 'keep',
      STORE_URL: 'https://shop.example.com',
      WC_CONSUMER_KEY: 'ck_test',
      WC_CONSUMER_SECRET: 'test-secret'
    });
  });

  it('ignores a missing file', async () => {
    const target: NodeJS.ProcessEnv = {};
    expect(await loadDotEnv(path.join(tempDir, '.env'), target)).toEqual([]);
    expect(target).toEqual({});
  });
});
