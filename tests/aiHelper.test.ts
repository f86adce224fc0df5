import type { InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import { AiHelper, parseTitleList } from '../src/aiHelper.js';
import { ApiError, AuthError, ConfigError } from '../src/errors.js';
import { jsonBody, stubAdapter, type StubReply } from './helpers.js';

const SETTINGS = { apiKey: 'test-key', model: 'gpt-4o-mini', baseUrl: 'https://llm.example.com/v1' };

function helperReplying(reply: StubReply) {
  const requests: InternalAxiosRequestConfig[] = [];
  const helper = new AiHelper(SETTINGS, { adapter: stubAdapter(() => reply, requests) });
  return { helper, requests };
}

describe('parseTitleList', () => {
  it('drops numbering, bullets, quotes and blank lines', () => {
    const content = '1. "Walnut Desk Lamp"\n2) Brass Reading Light\n\n- Minimal LED Lamp\n* Extra Title';

    expect(parseTitleList(content, 3)).toEqual(['Walnut Desk Lamp', 'Brass Reading Light', 'Minimal LED Lamp']);
  });
});

describe('AiHelper', () => {
  it('is unavailable without an api key', async () => {
    const helper = new AiHelper(undefined);

    expect(helper.isAvailable()).toBe(false);
    await expect(helper.generateTitles('lamp')).rejects.toBeInstanceOf(ConfigError);
  });

  it('asks the chat completions endpoint for a description', async () => {
    const { helper, requests } = helperReplying({
      status: 200,
      data: { choices: [{ message: { role: 'assistant', content: '  A sturdy brass lamp.  ' } }] }
    });

    const description = await helper.generateDescription('Brass Lamp');

    expect(description).toBe('A sturdy brass lamp.');
    expect(requests[0].url).toBe('/chat/completions');
    expect(requests[0].headers.get('Authorization')).toBe('Bearer test-key');
    expect(jsonBody(requests[0])).toMatchObject({ model: 'gpt-4o-mini', max_tokens: 400 });
  });

  it('parses generated titles', async () => {
    const { helper } = helperReplying({
      status: 200,
      data: { choices: [{ message: { content: '1. Brass Lamp\n2. Reading Lamp\n3. Desk Light' } }] }
    });

    expect(await helper.generateTitles('lamp', 2)).toEqual(['Brass Lamp', 'Reading Lamp']);
  });

  it('rejects a reply without message content', async () => {
    const { helper } = helperReplying({ status: 200, data: { choices: [] } });
    await expect(helper.generateDescription('Lamp')).rejects.toBeInstanceOf(ApiError);
  });

  it('maps an invalid key onto an auth error', async () => {
    const { helper } = helperReplying({ status: 401, data: { error: { message: 'bad key' } } });
    await expect(helper.generateDescription('Lamp')).rejects.toBeInstanceOf(AuthError);
  });
});
