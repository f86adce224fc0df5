/**
 * AI-assisted product copy through an OpenAI-compatible chat completions API.
 */

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import type { AiSettings } from './config.js';
import { ApiError, ConfigError } from './errors.js';
import { toUploaderError } from './api/httpErrors.js';

export interface FieldGenerator {
  generateDescription(title: string, productType?: string): Promise<string>;
}

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

function readCompletion(data: unknown): string | null {
  if (typeof data !== 'object' || data === null || !('choices' in data) || !Array.isArray(data.choices)) {
    return null;
  }
  const [first] = data.choices;
  if (typeof first !== 'object' || first === null || !('message' in first)) {
    return null;
  }
  const message = first.message;
  if (typeof message !== 'object' || message === null || !('content' in message)) {
    return null;
  }
  return typeof message.content === 'string' ? message.content : null;
}

/**
 * Splits a model answer into individual titles, dropping list numbering,
 * bullets and wrapping quotes.
 */
export function parseTitleList(content: string, count: number): string[] {
  return content
    .split(/\r?\n/)
    .map(line =>
      line
        .trim()
        .replace(/^(\d+[.)]|[-*•])\s*/, '')
        .replace(/^["“'](.*)["”']$/, '$1')
        .trim()
    )
    .filter(line => line.length > 0)
    .slice(0, count);
}

export class AiHelper implements FieldGenerator {
  private client: AxiosInstance | null;
  private model: string;

  constructor(settings: AiSettings | undefined, options: { adapter?: AxiosAdapter; timeoutMs?: number } = {}) {
    this.model = settings?.model ?? '';
    this.client = settings
      ? axios.create({
          baseURL: settings.baseUrl,
          timeout: options.timeoutMs ?? 60000,
          headers: {
            Authorization: `Bearer ${settings.apiKey}`,
            'Content-Type': 'application/json'
          },
          adapter: options.adapter
        })
      : null;
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async generateTitles(prompt: string, count = 3): Promise<string[]> {
    const content = await this.complete(
      [
        {
          role: 'system',
          content: 'You are a product title generator for e-commerce. Generate compelling product titles.'
        },
        { role: 'user', content: `Generate ${count} product titles, one per line, for: ${prompt}` }
      ],
      { maxTokens: 150, temperature: 0.7 }
    );
    return parseTitleList(content, count);
  }

  async generateDescription(title: string, productType = 'product'): Promise<string> {
    const content = await this.complete(
      [
        {
          role: 'system',
          content: 'You are a product description writer for e-commerce. Write SEO-friendly product descriptions.'
        },
        {
          role: 'user',
          content:
            `Write a detailed product description for this ${productType}: ${title}\n` +
            'Include features, benefits, and specifications in a professional tone.'
        }
      ],
      { maxTokens: 400, temperature: 0.7 }
    );
    return content.trim();
  }

  private async complete(messages: ChatMessage[], options: { maxTokens: number; temperature: number }): Promise<string> {
    if (!this.client) {
      throw new ConfigError(['OPENAI_API_KEY is not set; AI features are disabled']);
    }

    let data: unknown;
    try {
      const response = await this.client.post<unknown>('/chat/completions', {
        model: this.model,
        messages,
        max_tokens: options.maxTokens,
        temperature: options.temperature
      });
      data = response.data;
    } catch (error) {
      throw toUploaderError(error, 'AI request');
    }

    const content = readCompletion(data);
    if (content === null) {
      throw new ApiError('AI request failed: response carried no message content', 200);
    }
    return content;
  }
}
