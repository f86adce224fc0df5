import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import {
  AxiosError,
  AxiosHeaders,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig
} from 'axios';
import type { ProductRecord } from '../src/types.js';

export function makeRecord(name: string, overrides: Partial<ProductRecord> = {}): ProductRecord {
  return {
    rowNumber: 2,
    name,
    price: 10,
    regularPrice: '10.00',
    categories: [],
    description: '',
    stockQuantity: 0,
    imagePaths: [],
    ...overrides
  };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'bulk-uploader-tests-'));
}

export async function writeFile(filePath: string, content: string | Buffer): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
}

export interface StubReply {
  status: number;
  statusText?: string;
  data?: unknown;
  headers?: Record<string, string>;
}

/**
 * In-process axios adapter. Non-2xx replies are thrown as AxiosError; axios
 * leaves status checks to the adapter.
 */
export function stubAdapter(
  handler: (config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>,
  requests: InternalAxiosRequestConfig[] = []
): AxiosAdapter {
  return async config => {
    requests.push(config);
    const reply = await handler(config);
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: reply.statusText ?? '',
      headers: reply.headers ?? {},
      config,
      request: {}
    };
    if (reply.status < 200 || reply.status >= 300) {
      throw new AxiosError(
        `Request failed with status code ${reply.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        {},
        response
      );
    }
    return response;
  };
}

export function jsonBody(config: InternalAxiosRequestConfig): unknown {
  return typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
}

export function emptyRequestConfig(): InternalAxiosRequestConfig {
  return { headers: new AxiosHeaders() };
}
