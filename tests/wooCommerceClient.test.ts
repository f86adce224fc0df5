import { AxiosError, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import { WooCommerceClient, type WooCategory } from '../src/api/wooCommerceClient.js';
import { parseRetryAfter, toUploaderError } from '../src/api/httpErrors.js';
import { ApiError, AuthError, NetworkError, RateLimitError, UploaderError } from '../src/errors.js';
import { emptyRequestConfig, jsonBody, stubAdapter, type StubReply } from './helpers.js';

const SETTINGS = {
  storeUrl: 'https://shop.example.com',
  consumerKey: 'ck_test',
  consumerSecret: 'test-secret',
  requestTimeoutMs: 5000
};

function clientFor(handler: (config: InternalAxiosRequestConfig) => StubReply | Promise<StubReply>) {
  const requests: InternalAxiosRequestConfig[] = [];
  const client = new WooCommerceClient(SETTINGS, { adapter: stubAdapter(handler, requests) });
  return { client, requests };
}

function category(id: number): WooCategory {
  return { id, name: `Category ${id}`, slug: `category-${id}`, parent: 0 };
}

describe('WooCommerceClient', () => {
  it('creates a product with basic auth against wc/v3', async () => {
    const { client, requests } = clientFor(() => ({
      status: 201,
      data: { id: 321, permalink: 'https://shop.example.com/product/mug' }
    }));

    const created = await client.createProduct({
      name: 'Mug',
      type: 'simple',
      status: 'publish',
      regular_price: '9.99',
      description: '',
      manage_stock: true,
      stock_quantity: 10,
      categories: []
    });

    expect(created).toEqual({ id: 321, permalink: 'https://shop.example.com/product/mug' });
    expect(client.getApiBase()).toBe('https://shop.example.com/wp-json/wc/v3');
    expect(requests[0].method).toBe('post');
    expect(requests[0].url).toBe('/products');
    expect(requests[0].auth).toEqual({ username: 'ck_test', password: 'test-secret' });
    expect(jsonBody(requests[0])).toMatchObject({ name: 'Mug', regular_price: '9.99', stock_quantity: 10 });
  });

  it('pages through categories until a short page', async () => {
    const { client, requests } = clientFor(config => {
      const page = Number(config.params.page);
      const size = page === 1 ? 100 : 1;
      return { status: 200, data: Array.from({ length: size }, (_, index) => category((page - 1) * 100 + index + 1)) };
    });

    const categories = await client.listCategories();

    expect(categories).toHaveLength(101);
    expect(categories[100].id).toBe(101);
    expect(requests.map(request => request.params)).toEqual([
      { per_page: 100, page: 1, hide_empty: false },
      { per_page: 100, page: 2, hide_empty: false }
    ]);
  });

  it('attaches media ids to a product in order', async () => {
    const { client, requests } = clientFor(() => ({ status: 200, data: { id: 55 } }));

    await client.attachImages(55, [8, 3]);

    expect(requests[0].method).toBe('put');
    expect(requests[0].url).toBe('/products/55');
    expect(jsonBody(requests[0])).toEqual({ images: [{ id: 8 }, { id: 3 }] });
  });

  it('maps a 401 onto an auth error with the store message', async () => {
    const { client } = clientFor(() => ({
      status: 401,
      statusText: 'Unauthorized',
      data: { code: 'woocommerce_rest_cannot_create', message: 'Sorry, you cannot create resources.' }
    }));

    const error = await client.listCategories().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({
      status: 401,
      message: 'Listing categories failed: HTTP 401 - Sorry, you cannot create resources.'
    });
  });

  it('maps a rejected payload onto an api error carrying the remote code', async () => {
    const { client } = clientFor(() => ({
      status: 400,
      data: { code: 'rest_invalid_param', message: 'Invalid parameter(s): regular_price' }
    }));

    const error = await client.attachImages(1, [2]).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ status: 400, code: 'rest_invalid_param' });
  });

  it('treats a body without an id as a failed creation', async () => {
    const { client } = clientFor(() => ({ status: 201, data: { ok: true } }));

    await expect(
      client.createProduct({
        name: 'Mug',
        type: 'simple',
        status: 'draft',
        regular_price: '1.00',
        description: '',
        manage_stock: true,
        stock_quantity: 0,
        categories: []
      })
    ).rejects.toThrow('Creating "Mug" failed: response carried no product id');
  });

  it('reports connection problems without throwing', async () => {
    const ok = clientFor(() => ({ status: 200, data: [] }));
    expect(await ok.client.testConnection()).toEqual({
      ok: true,
      message: 'Connected to https://shop.example.com/wp-json/wc/v3'
    });

    const denied = clientFor(() => ({ status: 401, statusText: 'Unauthorized', data: '' }));
    expect(await denied.client.testConnection()).toEqual({
      ok: false,
      message: 'Connection test failed: HTTP 401 - Unauthorized'
    });
  });

  it('flags timeouts separately from other network errors', async () => {
    const slow = clientFor(config => {
      throw new AxiosError('timeout of 5000ms exceeded', AxiosError.ECONNABORTED, config);
    });
    const timeout = await slow.client.listCategories().catch((caught: unknown) => caught);
    expect(timeout).toBeInstanceOf(NetworkError);
    expect(timeout).toMatchObject({
      timedOut: true,
      message: 'Listing categories timed out (timeout of 5000ms exceeded)'
    });

    const refused = clientFor(config => {
      throw new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED', config);
    });
    const network = await refused.client.listCategories().catch((caught: unknown) => caught);
    expect(network).toMatchObject({
      timedOut: false,
      message: 'Listing categories failed: connect ECONNREFUSED 127.0.0.1:443'
    });
  });
});

describe('toUploaderError', () => {
  function responseError(status: number, data: unknown, headers: Record<string, string> = {}): AxiosError {
    const config = emptyRequestConfig();
    return new AxiosError('Request failed', AxiosError.ERR_BAD_RESPONSE, config, {}, {
      status,
      statusText: '',
      data,
      headers,
      config
    });
  }

  it('strips markup from html error pages', () => {
    const error = toUploaderError(
      responseError(502, '<html><body><h1>502 Bad Gateway</h1></body></html>'),
      'Uploading a.jpg'
    );

    expect(error).toBeInstanceOf(ApiError);
    expect(error.message).toBe('Uploading a.jpg failed: HTTP 502 - 502 Bad Gateway');
  });

  it('reads Retry-After on rate limiting', () => {
    const error = toUploaderError(responseError(429, { message: 'Too many requests' }, { 'retry-after': '30' }), 'Creating "Mug"');

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryAfterSeconds: 30, message: 'Creating "Mug" failed: HTTP 429 - Too many requests' });
  });

  it('passes uploader errors through and wraps anything else', () => {
    const original = new AuthError('no', 403);
    expect(toUploaderError(original, 'Anything')).toBe(original);

    const wrapped = toUploaderError(new Error('boom'), 'Creating "Mug"');
    expect(wrapped).toBeInstanceOf(UploaderError);
    expect(wrapped.kind).toBe('unknown');
    expect(wrapped.message).toBe('Creating "Mug" failed: boom');
  });

  it('parses Retry-After values', () => {
    expect(parseRetryAfter('12')).toBe(12);
    expect(parseRetryAfter(5)).toBe(5);
    expect(parseRetryAfter('soon')).toBeUndefined();
    expect(parseRetryAfter(undefined)).toBeUndefined();
  });
});
