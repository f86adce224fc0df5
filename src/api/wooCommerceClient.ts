/**
 * WooCommerce REST API client (wc/v3).
 *
 * Authenticates with the store's consumer key and secret over basic auth.
 * Every failure is rethrown as one of the uploader's error kinds.
 */

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import type { AppConfig } from '../config.js';
import { ApiError, describeError } from '../errors.js';
import { toUploaderError } from './httpErrors.js';

export interface WooCategory {
  id: number;
  name: string;
  slug: string;
  parent: number;
  count?: number;
}

export interface WooProductPayload {
  name: string;
  type: 'simple';
  status: 'publish' | 'draft';
  regular_price: string;
  description: string;
  sku?: string;
  manage_stock: boolean;
  stock_quantity: number;
  categories: Array<{ id: number }>;
  images?: Array<{ id: number }>;
}

export interface CreatedProduct {
  id: number;
  permalink?: string;
}

export interface ProductApi {
  createProduct(payload: WooProductPayload): Promise<CreatedProduct>;
  attachImages(productId: number, mediaIds: readonly number[]): Promise<void>;
  listCategories(): Promise<WooCategory[]>;
}

export interface ConnectionCheck {
  ok: boolean;
  message: string;
}

export type WooClientSettings = Pick<AppConfig, 'storeUrl' | 'consumerKey' | 'consumerSecret' | 'requestTimeoutMs'>;

const CATEGORY_PAGE_SIZE = 100;

function isWooCategory(value: unknown): value is WooCategory {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'id' in value &&
    typeof value.id === 'number' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'slug' in value &&
    typeof value.slug === 'string' &&
    'parent' in value &&
    typeof value.parent === 'number'
  );
}

function readCreatedProduct(data: unknown): CreatedProduct | null {
  if (typeof data !== 'object' || data === null || !('id' in data) || typeof data.id !== 'number') {
    return null;
  }
  const permalink = 'permalink' in data && typeof data.permalink === 'string' ? data.permalink : undefined;
  return { id: data.id, permalink };
}

export class WooCommerceClient implements ProductApi {
  private client: AxiosInstance;
  private apiBase: string;

  constructor(settings: WooClientSettings, options: { adapter?: AxiosAdapter } = {}) {
    this.apiBase = `${settings.storeUrl}/wp-json/wc/v3`;
    this.client = axios.create({
      baseURL: this.apiBase,
      timeout: settings.requestTimeoutMs,
      auth: {
        username: settings.consumerKey,
        password: settings.consumerSecret
      },
      headers: {
        'Content-Type': 'application/json'
      },
      adapter: options.adapter
    });
  }

  getApiBase(): string {
    return this.apiBase;
  }

  async testConnection(): Promise<ConnectionCheck> {
    try {
      await this.client.get('/products', { params: { per_page: 1 } });
      return { ok: true, message: `Connected to ${this.apiBase}` };
    } catch (error) {
      return { ok: false, message: describeError(toUploaderError(error, 'Connection test')) };
    }
  }

  /**
   * Fetches every product category, including empty ones, page by page.
   */
  async listCategories(): Promise<WooCategory[]> {
    const categories: WooCategory[] = [];
    let page = 1;

    while (true) {
      let batch: unknown;
      try {
        const response = await this.client.get<unknown>('/products/categories', {
          params: { per_page: CATEGORY_PAGE_SIZE, page, hide_empty: false }
        });
        batch = response.data;
      } catch (error) {
        throw toUploaderError(error, 'Listing categories');
      }

      if (!Array.isArray(batch)) {
        throw new ApiError('Listing categories failed: unexpected response body', 200);
      }
      categories.push(...batch.filter(isWooCategory));

      if (batch.length < CATEGORY_PAGE_SIZE) {
        break;
      }
      page += 1;
    }

    return categories;
  }

  async createProduct(payload: WooProductPayload): Promise<CreatedProduct> {
    let data: unknown;
    try {
      const response = await this.client.post<unknown>('/products', payload);
      data = response.data;
    } catch (error) {
      throw toUploaderError(error, `Creating "${payload.name}"`);
    }

    const created = readCreatedProduct(data);
    if (!created) {
      throw new ApiError(`Creating "${payload.name}" failed: response carried no product id`, 201);
    }
    return created;
  }

  /**
   * Sets the product gallery. The first media id becomes the featured image.
   */
  async attachImages(productId: number, mediaIds: readonly number[]): Promise<void> {
    try {
      await this.client.put(`/products/${productId}`, {
        images: mediaIds.map(id => ({ id }))
      });
    } catch (error) {
      throw toUploaderError(error, `Attaching images to product ${productId}`);
    }
  }
}
