import path from 'path';
import type { ProductApi } from './api/wooCommerceClient.js';
import type { MediaApi, MediaItem } from './api/wordpressMediaClient.js';
import { describeError } from './errors.js';

export interface ImageFailure {
  path: string;
  reason: string;
}

export interface ImageUploadResult {
  attached: MediaItem[];
  failures: ImageFailure[];
}

export interface ImageClient {
  uploadImages(productId: number, paths: readonly string[]): Promise<ImageUploadResult>;
}

/**
 * Uploads local images to the media library one by one and attaches the
 * ones that made it to the product, keeping their order.
 */
export class ProductImageUploader implements ImageClient {
  constructor(
    private media: MediaApi,
    private products: Pick<ProductApi, 'attachImages'>
  ) {}

  async uploadImages(productId: number, paths: readonly string[]): Promise<ImageUploadResult> {
    const uploaded: MediaItem[] = [];
    const failures: ImageFailure[] = [];

    for (const imagePath of paths) {
      try {
        uploaded.push(await this.media.uploadMedia(imagePath));
      } catch (error) {
        failures.push({ path: imagePath, reason: describeError(error) });
      }
    }

    if (uploaded.length === 0) {
      return { attached: [], failures };
    }

    try {
      await this.products.attachImages(
        productId,
        uploaded.map(item => item.id)
      );
    } catch (error) {
      const reason = describeError(error);
      return {
        attached: [],
        failures: [...failures, ...uploaded.map(item => ({ path: item.url || `media ${item.id}`, reason }))]
      };
    }

    return { attached: uploaded, failures };
  }
}

export function describeImageFailures(failures: readonly ImageFailure[]): string[] {
  return failures.map(failure => `image ${path.basename(failure.path)}: ${failure.reason}`);
}
