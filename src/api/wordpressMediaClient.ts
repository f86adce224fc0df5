import fs from 'fs/promises';
import path from 'path';
import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import type { AppConfig, MediaCredentials } from '../config.js';
import { ApiError, IoError } from '../errors.js';
import { toUploaderError } from './httpErrors.js';

export interface MediaItem {
  id: number;
  url: string;
}

export interface MediaApi {
  uploadMedia(filePath: string): Promise<MediaItem>;
}

const MIME_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.bmp': 'image/bmp',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff'
};

export function mimeTypeFor(filePath: string): string {
  return MIME_TYPES[path.extname(filePath).toLowerCase()] ?? 'image/jpeg';
}

function headerSafeFileName(filePath: string): string {
  return path.basename(filePath).replace(/[^\x20-\x7e]/g, '_').replace(/"/g, "'");
}

export class WordPressMediaClient implements MediaApi {
  private client: AxiosInstance;

  constructor(
    settings: Pick<AppConfig, 'storeUrl' | 'requestTimeoutMs'> & { media: MediaCredentials },
    options: { adapter?: AxiosAdapter } = {}
  ) {
    this.client = axios.create({
      baseURL: `${settings.storeUrl}/wp-json/wp/v2`,
      timeout: settings.requestTimeoutMs,
      auth: {
        username: settings.media.username,
        password: settings.media.appPassword
      },
      maxBodyLength: Infinity,
      maxContentLength: Infinity,
      adapter: options.adapter
    });
  }

  /**
   * Sends the original file bytes to the media library, untouched.
   */
  async uploadMedia(filePath: string): Promise<MediaItem> {
    let body: Buffer;
    try {
      body = await fs.readFile(filePath);
    } catch (error) {
      throw new IoError(`Cannot read image ${filePath}`, filePath, { cause: error });
    }

    const fileName = headerSafeFileName(filePath);
    let data: unknown;
    try {
      const response = await this.client.post<unknown>('/media', body, {
        headers: {
          'Content-Disposition': `attachment; filename="${fileName}"`,
          'Content-Type': mimeTypeFor(filePath)
        }
      });
      data = response.data;
    } catch (error) {
      throw toUploaderError(error, `Uploading ${fileName}`);
    }

    if (typeof data !== 'object' || data === null || !('id' in data) || typeof data.id !== 'number') {
      throw new ApiError(`Uploading ${fileName} failed: response carried no media id`, 201);
    }
    const url = 'source_url' in data && typeof data.source_url === 'string' ? data.source_url : '';
    return { id: data.id, url };
  }
}
