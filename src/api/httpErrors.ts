import axios from 'axios';
import {
  ApiError,
  AuthError,
  NetworkError,
  RateLimitError,
  UploaderError,
  describeError
} from '../errors.js';

interface RemoteError {
  code?: string;
  message?: string;
}

function readRemoteError(data: unknown): RemoteError {
  if (typeof data === 'string') {
    const text = data.replace(/<[^>]*>/g, ' ').replace(/\s+/g, ' ').trim();
    return { message: text ? text.slice(0, 200) : undefined };
  }
  if (typeof data !== 'object' || data === null) {
    return {};
  }
  const code = 'code' in data && typeof data.code === 'string' ? data.code : undefined;
  const message = 'message' in data && typeof data.message === 'string' ? data.message : undefined;
  return { code, message };
}

export function parseRetryAfter(value: unknown): number | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return undefined;
  }
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

/**
 * Maps whatever an HTTP call threw onto the uploader's error kinds.
 */
export function toUploaderError(error: unknown, action: string): UploaderError {
  if (error instanceof UploaderError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const response = error.response;
    if (response) {
      const status = response.status;
      const remote = readRemoteError(response.data);
      const detail = remote.message ?? response.statusText;
      const message = `${action} failed: HTTP ${status}${detail ? ` - ${detail}` : ''}`;

      if (status === 401 || status === 403) {
        return new AuthError(message, status);
      }
      if (status === 429) {
        return new RateLimitError(message, parseRetryAfter(response.headers['retry-after']));
      }
      return new ApiError(message, status, remote.code);
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkError(`${action} timed out (${error.message})`, true, { cause: error });
    }
    return new NetworkError(`${action} failed: ${error.message}`, false, { cause: error });
  }

  return new UploaderError('unknown', `${action} failed: ${describeError(error)}`, { cause: error });
}
