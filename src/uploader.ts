import type { FieldGenerator } from './aiHelper.js';
import type { ProductApi, WooProductPayload } from './api/wooCommerceClient.js';
import type { CategoryResolution, CategoryResolver } from './categoryResolver.js';
import {
  ApiError,
  AuthError,
  NetworkError,
  RateLimitError,
  describeError
} from './errors.js';
import { type ImageClient, describeImageFailures } from './imageUploader.js';
import type { UploadQueue } from './uploadQueue.js';
import type { FailureKind, ProductRecord, QueueSnapshotEntry } from './types.js';

export interface UploadDependencies {
  api: Pick<ProductApi, 'createProduct'>;
  categories: CategoryResolver;
  images?: ImageClient;
  fields?: FieldGenerator;
}

export type UploadEvent =
  | { type: 'started'; item: QueueSnapshotEntry }
  | { type: 'succeeded'; item: QueueSnapshotEntry; remoteId: number }
  | { type: 'failed'; item: QueueSnapshotEntry; reason: string; kind: FailureKind }
  | { type: 'warning'; item: QueueSnapshotEntry; message: string }
  | { type: 'auth-halt'; consecutiveFailures: number };

export interface UploadOptions {
  concurrency?: number;
  signal?: AbortSignal;
  /** Consecutive authentication failures that count as systemic. */
  authFailureThreshold?: number;
  stopOnAuthFailure?: boolean;
  productStatus?: WooProductPayload['status'];
  generateMissingDescriptions?: boolean;
  /**
   * Progress callback. If it throws, no further items are claimed, the items
   * in flight still finish and `runUpload` rejects with the first such error.
   */
  onEvent?: (event: UploadEvent) => void;
}

export interface UploadSummary {
  attempted: number;
  succeeded: number;
  failed: number;
  withWarnings: number;
  remaining: number;
  cancelled: boolean;
  systemicAuthFailure: boolean;
  durationMs: number;
}

export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof AuthError) {
    return 'auth';
  }
  if (error instanceof RateLimitError) {
    return 'rate_limited';
  }
  if (error instanceof NetworkError) {
    return error.timedOut ? 'timeout' : 'network';
  }
  if (error instanceof ApiError) {
    return 'rejected';
  }
  return 'unknown';
}

export function buildProductPayload(
  record: ProductRecord,
  categoryIds: readonly number[],
  options: { status?: WooProductPayload['status']; description?: string } = {}
): WooProductPayload {
  const payload: WooProductPayload = {
    name: record.name,
    type: 'simple',
    status: options.status ?? 'publish',
    regular_price: record.regularPrice,
    description: options.description ?? record.description,
    manage_stock: true,
    stock_quantity: record.stockQuantity,
    categories: categoryIds.map(id => ({ id }))
  };
  if (record.sku) {
    payload.sku = record.sku;
  }
  return payload;
}

function describeResolution(resolution: CategoryResolution): string | null {
  const fallback = resolution.usedDefault ? 'using the default category' : 'no category assigned';
  if (resolution.error) {
    return `categories unavailable (${resolution.error}), ${fallback}`;
  }
  if (resolution.unresolved.length === 0) {
    return null;
  }
  const names = resolution.unresolved.join(', ');
  return resolution.ids.length > 0 && !resolution.usedDefault
    ? `unknown categories skipped: ${names}`
    : `unknown categories: ${names}, ${fallback}`;
}

/**
 * Drains the queue with `concurrency` workers. Each item ends up succeeded or
 * failed; one failure never stops the others. Aborting the signal stops new
 * claims, lets in-flight items finish and leaves the rest pending.
 */
export async function runUpload(
  queue: UploadQueue,
  deps: UploadDependencies,
  options: UploadOptions = {}
): Promise<UploadSummary> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  const threshold = Math.max(1, options.authFailureThreshold ?? 3);
  const stopOnAuthFailure = options.stopOnAuthFailure !== false;
  const startedAt = Date.now();

  let attempted = 0;
  let succeeded = 0;
  let failed = 0;
  let withWarnings = 0;
  let consecutiveAuthFailures = 0;
  let systemicAuthFailure = false;

  const listenerErrors: unknown[] = [];

  const emit = (event: UploadEvent) => {
    try {
      options.onEvent?.(event);
    } catch (error) {
      listenerErrors.push(error);
    }
  };
  const shouldStop = () =>
    listenerErrors.length > 0 ||
    options.signal?.aborted === true ||
    (systemicAuthFailure && stopOnAuthFailure);

  const latest = (item: QueueSnapshotEntry) => queue.get(item.id) ?? item;

  const uploadItem = async (item: QueueSnapshotEntry): Promise<void> => {
    let warned = false;
    const warn = (message: string) => {
      warned = true;
      queue.addWarning(item.id, message);
      emit({ type: 'warning', item: latest(item), message });
    };
    const record = item.record;

    let remoteId: number;
    try {
      const resolution = await deps.categories.resolve(record.categories);
      const categoryNote = describeResolution(resolution);
      if (categoryNote) {
        warn(categoryNote);
      }

      let description = record.description;
      if (!description && options.generateMissingDescriptions && deps.fields) {
        try {
          description = await deps.fields.generateDescription(record.name);
        } catch (error) {
          warn(`description not generated: ${describeError(error)}`);
        }
      }

      const payload = buildProductPayload(record, resolution.ids, {
        status: options.productStatus,
        description
      });
      remoteId = (await deps.api.createProduct(payload)).id;
    } catch (error) {
      const kind = classifyFailure(error);
      const reason = describeError(error);
      queue.markFailed(item.id, reason, kind);
      failed += 1;
      if (kind === 'auth') {
        consecutiveAuthFailures += 1;
        if (consecutiveAuthFailures >= threshold && !systemicAuthFailure) {
          systemicAuthFailure = true;
          emit({ type: 'auth-halt', consecutiveFailures: consecutiveAuthFailures });
        }
      } else {
        consecutiveAuthFailures = 0;
      }
      emit({ type: 'failed', item: latest(item), reason, kind });
      return;
    }

    consecutiveAuthFailures = 0;

    if (record.imagePaths.length > 0) {
      if (!deps.images) {
        warn('images not uploaded: media uploads are not configured');
      } else {
        try {
          const result = await deps.images.uploadImages(remoteId, record.imagePaths);
          for (const message of describeImageFailures(result.failures)) {
            warn(message);
          }
        } catch (error) {
          warn(`images not uploaded: ${describeError(error)}`);
        }
      }
    }

    queue.markSucceeded(item.id, remoteId);
    succeeded += 1;
    if (warned) {
      withWarnings += 1;
    }
    emit({ type: 'succeeded', item: latest(item), remoteId });
  };

  const worker = async (): Promise<void> => {
    while (!shouldStop()) {
      const item = queue.nextPending();
      if (!item) {
        return;
      }
      attempted += 1;
      emit({ type: 'started', item });
      await uploadItem(item);
    }
  };

  await Promise.all(Array.from({ length: concurrency }, () => worker()));

  if (listenerErrors.length > 0) {
    throw listenerErrors[0];
  }

  return {
    attempted,
    succeeded,
    failed,
    withWarnings,
    remaining: queue.counts().pending,
    cancelled: options.signal?.aborted === true,
    systemicAuthFailure,
    durationMs: Date.now() - startedAt
  };
}
